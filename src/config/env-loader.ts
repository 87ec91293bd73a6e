/**
 * Environment Variable Loader for chatdeck
 *
 * Resolves every path and tunable the browser uses from the environment,
 * with defaults rooted in the user's ~/.claude directory.
 */

import * as dotenv from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';
import * as os from 'os';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

/**
 * Environment variable configuration
 */
export interface EnvConfig {
  // Paths
  claudeDir: string;
  projectsDir: string;
  preferencesFile: string;
  summaryCacheFile: string;
  keyFile: string;

  // Summaries
  apiKey?: string;
  summaryModel: string;
  summaryEndpoint: string;
  summaryTimeoutMs: number;
  summaryConcurrency: number;

  // Launching
  chatCommand: string;
  resumeFile?: string;

  // Logging
  logLevel: LogLevel;
  logFile?: string;
}

export const DEFAULT_SUMMARY_MODEL = 'gemini-2.5-flash-lite';
export const DEFAULT_SUMMARY_ENDPOINT = 'https://generativelanguage.googleapis.com/v1beta';
export const DEFAULT_SUMMARY_TIMEOUT_MS = 15000;
export const DEFAULT_SUMMARY_CONCURRENCY = 4;

/**
 * Load a .env file from the working directory, if there is one
 */
export function loadDotEnv(cwd: string = process.cwd()): void {
  const envPath = path.resolve(cwd, '.env');
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }
}

/**
 * Parse a positive integer environment variable
 */
function parseInteger(value: string | undefined, defaultValue: number): number {
  if (value === undefined) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed <= 0 ? defaultValue : parsed;
}

/**
 * Parse an enum environment variable
 */
function parseEnum<T extends string>(
  value: string | undefined,
  validValues: readonly T[],
  defaultValue: T
): T {
  if (value === undefined) return defaultValue;
  const match = validValues.find((candidate) => candidate === value.toLowerCase());
  return match ?? defaultValue;
}

export function expandHome(value: string, homeDir: string): string {
  if (value === '~') return homeDir;
  if (value.startsWith('~/') || value.startsWith('~\\')) {
    return path.join(homeDir, value.slice(2));
  }
  return value;
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

/**
 * Load environment configuration
 */
export function loadEnvConfig(
  env: NodeJS.ProcessEnv = process.env,
  homeDir: string = os.homedir(),
  platform: NodeJS.Platform = process.platform
): EnvConfig {
  const claudeDirSetting = nonEmpty(env.CHATDECK_CLAUDE_DIR);
  const claudeDir = claudeDirSetting
    ? path.resolve(expandHome(claudeDirSetting, homeDir))
    : path.join(homeDir, '.claude');
  const keyFileSetting = nonEmpty(env.CHATDECK_KEY_FILE);
  const resumeFile = nonEmpty(env.CHATDECK_RESUME_FILE);
  const logFile = nonEmpty(env.CHATDECK_LOG_FILE);

  return {
    claudeDir,
    projectsDir: path.join(claudeDir, 'projects'),
    preferencesFile: path.join(claudeDir, 'chatdeck.json'),
    summaryCacheFile: path.join(claudeDir, 'chatdeck-summaries.json'),
    keyFile: keyFileSetting
      ? path.resolve(expandHome(keyFileSetting, homeDir))
      : path.join(homeDir, '.gemini_api_key'),

    apiKey: nonEmpty(env.GEMINI_API_KEY),
    summaryModel: nonEmpty(env.CHATDECK_SUMMARY_MODEL) ?? DEFAULT_SUMMARY_MODEL,
    summaryEndpoint: (nonEmpty(env.CHATDECK_SUMMARY_ENDPOINT) ?? DEFAULT_SUMMARY_ENDPOINT).replace(/\/+$/, ''),
    summaryTimeoutMs: parseInteger(env.CHATDECK_SUMMARY_TIMEOUT_MS, DEFAULT_SUMMARY_TIMEOUT_MS),
    summaryConcurrency: parseInteger(env.CHATDECK_SUMMARY_CONCURRENCY, DEFAULT_SUMMARY_CONCURRENCY),

    // On Windows the .exe avoids recursing into a claude.bat wrapper
    chatCommand: nonEmpty(env.CHATDECK_CHAT_COMMAND) ?? (platform === 'win32' ? 'claude.exe' : 'claude'),
    resumeFile: resumeFile ? path.resolve(expandHome(resumeFile, homeDir)) : undefined,

    logLevel: parseEnum<LogLevel>(env.CHATDECK_LOG_LEVEL, ['error', 'warn', 'info', 'debug'], 'warn'),
    logFile: logFile ? path.resolve(expandHome(logFile, homeDir)) : undefined,
  };
}
