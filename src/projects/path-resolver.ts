// ============================================================================
// chatdeck - Project Path Resolution
// Recovers real directories from lossy encoded storage names
// ============================================================================

import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import type { ResolvedProjectPath } from '../types/chat-types.js';

/**
 * Filesystem queries the resolver needs; swapped for an in-memory tree in
 * tests and for Windows layouts on other hosts.
 */
export interface DirectoryProbe {
  isDirectory(dirPath: string): Promise<boolean>;

  /** Names of sub-directories, or null when the directory is unreadable */
  listDirectories(dirPath: string): Promise<string[] | null>;
}

export const nodeDirectoryProbe: DirectoryProbe = {
  async isDirectory(dirPath: string): Promise<boolean> {
    try {
      return (await fs.stat(dirPath)).isDirectory();
    } catch {
      return false;
    }
  },

  async listDirectories(dirPath: string): Promise<string[] | null> {
    try {
      const entries = await fs.readdir(dirPath, { withFileTypes: true });
      const names: string[] = [];
      for (const entry of entries) {
        if (entry.isDirectory()) {
          names.push(entry.name);
        } else if (entry.isSymbolicLink() && await this.isDirectory(path.join(dirPath, entry.name))) {
          names.push(entry.name);
        }
      }
      return names;
    } catch {
      return null;
    }
  },
};

/**
 * Encode a name the way the chat CLI names its storage directories:
 * every non-alphanumeric character becomes a hyphen.
 */
export function encodeName(name: string): string {
  return name.replace(/[^a-zA-Z0-9]/g, '-');
}

export interface PathResolverOptions {
  homeDir?: string;
  platform?: NodeJS.Platform;
  probe?: DirectoryProbe;
}

interface EncodedRoot {
  /** Filesystem root the encoded name starts from, null when unrooted */
  root: string | null;

  /** Hyphen-split remainder after the root marker */
  parts: string[];
}

const DRIVE_PATTERN = /^([A-Za-z])--/;

export class ProjectPathResolver {
  private readonly homeDir: string;
  private readonly pathApi: path.PlatformPath;
  private readonly probe: DirectoryProbe;

  constructor(options: PathResolverOptions = {}) {
    const platform = options.platform ?? process.platform;
    this.pathApi = platform === 'win32' ? path.win32 : path.posix;
    this.homeDir = this.pathApi.normalize(options.homeDir ?? os.homedir());
    this.probe = options.probe ?? nodeDirectoryProbe;
  }

  /**
   * Encoded home directory without its leading hyphen
   * ("/home/alice" → "home-alice", "C:\Users\alice" → "C--Users-alice")
   */
  get homePrefix(): string {
    return encodeName(this.homeDir).replace(/^-+/, '');
  }

  /**
   * Treat every hyphen as a path separator
   */
  literalDecode(encoded: string): string {
    const { root, parts } = this.splitRoot(encoded);
    if (root === null) {
      return this.pathApi.join(this.homeDir, ...parts);
    }
    return this.pathApi.join(root, ...parts);
  }

  /**
   * Resolve an encoded storage name to the directory it was created from.
   *
   * Candidates are tried in order (literal decode, filesystem walk,
   * home-relative decode); the first that exists wins. With no match the
   * literal decode comes back flagged as missing.
   */
  async resolve(encoded: string): Promise<ResolvedProjectPath> {
    const literal = this.literalDecode(encoded);
    if (await this.probe.isDirectory(literal)) {
      return { path: literal, exists: true, source: 'literal' };
    }

    const { root, parts } = this.splitRoot(encoded);
    if (root !== null && parts.length > 0) {
      const listings = new Map<string, Promise<string[] | null>>();
      const walked = await this.walk(root, parts, 0, listings);
      if (walked !== null && await this.probe.isDirectory(walked)) {
        return { path: walked, exists: true, source: 'filesystem' };
      }
    }

    const homeRelative = this.homeRelativeDecode(encoded);
    if (homeRelative !== null && await this.probe.isDirectory(homeRelative)) {
      return { path: homeRelative, exists: true, source: 'home' };
    }

    return { path: literal, exists: false, source: 'unresolved' };
  }

  /**
   * Name shown in the project list
   */
  displayName(resolvedPath: string): string {
    if (resolvedPath === this.homeDir) {
      return '~';
    }
    const homeWithSep = this.homeDir.endsWith(this.pathApi.sep)
      ? this.homeDir
      : this.homeDir + this.pathApi.sep;
    if (resolvedPath.startsWith(homeWithSep)) {
      return `~/${resolvedPath.slice(homeWithSep.length)}`;
    }
    return resolvedPath;
  }

  private splitRoot(encoded: string): EncodedRoot {
    const drive = DRIVE_PATTERN.exec(encoded);
    if (drive) {
      return {
        root: `${drive[1]}:${this.pathApi.sep}`,
        parts: encoded.slice(3).split('-'),
      };
    }
    if (encoded.startsWith('-')) {
      return { root: this.pathApi.sep, parts: encoded.slice(1).split('-') };
    }
    return { root: null, parts: encoded.split('-') };
  }

  private homeRelativeDecode(encoded: string): string | null {
    const prefix = this.homePrefix;
    if (encoded === `-${prefix}` || encoded === prefix) {
      return this.homeDir;
    }

    let suffix: string | null = null;
    if (encoded.startsWith(`-${prefix}-`)) {
      suffix = encoded.slice(prefix.length + 2);
    } else if (encoded.startsWith(`${prefix}-`)) {
      suffix = encoded.slice(prefix.length + 1);
    }
    if (!suffix) {
      return null;
    }
    return this.pathApi.join(this.homeDir, ...suffix.split('-'));
  }

  /**
   * Depth-first match of hyphen runs against real directory entries.
   * Longer runs are tried first since directory names with hyphens,
   * underscores, dots and spaces all encode to hyphens.
   */
  private async walk(
    root: string,
    parts: string[],
    index: number,
    listings: Map<string, Promise<string[] | null>>
  ): Promise<string | null> {
    if (index >= parts.length) {
      return root;
    }

    let listing = listings.get(root);
    if (!listing) {
      listing = this.probe.listDirectories(root);
      listings.set(root, listing);
    }
    const entries = await listing;
    if (!entries) {
      return null;
    }

    for (let length = parts.length - index; length > 0; length--) {
      const target = parts.slice(index, index + length).join('-');
      for (const entry of entries) {
        if (encodeName(entry) !== target) continue;
        const resolved = await this.walk(this.pathApi.join(root, entry), parts, index + length, listings);
        if (resolved !== null) {
          return resolved;
        }
      }
    }

    return null;
  }
}
