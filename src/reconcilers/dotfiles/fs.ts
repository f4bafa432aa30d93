/**
 * Filesystem boundary for the symlink reconciler
 */

import {
  existsSync,
  lstatSync,
  mkdirSync,
  readlinkSync,
  realpathSync,
  symlinkSync,
  unlinkSync,
} from 'node:fs';

/**
 * What lstat reports for a path (symlinks are not followed)
 */
export type EntryType = 'absent' | 'symlink' | 'file' | 'directory' | 'other';

export interface LinkFilesystem {
  /** Type of the path itself, without following symlinks */
  entryType(path: string): EntryType;
  /** Whether the path exists, following symlinks */
  exists(path: string): boolean;
  /** Raw target text of a symlink */
  readLink(path: string): string;
  /** Canonical absolute path, following symlinks */
  realPath(path: string): string;
  /** Create a symlink at `target` pointing to `source` */
  createSymlink(source: string, target: string): void;
  /** Remove a symlink (never a regular file or directory) */
  removeSymlink(path: string): void;
  /** Create a directory and any missing ancestors */
  createDirectory(path: string): void;
}

/**
 * LinkFilesystem backed by node:fs
 */
export const nodeLinkFilesystem: LinkFilesystem = {
  entryType(path: string): EntryType {
    const stats = lstatSync(path, { throwIfNoEntry: false });
    if (!stats) return 'absent';
    if (stats.isSymbolicLink()) return 'symlink';
    if (stats.isFile()) return 'file';
    if (stats.isDirectory()) return 'directory';
    return 'other';
  },

  exists(path: string): boolean {
    return existsSync(path);
  },

  readLink(path: string): string {
    return readlinkSync(path);
  },

  realPath(path: string): string {
    return realpathSync(path);
  },

  createSymlink(source: string, target: string): void {
    symlinkSync(source, target);
  },

  removeSymlink(path: string): void {
    if (!lstatSync(path).isSymbolicLink()) {
      throw new Error(`Refusing to remove non-symlink: ${path}`);
    }
    unlinkSync(path);
  },

  createDirectory(path: string): void {
    mkdirSync(path, { recursive: true });
  },
};
