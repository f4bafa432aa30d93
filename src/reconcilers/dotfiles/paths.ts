/**
 * Dotfile path resolution
 */

import { resolve } from 'node:path';
import type { DotfileEntry } from '../../config/types.js';
import type { ResolvedDotfile } from './types.js';

/**
 * Expand a leading `~` segment to the home directory
 *
 * Only the first segment is considered: `~/x` and `~` expand, while
 * `a/~/x` and `~user/x` are returned unchanged.
 *
 * @example
 * expandHome('~/.config/thing', '/Users/me') // '/Users/me/.config/thing'
 */
export function expandHome(path: string, home: string): string {
  if (path === '~') return resolve(home);
  if (path.startsWith('~/')) return resolve(home, path.slice(2));
  return path;
}

/**
 * Resolve an entry to absolute source and target paths
 */
export function resolveDotfile(
  entry: DotfileEntry,
  dotfilesDir: string,
  home: string
): ResolvedDotfile {
  if (entry.kind === 'implicit') {
    return {
      entry,
      source: resolve(dotfilesDir, entry.path),
      target: resolve(home, entry.path),
    };
  }

  return {
    entry,
    source: resolve(dotfilesDir, entry.original),
    target: resolve(expandHome(entry.link, home)),
  };
}
