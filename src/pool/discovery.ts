/**
 * File discovery
 *
 * Walks the target without following symlinks and yields each candidate
 * path once, in sorted order. Binary and media extensions are left out of a
 * walk; unsupported languages and size limits are judged later so those
 * files still show up in the statistics.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from '../core/errors';

export interface DiscoveryOptions {
  recursive: boolean;
  /** Directory names never entered, matched against the basename */
  skipDirs: readonly string[];
  /** Lower-case extensions never listed from a walk, e.g. `.png` */
  skipExtensions?: readonly string[];
}

function walk(dir: string, options: DiscoveryOptions, out: string[]): void {
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  for (const entry of entries) {
    const fullPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      if (options.recursive && !options.skipDirs.includes(entry.name)) {
        walk(fullPath, options, out);
      }
    } else if (entry.isFile()) {
      if (!options.skipExtensions?.includes(path.extname(entry.name).toLowerCase())) {
        out.push(fullPath);
      }
    }
    // Symlinks, sockets and the like are ignored
  }
}

/**
 * List the files under `target`, or `target` itself when it is a file.
 * A file named directly is returned whatever its extension.
 */
export function discoverFiles(target: string, options: DiscoveryOptions): string[] {
  const root = path.resolve(target);

  let stats: fs.Stats;
  try {
    stats = fs.statSync(root);
  } catch (error) {
    throw new ConfigError(`Path does not exist: ${target}`, { cause: error });
  }

  if (stats.isFile()) {
    return [root];
  }
  if (!stats.isDirectory()) {
    throw new ConfigError(`Not a file or directory: ${target}`);
  }

  const files: string[] = [];
  walk(root, options, files);
  return [...new Set(files)].sort();
}
