/**
 * Virtualenv path adjustment
 *
 * A virtual environment exposes the standard library under its own prefix,
 * through symlinks or (on platforms without them) plain copies. Graph nodes
 * should be labeled with the real installation paths, so module locations are
 * passed through an adjuster before they are recorded.
 *
 * Only paths inside `<prefix>/<libDir>` are touched, and `site-packages`
 * below it is left alone since it genuinely belongs to the environment.
 */

import { lstatSync, readFileSync, readlinkSync, statSync } from 'fs';
import { basename, dirname, join, normalize, relative, resolve, sep } from 'path';
import type { Logger } from '../logging/Logger.js';

export interface VirtualenvLayout {
  /** Root of the virtual environment */
  prefix: string;
  /** Root of the installation the environment was created from */
  realPrefix: string;
  /** Standard library directory relative to either prefix, e.g. "lib/python3.12" */
  libDir: string;
}

export type PathAdjuster = (path: string) => string;

/**
 * Files the environment generates or copies on its own, mapped back to the
 * real library regardless of content.
 */
const SHADOWED_ENTRIES: readonly string[][] = [
  ['site.py'],
  ['distutils'],
  ['distutils', '__init__.py'],
];

function isWithin(path: string, dir: string): boolean {
  return path === dir || path.startsWith(dir.endsWith(sep) ? dir : dir + sep);
}

function isSymlink(path: string): boolean {
  return lstatSync(path, { throwIfNoEntry: false })?.isSymbolicLink() ?? false;
}

function isFile(path: string): boolean {
  return statSync(path, { throwIfNoEntry: false })?.isFile() ?? false;
}

function readLink(link: string): string {
  return resolve(dirname(link), readlinkSync(link));
}

function sameContents(path1: string, path2: string): boolean {
  return readFileSync(path1).equals(readFileSync(path2));
}

/**
 * Build the adjuster for a layout. Without a layout (not running inside a
 * virtual environment) the adjuster returns paths unchanged.
 */
export function createPathAdjuster(layout?: VirtualenvLayout, logger?: Logger): PathAdjuster {
  if (!layout) {
    return (path) => path;
  }

  const prefix = normalize(layout.prefix);
  const virtualLib = join(prefix, layout.libDir);
  const sitePackages = join(virtualLib, 'site-packages');
  const realLib = join(layout.realPrefix, layout.libDir);

  const redirect = (path: string, target: string, reason: string): string => {
    logger?.trace('Adjusted virtualenv path', { path, target, reason });
    return target;
  };

  return (path) => {
    const normPath = normalize(path);

    if (!isWithin(normPath, virtualLib) || isWithin(normPath, sitePackages)) {
      return path;
    }

    if (isSymlink(normPath)) {
      return redirect(path, readLink(normPath), 'symlink');
    }

    const parent = dirname(normPath);
    if (isSymlink(parent)) {
      return redirect(path, join(readLink(parent), basename(normPath)), 'symlinked directory');
    }

    const realPath = join(layout.realPrefix, relative(prefix, normPath));
    if (isFile(normPath) && isFile(realPath) && sameContents(normPath, realPath)) {
      return redirect(path, realPath, 'copied file');
    }

    for (const entry of SHADOWED_ENTRIES) {
      if (normPath === join(virtualLib, ...entry)) {
        return redirect(path, join(realLib, ...entry), 'environment file');
      }
    }

    return path;
  };
}
