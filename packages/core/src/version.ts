/**
 * Version constants, read from the @depweave/core package.json at load time.
 */
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const packageDir = join(dirname(fileURLToPath(import.meta.url)), '..');

function readPackageVersion(): string {
  const pkg: unknown = JSON.parse(readFileSync(join(packageDir, 'package.json'), 'utf-8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  throw new Error(`package.json in ${packageDir} has no version`);
}

/** Full version string (e.g. "0.1.0-beta") */
export const DEPWEAVE_VERSION: string = readPackageVersion();

/**
 * Strip the pre-release tag: "0.1.0-beta" → "0.1.0".
 */
export function getSchemaVersion(version: string): string {
  return version.split('-')[0];
}
