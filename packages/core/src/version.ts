/**
 * yamlet version constants.
 *
 * Reads the version from the @yamlet/core package.json at module load time.
 * This is the single source of truth for runtime version checks.
 */
import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));
const pkg: unknown = JSON.parse(readFileSync(join(__dirname, '..', 'package.json'), 'utf-8'));

function readVersion(manifest: unknown): string {
  if (typeof manifest === 'object' && manifest !== null && 'version' in manifest && typeof manifest.version === 'string') {
    return manifest.version;
  }
  throw new Error('@yamlet/core package.json has no version');
}

/** Full version string (e.g., "0.3.1-beta") */
export const YAMLET_VERSION: string = readVersion(pkg);

/**
 * Config schema version: major.minor, pre-release tag stripped.
 *
 * "0.3.1-beta" → "0.3"
 * "1.2.0" → "1.2"
 */
export function getSchemaVersion(version: string): string {
  const base = version.split('-')[0];
  return base.split('.').slice(0, 2).join('.');
}
