import { readFileSync } from 'fs';

let cachedVersion: string | null = null;

/**
 * Version from the package.json two levels above this module (src/ or dist/).
 */
export function getVersion(): string {
  if (cachedVersion) {
    return cachedVersion;
  }
  try {
    const manifest: unknown = JSON.parse(readFileSync(new URL('../../package.json', import.meta.url), 'utf8'));
    const version = typeof manifest === 'object' && manifest !== null && 'version' in manifest
      ? manifest.version
      : undefined;
    cachedVersion = typeof version === 'string' ? version : '0.0.0';
  } catch {
    cachedVersion = '0.0.0';
  }
  return cachedVersion;
}
