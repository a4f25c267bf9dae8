/**
 * Private module patterns decide whether a module bypasses the shared proxy
 * and is fetched straight from its source with credentials.
 */

/**
 * Match a single pattern against a module path.
 *
 *   "host/org/*"  matches "host/org" and anything under "host/org/"
 *   "host/org*"   matches any path starting with "host/org"
 *   "host/org"    matches any path starting with "host/org"
 */
export function matchesPrivatePattern(pattern: string, modulePath: string): boolean {
  if (pattern.endsWith('/*')) {
    const prefix = pattern.slice(0, -2);
    return modulePath === prefix || modulePath.startsWith(`${prefix}/`);
  }
  if (pattern.endsWith('*')) {
    return modulePath.startsWith(pattern.slice(0, -1));
  }
  return modulePath.startsWith(pattern);
}

export function splitPatternList(patternList: string): string[] {
  return patternList
    .split(',')
    .map(pattern => pattern.trim())
    .filter(pattern => pattern.length > 0);
}

/**
 * True when any pattern of the comma-separated list matches.
 */
export function isPrivateModule(patternList: string, modulePath: string): boolean {
  return splitPatternList(patternList).some(pattern => matchesPrivatePattern(pattern, modulePath));
}
