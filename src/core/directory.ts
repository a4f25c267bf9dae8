import * as os from 'os';
import * as path from 'path';
import { ModpinDirectories } from '../types/index.js';
import { DIR_PATTERNS, MODPIN_DIRS } from '../constants/index.js';

/**
 * Get modpin directories using the dotfile convention: ~/.modpin on every
 * platform, with module archives extracted under ~/.modpin/cache/modules.
 */
export function getModpinDirectories(homeDir: string = os.homedir()): ModpinDirectories {
  const modpinDir = path.join(homeDir, DIR_PATTERNS.MODPIN);

  return {
    config: modpinDir,
    cache: path.join(modpinDir, MODPIN_DIRS.CACHE, MODPIN_DIRS.MODULES)
  };
}
