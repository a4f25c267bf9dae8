import { Command } from 'commander';
import { resolve } from 'path';
import { computeTreeHash } from '../core/hash/tree-hash.js';
import { computeArchiveFileHash } from '../core/hash/archive-hash.js';
import { validateSri } from '../core/hash/sri.js';
import { isDirectory } from '../utils/fs.js';
import { withErrorHandling, ValidationError } from '../utils/errors.js';

interface HashCommandOptions {
  archive?: boolean;
  check?: string;
}

export function setupHashCommand(program: Command): void {
  program
    .command('hash')
    .argument('<path>', 'directory to hash, or an archive file with --archive')
    .description('Print the content hash of a directory tree or archive')
    .option('--archive', 'hash the raw bytes of an archive file')
    .option('--check <sri>', 'fail unless the computed hash equals this one')
    .action(
      withErrorHandling(async (target: string, options: HashCommandOptions) => {
        const path = resolve(target);
        if (options.check) {
          validateSri(options.check);
        }

        let hash: string;
        if (options.archive) {
          hash = await computeArchiveFileHash(path);
        } else {
          if (!(await isDirectory(path))) {
            throw new ValidationError(`${target} is not a directory (use --archive for archive files)`);
          }
          hash = await computeTreeHash(path);
        }

        console.log(hash);
        if (options.check && options.check !== hash) {
          throw new ValidationError(`hash mismatch: expected ${options.check}, got ${hash}`);
        }
      })
    );
}
