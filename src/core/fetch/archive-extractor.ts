import { promises as fs, createWriteStream } from 'fs';
import { dirname, resolve, sep } from 'path';
import { pipeline } from 'stream/promises';
import { Readable } from 'stream';
import yauzl from 'yauzl';
import { ExtractionError, errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const EXECUTABLE_MODE = 0o755;
const REGULAR_MODE = 0o644;

export interface ExtractSummary {
  files: number;
  directories: number;
}

/**
 * Map an archive entry name to its path inside the target directory.
 * Module archives put everything under `path@version/`; other layouts lose
 * their first segment instead. Returns '' for the root entry itself.
 */
export function stripArchiveRoot(entryName: string, rootPrefix: string): string {
  if (entryName.startsWith(rootPrefix)) {
    return entryName.slice(rootPrefix.length);
  }
  const slash = entryName.indexOf('/');
  return slash === -1 ? entryName : entryName.slice(slash + 1);
}

function entryMode(entry: yauzl.Entry): number {
  const unixMode = (entry.externalFileAttributes >>> 16) & 0o777;
  return (unixMode & 0o111) !== 0 ? EXECUTABLE_MODE : REGULAR_MODE;
}

function openZip(zipPath: string): Promise<yauzl.ZipFile> {
  return new Promise((resolvePromise, reject) => {
    yauzl.open(zipPath, { lazyEntries: true, autoClose: true }, (error, zipfile) => {
      if (error || !zipfile) {
        reject(new ExtractionError(`cannot open archive ${zipPath}: ${errorMessage(error)}`, { zipPath }, { cause: error }));
        return;
      }
      resolvePromise(zipfile);
    });
  });
}

function openEntryStream(zipfile: yauzl.ZipFile, entry: yauzl.Entry): Promise<Readable> {
  return new Promise((resolvePromise, reject) => {
    zipfile.openReadStream(entry, (error, stream) => {
      if (error || !stream) {
        reject(error ?? new Error(`no stream for ${entry.fileName}`));
        return;
      }
      resolvePromise(stream);
    });
  });
}

async function writeEntry(zipfile: yauzl.ZipFile, entry: yauzl.Entry, targetPath: string): Promise<void> {
  await fs.mkdir(dirname(targetPath), { recursive: true });
  const mode = entryMode(entry);
  const stream = await openEntryStream(zipfile, entry);
  await pipeline(stream, createWriteStream(targetPath, { mode }));
  // umask may have masked the requested mode
  await fs.chmod(targetPath, mode);
}

/**
 * Extract a ZIP archive into `targetDir`, stripping `rootPrefix` (or the first
 * path segment) from every entry. Entries resolving outside the target are
 * rejected.
 */
export async function extractZipArchive(zipPath: string, targetDir: string, rootPrefix: string): Promise<ExtractSummary> {
  const zipfile = await openZip(zipPath);
  const root = resolve(targetDir);
  const summary: ExtractSummary = { files: 0, directories: 0 };

  await fs.mkdir(root, { recursive: true });

  const handleEntry = async (entry: yauzl.Entry): Promise<void> => {
    const name = stripArchiveRoot(entry.fileName, rootPrefix);
    if (name === '') {
      return;
    }

    const targetPath = resolve(root, name);
    if (targetPath !== root && !targetPath.startsWith(root + sep)) {
      throw new ExtractionError(`entry escapes target directory: ${entry.fileName}`, { zipPath, entry: entry.fileName });
    }

    if (name.endsWith('/')) {
      await fs.mkdir(targetPath, { recursive: true });
      summary.directories++;
      return;
    }

    await writeEntry(zipfile, entry, targetPath);
    summary.files++;
  };

  await new Promise<void>((resolvePromise, reject) => {
    let failed = false;
    const fail = (error: unknown): void => {
      if (failed) return;
      failed = true;
      zipfile.close();
      reject(error instanceof ExtractionError
        ? error
        : new ExtractionError(`${zipPath}: ${errorMessage(error)}`, { zipPath }, { cause: error }));
    };

    zipfile.on('entry', (entry: yauzl.Entry) => {
      handleEntry(entry).then(() => zipfile.readEntry(), fail);
    });
    zipfile.on('end', () => {
      if (!failed) resolvePromise();
    });
    zipfile.on('error', fail);
    zipfile.readEntry();
  });

  logger.debug(`Extracted ${summary.files} file(s) from ${zipPath} into ${root}`);
  return summary;
}
