import { createReadStream } from 'fs';
import { createSHA256 } from 'hash-wasm';
import { encodeSri } from './sri.js';

/**
 * Hash of the raw archive bytes. This is the canonical hash written to the
 * lockfile and checked by the build before a cached artifact is trusted.
 */
export async function computeArchiveHash(bytes: Uint8Array): Promise<string> {
  const hasher = await createSHA256();
  hasher.init();
  hasher.update(bytes);
  return encodeSri('sha256', hasher.digest('binary'));
}

/**
 * Same digest as computeArchiveHash, streamed from a file on disk.
 */
export async function computeArchiveFileHash(filePath: string): Promise<string> {
  const hasher = await createSHA256();
  hasher.init();
  for await (const chunk of createReadStream(filePath)) {
    if (Buffer.isBuffer(chunk)) {
      hasher.update(chunk);
    }
  }
  return encodeSri('sha256', hasher.digest('binary'));
}
