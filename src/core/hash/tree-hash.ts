import { promises as fs } from 'fs';
import { join } from 'path';
import { createSHA256, IHasher } from 'hash-wasm';
import { encodeSri } from './sri.js';
import { FileSystemError } from '../../utils/errors.js';

/**
 * Deterministic digest of a directory tree in the Nix archive (NAR)
 * serialization, so the result matches what a content-addressed store
 * computes for the same tree.
 *
 * Layout, every string written as an 8-byte little-endian length, the bytes,
 * then zero padding to the next multiple of 8:
 *
 *   "nix-archive-1" node
 *   node := "(" "type" ( "regular" ["executable" ""] "contents" <bytes>
 *                      | "symlink" "target" <target>
 *                      | "directory" { "entry" "(" "name" <name> "node" node ")" } ) ")"
 *
 * Directory entries are sorted byte-wise on their raw names.
 */

const NAR_MAGIC = 'nix-archive-1';
const PADDING = new Uint8Array(8);

export interface NarSink {
  write(chunk: Uint8Array): void;
}

class NarWriter {
  constructor(private readonly sink: NarSink) {}

  str(value: string): void {
    this.bytes(Buffer.from(value, 'utf8'));
  }

  bytes(data: Uint8Array): void {
    const length = Buffer.alloc(8);
    length.writeBigUInt64LE(BigInt(data.length));
    this.sink.write(length);
    this.sink.write(data);
    const padding = (8 - (data.length % 8)) % 8;
    if (padding > 0) {
      this.sink.write(PADDING.subarray(0, padding));
    }
  }
}

/**
 * Write the NAR serialization of `rootPath` to `sink`.
 */
export async function writeNar(rootPath: string, sink: NarSink): Promise<void> {
  const writer = new NarWriter(sink);
  writer.str(NAR_MAGIC);
  await writeNode(writer, rootPath);
}

async function writeNode(writer: NarWriter, path: string): Promise<void> {
  const stats = await fs.lstat(path);

  writer.str('(');
  writer.str('type');

  if (stats.isSymbolicLink()) {
    writer.str('symlink');
    writer.str('target');
    writer.str(await fs.readlink(path));
  } else if (stats.isFile()) {
    writer.str('regular');
    if ((stats.mode & 0o111) !== 0) {
      writer.str('executable');
      writer.str('');
    }
    writer.str('contents');
    writer.bytes(await fs.readFile(path));
  } else if (stats.isDirectory()) {
    writer.str('directory');
    const names = await fs.readdir(path, { encoding: 'buffer' });
    names.sort(Buffer.compare);
    for (const name of names) {
      writer.str('entry');
      writer.str('(');
      writer.str('name');
      writer.bytes(name);
      writer.str('node');
      await writeNode(writer, join(path, name.toString('utf8')));
      writer.str(')');
    }
  } else {
    throw new FileSystemError(`unsupported file type in tree: ${path}`, { path, mode: stats.mode });
  }

  writer.str(')');
}

class HasherSink implements NarSink {
  constructor(private readonly hasher: IHasher) {}

  write(chunk: Uint8Array): void {
    this.hasher.update(chunk);
  }
}

/**
 * SHA-256 of the NAR serialization of `dir`, in SRI form.
 */
export async function computeTreeHash(dir: string): Promise<string> {
  const hasher = await createSHA256();
  hasher.init();
  await writeNar(dir, new HasherSink(hasher));
  return encodeSri('sha256', hasher.digest('binary'));
}
