import { ValidationError } from '../../utils/errors.js';

/**
 * Subresource-integrity style hash strings: `<algorithm>-<base64 digest>`.
 */

export type SriAlgorithm = 'sha256' | 'sha512';

const DIGEST_LENGTHS: Record<SriAlgorithm, number> = {
  sha256: 32,
  sha512: 64
};

export interface ParsedSri {
  algorithm: string;
  digest: Uint8Array;
}

export function encodeSri(algorithm: SriAlgorithm, digest: Uint8Array): string {
  return `${algorithm}-${Buffer.from(digest).toString('base64')}`;
}

/**
 * Split an SRI string into algorithm and digest bytes. The digest may be
 * base64 or, for hashes copied from older tooling, hex.
 */
export function parseSri(sri: string): ParsedSri {
  const dash = sri.indexOf('-');
  if (dash <= 0 || dash === sri.length - 1) {
    throw new ValidationError(`invalid SRI format: ${sri}`);
  }

  const algorithm = sri.slice(0, dash);
  const encoded = sri.slice(dash + 1);

  if (/^[0-9a-fA-F]+$/.test(encoded) && encoded.length % 2 === 0 && isExpectedLength(algorithm, encoded.length / 2)) {
    return { algorithm, digest: new Uint8Array(Buffer.from(encoded, 'hex')) };
  }
  if (/^[A-Za-z0-9+/]+={0,2}$/.test(encoded) && encoded.length % 4 === 0) {
    return { algorithm, digest: new Uint8Array(Buffer.from(encoded, 'base64')) };
  }

  throw new ValidationError(`cannot decode SRI digest: ${sri}`);
}

function isSriAlgorithm(algorithm: string): algorithm is SriAlgorithm {
  return algorithm === 'sha256' || algorithm === 'sha512';
}

function isExpectedLength(algorithm: string, byteLength: number): boolean {
  return isSriAlgorithm(algorithm) && DIGEST_LENGTHS[algorithm] === byteLength;
}

/**
 * Throw unless `sri` is a well-formed sha256 or sha512 hash.
 */
export function validateSri(sri: string): void {
  const { algorithm, digest } = parseSri(sri);
  if (!isSriAlgorithm(algorithm)) {
    throw new ValidationError(`unsupported hash algorithm: ${algorithm}`);
  }
  if (digest.length !== DIGEST_LENGTHS[algorithm]) {
    throw new ValidationError(`${algorithm} hash must be ${DIGEST_LENGTHS[algorithm]} bytes, got ${digest.length}`);
  }
}

export function isValidSri(sri: string): boolean {
  try {
    validateSri(sri);
    return true;
  } catch {
    return false;
  }
}
