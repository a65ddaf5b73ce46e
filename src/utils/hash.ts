import { createHash } from 'node:crypto';

type HashAlgorithm = 'sha1' | 'sha256' | 'sha512';

// Key order and undefined members must not change the checksum of a request description.
function canonicalize(value: unknown): string {
  if (value === null || typeof value !== 'object') {
    return JSON.stringify(value) ?? 'null';
  }

  if (Array.isArray(value)) {
    return `[${value.map((item) => canonicalize(item)).join(',')}]`;
  }

  const serialized = Object.entries(value)
    .filter(([, val]) => val !== undefined)
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([key, val]) => `${JSON.stringify(key)}:${canonicalize(val)}`)
    .join(',');
  return `{${serialized}}`;
}

export function checksumFrom(value: unknown, algorithm: HashAlgorithm = 'sha256'): string {
  return createHash(algorithm).update(canonicalize(value)).digest('hex');
}
