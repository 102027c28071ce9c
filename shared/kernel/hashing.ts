import { createHash } from 'node:crypto';

import { canonicalize, type JsonValue } from './canonical';

export function sha256Hex(input: string): string {
  return createHash('sha256').update(input, 'utf8').digest('hex');
}

export function hashCanonical(value: JsonValue): { canonicalJson: string; hash: string } {
  const canonicalJson = canonicalize(value);
  return { canonicalJson, hash: sha256Hex(canonicalJson) };
}
