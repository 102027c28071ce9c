export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === 'object' && !Array.isArray(value);
}

export class CanonicalJsonError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CanonicalJsonError';
  }
}

function serializeNumber(value: number): string {
  if (Number.isNaN(value)) {
    throw new CanonicalJsonError('NaN is not allowed in canonical JSON');
  }
  if (!Number.isFinite(value)) {
    throw new CanonicalJsonError('Infinity is not allowed in canonical JSON');
  }
  return JSON.stringify(value);
}

function serialize(value: JsonValue): string {
  if (value === null) {
    return 'null';
  }
  if (typeof value === 'string') {
    return JSON.stringify(value);
  }
  if (typeof value === 'number') {
    return serializeNumber(value);
  }
  if (typeof value === 'boolean') {
    return value ? 'true' : 'false';
  }
  if (Array.isArray(value)) {
    return `[${value.map(serialize).join(',')}]`;
  }
  // Default string ordering compares UTF-16 code units.
  const keys = Object.keys(value).sort();
  const parts = keys.map((key) => `${JSON.stringify(key)}:${serialize(value[key])}`);
  return `{${parts.join(',')}}`;
}

/** Compact JSON with lexicographically sorted object keys. */
export function canonicalize(value: JsonValue): string {
  return serialize(value);
}
