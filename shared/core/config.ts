export const DEFAULT_PUBLISH_RELAYS = [
  'wss://relay.damus.io',
  'wss://nos.lol',
  'wss://relay.nostr.band',
] as const;

export const DEFAULT_READ_RELAYS = [
  'wss://relay.damus.io',
  'wss://nos.lol',
  'wss://purplepag.es',
] as const;

export const DEFAULT_RELAY_TIMEOUT_MS = 5_000;
export const DEFAULT_CLIENT_TAG = 'roundrelay';

const ENV_DATA_DIR_KEYS = ['ROUNDRELAY_DATA_DIR'] as const;
const ENV_PUBLISH_KEYS = ['ROUNDRELAY_PUBLISH_RELAYS'] as const;
const ENV_READ_KEYS = ['ROUNDRELAY_READ_RELAYS'] as const;
const ENV_INBOX_FALLBACK_KEYS = ['ROUNDRELAY_INBOX_FALLBACK_RELAYS'] as const;
const ENV_TIMEOUT_KEYS = ['ROUNDRELAY_RELAY_TIMEOUT_MS'] as const;
const ENV_CLIENT_TAG_KEYS = ['ROUNDRELAY_CLIENT_TAG'] as const;
const ENV_READONLY_KEYS = ['ROUNDRELAY_READONLY'] as const;

export type RelayConfig = {
  publishRelays: string[];
  readRelays: string[];
  /** Used for DM delivery when a recipient has no inbox relay list. */
  inboxFallbackRelays: string[];
  timeoutMs: number;
};

export type AppConfig = {
  dataDir: string | null;
  relays: RelayConfig;
  clientTag: string;
  readOnly: boolean;
};

export type Env = Record<string, string | undefined>;

function readEnv(env: Env, key: string): string | undefined {
  return env[key];
}

export function firstTruthy(env: Env, keys: readonly string[]): string | undefined {
  for (const key of keys) {
    const value = readEnv(env, key);
    if (typeof value === 'string' && value.trim()) {
      return value.trim();
    }
  }
  return undefined;
}

export function normalizeBoolean(value: unknown): boolean {
  if (value === true) return true;
  if (value === false) return false;
  if (typeof value === 'number') {
    return Number.isFinite(value) && value !== 0;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (!normalized) return false;
    return ['1', 'true', 'yes', 'on', 'enabled'].includes(normalized);
  }
  return false;
}

export function normalizeRelayUrl(value: string): string | null {
  const trimmed = value.trim();
  if (!/^wss?:\/\/[^\s/]+/i.test(trimmed)) {
    return null;
  }
  return trimmed.replace(/\/+$/, '');
}

export function parseRelayList(raw: string | undefined): string[] | null {
  if (!raw) {
    return null;
  }
  const relays: string[] = [];
  for (const part of raw.split(',')) {
    const url = normalizeRelayUrl(part);
    if (url && !relays.includes(url)) {
      relays.push(url);
    }
  }
  return relays.length ? relays : null;
}

function parsePositiveInt(raw: string | undefined, fallback: number): number {
  if (!raw) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0) {
    return fallback;
  }
  return Math.floor(value);
}

export function loadConfig(overrides: Partial<AppConfig> = {}, env: Env = process.env): AppConfig {
  const relays: RelayConfig = {
    publishRelays: parseRelayList(firstTruthy(env, ENV_PUBLISH_KEYS)) ?? [...DEFAULT_PUBLISH_RELAYS],
    readRelays: parseRelayList(firstTruthy(env, ENV_READ_KEYS)) ?? [...DEFAULT_READ_RELAYS],
    inboxFallbackRelays:
      parseRelayList(firstTruthy(env, ENV_INBOX_FALLBACK_KEYS)) ?? [...DEFAULT_PUBLISH_RELAYS],
    timeoutMs: parsePositiveInt(firstTruthy(env, ENV_TIMEOUT_KEYS), DEFAULT_RELAY_TIMEOUT_MS),
  };
  return {
    dataDir: overrides.dataDir !== undefined ? overrides.dataDir : firstTruthy(env, ENV_DATA_DIR_KEYS) ?? null,
    relays: { ...relays, ...(overrides.relays ?? {}) },
    clientTag: overrides.clientTag ?? firstTruthy(env, ENV_CLIENT_TAG_KEYS) ?? DEFAULT_CLIENT_TAG,
    readOnly: overrides.readOnly ?? normalizeBoolean(readEnv(env, ENV_READONLY_KEYS[0])),
  };
}

/** Relays to query for a read, with hint relays first and duplicates removed. */
export function mergeRelays(...lists: ReadonlyArray<readonly string[] | null | undefined>): string[] {
  const merged: string[] = [];
  for (const list of lists) {
    for (const relay of list ?? []) {
      const url = normalizeRelayUrl(relay);
      if (url && !merged.includes(url)) {
        merged.push(url);
      }
    }
  }
  return merged;
}
