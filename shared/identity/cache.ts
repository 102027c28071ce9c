import { and, eq, inArray } from 'drizzle-orm';
import type { Event, Filter } from 'nostr-tools';

import { mergeRelays, normalizeRelayUrl, type RelayConfig } from '../core/config';
import { describeError } from '../core/errors';
import { createLogger } from '../core/log';
import { newestFirst, type RelayGateway } from '../nostr/relay';
import {
  FAVORITES_SET_ID,
  KIND_CONTACTS,
  KIND_FOLLOW_SET,
  KIND_INBOX_RELAYS,
  KIND_PROFILE,
  KIND_RELAY_LIST,
} from '../nostr/roundEvents';
import { isPublicKeyHex } from '../round/aggregate';
import type { Db, LocalDatabase } from '../storage/database';
import {
  cachedLists,
  PROFILE_FIELDS,
  profiles,
  type CachedListKind,
  type CachedListRow,
  type CachedProfileRow,
  type ProfileFields,
  type ProfileRecord,
} from '../storage/schema';
import { mergeList, mergeProfile, parseProfileContent, uniqueTagValues } from './merge';

const log = createLogger('identity/cache');

export const FOLLOW_LIST_TTL_MS = 60 * 60 * 1000;
export const RELAY_LIST_TTL_MS = 24 * 60 * 60 * 1000;

export type Profile = ProfileFields & { pubkey: string };

export type ProfilePaint = (profiles: Map<string, Profile>) => void;

type ListSource = {
  list: CachedListKind;
  ttlMs: number;
  ordered: boolean;
  filter: (pubkey: string) => Filter;
  extract: (event: Event) => string[];
};

const hexKey = (value: string): string | null => (isPublicKeyHex(value) ? value : null);

const LISTS: Record<CachedListKind, ListSource> = {
  follows: {
    list: 'follows',
    ttlMs: FOLLOW_LIST_TTL_MS,
    ordered: true,
    filter: (pubkey) => ({ kinds: [KIND_CONTACTS], authors: [pubkey], limit: 1 }),
    extract: (event) => uniqueTagValues(event, ['p'], hexKey),
  },
  relays: {
    list: 'relays',
    ttlMs: RELAY_LIST_TTL_MS,
    ordered: true,
    filter: (pubkey) => ({ kinds: [KIND_RELAY_LIST], authors: [pubkey], limit: 1 }),
    extract: (event) => uniqueTagValues(event, ['r'], normalizeRelayUrl),
  },
  inbox: {
    list: 'inbox',
    ttlMs: RELAY_LIST_TTL_MS,
    ordered: true,
    filter: (pubkey) => ({ kinds: [KIND_INBOX_RELAYS], authors: [pubkey], limit: 1 }),
    extract: (event) => uniqueTagValues(event, ['relay'], normalizeRelayUrl),
  },
  favorites: {
    list: 'favorites',
    ttlMs: FOLLOW_LIST_TTL_MS,
    ordered: false,
    filter: (pubkey) => ({ kinds: [KIND_FOLLOW_SET], authors: [pubkey], '#d': [FAVORITES_SET_ID], limit: 1 }),
    extract: (event) => uniqueTagValues(event, ['p'], hexKey),
  },
};

export type ListOptions = { force?: boolean };

export type IdentityCacheOptions = {
  db: LocalDatabase;
  gateway: RelayGateway;
  relays: RelayConfig;
  now?: () => number;
};

function toProfile(row: CachedProfileRow): Profile {
  const { eventCreatedAt: _created, fetchedAt: _fetched, ...profile } = row;
  return profile;
}

function fromRecord(record: ProfileRecord): CachedProfileRow {
  const row: CachedProfileRow = { pubkey: record.pubkey, eventCreatedAt: record.eventCreatedAt, fetchedAt: record.fetchedAt };
  for (const field of PROFILE_FIELDS) {
    const value = record[field];
    if (value !== null) {
      row[field] = value;
    }
  }
  return row;
}

function toRecord(row: CachedProfileRow): ProfileRecord {
  return {
    pubkey: row.pubkey,
    name: row.name ?? null,
    displayName: row.displayName ?? null,
    picture: row.picture ?? null,
    about: row.about ?? null,
    nip05: row.nip05 ?? null,
    lud16: row.lud16 ?? null,
    banner: row.banner ?? null,
    website: row.website ?? null,
    eventCreatedAt: row.eventCreatedAt,
    fetchedAt: row.fetchedAt,
  };
}

function readProfiles(db: Db, keys: readonly string[]): CachedProfileRow[] {
  return db.select().from(profiles).where(inArray(profiles.pubkey, [...keys])).all().map(fromRecord);
}

function readList(db: Db, list: CachedListKind, pubkey: string): CachedListRow | null {
  const row = db
    .select()
    .from(cachedLists)
    .where(and(eq(cachedLists.list, list), eq(cachedLists.pubkey, pubkey)))
    .get();
  return row ? { pubkey: row.pubkey, items: row.items, eventCreatedAt: row.eventCreatedAt, fetchedAt: row.fetchedAt } : null;
}

/**
 * Profiles and social lists resolved memory first, then from the local
 * database, then from relays. Relay results are merged into what is known;
 * they never blank a field or empty a list.
 */
export class IdentityCache {
  private readonly db: LocalDatabase;
  private readonly gateway: RelayGateway;
  private readonly relays: RelayConfig;
  private readonly now: () => number;
  private readonly profiles = new Map<string, CachedProfileRow>();
  private readonly lists = new Map<string, CachedListRow>();

  constructor(options: IdentityCacheOptions) {
    this.db = options.db;
    this.gateway = options.gateway;
    this.relays = options.relays;
    this.now = options.now ?? (() => Date.now());
  }

  private readTargets(): string[] {
    return mergeRelays(this.relays.readRelays, this.relays.publishRelays);
  }

  /**
   * Resolves display metadata for `keys`. `onPaint` fires once with what the
   * local tiers already know, before any relay is asked.
   */
  async resolveProfiles(keys: readonly string[], onPaint?: ProfilePaint): Promise<Map<string, Profile>> {
    const wanted = [...new Set(keys.filter(isPublicKeyHex))];
    const result = new Map<string, Profile>();
    const misses: string[] = [];
    for (const key of wanted) {
      const hit = this.profiles.get(key);
      if (hit) {
        result.set(key, toProfile(hit));
      } else {
        misses.push(key);
      }
    }
    if (!misses.length) {
      return result;
    }

    const durable = new Map((await this.db.read((db) => readProfiles(db, misses))).map((row) => [row.pubkey, row]));
    for (const row of durable.values()) {
      result.set(row.pubkey, toProfile(row));
    }
    if (onPaint && result.size) {
      try {
        onPaint(new Map(result));
      } catch (error) {
        log.warn('profile paint listener failed', { error: describeError(error) });
      }
    }

    let events: Event[];
    try {
      events = await this.gateway.query(this.readTargets(), { kinds: [KIND_PROFILE], authors: misses });
    } catch (error) {
      log.warn('profile fetch failed', { count: misses.length, error: describeError(error) });
      return result;
    }
    const newest = new Map<string, Event>();
    for (const event of newestFirst(events)) {
      if (misses.includes(event.pubkey) && !newest.has(event.pubkey)) {
        newest.set(event.pubkey, event);
      }
    }
    if (!newest.size) {
      return result;
    }
    const fetchedAt = this.now();
    const merged = [...newest].map(([pubkey, event]) =>
      mergeProfile(durable.get(pubkey) ?? null, parseProfileContent(event.content), pubkey, event.created_at, fetchedAt),
    );
    await this.db.write((db) => {
      for (const row of merged) {
        const record = toRecord(row);
        db.insert(profiles).values(record).onConflictDoUpdate({ target: profiles.pubkey, set: record }).run();
      }
    });
    for (const row of merged) {
      this.profiles.set(row.pubkey, row);
      result.set(row.pubkey, toProfile(row));
    }
    return result;
  }

  /** Cached profile without any network work. */
  async cachedProfile(pubkey: string): Promise<Profile | null> {
    const hit = this.profiles.get(pubkey);
    if (hit) return toProfile(hit);
    const [row] = await this.db.read((db) => readProfiles(db, [pubkey]));
    return row ? toProfile(row) : null;
  }

  followList(pubkey: string, options: ListOptions = {}): Promise<string[]> {
    return this.resolveList(LISTS.follows, pubkey, options);
  }

  relayList(pubkey: string, options: ListOptions = {}): Promise<string[]> {
    return this.resolveList(LISTS.relays, pubkey, options);
  }

  inboxRelays(pubkey: string, options: ListOptions = {}): Promise<string[]> {
    return this.resolveList(LISTS.inbox, pubkey, options);
  }

  favorites(pubkey: string, options: ListOptions = {}): Promise<string[]> {
    return this.resolveList(LISTS.favorites, pubkey, options);
  }

  private async resolveList(source: ListSource, pubkey: string, options: ListOptions): Promise<string[]> {
    const memoKey = `${source.list}:${pubkey}`;
    let cached = this.lists.get(memoKey) ?? null;
    if (!cached) {
      cached = await this.db.read((db) => readList(db, source.list, pubkey));
      if (cached) {
        this.lists.set(memoKey, cached);
      }
    }
    if (cached && !options.force && this.now() - cached.fetchedAt < source.ttlMs) {
      return [...cached.items];
    }

    let fetched: { items: string[]; eventCreatedAt: number } | null = null;
    try {
      const [latest] = newestFirst(await this.gateway.query(this.readTargets(), source.filter(pubkey)));
      if (latest && latest.pubkey === pubkey) {
        fetched = { items: source.extract(latest), eventCreatedAt: latest.created_at };
      }
    } catch (error) {
      log.warn('list fetch failed', { list: source.list, pubkey, error: describeError(error) });
    }

    const { row, outcome } = mergeList(cached, fetched, pubkey, this.now(), { ordered: source.ordered });
    if (!row) {
      return [];
    }
    if (outcome !== 'kept') {
      const record = { list: source.list, ...row };
      await this.db.write((db) =>
        db
          .insert(cachedLists)
          .values(record)
          .onConflictDoUpdate({ target: [cachedLists.list, cachedLists.pubkey], set: record })
          .run(),
      );
      this.lists.set(memoKey, row);
    }
    return [...row.items];
  }
}
