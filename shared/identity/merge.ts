import type { Event } from 'nostr-tools';

import { isRecord } from '../kernel/canonical';
import { PROFILE_FIELDS, type CachedListRow, type CachedProfileRow, type ProfileFields } from '../storage/schema';

const CONTENT_KEYS: Record<keyof ProfileFields, readonly string[]> = {
  name: ['name'],
  displayName: ['display_name', 'displayName'],
  picture: ['picture'],
  about: ['about'],
  nip05: ['nip05'],
  lud16: ['lud16'],
  banner: ['banner'],
  website: ['website'],
};

/** Profile fields from kind-0 content; blank or non-string values are left out. */
export function parseProfileContent(content: string): ProfileFields {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return {};
  }
  if (!isRecord(parsed)) {
    return {};
  }
  const fields: ProfileFields = {};
  for (const field of PROFILE_FIELDS) {
    for (const key of CONTENT_KEYS[field]) {
      const value = parsed[key];
      if (typeof value === 'string' && value.trim()) {
        fields[field] = value.trim();
        break;
      }
    }
  }
  return fields;
}

/**
 * Field-by-field merge. A field the incoming profile lacks keeps its known
 * value; an older incoming event never overrides a newer cached one.
 */
export function mergeProfile(
  existing: CachedProfileRow | null,
  incoming: ProfileFields,
  pubkey: string,
  eventCreatedAt: number,
  fetchedAt: number,
): CachedProfileRow {
  if (existing && existing.eventCreatedAt > eventCreatedAt) {
    return { ...existing, fetchedAt };
  }
  const merged: CachedProfileRow = { ...(existing ?? {}), pubkey, eventCreatedAt, fetchedAt };
  for (const field of PROFILE_FIELDS) {
    const value = incoming[field];
    if (value) {
      merged[field] = value;
    }
  }
  return merged;
}

/** Same members; with `ordered`, also the same order. */
export function sameItems(a: readonly string[], b: readonly string[], ordered = false): boolean {
  if (a.length !== b.length) return false;
  if (ordered) {
    return a.every((item, idx) => b[idx] === item);
  }
  const set = new Set(a);
  return b.every((item) => set.has(item));
}

export type ListMergeOutcome = 'kept' | 'replaced' | 'refreshed';

export type ListMergeOptions = {
  /** Order is part of the list (contacts, relay preferences). */
  ordered?: boolean;
};

/**
 * Decides what a fetched list does to the cached one. Empty fetches never
 * replace a non-empty cache; a non-empty, differing, not-older list does.
 */
export function mergeList(
  existing: CachedListRow | null,
  fetched: { items: string[]; eventCreatedAt: number } | null,
  pubkey: string,
  fetchedAt: number,
  options: ListMergeOptions = {},
): { row: CachedListRow | null; outcome: ListMergeOutcome } {
  if (!fetched || !fetched.items.length) {
    return { row: existing, outcome: 'kept' };
  }
  if (existing && existing.eventCreatedAt > fetched.eventCreatedAt) {
    return { row: existing, outcome: 'kept' };
  }
  if (existing && sameItems(existing.items, fetched.items, options.ordered)) {
    return { row: { ...existing, eventCreatedAt: fetched.eventCreatedAt, fetchedAt }, outcome: 'refreshed' };
  }
  return {
    row: { pubkey, items: [...fetched.items], eventCreatedAt: fetched.eventCreatedAt, fetchedAt },
    outcome: 'replaced',
  };
}

/** Distinct values of the named tags, in order, each passed through `normalize`. */
export function uniqueTagValues(
  event: Pick<Event, 'tags'>,
  names: readonly string[],
  normalize: (value: string) => string | null = (value) => value,
): string[] {
  const out: string[] = [];
  for (const tag of event.tags) {
    const raw = tag[1];
    if (!names.includes(tag[0]) || typeof raw !== 'string' || !raw) continue;
    const value = normalize(raw);
    if (value && !out.includes(value)) out.push(value);
  }
  return out;
}
