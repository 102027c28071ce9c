import { matchFilter, type Event, type Filter } from 'nostr-tools';
import { verifyEvent } from 'nostr-tools/pure';

import { RelayPublishError, throwIfAborted } from '@shared/core/errors';
import {
  newestFirst,
  summarizePublish,
  type PublishOptions,
  type PublishResult,
  type QueryOptions,
  type RelayGateway,
} from '@shared/nostr/relay';

function isReplaceable(kind: number): boolean {
  return kind === 0 || kind === 3 || (kind >= 10000 && kind < 20000);
}

function isAddressable(kind: number): boolean {
  return kind >= 30000 && kind < 40000;
}

function dTag(event: Event): string {
  return event.tags.find((tag) => tag[0] === 'd')?.[1] ?? '';
}

function sameSlot(a: Event, b: Event): boolean {
  if (a.kind !== b.kind || a.pubkey !== b.pubkey) return false;
  if (isReplaceable(a.kind)) return true;
  if (isAddressable(a.kind)) return dTag(a) === dTag(b);
  return false;
}

/**
 * In-process stand-in for a set of relays. Events are kept per relay URL;
 * replaceable and addressable kinds keep only the newest version.
 */
export class MemoryRelayNetwork implements RelayGateway {
  readonly relays = new Map<string, Event[]>();
  readonly published: Event[] = [];
  readonly queries: Array<{ relays: string[]; filter: Filter }> = [];
  readonly down = new Set<string>();
  closed = false;

  async publish(relays: readonly string[], event: Event, options: PublishOptions = {}): Promise<PublishResult> {
    if (!relays.length) {
      throw new RelayPublishError('no relays', []);
    }
    throwIfAborted(options.signal, 'publish');
    const outcomes = relays.map((relay): PromiseSettledResult<string> => {
      if (this.down.has(relay)) {
        return { status: 'rejected', reason: new Error(`${relay} unreachable`) };
      }
      this.store(relay, event);
      return { status: 'fulfilled', value: '' };
    });
    const result = summarizePublish(event.id, relays, outcomes);
    this.published.push(event);
    return result;
  }

  async query(relays: readonly string[], filter: Filter, options: QueryOptions = {}): Promise<Event[]> {
    throwIfAborted(options.signal, 'query');
    this.queries.push({ relays: [...relays], filter });
    const seen = new Map<string, Event>();
    for (const relay of relays) {
      if (this.down.has(relay)) continue;
      for (const event of this.relays.get(relay) ?? []) {
        if (matchFilter(filter, event) && verifyEvent(event)) {
          seen.set(event.id, event);
        }
      }
    }
    const matches = newestFirst([...seen.values()]);
    return filter.limit !== undefined ? matches.slice(0, filter.limit) : matches;
  }

  close(): void {
    this.closed = true;
  }

  /** Seeds an already-signed event directly onto relays. */
  seed(relays: readonly string[], event: Event): void {
    for (const relay of relays) this.store(relay, event);
  }

  publishedOfKind(kind: number): Event[] {
    return this.published.filter((event) => event.kind === kind);
  }

  private store(relay: string, event: Event): void {
    const events = this.relays.get(relay) ?? [];
    if (events.some((existing) => existing.id === event.id)) {
      return;
    }
    const slot = events.findIndex((existing) => sameSlot(existing, event));
    if (slot >= 0) {
      if (events[slot].created_at > event.created_at) return;
      events.splice(slot, 1);
    }
    events.push(event);
    this.relays.set(relay, events);
  }
}
