import type { Event, Filter } from 'nostr-tools';
import { SimplePool, useWebSocketImplementation } from 'nostr-tools/pool';
import { verifyEvent } from 'nostr-tools/pure';
import WebSocket from 'ws';

import { DEFAULT_RELAY_TIMEOUT_MS } from '../core/config';
import { abortable, describeError, RelayPublishError, throwIfAborted, type RelayFailure } from '../core/errors';
import { createLogger } from '../core/log';

useWebSocketImplementation(WebSocket);

const log = createLogger('nostr/relay');

export type PublishResult = {
  eventId: string;
  accepted: string[];
  failures: RelayFailure[];
};

export type PublishOptions = {
  /** Stops waiting for relay acknowledgements once aborted. */
  signal?: AbortSignal;
};

export type QueryOptions = {
  maxWaitMs?: number;
  signal?: AbortSignal;
};

/**
 * The relay network as the rest of the code sees it. `publish` rejects with
 * RelayPublishError when no relay accepted the event; `query` only returns
 * events whose signatures verify.
 */
export interface RelayGateway {
  publish(relays: readonly string[], event: Event, options?: PublishOptions): Promise<PublishResult>;
  query(relays: readonly string[], filter: Filter, options?: QueryOptions): Promise<Event[]>;
  close(): void;
}

export function summarizePublish(eventId: string, relays: readonly string[], outcomes: PromiseSettledResult<unknown>[]): PublishResult {
  const accepted: string[] = [];
  const failures: RelayFailure[] = [];
  outcomes.forEach((outcome, idx) => {
    const relay = relays[idx] ?? `relay-${idx}`;
    if (outcome.status === 'fulfilled') {
      accepted.push(relay);
    } else {
      failures.push({ relay, reason: describeError(outcome.reason) });
    }
  });
  if (!accepted.length) {
    throw new RelayPublishError(`no relay accepted event ${eventId}`, failures);
  }
  return { eventId, accepted, failures };
}

/** Newest event first; equal timestamps fall back to the smaller id. */
export function newestFirst(events: readonly Event[]): Event[] {
  return [...events].sort((a, b) => b.created_at - a.created_at || a.id.localeCompare(b.id));
}

export type PoolRelayGatewayOptions = {
  timeoutMs?: number;
  pool?: SimplePool;
};

export class PoolRelayGateway implements RelayGateway {
  private readonly pool: SimplePool;
  private readonly timeoutMs: number;
  private readonly touched = new Set<string>();

  constructor(options: PoolRelayGatewayOptions = {}) {
    this.pool = options.pool ?? new SimplePool();
    this.timeoutMs = options.timeoutMs ?? DEFAULT_RELAY_TIMEOUT_MS;
  }

  async publish(relays: readonly string[], event: Event, options: PublishOptions = {}): Promise<PublishResult> {
    if (!relays.length) {
      throw new RelayPublishError(`no relays to publish event ${event.id}`, []);
    }
    throwIfAborted(options.signal, `publish of ${event.id}`);
    const targets = [...relays];
    targets.forEach((relay) => this.touched.add(relay));
    const outcomes = await abortable(
      Promise.allSettled(this.pool.publish(targets, event)),
      options.signal,
      `publish of ${event.id}`,
    );
    const result = summarizePublish(event.id, targets, outcomes);
    if (result.failures.length) {
      log.warn('some relays rejected event', { eventId: event.id, failures: result.failures });
    }
    return result;
  }

  async query(relays: readonly string[], filter: Filter, options: QueryOptions = {}): Promise<Event[]> {
    if (!relays.length) {
      return [];
    }
    const targets = [...relays];
    targets.forEach((relay) => this.touched.add(relay));
    const events = await abortable(
      this.pool.querySync(targets, filter, { maxWait: options.maxWaitMs ?? this.timeoutMs }),
      options.signal,
      'relay query',
    );
    const seen = new Set<string>();
    const verified: Event[] = [];
    for (const event of events) {
      if (seen.has(event.id)) {
        continue;
      }
      seen.add(event.id);
      if (verifyEvent(event)) {
        verified.push(event);
      } else {
        log.warn('dropping event with invalid signature', { eventId: event.id });
      }
    }
    return verified;
  }

  close(): void {
    if (this.touched.size) {
      this.pool.close([...this.touched]);
      this.touched.clear();
    }
  }
}
