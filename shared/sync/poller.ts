import type { Event } from 'nostr-tools';

import { mergeRelays, type RelayConfig } from '../core/config';
import { describeError } from '../core/errors';
import { createLogger } from '../core/log';
import type { RoundAggregate } from '../round/aggregate';
import type { RelayGateway } from '../nostr/relay';
import {
  combineFinalRecords,
  KIND_FINAL_RECORD,
  KIND_LIVE_SCORECARD,
  parseFinalRecord,
  parseLiveScorecard,
  type CombinedPlayerResult,
  type ParsedLiveScorecard,
} from '../nostr/roundEvents';
import type { RemoteScoreCache, RemoteScoreSnapshot } from './remoteScores';

const log = createLogger('sync/poller');

export const DEFAULT_INITIATION_ATTEMPTS = 10;
export const DEFAULT_INITIATION_INTERVAL_MS = 2_000;

export type AwaitInitiationOptions = {
  maxAttempts?: number;
  intervalMs?: number;
  signal?: AbortSignal;
};

export type SyncPollerOptions = {
  rounds: RoundAggregate;
  remoteScores: RemoteScoreCache;
  gateway: RelayGateway;
  relays: RelayConfig;
  now?: () => number;
};

/** Resolves true after `ms`, or false as soon as `signal` aborts. */
export function delay(ms: number, signal?: AbortSignal): Promise<boolean> {
  if (signal?.aborted) {
    return Promise.resolve(false);
  }
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function latestPerAuthor(events: readonly Event[], initiationEventId: string): Map<string, ParsedLiveScorecard> {
  const latest = new Map<string, ParsedLiveScorecard>();
  for (const event of events) {
    const card = parseLiveScorecard(event);
    if (!card || card.initiationEventId !== initiationEventId) {
      continue;
    }
    const current = latest.get(card.author);
    if (!current || card.createdAt > current.createdAt) {
      latest.set(card.author, card);
    }
  }
  return latest;
}

/**
 * Pulls other players' progress for a round on demand. Network failures are
 * logged and fall back to whatever is cached; storage failures propagate.
 */
export class SyncPoller {
  private readonly rounds: RoundAggregate;
  private readonly remoteScores: RemoteScoreCache;
  private readonly gateway: RelayGateway;
  private readonly relays: RelayConfig;
  private readonly now: () => number;

  constructor(options: SyncPollerOptions) {
    this.rounds = options.rounds;
    this.remoteScores = options.remoteScores;
    this.gateway = options.gateway;
    this.relays = options.relays;
    this.now = options.now ?? (() => Date.now());
  }

  private readTargets(): string[] {
    return mergeRelays(this.relays.readRelays, this.relays.publishRelays);
  }

  /**
   * Fetches the newest live scorecard of every player except the local one
   * (index 0) and stores it in the remote side cache.
   */
  async refreshRemoteScores(roundId: number): Promise<Map<string, RemoteScoreSnapshot>> {
    const context = await this.rounds.context(roundId);
    const remoteKeys = context.players
      .filter((player) => player.playerIndex !== 0)
      .map((player) => player.playerPublicKeyHex);
    if (!context.networkRecord || !remoteKeys.length) {
      return this.remoteScores.forRound(roundId);
    }
    const initiationEventId = context.networkRecord.initiationEventId;
    let events: Event[];
    try {
      events = await this.gateway.query(this.readTargets(), {
        kinds: [KIND_LIVE_SCORECARD],
        authors: remoteKeys,
        '#d': [initiationEventId],
      });
    } catch (error) {
      log.warn('remote score fetch failed', { roundId, error: describeError(error) });
      return this.remoteScores.forRound(roundId);
    }
    const fetchedAt = this.now();
    for (const card of latestPerAuthor(events, initiationEventId).values()) {
      if (!remoteKeys.includes(card.author)) {
        continue;
      }
      await this.remoteScores.save(roundId, card.author, card.scores, card.status, card.createdAt, fetchedAt);
    }
    return this.remoteScores.forRound(roundId);
  }

  /**
   * Waits for the round's initiation id to be stored locally, checking up
   * to `maxAttempts` times. Resolves null when attempts run out or the
   * signal aborts.
   */
  async awaitInitiationRecord(roundId: number, options: AwaitInitiationOptions = {}): Promise<string | null> {
    const maxAttempts = options.maxAttempts ?? DEFAULT_INITIATION_ATTEMPTS;
    const intervalMs = options.intervalMs ?? DEFAULT_INITIATION_INTERVAL_MS;
    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      if (options.signal?.aborted) {
        return null;
      }
      const record = await this.rounds.getNetworkRecord(roundId);
      if (record) {
        return record.initiationEventId;
      }
      if (attempt < maxAttempts && !(await delay(intervalMs, options.signal))) {
        return null;
      }
    }
    log.warn('initiation id not available', { roundId, attempts: maxAttempts });
    return null;
  }

  /**
   * Combined result from the final records published for this round. Only
   * records authored by, and scoring, listed players are counted.
   */
  async fetchFinalRecords(roundId: number): Promise<CombinedPlayerResult[]> {
    const context = await this.rounds.context(roundId);
    if (!context.networkRecord) {
      return [];
    }
    const participants = new Set(context.players.map((player) => player.playerPublicKeyHex));
    const initiationEventId = context.networkRecord.initiationEventId;
    let events: Event[];
    try {
      events = await this.gateway.query(this.readTargets(), {
        kinds: [KIND_FINAL_RECORD],
        authors: [...participants],
        '#e': [initiationEventId],
      });
    } catch (error) {
      log.warn('final record fetch failed', { roundId, error: describeError(error) });
      return [];
    }
    const records = events
      .map(parseFinalRecord)
      .filter((record): record is NonNullable<typeof record> => record !== null)
      .filter(
        (record) =>
          record.initiationEventId === initiationEventId &&
          participants.has(record.author) &&
          participants.has(record.player),
      );
    return combineFinalRecords(records);
  }
}
