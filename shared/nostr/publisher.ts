import type { Event, EventTemplate } from 'nostr-tools';
import { finalizeEvent } from 'nostr-tools/pure';

import type { RelayConfig } from '../core/config';
import { abortable, CardOwnershipError, NotFoundError, ReadOnlyAccountError, throwIfAborted } from '../core/errors';
import { createLogger } from '../core/log';
import type { RoundAggregate } from '../round/aggregate';
import { buildShareNoteText } from '../round/summary';
import { joinedViaForCreation, roundMode, type RoundContext } from '../round/types';
import { canSign, type AccountState, type SigningAccount } from './keys';
import type { RelayGateway } from './relay';
import {
  buildFinalRecordTemplate,
  buildInitiationTemplate,
  buildLiveScorecardTemplate,
  KIND_TEXT_NOTE,
  nowSeconds,
  type LiveStatus,
} from './roundEvents';

const log = createLogger('nostr/publisher');

export type EventPublisherOptions = {
  rounds: RoundAggregate;
  gateway: RelayGateway;
  account: AccountState;
  relays: RelayConfig;
  clientTag: string;
  now?: () => number;
};

export type PublishCallOptions = {
  /** Aborting stops the call before its next network step. */
  signal?: AbortSignal;
};

export type FinalRecordOptions = PublishCallOptions & {
  notes?: string;
};

/**
 * Builds, signs and broadcasts the round's network records. Every method
 * returns null without touching the network when the account is read-only.
 */
export class EventPublisher {
  private readonly rounds: RoundAggregate;
  private readonly gateway: RelayGateway;
  private readonly account: AccountState;
  private readonly relays: RelayConfig;
  private readonly clientTag: string;
  private readonly now: () => number;
  private readonly initiationsInFlight = new Map<number, Promise<string | null>>();

  constructor(options: EventPublisherOptions) {
    this.rounds = options.rounds;
    this.gateway = options.gateway;
    this.account = options.account;
    this.relays = options.relays;
    this.clientTag = options.clientTag;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Publishes the round once. A stored initiation id is reused; concurrent
   * callers share one publish. Once the event is sent it is awaited even if
   * the signal aborts, so its id is always recorded.
   */
  publishInitiation(roundId: number, options: PublishCallOptions = {}): Promise<string | null> {
    const inflight = this.initiationsInFlight.get(roundId);
    if (inflight) {
      return inflight;
    }
    const task = this.doPublishInitiation(roundId, options.signal).finally(() => {
      this.initiationsInFlight.delete(roundId);
    });
    this.initiationsInFlight.set(roundId, task);
    return task;
  }

  private async doPublishInitiation(roundId: number, signal: AbortSignal | undefined): Promise<string | null> {
    const existing = await this.rounds.getNetworkRecord(roundId);
    if (existing) {
      return existing.initiationEventId;
    }
    const signer = this.signer('round initiation');
    if (!signer) {
      return null;
    }
    const context = await this.rounds.context(roundId);
    const template = buildInitiationTemplate({
      course: context.course,
      playerKeys: context.players.map((player) => player.playerPublicKeyHex),
      roundDate: context.round.roundDate,
      clientTag: this.clientTag,
      createdAt: nowSeconds(this.now()),
    });
    throwIfAborted(signal, 'round initiation');
    const event = await this.broadcast(template, signer, undefined);
    const record = await this.rounds.recordInitiation(roundId, event.id, joinedViaForCreation(context.round));
    log.info('round published', { roundId, eventId: record.initiationEventId });
    return record.initiationEventId;
  }

  /**
   * Publishes one player's final card. When the round has no initiation id
   * yet it is published first, so a final record never precedes its round.
   */
  async publishFinalRecord(roundId: number, playerIndex: number, options: FinalRecordOptions = {}): Promise<string | null> {
    const signer = this.signer('final record');
    if (!signer) {
      return null;
    }
    const context = await this.rounds.context(roundId);
    const player = context.players.find((candidate) => candidate.playerIndex === playerIndex);
    if (!player) {
      throw new NotFoundError(`round ${roundId} has no player ${playerIndex}`);
    }
    if (playerIndex !== 0 && roundMode(context.round, context.players) === 'multi_device') {
      throw new CardOwnershipError(`player ${playerIndex} publishes their own record`);
    }
    const initiationEventId = await this.requireInitiation(roundId, context, options.signal);
    const scores = await this.rounds.currentScores(roundId, playerIndex);
    const scoredBy = player.playerPublicKeyHex === signer.publicKey ? null : player.playerPublicKeyHex;
    const template = buildFinalRecordTemplate({
      initiationEventId,
      scores,
      playerKeys: context.players.map((entry) => entry.playerPublicKeyHex),
      scoredBy,
      notes: options.notes,
      clientTag: this.clientTag,
      createdAt: nowSeconds(this.now()),
    });
    const event = await this.broadcast(template, signer, options.signal);
    log.info('final record published', { roundId, playerIndex, eventId: event.id });
    return event.id;
  }

  /**
   * Final records for the whole round as this device owns them: the local
   * card in solo and multi-device rounds, every card on a shared device.
   */
  async publishFinalRecords(roundId: number, options: FinalRecordOptions = {}): Promise<string[]> {
    if (!this.signer('final records')) {
      return [];
    }
    const context = await this.rounds.context(roundId);
    const indices =
      roundMode(context.round, context.players) === 'same_device'
        ? context.players.map((player) => player.playerIndex)
        : [0];
    const ids: string[] = [];
    for (const playerIndex of indices) {
      throwIfAborted(options.signal, 'final records');
      const id = await this.publishFinalRecord(
        roundId,
        playerIndex,
        playerIndex === 0 ? options : { signal: options.signal },
      );
      if (id) ids.push(id);
    }
    return ids;
  }

  /** Replaces the local player's live scorecard for this round. */
  async publishLiveScorecard(roundId: number, options: PublishCallOptions = {}): Promise<string | null> {
    const signer = this.signer('live scorecard');
    if (!signer) {
      return null;
    }
    const context = await this.rounds.context(roundId);
    const initiationEventId = await this.requireInitiation(roundId, context, options.signal);
    const scores = await this.rounds.currentScores(roundId, 0);
    const status: LiveStatus = context.completedAt !== null ? 'completed' : 'in_progress';
    const template = buildLiveScorecardTemplate({
      initiationEventId,
      scores,
      status,
      playerKeys: context.players.map((player) => player.playerPublicKeyHex),
      clientTag: this.clientTag,
      createdAt: nowSeconds(this.now()),
    });
    const event = await this.broadcast(template, signer, options.signal);
    return event.id;
  }

  /** Public text note announcing the local player's card. */
  async publishShareNote(roundId: number, options: PublishCallOptions = {}): Promise<string | null> {
    const signer = this.signer('share note');
    if (!signer) {
      return null;
    }
    const context = await this.rounds.context(roundId);
    const initiationEventId = await this.requireInitiation(roundId, context, options.signal);
    const scores = await this.rounds.currentScores(roundId, 0);
    const content = buildShareNoteText({
      courseName: context.course.courseName,
      teeSetName: context.course.teeSetName,
      roundDate: context.round.roundDate,
      holes: context.course.holes,
      scores,
    });
    const event = await this.broadcast(
      {
        kind: KIND_TEXT_NOTE,
        created_at: nowSeconds(this.now()),
        content,
        tags: [
          ['e', initiationEventId, '', 'mention'],
          ['t', 'golf'],
          ['client', this.clientTag],
        ],
      },
      signer,
      options.signal,
    );
    return event.id;
  }

  private async requireInitiation(roundId: number, context: RoundContext, signal: AbortSignal | undefined): Promise<string> {
    if (context.networkRecord) {
      return context.networkRecord.initiationEventId;
    }
    log.info('no initiation stored; publishing it first', { roundId });
    const id = await this.publishInitiation(roundId, { signal });
    if (!id) {
      throw new ReadOnlyAccountError(`round ${roundId} cannot be published by a read-only account`);
    }
    return id;
  }

  private signer(what: string): SigningAccount | null {
    if (canSign(this.account)) {
      return this.account;
    }
    log.info(`account is read-only; skipping ${what}`);
    return null;
  }

  private async broadcast(template: EventTemplate, signer: SigningAccount, signal: AbortSignal | undefined): Promise<Event> {
    throwIfAborted(signal, `kind ${template.kind} publish`);
    const event = finalizeEvent(template, signer.secretKey);
    await abortable(this.gateway.publish(this.relays.publishRelays, event, { signal }), signal, `kind ${template.kind} publish`);
    return event;
  }
}
