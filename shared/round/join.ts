import type { Event } from 'nostr-tools';

import { mergeRelays, type RelayConfig } from '../core/config';
import { NotFoundError } from '../core/errors';
import { createLogger } from '../core/log';
import { decodeInvite, type RoundInvite } from '../invite/codec';
import type { RelayGateway } from '../nostr/relay';
import { KIND_ROUND_INITIATION, parseInitiation, type ParsedInitiation } from '../nostr/roundEvents';
import type { RoundAggregate } from './aggregate';
import type { JoinRoundResult } from './types';

const log = createLogger('round/join');

export type RoundJoinServiceOptions = {
  rounds: RoundAggregate;
  gateway: RelayGateway;
  relays: RelayConfig;
};

export type JoinOutcome = JoinRoundResult & { initiationEventId: string };

/** Turns an invite token into a local copy of someone else's round. */
export class RoundJoinService {
  private readonly rounds: RoundAggregate;
  private readonly gateway: RelayGateway;
  private readonly relays: RelayConfig;

  constructor(options: RoundJoinServiceOptions) {
    this.rounds = options.rounds;
    this.gateway = options.gateway;
    this.relays = options.relays;
  }

  /**
   * Fetches the initiation from the invite's hint relays and the configured
   * read relays, then checks its course and rules hashes.
   */
  async fetchInitiation(invite: RoundInvite): Promise<ParsedInitiation> {
    const relays = mergeRelays(invite.relays, this.relays.readRelays, this.relays.publishRelays);
    let events: Event[];
    try {
      events = await this.gateway.query(relays, { ids: [invite.eventId], kinds: [KIND_ROUND_INITIATION] });
    } catch (error) {
      throw new NotFoundError(`round ${invite.eventId} could not be fetched`, { cause: error });
    }
    const event = events.find((candidate) => candidate.id === invite.eventId);
    if (!event) {
      throw new NotFoundError(`round ${invite.eventId} was not found on ${relays.length} relays`);
    }
    return parseInitiation(event);
  }

  async join(token: string, myPublicKey: string): Promise<JoinOutcome> {
    const invite = decodeInvite(token);
    const existing = await this.rounds.findRoundByInitiation(invite.eventId);
    if (existing) {
      return { roundId: existing.roundId, alreadyJoined: true, initiationEventId: invite.eventId };
    }
    const initiation = await this.fetchInitiation(invite);
    const result = await this.rounds.createJoinedRound({
      initiationEventId: initiation.eventId,
      course: initiation.course,
      roundDate: initiation.roundDate,
      playerKeys: initiation.playerKeys,
      myPublicKey,
    });
    log.info('joined round', { roundId: result.roundId, eventId: initiation.eventId, alreadyJoined: result.alreadyJoined });
    return { ...result, initiationEventId: initiation.eventId };
  }
}
