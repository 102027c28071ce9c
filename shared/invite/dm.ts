import type { Event } from 'nostr-tools';
import * as nip17 from 'nostr-tools/nip17';
import * as nip59 from 'nostr-tools/nip59';

import { mergeRelays, type RelayConfig } from '../core/config';
import { describeError } from '../core/errors';
import { createLogger } from '../core/log';
import type { Profile } from '../identity/cache';
import { canSign, type AccountState, type SigningAccount } from '../nostr/keys';
import type { RelayGateway } from '../nostr/relay';
import { KIND_GIFT_WRAP, nowSeconds } from '../nostr/roundEvents';
import { isPublicKeyHex, type RoundAggregate } from '../round/aggregate';
import { buildInviteMessage, decodeInvite, encodeInvite, extractCourseName, extractInviteToken } from './codec';

const log = createLogger('invite/dm');

export const KIND_PRIVATE_MESSAGE = 14;
export const INVITE_LOOKBACK_SECONDS = 7 * 24 * 60 * 60;

/** What the inviter needs from the identity layer. */
export interface InviteDirectory {
  inboxRelays(pubkey: string): Promise<string[]>;
  resolveProfiles(keys: readonly string[]): Promise<Map<string, Profile>>;
}

export type InviteDelivery =
  | { recipient: string; ok: true; eventId: string; relays: string[] }
  | { recipient: string; ok: false; error: string };

export type IncomingInvite = {
  token: string;
  eventId: string;
  sender: string;
  senderProfile: Profile | null;
  courseName: string | null;
  /** Milliseconds, from the inner message's timestamp. */
  receivedAt: number;
};

export type DirectMessageInviterOptions = {
  rounds: RoundAggregate;
  gateway: RelayGateway;
  directory: InviteDirectory;
  account: AccountState;
  relays: RelayConfig;
  appName: string;
  now?: () => number;
};

type Unwrapped = Omit<IncomingInvite, 'senderProfile'>;

export class DirectMessageInviter {
  private readonly rounds: RoundAggregate;
  private readonly gateway: RelayGateway;
  private readonly directory: InviteDirectory;
  private readonly account: AccountState;
  private readonly relays: RelayConfig;
  private readonly appName: string;
  private readonly now: () => number;

  constructor(options: DirectMessageInviterOptions) {
    this.rounds = options.rounds;
    this.gateway = options.gateway;
    this.directory = options.directory;
    this.account = options.account;
    this.relays = options.relays;
    this.appName = options.appName;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Sends the round's invite to each recipient over their inbox relays.
   * Defaults to every other player in the round. Failures are reported per
   * recipient and never thrown.
   */
  async sendInvites(roundId: number, recipients?: readonly string[]): Promise<InviteDelivery[]> {
    if (!canSign(this.account)) {
      log.info('account is read-only; skipping invites', { roundId });
      return [];
    }
    const signer = this.account;
    const context = await this.rounds.context(roundId);
    if (!context.networkRecord) {
      log.warn('round has no initiation id yet; invites not sent', { roundId });
      return [];
    }
    const token = encodeInvite(context.networkRecord.initiationEventId, this.relays.publishRelays);
    const message = buildInviteMessage(context.course.courseName, token, this.appName);
    const candidates = recipients ?? context.players.map((player) => player.playerPublicKeyHex);
    const targets = [...new Set(candidates)].filter((key) => isPublicKeyHex(key) && key !== signer.publicKey);
    return Promise.all(targets.map((recipient) => this.deliver(signer, recipient, message)));
  }

  private async deliver(signer: SigningAccount, recipient: string, message: string): Promise<InviteDelivery> {
    try {
      const inbox = await this.directory.inboxRelays(recipient);
      const relays = inbox.length ? inbox : mergeRelays(this.relays.inboxFallbackRelays);
      const wrap = nip17.wrapEvent(signer.secretKey, { publicKey: recipient, relayUrl: relays[0] }, message);
      await this.gateway.publish(relays, wrap);
      log.info('invite sent', { recipient, relays: relays.length });
      return { recipient, ok: true, eventId: wrap.id, relays };
    } catch (error) {
      log.warn('invite delivery failed', { recipient, error: describeError(error) });
      return { recipient, ok: false, error: describeError(error) };
    }
  }

  /**
   * Invites addressed to this account over the last week, newest first.
   * Rounds already joined and repeated invites are dropped.
   */
  async fetchIncomingInvites(): Promise<IncomingInvite[]> {
    if (!canSign(this.account)) {
      log.info('account is read-only; cannot read invites');
      return [];
    }
    const signer = this.account;
    let inbox: string[] = [];
    try {
      inbox = await this.directory.inboxRelays(signer.publicKey);
    } catch (error) {
      log.warn('own inbox relays unavailable', { error: describeError(error) });
    }
    let wraps: Event[];
    try {
      wraps = await this.gateway.query(mergeRelays(inbox, this.relays.readRelays, this.relays.inboxFallbackRelays), {
        kinds: [KIND_GIFT_WRAP],
        '#p': [signer.publicKey],
        since: nowSeconds(this.now()) - INVITE_LOOKBACK_SECONDS,
      });
    } catch (error) {
      log.warn('invite fetch failed', { error: describeError(error) });
      return [];
    }

    const unwrapped = wraps
      .map((wrap) => this.unwrap(signer, wrap))
      .filter((invite): invite is Unwrapped => invite !== null)
      .sort((a, b) => b.receivedAt - a.receivedAt);

    const invites: Unwrapped[] = [];
    for (const invite of unwrapped) {
      if (invites.some((existing) => existing.eventId === invite.eventId)) continue;
      if (await this.rounds.findRoundByInitiation(invite.eventId)) continue;
      invites.push(invite);
    }
    if (!invites.length) {
      return [];
    }
    const profiles = await this.directory.resolveProfiles([...new Set(invites.map((invite) => invite.sender))]);
    return invites.map((invite) => ({ ...invite, senderProfile: profiles.get(invite.sender) ?? null }));
  }

  private unwrap(signer: SigningAccount, wrap: Event): Unwrapped | null {
    let rumor: ReturnType<typeof nip59.unwrapEvent>;
    try {
      rumor = nip59.unwrapEvent(wrap, signer.secretKey);
    } catch (error) {
      log.warn('could not unwrap message', { eventId: wrap.id, error: describeError(error) });
      return null;
    }
    if (rumor.kind !== KIND_PRIVATE_MESSAGE) {
      return null;
    }
    const token = extractInviteToken(rumor.content);
    if (!token) {
      return null;
    }
    return {
      token,
      eventId: decodeInvite(token).eventId,
      sender: rumor.pubkey,
      courseName: extractCourseName(rumor.content),
      receivedAt: rumor.created_at * 1000,
    };
  }
}
