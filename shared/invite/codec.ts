import * as nip19 from 'nostr-tools/nip19';

import { normalizeRelayUrl } from '../core/config';
import { InvalidInviteError } from '../core/errors';

export type RoundInvite = {
  eventId: string;
  relays: string[];
};

const EVENT_ID_PATTERN = /^[0-9a-f]{64}$/;
const TOKEN_PATTERN = /nevent1[a-z0-9]+/;
const COURSE_PATTERN = /play golf at (.+?)!/i;
const URI_PREFIX = 'nostr:';
const MAX_RELAY_HINTS = 3;

function sanitizeRelays(relays: readonly string[] | undefined): string[] {
  const out: string[] = [];
  for (const relay of relays ?? []) {
    const url = normalizeRelayUrl(relay);
    if (url && !out.includes(url)) out.push(url);
    if (out.length >= MAX_RELAY_HINTS) break;
  }
  return out;
}

/** Bech32 `nevent` token naming the round's initiation event and where to find it. */
export function encodeInvite(eventId: string, relayHints: readonly string[] = []): string {
  if (!EVENT_ID_PATTERN.test(eventId)) {
    throw new InvalidInviteError(`not an event id: ${eventId}`);
  }
  return nip19.neventEncode({ id: eventId, relays: sanitizeRelays(relayHints) });
}

/** Accepts a bare token or a `nostr:` URI. */
export function decodeInvite(token: string): RoundInvite {
  const trimmed = token.trim();
  const bare = trimmed.toLowerCase().startsWith(URI_PREFIX) ? trimmed.slice(URI_PREFIX.length) : trimmed;
  let decoded: nip19.DecodedResult;
  try {
    decoded = nip19.decode(bare);
  } catch (error) {
    throw new InvalidInviteError('invite is not a valid nevent', { cause: error });
  }
  if (decoded.type !== 'nevent') {
    throw new InvalidInviteError(`invite must be a nevent, got ${decoded.type}`);
  }
  if (!EVENT_ID_PATTERN.test(decoded.data.id)) {
    throw new InvalidInviteError('invite carries a malformed event id');
  }
  return { eventId: decoded.data.id, relays: sanitizeRelays(decoded.data.relays) };
}

export function toInviteUri(token: string): string {
  return token.startsWith(URI_PREFIX) ? token : `${URI_PREFIX}${token}`;
}

/** First decodable invite token inside free text. */
export function extractInviteToken(text: string): string | null {
  const match = TOKEN_PATTERN.exec(text);
  if (!match) {
    return null;
  }
  try {
    decodeInvite(match[0]);
    return match[0];
  } catch {
    return null;
  }
}

export function extractCourseName(text: string): string | null {
  const match = COURSE_PATTERN.exec(text);
  const name = match?.[1]?.trim();
  return name ? name : null;
}

export function buildInviteMessage(courseName: string, token: string, appName: string): string {
  return [
    `You've been invited to play golf at ${courseName}!`,
    '',
    `Join: ${toInviteUri(token)}`,
    '',
    `Sent from ${appName}`,
  ].join('\n');
}
