import { finalizeEvent, generateSecretKey, getPublicKey } from 'nostr-tools/pure';
import { describe, expect, it, vi } from 'vitest';

import { MemoryRelayNetwork } from '../../../tests/helpers/memoryRelay';
import { KIND_CONTACTS, KIND_INBOX_RELAYS, KIND_PROFILE } from '../../nostr/roundEvents';
import { LocalDatabase } from '../../storage/database';
import { FOLLOW_LIST_TTL_MS, IdentityCache, type Profile } from '../cache';

const RELAY = 'wss://relay.test';
const FRIEND = 'b'.repeat(64);
const OTHER_FRIEND = 'c'.repeat(64);
const relays = { publishRelays: [RELAY], readRelays: [RELAY], inboxFallbackRelays: [RELAY], timeoutMs: 100 };

function setup() {
  let clock = 10_000;
  const db = new LocalDatabase();
  const network = new MemoryRelayNetwork();
  const make = () => new IdentityCache({ db, gateway: network, relays, now: () => clock });
  return {
    db,
    network,
    make,
    advance(ms: number) {
      clock += ms;
    },
  };
}

const sk = generateSecretKey();
const pubkey = getPublicKey(sk);

function signed(kind: number, createdAt: number, content: string, tags: string[][] = []) {
  return finalizeEvent({ kind, created_at: createdAt, content, tags }, sk);
}

describe('IdentityCache profiles', () => {
  it('fetches, parses and then serves profiles from memory', async () => {
    const { network, make } = setup();
    network.seed([RELAY], signed(KIND_PROFILE, 100, JSON.stringify({ name: 'alice', display_name: 'Alice' })));
    const cache = make();

    const first = await cache.resolveProfiles([pubkey]);
    expect(first.get(pubkey)).toEqual({ pubkey, name: 'alice', displayName: 'Alice' });

    const queriesBefore = network.queries.length;
    await cache.resolveProfiles([pubkey]);
    expect(network.queries.length).toBe(queriesBefore);
  });

  it('paints durable profiles first and never blanks a known field', async () => {
    const { network, make } = setup();
    network.seed([RELAY], signed(KIND_PROFILE, 100, JSON.stringify({ name: 'alice', picture: 'https://img.test/a.png' })));
    await make().resolveProfiles([pubkey]);

    network.seed([RELAY], signed(KIND_PROFILE, 200, JSON.stringify({ name: 'Alice B' })));
    const painted: Array<Map<string, Profile>> = [];
    const result = await make().resolveProfiles([pubkey], (profiles) => painted.push(profiles));

    expect(painted).toHaveLength(1);
    expect(painted[0].get(pubkey)?.name).toBe('alice');
    expect(result.get(pubkey)).toEqual({ pubkey, name: 'Alice B', picture: 'https://img.test/a.png' });
  });

  it('returns durable data when relays are unreachable', async () => {
    const { network, make } = setup();
    network.seed([RELAY], signed(KIND_PROFILE, 100, JSON.stringify({ name: 'alice' })));
    await make().resolveProfiles([pubkey]);
    network.query = async () => {
      throw new Error('offline');
    };
    const result = await make().resolveProfiles([pubkey]);
    expect(result.get(pubkey)?.name).toBe('alice');
  });
});

describe('IdentityCache lists', () => {
  it('keeps the cached follow list when a newer fetch is empty', async () => {
    const { network, make, advance } = setup();
    network.seed([RELAY], signed(KIND_CONTACTS, 100, '', [['p', FRIEND]]));
    const cache = make();
    expect(await cache.followList(pubkey)).toEqual([FRIEND]);

    network.seed([RELAY], signed(KIND_CONTACTS, 200, '', []));
    advance(FOLLOW_LIST_TTL_MS + 1);
    expect(await cache.followList(pubkey)).toEqual([FRIEND]);
    expect(await make().followList(pubkey, { force: true })).toEqual([FRIEND]);
  });

  it('takes a newer follow list that only changes the order', async () => {
    const { network, make, advance } = setup();
    network.seed([RELAY], signed(KIND_CONTACTS, 100, '', [['p', FRIEND], ['p', OTHER_FRIEND]]));
    const cache = make();
    expect(await cache.followList(pubkey)).toEqual([FRIEND, OTHER_FRIEND]);

    network.seed([RELAY], signed(KIND_CONTACTS, 200, '', [['p', OTHER_FRIEND], ['p', FRIEND]]));
    advance(FOLLOW_LIST_TTL_MS + 1);
    expect(await cache.followList(pubkey)).toEqual([OTHER_FRIEND, FRIEND]);
    expect(await make().followList(pubkey)).toEqual([OTHER_FRIEND, FRIEND]);
  });

  it('does not write when a fetch changes nothing', async () => {
    const { db, network, make, advance } = setup();
    network.seed([RELAY], signed(KIND_CONTACTS, 100, '', [['p', FRIEND]]));
    const cache = make();
    await cache.followList(pubkey);
    const write = vi.spyOn(db, 'write');

    network.seed([RELAY], signed(KIND_CONTACTS, 200, '', []));
    advance(FOLLOW_LIST_TTL_MS + 1);
    expect(await cache.followList(pubkey)).toEqual([FRIEND]);
    expect(await cache.resolveProfiles([FRIEND])).toEqual(new Map());
    expect(write).not.toHaveBeenCalled();
  });

  it('serves a fresh list without asking relays', async () => {
    const { network, make } = setup();
    network.seed([RELAY], signed(KIND_CONTACTS, 100, '', [['p', FRIEND]]));
    const cache = make();
    await cache.followList(pubkey);
    const queriesBefore = network.queries.length;
    expect(await cache.followList(pubkey)).toEqual([FRIEND]);
    expect(network.queries.length).toBe(queriesBefore);
  });

  it('reads inbox relays from relay tags', async () => {
    const { network, make } = setup();
    network.seed([RELAY], signed(KIND_INBOX_RELAYS, 100, '', [['relay', 'wss://inbox.test/'], ['relay', 'ftp://bad']]));
    expect(await make().inboxRelays(pubkey)).toEqual(['wss://inbox.test']);
  });
});
