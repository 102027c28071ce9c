import * as nip19 from 'nostr-tools/nip19';
import { generateSecretKey, getPublicKey } from 'nostr-tools/pure';
import { describe, expect, it } from 'vitest';

import { InvalidKeyError, ReadOnlyAccountError } from '../../core/errors';
import { createMemoryStorage } from '../../core/pstore';
import { canSign, IDENTITY_STORAGE_KEY, KeyManager, readOnlyAccount, requireSigner } from '../keys';

describe('KeyManager', () => {
  it('creates an identity once and loads it afterwards', async () => {
    const storage = createMemoryStorage();
    const created = await new KeyManager(storage).loadOrCreate();
    const loaded = await new KeyManager(storage).load();

    expect(loaded?.publicKey).toBe(created.publicKey);
    expect(storage.store.get(IDENTITY_STORAGE_KEY)?.startsWith('nsec1')).toBe(true);
  });

  it('imports an nsec and rejects anything else', async () => {
    const manager = new KeyManager(createMemoryStorage());
    const sk = generateSecretKey();

    const account = await manager.importNsec(nip19.nsecEncode(sk));

    expect(account.publicKey).toBe(getPublicKey(sk));
    expect(await manager.exportNsec()).toBe(nip19.nsecEncode(sk));
    await expect(manager.importNsec(nip19.npubEncode(account.publicKey))).rejects.toBeInstanceOf(InvalidKeyError);
    await expect(manager.importNsec('not-a-key')).rejects.toBeInstanceOf(InvalidKeyError);
  });
});

describe('account state', () => {
  it('treats a public-key-only account as read-only', () => {
    const account = readOnlyAccount('a'.repeat(64));
    expect(canSign(account)).toBe(false);
    expect(() => requireSigner(account)).toThrow(ReadOnlyAccountError);
  });
});
