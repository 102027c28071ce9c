import * as nip19 from 'nostr-tools/nip19';
import { generateSecretKey, getPublicKey } from 'nostr-tools/pure';

import { InvalidKeyError, ReadOnlyAccountError } from '../core/errors';
import { createLogger } from '../core/log';
import type { StorageBackend } from '../core/pstore';

export const IDENTITY_STORAGE_KEY = 'roundrelay.identity.v1';

const log = createLogger('nostr/keys');

/**
 * Who this device acts as. A read-only account knows its public key but
 * never signs, so every publish is skipped.
 */
export type AccountState = {
  publicKey: string;
  secretKey: Uint8Array | null;
};

export type SigningAccount = AccountState & { secretKey: Uint8Array };

export function canSign(account: AccountState): account is SigningAccount {
  return account.secretKey instanceof Uint8Array && account.secretKey.length === 32;
}

export function requireSigner(account: AccountState): SigningAccount {
  if (!canSign(account)) {
    throw new ReadOnlyAccountError('account is read-only');
  }
  return account;
}

export function accountFromSecretKey(secretKey: Uint8Array): SigningAccount {
  return { publicKey: getPublicKey(secretKey), secretKey };
}

export function readOnlyAccount(publicKey: string): AccountState {
  return { publicKey, secretKey: null };
}

export function decodeNsec(nsec: string): Uint8Array {
  let decoded: nip19.DecodedResult;
  try {
    decoded = nip19.decode(nsec.trim());
  } catch (error) {
    throw new InvalidKeyError('not a valid nsec', { cause: error });
  }
  if (decoded.type !== 'nsec') {
    throw new InvalidKeyError(`expected nsec, got ${decoded.type}`);
  }
  return decoded.data;
}

export function npubOf(account: AccountState): string {
  return nip19.npubEncode(account.publicKey);
}

/** Persists the device's secret key as an nsec string in the storage backend. */
export class KeyManager {
  private readonly storage: StorageBackend;

  constructor(storage: StorageBackend) {
    this.storage = storage;
  }

  async load(): Promise<SigningAccount | null> {
    const stored = await this.storage.getItem(IDENTITY_STORAGE_KEY);
    if (!stored) {
      return null;
    }
    return accountFromSecretKey(decodeNsec(stored));
  }

  async loadOrCreate(): Promise<SigningAccount> {
    const existing = await this.load();
    if (existing) {
      return existing;
    }
    const account = accountFromSecretKey(generateSecretKey());
    await this.storage.setItem(IDENTITY_STORAGE_KEY, nip19.nsecEncode(account.secretKey));
    log.info('generated new identity', { pubkey: account.publicKey });
    return account;
  }

  async importNsec(nsec: string): Promise<SigningAccount> {
    const account = accountFromSecretKey(decodeNsec(nsec));
    await this.storage.setItem(IDENTITY_STORAGE_KEY, nip19.nsecEncode(account.secretKey));
    return account;
  }

  async exportNsec(): Promise<string | null> {
    return this.storage.getItem(IDENTITY_STORAGE_KEY);
  }
}
