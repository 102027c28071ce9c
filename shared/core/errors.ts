type ErrorOptionsLike = { cause?: unknown };

export class RoundRelayError extends Error {
  constructor(message: string, options?: ErrorOptionsLike) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Local durable storage failed. Always propagated to the caller. */
export class StorageError extends RoundRelayError {}

export class NotFoundError extends RoundRelayError {}

/** Content whose recomputed hash does not match the hash it was published under. */
export class UntrustedContentError extends RoundRelayError {
  readonly expectedHash: string;
  readonly actualHash: string;

  constructor(message: string, expectedHash: string, actualHash: string) {
    super(message);
    this.expectedHash = expectedHash;
    this.actualHash = actualHash;
  }
}

export class InvalidPlayerSetError extends RoundRelayError {}

export class InvalidCourseError extends RoundRelayError {}

/** Unknown round, player or hole, or strokes outside 1..20. */
export class InvalidScoreError extends RoundRelayError {}

export class InvalidInviteError extends RoundRelayError {}

export class InvalidKeyError extends RoundRelayError {}

export class NotInPlayerListError extends RoundRelayError {}

export class ReadOnlyAccountError extends RoundRelayError {}

/** The card belongs to a player who publishes it from their own device. */
export class CardOwnershipError extends RoundRelayError {}

/** Background work stopped because its signal was aborted. */
export class CancelledError extends RoundRelayError {}

export function throwIfAborted(signal: AbortSignal | undefined, what: string): void {
  if (signal?.aborted) {
    throw new CancelledError(`${what} cancelled`);
  }
}

/**
 * Settles with `promise`, or rejects with CancelledError as soon as `signal`
 * aborts. The underlying work is not stopped, only no longer awaited.
 */
export function abortable<T>(promise: Promise<T>, signal: AbortSignal | undefined, what: string): Promise<T> {
  if (!signal) {
    return promise;
  }
  if (signal.aborted) {
    return Promise.reject(new CancelledError(`${what} cancelled`));
  }
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(new CancelledError(`${what} cancelled`));
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

export type RelayFailure = { relay: string; reason: string };

export class RelayPublishError extends RoundRelayError {
  readonly failures: RelayFailure[];

  constructor(message: string, failures: RelayFailure[]) {
    super(message);
    this.failures = failures;
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  try {
    return JSON.stringify(error);
  } catch {
    return String(error);
  }
}
