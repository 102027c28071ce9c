import { finalizeEvent } from 'nostr-tools/pure';
import { describe, expect, it } from 'vitest';

import { buildFinalRecordTemplate, buildLiveScorecardTemplate, nowSeconds } from '@shared/nostr/roundEvents';

import { createWorld, makeAccount, RELAY_A, START_MS } from '../helpers/world';

async function hostedRound() {
  const world = createWorld();
  const guest = makeAccount();
  const round = await world.createRound([guest.publicKey], true);
  const initiationId = await world.publisher.publishInitiation(round.roundId);
  if (!initiationId) throw new Error('initiation not published');
  return { world, guest, roundId: round.roundId, initiationId };
}

describe('SyncPoller.refreshRemoteScores', () => {
  it('caches the newest card of every remote player without touching local scores', async () => {
    const { world, guest, roundId, initiationId } = await hostedRound();
    const playerKeys = [world.account.publicKey, guest.publicKey];
    const card = (scores: Array<[number, number]>, createdAt: number) =>
      finalizeEvent(
        buildLiveScorecardTemplate({
          initiationEventId: initiationId,
          scores: new Map(scores),
          status: 'in_progress',
          playerKeys,
          clientTag: 'other-app',
          createdAt,
        }),
        guest.secretKey,
      );
    world.network.seed([RELAY_A], card([[1, 6]], nowSeconds(START_MS)));
    world.network.seed([RELAY_A], card([[1, 5], [2, 4]], nowSeconds(START_MS) + 30));

    const remote = await world.poller.refreshRemoteScores(roundId);

    expect([...remote.keys()]).toEqual([guest.publicKey]);
    expect(remote.get(guest.publicKey)?.scores).toEqual(new Map([[1, 5], [2, 4]]));
    expect(remote.get(guest.publicKey)?.status).toBe('in_progress');
    expect(await world.rounds.currentScores(roundId, 1)).toEqual(new Map());
    expect(world.network.queries.at(-1)?.filter.authors).toEqual([guest.publicKey]);
  });

  it('falls back to the cache when relays fail', async () => {
    const { world, guest, roundId } = await hostedRound();
    await world.remoteScores.save(roundId, guest.publicKey, new Map([[1, 3]]), 'in_progress', 10, START_MS);
    world.network.query = async () => {
      throw new Error('offline');
    };

    const remote = await world.poller.refreshRemoteScores(roundId);

    expect(remote.get(guest.publicKey)?.scores).toEqual(new Map([[1, 3]]));
  });
});

describe('SyncPoller.awaitInitiationRecord', () => {
  it('returns the stored id', async () => {
    const { world, roundId, initiationId } = await hostedRound();
    expect(await world.poller.awaitInitiationRecord(roundId, { maxAttempts: 1 })).toBe(initiationId);
  });

  it('gives up after the last attempt', async () => {
    const world = createWorld();
    const round = await world.createRound([]);
    expect(await world.poller.awaitInitiationRecord(round.roundId, { maxAttempts: 3, intervalMs: 1 })).toBeNull();
  });

  it('stops waiting when aborted', async () => {
    const world = createWorld();
    const round = await world.createRound([]);
    const controller = new AbortController();
    const pending = world.poller.awaitInitiationRecord(round.roundId, {
      maxAttempts: 100,
      intervalMs: 60_000,
      signal: controller.signal,
    });
    controller.abort();
    expect(await pending).toBeNull();
  });

  it('sees an id recorded while it waits', async () => {
    const world = createWorld();
    const round = await world.createRound([]);
    const pending = world.poller.awaitInitiationRecord(round.roundId, { maxAttempts: 50, intervalMs: 5 });
    const id = await world.publisher.publishInitiation(round.roundId);
    expect(await pending).toBe(id);
  });
});

describe('SyncPoller.fetchFinalRecords', () => {
  it('combines participant records, lowest total first', async () => {
    const { world, guest, roundId, initiationId } = await hostedRound();
    const outsider = makeAccount();
    const playerKeys = [world.account.publicKey, guest.publicKey];
    const record = (signer: typeof guest, strokes: number, createdAt: number) =>
      finalizeEvent(
        buildFinalRecordTemplate({
          initiationEventId: initiationId,
          scores: new Map([[1, strokes]]),
          playerKeys,
          clientTag: 'other-app',
          createdAt,
        }),
        signer.secretKey,
      );
    world.network.seed([RELAY_A], record(guest, 7, 100));
    world.network.seed([RELAY_A], record(guest, 3, 200));
    world.network.seed([RELAY_A], record(outsider, 1, 300));
    await world.scoreHoles(roundId, 0);
    await world.publisher.publishFinalRecord(roundId, 0);

    const results = await world.poller.fetchFinalRecords(roundId);

    expect(results.map((result) => [result.publicKey, result.total])).toEqual([
      [guest.publicKey, 3],
      [world.account.publicKey, 36],
    ]);
  });
});
