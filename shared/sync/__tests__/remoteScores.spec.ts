import { describe, expect, it } from 'vitest';

import { ContentAddressedCourseStore } from '../../course/store';
import { RoundAggregate } from '../../round/aggregate';
import { LocalDatabase } from '../../storage/database';
import { RemoteScoreCache } from '../remoteScores';

const ALICE = 'a'.repeat(64);
const BOB = 'b'.repeat(64);

async function setup() {
  const db = new LocalDatabase();
  const course = await new ContentAddressedCourseStore(db, () => 1_000).getOrCreate({
    courseName: 'Pebble Creek',
    teeSetName: 'Blue',
    holes: [4, 4, 3, 5, 4, 4, 3, 4, 5].map((par, idx) => ({ holeNumber: idx + 1, par })),
  });
  const round = await new RoundAggregate(db, () => 1_000).createRound(course, [ALICE, BOB], { multiDevice: true });
  return { cache: new RemoteScoreCache(db), roundId: round.roundId };
}

describe('RemoteScoreCache', () => {
  it('keeps the snapshot from the newest event', async () => {
    const { cache, roundId } = await setup();

    expect(await cache.save(roundId, BOB, new Map([[2, 4], [1, 5]]), 'in_progress', 200, 10)).toBe(true);
    expect(await cache.save(roundId, BOB, new Map([[1, 9]]), 'in_progress', 100, 20)).toBe(false);

    const stored = (await cache.forRound(roundId)).get(BOB);
    expect(stored?.scores).toEqual(new Map([[1, 5], [2, 4]]));
    expect([...(stored?.scores.keys() ?? [])]).toEqual([1, 2]);
    expect(stored?.fetchedAt).toBe(10);

    expect(await cache.save(roundId, BOB, new Map([[1, 5], [2, 4], [3, 3]]), 'completed', 300, 30)).toBe(true);
    expect((await cache.forRound(roundId)).get(BOB)).toEqual({
      publicKey: BOB,
      scores: new Map([[1, 5], [2, 4], [3, 3]]),
      status: 'completed',
      eventCreatedAt: 300,
      fetchedAt: 30,
    });
  });

  it('returns nothing for a round without remote players', async () => {
    const { cache, roundId } = await setup();
    expect((await cache.forRound(roundId)).size).toBe(0);
  });
});
