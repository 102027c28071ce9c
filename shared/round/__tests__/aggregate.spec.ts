import { describe, expect, it } from 'vitest';

import { ContentAddressedCourseStore, type CourseInput } from '../../course/store';
import { InvalidPlayerSetError, InvalidScoreError, NotInPlayerListError } from '../../core/errors';
import { LocalDatabase } from '../../storage/database';
import { holeScores } from '../../storage/schema';
import { RoundAggregate } from '../aggregate';

const ALICE = 'a'.repeat(64);
const BOB = 'b'.repeat(64);
const CAROL = 'c'.repeat(64);

const COURSE: CourseInput = {
  courseName: 'Pebble Creek',
  teeSetName: 'Blue',
  holes: [4, 4, 3, 5, 4, 4, 3, 4, 5].map((par, idx) => ({ holeNumber: idx + 1, par })),
};

async function setup(start = 1_000) {
  let clock = start;
  const now = () => clock;
  const db = new LocalDatabase();
  const courses = new ContentAddressedCourseStore(db, now);
  const rounds = new RoundAggregate(db, now);
  const course = await courses.getOrCreate(COURSE);
  return {
    db,
    rounds,
    course,
    tick(ms = 1) {
      clock += ms;
    },
  };
}

async function scoreAllHoles(rounds: RoundAggregate, roundId: number, playerIndex: number): Promise<void> {
  for (const hole of COURSE.holes) {
    await rounds.recordScore(roundId, playerIndex, hole.holeNumber, hole.par);
  }
}

describe('RoundAggregate.createRound', () => {
  it('puts the creator at index 0 and others in selection order', async () => {
    const { rounds, course } = await setup();
    const round = await rounds.createRound(course, [ALICE, CAROL, BOB], { roundDate: '2026-05-01' });
    const players = await rounds.players(round.roundId);
    expect(players.map((p) => [p.playerIndex, p.playerPublicKeyHex])).toEqual([
      [0, ALICE],
      [1, CAROL],
      [2, BOB],
    ]);
    expect(round.roundDate).toBe('2026-05-01');
  });

  it('assigns increasing round ids', async () => {
    const { rounds, course } = await setup();
    const first = await rounds.createRound(course, [ALICE]);
    const second = await rounds.createRound(course, [ALICE]);
    expect(second.roundId).toBe(first.roundId + 1);
  });

  it('rejects empty, duplicate and malformed player sets', async () => {
    const { rounds, course } = await setup();
    await expect(rounds.createRound(course, [])).rejects.toBeInstanceOf(InvalidPlayerSetError);
    await expect(rounds.createRound(course, [ALICE, ALICE])).rejects.toBeInstanceOf(InvalidPlayerSetError);
    await expect(rounds.createRound(course, ['npub-not-hex'])).rejects.toBeInstanceOf(InvalidPlayerSetError);
    expect(await rounds.listRounds()).toEqual([]);
  });

  it('only marks multi-device rounds that have more than one player', async () => {
    const { rounds, course } = await setup();
    const solo = await rounds.createRound(course, [ALICE], { multiDevice: true });
    const group = await rounds.createRound(course, [ALICE, BOB], { multiDevice: true });
    expect(solo.multiDevice).toBe(false);
    expect(group.multiDevice).toBe(true);
  });
});

describe('RoundAggregate scores', () => {
  it('reads the latest correction for a hole', async () => {
    const { rounds, course } = await setup();
    const round = await rounds.createRound(course, [ALICE]);
    await rounds.recordScore(round.roundId, 0, 3, 5);
    expect((await rounds.currentScores(round.roundId, 0)).get(3)).toBe(5);

    await rounds.recordScore(round.roundId, 0, 3, 4);
    expect((await rounds.currentScores(round.roundId, 0)).get(3)).toBe(4);
  });

  it('breaks equal timestamps by the later score id', async () => {
    const { rounds, course } = await setup();
    const round = await rounds.createRound(course, [ALICE]);
    const first = await rounds.recordScore(round.roundId, 0, 1, 6);
    const second = await rounds.recordScore(round.roundId, 0, 1, 5);
    expect(first.recordedAt).toBe(second.recordedAt);
    expect((await rounds.currentScores(round.roundId, 0)).get(1)).toBe(5);
  });

  it('prefers the later timestamp over the larger id', async () => {
    const { db, rounds, course } = await setup();
    const round = await rounds.createRound(course, [ALICE]);
    await db.write((tx) =>
      tx
        .insert(holeScores)
        .values([
          { scoreId: 50, roundId: round.roundId, playerIndex: 0, holeNumber: 2, strokes: 7, recordedAt: 10 },
          { scoreId: 40, roundId: round.roundId, playerIndex: 0, holeNumber: 2, strokes: 4, recordedAt: 20 },
        ])
        .run(),
    );
    expect((await rounds.currentScores(round.roundId, 0)).get(2)).toBe(4);
  });

  it('keeps every correction in the score log', async () => {
    const { db, rounds, course } = await setup();
    const round = await rounds.createRound(course, [ALICE]);
    await rounds.recordScore(round.roundId, 0, 1, 6);
    await rounds.recordScore(round.roundId, 0, 1, 5);
    await rounds.recordScore(round.roundId, 0, 1, 4);

    const log = await db.read((tx) => tx.select().from(holeScores).all());
    expect(log.map((row) => row.strokes)).toEqual([6, 5, 4]);
    expect((await rounds.currentScores(round.roundId, 0)).get(1)).toBe(4);
  });

  it('leaves unscored holes out', async () => {
    const { rounds, course } = await setup();
    const round = await rounds.createRound(course, [ALICE]);
    await rounds.recordScore(round.roundId, 0, 2, 4);
    expect([...(await rounds.currentScores(round.roundId, 0)).keys()]).toEqual([2]);
  });

  it('rejects strokes outside 1..20 and unknown holes or players', async () => {
    const { rounds, course } = await setup();
    const round = await rounds.createRound(course, [ALICE]);
    await expect(rounds.recordScore(round.roundId, 0, 1, 0)).rejects.toBeInstanceOf(InvalidScoreError);
    await expect(rounds.recordScore(round.roundId, 0, 1, 21)).rejects.toBeInstanceOf(InvalidScoreError);
    await expect(rounds.recordScore(round.roundId, 0, 10, 4)).rejects.toBeInstanceOf(InvalidScoreError);
    await expect(rounds.recordScore(round.roundId, 1, 1, 4)).rejects.toBeInstanceOf(InvalidScoreError);
  });

  it('enables finish for the local player even when a remote player has no scores', async () => {
    const { rounds, course } = await setup();
    const round = await rounds.createRound(course, [ALICE, BOB], { multiDevice: true });
    await scoreAllHoles(rounds, round.roundId, 0);

    expect(await rounds.isFinishEnabled(round.roundId, 0)).toBe(true);
    expect(await rounds.isFinishEnabled(round.roundId, 1)).toBe(false);
    const all = await rounds.allPlayersCurrentScores(round.roundId);
    expect(all.get(0)?.size).toBe(9);
    expect(all.get(1)?.size).toBe(0);
  });

  it('keeps finish disabled until the last hole is scored', async () => {
    const { rounds, course } = await setup();
    const round = await rounds.createRound(course, [ALICE]);
    for (const hole of COURSE.holes.slice(0, 8)) {
      await rounds.recordScore(round.roundId, 0, hole.holeNumber, hole.par);
    }
    expect(await rounds.isFinishEnabled(round.roundId, 0)).toBe(false);
    await rounds.recordScore(round.roundId, 0, 9, 5);
    expect(await rounds.isFinishEnabled(round.roundId, 0)).toBe(true);
  });
});

describe('RoundAggregate completion and listing', () => {
  it('completes a round once', async () => {
    const { rounds, course } = await setup();
    const round = await rounds.createRound(course, [ALICE]);
    expect(await rounds.completeRound(round.roundId)).toBe(true);
    expect(await rounds.completeRound(round.roundId)).toBe(false);
    expect(await rounds.isCompleted(round.roundId)).toBe(true);
  });

  it('lists rounds newest first with the local totals', async () => {
    const { rounds, course, tick } = await setup();
    const older = await rounds.createRound(course, [ALICE], { roundDate: '2026-04-01' });
    const newer = await rounds.createRound(course, [ALICE, BOB], { roundDate: '2026-04-20' });
    const sameDay = await rounds.createRound(course, [ALICE], { roundDate: '2026-04-20' });
    await rounds.recordScore(newer.roundId, 0, 1, 5);
    tick();
    await rounds.recordScore(newer.roundId, 0, 1, 4);
    await rounds.recordScore(newer.roundId, 0, 2, 6);
    await rounds.recordScore(newer.roundId, 1, 3, 9);
    await rounds.completeRound(older.roundId);

    const list = await rounds.listRounds();
    expect(list.map((item) => item.roundId)).toEqual([sameDay.roundId, newer.roundId, older.roundId]);
    expect(list[1]).toEqual({
      roundId: newer.roundId,
      courseName: 'Pebble Creek',
      teeSetName: 'Blue',
      roundDate: '2026-04-20',
      holeCount: 9,
      isCompleted: false,
      totalStrokes: 10,
      holesScored: 2,
    });
    expect(list[0].totalStrokes).toBeNull();
    expect(list[2].isCompleted).toBe(true);
  });
});

describe('RoundAggregate network identity', () => {
  it('stores the initiation id once', async () => {
    const { rounds, course } = await setup();
    const round = await rounds.createRound(course, [ALICE]);
    const first = await rounds.recordInitiation(round.roundId, '1'.repeat(64), 'created');
    const second = await rounds.recordInitiation(round.roundId, '2'.repeat(64), 'created');
    expect(second).toEqual(first);
    expect((await rounds.getNetworkRecord(round.roundId))?.initiationEventId).toBe('1'.repeat(64));
  });

  it('creates a joined round with the local player first and is idempotent', async () => {
    const { rounds } = await setup();
    const input = {
      initiationEventId: 'e'.repeat(64),
      course: COURSE,
      roundDate: '2026-06-02',
      playerKeys: [ALICE, BOB, CAROL],
      myPublicKey: BOB,
    };
    const joined = await rounds.createJoinedRound(input);
    const again = await rounds.createJoinedRound(input);

    expect(joined.alreadyJoined).toBe(false);
    expect(again).toEqual({ roundId: joined.roundId, alreadyJoined: true });
    const players = await rounds.players(joined.roundId);
    expect(players.map((p) => p.playerPublicKeyHex)).toEqual([BOB, ALICE, CAROL]);
    const record = await rounds.findRoundByInitiation('e'.repeat(64));
    expect(record?.joinedVia).toBe('joined');
    expect((await rounds.getRound(joined.roundId))?.multiDevice).toBe(true);
  });

  it('refuses to join a round that does not list the local key', async () => {
    const { rounds } = await setup();
    await expect(
      rounds.createJoinedRound({
        initiationEventId: 'e'.repeat(64),
        course: COURSE,
        roundDate: '2026-06-02',
        playerKeys: [ALICE],
        myPublicKey: BOB,
      }),
    ).rejects.toBeInstanceOf(NotInPlayerListError);
  });
});
