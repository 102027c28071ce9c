import { and, asc, desc, eq } from 'drizzle-orm';

import type { CourseSnapshot } from '../course/store';
import { findCourseRow, insertCourseRow } from '../course/store';
import {
  InvalidPlayerSetError,
  InvalidScoreError,
  NotFoundError,
  NotInPlayerListError,
  StorageError,
} from '../core/errors';
import type { Db, LocalDatabase } from '../storage/database';
import {
  courseSnapshots,
  holeScores,
  roundCompletions,
  roundNetworkRecords,
  roundPlayers,
  rounds,
  type HoleScoreRow,
  type JoinedVia,
  type RoundNetworkRecordRow,
  type RoundPlayerRow,
  type RoundRow,
} from '../storage/schema';
import {
  MAX_STROKES,
  MIN_STROKES,
  type CreateRoundOptions,
  type HoleScores,
  type JoinRoundInput,
  type JoinRoundResult,
  type Round,
  type RoundContext,
  type RoundListItem,
  type RoundNetworkRecord,
  type RoundPlayer,
} from './types';

const PUBKEY_PATTERN = /^[0-9a-f]{64}$/;

export function isPublicKeyHex(value: unknown): value is string {
  return typeof value === 'string' && PUBKEY_PATTERN.test(value);
}

export function formatRoundDate(ts: number): string {
  const date = new Date(ts);
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

function validatePlayers(players: readonly string[]): string[] {
  if (!players.length) {
    throw new InvalidPlayerSetError('a round needs at least one player');
  }
  const seen = new Set<string>();
  for (const key of players) {
    if (!isPublicKeyHex(key)) {
      throw new InvalidPlayerSetError(`malformed player key: ${String(key)}`);
    }
    if (seen.has(key)) {
      throw new InvalidPlayerSetError(`duplicate player key: ${key}`);
    }
    seen.add(key);
  }
  return [...players];
}

/**
 * Latest row per hole: greatest recordedAt, ties broken by greatest scoreId.
 */
export function latestByHole(rows: Iterable<HoleScoreRow>): Map<number, HoleScoreRow> {
  const latest = new Map<number, HoleScoreRow>();
  for (const row of rows) {
    const current = latest.get(row.holeNumber);
    if (
      !current ||
      row.recordedAt > current.recordedAt ||
      (row.recordedAt === current.recordedAt && row.scoreId > current.scoreId)
    ) {
      latest.set(row.holeNumber, row);
    }
  }
  return latest;
}

function toHoleScores(latest: Map<number, HoleScoreRow>): HoleScores {
  const scores: HoleScores = new Map();
  for (const holeNumber of [...latest.keys()].sort((a, b) => a - b)) {
    const row = latest.get(holeNumber);
    if (row) scores.set(holeNumber, row.strokes);
  }
  return scores;
}

function findRound(db: Db, roundId: number): RoundRow | undefined {
  return db.select().from(rounds).where(eq(rounds.roundId, roundId)).get();
}

function requireRound(db: Db, roundId: number): RoundRow {
  const round = findRound(db, roundId);
  if (!round) {
    throw new NotFoundError(`round ${roundId} does not exist`);
  }
  return round;
}

function playersOf(db: Db, roundId: number): RoundPlayerRow[] {
  return db
    .select()
    .from(roundPlayers)
    .where(eq(roundPlayers.roundId, roundId))
    .orderBy(asc(roundPlayers.playerIndex))
    .all();
}

function scoresOf(db: Db, roundId: number, playerIndex: number): HoleScoreRow[] {
  return db
    .select()
    .from(holeScores)
    .where(and(eq(holeScores.roundId, roundId), eq(holeScores.playerIndex, playerIndex)))
    .all();
}

function completedAt(db: Db, roundId: number): number | null {
  const row = db.select().from(roundCompletions).where(eq(roundCompletions.roundId, roundId)).get();
  return row ? row.recordedAt : null;
}

function networkRecordOf(db: Db, roundId: number): RoundNetworkRecordRow | undefined {
  return db.select().from(roundNetworkRecords).where(eq(roundNetworkRecords.roundId, roundId)).get();
}

function networkRecordByInitiation(db: Db, initiationEventId: string): RoundNetworkRecordRow | undefined {
  return db
    .select()
    .from(roundNetworkRecords)
    .where(eq(roundNetworkRecords.initiationEventId, initiationEventId))
    .get();
}

function insertRound(db: Db, courseHash: string, roundDate: string, createdAt: number, multiDevice: boolean): RoundRow {
  return db.insert(rounds).values({ courseHash, roundDate, createdAt, multiDevice }).returning().get();
}

function insertPlayers(db: Db, roundId: number, keys: readonly string[], addedAt: number): void {
  db.insert(roundPlayers)
    .values(keys.map((playerPublicKeyHex, playerIndex) => ({ roundId, playerIndex, playerPublicKeyHex, addedAt })))
    .run();
}

function insertNetworkRecord(
  db: Db,
  roundId: number,
  initiationEventId: string,
  joinedVia: JoinedVia,
  publishedAt: number,
): RoundNetworkRecordRow {
  const existing = networkRecordOf(db, roundId);
  if (existing) {
    return existing;
  }
  const owner = networkRecordByInitiation(db, initiationEventId);
  if (owner) {
    throw new StorageError(`initiation ${initiationEventId} already belongs to round ${owner.roundId}`);
  }
  const row: RoundNetworkRecordRow = { roundId, initiationEventId, joinedVia, publishedAt };
  db.insert(roundNetworkRecords).values(row).run();
  return row;
}

/**
 * Local bookkeeping for rounds: players, the append-only score log,
 * completion and the round's network identity.
 */
export class RoundAggregate {
  private readonly db: LocalDatabase;
  private readonly now: () => number;

  constructor(db: LocalDatabase, now: () => number = () => Date.now()) {
    this.db = db;
    this.now = now;
  }

  /**
   * `players[0]` is the creator (the local device owner); the rest keep
   * their selection order.
   */
  async createRound(
    course: CourseSnapshot,
    players: readonly string[],
    options: CreateRoundOptions = {},
  ): Promise<Round> {
    const keys = validatePlayers(players);
    const ts = this.now();
    const roundDate = options.roundDate ?? formatRoundDate(ts);
    return this.db.write((db) => {
      if (!findCourseRow(db, course.contentHash)) {
        throw new NotFoundError(`course ${course.contentHash} is not stored locally`);
      }
      const round = insertRound(db, course.contentHash, roundDate, ts, Boolean(options.multiDevice) && keys.length > 1);
      insertPlayers(db, round.roundId, keys, ts);
      return round;
    });
  }

  /** Appends one score event. Corrections are new events, never updates. */
  async recordScore(roundId: number, playerIndex: number, holeNumber: number, strokes: number): Promise<HoleScoreRow> {
    if (!Number.isInteger(strokes) || strokes < MIN_STROKES || strokes > MAX_STROKES) {
      throw new InvalidScoreError(`strokes must be an integer in ${MIN_STROKES}..${MAX_STROKES}, got ${strokes}`);
    }
    const recordedAt = this.now();
    return this.db.write((db) => {
      const round = requireRound(db, roundId);
      const player = db
        .select()
        .from(roundPlayers)
        .where(and(eq(roundPlayers.roundId, roundId), eq(roundPlayers.playerIndex, playerIndex)))
        .get();
      if (!player) {
        throw new InvalidScoreError(`round ${roundId} has no player ${playerIndex}`);
      }
      const course = findCourseRow(db, round.courseHash);
      if (!course || !course.holes.some((hole) => hole.holeNumber === holeNumber)) {
        throw new InvalidScoreError(`round ${roundId} has no hole ${holeNumber}`);
      }
      return db.insert(holeScores).values({ roundId, playerIndex, holeNumber, strokes, recordedAt }).returning().get();
    });
  }

  async currentScores(roundId: number, playerIndex: number): Promise<HoleScores> {
    return this.db.read((db) => toHoleScores(latestByHole(scoresOf(db, roundId, playerIndex))));
  }

  async allPlayersCurrentScores(roundId: number): Promise<Map<number, HoleScores>> {
    return this.db.read((db) => {
      const result = new Map<number, HoleScores>();
      for (const player of playersOf(db, roundId)) {
        result.set(player.playerIndex, toHoleScores(latestByHole(scoresOf(db, roundId, player.playerIndex))));
      }
      return result;
    });
  }

  /** True once every hole of the round's course has a score for this player. */
  async isFinishEnabled(roundId: number, playerIndex: number): Promise<boolean> {
    return this.db.read((db) => {
      const round = findRound(db, roundId);
      const course = round ? findCourseRow(db, round.courseHash) : undefined;
      if (!course) {
        return false;
      }
      const scored = latestByHole(scoresOf(db, roundId, playerIndex));
      return course.holes.every((hole) => scored.has(hole.holeNumber));
    });
  }

  /** Inserts the completion row once; returns false when it already exists. */
  async completeRound(roundId: number): Promise<boolean> {
    const recordedAt = this.now();
    return this.db.write((db) => {
      requireRound(db, roundId);
      const inserted = db.insert(roundCompletions).values({ roundId, recordedAt }).onConflictDoNothing().run();
      return inserted.changes > 0;
    });
  }

  async isCompleted(roundId: number): Promise<boolean> {
    return this.db.read((db) => completedAt(db, roundId) !== null);
  }

  async getRound(roundId: number): Promise<Round | null> {
    const row = await this.db.read((db) => findRound(db, roundId));
    return row ?? null;
  }

  async players(roundId: number): Promise<RoundPlayer[]> {
    return this.db.read((db) => playersOf(db, roundId));
  }

  async context(roundId: number): Promise<RoundContext> {
    return this.db.read((db) => {
      const round = requireRound(db, roundId);
      const course = findCourseRow(db, round.courseHash);
      if (!course) {
        throw new NotFoundError(`course ${round.courseHash} is not stored locally`);
      }
      return {
        round,
        course,
        players: playersOf(db, roundId),
        networkRecord: networkRecordOf(db, roundId) ?? null,
        completedAt: completedAt(db, roundId),
      };
    });
  }

  /** Newest first by round date, then by round id. */
  async listRounds(): Promise<RoundListItem[]> {
    return this.db.read((db) => {
      const rows = db
        .select({ round: rounds, course: courseSnapshots })
        .from(rounds)
        .innerJoin(courseSnapshots, eq(rounds.courseHash, courseSnapshots.contentHash))
        .orderBy(desc(rounds.roundDate), desc(rounds.roundId))
        .all();
      const completed = new Set(db.select({ roundId: roundCompletions.roundId }).from(roundCompletions).all().map((row) => row.roundId));
      return rows.map(({ round, course }): RoundListItem => {
        const latest = latestByHole(scoresOf(db, round.roundId, 0));
        let total = 0;
        for (const row of latest.values()) {
          total += row.strokes;
        }
        return {
          roundId: round.roundId,
          courseName: course.courseName,
          teeSetName: course.teeSetName,
          roundDate: round.roundDate,
          holeCount: course.holeCount,
          isCompleted: completed.has(round.roundId),
          totalStrokes: latest.size ? total : null,
          holesScored: latest.size,
        };
      });
    });
  }

  async getNetworkRecord(roundId: number): Promise<RoundNetworkRecord | null> {
    const row = await this.db.read((db) => networkRecordOf(db, roundId));
    return row ?? null;
  }

  async findRoundByInitiation(initiationEventId: string): Promise<RoundNetworkRecord | null> {
    const row = await this.db.read((db) => networkRecordByInitiation(db, initiationEventId));
    return row ?? null;
  }

  /**
   * Stores the round's initiation id once. A second call keeps the first
   * record and returns it unchanged.
   */
  async recordInitiation(roundId: number, initiationEventId: string, joinedVia: JoinedVia): Promise<RoundNetworkRecord> {
    const publishedAt = this.now();
    return this.db.write((db) => {
      requireRound(db, roundId);
      return insertNetworkRecord(db, roundId, initiationEventId, joinedVia, publishedAt);
    });
  }

  /**
   * Creates the local copy of a round someone else started. The local player
   * becomes index 0; the others follow in the order the round lists them.
   * Joining the same initiation twice returns the existing round.
   */
  async createJoinedRound(input: JoinRoundInput): Promise<JoinRoundResult> {
    if (!input.playerKeys.includes(input.myPublicKey)) {
      throw new NotInPlayerListError('local key is not a player in this round');
    }
    const keys = validatePlayers([
      input.myPublicKey,
      ...input.playerKeys.filter((key) => key !== input.myPublicKey),
    ]);
    const ts = this.now();
    return this.db.write((db) => {
      const existing = networkRecordByInitiation(db, input.initiationEventId);
      if (existing) {
        return { roundId: existing.roundId, alreadyJoined: true };
      }
      const course = insertCourseRow(db, input.course, ts);
      const round = insertRound(db, course.contentHash, input.roundDate, ts, keys.length > 1);
      insertPlayers(db, round.roundId, keys, ts);
      insertNetworkRecord(db, round.roundId, input.initiationEventId, 'joined', ts);
      return { roundId: round.roundId, alreadyJoined: false };
    });
  }
}
