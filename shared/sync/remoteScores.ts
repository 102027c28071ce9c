import { and, eq } from 'drizzle-orm';

import type { LocalDatabase } from '../storage/database';
import { remoteScores, type RemoteScoreRow } from '../storage/schema';
import type { HoleScores } from '../round/types';

export type RemoteScoreSnapshot = {
  publicKey: string;
  scores: HoleScores;
  status: string | null;
  eventCreatedAt: number;
  fetchedAt: number;
};

function toSnapshot(row: RemoteScoreRow): RemoteScoreSnapshot {
  const entries = Object.entries(row.scores)
    .map(([hole, strokes]): [number, number] => [Number(hole), strokes])
    .sort(([a], [b]) => a - b);
  return {
    publicKey: row.playerPublicKeyHex,
    scores: new Map(entries),
    status: row.status,
    eventCreatedAt: row.eventCreatedAt,
    fetchedAt: row.fetchedAt,
  };
}

/**
 * Side cache of other players' latest published progress. It is a read
 * model only and never feeds the local score log.
 */
export class RemoteScoreCache {
  private readonly db: LocalDatabase;

  constructor(db: LocalDatabase) {
    this.db = db;
  }

  /** Replaces the player's snapshot unless the stored one came from a newer event. */
  async save(
    roundId: number,
    publicKey: string,
    scores: HoleScores,
    status: string | null,
    eventCreatedAt: number,
    fetchedAt: number,
  ): Promise<boolean> {
    const record: Record<string, number> = {};
    for (const [hole, strokes] of scores) {
      record[String(hole)] = strokes;
    }
    const row: RemoteScoreRow = {
      roundId,
      playerPublicKeyHex: publicKey,
      scores: record,
      status,
      eventCreatedAt,
      fetchedAt,
    };
    return this.db.write((db) => {
      const existing = db
        .select({ eventCreatedAt: remoteScores.eventCreatedAt })
        .from(remoteScores)
        .where(and(eq(remoteScores.roundId, roundId), eq(remoteScores.playerPublicKeyHex, publicKey)))
        .get();
      if (existing && existing.eventCreatedAt > eventCreatedAt) {
        return false;
      }
      db.insert(remoteScores)
        .values(row)
        .onConflictDoUpdate({
          target: [remoteScores.roundId, remoteScores.playerPublicKeyHex],
          set: { scores: record, status, eventCreatedAt, fetchedAt },
        })
        .run();
      return true;
    });
  }

  async forRound(roundId: number): Promise<Map<string, RemoteScoreSnapshot>> {
    const rows = await this.db.read((db) => db.select().from(remoteScores).where(eq(remoteScores.roundId, roundId)).all());
    return new Map(rows.map((row) => [row.playerPublicKeyHex, toSnapshot(row)]));
  }
}
