import { InvalidScoreError } from '../core/errors';
import { createLogger } from '../core/log';
import type { HoleDefinition } from '../storage/schema';
import type { RoundAggregate } from './aggregate';
import {
  MAX_STROKES,
  MIN_STROKES,
  roundMode,
  type HoleScores,
  type RoundContext,
  type RoundMode,
} from './types';

const log = createLogger('round/session');

export type SessionPlayer = {
  playerIndex: number;
  publicKey: string;
  /** Scores entered on this device. Remote players in a multi-device round are read-only here. */
  editable: boolean;
  scores: Record<number, number>;
  total: number;
  holesScored: number;
};

export type SessionSnapshot = {
  roundId: number;
  mode: RoundMode;
  courseName: string;
  teeSetName: string;
  holes: HoleDefinition[];
  holeIndex: number;
  currentHole: number;
  par: number;
  activePlayerIndex: number;
  /** Strokes for the active player on the current hole, null while unscored. */
  currentStrokes: number | null;
  players: SessionPlayer[];
  isFirstHole: boolean;
  isLastHole: boolean;
  canFinish: boolean;
  completed: boolean;
};

export type FinishResult = { ok: true; alreadyCompleted: boolean } | { ok: false; missingHoles: number[] };

type Listener = (snapshot: SessionSnapshot) => void;

function clampStrokes(value: number): number {
  return Math.min(MAX_STROKES, Math.max(MIN_STROKES, Math.round(value)));
}

function firstUnscoredIndex(holes: readonly HoleDefinition[], scores: HoleScores): number {
  const index = holes.findIndex((hole) => !scores.has(hole.holeNumber));
  return index >= 0 ? index : Math.max(0, holes.length - 1);
}

/**
 * Headless scoring session for one round. Commands write through the round
 * aggregate; `snapshot()` is derived from in-memory state only.
 */
export class ActiveRoundSession {
  private readonly rounds: RoundAggregate;
  private readonly roundId: number;
  private context: RoundContext | null = null;
  private scores = new Map<number, HoleScores>();
  private holeIndex = 0;
  private activePlayerIndex = 0;
  private readonly listeners = new Set<Listener>();

  constructor(rounds: RoundAggregate, roundId: number) {
    this.rounds = rounds;
    this.roundId = roundId;
  }

  /** Loads the round and resumes at the first hole the local player has not scored. */
  async load(): Promise<SessionSnapshot> {
    this.context = await this.rounds.context(this.roundId);
    this.scores = await this.rounds.allPlayersCurrentScores(this.roundId);
    this.activePlayerIndex = 0;
    this.holeIndex = firstUnscoredIndex(this.context.course.holes, this.scoresFor(0));
    return this.emit();
  }

  subscribe(listener: Listener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** First tap on an unscored hole writes par. On a scored hole it changes nothing. */
  async confirmAtPar(): Promise<SessionSnapshot> {
    const context = this.requireContext();
    const hole = this.currentHoleDefinition(context);
    if (this.scoresFor(this.activePlayerIndex).has(hole.holeNumber)) {
      return this.snapshot();
    }
    await this.write(hole.holeNumber, hole.par);
    return this.emit();
  }

  /** Moves the current hole's strokes by `delta`, starting from par when unscored. */
  async adjustStrokes(delta: number): Promise<SessionSnapshot> {
    const context = this.requireContext();
    const hole = this.currentHoleDefinition(context);
    const current = this.scoresFor(this.activePlayerIndex).get(hole.holeNumber);
    const next = clampStrokes((current ?? hole.par) + delta);
    if (current === next) {
      return this.snapshot();
    }
    await this.write(hole.holeNumber, next);
    return this.emit();
  }

  advanceHole(): SessionSnapshot {
    const context = this.requireContext();
    this.holeIndex = Math.min(context.course.holes.length - 1, this.holeIndex + 1);
    return this.emit();
  }

  retreatHole(): SessionSnapshot {
    this.requireContext();
    this.holeIndex = Math.max(0, this.holeIndex - 1);
    return this.emit();
  }

  goToHole(holeNumber: number): SessionSnapshot {
    const context = this.requireContext();
    const index = context.course.holes.findIndex((hole) => hole.holeNumber === holeNumber);
    if (index < 0) {
      throw new InvalidScoreError(`round ${this.roundId} has no hole ${holeNumber}`);
    }
    this.holeIndex = index;
    return this.emit();
  }

  switchPlayer(playerIndex: number): SessionSnapshot {
    const context = this.requireContext();
    const player = context.players.find((candidate) => candidate.playerIndex === playerIndex);
    if (!player) {
      throw new InvalidScoreError(`round ${this.roundId} has no player ${playerIndex}`);
    }
    if (!this.isEditable(context, playerIndex)) {
      throw new InvalidScoreError(`player ${playerIndex} scores on their own device`);
    }
    this.activePlayerIndex = playerIndex;
    return this.emit();
  }

  /**
   * Completes the round once the local player has scored every hole. Other
   * players' progress does not gate finishing.
   */
  async requestFinish(): Promise<FinishResult> {
    const context = this.requireContext();
    const local = this.scoresFor(0);
    const missingHoles = context.course.holes
      .map((hole) => hole.holeNumber)
      .filter((holeNumber) => !local.has(holeNumber));
    if (missingHoles.length) {
      return { ok: false, missingHoles };
    }
    const created = await this.rounds.completeRound(this.roundId);
    this.context = await this.rounds.context(this.roundId);
    this.emit();
    return { ok: true, alreadyCompleted: !created };
  }

  snapshot(): SessionSnapshot {
    const context = this.requireContext();
    const holes = context.course.holes.map((hole) => ({ ...hole }));
    const hole = this.currentHoleDefinition(context);
    const players: SessionPlayer[] = context.players.map((player) => {
      const scores = this.scoresFor(player.playerIndex);
      let total = 0;
      const record: Record<number, number> = {};
      for (const [holeNumber, strokes] of scores) {
        record[holeNumber] = strokes;
        total += strokes;
      }
      return {
        playerIndex: player.playerIndex,
        publicKey: player.playerPublicKeyHex,
        editable: this.isEditable(context, player.playerIndex),
        scores: record,
        total,
        holesScored: scores.size,
      };
    });
    const local = this.scoresFor(0);
    return {
      roundId: this.roundId,
      mode: roundMode(context.round, context.players),
      courseName: context.course.courseName,
      teeSetName: context.course.teeSetName,
      holes,
      holeIndex: this.holeIndex,
      currentHole: hole.holeNumber,
      par: hole.par,
      activePlayerIndex: this.activePlayerIndex,
      currentStrokes: this.scoresFor(this.activePlayerIndex).get(hole.holeNumber) ?? null,
      players,
      isFirstHole: this.holeIndex === 0,
      isLastHole: this.holeIndex === holes.length - 1,
      canFinish: holes.every((entry) => local.has(entry.holeNumber)),
      completed: context.completedAt !== null,
    };
  }

  private isEditable(context: RoundContext, playerIndex: number): boolean {
    return playerIndex === 0 || roundMode(context.round, context.players) === 'same_device';
  }

  private async write(holeNumber: number, strokes: number): Promise<void> {
    await this.rounds.recordScore(this.roundId, this.activePlayerIndex, holeNumber, strokes);
    const next = new Map(this.scoresFor(this.activePlayerIndex));
    next.set(holeNumber, strokes);
    this.scores.set(this.activePlayerIndex, next);
  }

  private scoresFor(playerIndex: number): HoleScores {
    return this.scores.get(playerIndex) ?? new Map();
  }

  private currentHoleDefinition(context: RoundContext): HoleDefinition {
    const hole = context.course.holes[this.holeIndex];
    if (!hole) {
      throw new InvalidScoreError(`round ${this.roundId} has no hole at position ${this.holeIndex}`);
    }
    return hole;
  }

  private requireContext(): RoundContext {
    if (!this.context) {
      throw new InvalidScoreError(`session for round ${this.roundId} is not loaded`);
    }
    return this.context;
  }

  private emit(): SessionSnapshot {
    const snapshot = this.snapshot();
    for (const listener of this.listeners) {
      try {
        listener(snapshot);
      } catch (error) {
        log.warn('listener failed', { error: String(error) });
      }
    }
    return snapshot;
  }
}
