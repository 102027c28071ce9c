import type { CourseInput, CourseSnapshot } from '../course/store';
import type {
  JoinedVia,
  RoundNetworkRecordRow,
  RoundPlayerRow,
  RoundRow,
} from '../storage/schema';

export type Round = Readonly<RoundRow>;
export type RoundPlayer = Readonly<RoundPlayerRow>;
export type RoundNetworkRecord = Readonly<RoundNetworkRecordRow>;

/** Hole number to strokes; unscored holes are absent. */
export type HoleScores = Map<number, number>;

export type RoundMode = 'solo' | 'same_device' | 'multi_device';

export const MIN_STROKES = 1;
export const MAX_STROKES = 20;

export type CreateRoundOptions = {
  /** YYYY-MM-DD; defaults to the local date of creation. */
  roundDate?: string;
  /** Other players score on their own devices. */
  multiDevice?: boolean;
};

export type RoundContext = {
  round: Round;
  course: CourseSnapshot;
  players: RoundPlayer[];
  networkRecord: RoundNetworkRecord | null;
  completedAt: number | null;
};

export type RoundListItem = {
  roundId: number;
  courseName: string;
  teeSetName: string;
  roundDate: string;
  holeCount: number;
  isCompleted: boolean;
  /** Sum of the local player's current strokes, null when nothing is scored. */
  totalStrokes: number | null;
  holesScored: number;
};

export type JoinRoundInput = {
  initiationEventId: string;
  course: CourseInput;
  roundDate: string;
  /** Player keys in the order the round record lists them. */
  playerKeys: readonly string[];
  myPublicKey: string;
};

export type JoinRoundResult = { roundId: number; alreadyJoined: boolean };

export function roundMode(round: Round, players: readonly RoundPlayer[]): RoundMode {
  if (players.length <= 1) {
    return 'solo';
  }
  return round.multiDevice ? 'multi_device' : 'same_device';
}

export function joinedViaForCreation(round: Round): JoinedVia {
  return round.multiDevice ? 'created_multi' : 'created';
}
