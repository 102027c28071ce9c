import type { HoleDefinition } from '../storage/schema';
import type { HoleScores } from './types';

export interface HoleRow {
  hole: number;
  par: number;
  strokes: number | null;
}

export interface RoundSummary {
  strokes: number;
  par: number;
  /** Strokes minus par of the holes that have a score. */
  toPar: number;
  holesScored: number;
  front: number | null;
  back: number | null;
  holes: HoleRow[];
}

export type SummaryInput = {
  courseName: string;
  teeSetName: string;
  roundDate: string;
  holes: readonly HoleDefinition[];
  scores: HoleScores;
};

const HASHTAGS = '#golf #roundrelay';

function sumNine(holes: readonly HoleDefinition[], scores: HoleScores, back: boolean): number | null {
  const nine = holes.filter((hole) => (back ? hole.holeNumber > 9 : hole.holeNumber <= 9));
  if (!nine.length) {
    return null;
  }
  return nine.reduce((total, hole) => total + (scores.get(hole.holeNumber) ?? 0), 0);
}

export function buildRoundSummary(holes: readonly HoleDefinition[], scores: HoleScores): RoundSummary {
  const ordered = [...holes].sort((a, b) => a.holeNumber - b.holeNumber);
  let strokes = 0;
  let scoredPar = 0;
  let holesScored = 0;
  const rows: HoleRow[] = ordered.map((hole) => {
    const value = scores.get(hole.holeNumber) ?? null;
    if (value !== null) {
      strokes += value;
      scoredPar += hole.par;
      holesScored += 1;
    }
    return { hole: hole.holeNumber, par: hole.par, strokes: value };
  });
  return {
    strokes,
    par: ordered.reduce((total, hole) => total + hole.par, 0),
    toPar: strokes - scoredPar,
    holesScored,
    front: sumNine(ordered, scores, false),
    back: sumNine(ordered, scores, true),
    holes: rows,
  };
}

export function formatToPar(value: number): string {
  if (value === 0) return 'Even';
  return value > 0 ? `+${value}` : String(value);
}

/** One-line public note text for a finished card. */
export function buildShareNoteText(input: SummaryInput): string {
  const summary = buildRoundSummary(input.holes, input.scores);
  const toPar = formatToPar(summary.strokes - summary.par);
  const tees = `(${input.teeSetName} tees)`;
  if (summary.holes.length <= 9) {
    const label = summary.holes[0] && summary.holes[0].hole > 9 ? 'the Back 9' : 'the Front 9';
    return `Shot ${summary.strokes} on ${label} at ${input.courseName} ${tees} (${toPar})\n\n${HASHTAGS}`;
  }
  return `Shot ${summary.strokes} at ${input.courseName} ${tees} - Front 9: ${summary.front ?? 0}, Back 9: ${summary.back ?? 0} (${toPar})\n\n${HASHTAGS}`;
}

export function buildSummaryText(input: SummaryInput): string {
  const summary = buildRoundSummary(input.holes, input.scores);
  const lines = [
    'Round Summary',
    '',
    `Course: ${input.courseName}`,
    `Tees: ${input.teeSetName}`,
    `Date: ${input.roundDate}`,
    `Holes: ${summary.holes.length}`,
    '',
    ...summary.holes.map((row) => `Hole ${row.hole}: Par ${row.par}, Score ${row.strokes ?? '-'}`),
    '',
    `Total: ${summary.strokes} (Par ${summary.par}, ${formatToPar(summary.strokes - summary.par)})`,
  ];
  return lines.join('\n');
}
