import type { Event, EventTemplate } from 'nostr-tools';

import { coursePayload, verifyCourseContent, type CourseInput } from '../course/store';
import { InvalidInviteError, UntrustedContentError } from '../core/errors';
import { hashCanonical } from '../kernel/hashing';
import { canonicalize, isRecord, type JsonValue } from '../kernel/canonical';
import type { HoleScores } from '../round/types';

export const KIND_TEXT_NOTE = 1;
export const KIND_PROFILE = 0;
export const KIND_CONTACTS = 3;
export const KIND_ROUND_INITIATION = 1501;
export const KIND_FINAL_RECORD = 1502;
export const KIND_LIVE_SCORECARD = 30501;
export const KIND_RELAY_LIST = 10002;
export const KIND_INBOX_RELAYS = 10050;
export const KIND_FOLLOW_SET = 30000;
export const KIND_GIFT_WRAP = 1059;
export const FAVORITES_SET_ID = 'clubhouse';

export const RULES_TEMPLATE = { format: 'stroke_play' } as const satisfies JsonValue;

export type LiveStatus = 'in_progress' | 'completed';

export function rulesHash(): string {
  return hashCanonical({ ...RULES_TEMPLATE }).hash;
}

export function nowSeconds(now: number = Date.now()): number {
  return Math.floor(now / 1000);
}

export function tagValue(event: Pick<Event, 'tags'>, name: string): string | null {
  const tag = event.tags.find((entry) => entry[0] === name && typeof entry[1] === 'string');
  return tag ? tag[1] : null;
}

export function tagValues(event: Pick<Event, 'tags'>, name: string): string[] {
  return event.tags.filter((entry) => entry[0] === name && typeof entry[1] === 'string').map((entry) => entry[1]);
}

function scoreTags(scores: HoleScores): string[][] {
  return [...scores.entries()]
    .sort(([a], [b]) => a - b)
    .map(([hole, strokes]) => ['score', String(hole), String(strokes)]);
}

function parseScoreTags(event: Pick<Event, 'tags'>): HoleScores {
  const entries: Array<[number, number]> = [];
  for (const tag of event.tags) {
    if (tag[0] !== 'score' || tag.length < 3) continue;
    const hole = Number.parseInt(tag[1], 10);
    const strokes = Number.parseInt(tag[2], 10);
    if (Number.isInteger(hole) && Number.isInteger(strokes)) {
      entries.push([hole, strokes]);
    }
  }
  entries.sort(([a], [b]) => a - b);
  return new Map(entries);
}

function sumScores(scores: HoleScores): number {
  let total = 0;
  for (const strokes of scores.values()) total += strokes;
  return total;
}

function baseTags(clientTag: string): string[][] {
  return [
    ['t', 'golf'],
    ['client', clientTag],
  ];
}

// round initiation (kind 1501)

export type InitiationInput = {
  course: CourseInput;
  playerKeys: readonly string[];
  roundDate: string;
  clientTag: string;
  createdAt: number;
};

export function buildInitiationTemplate(input: InitiationInput): EventTemplate {
  const courseSnapshot = coursePayload(input.course);
  const courseHash = hashCanonical(courseSnapshot).hash;
  const content = canonicalize({ course_snapshot: courseSnapshot, rules_template: { ...RULES_TEMPLATE } });
  return {
    kind: KIND_ROUND_INITIATION,
    created_at: input.createdAt,
    content,
    tags: [
      ['course_hash', courseHash],
      ['rules_hash', rulesHash()],
      ['date', input.roundDate],
      ...baseTags(input.clientTag),
      ...input.playerKeys.map((key) => ['p', key]),
    ],
  };
}

export type ParsedInitiation = {
  eventId: string;
  author: string;
  createdAt: number;
  course: CourseInput;
  courseHash: string;
  rulesHash: string;
  roundDate: string;
  playerKeys: string[];
};

/**
 * Reads a round initiation and checks its embedded course and rules against
 * the hashes it was tagged with.
 */
export function parseInitiation(event: Event): ParsedInitiation {
  if (event.kind !== KIND_ROUND_INITIATION) {
    throw new InvalidInviteError(`event ${event.id} is kind ${event.kind}, not a round`);
  }
  const courseHash = tagValue(event, 'course_hash');
  const taggedRulesHash = tagValue(event, 'rules_hash');
  const roundDate = tagValue(event, 'date');
  if (!courseHash || !taggedRulesHash || !roundDate) {
    throw new InvalidInviteError(`round ${event.id} is missing required tags`);
  }
  let content: unknown;
  try {
    content = JSON.parse(event.content);
  } catch (error) {
    throw new InvalidInviteError(`round ${event.id} has unreadable content`, { cause: error });
  }
  if (!isRecord(content) || !isRecord(content.rules_template)) {
    throw new InvalidInviteError(`round ${event.id} has no rules template`);
  }
  const course = verifyCourseContent(content.course_snapshot, courseHash);
  const rules = content.rules_template;
  const actualRulesHash = typeof rules.format === 'string' ? hashCanonical({ format: rules.format }).hash : '';
  if (actualRulesHash !== taggedRulesHash) {
    throw new UntrustedContentError('rules template does not match its hash', taggedRulesHash, actualRulesHash);
  }
  const playerKeys: string[] = [];
  for (const key of tagValues(event, 'p')) {
    if (!playerKeys.includes(key)) playerKeys.push(key);
  }
  return {
    eventId: event.id,
    author: event.pubkey,
    createdAt: event.created_at,
    course,
    courseHash,
    rulesHash: taggedRulesHash,
    roundDate,
    playerKeys,
  };
}

// final record (kind 1502)

export type FinalRecordInput = {
  initiationEventId: string;
  scores: HoleScores;
  playerKeys: readonly string[];
  /** Set when the signer records someone else's card on a shared device. */
  scoredBy?: string | null;
  notes?: string;
  clientTag: string;
  createdAt: number;
};

export function buildFinalRecordTemplate(input: FinalRecordInput): EventTemplate {
  const tags: string[][] = [
    ['e', input.initiationEventId],
    ['total', String(sumScores(input.scores))],
    ...baseTags(input.clientTag),
    ...scoreTags(input.scores),
  ];
  if (input.scoredBy) {
    tags.push(['scored_by', input.scoredBy], ['p', input.scoredBy]);
    for (const key of input.playerKeys) {
      if (key !== input.scoredBy) tags.push(['p', key]);
    }
  } else {
    for (const key of input.playerKeys) tags.push(['p', key]);
  }
  return {
    kind: KIND_FINAL_RECORD,
    created_at: input.createdAt,
    content: input.notes ?? '',
    tags,
  };
}

export type ParsedFinalRecord = {
  eventId: string;
  author: string;
  scoredBy: string | null;
  /** The player whose card this is. */
  player: string;
  initiationEventId: string | null;
  scores: HoleScores;
  total: number;
  notes: string | null;
  createdAt: number;
};

export function parseFinalRecord(event: Event): ParsedFinalRecord | null {
  if (event.kind !== KIND_FINAL_RECORD) {
    return null;
  }
  const scores = parseScoreTags(event);
  const totalTag = Number.parseInt(tagValue(event, 'total') ?? '', 10);
  const scoredBy = tagValue(event, 'scored_by');
  return {
    eventId: event.id,
    author: event.pubkey,
    scoredBy,
    player: scoredBy ?? event.pubkey,
    initiationEventId: tagValue(event, 'e'),
    scores,
    total: Number.isInteger(totalTag) ? totalTag : sumScores(scores),
    notes: event.content ? event.content : null,
    createdAt: event.created_at,
  };
}

export type CombinedPlayerResult = {
  publicKey: string;
  scores: HoleScores;
  total: number;
  notes: string | null;
};

/**
 * One result per player from a set of final records: newest record wins,
 * lowest total first.
 */
export function combineFinalRecords(records: readonly ParsedFinalRecord[]): CombinedPlayerResult[] {
  const latest = new Map<string, ParsedFinalRecord>();
  for (const record of records) {
    const current = latest.get(record.player);
    if (!current || record.createdAt > current.createdAt || (record.createdAt === current.createdAt && record.eventId > current.eventId)) {
      latest.set(record.player, record);
    }
  }
  return [...latest.values()]
    .sort((a, b) => a.total - b.total || a.player.localeCompare(b.player))
    .map((record) => ({
      publicKey: record.player,
      scores: new Map(record.scores),
      total: record.total,
      notes: record.notes,
    }));
}

// live scorecard (kind 30501, addressable by initiation id)

export type LiveScorecardInput = {
  initiationEventId: string;
  scores: HoleScores;
  status: LiveStatus;
  playerKeys: readonly string[];
  clientTag: string;
  createdAt: number;
};

export function buildLiveScorecardTemplate(input: LiveScorecardInput): EventTemplate {
  return {
    kind: KIND_LIVE_SCORECARD,
    created_at: input.createdAt,
    content: '',
    tags: [
      ['d', input.initiationEventId],
      ['e', input.initiationEventId],
      ['status', input.status],
      ...baseTags(input.clientTag),
      ...scoreTags(input.scores),
      ...input.playerKeys.map((key) => ['p', key]),
    ],
  };
}

export type ParsedLiveScorecard = {
  eventId: string;
  author: string;
  initiationEventId: string | null;
  scores: HoleScores;
  status: string;
  createdAt: number;
};

export function parseLiveScorecard(event: Event): ParsedLiveScorecard | null {
  if (event.kind !== KIND_LIVE_SCORECARD) {
    return null;
  }
  return {
    eventId: event.id,
    author: event.pubkey,
    initiationEventId: tagValue(event, 'e') ?? tagValue(event, 'd'),
    scores: parseScoreTags(event),
    status: tagValue(event, 'status') ?? 'unknown',
    createdAt: event.created_at,
  };
}
