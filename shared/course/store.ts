import { count, eq } from 'drizzle-orm';

import { InvalidCourseError, NotFoundError, StorageError, UntrustedContentError } from '../core/errors';
import { hashCanonical } from '../kernel/hashing';
import { isRecord, type JsonValue } from '../kernel/canonical';
import type { Db, LocalDatabase } from '../storage/database';
import { courseSnapshots, type CourseSnapshotRow, type HoleDefinition } from '../storage/schema';

export type CourseInput = {
  courseName: string;
  teeSetName: string;
  holes: HoleDefinition[];
};

export type CourseSnapshot = Readonly<CourseSnapshotRow>;

export const MIN_PAR = 3;
export const MAX_PAR = 6;

const VALID_HOLE_SETS: ReadonlyArray<readonly number[]> = [
  [1, 2, 3, 4, 5, 6, 7, 8, 9],
  [10, 11, 12, 13, 14, 15, 16, 17, 18],
  [1, 2, 3, 4, 5, 6, 7, 8, 9, 10, 11, 12, 13, 14, 15, 16, 17, 18],
];

function sortHoles(holes: readonly HoleDefinition[]): HoleDefinition[] {
  return holes
    .map((hole) => ({ holeNumber: hole.holeNumber, par: hole.par }))
    .sort((a, b) => a.holeNumber - b.holeNumber);
}

export function validateCourse(input: CourseInput): HoleDefinition[] {
  if (typeof input.courseName !== 'string' || !input.courseName.trim()) {
    throw new InvalidCourseError('course name is required');
  }
  if (typeof input.teeSetName !== 'string' || !input.teeSetName.trim()) {
    throw new InvalidCourseError('tee set name is required');
  }
  const holes = sortHoles(input.holes);
  if (holes.length !== 9 && holes.length !== 18) {
    throw new InvalidCourseError(`expected 9 or 18 holes, got ${holes.length}`);
  }
  const numbers = holes.map((hole) => hole.holeNumber);
  const matches = VALID_HOLE_SETS.some(
    (set) => set.length === numbers.length && set.every((value, idx) => numbers[idx] === value),
  );
  if (!matches) {
    throw new InvalidCourseError(`invalid hole set: ${numbers.join(',')}`);
  }
  for (const hole of holes) {
    if (!Number.isInteger(hole.par) || hole.par < MIN_PAR || hole.par > MAX_PAR) {
      throw new InvalidCourseError(`hole ${hole.holeNumber} has invalid par ${hole.par}`);
    }
  }
  return holes;
}

/** Snake-case document that is hashed and embedded in round records. */
export function coursePayload(input: CourseInput): JsonValue {
  const holes = validateCourse(input);
  return {
    course_name: input.courseName,
    tee_set: input.teeSetName,
    hole_count: holes.length,
    holes: holes.map((hole) => ({
      hole_number: hole.holeNumber,
      par: hole.par,
      handicap_index: null,
    })),
  };
}

export function computeCourseHash(input: CourseInput): { hash: string; canonicalJson: string } {
  return hashCanonical(coursePayload(input));
}

export function courseFromPayload(value: unknown): CourseInput {
  if (!isRecord(value)) {
    throw new InvalidCourseError('course snapshot must be an object');
  }
  const { course_name: courseName, tee_set: teeSetName } = value;
  if (typeof courseName !== 'string' || typeof teeSetName !== 'string' || !Array.isArray(value.holes)) {
    throw new InvalidCourseError('course snapshot is missing fields');
  }
  const holes: HoleDefinition[] = [];
  for (const raw of value.holes) {
    if (!isRecord(raw) || typeof raw.hole_number !== 'number' || typeof raw.par !== 'number') {
      throw new InvalidCourseError('course snapshot has a malformed hole');
    }
    holes.push({ holeNumber: raw.hole_number, par: raw.par });
  }
  const input: CourseInput = { courseName, teeSetName, holes };
  validateCourse(input);
  if (value.hole_count !== holes.length) {
    throw new InvalidCourseError('course snapshot hole_count does not match its holes');
  }
  return input;
}

/**
 * Parses an embedded course document and checks it against the hash it was
 * published under.
 */
export function verifyCourseContent(value: unknown, expectedHash: string): CourseInput {
  const input = courseFromPayload(value);
  const { hash } = computeCourseHash(input);
  if (hash !== expectedHash) {
    throw new UntrustedContentError('course snapshot does not match its hash', expectedHash, hash);
  }
  return input;
}

export function buildCourseRow(input: CourseInput, createdAt: number): CourseSnapshotRow {
  const holes = validateCourse(input);
  const { hash, canonicalJson } = computeCourseHash(input);
  return {
    contentHash: hash,
    courseName: input.courseName,
    teeSetName: input.teeSetName,
    holeCount: holes.length,
    canonicalJson,
    holes,
    createdAt,
  };
}

function toSnapshot(row: CourseSnapshotRow): CourseSnapshot {
  return { ...row, holes: row.holes.map((hole) => ({ ...hole })) };
}

export function findCourseRow(db: Db, hash: string): CourseSnapshotRow | undefined {
  return db.select().from(courseSnapshots).where(eq(courseSnapshots.contentHash, hash)).get();
}

/** Inserts the snapshot unless its hash is already stored; returns the stored row. */
export function insertCourseRow(db: Db, input: CourseInput, createdAt: number): CourseSnapshotRow {
  const row = buildCourseRow(input, createdAt);
  db.insert(courseSnapshots).values(row).onConflictDoNothing().run();
  const stored = findCourseRow(db, row.contentHash);
  if (!stored) {
    throw new StorageError(`course ${row.contentHash} was not stored`);
  }
  return stored;
}

export class ContentAddressedCourseStore {
  private readonly db: LocalDatabase;
  private readonly now: () => number;

  constructor(db: LocalDatabase, now: () => number = () => Date.now()) {
    this.db = db;
    this.now = now;
  }

  /** Insert-if-absent keyed by content hash. Equal input always yields the same row. */
  async getOrCreate(input: CourseInput): Promise<CourseSnapshot> {
    const { hash } = computeCourseHash(input);
    const known = await this.get(hash);
    if (known) {
      return known;
    }
    const row = await this.db.write((db) => insertCourseRow(db, input, this.now()));
    return toSnapshot(row);
  }

  async get(hash: string): Promise<CourseSnapshot | null> {
    const row = await this.db.read((db) => findCourseRow(db, hash));
    return row ? toSnapshot(row) : null;
  }

  async require(hash: string): Promise<CourseSnapshot> {
    const snapshot = await this.get(hash);
    if (!snapshot) {
      throw new NotFoundError(`course ${hash} is not stored locally`);
    }
    return snapshot;
  }

  async count(): Promise<number> {
    const result = await this.db.read((db) => db.select({ value: count() }).from(courseSnapshots).get());
    return result?.value ?? 0;
  }
}
