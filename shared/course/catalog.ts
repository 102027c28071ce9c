import { and, asc, count, eq, like, or, sql } from 'drizzle-orm';
import type { Event } from 'nostr-tools';

import type { RelayConfig } from '../core/config';
import { NotFoundError } from '../core/errors';
import { createLogger } from '../core/log';
import type { QueryOptions, RelayGateway } from '../nostr/relay';
import type { Db, LocalDatabase } from '../storage/database';
import {
  catalogCourses,
  courseFavorites,
  type CatalogCourseRow,
  type CatalogHole,
  type CatalogTee,
  type CatalogYardage,
} from '../storage/schema';
import type { CourseInput, ContentAddressedCourseStore, CourseSnapshot } from './store';

const log = createLogger('course/catalog');

/** Addressable course listing: one per (author, d tag). */
export const KIND_COURSE = 33501;
export const MIN_CATALOG_HOLES = 9;
export const DEFAULT_SEARCH_LIMIT = 50;

export type CatalogCourse = Omit<CatalogCourseRow, 'cachedAt'>;

export type CourseKey = { dTag: string; authorHex: string };

export type CatalogRefreshOptions = QueryOptions & {
  /** Only listings by these authors. */
  authors?: readonly string[];
};

function firstValue(tags: string[][], name: string): string | null {
  const tag = tags.find((candidate) => candidate[0] === name && candidate.length >= 2);
  return tag ? tag[1] : null;
}

function toInt(value: string): number | null {
  return /^-?\d+$/.test(value) ? Number(value) : null;
}

function toNumber(value: string): number | null {
  if (!value.trim()) return null;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : null;
}

function parseHoles(tags: string[][]): CatalogHole[] {
  const holes: CatalogHole[] = [];
  for (const tag of tags) {
    if (tag[0] !== 'hole' || tag.length < 4) continue;
    const number = toInt(tag[1]);
    const par = toInt(tag[2]);
    const handicap = toInt(tag[3]);
    if (number !== null && par !== null && handicap !== null) {
      holes.push({ number, par, handicap });
    }
  }
  return holes.sort((a, b) => a.number - b.number);
}

function parseTees(tags: string[][]): CatalogTee[] {
  const tees: CatalogTee[] = [];
  for (const tag of tags) {
    if (tag[0] !== 'tee' || tag.length < 4) continue;
    const rating = toNumber(tag[2]);
    const slope = toInt(tag[3]);
    if (rating !== null && slope !== null) {
      tees.push({ name: tag[1], rating, slope });
    }
  }
  return tees;
}

function parseYardages(tags: string[][]): CatalogYardage[] {
  const yardages: CatalogYardage[] = [];
  for (const tag of tags) {
    if (tag[0] !== 'yardage' || tag.length < 4) continue;
    const hole = toInt(tag[1]);
    const yards = toInt(tag[3]);
    if (hole !== null && yards !== null) {
      yardages.push({ hole, tee: tag[2], yards });
    }
  }
  return yardages;
}

function operatorOf(tags: string[][]): string | null {
  const tag = tags.find((candidate) => candidate[0] === 'p' && candidate.length >= 4 && candidate[3] === 'operator');
  return tag ? tag[1] : null;
}

/**
 * Reads a course listing. Returns null when `d`, `title` or `location` is
 * missing, or when fewer than nine holes or no tee parse.
 */
export function parseCourseEvent(event: Event): CatalogCourse | null {
  if (event.kind !== KIND_COURSE) return null;
  const tags = event.tags.filter((tag) => tag.length > 0);
  const dTag = firstValue(tags, 'd');
  const title = firstValue(tags, 'title');
  const location = firstValue(tags, 'location');
  if (dTag === null || title === null || location === null) return null;

  const holes = parseHoles(tags);
  const tees = parseTees(tags);
  if (holes.length < MIN_CATALOG_HOLES || !tees.length) return null;

  return {
    dTag,
    authorHex: event.pubkey,
    title,
    location,
    country: firstValue(tags, 'country'),
    holeCount: holes.length,
    holes,
    tees,
    yardages: parseYardages(tags),
    content: event.content ? event.content : null,
    website: firstValue(tags, 'website'),
    architect: firstValue(tags, 'architect'),
    established: firstValue(tags, 'established'),
    imageUrl: firstValue(tags, 'image'),
    operatorPubkey: operatorOf(tags),
    eventId: event.id,
    eventCreatedAt: event.created_at,
  };
}

export function totalPar(course: CatalogCourse): number {
  return course.holes.reduce((sum, hole) => sum + hole.par, 0);
}

/** Yards per hole number for one tee. */
export function yardagesForTee(course: CatalogCourse, tee: string): Map<number, number> {
  return new Map(course.yardages.filter((entry) => entry.tee === tee).map((entry): [number, number] => [entry.hole, entry.yards]));
}

export function totalYardage(course: CatalogCourse, tee: string): number {
  return course.yardages.filter((entry) => entry.tee === tee).reduce((sum, entry) => sum + entry.yards, 0);
}

/** The scoring snapshot input for one tee of a listed course. */
export function courseInputForTee(course: CatalogCourse, tee: string): CourseInput {
  if (!course.tees.some((candidate) => candidate.name === tee)) {
    throw new NotFoundError(`course ${course.dTag} has no tee ${tee}`);
  }
  return {
    courseName: course.title,
    teeSetName: tee,
    holes: course.holes.map((hole) => ({ holeNumber: hole.number, par: hole.par })),
  };
}

function toCourse(row: CatalogCourseRow): CatalogCourse {
  const { cachedAt: _cachedAt, ...course } = row;
  return course;
}

function findCourse(db: Db, key: CourseKey): CatalogCourseRow | undefined {
  return db
    .select()
    .from(catalogCourses)
    .where(and(eq(catalogCourses.dTag, key.dTag), eq(catalogCourses.authorHex, key.authorHex)))
    .get();
}

export type CourseCatalogOptions = {
  db: LocalDatabase;
  gateway: RelayGateway;
  relays: RelayConfig;
  courses: ContentAddressedCourseStore;
  now?: () => number;
};

/**
 * Local cache of course listings fetched from relays, plus the user's
 * favorite courses. Picking a tee turns a listing into a content-addressed
 * snapshot for scoring.
 */
export class CourseCatalog {
  private readonly db: LocalDatabase;
  private readonly gateway: RelayGateway;
  private readonly relays: RelayConfig;
  private readonly courses: ContentAddressedCourseStore;
  private readonly now: () => number;

  constructor(options: CourseCatalogOptions) {
    this.db = options.db;
    this.gateway = options.gateway;
    this.relays = options.relays;
    this.courses = options.courses;
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * Fetches listings and caches the newest version of each. A stored
   * listing is only replaced by a newer event. Returns how many were stored.
   */
  async refresh(options: CatalogRefreshOptions = {}): Promise<number> {
    const { authors, ...queryOptions } = options;
    const events = await this.gateway.query(
      this.relays.readRelays,
      authors ? { kinds: [KIND_COURSE], authors: [...authors] } : { kinds: [KIND_COURSE] },
      queryOptions,
    );
    const newest = new Map<string, CatalogCourse>();
    for (const event of events) {
      const course = parseCourseEvent(event);
      if (!course) {
        log.warn('skipping malformed course listing', { eventId: event.id });
        continue;
      }
      const key = `${course.authorHex}:${course.dTag}`;
      const known = newest.get(key);
      if (!known || known.eventCreatedAt < course.eventCreatedAt) {
        newest.set(key, course);
      }
    }
    if (!newest.size) {
      return 0;
    }
    const cachedAt = this.now();
    const stored = await this.db.write((db) => {
      let written = 0;
      for (const course of newest.values()) {
        const existing = findCourse(db, course);
        if (existing && existing.eventCreatedAt >= course.eventCreatedAt) continue;
        const row: CatalogCourseRow = { ...course, cachedAt };
        const { dTag: _dTag, authorHex: _authorHex, ...changes } = row;
        db.insert(catalogCourses)
          .values(row)
          .onConflictDoUpdate({ target: [catalogCourses.dTag, catalogCourses.authorHex], set: changes })
          .run();
        written += 1;
      }
      return written;
    });
    log.info('course catalog refreshed', { fetched: events.length, stored });
    return stored;
  }

  /** Case-insensitive match on title or location, ordered by title. */
  async search(query: string, limit = DEFAULT_SEARCH_LIMIT): Promise<CatalogCourse[]> {
    const term = query.trim();
    const matches = term
      ? or(like(catalogCourses.title, `%${term}%`), like(catalogCourses.location, `%${term}%`))
      : undefined;
    const rows = await this.db.read((db) =>
      db
        .select()
        .from(catalogCourses)
        .where(matches)
        .orderBy(sql`${catalogCourses.title} COLLATE NOCASE`)
        .limit(limit)
        .all(),
    );
    return rows.map(toCourse);
  }

  async all(): Promise<CatalogCourse[]> {
    const rows = await this.db.read((db) =>
      db.select().from(catalogCourses).orderBy(sql`${catalogCourses.title} COLLATE NOCASE`).all(),
    );
    return rows.map(toCourse);
  }

  async get(key: CourseKey): Promise<CatalogCourse | null> {
    const row = await this.db.read((db) => findCourse(db, key));
    return row ? toCourse(row) : null;
  }

  async count(): Promise<number> {
    const result = await this.db.read((db) => db.select({ value: count() }).from(catalogCourses).get());
    return result?.value ?? 0;
  }

  /** Stores the scoring snapshot for one tee of a cached listing. */
  async snapshot(key: CourseKey, tee: string): Promise<CourseSnapshot> {
    const course = await this.get(key);
    if (!course) {
      throw new NotFoundError(`course ${key.dTag} by ${key.authorHex} is not cached`);
    }
    return this.courses.getOrCreate(courseInputForTee(course, tee));
  }

  /** No-op when the course is already a favorite. */
  async addFavorite(key: CourseKey): Promise<void> {
    const addedAt = this.now();
    await this.db.write((db) =>
      db.insert(courseFavorites).values({ dTag: key.dTag, authorHex: key.authorHex, addedAt }).onConflictDoNothing().run(),
    );
  }

  async removeFavorite(key: CourseKey): Promise<void> {
    await this.db.write((db) =>
      db
        .delete(courseFavorites)
        .where(and(eq(courseFavorites.dTag, key.dTag), eq(courseFavorites.authorHex, key.authorHex)))
        .run(),
    );
  }

  async isFavorite(key: CourseKey): Promise<boolean> {
    const row = await this.db.read((db) =>
      db
        .select({ dTag: courseFavorites.dTag })
        .from(courseFavorites)
        .where(and(eq(courseFavorites.dTag, key.dTag), eq(courseFavorites.authorHex, key.authorHex)))
        .get(),
    );
    return row !== undefined;
  }

  /** Oldest first. */
  async favorites(): Promise<CourseKey[]> {
    return this.db.read((db) =>
      db
        .select({ dTag: courseFavorites.dTag, authorHex: courseFavorites.authorHex })
        .from(courseFavorites)
        .orderBy(asc(courseFavorites.addedAt), sql`rowid`)
        .all(),
    );
  }

  /** Replaces every favorite in one transaction, keeping the given order. */
  async replaceFavorites(keys: readonly CourseKey[]): Promise<void> {
    const addedAt = this.now();
    await this.db.write((db) => {
      db.delete(courseFavorites).run();
      for (const key of keys) {
        db.insert(courseFavorites).values({ dTag: key.dTag, authorHex: key.authorHex, addedAt }).onConflictDoNothing().run();
      }
    });
  }

  async favoriteCount(): Promise<number> {
    const result = await this.db.read((db) => db.select({ value: count() }).from(courseFavorites).get());
    return result?.value ?? 0;
  }

  /** Cached listings for every favorite, in favorite order. Missing listings are skipped. */
  async favoriteCourses(): Promise<CatalogCourse[]> {
    const keys = await this.favorites();
    const rows = await this.db.read((db) => keys.map((key) => findCourse(db, key)));
    return rows.filter((row): row is CatalogCourseRow => row !== undefined).map(toCourse);
  }

  /** Scoring snapshots for each favorite at the given tee, skipping favorites without it. */
  async favoriteSnapshots(tee: string): Promise<CourseSnapshot[]> {
    const snapshots: CourseSnapshot[] = [];
    for (const course of await this.favoriteCourses()) {
      if (!course.tees.some((candidate) => candidate.name === tee)) continue;
      snapshots.push(await this.courses.getOrCreate(courseInputForTee(course, tee)));
    }
    return snapshots;
  }
}
