import { describe, expect, it } from 'vitest';

import { InvalidCourseError, NotFoundError, UntrustedContentError } from '../../core/errors';
import { LocalDatabase } from '../../storage/database';
import {
  ContentAddressedCourseStore,
  computeCourseHash,
  coursePayload,
  verifyCourseContent,
  type CourseInput,
} from '../store';

const PEBBLE_CREEK: CourseInput = {
  courseName: 'Pebble Creek',
  teeSetName: 'Blue',
  holes: [4, 4, 3, 5, 4, 4, 3, 4, 5].map((par, idx) => ({ holeNumber: idx + 1, par })),
};

const PEBBLE_CREEK_HASH = 'e30d9a791f4979ddfc218b254a34ad62c528b24b008e87e8ef00bd6c12663c7b';

const PEBBLE_CREEK_WHITE: CourseInput = {
  courseName: 'Pebble Creek',
  teeSetName: 'White',
  holes: Array.from({ length: 18 }, (_, idx) => ({ holeNumber: idx + 1, par: [4, 3, 5][idx % 3] })),
};

const PEBBLE_CREEK_WHITE_HASH = '929e466b66bb735b36861ead5ba8fbb7476f3df60ce32c2a2a00010504975ebd';

function makeStore() {
  return new ContentAddressedCourseStore(new LocalDatabase(), () => 1_000);
}

describe('ContentAddressedCourseStore', () => {
  it('derives the same hash for the same course and stores one row', async () => {
    const store = makeStore();
    const first = await store.getOrCreate(PEBBLE_CREEK);
    const second = await store.getOrCreate({ ...PEBBLE_CREEK, holes: [...PEBBLE_CREEK.holes].reverse() });

    expect(first.contentHash).toBe(PEBBLE_CREEK_HASH);
    expect(second.contentHash).toBe(PEBBLE_CREEK_HASH);
    expect(await store.count()).toBe(1);
    expect(first.holeCount).toBe(9);
    expect(first.holes[0]).toEqual({ holeNumber: 1, par: 4 });
  });

  it('stores one row for an eighteen-hole tee set requested twice', async () => {
    const store = makeStore();
    const first = await store.getOrCreate(PEBBLE_CREEK_WHITE);
    const second = await store.getOrCreate(PEBBLE_CREEK_WHITE);

    expect(first.contentHash).toBe(PEBBLE_CREEK_WHITE_HASH);
    expect(second).toEqual(first);
    expect(await store.count()).toBe(1);
    expect(first.holeCount).toBe(18);
    expect(first.holes.map((hole) => hole.par)).toEqual([4, 3, 5, 4, 3, 5, 4, 3, 5, 4, 3, 5, 4, 3, 5, 4, 3, 5]);
    expect(first.holes[17]).toEqual({ holeNumber: 18, par: 5 });
  });

  it('rejects eighteen holes that skip a number', () => {
    const holes = PEBBLE_CREEK_WHITE.holes.map((hole) => (hole.holeNumber === 18 ? { ...hole, holeNumber: 19 } : hole));
    expect(() => computeCourseHash({ ...PEBBLE_CREEK_WHITE, holes })).toThrow(InvalidCourseError);
  });

  it('stores the canonical document it hashed', async () => {
    const snapshot = await makeStore().getOrCreate(PEBBLE_CREEK);
    expect(snapshot.canonicalJson.startsWith('{"course_name":"Pebble Creek","hole_count":9,"holes":[{"handicap_index":null,"hole_number":1,"par":4}')).toBe(true);
    expect(snapshot.canonicalJson.endsWith('"tee_set":"Blue"}')).toBe(true);
  });

  it('gives a different tee set a different hash', () => {
    const blue = computeCourseHash(PEBBLE_CREEK).hash;
    const white = computeCourseHash({ ...PEBBLE_CREEK, teeSetName: 'White' }).hash;
    expect(white).not.toBe(blue);
  });

  it('accepts the back nine', () => {
    const back: CourseInput = {
      courseName: 'Pebble Creek',
      teeSetName: 'Blue',
      holes: PEBBLE_CREEK.holes.map((hole) => ({ holeNumber: hole.holeNumber + 9, par: hole.par })),
    };
    expect(() => computeCourseHash(back)).not.toThrow();
  });

  it('rejects hole sets that are not a nine or eighteen', () => {
    const gap = { ...PEBBLE_CREEK, holes: PEBBLE_CREEK.holes.map((hole) => ({ ...hole, holeNumber: hole.holeNumber + 1 })) };
    expect(() => computeCourseHash(gap)).toThrow(InvalidCourseError);
    expect(() => computeCourseHash({ ...PEBBLE_CREEK, holes: PEBBLE_CREEK.holes.slice(0, 8) })).toThrow(InvalidCourseError);
  });

  it('rejects par outside 3..6', () => {
    const holes = PEBBLE_CREEK.holes.map((hole) => (hole.holeNumber === 2 ? { ...hole, par: 7 } : hole));
    expect(() => computeCourseHash({ ...PEBBLE_CREEK, holes })).toThrow(InvalidCourseError);
  });

  it('raises not found for unknown hashes', async () => {
    await expect(makeStore().require('f'.repeat(64))).rejects.toBeInstanceOf(NotFoundError);
  });
});

describe('verifyCourseContent', () => {
  it('accepts an embedded document that matches its hash', () => {
    const verified = verifyCourseContent(coursePayload(PEBBLE_CREEK), PEBBLE_CREEK_HASH);
    expect(verified.courseName).toBe('Pebble Creek');
    expect(verified.holes).toHaveLength(9);
  });

  it('treats a tampered document as untrusted, not missing', () => {
    const payload = JSON.parse(JSON.stringify(coursePayload(PEBBLE_CREEK)));
    payload.holes[0].par = 5;
    expect(() => verifyCourseContent(payload, PEBBLE_CREEK_HASH)).toThrow(UntrustedContentError);
  });
});
