import { index, integer, primaryKey, sqliteTable, text } from 'drizzle-orm/sqlite-core';

// Keep in step with schema.sql, which creates these tables.

export const JOINED_VIA = ['created', 'created_multi', 'joined'] as const;
export type JoinedVia = (typeof JOINED_VIA)[number];

export const CACHED_LISTS = ['follows', 'relays', 'inbox', 'favorites'] as const;
export type CachedListKind = (typeof CACHED_LISTS)[number];

export type HoleDefinition = { holeNumber: number; par: number };

export type CatalogHole = { number: number; par: number; handicap: number };
export type CatalogTee = { name: string; rating: number; slope: number };
export type CatalogYardage = { hole: number; tee: string; yards: number };

// =================================================================
// Scoring (append-only where the SQL triggers say so)
// =================================================================

export const courseSnapshots = sqliteTable('course_snapshots', {
  contentHash: text('content_hash').primaryKey(),
  courseName: text('course_name').notNull(),
  teeSetName: text('tee_set_name').notNull(),
  holeCount: integer('hole_count').notNull(),
  canonicalJson: text('canonical_json').notNull(),
  holes: text('holes', { mode: 'json' }).$type<HoleDefinition[]>().notNull(),
  createdAt: integer('created_at').notNull(),
});

export const rounds = sqliteTable('rounds', {
  roundId: integer('round_id').primaryKey({ autoIncrement: true }),
  courseHash: text('course_hash')
    .notNull()
    .references(() => courseSnapshots.contentHash),
  roundDate: text('round_date').notNull(), // YYYY-MM-DD
  createdAt: integer('created_at').notNull(),
  multiDevice: integer('multi_device', { mode: 'boolean' }).notNull(),
});

export const roundCompletions = sqliteTable('round_completions', {
  roundId: integer('round_id')
    .primaryKey()
    .references(() => rounds.roundId),
  recordedAt: integer('recorded_at').notNull(),
});

export const roundPlayers = sqliteTable(
  'round_players',
  {
    roundId: integer('round_id')
      .notNull()
      .references(() => rounds.roundId),
    playerIndex: integer('player_index').notNull(),
    playerPublicKeyHex: text('player_public_key_hex').notNull(),
    addedAt: integer('added_at').notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.roundId, table.playerIndex] }),
  }),
);

export const holeScores = sqliteTable(
  'hole_scores',
  {
    scoreId: integer('score_id').primaryKey({ autoIncrement: true }),
    roundId: integer('round_id')
      .notNull()
      .references(() => rounds.roundId),
    playerIndex: integer('player_index').notNull(),
    holeNumber: integer('hole_number').notNull(),
    strokes: integer('strokes').notNull(),
    recordedAt: integer('recorded_at').notNull(),
  },
  (table) => ({
    byPlayer: index('hole_scores_round_player').on(table.roundId, table.playerIndex),
  }),
);

export const roundNetworkRecords = sqliteTable('round_network_records', {
  roundId: integer('round_id')
    .primaryKey()
    .references(() => rounds.roundId),
  initiationEventId: text('initiation_event_id').notNull().unique(),
  joinedVia: text('joined_via', { enum: JOINED_VIA }).notNull(),
  publishedAt: integer('published_at').notNull(),
});

// =================================================================
// Caches of network data (mutable)
// =================================================================

export const remoteScores = sqliteTable(
  'remote_scores',
  {
    roundId: integer('round_id')
      .notNull()
      .references(() => rounds.roundId),
    playerPublicKeyHex: text('player_public_key_hex').notNull(),
    scores: text('scores', { mode: 'json' }).$type<Record<string, number>>().notNull(),
    status: text('status'),
    eventCreatedAt: integer('event_created_at').notNull(),
    fetchedAt: integer('fetched_at').notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.roundId, table.playerPublicKeyHex] }),
  }),
);

export const profiles = sqliteTable('profiles', {
  pubkey: text('pubkey').primaryKey(),
  name: text('name'),
  displayName: text('display_name'),
  picture: text('picture'),
  about: text('about'),
  nip05: text('nip05'),
  lud16: text('lud16'),
  banner: text('banner'),
  website: text('website'),
  eventCreatedAt: integer('event_created_at').notNull(),
  fetchedAt: integer('fetched_at').notNull(),
});

export const cachedLists = sqliteTable(
  'cached_lists',
  {
    list: text('list', { enum: CACHED_LISTS }).notNull(),
    pubkey: text('pubkey').notNull(),
    items: text('items', { mode: 'json' }).$type<string[]>().notNull(),
    eventCreatedAt: integer('event_created_at').notNull(),
    fetchedAt: integer('fetched_at').notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.list, table.pubkey] }),
  }),
);

export const catalogCourses = sqliteTable(
  'catalog_courses',
  {
    dTag: text('d_tag').notNull(),
    authorHex: text('author_hex').notNull(),
    title: text('title').notNull(),
    location: text('location').notNull(),
    country: text('country'),
    holeCount: integer('hole_count').notNull(),
    holes: text('holes', { mode: 'json' }).$type<CatalogHole[]>().notNull(),
    tees: text('tees', { mode: 'json' }).$type<CatalogTee[]>().notNull(),
    yardages: text('yardages', { mode: 'json' }).$type<CatalogYardage[]>().notNull(),
    content: text('content'),
    website: text('website'),
    architect: text('architect'),
    established: text('established'),
    imageUrl: text('image_url'),
    operatorPubkey: text('operator_pubkey'),
    eventId: text('event_id').notNull(),
    eventCreatedAt: integer('event_created_at').notNull(),
    cachedAt: integer('cached_at').notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.dTag, table.authorHex] }),
  }),
);

export const courseFavorites = sqliteTable(
  'course_favorites',
  {
    dTag: text('d_tag').notNull(),
    authorHex: text('author_hex').notNull(),
    addedAt: integer('added_at').notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.dTag, table.authorHex] }),
  }),
);

export type CourseSnapshotRow = typeof courseSnapshots.$inferSelect;
export type RoundRow = typeof rounds.$inferSelect;
export type RoundCompletionRow = typeof roundCompletions.$inferSelect;
export type RoundPlayerRow = typeof roundPlayers.$inferSelect;
export type HoleScoreRow = typeof holeScores.$inferSelect;
export type RoundNetworkRecordRow = typeof roundNetworkRecords.$inferSelect;
export type RemoteScoreRow = typeof remoteScores.$inferSelect;
export type ProfileRecord = typeof profiles.$inferSelect;
export type CachedListRecord = typeof cachedLists.$inferSelect;
export type CatalogCourseRow = typeof catalogCourses.$inferSelect;
export type CourseFavoriteRow = typeof courseFavorites.$inferSelect;

export type ProfileFields = {
  name?: string;
  displayName?: string;
  picture?: string;
  about?: string;
  nip05?: string;
  lud16?: string;
  banner?: string;
  website?: string;
};

export type CachedProfileRow = ProfileFields & {
  pubkey: string;
  eventCreatedAt: number;
  fetchedAt: number;
};

export type CachedListRow = {
  pubkey: string;
  items: string[];
  eventCreatedAt: number;
  fetchedAt: number;
};

export const PROFILE_FIELDS = [
  'name',
  'displayName',
  'picture',
  'about',
  'nip05',
  'lud16',
  'banner',
  'website',
] as const satisfies ReadonlyArray<keyof ProfileFields>;
