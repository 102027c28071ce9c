export * from './core/config';
export * from './core/errors';
export { createLogger, redactSensitive, setConsoleLoggingEnabled, setLogEmitter, type LogEntry, type LogLevel } from './core/log';
export { createFileStorage, createMemoryStorage, resolveStorage, type StorageBackend } from './core/pstore';
export { canonicalize, type JsonValue } from './kernel/canonical';
export { hashCanonical, sha256Hex } from './kernel/hashing';
export { ContentAddressedCourseStore, computeCourseHash, type CourseInput, type CourseSnapshot } from './course/store';
export {
  CourseCatalog,
  courseInputForTee,
  KIND_COURSE,
  parseCourseEvent,
  type CatalogCourse,
  type CourseKey,
} from './course/catalog';
export { DATABASE_FILE_NAME, LocalDatabase, MEMORY_DATABASE } from './storage/database';
export { RoundAggregate } from './round/aggregate';
export { ActiveRoundSession, type FinishResult, type SessionSnapshot } from './round/session';
export { RoundEngine, type FinishOptions, type RoundEngineOptions, type SendInvitesOptions } from './round/engine';
export { RoundJoinService, type JoinOutcome } from './round/join';
export { RoundTaskQueue } from './round/tasks';
export { buildRoundSummary, buildShareNoteText, buildSummaryText, formatToPar, type RoundSummary } from './round/summary';
export type { CreateRoundOptions, HoleScores, Round, RoundListItem, RoundMode, RoundPlayer } from './round/types';
export { KeyManager, accountFromSecretKey, npubOf, readOnlyAccount, type AccountState } from './nostr/keys';
export { EventPublisher, type PublishCallOptions } from './nostr/publisher';
export { PoolRelayGateway, type PublishResult, type RelayGateway } from './nostr/relay';
export * from './nostr/roundEvents';
export { SyncPoller } from './sync/poller';
export { RemoteScoreCache, type RemoteScoreSnapshot } from './sync/remoteScores';
export { IdentityCache, type Profile } from './identity/cache';
export { decodeInvite, encodeInvite, toInviteUri, type RoundInvite } from './invite/codec';
export { DirectMessageInviter, type IncomingInvite, type InviteDelivery } from './invite/dm';
