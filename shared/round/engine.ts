import { loadConfig, type AppConfig, type Env } from '../core/config';
import { createLogger } from '../core/log';
import { resolveStorage, type StorageBackend } from '../core/pstore';
import { CourseCatalog } from '../course/catalog';
import { ContentAddressedCourseStore, type CourseInput } from '../course/store';
import { IdentityCache, type Profile, type ProfilePaint } from '../identity/cache';
import { encodeInvite } from '../invite/codec';
import { DirectMessageInviter, type IncomingInvite, type InviteDelivery } from '../invite/dm';
import { KeyManager, readOnlyAccount, type AccountState } from '../nostr/keys';
import { EventPublisher, type FinalRecordOptions } from '../nostr/publisher';
import { PoolRelayGateway, type RelayGateway } from '../nostr/relay';
import type { CombinedPlayerResult } from '../nostr/roundEvents';
import { LocalDatabase } from '../storage/database';
import type { HoleScoreRow } from '../storage/schema';
import { SyncPoller, type AwaitInitiationOptions } from '../sync/poller';
import { RemoteScoreCache, type RemoteScoreSnapshot } from '../sync/remoteScores';
import { RoundAggregate } from './aggregate';
import { RoundJoinService, type JoinOutcome } from './join';
import { ActiveRoundSession, type FinishResult } from './session';
import { buildRoundSummary, buildSummaryText, type RoundSummary } from './summary';
import { RoundTaskQueue } from './tasks';
import type { CreateRoundOptions, Round, RoundListItem } from './types';

const log = createLogger('round/engine');

export type RoundEngineOptions = {
  config?: Partial<AppConfig>;
  env?: Env;
  /** Holds the account key. */
  storage?: StorageBackend;
  /** Defaults to a file under `dataDir`, or memory when there is none. */
  database?: LocalDatabase;
  gateway?: RelayGateway;
  /** Defaults to the identity stored in `storage`, created on first use. */
  account?: AccountState;
  now?: () => number;
};

export type FinishOptions = FinalRecordOptions & {
  /** Also post a public note with the local player's card. */
  shareNote?: boolean;
};

export type SendInvitesOptions = AwaitInitiationOptions & {
  recipients?: readonly string[];
};

/**
 * Entry point wiring local storage, the relay network and the identity
 * cache. Local writes are awaited; network work is handed to the task
 * queue unless its result is needed.
 */
export class RoundEngine {
  readonly config: AppConfig;
  readonly account: AccountState;
  readonly db: LocalDatabase;
  readonly courses: ContentAddressedCourseStore;
  readonly catalog: CourseCatalog;
  readonly rounds: RoundAggregate;
  readonly remoteScores: RemoteScoreCache;
  readonly publisher: EventPublisher;
  readonly poller: SyncPoller;
  readonly identity: IdentityCache;
  readonly inviter: DirectMessageInviter;
  readonly joiner: RoundJoinService;
  readonly tasks = new RoundTaskQueue();
  private readonly gateway: RelayGateway;

  private constructor(config: AppConfig, db: LocalDatabase, account: AccountState, gateway: RelayGateway, now: () => number) {
    this.config = config;
    this.account = account;
    this.gateway = gateway;
    const relays = config.relays;
    this.db = db;
    this.courses = new ContentAddressedCourseStore(this.db, now);
    this.catalog = new CourseCatalog({ db: this.db, gateway, relays, courses: this.courses, now });
    this.rounds = new RoundAggregate(this.db, now);
    this.remoteScores = new RemoteScoreCache(this.db);
    this.publisher = new EventPublisher({ rounds: this.rounds, gateway, account, relays, clientTag: config.clientTag, now });
    this.poller = new SyncPoller({ rounds: this.rounds, remoteScores: this.remoteScores, gateway, relays, now });
    this.identity = new IdentityCache({ db: this.db, gateway, relays, now });
    this.inviter = new DirectMessageInviter({
      rounds: this.rounds,
      gateway,
      directory: this.identity,
      account,
      relays,
      appName: config.clientTag,
      now,
    });
    this.joiner = new RoundJoinService({ rounds: this.rounds, gateway, relays });
  }

  static async open(options: RoundEngineOptions = {}): Promise<RoundEngine> {
    const config = loadConfig(options.config, options.env);
    const storage = options.storage ?? resolveStorage(config.dataDir);
    let account = options.account ?? (await new KeyManager(storage).loadOrCreate());
    if (config.readOnly) {
      account = readOnlyAccount(account.publicKey);
    }
    const database = options.database ?? LocalDatabase.inDirectory(config.dataDir);
    const gateway = options.gateway ?? new PoolRelayGateway({ timeoutMs: config.relays.timeoutMs });
    return new RoundEngine(config, database, account, gateway, options.now ?? (() => Date.now()));
  }

  /**
   * Stores the course and the round with the local player at index 0, then
   * publishes the round in the background.
   */
  async createRound(course: CourseInput, otherPlayers: readonly string[] = [], options: CreateRoundOptions = {}): Promise<Round> {
    const snapshot = await this.courses.getOrCreate(course);
    const round = await this.rounds.createRound(snapshot, [this.account.publicKey, ...otherPlayers], options);
    void this.tasks.run(round.roundId, 'publish initiation', (signal) =>
      this.publisher.publishInitiation(round.roundId, { signal }),
    );
    return round;
  }

  recordScore(roundId: number, playerIndex: number, holeNumber: number, strokes: number): Promise<HoleScoreRow> {
    return this.rounds.recordScore(roundId, playerIndex, holeNumber, strokes);
  }

  async session(roundId: number): Promise<ActiveRoundSession> {
    const session = new ActiveRoundSession(this.rounds, roundId);
    await session.load();
    return session;
  }

  listRounds(): Promise<RoundListItem[]> {
    return this.rounds.listRounds();
  }

  /**
   * Completes the round when the local player has scored every hole, then
   * publishes final records in the background.
   */
  async finishRound(roundId: number, options: FinishOptions = {}): Promise<FinishResult> {
    const session = await this.session(roundId);
    const result = await session.requestFinish();
    if (!result.ok || result.alreadyCompleted) {
      return result;
    }
    void this.tasks.run(roundId, 'publish final records', async (signal) => {
      await this.publisher.publishFinalRecords(roundId, { notes: options.notes, signal });
      await this.publisher.publishLiveScorecard(roundId, { signal });
      if (options.shareNote) {
        await this.publisher.publishShareNote(roundId, { signal });
      }
    });
    return result;
  }

  /** Pushes the local player's progress for other devices to poll. */
  publishProgress(roundId: number): Promise<void> {
    return this.tasks.run(roundId, 'publish live scorecard', (signal) =>
      this.publisher.publishLiveScorecard(roundId, { signal }),
    );
  }

  async summary(roundId: number): Promise<{ summary: RoundSummary; text: string }> {
    const context = await this.rounds.context(roundId);
    const scores = await this.rounds.currentScores(roundId, 0);
    const holes = context.course.holes;
    return {
      summary: buildRoundSummary(holes, scores),
      text: buildSummaryText({
        courseName: context.course.courseName,
        teeSetName: context.course.teeSetName,
        roundDate: context.round.roundDate,
        holes,
        scores,
      }),
    };
  }

  /** Invite token for a published round, or null while it has no initiation id. */
  async inviteToken(roundId: number): Promise<string | null> {
    const record = await this.rounds.getNetworkRecord(roundId);
    return record ? encodeInvite(record.initiationEventId, this.config.relays.publishRelays) : null;
  }

  /**
   * Waits for the round to be published, then sends invites. Aborting the
   * signal stops the wait and nothing is sent.
   */
  async sendInvites(roundId: number, options: SendInvitesOptions = {}): Promise<InviteDelivery[]> {
    const { recipients, ...wait } = options;
    const eventId = await this.poller.awaitInitiationRecord(roundId, wait);
    if (!eventId) {
      log.warn('invites not sent; round is not published', { roundId });
      return [];
    }
    return this.inviter.sendInvites(roundId, recipients);
  }

  fetchIncomingInvites(): Promise<IncomingInvite[]> {
    return this.inviter.fetchIncomingInvites();
  }

  joinRound(token: string): Promise<JoinOutcome> {
    return this.joiner.join(token, this.account.publicKey);
  }

  refreshRemoteScores(roundId: number): Promise<Map<string, RemoteScoreSnapshot>> {
    return this.poller.refreshRemoteScores(roundId);
  }

  fetchFinalRecords(roundId: number): Promise<CombinedPlayerResult[]> {
    return this.poller.fetchFinalRecords(roundId);
  }

  resolveProfiles(keys: readonly string[], onPaint?: ProfilePaint): Promise<Map<string, Profile>> {
    return this.identity.resolveProfiles(keys, onPaint);
  }

  /**
   * Cancels background work and closes the database and relay connections.
   * Publishes in flight are abandoned rather than awaited; an initiation
   * already sent still records its id first.
   */
  async close(): Promise<void> {
    this.tasks.cancelAll();
    await this.tasks.idle();
    this.db.close();
    this.gateway.close();
  }
}
