// packages/engine/src/client.ts
import {
  COLORS_RESOURCE_ID,
  COLOR_SLOT,
  ContentCacheStore,
  IMAGES_RESOURCE_ID,
  IMAGE_SLOT,
  RESERVED_RESOURCE_IDS,
  SnapshotFileStore,
  SnapshotWriter,
  resolveStoragePaths,
  type DataRecord,
  type StoragePaths,
} from '@cmsync/content-state';
import {
  ContentGateway,
  FetchTransport,
  HmacRequestSigner,
  HttpStatusError,
  type AuthResult,
  type Credentials,
  type HttpTransport,
  type PreparedRequest,
  type RequestSigner,
} from '@cmsync/gateway';
import { toError, withTimeout } from '@cmsync/utils';

import { ensureConfigDefaults, patchConfig, readConfig, writeConfig, type LocalConfigV1 } from './config_store.js';
import { UpdateDispatcher, type AnyUpdateHandler, type Scheduler, type UpdateHandler } from './dispatcher.js';
import { Logger } from './log.js';
import { PollScheduler, type IntervalTimer } from './poll.js';
import { RealtimeChannel, type RealtimeState, type SocketFactory } from './realtime.js';
import { DEFAULT_REQUEST_TIMEOUT_MS, SyncCoordinator } from './sync.js';
import { SubscriptionTracker } from './tracker.js';

/** Returned by `translation` when the key is not cached. */
export const NOT_FOUND = '';

export type EngineOptions = {
  /** REST root, e.g. `https://cms.example.com/api/sdk`. */
  baseUrl: string;
  /** Push server; defaults to the origin of `baseUrl`. */
  socketUrl?: string;

  storageDir?: string;
  cwd?: string;
  env?: Record<string, string | undefined>;

  pollIntervalSeconds?: number;
  requestTimeoutMs?: number;
  debugLogs?: boolean;

  /** Poll timer and realtime channel; off for one-shot tools. Default true. */
  background?: boolean;

  transport?: HttpTransport;
  socketFactory?: SocketFactory;
  signerFactory?: (projectSecret: string) => RequestSigner;
  schedule?: Scheduler;
  pollTimer?: IntervalTimer;
  logger?: Logger;
};

export type SetLanguageOptions = {
  force?: boolean;
};

function union(...lists: readonly (readonly string[])[]): string[] {
  return Array.from(new Set(lists.flat()));
}

/**
 * Content cache, sync engine and realtime listener for one project.
 *
 * Construct once, `start()`, read through the accessors, `close()` on shutdown.
 * Reads are synchronous cache lookups; the first read of a resource subscribes
 * it and fetches it when nothing is cached yet.
 */
export class ContentClient {
  readonly paths: StoragePaths;

  private readonly log: Logger;
  private readonly background: boolean;
  private readonly requestTimeoutMs: number;
  private readonly transport: HttpTransport;
  private readonly signerFactory: (projectSecret: string) => RequestSigner;

  private readonly cache = new ContentCacheStore();
  private readonly fileStore: SnapshotFileStore;
  private readonly writer: SnapshotWriter;
  private readonly gateway: ContentGateway;
  private readonly dispatcher: UpdateDispatcher;
  private readonly coordinator: SyncCoordinator;
  private readonly tracker: SubscriptionTracker;
  private readonly poll: PollScheduler;
  private readonly channel: RealtimeChannel;

  private config: LocalConfigV1 = ensureConfigDefaults(null);
  private starting: Promise<void> | null = null;
  private closed = false;

  constructor(opts: EngineOptions) {
    this.log = opts.logger ?? new Logger({ debug: opts.debugLogs ?? false });
    this.background = opts.background ?? true;
    this.requestTimeoutMs = opts.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.transport = opts.transport ?? new FetchTransport();
    this.signerFactory = opts.signerFactory ?? ((secret) => new HmacRequestSigner(secret));

    const cwd = opts.cwd ?? process.cwd();
    this.paths = resolveStoragePaths({ cwd, storageDir: opts.storageDir, env: opts.env });

    const storeLog = this.log.child('store');
    this.fileStore = new SnapshotFileStore({
      cacheFile: this.paths.cacheFile,
      knownResourcesFile: this.paths.knownResourcesFile,
      onIssue: (issue) => storeLog.warn(`${issue.file}: ${issue.action}: ${issue.error.message}`),
    });
    this.writer = new SnapshotWriter(
      this.fileStore,
      () => this.cache.snapshot(),
      (e) => storeLog.error(`saving cache failed: ${e.message}`)
    );

    this.gateway = new ContentGateway({ baseUrl: opts.baseUrl });
    this.dispatcher = new UpdateDispatcher({ logger: this.log.child('dispatch'), schedule: opts.schedule });

    this.coordinator = new SyncCoordinator({
      cache: this.cache,
      gateway: this.gateway,
      transport: this.transport,
      dispatcher: this.dispatcher,
      writer: this.writer,
      getLanguage: () => this.config.language,
      logger: this.log.child('sync'),
      requestTimeoutMs: this.requestTimeoutMs,
    });

    this.tracker = new SubscriptionTracker({
      dispatcher: this.dispatcher,
      contains: (id) => this.cache.contains(id),
      sync: (id) => this.coordinator.sync(id),
      logger: this.log,
    });

    this.poll = new PollScheduler({
      intervalSeconds: opts.pollIntervalSeconds,
      tick: () => this.syncIfOutdated(),
      logger: this.log.child('poll'),
      timer: opts.pollTimer,
    });

    this.channel = new RealtimeChannel({
      url: opts.socketUrl ?? new URL(opts.baseUrl).origin,
      logger: this.log.child('realtime'),
      socketFactory: opts.socketFactory,
      handshake: () => this.gateway.handshakePayload(),
      onResourceUpdated: (id) => this.runInBackground(`push ${id}`, this.coordinator.sync(id)),
      onResyncAll: () => this.runInBackground('push __ALL__', this.syncIfOutdated()),
      onAcknowledged: () => this.runInBackground('catch-up', this.coordinator.syncMany(this.trackedResources())),
    });
    this.channel.on('state', (state) => this.log.debug(`realtime: ${state}`));
  }

  // ---------------------------------------------------------------------------
  // lifecycle
  // ---------------------------------------------------------------------------

  /** Load the local config and cache snapshot, then start polling and the push channel. */
  start(): Promise<void> {
    this.starting ??= this.load();
    return this.starting;
  }

  /** Stop background work and wait for pending syncs, deliveries and writes. */
  async close(): Promise<void> {
    this.closed = true;
    this.poll.stop();
    this.channel.stop();
    await this.idle();
  }

  /** Resolves once no sync is in flight, every update is delivered and the cache is saved. */
  async idle(): Promise<void> {
    await this.coordinator.idle();
    await this.dispatcher.idle();
    await this.writer.flush();
  }

  private async load(): Promise<void> {
    const stored = readConfig({
      configFile: this.paths.configFile,
      onCorrupt: (e) => this.log.warn(`ignoring unreadable config ${this.paths.configFile}: ${e.message}`),
    });
    this.config = stored ?? ensureConfigDefaults(null);

    this.cache.restore(await this.fileStore.load());
    for (const id of this.config.stores) this.cache.markStore(id);

    const { projectId, authToken, projectSecret } = this.config;
    if (projectId && authToken) this.openSession(projectId, authToken, projectSecret);

    if (this.background && !this.closed) {
      this.poll.start();
      if (this.gateway.isConfigured()) this.channel.start();
    }
  }

  // ---------------------------------------------------------------------------
  // auth
  // ---------------------------------------------------------------------------

  /**
   * Authenticate against `POST /auth` and store the session in `config.json`.
   * Resolves to false (and logs) when the server rejects the credentials or
   * cannot be reached.
   */
  async configure(credentials: Credentials): Promise<boolean> {
    await this.start();

    let signer: RequestSigner | null;
    try {
      signer = credentials.projectSecret ? this.signerFactory(credentials.projectSecret) : null;
    } catch (e) {
      this.log.error(`configure: ${toError(e).message}`);
      return false;
    }

    const prepared = this.gateway.buildAuthRequest(credentials, signer);
    let auth: AuthResult;
    try {
      auth = await this.send(prepared, 'auth');
    } catch (e) {
      this.log.error(`configure: ${toError(e).message}`);
      return false;
    }

    this.config = patchConfig(this.config, {
      projectId: credentials.projectId,
      authToken: auth.token,
      projectSecret: credentials.projectSecret,
      availableLanguages: auth.availableLanguages,
      stores: union(this.config.stores, auth.stores),
    });
    this.saveConfig();

    for (const id of auth.stores) this.cache.markStore(id);
    let learned = false;
    for (const id of auth.tabs) learned = this.cache.markKnown(id) || learned;
    if (learned) this.writer.request();

    this.channel.stop();
    this.openSession(credentials.projectId, auth.token, credentials.projectSecret);
    if (this.background && !this.closed) {
      this.poll.start();
      this.channel.start();
    }

    this.log.info(`configured project ${credentials.projectId}`);
    this.runInBackground('initial sync', this.syncIfOutdated());
    return true;
  }

  isConfigured(): boolean {
    return this.gateway.isConfigured();
  }

  projectId(): string | null {
    return this.gateway.projectId;
  }

  private openSession(projectId: string, token: string, projectSecret: string | undefined): void {
    let signer: RequestSigner | null = null;
    if (projectSecret) {
      try {
        signer = this.signerFactory(projectSecret);
      } catch (e) {
        this.log.error(`request signing disabled: ${toError(e).message}`);
      }
    }
    this.gateway.configure({ projectId, token }, signer);
  }

  private async send<T>(prepared: PreparedRequest<T>, label: string): Promise<T> {
    const res = await withTimeout(
      this.transport.send(prepared.request, { timeoutMs: this.requestTimeoutMs }),
      this.requestTimeoutMs,
      `${label} timed out`
    );
    if (res.status < 200 || res.status >= 300) throw new HttpStatusError(res.status, prepared.request.url);
    return prepared.parse(res.body);
  }

  // ---------------------------------------------------------------------------
  // reads
  // ---------------------------------------------------------------------------

  /** Value of `key` in `resourceId` for the active language, or NOT_FOUND. */
  translation(key: string, resourceId: string): string {
    this.tracker.ensureObserved(resourceId);
    return this.cache.get(resourceId, key, this.config.language) ?? NOT_FOUND;
  }

  colorValue(key: string): string | undefined {
    this.tracker.ensureObserved(COLORS_RESOURCE_ID);
    return this.cache.get(COLORS_RESOURCE_ID, key, COLOR_SLOT);
  }

  imageURL(key: string): string | undefined {
    this.tracker.ensureObserved(IMAGES_RESOURCE_ID);
    return this.cache.get(IMAGES_RESOURCE_ID, key, IMAGE_SLOT);
  }

  /** Records of a data store; the id is remembered as a store from here on. */
  getRecords(storeId: string): DataRecord[] {
    this.cache.markStore(storeId);
    this.tracker.ensureObserved(storeId);
    return this.cache.getRecords(storeId);
  }

  /** Languages announced by the server, else the ones found in cached translations. */
  availableLanguages(): string[] {
    return this.config.availableLanguages.length > 0 ? [...this.config.availableLanguages] : this.cache.languages();
  }

  /** Ask the server for the project's languages and remember them. */
  async refreshLanguages(): Promise<string[]> {
    const prepared = this.gateway.buildLanguagesRequest();
    if (!prepared) return this.availableLanguages();

    try {
      const languages = await this.send(prepared, 'languages');
      this.config = patchConfig(this.config, { availableLanguages: languages });
      this.saveConfig();
    } catch (e) {
      this.log.warn(`languages: ${toError(e).message}`);
    }
    return this.availableLanguages();
  }

  isResourceSynced(resourceId: string): boolean {
    return this.cache.knownResources().includes(resourceId);
  }

  /** Bumped each time an update for `resourceId` is delivered. */
  revision(resourceId: string): number {
    return this.tracker.revision(resourceId);
  }

  /** Resource ids that were synced before, hold cached content, were read, or are announced stores. */
  trackedResources(): string[] {
    return union(
      this.cache.knownResources(),
      this.cache.resourceIds(),
      this.tracker.observedIds(),
      this.config.stores
    );
  }

  // ---------------------------------------------------------------------------
  // language
  // ---------------------------------------------------------------------------

  getLanguage(): string {
    return this.config.language;
  }

  /**
   * Switch the active language. Cached values are dispatched under the new
   * language right away; resolves after the follow-up syncs have all settled.
   */
  async setLanguage(lang: string, opts: SetLanguageOptions = {}): Promise<void> {
    const next = lang.trim();
    if (!next) {
      this.log.warn('setLanguage: empty language code ignored');
      return;
    }
    if (next === this.config.language && !opts.force) return;

    this.config = patchConfig(this.config, { language: next });
    this.saveConfig();

    const runs = this.trackedResources().map((id) => {
      this.dispatcher.notify(this.coordinator.resolve(id));
      return this.coordinator.sync(id);
    });
    await Promise.allSettled(runs);
  }

  // ---------------------------------------------------------------------------
  // sync
  // ---------------------------------------------------------------------------

  sync(resourceId: string): Promise<boolean> {
    return this.coordinator.sync(resourceId);
  }

  /** Sync every tracked resource plus colors and images. */
  syncIfOutdated(): Promise<Record<string, boolean>> {
    return this.coordinator.syncMany(union(this.trackedResources(), RESERVED_RESOURCE_IDS));
  }

  notifyForeground(): void {
    this.poll.notifyForeground();
  }

  onUpdated(resourceId: string, handler: UpdateHandler): () => void {
    return this.dispatcher.onUpdated(resourceId, handler);
  }

  onAnyUpdate(handler: AnyUpdateHandler): () => void {
    return this.dispatcher.onAnyUpdate(handler);
  }

  /** Empty the cache, forget subscriptions and in-flight syncs, delete the snapshot files. */
  async clearCache(): Promise<void> {
    this.coordinator.invalidate();
    this.tracker.reset();
    this.cache.clear();
    for (const id of this.config.stores) this.cache.markStore(id);

    try {
      await this.writer.clear();
    } catch (e) {
      this.log.error(`clearing cache files failed: ${toError(e).message}`);
    }
  }

  // ---------------------------------------------------------------------------
  // realtime
  // ---------------------------------------------------------------------------

  isConnected(): boolean {
    return this.channel.isConnected();
  }

  get connectionState(): RealtimeState {
    return this.channel.state;
  }

  private saveConfig(): void {
    try {
      writeConfig({ configFile: this.paths.configFile, config: this.config });
    } catch (e) {
      this.log.error(`writing ${this.paths.configFile} failed: ${toError(e).message}`);
    }
  }

  private runInBackground(what: string, p: Promise<unknown>): void {
    p.catch((e: unknown) => this.log.error(`${what}: ${toError(e).message}`));
  }
}

export function createContentClient(opts: EngineOptions): ContentClient {
  return new ContentClient(opts);
}
