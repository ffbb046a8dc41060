// packages/engine/src/sync.ts
import {
  COLORS_RESOURCE_ID,
  COLOR_SLOT,
  IMAGES_RESOURCE_ID,
  IMAGE_SLOT,
  type ContentCacheStore,
  type SnapshotWriter,
} from '@cmsync/content-state';
import {
  HttpStatusError,
  type ContentGateway,
  type HttpTransport,
  type ResourceKind,
  type ResourcePayload,
} from '@cmsync/gateway';
import { toError, withTimeout } from '@cmsync/utils';

import type { ResourceUpdate, UpdateDispatcher } from './dispatcher.js';
import type { Logger } from './log.js';

export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

export type SyncCoordinatorDeps = {
  cache: ContentCacheStore;
  gateway: ContentGateway;
  transport: HttpTransport;
  dispatcher: UpdateDispatcher;
  writer: SnapshotWriter;
  getLanguage: () => string;
  logger: Logger;
  requestTimeoutMs?: number;
};

export function resourceKindOf(cache: ContentCacheStore, resourceId: string): ResourceKind {
  if (resourceId === COLORS_RESOURCE_ID) return 'color';
  if (resourceId === IMAGES_RESOURCE_ID) return 'image';
  return cache.isStore(resourceId) ? 'store' : 'translation';
}

/**
 * Fetch, merge and announce one resource at a time per id.
 *
 * A second `sync` for an id that is already in flight resolves to false at once.
 * Failures leave the cache untouched. Results of syncs started before
 * `invalidate()` are dropped.
 */
export class SyncCoordinator {
  private readonly inFlight = new Map<string, Promise<boolean>>();
  private readonly timeoutMs: number;
  private readonly log: Logger;
  private epoch = 0;

  constructor(private readonly deps: SyncCoordinatorDeps) {
    this.timeoutMs = deps.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.log = deps.logger;
  }

  sync(resourceId: string): Promise<boolean> {
    if (this.inFlight.has(resourceId)) {
      this.log.debug(`${resourceId}: already in flight`);
      return Promise.resolve(false);
    }

    const run: Promise<boolean> = this.fetchAndApply(resourceId).finally(() => {
      if (this.inFlight.get(resourceId) === run) this.inFlight.delete(resourceId);
    });
    this.inFlight.set(resourceId, run);
    return run;
  }

  /** Sync each id independently; resolves with every id's result. */
  async syncMany(resourceIds: Iterable<string>): Promise<Record<string, boolean>> {
    const ids = Array.from(new Set(resourceIds));
    const results = await Promise.all(ids.map(async (id): Promise<[string, boolean]> => [id, await this.sync(id)]));
    return Object.fromEntries(results);
  }

  isInFlight(resourceId: string): boolean {
    return this.inFlight.has(resourceId);
  }

  /** Resolves once no sync is in flight. */
  async idle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight.values()));
    }
  }

  /** Forget in-flight syncs; whatever they fetch is discarded. */
  invalidate(): void {
    this.epoch += 1;
    this.inFlight.clear();
  }

  /** Cached values of `resourceId` in the shape handed to update handlers. */
  resolve(resourceId: string): ResourceUpdate {
    const { cache } = this.deps;

    switch (resourceKindOf(cache, resourceId)) {
      case 'store':
        return { resourceId, kind: 'records', records: cache.getRecords(resourceId) };
      case 'color':
        return { resourceId, kind: 'entries', values: cache.getAll(resourceId, COLOR_SLOT) };
      case 'image':
        return { resourceId, kind: 'entries', values: cache.getAll(resourceId, IMAGE_SLOT) };
      case 'translation':
        return { resourceId, kind: 'entries', values: cache.getAll(resourceId, this.deps.getLanguage()) };
    }
  }

  private async fetchAndApply(resourceId: string): Promise<boolean> {
    const { gateway, transport } = this.deps;
    const epoch = this.epoch;

    const kind = resourceKindOf(this.deps.cache, resourceId);
    const prepared = gateway.buildResourceRequest(kind, resourceId);
    if (!prepared) {
      this.log.debug(`${resourceId}: not configured, skipping`);
      return false;
    }

    let payload: ResourcePayload;
    try {
      const res = await withTimeout(
        transport.send(prepared.request, { timeoutMs: this.timeoutMs }),
        this.timeoutMs,
        `sync ${resourceId} timed out`
      );

      if (res.status === 404 && prepared.notFound) {
        payload = prepared.notFound();
      } else if (res.status < 200 || res.status >= 300) {
        throw new HttpStatusError(res.status, prepared.request.url);
      } else {
        payload = prepared.parse(res.body);
      }
    } catch (e) {
      this.log.warn(`${resourceId}: sync failed: ${toError(e).message}`);
      return false;
    }

    if (epoch !== this.epoch) {
      this.log.debug(`${resourceId}: cache was cleared during sync, result dropped`);
      return false;
    }

    this.apply(resourceId, payload);
    return true;
  }

  private apply(resourceId: string, payload: ResourcePayload): void {
    const { cache, writer, dispatcher } = this.deps;

    if (payload.kind === 'records') {
      cache.replaceRecords(resourceId, payload.records);
      this.log.debug(`${resourceId}: ${payload.records.length} records`);
    } else {
      cache.replace(resourceId, payload.entries);
      this.log.debug(`${resourceId}: ${Object.keys(payload.entries).length} keys`);
    }

    cache.markKnown(resourceId);
    writer.request();
    dispatcher.notify(this.resolve(resourceId));
  }
}
