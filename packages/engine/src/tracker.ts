// packages/engine/src/tracker.ts
import { toError } from '@cmsync/utils';

import type { ResourceUpdate, UpdateDispatcher } from './dispatcher.js';
import type { Logger } from './log.js';

export type SubscriptionTrackerDeps = {
  dispatcher: UpdateDispatcher;
  contains: (resourceId: string) => boolean;
  sync: (resourceId: string) => Promise<boolean>;
  logger: Logger;
};

/**
 * First read of a resource registers its internal observer and, when nothing is
 * cached for it yet, starts one background sync. Later reads are plain lookups.
 * A first sync refused for lack of a session is retried by whoever syncs
 * `observedIds()` once the session exists.
 *
 * The internal observer bumps `revision(resourceId)` on every delivered update.
 */
export class SubscriptionTracker {
  private readonly observed = new Set<string>();
  private readonly revisions = new Map<string, number>();
  private readonly observer = (update: ResourceUpdate): void => {
    this.revisions.set(update.resourceId, this.revision(update.resourceId) + 1);
  };

  constructor(private readonly deps: SubscriptionTrackerDeps) {}

  ensureObserved(resourceId: string): void {
    if (this.observed.has(resourceId)) return;
    this.observed.add(resourceId);

    this.deps.dispatcher.registerInternal(resourceId, this.observer);

    if (!this.deps.contains(resourceId)) {
      this.deps.sync(resourceId).catch((e: unknown) => {
        this.deps.logger.error(`initial sync of "${resourceId}" failed: ${toError(e).message}`);
      });
    }
  }

  isObserved(resourceId: string): boolean {
    return this.observed.has(resourceId);
  }

  /** Every id read since the last reset, synced or not. */
  observedIds(): string[] {
    return Array.from(this.observed);
  }

  revision(resourceId: string): number {
    return this.revisions.get(resourceId) ?? 0;
  }

  /** Forget observed flags; revision counters keep counting. */
  reset(): void {
    this.observed.clear();
  }
}
