// packages/engine/src/dispatcher.ts
import { EventEmitter } from 'eventemitter3';

import type { DataRecord } from '@cmsync/content-state';
import { toError } from '@cmsync/utils';

import type { Logger } from './log.js';

/** Values of one resource resolved for the active language. */
export type ResourceUpdate =
  | { resourceId: string; kind: 'entries'; values: Record<string, string> }
  | { resourceId: string; kind: 'records'; records: DataRecord[] };

export type UpdateHandler = (update: ResourceUpdate) => void;
export type AnyUpdateHandler = (resourceId: string) => void;

/** Runs a task later on the delivery context. */
export type Scheduler = (task: () => void) => void;

type DispatcherEvents = {
  updated: [resourceId: string];
};

function addTo(map: Map<string, Set<UpdateHandler>>, resourceId: string, handler: UpdateHandler): void {
  const set = map.get(resourceId) ?? new Set<UpdateHandler>();
  set.add(handler);
  map.set(resourceId, set);
}

/**
 * Delivers committed cache changes.
 *
 * Notifications are queued and drained in order on `schedule`, never inside the
 * caller's stack. Per update: internal observers, then application handlers for
 * that resource, then the `updated` broadcast. A throwing handler is logged and the
 * remaining ones still run.
 */
export class UpdateDispatcher {
  private readonly bus = new EventEmitter<DispatcherEvents>();
  private readonly internal = new Map<string, Set<UpdateHandler>>();
  private readonly handlers = new Map<string, Set<UpdateHandler>>();
  private readonly queue: ResourceUpdate[] = [];
  private readonly schedule: Scheduler;
  private readonly log: Logger;

  private scheduled = false;
  private idleWaiters: (() => void)[] = [];

  constructor(opts: { logger: Logger; schedule?: Scheduler }) {
    this.log = opts.logger;
    this.schedule = opts.schedule ?? queueMicrotask;
  }

  /** Idempotent: the same handler is registered at most once per resource. */
  registerInternal(resourceId: string, handler: UpdateHandler): void {
    addTo(this.internal, resourceId, handler);
  }

  onUpdated(resourceId: string, handler: UpdateHandler): () => void {
    addTo(this.handlers, resourceId, handler);
    return () => {
      this.handlers.get(resourceId)?.delete(handler);
    };
  }

  onAnyUpdate(handler: AnyUpdateHandler): () => void {
    this.bus.on('updated', handler);
    return () => {
      this.bus.off('updated', handler);
    };
  }

  notify(update: ResourceUpdate): void {
    this.queue.push(update);
    if (this.scheduled) return;

    this.scheduled = true;
    this.schedule(() => this.drain());
  }

  /** Resolves once every queued notification has been delivered. */
  idle(): Promise<void> {
    if (!this.scheduled) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private drain(): void {
    let update = this.queue.shift();
    while (update) {
      this.deliver(update);
      update = this.queue.shift();
    }

    this.scheduled = false;
    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const w of waiters) w();
  }

  private deliver(update: ResourceUpdate): void {
    const { resourceId } = update;

    for (const h of [...(this.internal.get(resourceId) ?? [])]) this.invoke(resourceId, () => h(update));
    for (const h of [...(this.handlers.get(resourceId) ?? [])]) this.invoke(resourceId, () => h(update));
    for (const h of this.bus.listeners('updated')) this.invoke(resourceId, () => h(resourceId));
  }

  private invoke(resourceId: string, fn: () => void): void {
    try {
      fn();
    } catch (e) {
      this.log.error(`update handler for "${resourceId}" threw: ${toError(e).message}`);
    }
  }
}
