// packages/engine/src/poll.ts
import { toError } from '@cmsync/utils';

import type { Logger } from './log.js';

export const MIN_POLL_INTERVAL_SECONDS = 60;
export const MAX_POLL_INTERVAL_SECONDS = 600;
export const DEFAULT_POLL_INTERVAL_SECONDS = 300;

/** Starts a repeating timer and returns the function that stops it. */
export type IntervalTimer = (fn: () => void, ms: number) => () => void;

const nodeInterval: IntervalTimer = (fn, ms) => {
  const id = setInterval(fn, ms);
  id.unref();
  return () => clearInterval(id);
};

export function clampPollInterval(seconds?: number): number {
  if (seconds === undefined || !Number.isFinite(seconds)) return DEFAULT_POLL_INTERVAL_SECONDS;
  return Math.min(MAX_POLL_INTERVAL_SECONDS, Math.max(MIN_POLL_INTERVAL_SECONDS, seconds));
}

export type PollSchedulerOptions = {
  intervalSeconds?: number;
  tick: () => Promise<unknown>;
  logger: Logger;
  timer?: IntervalTimer;
};

/** Periodic `syncIfOutdated`, independent of the realtime channel. */
export class PollScheduler {
  readonly intervalSeconds: number;
  private readonly tick: () => Promise<unknown>;
  private readonly log: Logger;
  private readonly timer: IntervalTimer;
  private stopTimer: (() => void) | null = null;

  constructor(opts: PollSchedulerOptions) {
    this.intervalSeconds = clampPollInterval(opts.intervalSeconds);
    this.tick = opts.tick;
    this.log = opts.logger;
    this.timer = opts.timer ?? nodeInterval;
  }

  get running(): boolean {
    return this.stopTimer !== null;
  }

  start(): void {
    if (this.stopTimer) return;
    this.stopTimer = this.timer(() => this.fire('interval'), this.intervalSeconds * 1000);
    this.log.debug(`polling every ${this.intervalSeconds}s`);
  }

  stop(): void {
    this.stopTimer?.();
    this.stopTimer = null;
  }

  /** The host came back to the foreground; check everything now. */
  notifyForeground(): void {
    this.fire('foreground');
  }

  private fire(reason: 'interval' | 'foreground'): void {
    this.log.debug(`poll (${reason})`);
    this.tick().catch((e: unknown) => {
      this.log.error(`poll (${reason}) failed: ${toError(e).message}`);
    });
  }
}
