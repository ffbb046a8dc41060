import { strict as assert } from 'node:assert';
import { describe, it } from 'node:test';
import { setImmediate as nextTurn } from 'node:timers/promises';

import type { LogLevel } from '../log.js';
import { PollScheduler, clampPollInterval } from '../poll.js';
import { recordingLogger } from './fakes.js';

describe('clampPollInterval', () => {
  it('keeps the interval within 60..600 seconds', () => {
    assert.equal(clampPollInterval(), 300);
    assert.equal(clampPollInterval(Number.NaN), 300);
    assert.equal(clampPollInterval(5), 60);
    assert.equal(clampPollInterval(120), 120);
    assert.equal(clampPollInterval(3600), 600);
  });
});

describe('PollScheduler', () => {
  it('fires the tick on the timer and on foreground', () => {
    const fns: (() => void)[] = [];
    const intervals: number[] = [];
    let ticks = 0;

    const poll = new PollScheduler({
      intervalSeconds: 90,
      logger: recordingLogger(),
      tick: async () => {
        ticks += 1;
      },
      timer: (fn, ms) => {
        fns.push(fn);
        intervals.push(ms);
        return () => {};
      },
    });

    poll.start();
    poll.start();
    assert.deepEqual(intervals, [90_000]);
    assert.equal(poll.running, true);

    fns[0]?.();
    fns[0]?.();
    poll.notifyForeground();
    assert.equal(ticks, 3);
  });

  it('stop cancels the timer', () => {
    let cancelled = 0;
    const poll = new PollScheduler({
      logger: recordingLogger(),
      tick: async () => {},
      timer: () => () => {
        cancelled += 1;
      },
    });

    poll.start();
    poll.stop();
    poll.stop();
    assert.equal(cancelled, 1);
    assert.equal(poll.running, false);
  });

  it('logs a failing tick', async () => {
    const lines: [LogLevel, string][] = [];
    const poll = new PollScheduler({
      logger: recordingLogger(lines, 'poll'),
      tick: async () => {
        throw new Error('offline');
      },
    });

    poll.notifyForeground();
    await nextTurn();
    assert.deepEqual(lines, [['error', '[cmsync:poll] poll (foreground) failed: offline']]);
  });
});
