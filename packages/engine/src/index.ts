// packages/engine/src/index.ts
//
// Public exports for @cmsync/engine.

export { ContentClient, createContentClient, NOT_FOUND } from './client.js';
export type { EngineOptions, SetLanguageOptions } from './client.js';

export { SyncCoordinator, resourceKindOf, DEFAULT_REQUEST_TIMEOUT_MS } from './sync.js';
export type { SyncCoordinatorDeps } from './sync.js';

export { UpdateDispatcher } from './dispatcher.js';
export type { ResourceUpdate, UpdateHandler, AnyUpdateHandler, Scheduler } from './dispatcher.js';

export { SubscriptionTracker } from './tracker.js';
export type { SubscriptionTrackerDeps } from './tracker.js';

export {
  PollScheduler,
  clampPollInterval,
  MIN_POLL_INTERVAL_SECONDS,
  MAX_POLL_INTERVAL_SECONDS,
  DEFAULT_POLL_INTERVAL_SECONDS,
} from './poll.js';
export type { IntervalTimer, PollSchedulerOptions } from './poll.js';

export { RealtimeChannel, socketIoFactory, ALL_RESOURCES, HANDSHAKE_ACK_TIMEOUT_MS } from './realtime.js';
export type { RealtimeState, RealtimeSocket, SocketFactory, RealtimeChannelOptions } from './realtime.js';

export { Logger, consoleSink, silentSink } from './log.js';
export type { LogLevel, LogSink, LoggerOptions } from './log.js';

export {
  DEFAULT_LANGUAGE,
  ensureConfigDefaults,
  readConfig,
  writeConfig,
  patchConfig,
} from './config_store.js';
export type { LocalConfigV1 } from './config_store.js';
