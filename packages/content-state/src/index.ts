// packages/content-state/src/index.ts
//
// Public exports for @cmsync/content-state.

export {
  COLORS_RESOURCE_ID,
  IMAGES_RESOURCE_ID,
  RESERVED_RESOURCE_IDS,
  COLOR_SLOT,
  IMAGE_SLOT,
} from './state.js';

export type {
  ResourceEntries,
  TypedValue,
  TypedValueKind,
  DataRecord,
  CacheSnapshot,
} from './state.js';

export type { CacheFile, SnapshotStore, StorageIssue } from './types.js';

export {
  SnapshotFormatError,
  emptySnapshot,
  toTypedValue,
  resolveTypedValue,
  normalizeRecord,
  normalizeEntries,
  normalizeCacheFile,
  normalizeKnownResources,
} from './helpers.js';

export { ContentCacheStore } from './store.js';
export { SnapshotFileStore, SnapshotWriter } from './filestore.js';
export type { SnapshotFileStoreOptions } from './filestore.js';

export {
  DEFAULT_STORAGE_DIRNAME,
  CACHE_FILENAME,
  KNOWN_RESOURCES_FILENAME,
  CONFIG_FILENAME,
  STORAGE_HOME_ENV,
  resolveStoragePaths,
} from './io.js';
export type { StoragePaths } from './io.js';
