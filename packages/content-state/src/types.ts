import type { CacheSnapshot, ResourceEntries, DataRecord } from './state.js';

export type CacheFileSchemaVersion = 1;

/** On-disk layout of `cache.json`. The known-resource list lives in its own file. */
export type CacheFile = {
  schemaVersion: CacheFileSchemaVersion;
  updatedAt: string; // ISO
  entries: Record<string, ResourceEntries>;
  records: Record<string, DataRecord[]>;
  stores: string[];
};

export interface SnapshotStore {
  load(): Promise<CacheSnapshot>;
  save(snapshot: CacheSnapshot): Promise<void>;
  remove(): Promise<void>;
}

export type StorageIssue = {
  file: string;
  action: 'discarded' | 'remove-failed';
  error: Error;
};
