import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import { errorCode, toError } from '@cmsync/utils';

import type { CacheSnapshot } from './state.js';
import type { SnapshotStore, StorageIssue } from './types.js';
import { emptySnapshot, normalizeCacheFile, normalizeKnownResources, toCacheFile } from './helpers.js';

export type SnapshotFileStoreOptions = {
  cacheFile: string;
  knownResourcesFile: string;

  /** Called when an artifact is unreadable and gets discarded. */
  onIssue?: (issue: StorageIssue) => void;
};

async function writeFileAtomic(filename: string, json: string): Promise<void> {
  await fs.mkdir(path.dirname(filename), { recursive: true });

  const tmp = `${filename}.tmp`;
  await fs.writeFile(tmp, json, 'utf8');
  await fs.rename(tmp, filename);
}

/**
 * Persists a CacheSnapshot as `cache.json` + `tabs.json`.
 *
 * Writes go to a temp file and are renamed over the target. A file that cannot be
 * read back (bad JSON, wrong shape, unreadable) is deleted and treated as empty.
 */
export class SnapshotFileStore implements SnapshotStore {
  public readonly cacheFile: string;
  public readonly knownResourcesFile: string;
  private readonly onIssue: (issue: StorageIssue) => void;

  constructor(opts: SnapshotFileStoreOptions) {
    this.cacheFile = opts.cacheFile;
    this.knownResourcesFile = opts.knownResourcesFile;
    this.onIssue = opts.onIssue ?? (() => {});
  }

  async load(): Promise<CacheSnapshot> {
    const out = emptySnapshot();

    const cache = await this.readArtifact(this.cacheFile, normalizeCacheFile);
    if (cache) {
      out.entries = cache.entries;
      out.records = cache.records;
      out.stores = cache.stores;
    }

    const known = await this.readArtifact(this.knownResourcesFile, normalizeKnownResources);
    if (known) out.knownResources = known;

    return out;
  }

  async save(snapshot: CacheSnapshot): Promise<void> {
    await writeFileAtomic(this.cacheFile, JSON.stringify(toCacheFile(snapshot), null, 2));
    await writeFileAtomic(this.knownResourcesFile, JSON.stringify(snapshot.knownResources, null, 2));
  }

  async remove(): Promise<void> {
    await fs.rm(this.cacheFile, { force: true });
    await fs.rm(this.knownResourcesFile, { force: true });
  }

  private async readArtifact<T>(filename: string, normalize: (raw: unknown) => T): Promise<T | null> {
    let raw: string;
    try {
      raw = await fs.readFile(filename, 'utf8');
    } catch (e) {
      if (errorCode(e) === 'ENOENT') return null;
      await this.discard(filename, toError(e));
      return null;
    }

    try {
      return normalize(JSON.parse(raw));
    } catch (e) {
      await this.discard(filename, toError(e));
      return null;
    }
  }

  private async discard(filename: string, error: Error): Promise<void> {
    this.onIssue({ file: filename, action: 'discarded', error });
    try {
      await fs.rm(filename, { force: true });
    } catch (e) {
      this.onIssue({ file: filename, action: 'remove-failed', error: toError(e) });
    }
  }
}

/**
 * Single writer in front of a SnapshotStore.
 *
 * At most one save runs at a time. Requests that arrive during a save collapse
 * into one follow-up save, and `capture` is called when that save starts, so it
 * always writes the latest state.
 */
export class SnapshotWriter {
  private writing: Promise<void> | null = null;
  private pending = false;
  private clearing = false;

  constructor(
    private readonly store: SnapshotStore,
    private readonly capture: () => CacheSnapshot,
    private readonly onError: (error: Error) => void
  ) {}

  request(): void {
    if (this.writing) {
      this.pending = true;
      return;
    }
    this.writing = this.drain(null);
  }

  /** Resolves once no save is running or queued. */
  async flush(): Promise<void> {
    while (this.writing) await this.writing;
  }

  /**
   * Delete the stored snapshot. Runs after the save in progress; a save queued
   * before the call is dropped, one requested after it runs once the files are gone.
   */
  async clear(): Promise<void> {
    this.pending = false;
    this.clearing = true;
    while (this.writing) await this.writing;
    this.clearing = false;

    const outcome: { error?: Error } = {};
    this.writing = this.drain(async () => {
      try {
        await this.store.remove();
      } catch (e) {
        outcome.error = toError(e);
      }
    });
    await this.flush();
    if (outcome.error) throw outcome.error;
  }

  private async drain(first: (() => Promise<void>) | null): Promise<void> {
    try {
      if (first) await first();
      else this.pending = true;

      while (this.pending && !this.clearing) {
        this.pending = false;
        try {
          await this.store.save(this.capture());
        } catch (e) {
          this.onError(toError(e));
        }
      }
    } finally {
      this.writing = null;
    }
  }
}
