// packages/content-state/src/io.ts
import path from 'node:path';

export const DEFAULT_STORAGE_DIRNAME = '.cmsync';
export const CACHE_FILENAME = 'cache.json';
export const KNOWN_RESOURCES_FILENAME = 'tabs.json';
export const CONFIG_FILENAME = 'config.json';

/** Env var that forces the root directory holding `.cmsync/`. */
export const STORAGE_HOME_ENV = 'CMSYNC_HOME';

export type StoragePaths = {
  storageDir: string;
  cacheFile: string;
  knownResourcesFile: string;
  configFile: string;
};

/**
 * Resolve where cache, known-resource list and local config live.
 *
 * Precedence:
 *   1) explicit `storageDir`
 *   2) `<CMSYNC_HOME>/.cmsync`
 *   3) `<cwd>/.cmsync`
 */
export function resolveStoragePaths(args: {
  cwd: string;
  storageDir?: string | null;
  env?: Record<string, string | undefined>;
}): StoragePaths {
  const { cwd, storageDir } = args;
  const env = args.env ?? process.env;

  const forcedHome = String(env[STORAGE_HOME_ENV] ?? '').trim();

  const dir = storageDir
    ? path.resolve(cwd, storageDir)
    : forcedHome
      ? path.resolve(cwd, forcedHome, DEFAULT_STORAGE_DIRNAME)
      : path.resolve(cwd, DEFAULT_STORAGE_DIRNAME);

  return {
    storageDir: dir,
    cacheFile: path.join(dir, CACHE_FILENAME),
    knownResourcesFile: path.join(dir, KNOWN_RESOURCES_FILENAME),
    configFile: path.join(dir, CONFIG_FILENAME),
  };
}
