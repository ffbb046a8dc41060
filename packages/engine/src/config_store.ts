// packages/engine/src/config_store.ts
import fs from 'node:fs';
import path from 'node:path';

import { isRecord, toError } from '@cmsync/utils';

export const DEFAULT_LANGUAGE = 'en';

export type LocalConfigV1 = {
  version: 1;
  createdAt: string;

  // set by a successful `configure`
  projectId?: string;
  authToken?: string;
  projectSecret?: string;

  language: string;
  availableLanguages: string[];
  stores: string[];
};

function ensureParentDir(filename: string) {
  fs.mkdirSync(path.dirname(filename), { recursive: true });
}

function optionalString(v: unknown): string | undefined {
  return typeof v === 'string' && v ? v : undefined;
}

function stringList(v: unknown): string[] {
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === 'string' && x.length > 0) : [];
}

export function ensureConfigDefaults(partial?: unknown): LocalConfigV1 {
  const p = isRecord(partial) ? partial : {};

  const out: LocalConfigV1 = {
    version: 1,
    createdAt: optionalString(p.createdAt) ?? new Date().toISOString(),
    language: optionalString(p.language) ?? DEFAULT_LANGUAGE,
    availableLanguages: stringList(p.availableLanguages),
    stores: stringList(p.stores),
  };

  const projectId = optionalString(p.projectId);
  const authToken = optionalString(p.authToken);
  const projectSecret = optionalString(p.projectSecret);
  if (projectId) out.projectId = projectId;
  if (authToken) out.authToken = authToken;
  if (projectSecret) out.projectSecret = projectSecret;

  return out;
}

/**
 * Returns null when the file is missing. A file that cannot be read or parsed is
 * treated the same way; `onCorrupt` is told why.
 */
export function readConfig(args: { configFile: string; onCorrupt?: (error: Error) => void }): LocalConfigV1 | null {
  const { configFile, onCorrupt } = args;
  if (!fs.existsSync(configFile)) return null;

  try {
    const raw = fs.readFileSync(configFile, 'utf8');
    const parsed: unknown = JSON.parse(raw);
    if (!isRecord(parsed)) throw new Error('config is not an object');
    return ensureConfigDefaults(parsed);
  } catch (e) {
    onCorrupt?.(toError(e));
    return null;
  }
}

export function writeConfig(args: { configFile: string; config: LocalConfigV1 }): void {
  const { configFile, config } = args;
  ensureParentDir(configFile);

  const normalized = ensureConfigDefaults(config);
  const tmp = `${configFile}.tmp`;
  fs.writeFileSync(tmp, JSON.stringify(normalized, null, 2) + '\n', 'utf8');
  fs.renameSync(tmp, configFile);
}

export function patchConfig(config: LocalConfigV1, patch: Partial<Omit<LocalConfigV1, 'version'>>): LocalConfigV1 {
  return ensureConfigDefaults({ ...config, ...patch });
}
