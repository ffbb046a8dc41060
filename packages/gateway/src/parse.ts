// packages/gateway/src/parse.ts
import {
  COLOR_SLOT,
  IMAGE_SLOT,
  normalizeRecord,
  type DataRecord,
  type ResourceEntries,
} from '@cmsync/content-state';
import { isRecord, toError } from '@cmsync/utils';

import { ResponseFormatError } from './errors.js';
import type { AuthResult } from './types.js';

function parseJsonObject(body: string, what: string): Record<string, unknown> {
  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (e) {
    throw new ResponseFormatError(`${what}: body is not JSON`, { cause: toError(e) });
  }
  if (!isRecord(json)) throw new ResponseFormatError(`${what}: body is not an object`);
  return json;
}

// Older servers answer translations with `keys` instead of `items`.
function itemsOf(json: Record<string, unknown>, what: string, aliases: string[] = []): Record<string, unknown>[] {
  const raw = [json.items, ...aliases.map((a) => json[a])].find((v) => v !== undefined);
  if (!Array.isArray(raw)) throw new ResponseFormatError(`${what}: "items" must be an array`);
  return raw.filter(isRecord);
}

function stringList(v: unknown): string[] {
  return Array.isArray(v) ? v.filter((x): x is string => typeof x === 'string') : [];
}

function stringMap(v: unknown): Record<string, string> | null {
  if (!isRecord(v)) return null;
  return Object.fromEntries(
    Object.entries(v).filter((e): e is [string, string] => typeof e[1] === 'string')
  );
}

function timestamp(v: unknown): unknown {
  return typeof v === 'number' && Number.isFinite(v) ? new Date(v).toISOString() : v;
}

/** `{ items: [{ key, values: { lang: value } }] }`; malformed items are skipped. */
export function parseTranslations(body: string): ResourceEntries {
  const json = parseJsonObject(body, 'translations');
  const pairs: [string, Record<string, string>][] = [];

  for (const item of itemsOf(json, 'translations', ['keys'])) {
    const values = stringMap(item.values);
    if (typeof item.key !== 'string' || !values) continue;
    pairs.push([item.key, values]);
  }
  return Object.fromEntries(pairs);
}

/** `{ items: [{ key, value }] }` stored under the `color` slot. */
export function parseColors(body: string): ResourceEntries {
  const json = parseJsonObject(body, 'colors');
  const pairs: [string, Record<string, string>][] = [];

  for (const item of itemsOf(json, 'colors')) {
    if (typeof item.key !== 'string' || typeof item.value !== 'string') continue;
    pairs.push([item.key, { [COLOR_SLOT]: item.value }]);
  }
  return Object.fromEntries(pairs);
}

/** `{ items: [{ key, url }] }` stored under the `url` slot. */
export function parseImages(body: string): ResourceEntries {
  const json = parseJsonObject(body, 'images');
  const pairs: [string, Record<string, string>][] = [];

  for (const item of itemsOf(json, 'images')) {
    if (typeof item.key !== 'string' || typeof item.url !== 'string') continue;
    pairs.push([item.key, { [IMAGE_SLOT]: item.url }]);
  }
  return Object.fromEntries(pairs);
}

/**
 * `{ items: [{ id, createdAt, updatedAt, data }] }`.
 * Timestamps may be ISO strings or epoch milliseconds. Any invalid record fails the
 * whole response so a store is never half-applied.
 */
export function parseRecords(body: string): DataRecord[] {
  const json = parseJsonObject(body, 'records');

  return itemsOf(json, 'records').map((item, i) => {
    try {
      return normalizeRecord(
        {
          id: item.id,
          createdAt: timestamp(item.createdAt),
          updatedAt: timestamp(item.updatedAt),
          fields: item.data ?? {},
        },
        `items[${i}]`
      );
    } catch (e) {
      throw new ResponseFormatError(`records: ${toError(e).message}`, { cause: e });
    }
  });
}

export function parseAuth(body: string): AuthResult {
  const json = parseJsonObject(body, 'auth');
  if (typeof json.token !== 'string' || !json.token) {
    throw new ResponseFormatError('auth: token missing');
  }

  return {
    token: json.token,
    tabs: stringList(json.tabs),
    stores: stringList(json.stores),
    availableLanguages: stringList(json.availableLanguages),
  };
}

export function parseLanguages(body: string): string[] {
  const json = parseJsonObject(body, 'languages');
  if (!Array.isArray(json.languages)) throw new ResponseFormatError('languages: "languages" must be an array');
  return stringList(json.languages);
}
