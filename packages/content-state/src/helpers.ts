// packages/content-state/src/helpers.ts
import { isRecord } from '@cmsync/utils';

import type { CacheSnapshot, DataRecord, ResourceEntries, TypedValue } from './state.js';
import type { CacheFile } from './types.js';

export class SnapshotFormatError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SnapshotFormatError';
  }
}

export function emptySnapshot(): CacheSnapshot {
  return { entries: {}, records: {}, stores: [], knownResources: [] };
}

function isStringMap(v: unknown): v is Record<string, string> {
  return isRecord(v) && Object.values(v).every((x) => typeof x === 'string');
}

function isTagged(v: Record<string, unknown>): boolean {
  return typeof v.type === 'string' && ('value' in v || 'values' in v || v.type === 'null');
}

/**
 * Coerce a wire value into a TypedValue.
 *
 * Accepts the tagged form (`{ type: 'int', value: 3 }`) as well as bare JSON
 * primitives; an object of strings is read as a localized map.
 * Returns undefined for anything else.
 */
export function toTypedValue(raw: unknown): TypedValue | undefined {
  if (raw === null) return { type: 'null' };
  if (typeof raw === 'string') return { type: 'string', value: raw };
  if (typeof raw === 'boolean') return { type: 'bool', value: raw };
  if (typeof raw === 'number') {
    if (!Number.isFinite(raw)) return undefined;
    return Number.isInteger(raw) ? { type: 'int', value: raw } : { type: 'double', value: raw };
  }
  if (!isRecord(raw)) return undefined;

  if (!isTagged(raw)) {
    return isStringMap(raw) ? { type: 'localized', values: { ...raw } } : undefined;
  }

  const { type, value, values } = raw;
  switch (type) {
    case 'string':
      return typeof value === 'string' ? { type, value } : undefined;
    case 'int':
      return typeof value === 'number' && Number.isInteger(value) ? { type, value } : undefined;
    case 'double':
      return typeof value === 'number' && Number.isFinite(value) ? { type, value } : undefined;
    case 'bool':
      return typeof value === 'boolean' ? { type, value } : undefined;
    case 'localized':
      return isStringMap(values) ? { type, values: { ...values } } : undefined;
    case 'null':
      return { type };
    default:
      return undefined;
  }
}

/** Primitive view of a TypedValue; localized maps resolve against `lang`. */
export function resolveTypedValue(v: TypedValue, lang: string): string | number | boolean | null {
  switch (v.type) {
    case 'null':
      return null;
    case 'localized':
      return v.values[lang] ?? null;
    default:
      return v.value;
  }
}

export function normalizeRecord(raw: unknown, where: string): DataRecord {
  if (!isRecord(raw)) throw new SnapshotFormatError(`${where}: record is not an object`);

  const { id, createdAt, updatedAt, fields } = raw;
  if (typeof id !== 'string' || !id) throw new SnapshotFormatError(`${where}: record.id missing`);
  if (typeof createdAt !== 'string') throw new SnapshotFormatError(`${where}: record.createdAt missing`);
  if (typeof updatedAt !== 'string') throw new SnapshotFormatError(`${where}: record.updatedAt missing`);
  if (!isRecord(fields)) throw new SnapshotFormatError(`${where}: record.fields missing`);

  const out = Object.fromEntries(
    Object.entries(fields).map(([name, value]): [string, TypedValue] => {
      const tv = toTypedValue(value);
      if (!tv) throw new SnapshotFormatError(`${where}: field "${name}" has an invalid value`);
      return [name, tv];
    })
  );

  return { id, createdAt, updatedAt, fields: out };
}

export function normalizeEntries(raw: unknown, where: string): ResourceEntries {
  if (!isRecord(raw)) throw new SnapshotFormatError(`${where}: entries must be an object`);

  return Object.fromEntries(
    Object.entries(raw).map(([key, slots]): [string, Record<string, string>] => {
      if (!isStringMap(slots)) throw new SnapshotFormatError(`${where}: "${key}" must map to strings`);
      return [key, { ...slots }];
    })
  );
}

function normalizeIdList(raw: unknown, where: string): string[] {
  if (!Array.isArray(raw) || !raw.every((x): x is string => typeof x === 'string')) {
    throw new SnapshotFormatError(`${where}: expected an array of strings`);
  }
  return Array.from(new Set(raw));
}

/** Validate a parsed `cache.json`. Throws SnapshotFormatError on any shape problem. */
export function normalizeCacheFile(raw: unknown): Omit<CacheSnapshot, 'knownResources'> {
  if (!isRecord(raw)) throw new SnapshotFormatError('cache file is not an object');
  if (raw.schemaVersion !== 1) {
    throw new SnapshotFormatError(`Unsupported schemaVersion: ${String(raw.schemaVersion)}`);
  }

  const entriesRaw = raw.entries ?? {};
  const recordsRaw = raw.records ?? {};
  if (!isRecord(entriesRaw)) throw new SnapshotFormatError('entries must be an object');
  if (!isRecord(recordsRaw)) throw new SnapshotFormatError('records must be an object');

  const entries = Object.fromEntries(
    Object.entries(entriesRaw).map(([resourceId, resource]): [string, ResourceEntries] => [
      resourceId,
      normalizeEntries(resource, `entries.${resourceId}`),
    ])
  );

  const records = Object.fromEntries(
    Object.entries(recordsRaw).map(([storeId, list]): [string, DataRecord[]] => {
      if (!Array.isArray(list)) throw new SnapshotFormatError(`records.${storeId} must be an array`);
      return [storeId, list.map((r, i) => normalizeRecord(r, `records.${storeId}[${i}]`))];
    })
  );

  const stores = normalizeIdList(raw.stores ?? [], 'stores');

  return { entries, records, stores };
}

export function normalizeKnownResources(raw: unknown): string[] {
  return normalizeIdList(raw, 'known resources');
}

export function toCacheFile(snapshot: CacheSnapshot, now = new Date()): CacheFile {
  return {
    schemaVersion: 1,
    updatedAt: now.toISOString(),
    entries: snapshot.entries,
    records: snapshot.records,
    stores: snapshot.stores,
  };
}
