// packages/content-state/src/store.ts
import {
  COLORS_RESOURCE_ID,
  IMAGES_RESOURCE_ID,
  type CacheSnapshot,
  type DataRecord,
  type ResourceEntries,
} from './state.js';

type SlotMap = ReadonlyMap<string, string>;
type ResourceMap = ReadonlyMap<string, SlotMap>;

function toSlotMap(slots: Record<string, string>): SlotMap {
  return new Map(Object.entries(slots));
}

/**
 * In-memory content cache.
 *
 * Pure data: no I/O, no timers. Every mutation builds the next map for a resource
 * and swaps it in with a single `set`, so a reader never sees a half-merged resource.
 * Lookups are Map based; keys such as `__proto__` or `constructor` are plain data.
 */
export class ContentCacheStore {
  private entries = new Map<string, ResourceMap>();
  private records = new Map<string, ReadonlyMap<string, DataRecord>>();
  private stores = new Set<string>();
  private known = new Set<string>();

  get(resourceId: string, key: string, slot: string): string | undefined {
    return this.entries.get(resourceId)?.get(key)?.get(slot);
  }

  getAll(resourceId: string, slot: string): Record<string, string> {
    const resource = this.entries.get(resourceId);
    if (!resource) return {};

    const pairs: [string, string][] = [];
    for (const [key, slots] of resource) {
      const v = slots.get(slot);
      if (v !== undefined) pairs.push([key, v]);
    }
    return Object.fromEntries(pairs);
  }

  /**
   * Additive merge: each key in `incoming` overwrites that key's slot map;
   * keys missing from `incoming` are left in place.
   */
  replace(resourceId: string, incoming: ResourceEntries): void {
    const next = new Map(this.entries.get(resourceId) ?? []);
    for (const [key, slots] of Object.entries(incoming)) {
      next.set(key, toSlotMap(slots));
    }
    this.entries.set(resourceId, next);
  }

  /** Additive merge by record id; a record with a known id replaces the cached one. */
  replaceRecords(storeId: string, incoming: readonly DataRecord[]): void {
    const next = new Map(this.records.get(storeId) ?? []);
    for (const r of incoming) next.set(r.id, structuredClone(r));
    this.records.set(storeId, next);
    this.stores.add(storeId);
  }

  /** Copies; editing a returned record never reaches the cache. */
  getRecords(storeId: string): DataRecord[] {
    return structuredClone(Array.from(this.records.get(storeId)?.values() ?? []));
  }

  getRecord(storeId: string, id: string): DataRecord | undefined {
    const r = this.records.get(storeId)?.get(id);
    return r && structuredClone(r);
  }

  contains(resourceId: string): boolean {
    return (this.entries.get(resourceId)?.size ?? 0) > 0 || (this.records.get(resourceId)?.size ?? 0) > 0;
  }

  markStore(storeId: string): void {
    this.stores.add(storeId);
  }

  isStore(resourceId: string): boolean {
    return this.stores.has(resourceId);
  }

  markKnown(resourceId: string): boolean {
    if (this.known.has(resourceId)) return false;
    this.known.add(resourceId);
    return true;
  }

  knownResources(): string[] {
    return Array.from(this.known);
  }

  /** Ids that currently hold cached values or records. */
  resourceIds(): string[] {
    const ids = new Set<string>();
    for (const [id, m] of this.entries) if (m.size > 0) ids.add(id);
    for (const [id, m] of this.records) if (m.size > 0) ids.add(id);
    return Array.from(ids);
  }

  /** Language codes present in cached translations (reserved resources excluded). */
  languages(): string[] {
    const langs = new Set<string>();
    for (const [id, resource] of this.entries) {
      if (id === COLORS_RESOURCE_ID || id === IMAGES_RESOURCE_ID) continue;
      for (const slots of resource.values()) for (const lang of slots.keys()) langs.add(lang);
    }
    return Array.from(langs).sort();
  }

  snapshot(): CacheSnapshot {
    const entries = Object.fromEntries(
      Array.from(this.entries, ([id, resource]): [string, ResourceEntries] => [
        id,
        Object.fromEntries(Array.from(resource, ([key, slots]) => [key, Object.fromEntries(slots)])),
      ])
    );

    const records = Object.fromEntries(
      Array.from(this.records, ([id, m]): [string, DataRecord[]] => [id, Array.from(m.values())])
    );

    return structuredClone({
      entries,
      records,
      stores: Array.from(this.stores),
      knownResources: Array.from(this.known),
    });
  }

  restore(snapshot: CacheSnapshot): void {
    this.clear();
    for (const [id, resource] of Object.entries(snapshot.entries)) this.replace(id, resource);
    for (const [id, list] of Object.entries(snapshot.records)) this.replaceRecords(id, list);
    for (const id of snapshot.stores) this.stores.add(id);
    for (const id of snapshot.knownResources) this.known.add(id);
  }

  clear(): void {
    this.entries = new Map();
    this.records = new Map();
    this.stores = new Set();
    this.known = new Set();
  }
}
