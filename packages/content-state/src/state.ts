// packages/content-state/src/state.ts

/** Reserved resource holding global colors (`key -> { color: hex }`). */
export const COLORS_RESOURCE_ID = '__colors__';

/** Reserved resource holding global image references (`key -> { url: string }`). */
export const IMAGES_RESOURCE_ID = '__images__';

export const RESERVED_RESOURCE_IDS: readonly string[] = [COLORS_RESOURCE_ID, IMAGES_RESOURCE_ID];

/** Value slot used for color entries. */
export const COLOR_SLOT = 'color';

/** Value slot used for image entries. */
export const IMAGE_SLOT = 'url';

/**
 * Values of one resource: `itemKey -> slot -> value`.
 *
 * For translation resources the slot is a language code. Reserved resources use a
 * single fixed slot (`color` / `url`).
 */
export type ResourceEntries = Record<string, Record<string, string>>;

export type TypedValue =
  | { type: 'string'; value: string }
  | { type: 'int'; value: number }
  | { type: 'double'; value: number }
  | { type: 'bool'; value: boolean }
  | { type: 'localized'; values: Record<string, string> }
  | { type: 'null' };

export type TypedValueKind = TypedValue['type'];

export type DataRecord = {
  id: string;
  createdAt: string; // ISO
  updatedAt: string; // ISO
  fields: Record<string, TypedValue>;
};

/** Full in-memory state as it is persisted. */
export type CacheSnapshot = {
  entries: Record<string, ResourceEntries>;
  records: Record<string, DataRecord[]>;

  /** Resource ids known to be data stores. */
  stores: string[];

  /** Known Resource Registry: ids that synced successfully at least once. */
  knownResources: string[];
};
