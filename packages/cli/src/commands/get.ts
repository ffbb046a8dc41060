// packages/cli/src/commands/get.ts
import type { Command } from 'commander';

import { resolveTypedValue, type DataRecord } from '@cmsync/content-state';
import type { ContentClient } from '@cmsync/engine';

import { type CliDeps, getOrCreateSubcommand, withClient } from './shared.js';

const NOT_FOUND_TEXT = '(not found)';

/**
 * Reads go through the client accessors, so an uncached resource is fetched by the
 * first read. Wait for that sync and read again before giving up.
 */
async function readThrough<T>(client: ContentClient, read: () => T, found: (v: T) => boolean): Promise<T> {
  const first = read();
  if (found(first)) return first;

  await client.idle();
  return read();
}

function resolvedView(record: DataRecord, lang: string) {
  return {
    id: record.id,
    updatedAt: record.updatedAt,
    fields: Object.fromEntries(Object.entries(record.fields).map(([name, v]) => [name, resolveTypedValue(v, lang)])),
  };
}

export function registerGetCommands(program: Command, deps: CliDeps) {
  const get = getOrCreateSubcommand(program, 'get', 'Read cached content');

  // cmsync get translation <key> <resource>
  get
    .command('translation')
    .description('Translation of <key> in <resource> for the active language')
    .argument('<key>')
    .argument('<resource>')
    .action(async (key: string, resource: string) => {
      await withClient(deps, {}, async (client) => {
        const v = await readThrough(client, () => client.translation(key, resource), (s) => s !== '');
        deps.print(v || NOT_FOUND_TEXT);
      });
    });

  // cmsync get color <key>
  get
    .command('color')
    .description('Hex value of a global color')
    .argument('<key>')
    .action(async (key: string) => {
      await withClient(deps, {}, async (client) => {
        const v = await readThrough(client, () => client.colorValue(key), (s) => s !== undefined);
        deps.print(v ?? NOT_FOUND_TEXT);
      });
    });

  // cmsync get image <key>
  get
    .command('image')
    .description('URL of a global image')
    .argument('<key>')
    .action(async (key: string) => {
      await withClient(deps, {}, async (client) => {
        const v = await readThrough(client, () => client.imageURL(key), (s) => s !== undefined);
        deps.print(v ?? NOT_FOUND_TEXT);
      });
    });

  // cmsync get records <store> [--raw]
  get
    .command('records')
    .description('Records of a data store as JSON, localized for the active language')
    .argument('<store>')
    .option('--raw', 'print typed field values instead of resolved ones')
    .action(async (store: string, opts: { raw?: boolean }) => {
      await withClient(deps, {}, async (client) => {
        const records = await readThrough(client, () => client.getRecords(store), (r) => r.length > 0);
        if (records.length === 0) {
          deps.print('(no records)');
          return;
        }
        const lang = client.getLanguage();
        const out = opts.raw ? records : records.map((r) => resolvedView(r, lang));
        deps.print(JSON.stringify(out, null, 2));
      });
    });

  return get;
}
