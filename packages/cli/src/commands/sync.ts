// packages/cli/src/commands/sync.ts
import type { Command } from 'commander';

import { type CliDeps, withClient } from './shared.js';

export function registerSyncCommand(program: Command, deps: CliDeps) {
  return program
    .command('sync')
    .description('Fetch resources now (use __colors__ / __images__ for the reserved ones)')
    .argument('<ids...>', 'resource ids')
    .action(async (ids: string[]) => {
      await withClient(deps, {}, async (client) => {
        const results = await Promise.all(ids.map(async (id) => ({ id, ok: await client.sync(id) })));
        for (const r of results) deps.print(`${r.id}: ${r.ok ? 'ok' : 'failed'}`);

        const failed = results.filter((r) => !r.ok).map((r) => r.id);
        if (failed.length > 0) throw new Error(`sync failed: ${failed.join(', ')}`);
      });
    });
}
