// packages/cli/src/commands/cache.ts
import type { Command } from 'commander';

import { type CliDeps, getOrCreateSubcommand, withClient } from './shared.js';

export function registerCacheCommands(program: Command, deps: CliDeps) {
  const cache = getOrCreateSubcommand(program, 'cache', 'Manage the local cache');

  cache
    .command('clear')
    .description('Delete cached content (the session in config.json is kept)')
    .action(async () => {
      await withClient(deps, {}, async (client) => {
        await client.clearCache();
        deps.print(`cache cleared: ${client.paths.storageDir}`);
      });
    });

  return cache;
}
