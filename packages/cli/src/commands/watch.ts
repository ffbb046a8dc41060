// packages/cli/src/commands/watch.ts
import type { Command } from 'commander';

import { type CliDeps, withClient } from './shared.js';

export function registerWatchCommand(program: Command, deps: CliDeps) {
  return program
    .command('watch')
    .description('Stay connected and print every resource update until interrupted')
    .action(async () => {
      await withClient(deps, { background: true }, async (client) => {
        const off = client.onAnyUpdate((id) => deps.print(`updated: ${id}`));
        deps.print(`watching project ${client.projectId() ?? '(not configured)'} (Ctrl+C to stop)`);

        try {
          await deps.waitForShutdown();
        } finally {
          off();
        }
      });
    });
}
