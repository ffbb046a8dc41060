// packages/cli/src/commands/status.ts
import type { Command } from 'commander';

import { type CliDeps, getOrCreateSubcommand, listOrNone, withClient } from './shared.js';

export function registerStatusCommand(program: Command, deps: CliDeps) {
  const status = getOrCreateSubcommand(program, 'status', 'Show session, language and cached resources');

  status.action(async () => {
    await withClient(deps, {}, async (client) => {
      deps.print(`config:     ${client.paths.configFile}`);
      deps.print(`cache:      ${client.paths.cacheFile}`);
      deps.print(`project:    ${client.projectId() ?? '(not configured)'}`);
      deps.print(`language:   ${client.getLanguage()}`);
      deps.print(`languages:  ${listOrNone(client.availableLanguages())}`);
      deps.print(`resources:  ${listOrNone(client.trackedResources())}`);
    });
  });

  return status;
}
