// packages/cli/src/commands/auth.ts
import type { Command } from 'commander';

import { type CliDeps, withClient } from './shared.js';

type AuthOptions = {
  project: string;
  apiKey: string;
  secret: string;
};

export function registerAuthCommand(program: Command, deps: CliDeps) {
  return program
    .command('auth')
    .description('Authenticate a project and store the session in config.json')
    .requiredOption('--project <id>', 'project id')
    .requiredOption('--api-key <key>', 'project API key')
    .requiredOption('--secret <secret>', 'project secret used to sign requests')
    .action(async (opts: AuthOptions) => {
      await withClient(deps, {}, async (client) => {
        const ok = await client.configure({
          projectId: opts.project,
          apiKey: opts.apiKey,
          projectSecret: opts.secret,
        });
        if (!ok) throw new Error(`authentication failed for project ${opts.project}`);

        deps.print(`configured project ${opts.project}`);
      });
    });
}
