// packages/cli/src/program.ts
import { Command } from 'commander';

import { STORAGE_HOME_ENV } from '@cmsync/content-state';
import { createContentClient } from '@cmsync/engine';

import { registerAuthCommand } from './commands/auth.js';
import { registerCacheCommands } from './commands/cache.js';
import { registerGetCommands } from './commands/get.js';
import { registerLanguageCommand } from './commands/language.js';
import { registerStatusCommand } from './commands/status.js';
import { registerSyncCommand } from './commands/sync.js';
import { registerWatchCommand } from './commands/watch.js';
import type { CliDeps, OpenClientOptions } from './commands/shared.js';

export const DEFAULT_BASE_URL = 'http://localhost:3000/api/sdk';
export const BASE_URL_ENV = 'CMSYNC_BASE_URL';

export type GlobalOptions = {
  home?: string;
  baseUrl?: string;
  debug?: boolean;
};

function waitForSignal(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}

export function buildProgram(overrides: Partial<CliDeps> = {}): Command {
  const program = new Command();

  program
    .name('cmsync')
    .description('Inspect and drive the content cache of a CMS project')
    .option('--home <dir>', `root directory holding .cmsync/ (overrides ${STORAGE_HOME_ENV})`)
    .option('--base-url <url>', `CMS API root (default: $${BASE_URL_ENV} or ${DEFAULT_BASE_URL})`)
    .option('--debug', 'verbose engine logs', false);

  const openClient = async (opts: OpenClientOptions = {}) => {
    const g = program.opts<GlobalOptions>();
    const env = g.home ? { ...process.env, [STORAGE_HOME_ENV]: g.home } : process.env;

    const client = createContentClient({
      baseUrl: g.baseUrl ?? process.env[BASE_URL_ENV] ?? DEFAULT_BASE_URL,
      env,
      debugLogs: g.debug ?? false,
      background: opts.background ?? false,
    });
    await client.start();
    return client;
  };

  const deps: CliDeps = {
    openClient,
    print: (line) => console.log(line),
    waitForShutdown: waitForSignal,
    ...overrides,
  };

  registerAuthCommand(program, deps);
  registerStatusCommand(program, deps);
  registerSyncCommand(program, deps);
  registerGetCommands(program, deps);
  registerLanguageCommand(program, deps);
  registerCacheCommands(program, deps);
  registerWatchCommand(program, deps);

  return program;
}
