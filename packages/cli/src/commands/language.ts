// packages/cli/src/commands/language.ts
import type { Command } from 'commander';

import { type CliDeps, listOrNone, withClient } from './shared.js';

export function registerLanguageCommand(program: Command, deps: CliDeps) {
  return program
    .command('language')
    .description('Show the active language, or switch to [lang] and resync')
    .argument('[lang]', 'language code, e.g. fr')
    .action(async (lang: string | undefined) => {
      await withClient(deps, {}, async (client) => {
        if (lang !== undefined) await client.setLanguage(lang);

        deps.print(`language:   ${client.getLanguage()}`);
        if (lang === undefined) deps.print(`available:  ${listOrNone(client.availableLanguages())}`);
      });
    });
}
