// packages/cli/src/commands/shared.ts
import type { Command } from 'commander';

import type { ContentClient } from '@cmsync/engine';

export type OpenClientOptions = {
  /** Run the poll timer and realtime channel (long-running commands only). */
  background?: boolean;
};

export type CliDeps = {
  openClient: (opts?: OpenClientOptions) => Promise<ContentClient>;
  print: (line: string) => void;
  waitForShutdown: () => Promise<void>;
};

export function getOrCreateSubcommand(program: Command, name: string, description: string): Command {
  const existing = (program.commands ?? []).find((c) => c.name() === name);
  if (existing) return existing;
  return program.command(name).description(description);
}

/** Open a started client, run `fn`, and always close it (pending syncs and writes finish first). */
export async function withClient<T>(
  deps: CliDeps,
  opts: OpenClientOptions,
  fn: (client: ContentClient) => Promise<T>
): Promise<T> {
  const client = await deps.openClient(opts);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}

export function listOrNone(items: readonly string[]): string {
  return items.length > 0 ? items.join(', ') : '(none)';
}
