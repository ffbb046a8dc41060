// packages/cli/src/tests/cli.command.test.ts
import { strict as assert } from 'node:assert';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { describe, it } from 'node:test';

import { SnapshotFileStore, emptySnapshot } from '@cmsync/content-state';
import {
  Logger,
  createContentClient,
  ensureConfigDefaults,
  readConfig,
  silentSink,
  writeConfig,
  type ContentClient,
  type RealtimeSocket,
} from '@cmsync/engine';
import type { HttpResponse, HttpTransport, OutboundRequest } from '@cmsync/gateway';

import type { CliDeps, OpenClientOptions } from '../commands/shared.js';
import { buildProgram } from '../program.js';

class RouteTransport implements HttpTransport {
  readonly paths: string[] = [];
  constructor(private readonly routes: Record<string, HttpResponse>) {}

  async send(req: OutboundRequest): Promise<HttpResponse> {
    this.paths.push(req.path);
    return this.routes[req.path] ?? { status: 500, body: '' };
  }
}

class StubSocket implements RealtimeSocket {
  private readonly handlers = new Map<string, ((payload?: unknown) => void)[]>();
  on(event: string, handler: (payload?: unknown) => void): void {
    this.handlers.set(event, [...(this.handlers.get(event) ?? []), handler]);
  }
  emit(): void {}
  connect(): void {}
  disconnect(): void {}
  fire(event: string, payload?: unknown): void {
    for (const h of this.handlers.get(event) ?? []) h(payload);
  }
}

function ok(body: unknown): HttpResponse {
  return { status: 200, body: JSON.stringify(body) };
}

function tmpDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'cmsync-cli-'));
}

async function seedHome(dir: string): Promise<void> {
  writeConfig({
    configFile: path.join(dir, 'config.json'),
    config: ensureConfigDefaults({ projectId: 'p1', authToken: 'tok-1', availableLanguages: ['en', 'fr'] }),
  });
  await new SnapshotFileStore({
    cacheFile: path.join(dir, 'cache.json'),
    knownResourcesFile: path.join(dir, 'tabs.json'),
  }).save({ ...emptySnapshot(), entries: { home: { title: { en: 'Hi', fr: 'Salut' } } }, knownResources: ['home'] });
}

/**
 * IMPORTANT:
 * With { from: 'user' }, argv is ONLY the user args, e.g. ['get', 'color', 'primary'].
 */
async function run(
  userArgv: string[],
  args: { dir: string; transport: RouteTransport; socket?: StubSocket; waitForShutdown?: CliDeps['waitForShutdown'] }
) {
  const lines: string[] = [];
  const opened: ContentClient[] = [];

  const openClient = async (opts: OpenClientOptions = {}) => {
    const client = createContentClient({
      baseUrl: 'https://cms.test/api',
      storageDir: args.dir,
      env: {},
      background: opts.background ?? false,
      transport: args.transport,
      logger: new Logger({ sink: silentSink }),
      socketFactory: () => args.socket ?? new StubSocket(),
      pollTimer: () => () => {},
    });
    opened.push(client);
    await client.start();
    return client;
  };

  const program = buildProgram({
    openClient,
    print: (line) => lines.push(line),
    waitForShutdown: args.waitForShutdown ?? (async () => {}),
  });
  await program.parseAsync(userArgv, { from: 'user' });
  return { lines, opened };
}

describe('cli commands', () => {
  it('auth stores the session', async () => {
    const dir = tmpDir();
    const transport = new RouteTransport({
      '/auth': ok({ token: 'tok-9', tabs: [], stores: [], availableLanguages: ['en'] }),
    });

    const { lines } = await run(['auth', '--project', 'p1', '--api-key', 'key-1', '--secret', 'test-secret'], {
      dir,
      transport,
    });

    assert.deepEqual(lines, ['configured project p1']);
    const cfg = readConfig({ configFile: path.join(dir, 'config.json') });
    assert.equal(cfg?.authToken, 'tok-9');
    assert.equal(cfg?.projectSecret, 'test-secret');
  });

  it('auth fails loudly on rejected credentials', async () => {
    const transport = new RouteTransport({ '/auth': { status: 403, body: '' } });
    await assert.rejects(
      run(['auth', '--project', 'p1', '--api-key', 'bad', '--secret', 'test-secret'], { dir: tmpDir(), transport }),
      /authentication failed for project p1/
    );
  });

  it('get translation reads the cache without a request', async () => {
    const dir = tmpDir();
    await seedHome(dir);
    const transport = new RouteTransport({});

    const { lines } = await run(['get', 'translation', 'title', 'home'], { dir, transport });
    assert.deepEqual(lines, ['Hi']);
    assert.deepEqual(transport.paths, []);
  });

  it('get color fetches an uncached resource first', async () => {
    const dir = tmpDir();
    await seedHome(dir);
    const transport = new RouteTransport({
      '/resource/p1/__colors__': ok({ items: [{ key: 'primary', value: '#00FF00' }] }),
    });

    const { lines } = await run(['get', 'color', 'primary'], { dir, transport });
    assert.deepEqual(lines, ['#00FF00']);
    assert.deepEqual(transport.paths, ['/resource/p1/__colors__']);
  });

  it('get image prints a placeholder when nothing is found', async () => {
    const dir = tmpDir();
    await seedHome(dir);
    const transport = new RouteTransport({ '/resource/p1/__images__': { status: 404, body: '' } });

    const { lines } = await run(['get', 'image', 'logo'], { dir, transport });
    assert.deepEqual(lines, ['(not found)']);
  });

  it('get records prints fields resolved for the active language, or typed with --raw', async () => {
    const dir = tmpDir();
    await seedHome(dir);
    const transport = new RouteTransport({
      '/resource/p1/products': ok({
        items: [
          {
            id: 'r1',
            createdAt: '2024-01-01T00:00:00.000Z',
            updatedAt: '2024-01-02T00:00:00.000Z',
            data: { name: { type: 'localized', values: { en: 'Tea', fr: 'Thé' } }, stock: 4 },
          },
        ],
      }),
    });

    const resolved = await run(['get', 'records', 'products'], { dir, transport });
    assert.deepEqual(resolved.lines, [
      JSON.stringify([{ id: 'r1', updatedAt: '2024-01-02T00:00:00.000Z', fields: { name: 'Tea', stock: 4 } }], null, 2),
    ]);

    const raw = await run(['get', 'records', 'products', '--raw'], { dir, transport });
    assert.deepEqual(raw.lines, [
      JSON.stringify(
        [
          {
            id: 'r1',
            createdAt: '2024-01-01T00:00:00.000Z',
            updatedAt: '2024-01-02T00:00:00.000Z',
            fields: {
              name: { type: 'localized', values: { en: 'Tea', fr: 'Thé' } },
              stock: { type: 'int', value: 4 },
            },
          },
        ],
        null,
        2
      ),
    ]);
  });

  it('sync reports each resource and fails when one did', async () => {
    const dir = tmpDir();
    await seedHome(dir);
    const transport = new RouteTransport({ '/resource/p1/home': ok({ items: [] }) });

    await assert.rejects(run(['sync', 'home', 'menu'], { dir, transport }), /sync failed: menu/);
    assert.deepEqual(transport.paths, ['/resource/p1/home', '/resource/p1/menu']);
  });

  it('language switches and persists', async () => {
    const dir = tmpDir();
    await seedHome(dir);
    const transport = new RouteTransport({ '/resource/p1/home': ok({ items: [] }) });

    const switched = await run(['language', 'fr'], { dir, transport });
    assert.deepEqual(switched.lines, ['language:   fr']);

    const shown = await run(['language'], { dir, transport });
    assert.deepEqual(shown.lines, ['language:   fr', 'available:  en, fr']);

    const title = await run(['get', 'translation', 'title', 'home'], { dir, transport });
    assert.deepEqual(title.lines, ['Salut']);
  });

  it('status prints session and resources', async () => {
    const dir = tmpDir();
    await seedHome(dir);

    const { lines } = await run(['status'], { dir, transport: new RouteTransport({}) });
    assert.deepEqual(lines, [
      `config:     ${path.join(dir, 'config.json')}`,
      `cache:      ${path.join(dir, 'cache.json')}`,
      'project:    p1',
      'language:   en',
      'languages:  en, fr',
      'resources:  home',
    ]);
  });

  it('cache clear removes the snapshot but keeps the session', async () => {
    const dir = tmpDir();
    await seedHome(dir);

    const { lines } = await run(['cache', 'clear'], { dir, transport: new RouteTransport({}) });
    assert.deepEqual(lines, [`cache cleared: ${dir}`]);
    assert.equal(fs.existsSync(path.join(dir, 'cache.json')), false);
    assert.equal(readConfig({ configFile: path.join(dir, 'config.json') })?.projectId, 'p1');
  });

  it('watch prints pushed updates until shutdown', async () => {
    const dir = tmpDir();
    await seedHome(dir);
    const socket = new StubSocket();
    const transport = new RouteTransport({ '/resource/p1/home': ok({ items: [] }) });

    const { lines } = await run(['watch'], {
      dir,
      transport,
      socket,
      waitForShutdown: async () => {
        socket.fire('connect');
        socket.fire('resource-updated', { resourceId: 'home' });
        await new Promise((resolve) => setTimeout(resolve, 10));
      },
    });

    assert.deepEqual(lines, ['watching project p1 (Ctrl+C to stop)', 'updated: home']);
  });
});
