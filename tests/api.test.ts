import { afterEach, describe, expect, it, vi } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { AppContext, createAppContext } from '../src/app-context.js';
import { buildServer } from '../src/api/server.js';
import { ProviderError } from '../src/lib/errors.js';
import { StubProvider, cubeLines, makeTempDir, testConfig } from './helpers.js';

let cleanups: (() => Promise<void>)[] = [];

type Harness = {
  app: FastifyInstance;
  ctx: AppContext;
  provider: StubProvider;
};

async function setup(replies: (string | Error)[]): Promise<Harness> {
  const { dir, cleanup } = await makeTempDir();
  const provider = new StubProvider(replies);
  const ctx = await createAppContext(testConfig(dir), { providerFactory: () => provider });
  const app = await buildServer(ctx);
  cleanups.push(async () => {
    await app.close();
    await ctx.eventStore.flush();
    await cleanup();
  });
  return { app, ctx, provider };
}

afterEach(async () => {
  await Promise.all(cleanups.map(fn => fn()));
  cleanups = [];
});

describe('HTTP API', () => {
  it('reports health and serves the form page', async () => {
    const { app } = await setup([]);

    const health = await app.inject({ method: 'GET', url: '/v1/health' });
    const page = await app.inject({ method: 'GET', url: '/' });

    expect(health.json()).toEqual({ ok: true });
    expect(page.statusCode).toBe(200);
    expect(page.headers['content-type']).toContain('text/html');
  });

  it('lists versions with the default', async () => {
    const { app } = await setup([]);

    const res = await app.inject({ method: 'GET', url: '/v1/versions' });
    const body = res.json();

    expect(body.default).toBe('1.20.1');
    expect(body.versions).toHaveLength(26);
    expect(body.versions[0]).toEqual({ id: '1.13.2', tag: 'JE_1_13_2', dataVersion: 1631 });
  });

  it('lists blocks of one category for a version', async () => {
    const { app } = await setup([]);

    const res = await app.inject({ method: 'GET', url: '/v1/blocks?version=1.16.5&category=stairs' });
    const body = res.json();

    expect(res.statusCode).toBe(200);
    expect(body.version).toBe('1.16.5');
    expect(body.blocks.length).toBeGreaterThan(0);
    expect(body.blocks.every((b: { category: string }) => b.category === 'stairs')).toBe(true);
  });

  it('rejects an unknown version', async () => {
    const { app } = await setup([]);

    const res = await app.inject({ method: 'GET', url: '/v1/blocks?version=9.9' });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toEqual({ error: { code: 'INVALID_ARGUMENT', message: 'Unknown Minecraft version 9.9' } });
  });

  it('generates, downloads and summarizes a schematic', async () => {
    const { app } = await setup([cubeLines(2)]);

    const generated = await app.inject({
      method: 'POST',
      url: '/v1/generate',
      payload: { description: 'a small cube' },
    });
    const { fileName, format, placements } = generated.json();
    const download = await app.inject({ method: 'GET', url: `/v1/generated/${fileName}` });
    const summary = await app.inject({ method: 'GET', url: `/v1/generated/${fileName}/summary` });

    expect(generated.statusCode).toBe(200);
    expect(format).toBe('schem');
    expect(placements).toBe(8);
    expect(download.statusCode).toBe(200);
    expect(download.headers['content-type']).toBe('application/octet-stream');
    expect(download.headers['content-disposition']).toBe(`attachment; filename="${fileName}"`);
    expect(summary.json()).toEqual({
      fileName,
      size: { width: 2, height: 2, length: 2 },
      dataVersion: 3465,
      paletteSize: 1,
      solidBlocks: 8,
      blockCounts: { 'minecraft:stone': 8 },
    });
  });

  it('only summarizes schematics', async () => {
    const { app } = await setup([cubeLines(1)]);

    const generated = await app.inject({
      method: 'POST',
      url: '/v1/generate',
      payload: { description: 'one block', format: 'mcfunction' },
    });
    const { fileName } = generated.json();
    const download = await app.inject({ method: 'GET', url: `/v1/generated/${fileName}` });
    const summary = await app.inject({ method: 'GET', url: `/v1/generated/${fileName}/summary` });

    expect(download.body).toBe('setblock 0 0 0 minecraft:stone\n');
    expect(summary.statusCode).toBe(400);
  });

  it('maps request and generation failures to status codes', async () => {
    const { app } = await setup(['nothing here', new ProviderError('upstream timeout')]);

    const empty = await app.inject({ method: 'POST', url: '/v1/generate', payload: { description: '' } });
    const unparsable = await app.inject({ method: 'POST', url: '/v1/generate', payload: { description: 'a hut' } });
    const upstream = await app.inject({ method: 'POST', url: '/v1/generate', payload: { description: 'a hut' } });
    const missing = await app.inject({ method: 'GET', url: '/v1/generated/missing.schem' });
    const escaping = await app.inject({ method: 'GET', url: '/v1/generated/..%2Fsecret.schem' });

    expect(empty.statusCode).toBe(400);
    expect(empty.json().error.code).toBe('INVALID_ARGUMENT');
    expect(unparsable.statusCode).toBe(422);
    expect(unparsable.json()).toEqual({
      error: {
        code: 'PARSE_FAILURE',
        message: 'No valid block placements found (1 lines skipped)',
        warnings: [{ line: 1, text: 'nothing here', reason: 'not a placement' }],
      },
    });
    expect(upstream.statusCode).toBe(502);
    expect(upstream.json()).toEqual({ error: { code: 'PROVIDER_ERROR', message: 'upstream timeout' } });
    expect(missing.statusCode).toBe(404);
    expect(missing.json().error.code).toBe('NOT_FOUND');
    expect(escaping.statusCode).toBe(400);
  });

  it('returns logged events filtered by type', async () => {
    const { app, ctx } = await setup([cubeLines(1)]);

    await app.inject({ method: 'POST', url: '/v1/generate', payload: { description: 'one block' } });
    await ctx.eventStore.flush();
    const res = await app.inject({ method: 'GET', url: '/v1/events?types=generation.written,generation.failed' });
    const { events } = res.json();

    expect(events).toHaveLength(1);
    expect(events[0].type).toBe('generation.written');
    expect(events[0].seq).toBe(4);
  });

  it('passes an uploaded reference image to the model', async () => {
    const { app, provider } = await setup([cubeLines(1)]);
    const image = { data: 'aGVsbG8=', mediaType: 'image/png' };

    const res = await app.inject({
      method: 'POST',
      url: '/v1/generate',
      payload: { description: 'a block like this', format: 'mcfunction', image },
    });
    const rejected = await app.inject({
      method: 'POST',
      url: '/v1/generate',
      payload: { description: 'a block', image: { data: 'aGVsbG8=', mediaType: 'image/bmp' } },
    });

    expect(res.statusCode).toBe(200);
    expect(provider.requests[0]?.image).toEqual(image);
    expect(rejected.statusCode).toBe(400);
    expect(provider.requests).toHaveLength(1);
  });

  it('streams published events to a connected client', async () => {
    const { app, ctx } = await setup([]);
    const address = await app.listen({ port: 0, host: '127.0.0.1' });
    const abort = new AbortController();
    const baseline = ctx.events.subscriberCount();

    try {
      const res = await fetch(`${address}/v1/events/stream`, { signal: abort.signal });
      expect(res.status).toBe(200);
      expect(res.headers.get('content-type')).toBe('text/event-stream');
      await vi.waitFor(() => expect(ctx.events.subscriberCount()).toBe(baseline + 1));

      const event = ctx.events.publish('log.note', { text: 'hello stream' });
      const frame = `id: ${event.seq}\nevent: log.note\ndata: ${JSON.stringify(event)}\n\n`;
      const body = res.body;
      if (!body) throw new Error('stream has no body');
      const reader = body.getReader();
      const decoder = new TextDecoder();
      let received = '';
      while (!received.includes(frame)) {
        const chunk = await reader.read();
        if (chunk.done) break;
        received += decoder.decode(chunk.value, { stream: true });
      }

      expect(received).toBe(frame);
    } finally {
      abort.abort();
    }
    await vi.waitFor(() => expect(ctx.events.subscriberCount()).toBe(baseline));
  });
});
