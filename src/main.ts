import { loadConfig } from './config.js';
import { createAppContext } from './app-context.js';
import { buildServer } from './api/server.js';

async function main() {
  const config = loadConfig();
  const ctx = await createAppContext(config);
  const { events } = ctx;

  events.publish('app.start', { pid: process.pid, outputDir: ctx.output.dir });

  const server = await buildServer(ctx);
  await server.listen({ port: config.PORT, host: config.HOST });

  let shuttingDown = false;

  async function shutdown(signal: string) {
    if (shuttingDown) return;
    shuttingDown = true;
    events.publish('log.note', { text: `shutdown requested (${signal})`, tags: ['lifecycle'] });
    try {
      await server.close();
    } catch (err) {
      console.error('server.close failed', err);
    }
    await ctx.eventStore.flush();
    process.exit(0);
  }

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));

  process.on('uncaughtException', err => {
    events.publish('app.error', { message: `uncaughtException: ${err.message}`, stack: err.stack });
    console.error('uncaughtException:', err);
  });

  process.on('unhandledRejection', reason => {
    const message = reason instanceof Error ? reason.message : String(reason);
    const stack = reason instanceof Error ? reason.stack : undefined;
    events.publish('app.error', { message: `unhandledRejection: ${message}`, stack });
    console.error('unhandledRejection:', reason);
  });
}

main().catch(err => {
  console.error(err);
  process.exitCode = 1;
});
