import Fastify from 'fastify';
import type { FastifyError } from 'fastify';
import cors from '@fastify/cors';
import fastifyStatic from '@fastify/static';
import { AppContext } from '../app-context.js';
import { PUBLIC_DIR } from '../lib/paths.js';
import { structurePlugin } from './plugin.js';

export type ServerOptions = Readonly<{
  /** Serve the form page from public/. */
  serveStatic?: boolean;
}>;

export async function buildServer(ctx: AppContext, options: ServerOptions = {}) {
  const app = Fastify({
    logger: {
      level: ctx.config.LOG_LEVEL,
    },
    bodyLimit: 12 * 1024 * 1024,
  });

  app.setErrorHandler<FastifyError>((error, request, reply) => {
    const statusCode = typeof error.statusCode === 'number' ? error.statusCode : 500;
    if (statusCode >= 500) request.log.error({ err: error }, 'request failed');
    return reply.code(statusCode).send({
      error: { code: statusCode < 500 ? 'INVALID_ARGUMENT' : 'INTERNAL', message: error.message },
    });
  });

  await app.register(cors, { origin: true });

  if (options.serveStatic ?? true) {
    await app.register(fastifyStatic, { root: PUBLIC_DIR });
  }

  await app.register(structurePlugin, { prefix: '/v1', ctx });

  return app;
}
