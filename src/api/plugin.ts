import type { FastifyError, FastifyPluginAsync, FastifyReply } from 'fastify';
import { AppContext } from '../app-context.js';
import { decodeSchematic, summarizeSchematic } from '../encoder/schematic.js';
import { AppEvents } from '../events/event-types.js';
import { AbortError, ErrorCode, GenerationError, InvalidArgumentError, ParseFailure } from '../lib/errors.js';
import {
  blocksQuerySchema,
  eventsQuerySchema,
  fileParamsSchema,
  generateBodySchema,
  parseBody,
} from '../lib/schemas.js';

export type StructurePluginOptions = Readonly<{
  ctx: AppContext;
}>;

const STATUS_BY_CODE: Readonly<Record<ErrorCode, number>> = {
  INVALID_ARGUMENT: 400,
  NOT_FOUND: 404,
  PARSE_FAILURE: 422,
  ENCODING_ERROR: 422,
  PROVIDER_ERROR: 502,
  IO_ERROR: 500,
};

const HEARTBEAT_MS = 15_000;

function sendError(reply: FastifyReply, status: number, code: string, message: string, extra: object = {}) {
  return reply.code(status).send({ error: { code, message, ...extra } });
}

/**
 * The generator page's HTTP surface. Mount it under any prefix; errors are
 * handled inside the plugin so a host server keeps its own handler.
 */
export const structurePlugin: FastifyPluginAsync<StructurePluginOptions> = async (app, { ctx }) => {
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof ParseFailure) {
      return sendError(reply, STATUS_BY_CODE[error.code], error.code, error.message, { warnings: error.warnings });
    }
    if (error instanceof GenerationError) {
      return sendError(reply, STATUS_BY_CODE[error.code], error.code, error.message);
    }
    if (error instanceof AbortError) {
      return sendError(reply, 499, 'ABORTED', error.message);
    }
    const statusCode = typeof error.statusCode === 'number' ? error.statusCode : 500;
    if (statusCode < 500) {
      return sendError(reply, statusCode, 'INVALID_ARGUMENT', error.message);
    }
    request.log.error({ err: error }, 'request failed');
    return sendError(reply, 500, 'INTERNAL', error.message);
  });

  app.get('/health', async () => ({ ok: true }));

  app.get('/versions', async () => ({
    versions: ctx.versions.list(),
    default: ctx.versions.defaultId,
  }));

  app.get('/blocks', async req => {
    const query = parseBody(blocksQuerySchema, req.query);
    const version = query.version ? ctx.versions.resolve(query.version) : ctx.versions.getDefault();
    if (!version) throw new InvalidArgumentError(`Unknown Minecraft version ${query.version}`);
    const blocks = ctx.catalog
      .listForVersion(version)
      .filter(b => !query.category || b.category === query.category);
    return {
      version: version.id,
      categories: ctx.catalog.getCategories(version),
      blocks,
    };
  });

  app.post('/generate', async (req, reply) => {
    const body = parseBody(generateBodySchema, req.body);
    const abort = new AbortController();
    reply.raw.on('close', () => {
      if (!reply.raw.writableEnded) abort.abort('client disconnected');
    });
    const result = await ctx.generator.generate({
      description: body.description,
      version: body.version,
      format: body.format,
      image: body.image,
      abortSignal: abort.signal,
    });
    req.log.info(
      { generationId: result.generationId, fileName: result.fileName, warnings: result.warnings.length },
      'structure generated',
    );
    return reply.send(result);
  });

  app.get('/generated/:fileName', async (req, reply) => {
    const { fileName } = parseBody(fileParamsSchema, req.params);
    const data = await ctx.output.read(fileName);
    const isSchematic = fileName.endsWith('.schem');
    return reply
      .type(isSchematic ? 'application/octet-stream' : 'text/plain; charset=utf-8')
      .header('content-disposition', `attachment; filename="${fileName}"`)
      .send(data);
  });

  app.get('/generated/:fileName/summary', async req => {
    const { fileName } = parseBody(fileParamsSchema, req.params);
    if (!fileName.endsWith('.schem')) {
      throw new InvalidArgumentError('Summaries are only available for .schem files');
    }
    const data = await ctx.output.read(fileName);
    return { fileName, ...summarizeSchematic(decodeSchematic(data)) };
  });

  app.get('/events', async req => {
    const query = parseBody(eventsQuerySchema, req.query);
    const events = await ctx.eventStore.readSince(query.sinceSeq, query.limit, query.types);
    return { events };
  });

  // The socket belongs to the stream until the client goes away.
  app.get('/events/stream', (req, reply) => {
    reply.hijack();
    const out = reply.raw;
    out.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache, no-transform',
      Connection: 'keep-alive',
    });
    out.flushHeaders();

    const unsubscribe = ctx.events.onAny((event: AppEvents) => {
      out.write(`id: ${event.seq}\nevent: ${event.type}\ndata: ${JSON.stringify(event)}\n\n`);
    });
    const heartbeat = setInterval(() => out.write(': heartbeat\n\n'), HEARTBEAT_MS);

    req.raw.on('close', () => {
      clearInterval(heartbeat);
      unsubscribe();
    });
  });
};
