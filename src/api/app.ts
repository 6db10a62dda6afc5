import Fastify, { FastifyError, FastifyInstance, FastifyServerOptions } from 'fastify';
import fastifyStatic from '@fastify/static';
import type { DebugCapture } from '../browser/index.js';
import type { ScraperServices } from '../services.js';
import { ApiError, ErrorCode } from './errors.js';
import { registerMcpSseRoutes } from './mcp-sse.js';
import { registerRoutes } from './routes.js';

export interface BuildAppOptions {
  logger?: FastifyServerOptions['logger'];
  /** Serves saved debug screenshots under /screenshots/ when enabled. */
  capture?: DebugCapture;
}

export function registerErrorHandler(app: FastifyInstance): void {
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof ApiError) {
      reply.status(error.statusCode).send(error.toResponse());
      return;
    }
    // Fastify's own client errors: malformed JSON, unsupported media type
    if (typeof error.statusCode === 'number' && error.statusCode < 500) {
      reply.status(error.statusCode).send(
        new ApiError(ErrorCode.INVALID_REQUEST, error.message, error.statusCode).toResponse(),
      );
      return;
    }
    request.log.error({ err: error }, 'Unhandled error');
    reply.status(500).send({
      error: {
        code: ErrorCode.INTERNAL_ERROR,
        message: 'Internal server error',
      },
    });
  });
}

export async function registerScreenshots(app: FastifyInstance, capture: DebugCapture): Promise<void> {
  if (!capture.enabled) return;
  capture.ensureDir();
  await app.register(fastifyStatic, {
    root: capture.dir,
    prefix: '/screenshots/',
    cacheControl: false,
  });
}

export async function buildApp(services: ScraperServices, options: BuildAppOptions = {}): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? false });
  if (options.capture) {
    await registerScreenshots(app, options.capture);
  }
  registerErrorHandler(app);
  registerRoutes(app, services);
  registerMcpSseRoutes(app, services);
  return app;
}
