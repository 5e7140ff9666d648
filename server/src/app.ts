import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fastifyCompress from '@fastify/compress';
import fastifyCors from '@fastify/cors';
import type { ApiErrorResponse, HealthResponse } from '@notekeeper/shared';
import configPlugin, { isLogLevel } from './plugins/config.js';
import errorHandlerPlugin from './plugins/errorHandler.js';
import storePlugin from './plugins/store.js';
import noteRoutes from './routes/notes.js';

export async function buildApp(): Promise<FastifyInstance> {
  // An invalid LOG_LEVEL is reported by the config plugin
  const requestedLevel = (process.env.LOG_LEVEL || 'info').toLowerCase();

  const app = Fastify({
    logger: {
      level: isLogLevel(requestedLevel) ? requestedLevel : 'info',
    },
    trustProxy: process.env.TRUST_PROXY?.toLowerCase() === 'true',
    // Bodies must carry the declared JSON types; no string coercion
    ajv: {
      customOptions: {
        coerceTypes: false,
      },
    },
  });

  // Configuration (must be first)
  await app.register(configPlugin);

  // Error handler (after config, before routes)
  await app.register(errorHandlerPlugin);

  // CORS: every method and header; origin from config ('*' by default)
  await app.register(fastifyCors, {
    origin: app.config.corsOrigin,
    methods: ['GET', 'HEAD', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
  });

  // Compression (gzip/deflate/brotli)
  await app.register(fastifyCompress);

  // In-memory note store
  await app.register(storePlugin);

  // Note routes
  await app.register(noteRoutes, { prefix: '/notes' });

  // Health check endpoint (liveness)
  app.get('/health', async (): Promise<HealthResponse> => {
    return { status: 'ok' };
  });

  app.setNotFoundHandler((request, reply) => {
    const response: ApiErrorResponse = {
      error: {
        code: 'ROUTE_NOT_FOUND',
        message: `Route ${request.method} ${request.url} not found`,
      },
    };
    return reply.status(404).send(response);
  });

  return app;
}
