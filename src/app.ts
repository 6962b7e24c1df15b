import { STATUS_CODES } from 'http';
import Fastify, { type FastifyInstance, type FastifyServerOptions } from 'fastify';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { validationRoutes } from './routes/validation.routes.js';
import type { EmailValidationService } from './services/email-validation.service.js';
import { metrics as defaultMetrics, type MetricsService } from './services/metrics.service.js';
import { logger as defaultLogger, type StructuredLogger } from './services/logger.service.js';

export interface BuildAppOptions {
  validationService: EmailValidationService;
  maxBatchSize?: number;
  checkMxByDefault?: boolean;
  /** Serve the OpenAPI document and UI under /docs */
  docs?: boolean;
  fastifyLogger?: FastifyServerOptions['logger'];
  logger?: StructuredLogger;
  metrics?: MetricsService;
}

/**
 * Builds the HTTP application without binding a port
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const {
    validationService,
    maxBatchSize = 1000,
    checkMxByDefault = true,
    docs = true,
    logger = defaultLogger,
    metrics = defaultMetrics,
  } = options;

  const fastify = Fastify({ logger: options.fastifyLogger ?? false });

  // Swagger collects routes through onRoute, so it goes first
  if (docs) {
    await fastify.register(swagger, {
      openapi: {
        info: {
          title: 'Mailcheck API',
          description: 'Email validation with disposable-domain lists and cached MX lookups',
          version: '1.0.0',
        },
        tags: [
          { name: 'Validation', description: 'Email validation operations' },
          { name: 'Lists', description: 'Block and allow list management' },
          { name: 'Cache', description: 'MX cache management' },
          { name: 'Health', description: 'Health and monitoring endpoints' },
        ],
      },
    });

    await fastify.register(swaggerUi, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: true,
      },
    });
  }

  // Metrics tracking
  fastify.addHook('onResponse', async (request, reply) => {
    const route = request.routeOptions.url ?? request.url;
    metrics.recordApiRequest(request.method, route, reply.statusCode, reply.elapsedTime / 1000);
  });

  fastify.setErrorHandler((error, request, reply) => {
    if (error.validation) {
      return reply.code(400).send({ error: 'Bad Request', message: error.message });
    }

    // Client errors raised by Fastify itself (bad JSON, media type, body size)
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return reply
        .code(error.statusCode)
        .send({ error: STATUS_CODES[error.statusCode] ?? 'Bad Request', message: error.message });
    }

    logger.error('Unhandled request error', { route: request.url, error });
    return reply.code(500).send({ error: 'Internal Server Error', message: 'Unexpected error' });
  });

  await fastify.register(validationRoutes, { validationService, maxBatchSize, checkMxByDefault });

  // Health check endpoint
  fastify.get('/health', {
    schema: {
      description: 'Health check endpoint - reports list sizes and MX cache state',
      tags: ['Health'],
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            timestamp: { type: 'string', format: 'date-time' },
            lists: {
              type: 'object',
              properties: {
                blocklist: { type: 'number' },
                allowlist: { type: 'number' },
              },
            },
            mxCache: {
              type: 'object',
              properties: {
                enabled: { type: 'boolean' },
                size: { type: 'number' },
              },
            },
          },
        },
      },
    },
  }, async () => {
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      lists: {
        blocklist: validationService.getBlocklistCount(),
        allowlist: validationService.getAllowlistCount(),
      },
      mxCache: {
        enabled: validationService.isCacheEnabled(),
        size: validationService.getCacheSize(),
      },
    };
  });

  // Metrics endpoint
  fastify.get('/metrics', {
    schema: {
      description: 'Prometheus metrics endpoint - returns metrics in Prometheus text format',
      tags: ['Health'],
    },
  }, async (_request, reply) => {
    try {
      const metricsOutput = await metrics.getMetrics();
      reply.type('text/plain');
      return metricsOutput;
    } catch (error) {
      logger.error('Failed to generate metrics', { error });
      reply.code(500);
      return { error: 'Failed to generate metrics' };
    }
  });

  return fastify;
}
