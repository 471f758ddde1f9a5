import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import {
  ErrorResponseSchema,
  HealthResponseSchema,
  IndustriesResponseSchema,
} from '@icp-outreach/contracts';
import type { CompanyIntelligenceClient, TaskPool } from '@icp-outreach/discovery';
import type { OpenAiAdapter, ResendAdapter } from '@icp-outreach/providers';

import type { ApiEnv } from './env.js';
import { registerCompaniesRoutes } from './modules/companies/companies.routes.js';
import { buildCompaniesService } from './modules/companies/companies.service.js';
import { registerOutreachRoutes } from './modules/outreach/outreach.routes.js';
import { buildOutreachService } from './modules/outreach/outreach.service.js';

export interface BuildServerOptions {
  env: ApiEnv;
  logger: FastifyBaseLogger;
  companyIntelligence: CompanyIntelligenceClient;
  generator: Pick<OpenAiAdapter, 'generateOutreachEmail' | 'isConfigured'>;
  mailer: Pick<ResendAdapter, 'sendEmail' | 'isConfigured'>;
  companyPool: TaskPool;
  peoplePool: TaskPool;
  industries: readonly string[];
  /** Calendar year company age is scored against. */
  referenceYear: number;
}

export function buildServer(options: BuildServerOptions): FastifyInstance {
  const app = Fastify({
    loggerInstance: options.logger,
    disableRequestLogging: false,
    requestIdHeader: 'x-request-id',
    requestIdLogLabel: 'requestId',
  });

  app.register(cors, {
    origin: options.env.CORS_ORIGIN,
    credentials: true,
  });

  app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
    allowList: ['127.0.0.1'],
  });

  app.addHook('onSend', (request, reply, payload, done) => {
    reply.header('x-request-id', request.id);
    done(null, payload);
  });

  app.get('/health', async () => {
    return HealthResponseSchema.parse({
      status: 'ok',
      services: {
        companyIntelligence: 'configured',
        llm: options.generator.isConfigured ? 'configured' : 'not_configured',
        email: options.mailer.isConfigured ? 'configured' : 'not_configured',
      },
    });
  });

  app.get('/industries', async () => {
    return IndustriesResponseSchema.parse({ industries: options.industries });
  });

  registerCompaniesRoutes(
    app,
    buildCompaniesService({
      client: options.companyIntelligence,
      companyPool: options.companyPool,
      peoplePool: options.peoplePool,
      logger: options.logger,
      referenceYear: options.referenceYear,
      resultLimit: options.env.SEARCH_RESULT_LIMIT,
      pageSize: options.env.SCREEN_PAGE_SIZE,
    }),
  );

  registerOutreachRoutes(
    app,
    buildOutreachService({
      generator: options.generator,
      mailer: options.mailer,
      logger: options.logger,
      defaultProductVision: options.env.OUTREACH_PRODUCT_VISION,
    }),
  );

  app.setNotFoundHandler((request, reply) => {
    reply.status(404).send(
      ErrorResponseSchema.parse({
        error: 'Route not found',
        requestId: request.id,
      }),
    );
  });

  app.setErrorHandler((error, request, reply) => {
    // Malformed bodies and rate limiting arrive here with their own 4xx status.
    const statusCode = error.statusCode ?? 500;
    if (statusCode >= 400 && statusCode < 500) {
      reply.status(statusCode).send(
        ErrorResponseSchema.parse({
          error: error.message,
          requestId: request.id,
        }),
      );
      return;
    }

    request.log.error({ err: error }, 'Unhandled API error');

    if (!reply.sent) {
      reply.status(500).send(
        ErrorResponseSchema.parse({
          error: 'Internal server error',
          requestId: request.id,
        }),
      );
    }
  });

  return app;
}
