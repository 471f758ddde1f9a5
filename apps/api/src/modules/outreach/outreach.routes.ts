import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  ErrorResponseSchema,
  formatIssues,
  SendEmailRequestSchema,
  SendEmailResponseSchema,
} from '@icp-outreach/contracts';

import {
  EmailDeliveryError,
  EmailGenerationError,
  OutreachNotConfiguredError,
  ProductVisionMissingError,
} from './outreach.errors.js';
import type { OutreachService } from './outreach.service.js';

function handleModuleError(error: unknown, request: FastifyRequest, reply: FastifyReply): boolean {
  if (error instanceof OutreachNotConfiguredError) {
    reply.status(503).send(ErrorResponseSchema.parse({ error: error.message, requestId: request.id }));
    return true;
  }

  if (error instanceof ProductVisionMissingError) {
    reply.status(400).send(ErrorResponseSchema.parse({ error: error.message, requestId: request.id }));
    return true;
  }

  if (error instanceof EmailGenerationError || error instanceof EmailDeliveryError) {
    const stage = error instanceof EmailGenerationError ? 'generation' : 'delivery';
    reply.status(502).send(
      ErrorResponseSchema.parse({
        error: `Email ${stage} failed`,
        requestId: request.id,
        details: [error.message],
      }),
    );
    return true;
  }

  return false;
}

export function registerOutreachRoutes(app: FastifyInstance, service: OutreachService): void {
  app.post(
    '/send-email',
    { config: { rateLimit: { max: 10, timeWindow: '1 minute' } } },
    async (request, reply) => {
      const parsed = SendEmailRequestSchema.safeParse(request.body);
      if (!parsed.success) {
        reply.status(400);
        return ErrorResponseSchema.parse({
          error: 'Invalid send-email payload',
          requestId: request.id,
          details: formatIssues(parsed.error),
        });
      }

      try {
        const result = await service.sendEmail(parsed.data);
        return SendEmailResponseSchema.parse(result);
      } catch (error: unknown) {
        if (handleModuleError(error, request, reply)) {
          return;
        }
        throw error;
      }
    },
  );
}
