import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import {
  CompanyDetailSchema,
  CompanyDomainParamsSchema,
  CompanyPeopleQuerySchema,
  CompanyPeopleResponseSchema,
  ErrorResponseSchema,
  formatIssues,
  IcpSchema,
  SearchCompaniesResponseSchema,
} from '@icp-outreach/contracts';
import type { ZodError } from 'zod';

import { CompanyIntelligenceUnavailableError, CompanyNotFoundError } from './companies.errors.js';
import type { CompaniesService } from './companies.service.js';

function sendValidationError(reply: FastifyReply, requestId: string, message: string, error: ZodError) {
  reply.status(400);
  return ErrorResponseSchema.parse({
    error: message,
    requestId,
    details: formatIssues(error),
  });
}

function handleModuleError(error: unknown, request: FastifyRequest, reply: FastifyReply): boolean {
  if (error instanceof CompanyNotFoundError) {
    reply.status(404).send(ErrorResponseSchema.parse({ error: error.message, requestId: request.id }));
    return true;
  }

  if (error instanceof CompanyIntelligenceUnavailableError) {
    request.log.warn(
      { err: error, upstreamStatus: error.upstreamStatus },
      'Company intelligence provider request failed',
    );
    reply.status(502).send(
      ErrorResponseSchema.parse({
        error: 'Company intelligence provider request failed',
        requestId: request.id,
        details: [error.message],
      }),
    );
    return true;
  }

  return false;
}

export function registerCompaniesRoutes(app: FastifyInstance, service: CompaniesService): void {
  app.post('/search-companies', async (request, reply) => {
    const parsed = IcpSchema.safeParse(request.body);
    if (!parsed.success) {
      return sendValidationError(reply, request.id, 'Invalid ICP payload', parsed.error);
    }

    try {
      const result = await service.searchCompanies(parsed.data);
      return SearchCompaniesResponseSchema.parse(result);
    } catch (error: unknown) {
      if (handleModuleError(error, request, reply)) {
        return;
      }
      throw error;
    }
  });

  app.get('/company/:domain', async (request, reply) => {
    const params = CompanyDomainParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, request.id, 'Invalid company domain', params.error);
    }

    try {
      const company = await service.getCompany(params.data.domain);
      return CompanyDetailSchema.parse(company);
    } catch (error: unknown) {
      if (handleModuleError(error, request, reply)) {
        return;
      }
      throw error;
    }
  });

  app.get('/company/:domain/people', async (request, reply) => {
    const params = CompanyDomainParamsSchema.safeParse(request.params);
    if (!params.success) {
      return sendValidationError(reply, request.id, 'Invalid company domain', params.error);
    }

    const query = CompanyPeopleQuerySchema.safeParse(request.query);
    if (!query.success) {
      return sendValidationError(reply, request.id, 'Invalid company people query', query.error);
    }

    try {
      const result = await service.getDecisionMakers(
        params.data.domain,
        query.data.company_name ?? params.data.domain,
      );
      return CompanyPeopleResponseSchema.parse(result);
    } catch (error: unknown) {
      if (handleModuleError(error, request, reply)) {
        return;
      }
      throw error;
    }
  });
}
