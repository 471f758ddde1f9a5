import { z } from 'zod';

export const ServiceStatusSchema = z.enum(['configured', 'not_configured']);

export const HealthResponseSchema = z.object({
  status: z.literal('ok'),
  services: z.object({
    companyIntelligence: ServiceStatusSchema,
    llm: ServiceStatusSchema,
    email: ServiceStatusSchema,
  }),
});

export type ServiceStatus = z.infer<typeof ServiceStatusSchema>;
export type HealthResponse = z.infer<typeof HealthResponseSchema>;
