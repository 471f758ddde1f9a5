import { z } from 'zod';

import { IcpSchema } from './icp.contract.js';

export const CompanyDetailSchema = z.object({
  name: z.string(),
  domain: z.string(),
  headcount: z.number().int().nonnegative(),
  revenue: z.number().int().nonnegative(),
  headquarters: z.string().nullable(),
  industries: z.array(z.string()).max(3),
  founded_year: z.string().nullable(),
});

export const CompanyResultSchema = CompanyDetailSchema.extend({
  score: z.number().min(0).max(1),
});

export const SearchCompaniesResponseSchema = z.object({
  companies: z.array(CompanyResultSchema),
  total_found: z.number().int().nonnegative(),
  search_time_ms: z.number().int().nonnegative(),
  icp: IcpSchema,
});

export const CompanyDomainParamsSchema = z
  .object({
    domain: z
      .string()
      .trim()
      .min(3)
      .max(253)
      .regex(/^[A-Za-z0-9.-]+\.[A-Za-z]{2,}$/, 'must be a bare domain such as example.com'),
  })
  .strict();

export const IndustriesResponseSchema = z.object({
  industries: z.array(z.string()),
});

export type CompanyDetail = z.infer<typeof CompanyDetailSchema>;
export type CompanyResult = z.infer<typeof CompanyResultSchema>;
export type SearchCompaniesResponse = z.infer<typeof SearchCompaniesResponseSchema>;
export type CompanyDomainParams = z.infer<typeof CompanyDomainParamsSchema>;
export type IndustriesResponse = z.infer<typeof IndustriesResponseSchema>;
