import { z } from 'zod';

export const DecisionMakerSchema = z.object({
  name: z.string(),
  title: z.string(),
  linkedin_profile_url: z.string().nullable(),
  flagship_profile_url: z.string().nullable(),
  email: z.string().nullable(),
  location: z.string().nullable(),
  headline: z.string().nullable(),
  profile_picture_url: z.string().nullable(),
  company_name: z.string(),
  is_decision_maker: z.boolean(),
});

export const CompanyPeopleQuerySchema = z.object({
  company_name: z.string().trim().min(1).max(200).optional(),
});

export const CompanyPeopleResponseSchema = z.object({
  decision_makers: z.array(DecisionMakerSchema).max(5),
  company_name: z.string(),
  company_domain: z.string(),
  total_found: z.number().int().nonnegative(),
});

export type DecisionMakerPayload = z.infer<typeof DecisionMakerSchema>;
export type CompanyPeopleQuery = z.infer<typeof CompanyPeopleQuerySchema>;
export type CompanyPeopleResponse = z.infer<typeof CompanyPeopleResponseSchema>;
