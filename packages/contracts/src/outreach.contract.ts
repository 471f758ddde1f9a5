import { z } from 'zod';

export const SendEmailRequestSchema = z.object({
  recipient_email: z.string().trim().email(),
  recipient_name: z.string().trim().min(1).max(200),
  recipient_title: z.string().trim().max(200),
  company_name: z.string().trim().min(1).max(200),
  linkedin_profile_url: z.string().url().optional(),
  product_vision: z.string().trim().min(1).max(4000).optional(),
});

export const SendEmailResponseSchema = z.object({
  status: z.literal('sent'),
  recipient_email: z.string(),
  subject: z.string(),
  provider_message_id: z.string(),
});

export type SendEmailRequest = z.infer<typeof SendEmailRequestSchema>;
export type SendEmailResponse = z.infer<typeof SendEmailResponseSchema>;
