import { extractEmailFromProfile, profileJsonToText, sendPersonalizedEmail } from '@icp-outreach/outreach';
import { createLogger } from '@icp-outreach/observability';
import { OpenAiAdapter, ResendAdapter } from '@icp-outreach/providers';
import pino from 'pino';
import { z } from 'zod';

import { readInput, readOption } from '../lib/io.js';

const SendEnvSchema = z.object({
  APP_ENV: z.string().min(1).default('local'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  OPENAI_API_KEY: z.string().min(1),
  OPENAI_GENERATION_MODEL: z.string().min(1).optional(),
  RESEND_API_KEY: z.string().min(1),
  SENDER_EMAIL: z.string().email(),
});

/** `linkedin_profile` is the raw profile export, usually a JSON string. */
const SendInputSchema = z.object({
  product_vision: z.string().trim().min(1),
  linkedin_profile: z.union([z.string(), z.array(z.unknown()), z.record(z.unknown())]),
});

async function main(): Promise<void> {
  const env = SendEnvSchema.parse(process.env);
  const argv = process.argv.slice(2);
  const dryRun = argv.includes('--dry-run');
  const logger = createLogger({
    service: 'send-personalized-email',
    env: env.APP_ENV,
    level: env.LOG_LEVEL,
    destination: pino.destination(2),
  });

  const input = SendInputSchema.parse(JSON.parse(await readInput(readOption(argv, '--input'))));
  const rawProfile =
    typeof input.linkedin_profile === 'string' ? input.linkedin_profile : JSON.stringify(input.linkedin_profile);

  const recipientEmail = extractEmailFromProfile(rawProfile);
  if (!recipientEmail) {
    throw new Error('Could not find an email address in the provided LinkedIn profile data');
  }

  const profileText = profileJsonToText(rawProfile);
  if (!profileText) {
    throw new Error('Could not convert the LinkedIn profile data to readable text');
  }

  const generator = new OpenAiAdapter({
    apiKey: env.OPENAI_API_KEY,
    generationModel: env.OPENAI_GENERATION_MODEL,
  });
  const resend = new ResendAdapter({ apiKey: env.RESEND_API_KEY, fromEmail: env.SENDER_EMAIL });
  const previewOnly: Pick<ResendAdapter, 'sendEmail'> = {
    sendEmail: async () => ({ status: 'success', providerMessageId: 'dry-run' }),
  };

  const result = await sendPersonalizedEmail(
    { recipientEmail, profileText, productVision: input.product_vision },
    { generator, mailer: dryRun ? previewOnly : resend, logger },
  );

  if (result.status !== 'sent') {
    throw new Error(`Outreach ${result.status.replace('_', ' ')}: ${result.reason}`);
  }

  console.log(
    [
      '--- Generated Personalized Email Preview ---',
      `To: ${result.recipientEmail}`,
      `From: ${env.SENDER_EMAIL}`,
      `Subject: ${result.subject}`,
      '',
      'HTML Body:',
      '',
      result.bodyHtml,
      '--------------------------------------------',
      dryRun ? 'Dry run: email not sent.' : `Sent, provider message id ${result.providerMessageId}`,
    ].join('\n'),
  );
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : 'Unknown outreach failure';
  console.error(
    JSON.stringify({
      event: 'outreach.send.failed',
      error: message,
    }),
  );
  process.exit(1);
});
