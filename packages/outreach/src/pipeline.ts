import type { OpenAiAdapter, ResendAdapter } from '@icp-outreach/providers';

export interface OutreachLogger {
  info: (object: Record<string, unknown>, message: string) => void;
  warn: (object: Record<string, unknown>, message: string) => void;
}

export interface OutreachDependencies {
  generator: Pick<OpenAiAdapter, 'generateOutreachEmail'>;
  mailer: Pick<ResendAdapter, 'sendEmail'>;
  logger: OutreachLogger;
}

export interface SendPersonalizedEmailInput {
  recipientEmail: string;
  profileText: string;
  productVision: string;
}

export type SendPersonalizedEmailResult =
  | {
      status: 'sent';
      recipientEmail: string;
      subject: string;
      bodyHtml: string;
      providerMessageId: string;
    }
  | { status: 'generation_failed'; reason: string; retryable: boolean }
  | { status: 'delivery_failed'; reason: string; retryable: boolean; subject: string };

/** Writes the email with the LLM, then hands it to the email provider once. */
export async function sendPersonalizedEmail(
  input: SendPersonalizedEmailInput,
  dependencies: OutreachDependencies,
): Promise<SendPersonalizedEmailResult> {
  const generated = await dependencies.generator.generateOutreachEmail({
    profileText: input.profileText,
    productVision: input.productVision,
  });

  if (generated.status !== 'success') {
    dependencies.logger.warn(
      {
        recipientEmail: input.recipientEmail,
        statusCode: generated.failure.statusCode,
        reason: generated.failure.message,
      },
      'Outreach email generation failed',
    );
    return {
      status: 'generation_failed',
      reason: generated.failure.message,
      retryable: generated.status === 'retryable_error',
    };
  }

  const { subject, bodyHtml } = generated.data;
  const delivery = await dependencies.mailer.sendEmail({
    to: input.recipientEmail,
    subject,
    bodyHtml,
  });

  if (delivery.status !== 'success') {
    dependencies.logger.warn(
      {
        recipientEmail: input.recipientEmail,
        statusCode: delivery.failure.statusCode,
        reason: delivery.failure.message,
      },
      'Outreach email delivery failed',
    );
    return {
      status: 'delivery_failed',
      reason: delivery.failure.message,
      retryable: delivery.status === 'retryable_error',
      subject,
    };
  }

  dependencies.logger.info(
    {
      recipientEmail: input.recipientEmail,
      model: generated.data.model,
      providerMessageId: delivery.providerMessageId,
    },
    'Outreach email sent',
  );

  return {
    status: 'sent',
    recipientEmail: input.recipientEmail,
    subject,
    bodyHtml,
    providerMessageId: delivery.providerMessageId,
  };
}
