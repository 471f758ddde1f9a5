import type { SendEmailRequest, SendEmailResponse } from '@icp-outreach/contracts';
import {
  buildRecipientProfileText,
  sendPersonalizedEmail,
  type OutreachDependencies,
} from '@icp-outreach/outreach';
import type { OpenAiAdapter, ResendAdapter } from '@icp-outreach/providers';

import {
  EmailDeliveryError,
  EmailGenerationError,
  OutreachNotConfiguredError,
  ProductVisionMissingError,
} from './outreach.errors.js';

export interface OutreachServiceDependencies {
  generator: Pick<OpenAiAdapter, 'generateOutreachEmail' | 'isConfigured'>;
  mailer: Pick<ResendAdapter, 'sendEmail' | 'isConfigured'>;
  logger: OutreachDependencies['logger'];
  defaultProductVision?: string | undefined;
}

export interface OutreachService {
  sendEmail(input: SendEmailRequest): Promise<SendEmailResponse>;
}

export function buildOutreachService(dependencies: OutreachServiceDependencies): OutreachService {
  return {
    async sendEmail(input) {
      if (!dependencies.generator.isConfigured) {
        throw new OutreachNotConfiguredError('Email generation is not configured (OPENAI_API_KEY)');
      }
      if (!dependencies.mailer.isConfigured) {
        throw new OutreachNotConfiguredError(
          'Email delivery is not configured (RESEND_API_KEY, SENDER_EMAIL)',
        );
      }

      const productVision = input.product_vision ?? dependencies.defaultProductVision;
      if (!productVision) {
        throw new ProductVisionMissingError();
      }

      const result = await sendPersonalizedEmail(
        {
          recipientEmail: input.recipient_email,
          productVision,
          profileText: buildRecipientProfileText({
            name: input.recipient_name,
            title: input.recipient_title,
            companyName: input.company_name,
            linkedinProfileUrl: input.linkedin_profile_url,
          }),
        },
        dependencies,
      );

      switch (result.status) {
        case 'generation_failed':
          throw new EmailGenerationError(result.reason, result.retryable);
        case 'delivery_failed':
          throw new EmailDeliveryError(result.reason, result.retryable);
        case 'sent':
          return {
            status: 'sent',
            recipient_email: result.recipientEmail,
            subject: result.subject,
            provider_message_id: result.providerMessageId,
          };
      }
    },
  };
}
