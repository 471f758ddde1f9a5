import { CrustdataClient, createTaskPool } from '@icp-outreach/discovery';
import { createLogger } from '@icp-outreach/observability';
import { OpenAiAdapter, ResendAdapter } from '@icp-outreach/providers';

import { loadApiEnv } from './env.js';
import { loadIndustries } from './industries.js';
import { buildServer } from './server.js';

async function main(): Promise<void> {
  const env = loadApiEnv(process.env);
  const logger = createLogger({
    service: 'api',
    env: env.APP_ENV,
    level: env.LOG_LEVEL,
  });

  const referenceYear = env.SCORING_REFERENCE_YEAR ?? new Date().getUTCFullYear();
  const generator = new OpenAiAdapter({
    apiKey: env.OPENAI_API_KEY,
    generationModel: env.OPENAI_GENERATION_MODEL,
  });
  const mailer = new ResendAdapter({
    apiKey: env.RESEND_API_KEY,
    fromEmail: env.SENDER_EMAIL,
  });

  if (!generator.isConfigured || !mailer.isConfigured) {
    logger.warn(
      { llm: generator.isConfigured, email: mailer.isConfigured },
      'Email outreach is disabled until OPENAI_API_KEY, RESEND_API_KEY and SENDER_EMAIL are set',
    );
  }

  const server = buildServer({
    env,
    logger,
    companyIntelligence: new CrustdataClient({
      apiToken: env.CRUSTDATA_API_TOKEN,
      baseUrl: env.CRUSTDATA_BASE_URL,
      timeoutMs: env.CRUSTDATA_TIMEOUT_MS,
    }),
    generator,
    mailer,
    companyPool: createTaskPool(env.DISCOVERY_CONCURRENCY),
    peoplePool: createTaskPool(env.PEOPLE_CONCURRENCY),
    industries: await loadIndustries(),
    referenceYear,
  });

  await server.listen({
    host: '0.0.0.0',
    port: env.API_PORT,
  });

  logger.info({ port: env.API_PORT, referenceYear }, 'API listening');

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Shutting down API');
    await server.close();
    process.exit(0);
  };

  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
}

main().catch((error: unknown) => {
  console.error('API boot failed:', error);
  process.exit(1);
});
