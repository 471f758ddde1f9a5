import { formatIssues, IcpSchema } from '@icp-outreach/contracts';
import { CrustdataClient, createTaskPool, searchCompanies } from '@icp-outreach/discovery';
import { createLogger } from '@icp-outreach/observability';
import pino from 'pino';
import { z } from 'zod';

import { readInput, readOption } from '../lib/io.js';

const SearchEnvSchema = z.object({
  APP_ENV: z.string().min(1).default('local'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
  CRUSTDATA_API_TOKEN: z.string().min(1),
  CRUSTDATA_BASE_URL: z.string().url().optional(),
  DISCOVERY_CONCURRENCY: z.coerce.number().int().positive().default(4),
  SEARCH_RESULT_LIMIT: z.coerce.number().int().positive().default(20),
  SCORING_REFERENCE_YEAR: z.coerce.number().int().min(1900).max(9999).optional(),
});

async function main(): Promise<void> {
  const env = SearchEnvSchema.parse(process.env);
  const argv = process.argv.slice(2);
  const logger = createLogger({
    service: 'search-companies',
    env: env.APP_ENV,
    level: env.LOG_LEVEL,
    destination: pino.destination(2),
  });

  const parsedIcp = IcpSchema.safeParse(JSON.parse(await readInput(readOption(argv, '--icp'))));
  if (!parsedIcp.success) {
    throw new Error(`Invalid ICP:\n${formatIssues(parsedIcp.error).join('\n')}`);
  }

  const limitOption = Number.parseInt(readOption(argv, '--limit') ?? '', 10);
  const icp = parsedIcp.data;
  const result = await searchCompanies(
    {
      industries: icp.industries,
      revenueMin: icp.revenue_min,
      revenueMax: icp.revenue_max,
      headcountMin: icp.headcount_min,
      headcountMax: icp.headcount_max,
    },
    {
      client: new CrustdataClient({ apiToken: env.CRUSTDATA_API_TOKEN, baseUrl: env.CRUSTDATA_BASE_URL }),
      pool: createTaskPool(env.DISCOVERY_CONCURRENCY),
      logger,
      referenceYear: env.SCORING_REFERENCE_YEAR ?? new Date().getUTCFullYear(),
      resultLimit: Number.isFinite(limitOption) && limitOption > 0 ? limitOption : env.SEARCH_RESULT_LIMIT,
    },
  );

  console.log(JSON.stringify(result, null, 2));
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : 'Unknown search failure';
  console.error(
    JSON.stringify({
      event: 'discovery.search.failed',
      error: message,
    }),
  );
  process.exit(1);
});
