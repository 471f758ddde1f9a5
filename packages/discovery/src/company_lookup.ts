import { normalizeCompany, toCompanyRecord } from './normalization/company.js';
import type { TaskPool } from './pool.js';
import type { CompanyIntelligenceClient } from './providers/client.js';
import type { CompanyRecord, DiscoveryLogger } from './types.js';

export interface CompanyLookupDependencies {
  client: Pick<CompanyIntelligenceClient, 'getCompaniesByDomain'>;
  pool: TaskPool;
  logger: DiscoveryLogger;
}

export async function lookupCompany(
  domain: string,
  dependencies: CompanyLookupDependencies,
): Promise<CompanyRecord | null> {
  const payload = await dependencies.pool(() => dependencies.client.getCompaniesByDomain([domain]));

  if (payload.kind === 'unrecognized') {
    dependencies.logger.warn(
      { reason: payload.reason, companyDomain: domain },
      'Company lookup returned an unrecognized payload',
    );
    return null;
  }

  const [first] = payload.records;

  return first === undefined ? null : toCompanyRecord(normalizeCompany(first));
}
