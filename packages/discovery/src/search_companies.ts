import { buildDiscoveryFilters } from './filters/build_filters.js';
import { normalizeCompanyPayload, toCompanyRecord } from './normalization/company.js';
import type { TaskPool } from './pool.js';
import type { CompanyIntelligenceClient } from './providers/client.js';
import { DEFAULT_RESULT_LIMIT, rankCompanies } from './ranking/rank.js';
import { combineScore, scoreBreakdown } from './scoring/icp_score.js';
import type { DiscoveryLogger, Icp, ScoredCompany } from './types.js';

export const DEFAULT_SCREEN_PAGE_SIZE = 50;

export interface SearchCompaniesDependencies {
  client: Pick<CompanyIntelligenceClient, 'screenCompanies'>;
  pool: TaskPool;
  logger: DiscoveryLogger;
  referenceYear: number;
  resultLimit?: number | undefined;
  pageSize?: number | undefined;
  now?: (() => number) | undefined;
}

export interface SearchCompaniesResult {
  companies: ScoredCompany[];
  /** Scored companies before the result limit. */
  totalFound: number;
  searchTimeMs: number;
}

export async function searchCompanies(
  icp: Icp,
  dependencies: SearchCompaniesDependencies,
): Promise<SearchCompaniesResult> {
  const now = dependencies.now ?? Date.now;
  const startedAt = now();

  const filters = buildDiscoveryFilters(icp);
  const payload = await dependencies.pool(() =>
    dependencies.client.screenCompanies({
      filters,
      offset: 0,
      count: dependencies.pageSize ?? DEFAULT_SCREEN_PAGE_SIZE,
    }),
  );

  if (payload.kind === 'unrecognized') {
    dependencies.logger.warn(
      { reason: payload.reason, industries: icp.industries },
      'Company screen returned an unrecognized payload',
    );
  }

  const scored = normalizeCompanyPayload(payload).map((company) => {
    const breakdown = scoreBreakdown(company, icp, { referenceYear: dependencies.referenceYear });
    return {
      ...toCompanyRecord(company),
      score: combineScore(breakdown),
    };
  });

  const companies = rankCompanies(scored, dependencies.resultLimit ?? DEFAULT_RESULT_LIMIT);
  const searchTimeMs = Math.max(0, now() - startedAt);

  dependencies.logger.info(
    {
      industries: icp.industries,
      screened: scored.length,
      returned: companies.length,
      searchTimeMs,
    },
    'Company search completed',
  );

  return {
    companies,
    totalFound: scored.length,
    searchTimeMs,
  };
}
