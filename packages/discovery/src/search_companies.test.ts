import { describe, expect, it, vi } from 'vitest';

import { createTaskPool } from './pool.js';
import type { CompanyPayload, ScreenCompaniesRequest } from './providers/types.js';
import { searchCompanies } from './search_companies.js';
import type { Icp } from './types.js';

const TECHNOLOGY_ICP: Icp = {
  industries: ['Technology'],
  revenueMin: 1_000_000,
  revenueMax: 100_000_000,
  headcountMin: 50,
  headcountMax: 1000,
};

function createDependencies(payload: CompanyPayload) {
  const requests: ScreenCompaniesRequest[] = [];
  const logger = { info: vi.fn(), warn: vi.fn() };
  const ticks = [1_000, 1_042];

  return {
    requests,
    logger,
    dependencies: {
      client: {
        async screenCompanies(request: ScreenCompaniesRequest) {
          requests.push(request);
          return payload;
        },
      },
      pool: createTaskPool(4),
      logger,
      referenceYear: 2025,
      now: () => ticks.shift() ?? 1_042,
    },
  };
}

describe('searchCompanies', () => {
  it('screens, scores and ranks columnar results', async () => {
    const { dependencies, requests } = createDependencies({
      kind: 'columnar',
      fields: [
        'company_name',
        'company_website_domain',
        'linkedin_headcount',
        'estimated_revenue_lower_bound_usd',
        'linkedin_industries',
        'year_founded',
        'headquarters',
      ],
      rows: [
        ['Globex', 'globex.com', 20, 0, ['Retail'], null, null],
        ['Acme', 'acme.com', 500, 5_000_000, ['Technology'], '2015', 'NYC'],
      ],
    });

    const result = await searchCompanies(TECHNOLOGY_ICP, dependencies);

    expect(requests).toHaveLength(1);
    expect(requests[0]?.offset).toBe(0);
    expect(requests[0]?.count).toBe(50);
    expect(requests[0]?.filters.conditions).toHaveLength(3);

    expect(result.totalFound).toBe(2);
    expect(result.searchTimeMs).toBe(42);
    expect(result.companies[0]).toEqual({
      name: 'Acme',
      domain: 'acme.com',
      headcount: 500,
      revenue: 5_000_000,
      headquarters: 'NYC',
      industries: ['Technology'],
      foundedYear: '2015',
      score: 0.975,
    });
    expect(result.companies[1]?.name).toBe('Globex');
  });

  it('limits results but counts every scored company', async () => {
    const records = Array.from({ length: 3 }, (_, index) => ({ company_name: `Company ${index}` }));
    const { dependencies } = createDependencies({ kind: 'records', records });

    const result = await searchCompanies(TECHNOLOGY_ICP, { ...dependencies, resultLimit: 2, pageSize: 10 });

    expect(result.companies).toHaveLength(2);
    expect(result.totalFound).toBe(3);
  });

  it('logs a warning and returns nothing for an unrecognized payload', async () => {
    const { dependencies, logger } = createDependencies({
      kind: 'unrecognized',
      reason: 'unexpected keys: data',
    });

    const result = await searchCompanies(TECHNOLOGY_ICP, dependencies);

    expect(result.companies).toEqual([]);
    expect(result.totalFound).toBe(0);
    expect(logger.warn).toHaveBeenCalledWith(
      { reason: 'unexpected keys: data', industries: ['Technology'] },
      'Company screen returned an unrecognized payload',
    );
  });

  it('propagates provider errors', async () => {
    const { dependencies } = createDependencies({ kind: 'records', records: [] });
    const failing = {
      ...dependencies,
      client: {
        async screenCompanies(): Promise<CompanyPayload> {
          throw new Error('Crustdata POST /screener/screen/ failed: status=500');
        },
      },
    };

    await expect(searchCompanies(TECHNOLOGY_ICP, failing)).rejects.toThrow('status=500');
  });
});
