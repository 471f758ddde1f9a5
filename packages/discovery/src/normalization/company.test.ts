import { describe, expect, it } from 'vitest';

import { normalizeCompany, normalizeCompanyPayload, toCompanyRecord, zipColumnarRows } from './company.js';

describe('normalizeCompany', () => {
  it('reads nested taxonomy and headcount paths', () => {
    const company = normalizeCompany({
      company_name: 'Acme',
      company_website_domain: 'acme.com',
      taxonomy: {
        linkedin_industries: ['Technology', 'Software'],
        crunchbase_categories: ['Software', 'SaaS', 'Developer Tools'],
      },
      headcount: { linkedin_headcount: 500 },
      estimated_revenue_lower_bound_usd: 5_000_000,
      year_founded: '2015',
      headquarters: 'NYC',
    });

    expect(company).toEqual({
      name: 'Acme',
      domain: 'acme.com',
      headcount: 500,
      revenue: 5_000_000,
      headquarters: 'NYC',
      industries: ['Technology', 'Software', 'SaaS'],
      foundedYear: '2015',
      industryTags: ['Technology', 'Software', 'SaaS', 'Developer Tools'],
      primaryIndustries: ['Technology', 'Software'],
    });
  });

  it('falls back to literal dotted keys and flat leaf columns', () => {
    const dotted = normalizeCompany({ 'headcount.linkedin_headcount': 42 });
    const flat = normalizeCompany({ linkedin_headcount: '120', linkedin_industries: ['Fintech'] });

    expect(dotted.headcount).toBe(42);
    expect(flat.headcount).toBe(120);
    expect(flat.industries).toEqual(['Fintech']);
  });

  it('applies defaults to missing or malformed fields', () => {
    const company = normalizeCompany({
      company_name: '  ',
      headcount: { linkedin_headcount: 'many' },
      estimated_revenue_lower_bound_usd: null,
      headquarters: '',
      hq_street_address: null,
      hq_country: 'USA',
      year_founded: 1999,
    });

    expect(company.name).toBe('Unknown Company');
    expect(company.domain).toBe('');
    expect(company.headcount).toBe(0);
    expect(company.revenue).toBe(0);
    expect(company.headquarters).toBe('USA');
    expect(company.foundedYear).toBe('1999');
    expect(company.industries).toEqual([]);
  });

  it('degrades non-object input to all defaults', () => {
    expect(toCompanyRecord(normalizeCompany('not a record'))).toEqual({
      name: 'Unknown Company',
      domain: '',
      headcount: 0,
      revenue: 0,
      headquarters: null,
      industries: [],
      foundedYear: null,
    });
  });
});

describe('zipColumnarRows', () => {
  it('zips by position and skips unnamed fields and missing cells', () => {
    expect(zipColumnarRows(['company_name', '', 'linkedin_headcount'], [['Acme', 'x'], ['Globex', 'y', 80]])).toEqual([
      { company_name: 'Acme' },
      { company_name: 'Globex', linkedin_headcount: 80 },
    ]);
  });
});

describe('normalizeCompanyPayload', () => {
  it('normalizes record and columnar payloads the same way', () => {
    const fromRecords = normalizeCompanyPayload({
      kind: 'records',
      records: [{ company_name: 'Acme', linkedin_headcount: 75 }],
    });
    const fromColumns = normalizeCompanyPayload({
      kind: 'columnar',
      fields: ['company_name', 'linkedin_headcount'],
      rows: [['Acme', 75]],
    });

    expect(fromColumns).toEqual(fromRecords);
    expect(fromRecords[0]?.headcount).toBe(75);
  });

  it('returns nothing for unrecognized payloads', () => {
    expect(normalizeCompanyPayload({ kind: 'unrecognized', reason: 'unexpected keys: data' })).toEqual([]);
  });
});
