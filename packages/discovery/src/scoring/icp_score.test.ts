import { describe, expect, it } from 'vitest';

import { normalizeCompany } from '../normalization/company.js';
import type { Icp } from '../types.js';
import {
  combineScore,
  parseFoundedYear,
  scoreBreakdown,
  scoreCompany,
  scoreIndustry,
  scoreQuality,
  scoreRange,
  type ScorableCompany,
} from './icp_score.js';

const TECHNOLOGY_ICP: Icp = {
  industries: ['Technology'],
  revenueMin: 1_000_000,
  revenueMax: 100_000_000,
  headcountMin: 50,
  headcountMax: 1000,
};

const OPTIONS = { referenceYear: 2025 };

function company(overrides: Partial<ScorableCompany> = {}): ScorableCompany {
  return {
    headcount: 0,
    revenue: 0,
    headquarters: null,
    foundedYear: null,
    industryTags: [],
    primaryIndustries: [],
    ...overrides,
  };
}

describe('scoreIndustry', () => {
  it('returns 0.5 when the company has no tags', () => {
    expect(scoreIndustry([], ['Technology'])).toBe(0.5);
  });

  it('scores exact matches case-insensitively', () => {
    expect(scoreIndustry(['Technology', 'Software'], ['technology'])).toBe(1);
    expect(scoreIndustry(['Technology'], ['Technology', 'Fintech'])).toBeCloseTo(0.9);
  });

  it('scores substring containment in either direction as partial', () => {
    expect(scoreIndustry(['Financial Technology'], ['Technology'])).toBeCloseTo(0.8);
    expect(scoreIndustry(['Technology'], ['Tech', 'Healthcare'])).toBeCloseTo(0.6);
  });

  it('returns 0.2 without any match', () => {
    expect(scoreIndustry(['Retail'], ['Energy'])).toBe(0.2);
  });

  it('never decreases as exact matches grow for a fixed target count', () => {
    const targets = ['Technology', 'Software', 'Fintech'];
    const scores = [
      scoreIndustry(['Retail'], targets),
      scoreIndustry(['Technology'], targets),
      scoreIndustry(['Technology', 'Software'], targets),
      scoreIndustry(['Technology', 'Software', 'Fintech'], targets),
    ];

    for (let index = 1; index < scores.length; index += 1) {
      expect(scores[index]).toBeGreaterThanOrEqual(scores[index - 1] ?? 0);
    }
  });
});

describe('scoreRange', () => {
  it('treats 0 as unknown regardless of bounds', () => {
    expect(scoreRange(0, 50, 1000)).toBe(0.5);
    expect(scoreRange(0, 0, 0)).toBe(0.5);
  });

  it('gives full marks inside the range, including a single-point range', () => {
    expect(scoreRange(500, 50, 1000)).toBe(1);
    expect(scoreRange(250, 250, 250)).toBe(1);
  });

  it('falls off linearly within the tolerance band', () => {
    expect(scoreRange(90, 100, 200)).toBeCloseTo(0.86);
    expect(scoreRange(230, 100, 200)).toBeCloseTo(0.58);
    expect(scoreRange(50, 100, 200)).toBeCloseTo(0.3);
  });

  it('returns 0.1 beyond the tolerance band', () => {
    expect(scoreRange(10, 100, 200)).toBe(0.1);
    expect(scoreRange(251, 250, 250)).toBe(0.1);
  });
});

describe('scoreQuality', () => {
  it('rewards company age by bracket', () => {
    expect(scoreQuality(company({ foundedYear: '2015' }), 2025)).toBeCloseTo(0.3);
    expect(scoreQuality(company({ foundedYear: '2023' }), 2025)).toBeCloseTo(0.2);
    expect(scoreQuality(company({ foundedYear: '1990' }), 2025)).toBeCloseTo(0.25);
  });

  it('ignores founded years without four leading digits', () => {
    expect(parseFoundedYear('2015-03-01')).toBe(2015);
    expect(parseFoundedYear('n/a')).toBeNull();
    expect(scoreQuality(company({ foundedYear: 'circa 2010' }), 2025)).toBe(0);
  });

  it('applies only the highest headcount tier', () => {
    expect(scoreQuality(company({ headcount: 150 }), 2025)).toBeCloseTo(0.15);
    expect(scoreQuality(company({ headcount: 500 }), 2025)).toBeCloseTo(0.25);
  });

  it('needs two distinct primary industries for the diversity bonus', () => {
    expect(scoreQuality(company({ primaryIndustries: ['Software'] }), 2025)).toBe(0);
    expect(scoreQuality(company({ primaryIndustries: ['Software', 'SaaS'] }), 2025)).toBeCloseTo(0.2);
  });

  it('caps the total at 1', () => {
    const strong = company({
      foundedYear: '2015',
      headquarters: 'Austin',
      primaryIndustries: ['Software', 'SaaS'],
      headcount: 800,
      revenue: 20_000_000,
    });

    expect(scoreQuality(strong, 2025)).toBe(1);
  });
});

describe('scoreCompany', () => {
  it('scores the reference Technology company', () => {
    const acme = normalizeCompany({
      company_name: 'Acme',
      taxonomy: { linkedin_industries: ['Technology'] },
      headcount: { linkedin_headcount: 500 },
      estimated_revenue_lower_bound_usd: 5_000_000,
      year_founded: '2015',
      headquarters: 'NYC',
    });

    const breakdown = scoreBreakdown(acme, TECHNOLOGY_ICP, OPTIONS);
    expect(breakdown.industry).toBe(1);
    expect(breakdown.size).toBe(1);
    expect(breakdown.revenue).toBe(1);
    expect(breakdown.quality).toBeCloseTo(0.75);
    expect(scoreCompany(acme, TECHNOLOGY_ICP, OPTIONS)).toBe(0.975);

    expect(scoreCompany({ ...acme, headcount: 400 }, TECHNOLOGY_ICP, OPTIONS)).toBe(0.965);
  });

  it('gives full size marks when headcount equals a single-point range', () => {
    const icp: Icp = { ...TECHNOLOGY_ICP, headcountMin: 120, headcountMax: 120 };

    expect(scoreBreakdown(company({ headcount: 120 }), icp, OPTIONS).size).toBe(1);
  });

  it('depends on the injected reference year', () => {
    const young = company({ foundedYear: '2015' });

    expect(scoreBreakdown(young, TECHNOLOGY_ICP, { referenceYear: 2018 }).quality).toBeCloseTo(0.2);
    expect(scoreBreakdown(young, TECHNOLOGY_ICP, { referenceYear: 2040 }).quality).toBeCloseTo(0.25);
  });

  it('keeps the combined score within [0, 1] at three decimals', () => {
    expect(combineScore({ industry: 1, size: 1, revenue: 1, quality: 1 })).toBe(1);
    expect(combineScore({ industry: 0, size: 0, revenue: 0, quality: 0 })).toBe(0);
    expect(combineScore({ industry: 0.2, size: 0.1, revenue: 0.1, quality: 0.15 })).toBe(0.145);
  });
});
