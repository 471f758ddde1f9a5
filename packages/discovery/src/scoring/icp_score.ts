import type { Icp, NormalizedCompany } from '../types.js';

export const SCORE_WEIGHTS = {
  industry: 0.4,
  size: 0.3,
  revenue: 0.2,
  quality: 0.1,
} as const;

const HIGH_REVENUE_THRESHOLD_USD = 10_000_000;

export interface ScoreOptions {
  /** Calendar year company age is measured against. */
  referenceYear: number;
}

export interface ScoreBreakdown {
  industry: number;
  size: number;
  revenue: number;
  quality: number;
}

export type ScorableCompany = Pick<
  NormalizedCompany,
  'headcount' | 'revenue' | 'headquarters' | 'foundedYear' | 'industryTags' | 'primaryIndustries'
>;

export function scoreIndustry(tags: readonly string[], targets: readonly string[]): number {
  if (tags.length === 0) {
    return 0.5;
  }

  const loweredTags = tags.map((tag) => tag.toLowerCase());
  let exactMatches = 0;
  let partialMatches = 0;

  for (const target of targets) {
    const loweredTarget = target.toLowerCase();
    if (loweredTags.includes(loweredTarget)) {
      exactMatches += 1;
      continue;
    }
    if (loweredTags.some((tag) => tag.includes(loweredTarget) || loweredTarget.includes(tag))) {
      partialMatches += 1;
    }
  }

  if (exactMatches > 0) {
    return Math.min(1, 0.8 + (exactMatches / targets.length) * 0.2);
  }
  if (partialMatches > 0) {
    return Math.min(0.8, 0.4 + (partialMatches / targets.length) * 0.4);
  }
  return 0.2;
}

/**
 * Full marks inside `[min, max]`, a linear falloff to 0.3 within half the
 * range width outside it, 0.1 beyond that. A value of 0 is unknown (0.5).
 */
export function scoreRange(value: number, min: number, max: number): number {
  if (value === 0) {
    return 0.5;
  }
  if (value >= min && value <= max) {
    return 1;
  }

  const tolerance = (max - min) * 0.5;
  const distance = value < min ? min - value : value - max;

  if (distance <= tolerance) {
    return Math.max(0.3, 1 - (distance / tolerance) * 0.7);
  }
  return 0.1;
}

export function parseFoundedYear(foundedYear: string | null): number | null {
  if (foundedYear === null || !/^\d{4}/.test(foundedYear)) {
    return null;
  }
  return Number(foundedYear.slice(0, 4));
}

export function scoreQuality(company: ScorableCompany, referenceYear: number): number {
  let quality = 0;

  const year = parseFoundedYear(company.foundedYear);
  if (year !== null) {
    const age = referenceYear - year;
    if (age >= 5 && age <= 20) {
      quality += 0.3;
    } else if (age < 5) {
      quality += 0.2;
    } else {
      quality += 0.25;
    }
  }

  if (company.headquarters) {
    quality += 0.2;
  }

  if (new Set(company.primaryIndustries).size >= 2) {
    quality += 0.2;
  }

  if (company.headcount >= 500) {
    quality += 0.25;
  } else if (company.headcount >= 100) {
    quality += 0.15;
  }

  if (company.revenue >= HIGH_REVENUE_THRESHOLD_USD) {
    quality += 0.15;
  }

  return Math.min(1, quality);
}

export function scoreBreakdown(company: ScorableCompany, icp: Icp, options: ScoreOptions): ScoreBreakdown {
  return {
    industry: scoreIndustry(company.industryTags, icp.industries),
    size: scoreRange(company.headcount, icp.headcountMin, icp.headcountMax),
    revenue: scoreRange(company.revenue, icp.revenueMin, icp.revenueMax),
    quality: scoreQuality(company, options.referenceYear),
  };
}

export function combineScore(breakdown: ScoreBreakdown): number {
  const weighted =
    breakdown.industry * SCORE_WEIGHTS.industry +
    breakdown.size * SCORE_WEIGHTS.size +
    breakdown.revenue * SCORE_WEIGHTS.revenue +
    breakdown.quality * SCORE_WEIGHTS.quality;

  const clamped = Math.min(1, Math.max(0, weighted));
  return Number(clamped.toFixed(3));
}

export function scoreCompany(company: ScorableCompany, icp: Icp, options: ScoreOptions): number {
  return combineScore(scoreBreakdown(company, icp, options));
}
