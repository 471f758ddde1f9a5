import type { Icp } from '../types.js';
import type { FilterCondition, FilterExpression, FilterGroup } from '../providers/types.js';

export const INDUSTRY_COLUMNS = [
  'linkedin_industries',
  'linkedin_categories',
  'crunchbase_categories',
  'markets',
] as const;

export const HEADCOUNT_COLUMN = 'linkedin_headcount';
export const REVENUE_COLUMN = 'estimated_revenue_lower_bound_usd';

/** Bounds are optional here so partial criteria still produce a valid tree. */
export type DiscoveryFilterCriteria = Pick<Icp, 'industries'> &
  Partial<Pick<Icp, 'revenueMin' | 'revenueMax' | 'headcountMin' | 'headcountMax'>>;

function isBound(value: number | undefined): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function buildIndustryClause(industries: readonly string[]): FilterGroup | null {
  const conditions: FilterCondition[] = [];

  for (const industry of industries) {
    const value = industry.trim();
    if (!value) {
      continue;
    }

    for (const column of INDUSTRY_COLUMNS) {
      conditions.push({ column, type: '(.)', value, allow_null: true });
    }
  }

  return conditions.length > 0 ? { op: 'or', conditions } : null;
}

function buildRangeClause(
  column: string,
  min: number | undefined,
  max: number | undefined,
): FilterGroup | null {
  if (!isBound(min) || !isBound(max)) {
    return null;
  }

  return {
    op: 'and',
    conditions: [
      { column, type: '=>', value: min, allow_null: false },
      { column, type: '=<', value: max, allow_null: false },
    ],
  };
}

/**
 * Turns ICP criteria into the screener filter tree: any industry in any
 * taxonomy column, AND the headcount range, AND the revenue range. Clauses
 * without data are left out rather than emitted as always-true conditions.
 */
export function buildDiscoveryFilters(criteria: DiscoveryFilterCriteria): FilterExpression {
  const clauses = [
    buildIndustryClause(criteria.industries),
    buildRangeClause(HEADCOUNT_COLUMN, criteria.headcountMin, criteria.headcountMax),
    buildRangeClause(REVENUE_COLUMN, criteria.revenueMin, criteria.revenueMax),
  ].filter((clause): clause is FilterGroup => clause !== null);

  return { op: 'and', conditions: clauses };
}

export function countLeafConditions(node: FilterGroup): number {
  return node.conditions.reduce(
    (total, child) => total + ('op' in child ? countLeafConditions(child) : 1),
    0,
  );
}
