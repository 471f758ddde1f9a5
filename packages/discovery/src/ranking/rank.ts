import type { ScoredCompany } from '../types.js';

export const DEFAULT_RESULT_LIMIT = 20;

/** Highest score first; equal scores keep their input order. */
export function rankCompanies<T extends Pick<ScoredCompany, 'score'>>(
  scored: readonly T[],
  limit: number = DEFAULT_RESULT_LIMIT,
): T[] {
  return [...scored].sort((left, right) => right.score - left.score).slice(0, Math.max(0, limit));
}
