import pLimit, { type LimitFunction } from 'p-limit';

export type TaskPool = LimitFunction;

export const DEFAULT_COMPANY_CONCURRENCY = 4;
export const DEFAULT_PEOPLE_CONCURRENCY = 2;

export function createTaskPool(concurrency: number): TaskPool {
  return pLimit(concurrency);
}
