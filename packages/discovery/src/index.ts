export * from './company_lookup.js';
export * from './filters/build_filters.js';
export * from './normalization/company.js';
export * from './people/decision_makers.js';
export * from './pool.js';
export * from './providers/client.js';
export * from './providers/crustdata.client.js';
export * from './providers/types.js';
export * from './ranking/rank.js';
export * from './scoring/icp_score.js';
export * from './search_companies.js';
export * from './types.js';
