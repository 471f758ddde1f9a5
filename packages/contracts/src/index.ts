export * from './companies.contract.js';
export * from './error.contract.js';
export * from './health.contract.js';
export * from './icp.contract.js';
export * from './outreach.contract.js';
export * from './people.contract.js';
