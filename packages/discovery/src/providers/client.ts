import type { CrustdataClient } from './crustdata.client.js';

/** The provider calls the pipelines make; fakes implement this in tests. */
export type CompanyIntelligenceClient = Pick<
  CrustdataClient,
  'screenCompanies' | 'getCompaniesByDomain' | 'searchPeople'
>;
