import type {
  CompanyDetail,
  CompanyPeopleResponse,
  CompanyResult,
  DecisionMakerPayload,
  IcpPayload,
  SearchCompaniesResponse,
} from '@icp-outreach/contracts';
import {
  CrustdataRequestError,
  findDecisionMakers,
  lookupCompany,
  searchCompanies,
  type CompanyIntelligenceClient,
  type CompanyRecord,
  type DecisionMaker,
  type DiscoveryLogger,
  type Icp,
  type ScoredCompany,
  type TaskPool,
} from '@icp-outreach/discovery';

import { CompanyIntelligenceUnavailableError, CompanyNotFoundError } from './companies.errors.js';

export interface CompaniesServiceDependencies {
  client: CompanyIntelligenceClient;
  companyPool: TaskPool;
  peoplePool: TaskPool;
  logger: DiscoveryLogger;
  referenceYear: number;
  resultLimit: number;
  pageSize: number;
}

export interface CompaniesService {
  searchCompanies(icp: IcpPayload): Promise<SearchCompaniesResponse>;
  getCompany(domain: string): Promise<CompanyDetail>;
  getDecisionMakers(domain: string, companyName: string): Promise<CompanyPeopleResponse>;
}

export function toIcp(payload: IcpPayload): Icp {
  return {
    industries: payload.industries,
    revenueMin: payload.revenue_min,
    revenueMax: payload.revenue_max,
    headcountMin: payload.headcount_min,
    headcountMax: payload.headcount_max,
  };
}

function toCompanyDetail(company: CompanyRecord): CompanyDetail {
  return {
    name: company.name,
    domain: company.domain,
    headcount: company.headcount,
    revenue: company.revenue,
    headquarters: company.headquarters,
    industries: company.industries,
    founded_year: company.foundedYear,
  };
}

function toCompanyResult(company: ScoredCompany): CompanyResult {
  return { ...toCompanyDetail(company), score: company.score };
}

function toDecisionMakerPayload(person: DecisionMaker): DecisionMakerPayload {
  return {
    name: person.name,
    title: person.title,
    linkedin_profile_url: person.linkedinProfileUrl,
    flagship_profile_url: person.flagshipProfileUrl,
    email: person.email,
    location: person.location,
    headline: person.headline,
    profile_picture_url: person.profilePictureUrl,
    company_name: person.companyName,
    is_decision_maker: person.isDecisionMaker,
  };
}

async function withProviderErrors<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (error: unknown) {
    if (error instanceof CrustdataRequestError) {
      throw new CompanyIntelligenceUnavailableError(error.message, error.statusCode);
    }
    throw error;
  }
}

export function buildCompaniesService(dependencies: CompaniesServiceDependencies): CompaniesService {
  return {
    async searchCompanies(icp) {
      const result = await withProviderErrors(() =>
        searchCompanies(toIcp(icp), {
          client: dependencies.client,
          pool: dependencies.companyPool,
          logger: dependencies.logger,
          referenceYear: dependencies.referenceYear,
          resultLimit: dependencies.resultLimit,
          pageSize: dependencies.pageSize,
        }),
      );

      return {
        companies: result.companies.map(toCompanyResult),
        total_found: result.totalFound,
        search_time_ms: Math.round(result.searchTimeMs),
        icp,
      };
    },

    async getCompany(domain) {
      const company = await withProviderErrors(() =>
        lookupCompany(domain, {
          client: dependencies.client,
          pool: dependencies.companyPool,
          logger: dependencies.logger,
        }),
      );
      if (!company) {
        throw new CompanyNotFoundError(`Company not found for domain ${domain}`);
      }
      return toCompanyDetail(company);
    },

    async getDecisionMakers(domain, companyName) {
      const result = await withProviderErrors(() =>
        findDecisionMakers(
          { companyName, companyDomain: domain },
          { client: dependencies.client, pool: dependencies.peoplePool, logger: dependencies.logger },
        ),
      );

      dependencies.logger.info(
        { companyDomain: domain, totalFound: result.totalFound },
        'Decision makers fetched',
      );

      return {
        decision_makers: result.decisionMakers.map(toDecisionMakerPayload),
        company_name: companyName,
        company_domain: domain,
        total_found: result.totalFound,
      };
    },
  };
}
