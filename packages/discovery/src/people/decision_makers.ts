import type { TaskPool } from '../pool.js';
import type { CompanyIntelligenceClient } from '../providers/client.js';
import type { PeopleSearchFilter, RawRecord } from '../providers/types.js';
import type { DecisionMaker, DiscoveryLogger } from '../types.js';

export const DECISION_MAKER_TITLES = [
  'CEO',
  'Chief Executive Officer',
  'CTO',
  'Chief Technology Officer',
  'CFO',
  'Chief Financial Officer',
  'CMO',
  'Chief Marketing Officer',
  'COO',
  'Chief Operating Officer',
  'President',
  'VP',
  'Vice President',
  'Director',
  'Head',
  'Manager',
] as const;

export const MAX_DECISION_MAKERS = 5;

export interface DecisionMakerQuery {
  companyName: string;
  companyDomain: string;
}

export interface DecisionMakerDependencies {
  client: Pick<CompanyIntelligenceClient, 'searchPeople'>;
  pool: TaskPool;
  logger: DiscoveryLogger;
}

export interface DecisionMakerResult {
  decisionMakers: DecisionMaker[];
  /** Profiles returned before the cap was applied. */
  totalFound: number;
}

function optionalString(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value : null;
}

export function buildPeopleFilters(query: DecisionMakerQuery): PeopleSearchFilter[] {
  const companies = Array.from(
    new Set([query.companyDomain, query.companyName].filter((value) => value.trim().length > 0)),
  );

  return [
    { filter_type: 'CURRENT_COMPANY', type: 'in', value: companies },
    { filter_type: 'CURRENT_TITLE', type: 'in', value: [...DECISION_MAKER_TITLES] },
  ];
}

export function normalizeDecisionMaker(profile: RawRecord, companyName: string): DecisionMaker {
  const emails = Array.isArray(profile.emails) ? profile.emails : [];

  return {
    name: optionalString(profile.name) ?? 'Unknown',
    title: optionalString(profile.default_position_title) ?? optionalString(profile.current_title) ?? '',
    linkedinProfileUrl: optionalString(profile.linkedin_profile_url),
    flagshipProfileUrl: optionalString(profile.flagship_profile_url),
    email: optionalString(emails[0]),
    location: optionalString(profile.location),
    headline: optionalString(profile.headline),
    profilePictureUrl: optionalString(profile.profile_picture_url),
    companyName,
    isDecisionMaker: profile.default_position_is_decision_maker === true,
  };
}

export async function findDecisionMakers(
  query: DecisionMakerQuery,
  dependencies: DecisionMakerDependencies,
): Promise<DecisionMakerResult> {
  const filters = buildPeopleFilters(query);
  const payload = await dependencies.pool(() => dependencies.client.searchPeople(filters));

  if (payload.kind === 'unrecognized') {
    dependencies.logger.warn(
      { reason: payload.reason, companyDomain: query.companyDomain },
      'People search returned an unrecognized payload',
    );
    return { decisionMakers: [], totalFound: 0 };
  }

  const profiles = payload.records;

  return {
    decisionMakers: profiles
      .slice(0, MAX_DECISION_MAKERS)
      .map((profile) => normalizeDecisionMaker(profile, query.companyName)),
    totalFound: profiles.length,
  };
}
