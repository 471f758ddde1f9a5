export interface Icp {
  readonly industries: readonly string[];
  readonly revenueMin: number;
  readonly revenueMax: number;
  readonly headcountMin: number;
  readonly headcountMax: number;
}

export interface CompanyRecord {
  name: string;
  domain: string;
  /** 0 means unknown, not zero employees. */
  headcount: number;
  /** Lower-bound revenue estimate in USD; 0 means unknown. */
  revenue: number;
  headquarters: string | null;
  /** Deduplicated, capped at three for display. */
  industries: string[];
  foundedYear: string | null;
}

export interface NormalizedCompany extends CompanyRecord {
  /** Every deduplicated taxonomy tag, used for industry matching. */
  industryTags: string[];
  /** Distinct LinkedIn industry tags. */
  primaryIndustries: string[];
}

export interface ScoredCompany extends CompanyRecord {
  score: number;
}

export interface DecisionMaker {
  name: string;
  title: string;
  linkedinProfileUrl: string | null;
  flagshipProfileUrl: string | null;
  email: string | null;
  location: string | null;
  headline: string | null;
  profilePictureUrl: string | null;
  companyName: string;
  isDecisionMaker: boolean;
}

export interface DiscoveryLogger {
  info: (object: Record<string, unknown>, message: string) => void;
  warn: (object: Record<string, unknown>, message: string) => void;
}
