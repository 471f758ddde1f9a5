import type { CompanyPayload, RawRecord } from '../providers/types.js';
import type { CompanyRecord, NormalizedCompany } from '../types.js';

export const UNKNOWN_COMPANY_NAME = 'Unknown Company';
export const DISPLAY_INDUSTRY_LIMIT = 3;

const HEADQUARTERS_KEYS = ['headquarters', 'hq_street_address', 'hq_country'] as const;

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function normalizeString(value: unknown): string | null {
  return typeof value === 'string' && value.trim().length > 0 ? value.trim() : null;
}

/**
 * Reads `a.b` as a nested path first, then as a literal dotted key, then by
 * its last segment, which is how flat screener rows name nested columns.
 */
function readPath(record: RawRecord, path: string): unknown {
  const segments = path.split('.');
  let current: unknown = record;
  for (const segment of segments) {
    if (!isRecord(current)) {
      current = undefined;
      break;
    }
    current = current[segment];
  }

  if (current !== undefined && current !== null) {
    return current;
  }

  if (segments.length > 1) {
    const literal = record[path];
    if (literal !== undefined && literal !== null) {
      return literal;
    }
    const leaf = segments[segments.length - 1];
    return leaf === undefined ? undefined : record[leaf];
  }

  return undefined;
}

function toCount(value: unknown): number {
  const numeric =
    typeof value === 'number'
      ? value
      : typeof value === 'string' && value.trim().length > 0
        ? Number(value.trim())
        : Number.NaN;

  return Number.isFinite(numeric) && numeric > 0 ? Math.trunc(numeric) : 0;
}

function toTagList(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value
      .map((entry) => normalizeString(entry))
      .filter((entry): entry is string => entry !== null);
  }

  const single = normalizeString(value);
  return single ? [single] : [];
}

function toFoundedYear(value: unknown): string | null {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return String(value);
  }
  return normalizeString(value);
}

function unique(values: readonly string[]): string[] {
  return Array.from(new Set(values));
}

export function zipColumnarRows(fields: readonly string[], rows: readonly unknown[][]): RawRecord[] {
  return rows.map((row) => {
    const record: RawRecord = {};
    fields.forEach((field, index) => {
      if (field && index < row.length) {
        record[field] = row[index];
      }
    });
    return record;
  });
}

export function normalizeCompany(raw: unknown): NormalizedCompany {
  const record = isRecord(raw) ? raw : {};

  const linkedinIndustries = toTagList(readPath(record, 'taxonomy.linkedin_industries'));
  const crunchbaseCategories = toTagList(readPath(record, 'taxonomy.crunchbase_categories'));
  const industryTags = unique([...linkedinIndustries, ...crunchbaseCategories]);

  const headquarters =
    HEADQUARTERS_KEYS.map((key) => normalizeString(record[key])).find((value) => value !== null) ??
    null;

  return {
    name: normalizeString(record.company_name) ?? UNKNOWN_COMPANY_NAME,
    domain: normalizeString(record.company_website_domain) ?? '',
    headcount: toCount(readPath(record, 'headcount.linkedin_headcount')),
    revenue: toCount(record.estimated_revenue_lower_bound_usd),
    headquarters,
    industries: industryTags.slice(0, DISPLAY_INDUSTRY_LIMIT),
    foundedYear: toFoundedYear(record.year_founded),
    industryTags,
    primaryIndustries: unique(linkedinIndustries),
  };
}

export function normalizeCompanyPayload(payload: CompanyPayload): NormalizedCompany[] {
  switch (payload.kind) {
    case 'records':
      return payload.records.map(normalizeCompany);
    case 'columnar':
      return zipColumnarRows(payload.fields, payload.rows).map(normalizeCompany);
    case 'unrecognized':
      return [];
  }
}

export function toCompanyRecord(company: NormalizedCompany): CompanyRecord {
  return {
    name: company.name,
    domain: company.domain,
    headcount: company.headcount,
    revenue: company.revenue,
    headquarters: company.headquarters,
    industries: company.industries,
    foundedYear: company.foundedYear,
  };
}
