import type {
  CompanyPayload,
  PeopleSearchFilter,
  RawRecord,
  RecordListPayload,
  ScreenCompaniesRequest,
} from './types.js';

export interface CrustdataClientConfig {
  apiToken: string;
  baseUrl?: string | undefined;
  timeoutMs?: number | undefined;
  fetchImpl?: typeof fetch | undefined;
}

interface RequestOptions {
  query?: Record<string, string> | undefined;
  body?: unknown;
}

const DEFAULT_BASE_URL = 'https://api.crustdata.com';
const DEFAULT_TIMEOUT_MS = 30_000;

export const COMPANY_LOOKUP_FIELDS = [
  'company_name',
  'company_website_domain',
  'headcount.linkedin_headcount',
  'estimated_revenue_lower_bound_usd',
  'headquarters',
  'hq_country',
  'year_founded',
  'taxonomy.linkedin_industries',
  'taxonomy.crunchbase_categories',
] as const;

export class CrustdataRequestError extends Error {
  readonly statusCode: number | null;
  readonly responseBody: string | null;

  constructor(message: string, statusCode: number | null, responseBody: string | null = null) {
    super(message);
    this.name = 'CrustdataRequestError';
    this.statusCode = statusCode;
    this.responseBody = responseBody;
  }
}

function isRecord(value: unknown): value is RawRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseJsonSafe(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return undefined;
  }
}

function toFieldName(field: unknown): string {
  if (typeof field === 'string') {
    return field;
  }
  if (isRecord(field) && typeof field.api_name === 'string') {
    return field.api_name;
  }
  return '';
}

function describeError(value: unknown): string {
  return typeof value === 'string' ? value : JSON.stringify(value);
}

/** Settles with the body text, or rejects once `signal` aborts, whichever comes first. */
function readBodyText(response: Response, signal: AbortSignal): Promise<string> {
  if (signal.aborted) {
    return Promise.reject(new Error('aborted before the body was read'));
  }

  return new Promise((resolve, reject) => {
    const onAbort = () => reject(new Error('aborted while reading the body'));
    signal.addEventListener('abort', onAbort, { once: true });
    response.text().then(
      (text) => {
        signal.removeEventListener('abort', onAbort);
        resolve(text);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

function resolveRecordList(body: unknown, listKey: string | null): RecordListPayload {
  if (body === undefined) {
    return { kind: 'unrecognized', reason: 'response body is not valid JSON' };
  }

  if (listKey === null && Array.isArray(body)) {
    return { kind: 'records', records: body.filter(isRecord) };
  }

  if (!isRecord(body)) {
    return { kind: 'unrecognized', reason: 'response body is not a JSON object or array' };
  }

  if ('error' in body) {
    return { kind: 'unrecognized', reason: `provider error: ${describeError(body.error)}` };
  }

  if (listKey !== null) {
    const list = body[listKey];
    return Array.isArray(list)
      ? { kind: 'records', records: list.filter(isRecord) }
      : { kind: 'unrecognized', reason: `unexpected keys: ${Object.keys(body).join(', ') || '(none)'}` };
  }

  // A bare object is a single company; an empty one means no match.
  return { kind: 'records', records: Object.keys(body).length > 0 ? [body] : [] };
}

/**
 * Decides once which of the known screener shapes a response body has.
 * Anything else is reported as unrecognized instead of being probed further.
 */
export function resolveCompanyPayload(body: unknown): CompanyPayload {
  if (Array.isArray(body)) {
    return { kind: 'records', records: body.filter(isRecord) };
  }

  if (!isRecord(body)) {
    return { kind: 'unrecognized', reason: 'response body is not a JSON object or array' };
  }

  if ('error' in body) {
    return { kind: 'unrecognized', reason: `provider error: ${describeError(body.error)}` };
  }

  if (Array.isArray(body.fields) && Array.isArray(body.rows)) {
    return {
      kind: 'columnar',
      fields: body.fields.map(toFieldName),
      rows: body.rows.filter((row): row is unknown[] => Array.isArray(row)),
    };
  }

  return {
    kind: 'unrecognized',
    reason: `unexpected keys: ${Object.keys(body).join(', ') || '(none)'}`,
  };
}

export class CrustdataClient {
  private readonly apiToken: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: CrustdataClientConfig) {
    this.apiToken = config.apiToken;
    this.baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  async screenCompanies(request: ScreenCompaniesRequest): Promise<CompanyPayload> {
    const body = await this.request('POST', '/screener/screen/', {
      body: {
        filters: request.filters,
        hidden_columns: [],
        offset: request.offset,
        count: request.count,
        sorts: [],
      },
    });

    if (body === undefined) {
      return { kind: 'unrecognized', reason: 'response body is not valid JSON' };
    }

    return resolveCompanyPayload(body);
  }

  async getCompaniesByDomain(
    domains: readonly string[],
    fields: readonly string[] = COMPANY_LOOKUP_FIELDS,
  ): Promise<RecordListPayload> {
    if (domains.length === 0) {
      return { kind: 'records', records: [] };
    }

    const query: Record<string, string> = { company_domain: domains.join(',') };
    if (fields.length > 0) {
      query.fields = fields.join(',');
    }

    const body = await this.request('GET', '/screener/company', { query });

    return resolveRecordList(body, null);
  }

  async searchPeople(filters: readonly PeopleSearchFilter[], page = 1): Promise<RecordListPayload> {
    const body = await this.request('POST', '/screener/person/search/', {
      body: { filters, page },
    });

    return resolveRecordList(body, 'profiles');
  }

  private async request(method: 'GET' | 'POST', path: string, options: RequestOptions): Promise<unknown> {
    const url = new URL(path, this.baseUrl);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let rawText: string;
    try {
      response = await this.fetchImpl(url.toString(), {
        method,
        headers: {
          Accept: 'application/json',
          'Content-Type': 'application/json',
          Authorization: `Token ${this.apiToken}`,
        },
        ...(options.body !== undefined ? { body: JSON.stringify(options.body) } : {}),
        signal: controller.signal,
      });
      rawText = await readBodyText(response, controller.signal);
    } catch (error: unknown) {
      const reason = controller.signal.aborted
        ? `timed out after ${this.timeoutMs}ms`
        : error instanceof Error
          ? error.message
          : 'network failure';
      throw new CrustdataRequestError(`Crustdata ${method} ${path} failed: ${reason}`, null);
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      throw new CrustdataRequestError(
        `Crustdata ${method} ${path} failed: status=${response.status}`,
        response.status,
        rawText,
      );
    }

    return parseJsonSafe(rawText);
  }
}
