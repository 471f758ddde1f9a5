import { readBodyText } from '../http.js';

export interface ResendAdapterConfig {
  apiKey: string | undefined;
  fromEmail: string | undefined;
  baseUrl?: string | undefined;
  timeoutMs?: number | undefined;
  fetchImpl?: typeof fetch | undefined;
}

export interface ResendSendEmailRequest {
  to: string;
  subject: string;
  bodyHtml: string;
  bodyText?: string | undefined;
}

export interface ResendFailure {
  classification: 'retryable' | 'terminal';
  statusCode: number | null;
  message: string;
  raw: unknown;
}

export type ResendSendResult =
  | { status: 'success'; providerMessageId: string }
  | { status: 'retryable_error'; failure: ResendFailure }
  | { status: 'terminal_error'; failure: ResendFailure };

const DEFAULT_BASE_URL = 'https://api.resend.com';
const DEFAULT_TIMEOUT_MS = 15_000;

function classifyStatus(statusCode: number): 'retryable' | 'terminal' {
  if (statusCode === 429 || statusCode >= 500) {
    return 'retryable';
  }
  return 'terminal';
}

function parseJsonSafe(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

function readMessageId(body: unknown): string {
  if (typeof body === 'object' && body !== null && 'id' in body && typeof body.id === 'string') {
    return body.id;
  }
  return 'unknown';
}

export class ResendAdapter {
  private readonly apiKey: string | undefined;
  private readonly fromEmail: string | undefined;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: ResendAdapterConfig) {
    this.apiKey = config.apiKey;
    this.fromEmail = config.fromEmail;
    this.baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  get isConfigured(): boolean {
    return Boolean(this.apiKey && this.fromEmail);
  }

  async sendEmail(request: ResendSendEmailRequest): Promise<ResendSendResult> {
    if (!this.apiKey || !this.fromEmail) {
      return {
        status: 'terminal_error',
        failure: {
          classification: 'terminal',
          statusCode: null,
          message: !this.apiKey ? 'RESEND_API_KEY is not configured' : 'SENDER_EMAIL is not configured',
          raw: null,
        },
      };
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let rawText: string;
    try {
      const body: Record<string, unknown> = {
        from: this.fromEmail,
        to: [request.to],
        subject: request.subject,
        html: request.bodyHtml,
      };
      if (request.bodyText) {
        body.text = request.bodyText;
      }

      response = await this.fetchImpl(`${this.baseUrl}/emails`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
      rawText = await readBodyText(response, controller.signal);
    } catch (error: unknown) {
      return {
        status: 'retryable_error',
        failure: {
          classification: 'retryable',
          statusCode: null,
          message: controller.signal.aborted
            ? `Resend request timed out after ${this.timeoutMs}ms`
            : error instanceof Error
              ? error.message
              : 'Resend request failed',
          raw: error,
        },
      };
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      const classification = classifyStatus(response.status);
      const failure: ResendFailure = {
        classification,
        statusCode: response.status,
        message: `Resend API returned status ${response.status}`,
        raw: parseJsonSafe(rawText),
      };
      return classification === 'retryable'
        ? { status: 'retryable_error', failure }
        : { status: 'terminal_error', failure };
    }

    return {
      status: 'success',
      providerMessageId: readMessageId(parseJsonSafe(rawText)),
    };
  }
}
