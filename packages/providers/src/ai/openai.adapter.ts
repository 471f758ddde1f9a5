import { z } from 'zod';

import { readBodyText } from '../http.js';

export interface OpenAiAdapterConfig {
  apiKey: string | undefined;
  generationModel?: string | undefined;
  baseUrl?: string | undefined;
  timeoutMs?: number | undefined;
  maxTokens?: number | undefined;
  fetchImpl?: typeof fetch | undefined;
}

export interface OutreachEmailContext {
  /** Readable summary of the recipient, see buildRecipientProfileText. */
  profileText: string;
  productVision: string;
}

export interface GeneratedEmail {
  model: string;
  subject: string;
  bodyHtml: string;
}

export interface OpenAiFailure {
  classification: 'retryable' | 'terminal';
  statusCode: number | null;
  message: string;
  raw: unknown;
}

export type OpenAiGenerationResult =
  | { status: 'success'; data: GeneratedEmail }
  | { status: 'retryable_error'; failure: OpenAiFailure }
  | { status: 'terminal_error'; failure: OpenAiFailure };

const GeneratedEmailSchema = z.object({
  subject: z.string(),
  body_html: z.string(),
});

const ChatCompletionResponseSchema = z.object({
  choices: z
    .array(
      z.object({
        message: z.object({ content: z.string().nullable().optional() }).optional(),
      }),
    )
    .default([]),
});

const DEFAULT_GENERATION_MODEL = 'gpt-4o';
const DEFAULT_BASE_URL = 'https://api.openai.com/v1';
const DEFAULT_TIMEOUT_MS = 30_000;
const DEFAULT_MAX_TOKENS = 1000;

function classifyStatus(statusCode: number): 'retryable' | 'terminal' {
  if (statusCode === 429 || statusCode >= 500) {
    return 'retryable';
  }
  return 'terminal';
}

/** Cuts the text from the first `{` to the last `}`; null when there is none. */
export function extractJsonObject(text: string): string | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end === -1 || end < start) {
    return null;
  }
  return text.slice(start, end + 1);
}

export function buildOutreachPrompt(context: OutreachEmailContext): string {
  return [
    "You are a B2B sales agent. Your goal is to write a personalized email to a potential client based on their LinkedIn profile and our product's vision/goal.",
    '',
    'Here is the LinkedIn profile information:',
    context.profileText,
    '',
    'Here is our product vision/goal:',
    context.productVision,
    '',
    "Generate a concise and compelling email. The email should be in HTML format. The response MUST be a JSON object with two keys: 'subject' for the email subject line, and 'body_html' for the HTML content of the email body. Ensure the HTML is well-formed and suitable for direct use. All newlines and special characters within the 'body_html' string MUST be properly escaped for JSON.",
    '',
    'Example JSON output:',
    '{"subject": "Your personalized subject line", "body_html": "<p>Your email body in HTML format.\\nThis is a new line.</p>"}',
    '',
    'Your JSON response:',
  ].join('\n');
}

function parseJsonSafe(text: string): unknown {
  try {
    return JSON.parse(text) as unknown;
  } catch {
    return text;
  }
}

export class OpenAiAdapter {
  private readonly apiKey: string | undefined;
  private readonly generationModel: string;
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly maxTokens: number;
  private readonly fetchImpl: typeof fetch;

  constructor(config: OpenAiAdapterConfig) {
    this.apiKey = config.apiKey;
    this.generationModel = config.generationModel ?? DEFAULT_GENERATION_MODEL;
    this.baseUrl = config.baseUrl ?? DEFAULT_BASE_URL;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxTokens = config.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.fetchImpl = config.fetchImpl ?? fetch;
  }

  get isConfigured(): boolean {
    return Boolean(this.apiKey);
  }

  async generateOutreachEmail(context: OutreachEmailContext): Promise<OpenAiGenerationResult> {
    if (!this.apiKey) {
      return {
        status: 'terminal_error',
        failure: {
          classification: 'terminal',
          statusCode: null,
          message: 'OPENAI_API_KEY is not configured',
          raw: null,
        },
      };
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs);

    let response: Response;
    let rawText: string;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.generationModel,
          max_tokens: this.maxTokens,
          messages: [{ role: 'user', content: buildOutreachPrompt(context) }],
        }),
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
            ? `OpenAI request timed out after ${this.timeoutMs}ms`
            : error instanceof Error
              ? error.message
              : 'OpenAI request failed',
          raw: error,
        },
      };
    } finally {
      clearTimeout(timeout);
    }

    if (!response.ok) {
      const classification = classifyStatus(response.status);
      const failure: OpenAiFailure = {
        classification,
        statusCode: response.status,
        message: `OpenAI API returned status ${response.status}`,
        raw: parseJsonSafe(rawText),
      };
      return classification === 'retryable'
        ? { status: 'retryable_error', failure }
        : { status: 'terminal_error', failure };
    }

    const terminal = (message: string, raw: unknown): OpenAiGenerationResult => ({
      status: 'terminal_error',
      failure: { classification: 'terminal', statusCode: response.status, message, raw },
    });

    const completion = ChatCompletionResponseSchema.safeParse(parseJsonSafe(rawText));
    const content = completion.success ? completion.data.choices[0]?.message?.content : undefined;
    if (!content) {
      return terminal('OpenAI response missing content', parseJsonSafe(rawText));
    }

    const jsonText = extractJsonObject(content);
    if (jsonText === null) {
      return terminal('Generated content contains no JSON object', content);
    }

    let candidate: unknown;
    try {
      candidate = JSON.parse(jsonText);
    } catch (error: unknown) {
      return terminal(
        `Generated content is not valid JSON: ${error instanceof Error ? error.message : 'parse failure'}`,
        content,
      );
    }

    const email = GeneratedEmailSchema.safeParse(candidate);
    if (!email.success) {
      return terminal('Generated content must contain string subject and body_html keys', candidate);
    }

    return {
      status: 'success',
      data: {
        model: this.generationModel,
        subject: email.data.subject,
        bodyHtml: email.data.body_html,
      },
    };
  }
}
