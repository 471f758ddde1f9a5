export * from './ai/openai.adapter.js';
export * from './email/resend.adapter.js';
