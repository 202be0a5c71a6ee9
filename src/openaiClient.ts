import OpenAI, { APIConnectionTimeoutError, APIError, RateLimitError } from 'openai';
import { config } from './config';
import { MessagingError, ModelRequestFailedError, ModelTimeoutError, RateLimitedError } from './errors';
import { getOpenAIKey } from './secrets';

const DEFAULT_RETRY_AFTER_SECONDS = 60;

// Lazy-initialize (secrets are only available at runtime)
let openai: OpenAI | null = null;

export function getOpenAI(): OpenAI {
  if (!openai) {
    openai = new OpenAI({
      apiKey: getOpenAIKey(),
      timeout: config.openai.timeoutMs,
      // retry decisions belong to the caller
      maxRetries: 0,
    });
  }
  return openai;
}

type ResponseHeaders = Record<string, string | null | undefined> | undefined;

export function retryAfterSeconds(headers: ResponseHeaders, now = Date.now()): number {
  const retryAfterMs = headers?.['retry-after-ms'];
  if (retryAfterMs) {
    const ms = Number(retryAfterMs);
    if (Number.isFinite(ms) && ms >= 0) {
      return Math.ceil(ms / 1000);
    }
  }

  const retryAfter = headers?.['retry-after'];
  if (retryAfter) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds) && seconds >= 0) {
      return Math.ceil(seconds);
    }
    const date = Date.parse(retryAfter);
    if (!Number.isNaN(date)) {
      return Math.max(0, Math.ceil((date - now) / 1000));
    }
  }
  return DEFAULT_RETRY_AFTER_SECONDS;
}

/**
 * Maps SDK failures onto the core error taxonomy.
 */
export function toModelError(error: unknown): Error {
  if (error instanceof MessagingError) {
    return error;
  }
  if (error instanceof RateLimitError) {
    return new RateLimitedError(retryAfterSeconds(error.headers), { cause: error });
  }
  if (error instanceof APIConnectionTimeoutError) {
    return new ModelTimeoutError({ cause: error });
  }
  if (error instanceof APIError) {
    return new ModelRequestFailedError(error.status, error.message, { cause: error });
  }
  return error instanceof Error ? error : new Error(String(error));
}
