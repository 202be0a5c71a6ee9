export type ErrorCategory = 'validation' | 'transient' | 'integrity' | 'upstream';

/**
 * Base class for every failure the core raises on purpose.
 * Only `transient` errors are worth retrying.
 */
export abstract class MessagingError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(
    readonly code: string,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }

  get retryable(): boolean {
    return this.category === 'transient';
  }
}

export class ValidationError extends MessagingError {
  readonly category = 'validation';

  constructor(message: string, code = 'INVALID_ARGUMENT') {
    super(code, message);
  }
}

export class InvalidMembershipError extends ValidationError {
  constructor(message: string) {
    super(message, 'INVALID_MEMBERSHIP');
  }
}

export class NotAMemberError extends ValidationError {
  constructor(readonly conversationId: string, readonly userId: string) {
    super(`User ${userId} is not a member of conversation ${conversationId}`, 'NOT_A_MEMBER');
  }
}

export class NotSenderError extends ValidationError {
  constructor(readonly messageId: string, readonly userId: string) {
    super(`Only the sender can change message ${messageId}`, 'NOT_SENDER');
  }
}

export class ConversationNotFoundError extends ValidationError {
  constructor(readonly conversationId: string) {
    super(`Conversation ${conversationId} not found`, 'CONVERSATION_NOT_FOUND');
  }
}

export class MessageNotFoundError extends ValidationError {
  constructor(readonly conversationId: string, readonly messageId: string) {
    super(`Message ${messageId} not found in conversation ${conversationId}`, 'MESSAGE_NOT_FOUND');
  }
}

export class ArchivedMessageImmutableError extends ValidationError {
  constructor(readonly conversationId: string, readonly messageId: string) {
    super(`Message ${messageId} is archived and can no longer be changed`, 'MESSAGE_ARCHIVED');
  }
}

export class DuplicateMessageIdError extends MessagingError {
  readonly category = 'integrity';

  constructor(readonly conversationId: string, readonly messageId: string) {
    super(
      'DUPLICATE_MESSAGE_ID',
      `Message id ${messageId} already exists in conversation ${conversationId} with different content`
    );
  }
}

export class EmbeddingIntegrityError extends MessagingError {
  readonly category = 'integrity';

  constructor(readonly vectorId: string) {
    super('EMBEDDING_CONFLICT', `Vector ${vectorId} already exists with different metadata`);
  }
}

export class MalformedModelResponseError extends MessagingError {
  readonly category = 'upstream';

  constructor(message: string, readonly body?: string) {
    super('MALFORMED_MODEL_RESPONSE', message);
  }
}

export class RateLimitedError extends MessagingError {
  readonly category = 'transient';

  constructor(readonly retryAfterSeconds: number, options?: { cause?: unknown }) {
    super('RATE_LIMITED', `Rate limited, retry after ${retryAfterSeconds}s`, options);
  }
}

export class ModelTimeoutError extends MessagingError {
  readonly category = 'transient';

  constructor(options?: { cause?: unknown }) {
    super('MODEL_TIMEOUT', 'Model request timed out', options);
  }
}

export class ModelRequestFailedError extends MessagingError {
  readonly category: ErrorCategory;

  constructor(readonly status: number | undefined, message: string, options?: { cause?: unknown }) {
    super('MODEL_REQUEST_FAILED', message, options);
    // 5xx and connection failures are worth another try, 4xx are not
    this.category = status === undefined || status >= 500 ? 'transient' : 'upstream';
  }
}

export type ArchivalStep = 'archive-write' | 'live-delete';

export class ArchivalFailedError extends MessagingError {
  readonly category = 'transient';

  constructor(readonly conversationId: string, readonly step: ArchivalStep, options?: { cause?: unknown }) {
    super('ARCHIVAL_FAILED', `Archival of ${conversationId} failed during ${step}`, options);
  }
}

export type InsightStage = 'embedding' | 'retrieval' | 'generation';

export class InsightGenerationFailedError extends MessagingError {
  readonly category: ErrorCategory;

  constructor(readonly stage: InsightStage, cause: unknown) {
    super('INSIGHT_GENERATION_FAILED', `Insight generation failed during ${stage}`, { cause });
    this.category = isRetryable(cause) ? 'transient' : 'upstream';
  }
}

/**
 * Unknown errors (store outages, network resets) are assumed transient.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof MessagingError) {
    return error.retryable;
  }
  return true;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
