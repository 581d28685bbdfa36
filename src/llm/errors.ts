// Errors raised by provider adapters and the router

import type { ProviderName } from "../types/index.js";

export type LlmErrorCode =
  | "PROVIDER_NOT_AVAILABLE"
  | "REQUEST_FAILED"
  | "RATE_LIMITED"
  | "INVALID_CONFIG"
  | "OFFLINE_MODE"
  | "MAX_RETRIES_EXCEEDED";

export abstract class LlmError extends Error {
  abstract readonly code: LlmErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ProviderNotAvailableError extends LlmError {
  readonly code = "PROVIDER_NOT_AVAILABLE";

  constructor(readonly provider: ProviderName) {
    super(`Provider not available: ${provider}`);
  }
}

export class RequestFailedError extends LlmError {
  readonly code = "REQUEST_FAILED";

  constructor(message: string, options?: { cause?: unknown }) {
    super(`Request failed: ${message}`, options);
  }
}

export class RateLimitedError extends LlmError {
  readonly code = "RATE_LIMITED";

  constructor(readonly provider: ProviderName) {
    super(`Rate limit exceeded for provider: ${provider}`);
  }
}

export class InvalidConfigError extends LlmError {
  readonly code = "INVALID_CONFIG";

  constructor(message: string) {
    super(`Invalid configuration: ${message}`);
  }
}

export class OfflineModeError extends LlmError {
  readonly code = "OFFLINE_MODE";

  constructor() {
    super("Offline mode active");
  }
}

/**
 * Every provider failed in every round. `cause` holds the last failure.
 */
export class MaxRetriesExceededError extends LlmError {
  readonly code = "MAX_RETRIES_EXCEEDED";

  constructor(options?: { cause?: unknown }) {
    super("Maximum retries exceeded", options);
  }
}

export function isLlmError(error: unknown): error is LlmError {
  return error instanceof LlmError;
}

/**
 * Text recorded in logs for an arbitrary thrown value.
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
