import type { Platform } from '@/types/identity';

/**
 * Configuration issues, as opposed to code bugs
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type ResolutionErrorKind = 'network' | 'not_found' | 'decode';

/**
 * Failure to obtain or read platform data. Every kind is non-fatal:
 * the feed filter turns it into a fail-open decision.
 */
export abstract class ResolutionError extends Error {
  abstract readonly kind: ResolutionErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** Timeout, connection failure or non-2xx response other than not-found */
export class NetworkError extends ResolutionError {
  readonly kind = 'network';

  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NetworkError';
  }
}

/** Referenced post, thread or account no longer exists */
export class NotFoundError extends ResolutionError {
  readonly kind = 'not_found';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NotFoundError';
  }
}

/** Malformed API payload */
export class DecodeError extends ResolutionError {
  readonly kind = 'decode';

  constructor(message: string, readonly issues: string[] = [], options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DecodeError';
  }
}

/**
 * One linked account's following fetch failed. The aggregate following
 * set is still produced from the other accounts.
 */
export class PartialFollowingFailure extends Error {
  constructor(
    readonly accountId: string,
    readonly platform: Platform,
    cause: unknown
  ) {
    super(
      `Following fetch failed for account ${accountId}: ${cause instanceof Error ? cause.message : String(cause)}`,
      { cause }
    );
    this.name = 'PartialFollowingFailure';
  }
}

/** The caller abandoned the operation (e.g. a superseded timeline refresh) */
export class CancelledError extends Error {
  constructor(message = 'Operation cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export function isResolutionError(error: unknown): error is ResolutionError {
  return error instanceof ResolutionError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
