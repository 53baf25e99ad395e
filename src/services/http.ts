import { z } from 'zod';
import { CancelledError, DecodeError, NetworkError, NotFoundError } from '@/core/errors';
import logger from '@/utils/logger';

export interface RequestOptions {
  accessToken: string;
  timeoutMs: number;
  signal?: AbortSignal;
  /** Treat a response as not-found even when the status isn't 404 (e.g. XRPC 400 NotFound) */
  isNotFound?: (status: number, body: unknown) => boolean;
}

export interface JsonResponse<T> {
  data: T;
  headers: Headers;
}

/**
 * GET a JSON resource and validate it against a schema.
 *
 * Failures are mapped onto the resolution error taxonomy:
 * 404 -> NotFoundError, other HTTP/connection/timeout -> NetworkError,
 * unparseable or schema-mismatched body -> DecodeError. Abort by the
 * caller's signal -> CancelledError.
 */
export async function requestJson<S extends z.ZodTypeAny>(
  url: URL,
  schema: S,
  options: RequestOptions
): Promise<JsonResponse<z.output<S>>> {
  const timeout = AbortSignal.timeout(options.timeoutMs);
  const signal = options.signal ? AbortSignal.any([options.signal, timeout]) : timeout;

  let response: Response;
  try {
    response = await fetch(url.toString(), {
      headers: {
        'Accept': 'application/json',
        'Authorization': `Bearer ${options.accessToken}`
      },
      signal
    });
  } catch (error) {
    throwIfAborted(url, options, timeout, error);
    throw new NetworkError(
      `Request failed: ${url.pathname}: ${error instanceof Error ? error.message : String(error)}`,
      undefined,
      { cause: error }
    );
  }

  if (!response.ok) {
    const body = await safeReadBody(response);
    if (response.status === 404 || options.isNotFound?.(response.status, body)) {
      throw new NotFoundError(`Resource not found: ${url.pathname}`);
    }
    logger.debug('Platform API returned non-OK status', {
      url: url.toString(),
      status: response.status
    });
    throw new NetworkError(`${url.pathname} returned ${response.status}: ${response.statusText}`, response.status);
  }

  let payload: unknown;
  try {
    payload = await response.json();
  } catch (error) {
    // Reading the body is still subject to the timeout and the caller's signal
    throwIfAborted(url, options, timeout, error);
    throw new DecodeError(`Response from ${url.pathname} is not valid JSON`, [], { cause: error });
  }

  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new DecodeError(`Unexpected payload from ${url.pathname}`, issues);
  }

  return { data: parsed.data, headers: response.headers };
}

function throwIfAborted(url: URL, options: RequestOptions, timeout: AbortSignal, error: unknown): void {
  if (options.signal?.aborted) {
    throw new CancelledError(`Request cancelled: ${url.pathname}`);
  }
  if (timeout.aborted) {
    throw new NetworkError(`Request timed out after ${options.timeoutMs}ms: ${url.pathname}`, undefined, { cause: error });
  }
}

async function safeReadBody(response: Response): Promise<unknown> {
  try {
    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch {
      return text;
    }
  } catch {
    return undefined;
  }
}

/**
 * Next page URL from an RFC 8288 Link header (rel="next"), as used by Mastodon
 */
export function parseNextLink(header: string | null): URL | undefined {
  if (!header) return undefined;
  for (const part of header.split(',')) {
    const match = /<([^>]+)>\s*;\s*rel="?next"?/.exec(part.trim());
    if (match) {
      try {
        return new URL(match[1]);
      } catch {
        return undefined;
      }
    }
  }
  return undefined;
}
