/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * Translation of Vercel AI SDK and transport failures into the shared
 * LLMProviderError / TimeoutError vocabulary.
 */

import {APICallError, RetryError} from 'ai';

import {DynamicExtractError, LLMProviderError, TimeoutError} from '../errors.js';

const TRANSIENT_STATUS = new Set([408, 409, 425, 429]);

const NETWORK_MARKERS = [
  'econnrefused',
  'econnreset',
  'enotfound',
  'etimedout',
  'eai_again',
  'socket hang up',
  'fetch failed',
  'failed to fetch',
  'network',
];

export interface TranslationContext {
  provider: string;
  timeoutMs: number;
  elapsedMs: number;
}

export function isTransientStatus(status: number | undefined): boolean {
  if (status === undefined) return false;
  return TRANSIENT_STATUS.has(status) || status >= 500;
}

/**
 * Dig the useful part out of an error body.
 *
 * @example
 * // OpenRouter wraps upstream failures:
 * // { "error": { "message": "Provider returned error", "code": 429, "metadata": { "raw": "Rate limited" } } }
 * // -> '[429] Provider returned error ("Rate limited")'
 */
export function extractErrorMessage(body: string | undefined): string | undefined {
  if (!body) return undefined;
  try {
    const parsed: unknown = JSON.parse(body);
    if (typeof parsed !== 'object' || parsed === null || !('error' in parsed)) {
      return undefined;
    }
    const {error} = parsed;
    if (typeof error === 'string') return error;
    if (typeof error !== 'object' || error === null) return undefined;

    let message = 'message' in error && typeof error.message === 'string' ? error.message : undefined;
    if (!message) return undefined;
    if ('code' in error && (typeof error.code === 'number' || typeof error.code === 'string')) {
      message = `[${error.code}] ${message}`;
    }
    if (
      'metadata' in error &&
      typeof error.metadata === 'object' &&
      error.metadata !== null &&
      'raw' in error.metadata &&
      error.metadata.raw !== undefined
    ) {
      message += ` (${JSON.stringify(error.metadata.raw)})`;
    }
    return message;
  } catch {
    return body.length > 500 ? `${body.slice(0, 500)}...` : body;
  }
}

function isTimeoutLike(error: Error): boolean {
  const msgLower = error.message.toLowerCase();
  return (
    error.name === 'TimeoutError' ||
    error.name === 'AbortError' ||
    msgLower.includes('timed out') ||
    msgLower.includes('timeout')
  );
}

function isNetworkLike(error: Error): boolean {
  const parts = [error.message];
  if (error.cause instanceof Error) parts.push(error.cause.message);
  if (
    typeof error.cause === 'object' &&
    error.cause !== null &&
    'code' in error.cause &&
    typeof error.cause.code === 'string'
  ) {
    parts.push(error.cause.code);
  }
  const text = parts.join(' ').toLowerCase();
  return NETWORK_MARKERS.some((marker) => text.includes(marker));
}

export function translateProviderError(
  error: unknown,
  ctx: TranslationContext,
): DynamicExtractError {
  if (error instanceof DynamicExtractError) return error;

  if (RetryError.isInstance(error)) {
    return translateProviderError(error.lastError, ctx);
  }

  if (APICallError.isInstance(error)) {
    const detail = extractErrorMessage(error.responseBody) ?? error.message;
    const status = error.statusCode;
    return new LLMProviderError(
      `${ctx.provider} API error${status === undefined ? '' : ` ${status}`}: ${detail}`,
      ctx.provider,
      {
        statusCode: status,
        responseBody: error.responseBody,
        retryable: isTransientStatus(status) || (status === undefined && error.isRetryable),
        cause: error,
      },
    );
  }

  if (error instanceof Error) {
    if (isTimeoutLike(error)) {
      return new TimeoutError(
        `${ctx.provider} request timed out after ${ctx.elapsedMs}ms (limit ${ctx.timeoutMs}ms)`,
        ctx.elapsedMs,
        ctx.timeoutMs,
        {provider: ctx.provider},
      );
    }
    if (isNetworkLike(error)) {
      return new LLMProviderError(
        `${ctx.provider} connection error: ${error.message}`,
        ctx.provider,
        {retryable: true, cause: error},
      );
    }
    return new LLMProviderError(`Unexpected ${ctx.provider} error: ${error.message}`, ctx.provider, {
      cause: error,
    });
  }

  return new LLMProviderError(`Unexpected ${ctx.provider} error: ${String(error)}`, ctx.provider);
}

/**
 * Whether a translated failure is worth another attempt.
 */
export function isTransient(error: DynamicExtractError): boolean {
  if (error instanceof TimeoutError) return true;
  return error instanceof LLMProviderError && error.retryable;
}
