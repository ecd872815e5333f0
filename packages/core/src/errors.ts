/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export type ErrorType =
  | 'schema_generation'
  | 'configuration'
  | 'baml_compilation'
  | 'llm_provider'
  | 'timeout'
  | 'response_parsing'
  | 'cancelled'
  | 'unknown';

export type ErrorContext = Record<string, unknown>;

/**
 * Base class of every failure the library reports.
 */
export class DynamicExtractError extends Error {
  readonly errorType: ErrorType;
  readonly context: ErrorContext;

  constructor(
    message: string,
    errorType: ErrorType = 'unknown',
    context: ErrorContext = {},
    options?: {cause?: unknown},
  ) {
    super(message, options);
    this.name = 'DynamicExtractError';
    this.errorType = errorType;
    this.context = context;
  }

  /**
   * Wrap anything thrown from outside the library.
   */
  static from(error: unknown): DynamicExtractError {
    if (error instanceof DynamicExtractError) return error;
    const message = error instanceof Error ? error.message : String(error);
    return new DynamicExtractError(`Unexpected error: ${message}`, 'unknown', {}, {
      cause: error,
    });
  }
}

export class SchemaGenerationError extends DynamicExtractError {
  readonly fragment: unknown;
  readonly path: string;

  constructor(message: string, fragment?: unknown, path = '$', context?: ErrorContext) {
    super(message, 'schema_generation', {path, ...context});
    this.name = 'SchemaGenerationError';
    this.fragment = fragment;
    this.path = path;
  }
}

export class ConfigurationError extends DynamicExtractError {
  readonly configKey?: string;

  constructor(message: string, configKey?: string, context?: ErrorContext) {
    super(message, 'configuration', {configKey, ...context});
    this.name = 'ConfigurationError';
    this.configKey = configKey;
  }
}

export class BAMLCompilationError extends DynamicExtractError {
  readonly diagnostic: string;
  readonly bamlCode?: string;

  constructor(message: string, diagnostic: string, bamlCode?: string) {
    super(message, 'baml_compilation', {diagnostic});
    this.name = 'BAMLCompilationError';
    this.diagnostic = diagnostic;
    this.bamlCode = bamlCode;
  }
}

export interface LLMProviderErrorDetails {
  statusCode?: number;
  responseBody?: string;
  retryable?: boolean;
  cause?: unknown;
}

export class LLMProviderError extends DynamicExtractError {
  readonly provider: string;
  readonly statusCode?: number;
  readonly responseBody?: string;
  readonly retryable: boolean;

  constructor(message: string, provider: string, details: LLMProviderErrorDetails = {}) {
    super(
      message,
      'llm_provider',
      {
        provider,
        statusCode: details.statusCode,
        responseBody: details.responseBody,
      },
      {cause: details.cause},
    );
    this.name = 'LLMProviderError';
    this.provider = provider;
    this.statusCode = details.statusCode;
    this.responseBody = details.responseBody;
    this.retryable = details.retryable ?? false;
  }
}

export class TimeoutError extends DynamicExtractError {
  readonly elapsedMs: number;
  readonly timeoutMs: number;

  constructor(message: string, elapsedMs: number, timeoutMs: number, context?: ErrorContext) {
    super(message, 'timeout', {elapsedMs, timeoutMs, ...context});
    this.name = 'TimeoutError';
    this.elapsedMs = elapsedMs;
    this.timeoutMs = timeoutMs;
  }
}

export class ResponseParsingError extends DynamicExtractError {
  readonly rawResponse: string;
  readonly path: string;
  readonly schemaName?: string;

  constructor(message: string, rawResponse: string, path: string, schemaName?: string) {
    super(message, 'response_parsing', {path, schemaName});
    this.name = 'ResponseParsingError';
    this.rawResponse = rawResponse;
    this.path = path;
    this.schemaName = schemaName;
  }
}

export class CancellationError extends DynamicExtractError {
  constructor(message = 'Extraction was cancelled') {
    super(message, 'cancelled');
    this.name = 'CancellationError';
  }
}
