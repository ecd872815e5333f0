/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * Provider option types
 * Single source of truth for the options schema and the provider contract
 */

import {z} from 'zod';

import {isLogLevel, LOG_LEVELS} from '@dynamic-extract/common';
import type {Logger, LogLevel} from '@dynamic-extract/common';

export enum ProviderId {
  OPENAI = 'openai',
  ANTHROPIC = 'anthropic',
  OPENROUTER = 'openrouter',
  OLLAMA = 'ollama',
  LMSTUDIO = 'lmstudio',
}

const LogLevelSchema = z.custom<LogLevel>(isLogLevel, {
  message: `logLevel must be one of ${LOG_LEVELS.join(', ')}`,
});

/**
 * Options accepted from callers. `provider` is checked against the registry
 * separately, so unknown ids surface as a configuration error naming the
 * available providers.
 */
export const ProviderOptionsSchema = z
  .object({
    provider: z.string().min(1),
    model: z.string().min(1).optional(),
    apiKey: z.string().min(1).optional(),
    baseUrl: z.string().url().optional(),
    temperature: z.number().min(0).max(2).optional(),
    maxTokens: z.number().int().positive().optional(),
    /** Seconds. */
    timeout: z.number().positive().optional(),
    retryCount: z.number().int().min(0).max(10).optional(),
    logLevel: LogLevelSchema.optional(),
    logPath: z.string().min(1).optional(),
  })
  .strict();

export type ProviderOptions = z.input<typeof ProviderOptionsSchema>;

export const DEFAULT_PROVIDER_OPTIONS: Readonly<ProviderOptions> = Object.freeze({
  provider: ProviderId.OLLAMA,
  model: 'gemma3:1b',
});

export const DEFAULT_TIMEOUT_SECONDS = 120;
export const DEFAULT_TEMPERATURE = 0.1;
export const DEFAULT_MAX_TOKENS = 4096;

/**
 * Options after validation and defaulting; what adapters are built from.
 */
export interface ProviderConfig {
  provider: ProviderId;
  model: string;
  apiKey?: string;
  baseUrl?: string;
  temperature: number;
  maxTokens: number;
  timeoutMs: number;
  retryCount: number;
}

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_BACKOFF: Readonly<BackoffOptions> = Object.freeze({
  baseDelayMs: 1000,
  maxDelayMs: 30_000,
});

export interface TokenUsage {
  inputTokens?: number;
  outputTokens?: number;
  totalTokens?: number;
}

export interface RawResult {
  text: string;
  provider: ProviderId;
  model: string;
  attempts: number;
  durationMs: number;
  usage?: TokenUsage;
}

export interface InvokeOptions {
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Uniform calling contract over every LLM backend.
 */
export interface Provider {
  readonly id: ProviderId;
  readonly model: string;
  readonly config: Readonly<ProviderConfig>;
  /** Sends the rendered prompt as is. */
  invoke(prompt: string, options?: InvokeOptions): Promise<RawResult>;
}

export interface ProviderDependencies {
  logger: Logger;
  backoff: BackoffOptions;
}
