/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

import {setTimeout as delay} from 'node:timers/promises';

import type {Logger} from '@dynamic-extract/common';

import {CancellationError, TimeoutError} from '../errors.js';
import type {DynamicExtractError} from '../errors.js';

import {isTransient, translateProviderError} from './errors.js';
import type {
  BackoffOptions,
  InvokeOptions,
  Provider,
  ProviderConfig,
  ProviderDependencies,
  ProviderId,
  RawResult,
  TokenUsage,
} from './types.js';

export interface GenerateOutput {
  text: string;
  usage?: TokenUsage;
}

/**
 * BaseProvider - Abstract base class for all provider adapters
 *
 * Provides:
 * - Per-attempt timeout and caller cancellation
 * - Retry of transient failures with exponential backoff
 * - Translation of backend failures into the shared error kinds
 *
 * Subclasses only implement `generate`, a single backend call.
 */
export abstract class BaseProvider implements Provider {
  readonly id: ProviderId;
  readonly model: string;
  readonly config: Readonly<ProviderConfig>;
  protected logger: Logger;
  private backoff: BackoffOptions;

  constructor(config: ProviderConfig, deps: ProviderDependencies) {
    this.config = Object.freeze({...config});
    this.id = config.provider;
    this.model = config.model;
    this.logger = deps.logger;
    this.backoff = deps.backoff;

    this.logger.debug(`${this.id} provider created`, {
      provider: this.id,
      model: this.model,
      timeoutMs: config.timeoutMs,
      retryCount: config.retryCount,
      hasApiKey: Boolean(config.apiKey),
    });
  }

  /**
   * One backend call. Must honour `signal`.
   */
  protected abstract generate(prompt: string, signal: AbortSignal): Promise<GenerateOutput>;

  async invoke(prompt: string, options: InvokeOptions = {}): Promise<RawResult> {
    const logger = options.logger ?? this.logger;
    const maxAttempts = this.config.retryCount + 1;
    const startTime = performance.now();

    logger.trace('Sending extraction prompt', {
      provider: this.id,
      promptLength: prompt.length,
    });

    for (let attempt = 1; ; attempt++) {
      if (options.signal?.aborted) throw new CancellationError();

      const attemptStart = performance.now();
      const timeoutSignal = AbortSignal.timeout(this.config.timeoutMs);
      const signal = options.signal
        ? AbortSignal.any([options.signal, timeoutSignal])
        : timeoutSignal;

      try {
        const output = await this.generate(prompt, signal);
        const durationMs = Math.round(performance.now() - startTime);

        logger.debug('LLM response received', {
          provider: this.id,
          model: this.model,
          attempt,
          durationMs,
          responseLength: output.text.length,
        });

        return {
          text: output.text,
          provider: this.id,
          model: this.model,
          attempts: attempt,
          durationMs,
          usage: output.usage,
        };
      } catch (error) {
        if (options.signal?.aborted) throw new CancellationError();

        const elapsedMs = Math.round(performance.now() - attemptStart);
        const failure: DynamicExtractError = timeoutSignal.aborted
          ? new TimeoutError(
              `${this.id} request timed out after ${elapsedMs}ms (limit ${this.config.timeoutMs}ms)`,
              elapsedMs,
              this.config.timeoutMs,
              {provider: this.id},
            )
          : translateProviderError(error, {
              provider: this.id,
              timeoutMs: this.config.timeoutMs,
              elapsedMs,
            });

        if (!isTransient(failure) || attempt >= maxAttempts) {
          logger.error(`${this.id} call failed`, {
            attempt,
            maxAttempts,
            errorType: failure.errorType,
            error: failure.message,
          });
          throw failure;
        }

        const waitMs = this.backoffDelay(attempt);
        logger.warn(`Retrying ${this.id} in ${waitMs}ms (attempt ${attempt + 1}/${maxAttempts})`, {
          error: failure.message,
        });
        await this.wait(waitMs, options.signal);
      }
    }
  }

  protected backoffDelay(attempt: number): number {
    return Math.min(
      this.backoff.baseDelayMs * Math.pow(2, attempt - 1),
      this.backoff.maxDelayMs,
    );
  }

  private async wait(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0) return;
    try {
      await delay(ms, undefined, {signal});
    } catch (error) {
      if (signal?.aborted) throw new CancellationError();
      throw error;
    }
  }
}
