/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

import {logger as defaultLogger} from '@dynamic-extract/common';
import type {Logger} from '@dynamic-extract/common';
import {z} from 'zod';

import {ConfigurationError} from '../errors.js';

import type {ProviderRegistry} from './registry.js';
import {
  DEFAULT_BACKOFF,
  DEFAULT_MAX_TOKENS,
  DEFAULT_PROVIDER_OPTIONS,
  DEFAULT_TEMPERATURE,
  DEFAULT_TIMEOUT_SECONDS,
  ProviderOptionsSchema,
} from './types.js';
import type {BackoffOptions, Provider, ProviderConfig} from './types.js';

export interface ProviderFactorySettings {
  logger?: Logger;
  backoff?: Partial<BackoffOptions>;
  /** Source of credential fallbacks. */
  env?: Readonly<Record<string, string | undefined>>;
}

function describeIssue(issue: z.ZodIssue): {key: string; message: string} {
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    return {
      key: issue.keys.join(', '),
      message: `Unrecognized option(s): ${issue.keys.join(', ')}`,
    };
  }
  const key = issue.path.join('.');
  return {key, message: `Invalid option '${key}': ${issue.message}`};
}

/**
 * Builds providers from caller options against an explicit registry.
 */
export class LLMProviderFactory {
  private readonly logger: Logger;
  private readonly backoff: BackoffOptions;
  private readonly env: Readonly<Record<string, string | undefined>>;

  constructor(
    private readonly registry: ProviderRegistry,
    settings: ProviderFactorySettings = {},
  ) {
    this.logger = settings.logger ?? defaultLogger;
    this.backoff = {...DEFAULT_BACKOFF, ...settings.backoff};
    this.env = settings.env ?? process.env;
  }

  /**
   * Validate options and fill in provider defaults.
   *
   * @throws ConfigurationError for invalid options, unknown providers or
   * missing credentials
   */
  resolveConfig(options: unknown = DEFAULT_PROVIDER_OPTIONS): ProviderConfig {
    const parsed = ProviderOptionsSchema.safeParse(options ?? DEFAULT_PROVIDER_OPTIONS);
    if (!parsed.success) {
      const {key, message} = describeIssue(parsed.error.issues[0]);
      throw new ConfigurationError(message, key, {issues: parsed.error.issues});
    }
    const opts = parsed.data;

    const registration = this.registry.get(opts.provider.toLowerCase());
    if (!registration) {
      throw new ConfigurationError(
        `Unknown provider '${opts.provider}'. Available providers: ${this.registry.ids().join(', ')}`,
        'provider',
      );
    }

    const envKey = registration.apiKeyEnv ? this.env[registration.apiKeyEnv] : undefined;
    const apiKey = opts.apiKey ?? (envKey || undefined);
    if (registration.requiresApiKey && !apiKey) {
      throw new ConfigurationError(
        `${registration.id} provider requires apiKey` +
          (registration.apiKeyEnv ? ` (or the ${registration.apiKeyEnv} environment variable)` : ''),
        'apiKey',
      );
    }

    return {
      provider: registration.id,
      model: opts.model ?? registration.defaultModel,
      apiKey,
      baseUrl: opts.baseUrl ?? registration.defaultBaseUrl,
      temperature: opts.temperature ?? DEFAULT_TEMPERATURE,
      maxTokens: opts.maxTokens ?? DEFAULT_MAX_TOKENS,
      timeoutMs: Math.round((opts.timeout ?? DEFAULT_TIMEOUT_SECONDS) * 1000),
      retryCount: opts.retryCount ?? 0,
    };
  }

  createProvider(options?: unknown, logger: Logger = this.logger): Provider {
    const config = this.resolveConfig(options);
    const registration = this.registry.get(config.provider);
    if (!registration) {
      throw new ConfigurationError(`Unknown provider '${config.provider}'`, 'provider');
    }
    return new registration.providerClass(config, {logger, backoff: this.backoff});
  }

  /**
   * Registered provider ids. Reflects registration, not connectivity.
   */
  getAvailableProviders(): Set<string> {
    return new Set(this.registry.ids());
  }

  describeProviders(): Array<{id: string; description: string; defaultModel: string}> {
    return this.registry.list().map(({id, description, defaultModel}) => ({
      id,
      description,
      defaultModel,
    }));
  }
}
