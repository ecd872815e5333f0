/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

import type {Provider, ProviderConfig, ProviderDependencies} from './types.js';
import {ProviderId} from './types.js';
import {
  AnthropicProvider,
  OpenAICompatibleProvider,
  OpenAIProvider,
  OpenRouterProvider,
} from './VercelAIProvider.js';

/**
 * Provider constructor signature
 */
export type ProviderConstructor = new (
  config: ProviderConfig,
  deps: ProviderDependencies,
) => Provider;

export interface ProviderRegistration {
  id: ProviderId;
  description: string;
  providerClass: ProviderConstructor;
  defaultModel: string;
  defaultBaseUrl?: string;
  /** Environment variable consulted when options carry no apiKey. */
  apiKeyEnv?: string;
  requiresApiKey: boolean;
}

/**
 * Immutable set of provider registrations, built once at startup and passed
 * to the factory.
 *
 * @example
 * ```typescript
 * const registry = new ProviderRegistry([
 *   {id: ProviderId.OLLAMA, description: 'Local Ollama', providerClass: OpenAICompatibleProvider,
 *    defaultModel: 'gemma3:1b', defaultBaseUrl: 'http://localhost:11434/v1', requiresApiKey: false},
 * ])
 * const factory = new LLMProviderFactory(registry)
 * ```
 */
export class ProviderRegistry {
  private readonly entries: ReadonlyMap<string, Readonly<ProviderRegistration>>;

  constructor(registrations: readonly ProviderRegistration[]) {
    const entries = new Map<string, Readonly<ProviderRegistration>>();
    for (const registration of registrations) {
      if (entries.has(registration.id)) {
        throw new Error(`Provider '${registration.id}' is already registered`);
      }
      entries.set(registration.id, Object.freeze({...registration}));
    }
    this.entries = entries;
    Object.freeze(this);
  }

  get(id: string): Readonly<ProviderRegistration> | undefined {
    return this.entries.get(id);
  }

  has(id: string): boolean {
    return this.entries.has(id);
  }

  ids(): string[] {
    return Array.from(this.entries.keys());
  }

  list(): Readonly<ProviderRegistration>[] {
    return Array.from(this.entries.values());
  }
}

export function createDefaultRegistry(): ProviderRegistry {
  return new ProviderRegistry([
    {
      id: ProviderId.OPENAI,
      description: 'OpenAI chat completions',
      providerClass: OpenAIProvider,
      defaultModel: 'gpt-4o',
      apiKeyEnv: 'OPENAI_API_KEY',
      requiresApiKey: true,
    },
    {
      id: ProviderId.ANTHROPIC,
      description: 'Anthropic messages API',
      providerClass: AnthropicProvider,
      defaultModel: 'claude-3-5-sonnet-20241022',
      apiKeyEnv: 'ANTHROPIC_API_KEY',
      requiresApiKey: true,
    },
    {
      id: ProviderId.OPENROUTER,
      description: 'OpenRouter model gateway',
      providerClass: OpenRouterProvider,
      defaultModel: 'google/gemini-2.0-flash-exp',
      apiKeyEnv: 'OPENROUTER_API_KEY',
      requiresApiKey: true,
    },
    {
      id: ProviderId.OLLAMA,
      description: 'Local Ollama server',
      providerClass: OpenAICompatibleProvider,
      defaultModel: 'gemma3:1b',
      defaultBaseUrl: 'http://localhost:11434/v1',
      requiresApiKey: false,
    },
    {
      id: ProviderId.LMSTUDIO,
      description: 'Local LM Studio server',
      providerClass: OpenAICompatibleProvider,
      defaultModel: 'local-model',
      defaultBaseUrl: 'http://localhost:1234/v1',
      requiresApiKey: false,
    },
  ]);
}
