/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * Vercel AI provider adapters
 * One adapter per backend; all calls go through `generateText`
 */

import {createAnthropic} from '@ai-sdk/anthropic';
import {createOpenAI} from '@ai-sdk/openai';
import {createOpenAICompatible} from '@ai-sdk/openai-compatible';
import {createOpenRouter} from '@openrouter/ai-sdk-provider';
import {generateText} from 'ai';
import type {LanguageModel} from 'ai';

import {ConfigurationError} from '../errors.js';

import {BaseProvider} from './BaseProvider.js';
import type {GenerateOutput} from './BaseProvider.js';

export abstract class VercelAIProvider extends BaseProvider {
  private languageModel?: LanguageModel;

  protected abstract createModel(): LanguageModel;

  protected async generate(prompt: string, signal: AbortSignal): Promise<GenerateOutput> {
    this.languageModel ??= this.createModel();

    const result = await generateText({
      model: this.languageModel,
      prompt,
      temperature: this.config.temperature,
      maxOutputTokens: this.config.maxTokens,
      // Retries are owned by BaseProvider so they share one backoff policy.
      maxRetries: 0,
      abortSignal: signal,
    });

    return {
      text: result.text,
      usage: {
        inputTokens: result.usage?.inputTokens,
        outputTokens: result.usage?.outputTokens,
        totalTokens: result.usage?.totalTokens,
      },
    };
  }
}

export class OpenAIProvider extends VercelAIProvider {
  protected createModel(): LanguageModel {
    return createOpenAI({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
    }).chat(this.model);
  }
}

export class AnthropicProvider extends VercelAIProvider {
  protected createModel(): LanguageModel {
    return createAnthropic({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
    })(this.model);
  }
}

export class OpenRouterProvider extends VercelAIProvider {
  protected createModel(): LanguageModel {
    return createOpenRouter({
      apiKey: this.config.apiKey,
      baseURL: this.config.baseUrl,
    }).chat(this.model);
  }
}

/**
 * Local inference servers speaking the OpenAI chat protocol.
 */
export class OpenAICompatibleProvider extends VercelAIProvider {
  protected createModel(): LanguageModel {
    if (!this.config.baseUrl) {
      throw new ConfigurationError(`${this.id} provider requires baseUrl`, 'baseUrl');
    }
    return createOpenAICompatible({
      name: this.id,
      baseURL: this.config.baseUrl,
      apiKey: this.config.apiKey,
    })(this.model);
  }
}
