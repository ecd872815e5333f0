/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

import {Logger} from '@dynamic-extract/common';
import {APICallError} from 'ai';
import {beforeEach, describe, it, expect, vi} from 'vitest';

import {ConfigurationError, LLMProviderError} from '../errors.js';

import {ProviderId} from './types.js';
import type {ProviderConfig} from './types.js';
import {
  AnthropicProvider,
  OpenAICompatibleProvider,
  OpenAIProvider,
  OpenRouterProvider,
} from './VercelAIProvider.js';

interface FakeGenerateResult {
  text: string;
  usage?: {inputTokens?: number; outputTokens?: number; totalTokens?: number};
}

const mocks = vi.hoisted(() => ({
  generateText: vi.fn<(args: unknown) => Promise<FakeGenerateResult>>(),
}));

vi.mock('ai', async (importOriginal) => ({
  ...(await importOriginal<typeof import('ai')>()),
  generateText: mocks.generateText,
}));

const deps = {logger: new Logger({level: 'off'}), backoff: {baseDelayMs: 0, maxDelayMs: 0}};

function config(overrides: Partial<ProviderConfig> = {}): ProviderConfig {
  return {
    provider: ProviderId.OLLAMA,
    model: 'gemma3:1b',
    baseUrl: 'http://localhost:11434/v1',
    temperature: 0.1,
    maxTokens: 4096,
    timeoutMs: 5000,
    retryCount: 0,
    ...overrides,
  };
}

describe('VercelAIProvider', () => {
  beforeEach(() => {
    mocks.generateText.mockReset();
  });

  it('tests that generateText receives the prompt and sampling settings', async () => {
    mocks.generateText.mockResolvedValueOnce({
      text: '{"name":"John Doe"}',
      usage: {inputTokens: 40, outputTokens: 8, totalTokens: 48},
    });
    const provider = new OpenAICompatibleProvider(config(), deps);

    const result = await provider.invoke('John Doe is 30');

    expect(mocks.generateText).toHaveBeenCalledTimes(1);
    expect(mocks.generateText).toHaveBeenCalledWith(
      expect.objectContaining({
        prompt: 'John Doe is 30',
        temperature: 0.1,
        maxOutputTokens: 4096,
        maxRetries: 0,
        abortSignal: expect.any(AbortSignal),
      }),
    );
    expect(result.text).toBe('{"name":"John Doe"}');
    expect(result.usage).toEqual({inputTokens: 40, outputTokens: 8, totalTokens: 48});
  });

  it('tests that SDK call errors are translated and retried', async () => {
    mocks.generateText
      .mockRejectedValueOnce(
        new APICallError({
          message: 'Too Many Requests',
          url: 'http://localhost:11434/v1/chat/completions',
          requestBodyValues: {},
          statusCode: 429,
        }),
      )
      .mockResolvedValueOnce({text: '{"name":"x"}'});
    const provider = new OpenAICompatibleProvider(config({retryCount: 1}), deps);

    const result = await provider.invoke('x');

    expect(result.attempts).toBe(2);
    expect(mocks.generateText).toHaveBeenCalledTimes(2);
  });

  it('tests that an auth failure surfaces as LLMProviderError with the body', async () => {
    const body = '{"error":{"message":"invalid x-api-key","type":"authentication_error"}}';
    mocks.generateText.mockRejectedValueOnce(
      new APICallError({
        message: 'Unauthorized',
        url: 'https://api.anthropic.com/v1/messages',
        requestBodyValues: {},
        statusCode: 401,
        responseBody: body,
      }),
    );
    const provider = new AnthropicProvider(
      config({provider: ProviderId.ANTHROPIC, model: 'claude-3-5-sonnet-20241022', apiKey: 'test-secret', baseUrl: undefined}),
      deps,
    );

    const error = await provider.invoke('x').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(LLMProviderError);
    if (!(error instanceof LLMProviderError)) return;
    expect(error.message).toBe('anthropic API error 401: invalid x-api-key');
    expect(error.responseBody).toBe(body);
    expect(error.provider).toBe('anthropic');
  });

  it('tests that every hosted adapter builds its model without a network call', async () => {
    mocks.generateText.mockResolvedValue({text: '{"name":"x"}'});
    const hosted = [
      new OpenAIProvider(config({provider: ProviderId.OPENAI, model: 'gpt-4o', apiKey: 'test-secret', baseUrl: undefined}), deps),
      new OpenRouterProvider(
        config({provider: ProviderId.OPENROUTER, model: 'google/gemini-2.0-flash-exp', apiKey: 'test-secret', baseUrl: undefined}),
        deps,
      ),
    ];

    for (const provider of hosted) {
      await expect(provider.invoke('x')).resolves.toMatchObject({text: '{"name":"x"}'});
    }
    expect(mocks.generateText).toHaveBeenCalledTimes(2);
  });

  it('tests that a local adapter without a base URL fails', async () => {
    const provider = new OpenAICompatibleProvider(
      config({provider: ProviderId.LMSTUDIO, baseUrl: undefined}),
      deps,
    );

    const error = await provider.invoke('x').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConfigurationError);
    expect(error instanceof ConfigurationError && error.configKey).toBe('baseUrl');
    expect(mocks.generateText).not.toHaveBeenCalled();
  });
});
