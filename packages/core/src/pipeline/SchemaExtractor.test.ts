/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

import {Logger} from '@dynamic-extract/common';
import {afterEach, beforeEach, describe, it, expect, vi} from 'vitest';

import type {CompileOptions, CompileOutcome, SchemaCompiler} from '../baml/compiler.js';
import type {BamlProject} from '../baml/project.js';
import {BamlRuntimeLoader} from '../baml/runtime.js';
import type {NativeRequest, NativeRuntime, NativeRuntimeFactory} from '../baml/runtime.js';
import {
  BAMLCompilationError,
  CancellationError,
  ConfigurationError,
  LLMProviderError,
  ResponseParsingError,
  TimeoutError,
} from '../errors.js';
import {ProviderRegistry} from '../providers/registry.js';
import {ProviderId} from '../providers/types.js';
import type {
  InvokeOptions,
  Provider,
  ProviderConfig,
  ProviderDependencies,
  RawResult,
} from '../providers/types.js';
import {LLMProviderFactory} from '../providers/ProviderFactory.js';

import {SchemaExtractor} from './SchemaExtractor.js';

type Scripted = string | Error | ((prompt: string, options: InvokeOptions) => Promise<string>);

const responses: Scripted[] = [];
const prompts: string[] = [];

class ScriptedProvider implements Provider {
  readonly id: ProviderId;
  readonly model: string;
  readonly config: Readonly<ProviderConfig>;

  constructor(config: ProviderConfig, _deps: ProviderDependencies) {
    this.id = config.provider;
    this.model = config.model;
    this.config = config;
  }

  async invoke(prompt: string, options: InvokeOptions = {}): Promise<RawResult> {
    prompts.push(prompt);
    const next = responses.shift();
    if (next === undefined) throw new Error('no scripted response');
    if (next instanceof Error) throw next;
    const text = typeof next === 'string' ? next : await next(prompt, options);
    return {text, provider: this.id, model: this.model, attempts: 1, durationMs: 1};
  }
}

class RecordingCompiler implements SchemaCompiler {
  readonly projects: BamlProject[] = [];
  readonly filesOnDisk: string[][] = [];
  failWith?: Error;
  onCompile?: (options: CompileOptions) => Promise<void>;

  async resolveVersion(): Promise<string> {
    return '0.89.0';
  }

  async compile(project: BamlProject, options: CompileOptions = {}): Promise<CompileOutcome> {
    this.projects.push(project);
    this.filesOnDisk.push(fs.readdirSync(project.sourceDir).sort());
    if (this.failWith) throw this.failWith;
    await this.onCompile?.(options);
    return {diagnostics: '', durationMs: 1};
  }
}

const OUTPUT_FORMAT = 'Answer in JSON using this schema';

// Renders `input` plus a fixed format line; parses the outermost braces.
class FakeNativeRuntime implements NativeRuntime {
  createContextManager(): unknown {
    return {};
  }

  async buildRequest(
    _functionName: string,
    args: Record<string, unknown>,
  ): Promise<NativeRequest> {
    const text = `${String(args.input)}\n\n${OUTPUT_FORMAT}`;
    return {body: {json: () => ({messages: [{role: 'user', content: [{type: 'text', text}]}]})}};
  }

  parseLlmResponse(_functionName: string, llmResponse: string): unknown {
    const start = llmResponse.indexOf('{');
    const end = llmResponse.lastIndexOf('}');
    if (start < 0 || end < start) throw new Error('no JSON object in response');
    return JSON.parse(llmResponse.slice(start, end + 1));
  }
}

class FakeRuntimeFactory implements NativeRuntimeFactory {
  readonly loaded: Array<{rootPath: string; files: string[]}> = [];

  fromFiles(rootPath: string, files: Record<string, string>): NativeRuntime {
    this.loaded.push({rootPath, files: Object.keys(files).sort()});
    return new FakeNativeRuntime();
  }
}

function rendered(prompt: string): string {
  return `${prompt}\n\n${OUTPUT_FORMAT}`;
}

const registry = new ProviderRegistry([
  {
    id: ProviderId.OLLAMA,
    description: 'Scripted local provider',
    providerClass: ScriptedProvider,
    defaultModel: 'gemma3:1b',
    defaultBaseUrl: 'http://localhost:11434/v1',
    requiresApiKey: false,
  },
  {
    id: ProviderId.OPENAI,
    description: 'Scripted hosted provider',
    providerClass: ScriptedProvider,
    defaultModel: 'gpt-4o',
    apiKeyEnv: 'OPENAI_API_KEY',
    requiresApiKey: true,
  },
]);

describe('SchemaExtractor', () => {
  const logger = new Logger({level: 'off'});
  let compiler: RecordingCompiler;
  let runtimes: FakeRuntimeFactory;
  let extractor: SchemaExtractor;

  beforeEach(() => {
    responses.length = 0;
    prompts.length = 0;
    compiler = new RecordingCompiler();
    runtimes = new FakeRuntimeFactory();
    extractor = new SchemaExtractor({
      factory: new LLMProviderFactory(registry, {logger, env: {}}),
      compiler,
      runtimeLoader: new BamlRuntimeLoader(runtimes),
      logger,
    });
  });

  function workspacesLeft(): string[] {
    return compiler.projects.map((p) => p.workspace).filter((w) => fs.existsSync(w));
  }

  describe('run', () => {
    it('tests that a conforming response is returned as data', async () => {
      responses.push('{"name":"John Doe","age":30}');

      const data = await extractor.run('John Doe is 30', {name: 'string', age: 'int'}, {
        provider: 'ollama',
      });

      expect(data).toEqual({name: 'John Doe', age: 30});
      expect(prompts).toEqual([rendered('John Doe is 30')]);
      expect(workspacesLeft()).toEqual([]);
    });

    it('tests that an illegal enum value raises ResponseParsingError', async () => {
      responses.push('{"status":"archived"}');

      const error = await extractor
        .run('Status is archived', {status: {type: 'enum', values: ['draft', 'published']}}, {
          provider: 'ollama',
        })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ResponseParsingError);
      expect(error instanceof ResponseParsingError && error.rawResponse).toBe(
        '{"status":"archived"}',
      );
      expect(workspacesLeft()).toEqual([]);
    });

    it('tests that a missing optional field becomes null', async () => {
      responses.push('{}');

      await expect(
        extractor.run('No email here', {email: {type: 'string', optional: true}}, {
          provider: 'ollama',
        }),
      ).resolves.toEqual({email: null});
    });

    it('tests that an unknown provider fails before any invocation', async () => {
      responses.push('{"name":"x"}');

      const error = await extractor
        .run('x', {name: 'string'}, {provider: 'unknown-x'})
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError && error.configKey).toBe('provider');
      expect(prompts).toEqual([]);
      expect(compiler.projects).toEqual([]);
    });

    it('tests that the default options select the local provider', async () => {
      responses.push('{"name":"x"}');

      await extractor.run('x', {name: 'string'});

      expect(compiler.projects[0].files['clients.baml']).toContain('    model "gemma3:1b"\n');
    });

    it('tests that the project is on disk while the compiler runs', async () => {
      responses.push('{"name":"x"}');

      await extractor.run('x', {name: 'string'}, {provider: 'ollama'}, {schemaName: 'Person'});

      expect(compiler.filesOnDisk).toEqual([
        ['clients.baml', 'functions.baml', 'generators.baml', 'schema.baml'],
      ]);
      const [project] = compiler.projects;
      expect(project.files['functions.baml']).toContain('function Extract(input: string) -> Person {');
      expect(project.files['generators.baml']).toContain('  version "0.89.0"\n');
      expect(workspacesLeft()).toEqual([]);
    });

    it('tests that the runtime loads the compiled project sources', async () => {
      responses.push('{"name":"x"}');

      await extractor.run('x', {name: 'string'}, {provider: 'ollama'});

      expect(runtimes.loaded).toEqual([
        {
          rootPath: compiler.projects[0].sourceDir,
          files: ['clients.baml', 'functions.baml', 'schema.baml'],
        },
      ]);
    });

    it('tests that concurrent runs use separate workspaces and keep their own results', async () => {
      let release = (): void => {};
      const bothCompiling = new Promise<void>((resolve) => {
        release = resolve;
      });
      compiler.onCompile = async () => {
        if (compiler.projects.length === 2) release();
        await bothCompiling;
      };
      const echo = async (prompt: string): Promise<string> =>
        JSON.stringify({name: prompt.split(' ')[0]});
      responses.push(echo, echo);

      const [ada, kim] = await Promise.all([
        extractor.run('Ada is 36', {name: 'string'}, {provider: 'ollama'}),
        extractor.run('Kim is 41', {name: 'string'}, {provider: 'ollama'}),
      ]);

      expect(ada).toEqual({name: 'Ada'});
      expect(kim).toEqual({name: 'Kim'});
      const [first, second] = compiler.projects;
      expect(first.workspace).not.toBe(second.workspace);
      expect(workspacesLeft()).toEqual([]);
    });

    it('tests that an abort during compilation cancels the run and removes the workspace', async () => {
      const controller = new AbortController();
      compiler.onCompile = async (options) => {
        controller.abort();
        if (options.signal?.aborted) throw new CancellationError();
      };
      responses.push('{"name":"x"}');

      await expect(
        extractor.run('x', {name: 'string'}, {provider: 'ollama'}, {signal: controller.signal}),
      ).rejects.toBeInstanceOf(CancellationError);
      expect(compiler.projects).toHaveLength(1);
      expect(prompts).toEqual([]);
      expect(workspacesLeft()).toEqual([]);
    });

    it('tests that a compiler failure stops before the provider is called', async () => {
      compiler.failWith = new BAMLCompilationError('BAML generation failed with exit code 1', 'boom');
      responses.push('{"name":"x"}');

      await expect(
        extractor.run('x', {name: 'string'}, {provider: 'ollama'}),
      ).rejects.toBeInstanceOf(BAMLCompilationError);
      expect(prompts).toEqual([]);
      expect(workspacesLeft()).toEqual([]);
    });

    it('tests that a caller abort during the provider call cancels the run', async () => {
      const controller = new AbortController();
      responses.push(async () => {
        controller.abort();
        throw new CancellationError();
      });

      await expect(
        extractor.run('x', {name: 'string'}, {provider: 'ollama'}, {signal: controller.signal}),
      ).rejects.toBeInstanceOf(CancellationError);
      expect(workspacesLeft()).toEqual([]);
    });

    it('tests that the invocation signal reaches the provider', async () => {
      const controller = new AbortController();
      let received: AbortSignal | undefined;
      responses.push(async (_prompt, options) => {
        received = options.signal;
        return '{"name":"x"}';
      });

      await extractor.run('x', {name: 'string'}, {provider: 'ollama'}, {signal: controller.signal});

      expect(received).toBe(controller.signal);
    });
  });

  describe('runSafe', () => {
    it('tests that success is wrapped in the envelope', async () => {
      responses.push('```json\n{"name":"Ada"}\n```');

      await expect(
        extractor.runSafe('Ada', {name: 'string'}, {provider: 'ollama'}),
      ).resolves.toEqual({success: true, data: {name: 'Ada'}});
    });

    it('tests that a malformed schema maps to schema_generation', async () => {
      await expect(extractor.runSafe('x', {id: 'uuid'}, {provider: 'ollama'})).resolves.toEqual({
        success: false,
        error: "Unknown type 'uuid'",
        errorType: 'schema_generation',
      });
    });

    it('tests that a missing credential maps to configuration', async () => {
      const result = await extractor.runSafe('x', {name: 'string'}, {provider: 'openai'});

      expect(result.success).toBe(false);
      expect(result.errorType).toBe('configuration');
    });

    it('tests that provider and timeout failures keep their kinds', async () => {
      responses.push(
        new LLMProviderError('ollama connection error: fetch failed', 'ollama', {retryable: true}),
        new TimeoutError('ollama request timed out after 50ms (limit 50ms)', 50, 50),
      );

      const first = await extractor.runSafe('x', {name: 'string'}, {provider: 'ollama'});
      const second = await extractor.runSafe('x', {name: 'string'}, {provider: 'ollama'});

      expect(first).toEqual({
        success: false,
        error: 'ollama connection error: fetch failed',
        errorType: 'llm_provider',
      });
      expect(second.errorType).toBe('timeout');
      expect(workspacesLeft()).toEqual([]);
    });

    it('tests that a malformed payload maps to response_parsing', async () => {
      responses.push('I could not find anything.');

      const result = await extractor.runSafe('x', {name: 'string'}, {provider: 'ollama'});

      expect(result).toEqual({
        success: false,
        error: "Failed to parse response for schema 'ExtractedData': no JSON object in response",
        errorType: 'response_parsing',
      });
    });

    it('tests that compiler failures map to baml_compilation', async () => {
      compiler.failWith = new BAMLCompilationError('BAML generation failed with exit code 1', 'x');

      const result = await extractor.runSafe('x', {name: 'string'}, {provider: 'ollama'});

      expect(result.errorType).toBe('baml_compilation');
    });

    it('tests that foreign errors are wrapped as unknown', async () => {
      responses.push(new RangeError('bad offset'));

      await expect(
        extractor.runSafe('x', {name: 'string'}, {provider: 'ollama'}),
      ).resolves.toEqual({success: false, error: 'Unexpected error: bad offset', errorType: 'unknown'});
    });

    it('tests that an already aborted signal maps to cancelled', async () => {
      const result = await extractor.runSafe(
        'x',
        {name: 'string'},
        {provider: 'ollama'},
        {signal: AbortSignal.abort()},
      );

      expect(result).toEqual({
        success: false,
        error: 'Extraction was cancelled',
        errorType: 'cancelled',
      });
      expect(compiler.projects).toEqual([]);
    });

    it('tests that null options fall back to the defaults', async () => {
      responses.push('{"name":"x"}');

      await expect(extractor.runSafe('x', {name: 'string'}, null)).resolves.toEqual({
        success: true,
        data: {name: 'x'},
      });
      expect(compiler.projects[0].files['clients.baml']).toContain('    model "gemma3:1b"\n');
    });

    it('tests that invalid option values never throw', async () => {
      const result = await extractor.runSafe('x', {name: 'string'}, {
        provider: 'ollama',
        retryCount: -1,
      });

      expect(result.errorType).toBe('configuration');
    });
  });

  describe('execute', () => {
    it('tests that the result type carries the typed error', async () => {
      const result = await extractor.execute('x', {name: 'string'}, {provider: 'unknown-x'});

      expect(result.ok).toBe(false);
      if (result.ok) return;
      expect(result.error).toBeInstanceOf(ConfigurationError);
    });
  });

  describe('logging', () => {
    let tempDir: string;

    beforeEach(() => {
      tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'dynamic-extract-pipeline-log-'));
    });

    afterEach(() => {
      fs.rmSync(tempDir, {recursive: true, force: true});
    });

    it('tests that step durations and the outcome go to logPath', async () => {
      const logPath = path.join(tempDir, 'run.log');
      responses.push('{"name":"x"}');

      await extractor.run('x', {name: 'string'}, {
        provider: 'ollama',
        logLevel: 'debug',
        logPath,
      });

      const lines = fs.readFileSync(logPath, 'utf8').trim().split('\n');
      const messages = lines.map((line) => line.replace(/^\[[^\]]+\] \[[A-Z]+\] /, '').replace(/ \{.*\}$/, ''));
      expect(messages).toEqual(
        expect.arrayContaining([
          "Step 'compile schema' done",
          "Step 'create provider' done",
          "Step 'compile project' done",
          "Step 'load runtime' done",
          "Step 'render prompt' done",
          "Step 'invoke provider' done",
          "Step 'parse response' done",
          "Step 'validate response' done",
          'Extraction succeeded',
        ]),
      );
      expect(lines.at(-1)).toMatch(/^\[[^\]]+\] \[INFO\] Extraction succeeded \{"runId":"[0-9a-f]{8}","durationMs":\d+\}$/);
    });

    it('tests that nothing is logged when logLevel is off', async () => {
      const logPath = path.join(tempDir, 'quiet.log');
      responses.push('{"name":"x"}');

      await extractor.run('x', {name: 'string'}, {provider: 'ollama', logLevel: 'off', logPath});

      expect(fs.existsSync(logPath)).toBe(false);
    });

    it('tests that an unwritable logPath does not fail the run', async () => {
      const consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
      responses.push('{"name":"x"}');

      const result = await extractor.runSafe('x', {name: 'string'}, {
        provider: 'ollama',
        logLevel: 'info',
        logPath: tempDir,
      });

      expect(result).toEqual({success: true, data: {name: 'x'}});
      expect(consoleErrorSpy).toHaveBeenCalledTimes(1);
    });
  });
});
