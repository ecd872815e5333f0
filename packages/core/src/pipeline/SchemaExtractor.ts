/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

import {randomUUID} from 'node:crypto';

import {isLogLevel, logger as defaultLogger} from '@dynamic-extract/common';
import type {Logger, LogLevel} from '@dynamic-extract/common';

import {BamlCliCompiler} from '../baml/compiler.js';
import type {SchemaCompiler} from '../baml/compiler.js';
import {materializeProject} from '../baml/project.js';
import {BamlRuntimeLoader} from '../baml/runtime.js';
import type {RuntimeLoader} from '../baml/runtime.js';
import {withWorkspace} from '../baml/workspace.js';
import {CancellationError, DynamicExtractError} from '../errors.js';
import type {ErrorType} from '../errors.js';
import {LLMProviderFactory} from '../providers/ProviderFactory.js';
import {createDefaultRegistry} from '../providers/registry.js';
import type {ProviderRegistry} from '../providers/registry.js';
import {DEFAULT_PROVIDER_OPTIONS} from '../providers/types.js';
import type {ProviderOptions} from '../providers/types.js';
import {DEFAULT_SCHEMA_NAME, generateSchema} from '../schema/generator.js';
import {parseResponse} from '../schema/parser.js';
import type {ExtractedData, SchemaDict} from '../schema/types.js';

export type Result<T, E> = {ok: true; value: T} | {ok: false; error: E};

/**
 * Envelope returned by the non-throwing entry points.
 */
export interface CallResult {
  success: boolean;
  data?: ExtractedData;
  error?: string;
  errorType?: ErrorType;
}

export interface RunOptions {
  signal?: AbortSignal;
  /** Root class name; `ExtractedData` by default. */
  schemaName?: string;
}

export interface SchemaExtractorDeps {
  registry?: ProviderRegistry;
  factory?: LLMProviderFactory;
  compiler?: SchemaCompiler;
  runtimeLoader?: RuntimeLoader;
  logger?: Logger;
}

function logOptions(options: ProviderOptions | null): {level?: LogLevel; filePath?: string} {
  if (!options) return {};
  // Read before validation so configuration failures are logged too.
  return {
    level: isLogLevel(options.logLevel) ? options.logLevel : undefined,
    filePath: typeof options.logPath === 'string' && options.logPath ? options.logPath : undefined,
  };
}

/**
 * One extraction per call:
 * compile schema -> create provider -> (workspace: materialize -> build ->
 * load runtime -> render prompt -> invoke -> parse -> validate) -> workspace
 * removed.
 *
 * Calls share nothing mutable, so one instance serves concurrent callers.
 */
export class SchemaExtractor {
  private readonly factory: LLMProviderFactory;
  private readonly compiler: SchemaCompiler;
  private readonly runtimeLoader: RuntimeLoader;
  private readonly logger: Logger;

  constructor(deps: SchemaExtractorDeps = {}) {
    this.logger = deps.logger ?? defaultLogger;
    this.factory =
      deps.factory ??
      new LLMProviderFactory(deps.registry ?? createDefaultRegistry(), {logger: this.logger});
    this.compiler = deps.compiler ?? new BamlCliCompiler({logger: this.logger});
    this.runtimeLoader = deps.runtimeLoader ?? new BamlRuntimeLoader();
  }

  getAvailableProviders(): Set<string> {
    return this.factory.getAvailableProviders();
  }

  /**
   * @throws the first unrecovered DynamicExtractError
   */
  async run(
    prompt: string,
    schema: SchemaDict,
    options?: ProviderOptions | null,
    runOptions?: RunOptions,
  ): Promise<ExtractedData> {
    const result = await this.execute(prompt, schema, options, runOptions);
    if (!result.ok) throw result.error;
    return result.value;
  }

  /**
   * Never rejects.
   */
  async runSafe(
    prompt: string,
    schema: SchemaDict,
    options?: ProviderOptions | null,
    runOptions?: RunOptions,
  ): Promise<CallResult> {
    const result = await this.execute(prompt, schema, options, runOptions);
    if (result.ok) return {success: true, data: result.value};
    return {
      success: false,
      error: result.error.message,
      errorType: result.error.errorType,
    };
  }

  async execute(
    prompt: string,
    schema: SchemaDict,
    options?: ProviderOptions | null,
    runOptions: RunOptions = {},
  ): Promise<Result<ExtractedData, DynamicExtractError>> {
    const startTime = performance.now();
    let logger = this.logger;

    try {
      const resolved = options ?? DEFAULT_PROVIDER_OPTIONS;
      logger = this.logger.child({
        ...logOptions(resolved),
        bindings: {runId: randomUUID().slice(0, 8)},
      });
      const data = await this.extract(prompt, schema, resolved, runOptions, logger);
      logger.info('Extraction succeeded', {
        durationMs: Math.round(performance.now() - startTime),
      });
      return {ok: true, value: data};
    } catch (error) {
      const failure = DynamicExtractError.from(error);
      logger.error('Extraction failed', {
        errorType: failure.errorType,
        error: failure.message,
        durationMs: Math.round(performance.now() - startTime),
      });
      return {ok: false, error: failure};
    }
  }

  private async extract(
    prompt: string,
    schema: SchemaDict,
    options: ProviderOptions,
    runOptions: RunOptions,
    logger: Logger,
  ): Promise<ExtractedData> {
    const {signal} = runOptions;
    const checkAborted = (): void => {
      if (signal?.aborted) throw new CancellationError();
    };

    checkAborted();
    const compiled = step(logger, 'compile schema', () =>
      generateSchema(schema, runOptions.schemaName ?? DEFAULT_SCHEMA_NAME),
    );
    const provider = step(logger, 'create provider', () =>
      this.factory.createProvider(options, logger),
    );

    return withWorkspace(
      async (workspace) => {
        checkAborted();
        const compileOptions = {
          timeoutMs: provider.config.timeoutMs,
          signal,
          logger,
        };
        const compilerVersion = await this.compiler.resolveVersion(compileOptions);
        const project = await materializeProject(workspace, compiled, {
          config: provider.config,
          compilerVersion,
        });
        await stepAsync(logger, 'compile project', () =>
          this.compiler.compile(project, compileOptions),
        );

        const runtime = step(logger, 'load runtime', () =>
          this.runtimeLoader.load(project, compiled),
        );
        const rendered = await stepAsync(logger, 'render prompt', () =>
          runtime.renderPrompt(prompt),
        );

        checkAborted();
        const raw = await stepAsync(logger, 'invoke provider', () =>
          provider.invoke(rendered, {signal, logger}),
        );
        logger.trace('Raw response', {text: raw.text});

        const parsed = step(logger, 'parse response', () => runtime.parse(raw.text));
        return step(logger, 'validate response', () =>
          parseResponse(parsed, compiled, raw.text),
        );
      },
      {logger},
    );
  }
}

function step<T>(logger: Logger, name: string, fn: () => T): T {
  const startTime = performance.now();
  const value = fn();
  logger.debug(`Step '${name}' done`, {durationMs: Math.round(performance.now() - startTime)});
  return value;
}

async function stepAsync<T>(logger: Logger, name: string, fn: () => Promise<T>): Promise<T> {
  const startTime = performance.now();
  const value = await fn();
  logger.debug(`Step '${name}' done`, {durationMs: Math.round(performance.now() - startTime)});
  return value;
}
