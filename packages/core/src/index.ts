/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

export {
  callWithFallback,
  callWithSchema,
  callWithSchemaSafe,
  getDefaultExtractor,
} from './api.js';

export {
  BAMLCompilationError,
  CancellationError,
  ConfigurationError,
  DynamicExtractError,
  LLMProviderError,
  ResponseParsingError,
  SchemaGenerationError,
  TimeoutError,
} from './errors.js';
export type {ErrorContext, ErrorType} from './errors.js';

export {SchemaExtractor} from './pipeline/SchemaExtractor.js';
export type {
  CallResult,
  Result,
  RunOptions,
  SchemaExtractorDeps,
} from './pipeline/SchemaExtractor.js';

export {
  DEFAULT_MAX_DEPTH,
  DEFAULT_SCHEMA_NAME,
  DictToBAMLGenerator,
  generateSchema,
} from './schema/generator.js';
export type {GeneratorOptions} from './schema/generator.js';
export {parseResponse} from './schema/parser.js';
export type {
  ArrayType,
  CompiledSchema,
  EnumType,
  EnumValue,
  ExtractedData,
  FieldDescriptor,
  ObjectType,
  OptionalType,
  PrimitiveKind,
  PrimitiveType,
  SchemaDict,
  SchemaFieldSpec,
  TypeDescriptor,
} from './schema/types.js';

export {BaseProvider} from './providers/BaseProvider.js';
export type {GenerateOutput} from './providers/BaseProvider.js';
export {LLMProviderFactory} from './providers/ProviderFactory.js';
export type {ProviderFactorySettings} from './providers/ProviderFactory.js';
export {createDefaultRegistry, ProviderRegistry} from './providers/registry.js';
export type {ProviderConstructor, ProviderRegistration} from './providers/registry.js';
export {
  DEFAULT_PROVIDER_OPTIONS,
  ProviderId,
  ProviderOptionsSchema,
} from './providers/types.js';
export type {
  InvokeOptions,
  Provider,
  ProviderConfig,
  ProviderOptions,
  RawResult,
  TokenUsage,
} from './providers/types.js';
export {
  AnthropicProvider,
  OpenAICompatibleProvider,
  OpenAIProvider,
  OpenRouterProvider,
  VercelAIProvider,
} from './providers/VercelAIProvider.js';

export {BamlCliCompiler} from './baml/compiler.js';
export type {CompileOptions, CompileOutcome, SchemaCompiler} from './baml/compiler.js';
export {materializeProject} from './baml/project.js';
export {BamlRuntimeLoader} from './baml/runtime.js';
export type {
  ExtractRuntime,
  NativeRuntime,
  NativeRuntimeFactory,
  RuntimeLoader,
} from './baml/runtime.js';
export type {BamlProject} from './baml/project.js';
export {withWorkspace} from './baml/workspace.js';
