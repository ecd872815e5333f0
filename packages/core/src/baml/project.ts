/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * Layout of the throwaway BAML project handed to the compiler:
 *
 *   <workspace>/baml_src/schema.baml      compiled classes and enums
 *   <workspace>/baml_src/functions.baml   Extract(input) -> <Root>
 *   <workspace>/baml_src/clients.baml     client for the selected provider
 *   <workspace>/baml_src/generators.baml  TypeScript generator
 */

import {mkdir, writeFile} from 'node:fs/promises';
import path from 'node:path';

import {ProviderId} from '../providers/types.js';
import type {ProviderConfig} from '../providers/types.js';
import type {CompiledSchema} from '../schema/types.js';

export const BAML_SRC_DIR = 'baml_src';
export const CLIENT_NAME = 'ExtractClient';
export const FUNCTION_NAME = 'Extract';
export const OPENROUTER_BASE_URL = 'https://openrouter.ai/api/v1';

export interface BamlProject {
  workspace: string;
  sourceDir: string;
  /** File name to contents, relative to `sourceDir`. */
  files: Readonly<Record<string, string>>;
  /** Variable the client's `api_key` reads, when it has one. */
  apiKeyEnv?: string;
}

export interface MaterializeOptions {
  config: ProviderConfig;
  /** Version the generator block is pinned to. */
  compilerVersion: string;
}

function quote(value: string | number): string {
  return typeof value === 'number' ? String(value) : JSON.stringify(value);
}

interface ClientShape {
  provider: string;
  apiKeyEnv?: string;
  baseUrl?: string;
}

function clientShape(config: ProviderConfig): ClientShape {
  switch (config.provider) {
    case ProviderId.OPENAI:
      return {provider: 'openai', apiKeyEnv: 'OPENAI_API_KEY', baseUrl: config.baseUrl};
    case ProviderId.ANTHROPIC:
      return {provider: 'anthropic', apiKeyEnv: 'ANTHROPIC_API_KEY', baseUrl: config.baseUrl};
    case ProviderId.OPENROUTER:
      return {
        provider: 'openai-generic',
        apiKeyEnv: 'OPENROUTER_API_KEY',
        baseUrl: config.baseUrl ?? OPENROUTER_BASE_URL,
      };
    case ProviderId.OLLAMA:
    case ProviderId.LMSTUDIO:
      return {provider: 'openai-generic', baseUrl: config.baseUrl};
  }
}

export function renderClients(config: ProviderConfig): string {
  const shape = clientShape(config);
  const options: Array<[string, string]> = [
    ['model', quote(config.model)],
    ['temperature', quote(config.temperature)],
    ['max_tokens', quote(config.maxTokens)],
  ];
  if (shape.apiKeyEnv) options.push(['api_key', `env.${shape.apiKeyEnv}`]);
  if (shape.baseUrl) options.push(['base_url', quote(shape.baseUrl)]);

  const body = options.map(([key, value]) => `    ${key} ${value}`).join('\n');
  return `client<llm> ${CLIENT_NAME} {\n  provider ${shape.provider}\n  options {\n${body}\n  }\n}\n`;
}

export function renderFunctions(compiled: CompiledSchema): string {
  return [
    `function ${FUNCTION_NAME}(input: string) -> ${compiled.rootName} {`,
    `  client ${CLIENT_NAME}`,
    '  prompt #"',
    '    {{ _.role("user") }}',
    '    {{ input }}',
    '',
    '    {{ ctx.output_format }}',
    '  "#',
    '}',
    '',
  ].join('\n');
}

export function renderGenerators(compilerVersion: string): string {
  return [
    'generator target {',
    '  output_type "typescript"',
    '  output_dir "../"',
    `  version ${quote(compilerVersion)}`,
    '  default_client_mode async',
    '}',
    '',
  ].join('\n');
}

/**
 * Write the project sources into `workspace`. Credentials are referenced
 * through `env.*` and never written to disk.
 */
export async function materializeProject(
  workspace: string,
  compiled: CompiledSchema,
  options: MaterializeOptions,
): Promise<BamlProject> {
  const sourceDir = path.join(workspace, BAML_SRC_DIR);
  const files: Record<string, string> = {
    'schema.baml': `${compiled.text}\n`,
    'functions.baml': renderFunctions(compiled),
    'clients.baml': renderClients(options.config),
    'generators.baml': renderGenerators(options.compilerVersion),
  };

  await mkdir(sourceDir, {recursive: true});
  await Promise.all(
    Object.entries(files).map(([name, contents]) =>
      writeFile(path.join(sourceDir, name), contents, 'utf8'),
    ),
  );

  return {
    workspace,
    sourceDir,
    files: Object.freeze(files),
    apiKeyEnv: clientShape(options.config).apiKeyEnv,
  };
}
