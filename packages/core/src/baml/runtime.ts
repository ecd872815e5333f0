/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * BAML runtime over a materialized project
 *
 * Uses BAML's modular API for the two ends of a call:
 * - buildRequest("Extract") renders the prompt with ctx.output_format
 * - parseLlmResponse("Extract") parses the model's text with SAP
 *
 * The HTTP call itself goes through the selected provider adapter, so the
 * client in clients.baml is only used to shape the request.
 */

import {BamlRuntime} from '@boundaryml/baml';
import {z} from 'zod';

import {BAMLCompilationError, ResponseParsingError} from '../errors.js';
import type {CompiledSchema} from '../schema/types.js';

import {FUNCTION_NAME} from './project.js';
import type {BamlProject} from './project.js';

/** The part of the native runtime this module drives. */
export interface NativeRuntime {
  createContextManager(): unknown;
  buildRequest(
    functionName: string,
    args: Record<string, unknown>,
    ctx: unknown,
    tb: undefined,
    cb: undefined,
    stream: boolean,
    env: Record<string, string>,
  ): Promise<NativeRequest>;
  parseLlmResponse(
    functionName: string,
    llmResponse: string,
    allowPartials: boolean,
    ctx: unknown,
    tb: undefined,
    cb: undefined,
    env: Record<string, string>,
  ): unknown;
}

export interface NativeRequest {
  body: {json(): unknown};
}

export interface NativeRuntimeFactory {
  fromFiles(
    rootPath: string,
    files: Record<string, string>,
    envVars: Record<string, string>,
  ): NativeRuntime;
}

const defaultFactory: NativeRuntimeFactory = BamlRuntime;

/** Files the runtime loads; the generator block only matters to the CLI. */
const RUNTIME_FILES = ['schema.baml', 'clients.baml', 'functions.baml'];

// Rendering needs the client's env vars to resolve, never their real values.
const PLACEHOLDER_API_KEY = 'prompt-rendering-only';

const ContentPartSchema = z.object({type: z.string(), text: z.string().optional()});

const RequestBodySchema = z.object({
  messages: z.array(
    z.object({
      role: z.string(),
      content: z.union([z.string(), z.array(ContentPartSchema)]),
    }),
  ),
});

type RequestMessage = z.infer<typeof RequestBodySchema>['messages'][number];

function messageText(content: RequestMessage['content']): string {
  if (typeof content === 'string') return content;
  return content
    .filter((part) => part.type === 'text')
    .map((part) => part.text ?? '')
    .join('\n');
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Extract function of one loaded project.
 */
export interface ExtractRuntime {
  renderPrompt(input: string): Promise<string>;
  /** SAP-parsed value for the root class, not yet validated. */
  parse(text: string): unknown;
}

export interface RuntimeLoader {
  load(project: BamlProject, compiled: CompiledSchema): ExtractRuntime;
}

class LoadedExtractRuntime implements ExtractRuntime {
  private readonly ctx: unknown;

  constructor(
    private readonly runtime: NativeRuntime,
    private readonly env: Record<string, string>,
    private readonly compiled: CompiledSchema,
    private readonly bamlCode: string,
  ) {
    this.ctx = runtime.createContextManager();
  }

  async renderPrompt(input: string): Promise<string> {
    let body: unknown;
    try {
      const request = await this.runtime.buildRequest(
        FUNCTION_NAME,
        {input},
        this.ctx,
        undefined,
        undefined,
        false,
        this.env,
      );
      body = request.body.json();
    } catch (error) {
      throw new BAMLCompilationError(
        `Failed to render ${FUNCTION_NAME} request: ${errorMessage(error)}`,
        errorMessage(error),
        this.bamlCode,
      );
    }

    const parsed = RequestBodySchema.safeParse(body);
    if (!parsed.success) {
      throw new BAMLCompilationError(
        `Unexpected ${FUNCTION_NAME} request shape`,
        parsed.error.message,
        this.bamlCode,
      );
    }

    const parts: string[] = [];
    for (const message of parsed.data.messages) {
      if (message.role === 'system' || message.role === 'user') {
        const text = messageText(message.content);
        if (text) parts.push(text);
      }
    }
    return parts.join('\n\n');
  }

  parse(text: string): unknown {
    try {
      return this.runtime.parseLlmResponse(
        FUNCTION_NAME,
        text,
        false,
        this.ctx,
        undefined,
        undefined,
        this.env,
      );
    } catch (error) {
      const {rootName} = this.compiled;
      throw new ResponseParsingError(
        `Failed to parse response for schema '${rootName}': ${errorMessage(error)}`,
        text,
        '$',
        rootName,
      );
    }
  }
}

/**
 * Loads a project's sources into a BAML runtime.
 */
export class BamlRuntimeLoader implements RuntimeLoader {
  private readonly factory: NativeRuntimeFactory;

  constructor(factory: NativeRuntimeFactory = defaultFactory) {
    this.factory = factory;
  }

  load(project: BamlProject, compiled: CompiledSchema): ExtractRuntime {
    const files: Record<string, string> = {};
    for (const name of RUNTIME_FILES) {
      const contents = project.files[name];
      if (contents !== undefined) files[name] = contents;
    }
    const env: Record<string, string> = project.apiKeyEnv
      ? {[project.apiKeyEnv]: PLACEHOLDER_API_KEY}
      : {};
    const bamlCode = project.files['schema.baml'] ?? compiled.text;

    let runtime: NativeRuntime;
    try {
      runtime = this.factory.fromFiles(project.sourceDir, files, env);
    } catch (error) {
      throw new BAMLCompilationError(
        'BAML runtime rejected the project',
        errorMessage(error),
        bamlCode,
      );
    }
    return new LoadedExtractRuntime(runtime, env, compiled, bamlCode);
  }
}
