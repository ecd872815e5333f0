/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

import {SchemaExtractor} from './pipeline/SchemaExtractor.js';
import type {CallResult, RunOptions} from './pipeline/SchemaExtractor.js';
import type {ProviderOptions} from './providers/types.js';
import type {ExtractedData, SchemaDict} from './schema/types.js';

let defaultExtractor: SchemaExtractor | null = null;

/**
 * Shared extractor over the default provider registry, built on first use.
 */
export function getDefaultExtractor(): SchemaExtractor {
  defaultExtractor ??= new SchemaExtractor();
  return defaultExtractor;
}

/**
 * Extract data shaped like `schema` from `prompt`.
 *
 * @example
 * ```typescript
 * const person = await callWithSchema('John Doe is 30', {name: 'string', age: 'int'}, {
 *   provider: 'openai',
 *   model: 'gpt-4o-mini',
 * })
 * // {name: 'John Doe', age: 30}
 * ```
 */
export function callWithSchema(
  prompt: string,
  schema: SchemaDict,
  options?: ProviderOptions | null,
  runOptions?: RunOptions,
): Promise<ExtractedData> {
  return getDefaultExtractor().run(prompt, schema, options, runOptions);
}

export function callWithSchemaSafe(
  prompt: string,
  schema: SchemaDict,
  options?: ProviderOptions | null,
  runOptions?: RunOptions,
): Promise<CallResult> {
  return getDefaultExtractor().runSafe(prompt, schema, options, runOptions);
}

/**
 * Try each option set in order and return the first success, or the last
 * failure envelope when every provider fails.
 */
export async function callWithFallback(
  prompt: string,
  schema: SchemaDict,
  optionsList: readonly ProviderOptions[],
  runOptions?: RunOptions,
  extractor: SchemaExtractor = getDefaultExtractor(),
): Promise<CallResult> {
  let last: CallResult = {
    success: false,
    error: 'No provider options given',
    errorType: 'configuration',
  };
  for (const options of optionsList) {
    last = await extractor.runSafe(prompt, schema, options, runOptions);
    // Cancellation ends the chain; other failures move on to the next provider.
    if (last.success || last.errorType === 'cancelled') return last;
  }
  return last;
}
