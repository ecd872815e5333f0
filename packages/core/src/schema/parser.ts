/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

import {ResponseParsingError} from '../errors.js';

import {CoercionError, coerceValue, isPlainObject} from './coerce.js';
import type {CompiledSchema, ExtractedData} from './types.js';

function stringifyPayload(payload: unknown): string {
  if (typeof payload === 'string') return payload;
  try {
    return JSON.stringify(payload) ?? String(payload);
  } catch {
    return String(payload);
  }
}

function decode(payload: unknown): unknown {
  if (typeof payload !== 'string') return payload;
  try {
    return JSON.parse(payload);
  } catch {
    return undefined;
  }
}

/**
 * Validate a payload against the compiled schema's root class and return it
 * with values coerced to the declared types.
 *
 * `payload` is either a value already parsed by the BAML runtime, or JSON
 * text. `rawResponse` is the model output kept on errors; it defaults to the
 * payload itself.
 */
export function parseResponse(
  payload: unknown,
  compiled: CompiledSchema,
  rawResponse = stringifyPayload(payload),
): ExtractedData {
  const data = decode(payload);

  if (!isPlainObject(data)) {
    throw new ResponseParsingError(
      `Response does not contain a JSON object for ${compiled.rootName}`,
      rawResponse,
      '$',
      compiled.rootName,
    );
  }

  try {
    const result = coerceValue(compiled.root, data, '$');
    if (!isPlainObject(result)) {
      throw new CoercionError(`Expected object ${compiled.rootName}`, '$');
    }
    return result;
  } catch (error) {
    if (error instanceof CoercionError) {
      throw new ResponseParsingError(
        `Failed to parse response for schema '${compiled.rootName}': ${error.message}`,
        rawResponse,
        error.path,
        compiled.rootName,
      );
    }
    throw error;
  }
}
