/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

import type {
  EnumType,
  FieldDescriptor,
  ObjectType,
  PrimitiveKind,
  TypeDescriptor,
} from './types.js';

/**
 * Raised while walking a value against a descriptor. Callers turn it into the
 * error kind of their own step.
 */
export class CoercionError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(`${message} at ${path}`);
    this.name = 'CoercionError';
  }
}

const INTEGER_LITERAL = /^[+-]?\d+$/;
const NUMBER_LITERAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  return typeof value;
}

function coercePrimitive(kind: PrimitiveKind, value: unknown, path: string): unknown {
  switch (kind) {
    case 'string':
      if (typeof value === 'string') return value;
      if (typeof value === 'number' || typeof value === 'boolean') {
        return String(value);
      }
      break;
    case 'int':
      if (typeof value === 'number' && Number.isInteger(value)) return value;
      if (typeof value === 'string' && INTEGER_LITERAL.test(value.trim())) {
        return Number.parseInt(value.trim(), 10);
      }
      break;
    case 'float':
      if (typeof value === 'number' && Number.isFinite(value)) return value;
      if (typeof value === 'string' && NUMBER_LITERAL.test(value.trim())) {
        return Number.parseFloat(value.trim());
      }
      break;
    case 'bool':
      if (typeof value === 'boolean') return value;
      if (typeof value === 'string') {
        const lowered = value.trim().toLowerCase();
        if (lowered === 'true') return true;
        if (lowered === 'false') return false;
      }
      break;
  }
  throw new CoercionError(
    `Expected ${kind} but got ${describeValue(value)} ${JSON.stringify(value)}`,
    path,
  );
}

function coerceEnum(type: EnumType, value: unknown, path: string): string {
  if (typeof value !== 'string') {
    throw new CoercionError(
      `Expected one of ${type.name} values but got ${describeValue(value)}`,
      path,
    );
  }
  const exact = type.values.find((v) => v.value === value);
  if (exact) return exact.value;

  const lowered = value.trim().toLowerCase();
  const loose = type.values.find(
    (v) =>
      v.value.toLowerCase() === lowered || v.identifier.toLowerCase() === lowered,
  );
  if (loose) return loose.value;

  const allowed = type.values.map((v) => JSON.stringify(v.value)).join(', ');
  throw new CoercionError(
    `Illegal value ${JSON.stringify(value)} for enum ${type.name} (allowed: ${allowed})`,
    path,
  );
}

/**
 * Field value by caller key, or by BAML identifier as the runtime returns it.
 * Inherited properties never count.
 */
function ownField(value: Record<string, unknown>, field: FieldDescriptor): unknown {
  if (Object.hasOwn(value, field.name)) return value[field.name];
  if (Object.hasOwn(value, field.identifier)) return value[field.identifier];
  return undefined;
}

function coerceObject(
  type: ObjectType,
  value: unknown,
  path: string,
): Record<string, unknown> {
  if (!isPlainObject(value)) {
    throw new CoercionError(
      `Expected object ${type.name} but got ${describeValue(value)}`,
      path,
    );
  }

  const result: Record<string, unknown> = {};
  for (const field of type.fields) {
    const fieldPath = `${path}.${field.name}`;
    const raw = ownField(value, field);

    if (raw === undefined || raw === null) {
      if (field.type.kind !== 'optional') {
        throw new CoercionError(`Missing required field '${field.name}'`, fieldPath);
      }
      result[field.name] = field.defaultValue ?? null;
      continue;
    }

    result[field.name] = coerceValue(field.type, raw, fieldPath);
  }
  return result;
}

/**
 * Check a value against a descriptor and return it in the requested shape.
 */
export function coerceValue(type: TypeDescriptor, value: unknown, path = '$'): unknown {
  switch (type.kind) {
    case 'primitive':
      return coercePrimitive(type.type, value, path);
    case 'enum':
      return coerceEnum(type, value, path);
    case 'object':
      return coerceObject(type, value, path);
    case 'array':
      if (!Array.isArray(value)) {
        throw new CoercionError(`Expected array but got ${describeValue(value)}`, path);
      }
      return value.map((item: unknown, index) =>
        coerceValue(type.element, item, `${path}[${index}]`),
      );
    case 'optional':
      return value === null || value === undefined
        ? null
        : coerceValue(type.inner, value, path);
  }
}
