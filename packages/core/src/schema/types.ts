/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * Type descriptor model shared by the generator, the prompt renderer and
 * the response parser.
 */

export type PrimitiveKind = 'string' | 'int' | 'float' | 'bool';

export interface PrimitiveType {
  readonly kind: 'primitive';
  readonly type: PrimitiveKind;
}

export interface EnumValue {
  /** Value as declared by the caller and as returned to the caller. */
  readonly value: string;
  /** Identifier emitted into the BAML enum. */
  readonly identifier: string;
}

export interface EnumType {
  readonly kind: 'enum';
  readonly name: string;
  readonly values: readonly EnumValue[];
}

export interface FieldDescriptor {
  /** Key in the schema description and in the extracted payload. */
  readonly name: string;
  /** Identifier emitted into the BAML class (aliased when it differs from name). */
  readonly identifier: string;
  readonly type: TypeDescriptor;
  readonly description?: string;
  readonly defaultValue?: unknown;
}

export interface ObjectType {
  readonly kind: 'object';
  readonly name: string;
  readonly fields: readonly FieldDescriptor[];
}

export interface ArrayType {
  readonly kind: 'array';
  readonly element: TypeDescriptor;
}

export interface OptionalType {
  readonly kind: 'optional';
  readonly inner: TypeDescriptor;
}

export type TypeDescriptor =
  | PrimitiveType
  | EnumType
  | ObjectType
  | ArrayType
  | OptionalType;

export type NamedType = EnumType | ObjectType;

export interface CompiledSchema {
  readonly rootName: string;
  readonly root: ObjectType;
  /** Enums and classes in emission order: dependencies first, root last. */
  readonly declarations: readonly NamedType[];
  /** BAML source for the declarations. */
  readonly text: string;
}

/**
 * Loose input accepted from callers: a nested mapping of field names to
 * type names, nested mappings or single-element sequences.
 */
export type SchemaFieldSpec =
  | string
  | readonly SchemaFieldSpec[]
  | {readonly [key: string]: unknown}
  | null
  | undefined;

export type SchemaDict = {readonly [field: string]: SchemaFieldSpec};

export type ExtractedData = Record<string, unknown>;

export function primitive(type: PrimitiveKind): PrimitiveType {
  return Object.freeze({kind: 'primitive', type});
}

export function unwrapOptional(type: TypeDescriptor): {
  inner: TypeDescriptor;
  optional: boolean;
} {
  return type.kind === 'optional'
    ? {inner: type.inner, optional: true}
    : {inner: type, optional: false};
}
