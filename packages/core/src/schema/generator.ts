/**
 * @license
 * Copyright 2025 BrowserOS
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */

/**
 * Schema description to BAML converter
 *
 * Walks a loosely-typed nested mapping and produces the type descriptor
 * graph plus the BAML class/enum source for it.
 *
 * Accepted field shapes:
 * - "string" | "int" | "float" | "bool" (and common aliases)
 * - the name of a class or enum declared earlier in the same schema
 * - { type: "enum", values: [...], name? }
 * - { type: "object", fields: {...}, name? }
 * - { type: <any shape>, optional?: boolean, default?, description? }
 * - a plain nested mapping (anonymous class)
 * - [<shape>] (array of shape)
 */

import {SchemaGenerationError} from '../errors.js';

import {CoercionError, coerceValue, isPlainObject} from './coerce.js';
import type {
  CompiledSchema,
  EnumType,
  EnumValue,
  FieldDescriptor,
  NamedType,
  ObjectType,
  PrimitiveKind,
  SchemaDict,
  TypeDescriptor,
} from './types.js';
import {primitive} from './types.js';

export const DEFAULT_MAX_DEPTH = 32;
export const DEFAULT_SCHEMA_NAME = 'ExtractedData';

const PRIMITIVE_ALIASES: ReadonlyMap<string, PrimitiveKind> = new Map<string, PrimitiveKind>([
  ['string', 'string'],
  ['str', 'string'],
  ['int', 'int'],
  ['integer', 'int'],
  ['float', 'float'],
  ['double', 'float'],
  ['number', 'float'],
  ['bool', 'bool'],
  ['boolean', 'bool'],
]);

const BAML_KEYWORDS = new Set([
  'class',
  'enum',
  'function',
  'client',
  'generator',
  'retry_policy',
  'template_string',
  'test',
  'type',
  'dynamic',
  'string',
  'int',
  'float',
  'bool',
  'null',
  'true',
  'false',
  'map',
  'image',
  'audio',
  'video',
  'pdf',
  'env',
  'if',
  'else',
  'for',
  'in',
  'let',
  'return',
  'while',
  'break',
  'continue',
]);

const DEFINITION_KEYS = new Set([
  'type',
  'optional',
  'default',
  'description',
  'values',
  'name',
  'fields',
]);

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export interface GeneratorOptions {
  /** Maximum nesting of objects and arrays below the root. */
  maxDepth?: number;
}

interface ResolvedField {
  type: TypeDescriptor;
  description?: string;
  defaultValue?: unknown;
}

interface GenerationContext {
  /** Completed declarations, available to references. */
  declared: Map<string, NamedType>;
  /** Objects still being built; a reference to one of these is a cycle. */
  open: Set<string>;
  taken: Set<string>;
  order: NamedType[];
  counter: number;
}

/**
 * Keywords are lowercase, so `Type` or `Image` remain usable class names.
 */
export function isBamlKeyword(name: string): boolean {
  return BAML_KEYWORDS.has(name);
}

export function toPascalCase(value: string): string {
  return value
    .split(/[^A-Za-z0-9]+/)
    .filter(Boolean)
    .map((part) => part.charAt(0).toUpperCase() + part.slice(1))
    .join('');
}

function toFieldIdentifier(key: string): string {
  let identifier = key.replace(/[^A-Za-z0-9_]/g, '_');
  if (!identifier || /^\d/.test(identifier)) identifier = `_${identifier}`;
  if (isBamlKeyword(identifier.toLowerCase())) identifier = `${identifier}_`;
  return identifier;
}

function toEnumIdentifier(value: string): string {
  let identifier = value
    .trim()
    .toUpperCase()
    .replace(/[^A-Z0-9_]/g, '_');
  if (/^\d/.test(identifier)) identifier = `_${identifier}`;
  return identifier;
}

function escapeBamlString(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"').replace(/\n/g, ' ');
}

export function renderBamlType(type: TypeDescriptor): string {
  switch (type.kind) {
    case 'primitive':
      return type.type;
    case 'enum':
    case 'object':
      return type.name;
    case 'array': {
      const element = renderBamlType(type.element);
      return type.element.kind === 'optional'
        ? `(${renderBamlType(type.element.inner)} | null)[]`
        : `${element}[]`;
    }
    case 'optional':
      return `${renderBamlType(type.inner)}?`;
  }
}

function renderDeclaration(declaration: NamedType): string {
  if (declaration.kind === 'enum') {
    const lines = [`enum ${declaration.name} {`];
    for (const entry of declaration.values) {
      const alias =
        entry.identifier === entry.value
          ? ''
          : ` @alias("${escapeBamlString(entry.value)}")`;
      lines.push(`  ${entry.identifier}${alias}`);
    }
    lines.push('}');
    return lines.join('\n');
  }

  const lines = [`class ${declaration.name} {`];
  for (const field of declaration.fields) {
    let fieldDef = `  ${field.identifier} ${renderBamlType(field.type)}`;
    if (field.identifier !== field.name) {
      fieldDef += ` @alias("${escapeBamlString(field.name)}")`;
    }
    if (field.description) {
      fieldDef += ` @description("${escapeBamlString(field.description)}")`;
    }
    lines.push(fieldDef);
  }
  lines.push('}');
  return lines.join('\n');
}

/**
 * Compiles schema descriptions into BAML declarations.
 *
 * Generation is deterministic: the same description and schema name always
 * produce the same names and the same text.
 *
 * @example
 * new DictToBAMLGenerator().generateSchema(
 *   {name: 'string', address: {city: 'string'}},
 *   'Person',
 * );
 * // class PersonAddress {
 * //   city string
 * // }
 * //
 * // class Person {
 * //   name string
 * //   address PersonAddress
 * // }
 */
export class DictToBAMLGenerator {
  private readonly maxDepth: number;

  constructor(options: GeneratorOptions = {}) {
    this.maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  }

  generateSchema(schemaDict: SchemaDict, schemaName = DEFAULT_SCHEMA_NAME): string {
    return this.compile(schemaDict, schemaName).text;
  }

  compile(schemaDict: SchemaDict, schemaName = DEFAULT_SCHEMA_NAME): CompiledSchema {
    if (!IDENTIFIER.test(schemaName) || isBamlKeyword(schemaName)) {
      throw new SchemaGenerationError(
        `Schema name '${schemaName}' is not a valid class name`,
        schemaName,
      );
    }
    if (!isPlainObject(schemaDict)) {
      throw new SchemaGenerationError('Schema description must be a mapping', schemaDict);
    }

    const ctx: GenerationContext = {
      declared: new Map(),
      open: new Set(),
      taken: new Set(),
      order: [],
      counter: 1,
    };

    const root = this.buildObject(schemaDict, schemaName, true, '$', 0, ctx);

    return Object.freeze({
      rootName: root.name,
      root,
      declarations: Object.freeze([...ctx.order]),
      text: ctx.order.map(renderDeclaration).join('\n\n'),
    });
  }

  private allocateName(base: string, ctx: GenerationContext): string {
    let candidate = base;
    while (ctx.taken.has(candidate) || isBamlKeyword(candidate)) {
      ctx.counter += 1;
      candidate = `${base}${ctx.counter}`;
    }
    ctx.taken.add(candidate);
    return candidate;
  }

  private claimExplicitName(name: unknown, path: string, ctx: GenerationContext): string {
    if (typeof name !== 'string' || !IDENTIFIER.test(name) || isBamlKeyword(name)) {
      throw new SchemaGenerationError(`Invalid type name ${JSON.stringify(name)}`, name, path);
    }
    if (ctx.taken.has(name)) {
      throw new SchemaGenerationError(`Type name '${name}' is already declared`, name, path);
    }
    ctx.taken.add(name);
    return name;
  }

  private register(declaration: NamedType, ctx: GenerationContext): void {
    ctx.declared.set(declaration.name, declaration);
    ctx.order.push(declaration);
  }

  private buildObject(
    fieldsSpec: unknown,
    name: string,
    nameIsFixed: boolean,
    path: string,
    depth: number,
    ctx: GenerationContext,
  ): ObjectType {
    if (depth > this.maxDepth) {
      throw new SchemaGenerationError(
        `Schema nests deeper than ${this.maxDepth} levels`,
        fieldsSpec,
        path,
      );
    }
    if (!isPlainObject(fieldsSpec)) {
      throw new SchemaGenerationError('Object fields must be a mapping', fieldsSpec, path);
    }

    const className = nameIsFixed ? name : this.allocateName(name, ctx);
    ctx.taken.add(className);
    ctx.open.add(className);

    const fields: FieldDescriptor[] = [];
    const identifiers = new Map<string, string>();

    for (const [key, spec] of Object.entries(fieldsSpec)) {
      if (spec === null || spec === undefined) continue;

      const fieldPath = `${path}.${key}`;
      const identifier = toFieldIdentifier(key);
      const previous = identifiers.get(identifier);
      if (previous !== undefined) {
        throw new SchemaGenerationError(
          `Field '${key}' collides with field '${previous}' in ${className}`,
          fieldsSpec,
          fieldPath,
        );
      }
      identifiers.set(identifier, key);

      const resolved = this.resolveField(
        spec,
        `${className}${toPascalCase(key)}`,
        fieldPath,
        depth,
        ctx,
      );
      fields.push(
        Object.freeze({
          name: key,
          identifier,
          type: resolved.type,
          description: resolved.description,
          defaultValue: resolved.defaultValue,
        }),
      );
    }

    if (fields.length === 0) {
      throw new SchemaGenerationError(
        depth === 0 ? 'Schema must declare at least one field' : `Object ${className} has no fields`,
        fieldsSpec,
        path,
      );
    }

    const declaration: ObjectType = Object.freeze({
      kind: 'object',
      name: className,
      fields: Object.freeze(fields),
    });
    ctx.open.delete(className);
    this.register(declaration, ctx);
    return declaration;
  }

  private buildEnum(
    spec: Record<string, unknown>,
    baseName: string,
    path: string,
    ctx: GenerationContext,
  ): EnumType {
    const {values} = spec;
    if (!Array.isArray(values) || values.length === 0) {
      throw new SchemaGenerationError('Enum must declare a non-empty values list', spec, path);
    }

    const seen = new Map<string, string>();
    const entries: EnumValue[] = [];
    for (const value of values) {
      if (typeof value !== 'string' || value.trim() === '') {
        throw new SchemaGenerationError(
          `Enum values must be non-empty strings, got ${JSON.stringify(value)}`,
          spec,
          path,
        );
      }
      if (entries.some((entry) => entry.value === value)) {
        throw new SchemaGenerationError(`Duplicate enum value '${value}'`, spec, path);
      }
      const identifier = toEnumIdentifier(value);
      const clash = seen.get(identifier);
      if (clash !== undefined) {
        throw new SchemaGenerationError(
          `Enum values '${clash}' and '${value}' both map to ${identifier}`,
          spec,
          path,
        );
      }
      seen.set(identifier, value);
      entries.push(Object.freeze({value, identifier}));
    }

    const name =
      spec.name === undefined
        ? this.allocateName(`${baseName}Enum`, ctx)
        : this.claimExplicitName(spec.name, path, ctx);

    const declaration: EnumType = Object.freeze({
      kind: 'enum',
      name,
      values: Object.freeze(entries),
    });
    this.register(declaration, ctx);
    return declaration;
  }

  private resolveField(
    spec: unknown,
    baseName: string,
    path: string,
    depth: number,
    ctx: GenerationContext,
  ): ResolvedField {
    if (!isPlainObject(spec) || !('type' in spec)) {
      return {type: this.resolveType(spec, baseName, path, depth, ctx)};
    }

    for (const key of Object.keys(spec)) {
      if (!DEFINITION_KEYS.has(key)) {
        throw new SchemaGenerationError(
          `Unexpected key '${key}' in field definition; declare objects with a 'type' field as {type: 'object', fields: {...}}`,
          spec,
          path,
        );
      }
    }

    const optional = spec.optional ?? false;
    if (typeof optional !== 'boolean') {
      throw new SchemaGenerationError("'optional' must be a boolean", spec, path);
    }
    let description: string | undefined;
    if (spec.description !== undefined) {
      if (typeof spec.description !== 'string') {
        throw new SchemaGenerationError("'description' must be a string", spec, path);
      }
      description = spec.description;
    }

    const inner = this.resolveType(spec, baseName, path, depth, ctx);
    const type: TypeDescriptor = optional
      ? Object.freeze({kind: 'optional', inner})
      : inner;

    let defaultValue: unknown;
    if (spec.default !== undefined && spec.default !== null) {
      if (!optional) {
        throw new SchemaGenerationError('Only optional fields may declare a default', spec, path);
      }
      try {
        defaultValue = coerceValue(inner, spec.default, path);
      } catch (error) {
        if (error instanceof CoercionError) {
          throw new SchemaGenerationError(
            `Default value does not match the field type: ${error.message}`,
            spec,
            path,
          );
        }
        throw error;
      }
    }

    return {type, description, defaultValue};
  }

  private resolveType(
    spec: unknown,
    baseName: string,
    path: string,
    depth: number,
    ctx: GenerationContext,
  ): TypeDescriptor {
    if (typeof spec === 'string') {
      return this.resolveNamed(spec, path, ctx);
    }

    if (Array.isArray(spec)) {
      if (spec.length !== 1) {
        throw new SchemaGenerationError(
          `Array definitions take exactly one element type, got ${spec.length}`,
          spec,
          path,
        );
      }
      if (depth + 1 > this.maxDepth) {
        throw new SchemaGenerationError(
          `Schema nests deeper than ${this.maxDepth} levels`,
          spec,
          path,
        );
      }
      const element = this.resolveField(spec[0], `${baseName}Item`, `${path}[]`, depth + 1, ctx);
      return Object.freeze({kind: 'array', element: element.type});
    }

    if (isPlainObject(spec)) {
      if (!('type' in spec)) {
        return this.buildObject(spec, baseName, false, path, depth + 1, ctx);
      }

      const {type} = spec;
      if (type === 'enum') {
        return this.buildEnum(spec, baseName, path, ctx);
      }
      if (type === 'object') {
        if (spec.name === undefined) {
          return this.buildObject(spec.fields, baseName, false, path, depth + 1, ctx);
        }
        const name = this.claimExplicitName(spec.name, path, ctx);
        return this.buildObject(spec.fields, name, true, path, depth + 1, ctx);
      }
      if (type === null || type === undefined) {
        throw new SchemaGenerationError("Field definition has an empty 'type'", spec, path);
      }
      // Nested `type` mappings count toward the depth limit, so a mapping
      // that contains itself ends in a generation error.
      if (depth + 1 > this.maxDepth) {
        throw new SchemaGenerationError(
          `Schema nests deeper than ${this.maxDepth} levels`,
          spec,
          path,
        );
      }
      return this.resolveType(type, baseName, path, depth + 1, ctx);
    }

    throw new SchemaGenerationError(
      `Unknown field definition type: ${spec === null ? 'null' : typeof spec}`,
      spec,
      path,
    );
  }

  private resolveNamed(name: string, path: string, ctx: GenerationContext): TypeDescriptor {
    const primitiveKind = PRIMITIVE_ALIASES.get(name.trim().toLowerCase());
    if (primitiveKind) return primitive(primitiveKind);

    const declared = ctx.declared.get(name);
    if (declared) return declared;

    if (ctx.open.has(name)) {
      throw new SchemaGenerationError(
        `Type '${name}' refers to itself; recursive schemas are not supported`,
        name,
        path,
      );
    }
    throw new SchemaGenerationError(`Unknown type '${name}'`, name, path);
  }
}

/**
 * Convenience wrapper around {@link DictToBAMLGenerator.compile}.
 */
export function generateSchema(
  schemaDict: SchemaDict,
  schemaName = DEFAULT_SCHEMA_NAME,
  options?: GeneratorOptions,
): CompiledSchema {
  return new DictToBAMLGenerator(options).compile(schemaDict, schemaName);
}
