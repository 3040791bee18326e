/**
 * Builders and introspection helpers for host type references
 */

import type {
  ArrayTypeRef,
  ClassType,
  EnumMember,
  EnumType,
  EnumTypeRef,
  ObjectTypeRef,
  PrimitiveName,
  PrimitiveTypeRef,
  PropertyDecl,
  SignalTypeRef,
  TypeRef,
  UnknownTypeRef,
} from './types/host.js';

function primitive(name: PrimitiveName) {
  return (options: { nullable?: boolean } = {}): PrimitiveTypeRef => ({
    kind: 'primitive',
    name,
    ...(options.nullable ? { nullable: true } : {}),
  });
}

export const t = {
  string: primitive('string'),
  char: primitive('char'),
  guid: primitive('guid'),
  uri: primitive('uri'),
  boolean: primitive('boolean'),
  byte: primitive('byte'),
  sbyte: primitive('sbyte'),
  int16: primitive('int16'),
  uint16: primitive('uint16'),
  int32: primitive('int32'),
  uint32: primitive('uint32'),
  int64: primitive('int64'),
  uint64: primitive('uint64'),
  float: primitive('float'),
  double: primitive('double'),
  decimal: primitive('decimal'),
  dateTime: primitive('date-time'),
  date: primitive('date'),
  timeSpan: primitive('time-span'),

  enumOf(type: EnumType, options: { nullable?: boolean } = {}): EnumTypeRef {
    return { kind: 'enum', type, ...(options.nullable ? { nullable: true } : {}) };
  },

  arrayOf(element: TypeRef, options: { nullable?: boolean } = {}): ArrayTypeRef {
    return { kind: 'array', element, ...(options.nullable ? { nullable: true } : {}) };
  },

  object(type: ClassType, options: { nullable?: boolean } = {}): ObjectTypeRef {
    return { kind: 'object', type, ...(options.nullable ? { nullable: true } : {}) };
  },

  unknown(): UnknownTypeRef {
    return { kind: 'unknown' };
  },

  signal(): SignalTypeRef {
    return { kind: 'signal' };
  },
};

export interface ClassOptions {
  base?: ClassType;
  properties: () => readonly PropertyDecl[];
  create?: () => object;
}

export function defineClass(name: string, options: ClassOptions): ClassType {
  return { name, ...options };
}

/**
 * Build an EnumType from a TypeScript enum object.
 *
 * Numeric enums carry reverse mappings (`E[0] === 'A'`), which are skipped.
 */
export function defineEnum(name: string, values: Record<string, string | number>): EnumType {
  const members: EnumMember[] = [];
  for (const [key, value] of Object.entries(values)) {
    const isReverseMapping = typeof value === 'string' && values[value] === Number(key);
    if (!isReverseMapping) {
      members.push({ name: key, value });
    }
  }

  const numeric = members.every(m => typeof m.value === 'number');
  const textual = members.every(m => typeof m.value === 'string');

  return {
    name,
    members,
    base: numeric ? 'integer' : textual ? 'string' : 'mixed',
  };
}

/**
 * Ancestor chain of a class, base first
 */
export function inheritanceChain(type: ClassType): ClassType[] {
  const chain: ClassType[] = [];
  const seen = new Set<ClassType>();
  let current: ClassType | undefined = type;

  while (current && !seen.has(current)) {
    seen.add(current);
    chain.unshift(current);
    current = current.base;
  }

  return chain;
}

export interface ResolvedProperty extends PropertyDecl {
  required: boolean;
  declaredBy: ClassType;
}

/**
 * Properties of a class including every inherited one, base first.
 *
 * A redeclared property keeps the position of its first (base) declaration and
 * takes the most-derived declaration. It is required if any declaration of it
 * along the chain is marked required.
 */
export function resolveProperties(type: ClassType): ResolvedProperty[] {
  const resolved = new Map<string, ResolvedProperty>();

  for (const cls of inheritanceChain(type)) {
    for (const prop of cls.properties()) {
      const previous = resolved.get(prop.name);
      resolved.set(prop.name, {
        ...prop,
        required: Boolean(prop.required) || Boolean(previous?.required),
        declaredBy: cls,
      });
    }
  }

  return [...resolved.values()];
}

export function isNullable(type: TypeRef): boolean {
  return type.kind !== 'signal' && (type.kind === 'unknown' || type.nullable === true);
}

/**
 * Human-readable name of a type reference, used in descriptions and errors
 */
export function describeType(type: TypeRef): string {
  const suffix = isNullable(type) && type.kind !== 'unknown' ? '?' : '';
  switch (type.kind) {
    case 'primitive':
      return `${type.name}${suffix}`;
    case 'enum':
      return `${type.type.name}${suffix}`;
    case 'array':
      return `${describeType(type.element)}[]${suffix}`;
    case 'object':
      return `${type.type.name}${suffix}`;
    case 'unknown':
      return 'any';
    case 'signal':
      return 'AbortSignal';
  }
}
