/**
 * Parameter binding engine
 *
 * Converts a loosely typed JSON argument bag into the ordered, typed argument
 * list of a host method. Binding never throws for bad input: every failure is
 * returned as an InvalidParamsError carrying the parameter path, the expected
 * type and the offending raw value.
 *
 * Names match exactly (case-sensitive), at the top level and inside objects.
 */

import type { ClassType, EnumType, PrimitiveName, PrimitiveTypeRef, TypeRef } from './types/host.js';
import type { DeclaredParameter, RegisteredTool } from './types/tool.js';
import { describeType, isNullable, resolveProperties } from './host-types.js';
import { InvalidParamsError } from './errors.js';

export type BindResult =
  | { ok: true; values: unknown[] }
  | { ok: false; error: InvalidParamsError };

type Coerced =
  | { ok: true; value: unknown }
  | { ok: false; error: InvalidParamsError };

const INTEGER_RANGES: Partial<Record<PrimitiveName, readonly [number, number]>> = {
  byte: [0, 255],
  sbyte: [-128, 127],
  int16: [-32768, 32767],
  uint16: [0, 65535],
  int32: [-2147483648, 2147483647],
  uint32: [0, 4294967295],
  int64: [Number.MIN_SAFE_INTEGER, Number.MAX_SAFE_INTEGER],
  uint64: [0, Number.MAX_SAFE_INTEGER],
};

const FLOATING_KINDS: ReadonlySet<PrimitiveName> = new Set(['float', 'double', 'decimal']);

const INTEGER_TEXT = /^[+-]?\d+$/;
const NUMBER_TEXT = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const GUID_TEXT = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const DATE_TEXT = /^\d{4}-\d{2}-\d{2}$/;
const DATE_TIME_TEXT = /^(\d{4}-\d{2}-\d{2})(?:[Tt ]\d{2}:\d{2}(?::\d{2}(?:\.\d{1,9})?)?(?:[Zz]|[+-]\d{2}:\d{2})?)?$/;
const TIME_SPAN_TEXT = /^-?(\d+\.)?\d{1,2}:\d{2}:\d{2}(\.\d{1,7})?$/;

function ok(value: unknown): Coerced {
  return { ok: true, value };
}

/** Rejects dates the parser would roll over, such as 2024-02-30 */
function isCalendarDate(text: string): boolean {
  const parsed = Date.parse(text);
  return !Number.isNaN(parsed) && new Date(parsed).toISOString().slice(0, 10) === text;
}

function parseDateTime(text: string): Date | null {
  const match = DATE_TIME_TEXT.exec(text);
  if (!match || !isCalendarDate(match[1])) return null;
  const date = new Date(text);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** Defaults are shared by the definition; every call gets its own copy */
function freshDefault(value: unknown): unknown {
  return typeof value === 'object' && value !== null ? structuredClone(value) : value;
}

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'string') return `string ${JSON.stringify(value)}`;
  if (typeof value === 'object') return 'object';
  return `${typeof value} ${String(value)}`;
}

function mismatch(path: string, type: TypeRef, value: unknown, reason?: string): Coerced {
  const expected = describeType(type);
  const suffix = reason ? ` (${reason})` : '';
  return {
    ok: false,
    error: new InvalidParamsError(
      `Invalid value for parameter '${path}': expected ${expected}, got ${describeValue(value)}${suffix}`,
      'TYPE_MISMATCH',
      { path, expected, received: value }
    ),
  };
}

function missing(path: string, type: TypeRef): InvalidParamsError {
  return new InvalidParamsError(`Missing required parameter: ${path}`, 'MISSING_REQUIRED', {
    path,
    expected: describeType(type),
  });
}

/**
 * Value used for an absent optional parameter without a declared default
 */
export function zeroValue(type: TypeRef): unknown {
  if (type.kind !== 'primitive' || type.nullable) return undefined;
  if (type.name === 'boolean') return false;
  if (INTEGER_RANGES[type.name] || FLOATING_KINDS.has(type.name)) return 0;
  return undefined;
}

export class ParameterBinder {
  /**
   * Bind an argument bag to the declared parameters of a tool, in declaration order
   */
  bind(tool: RegisteredTool, args: Record<string, unknown>, signal?: AbortSignal): BindResult {
    const values: unknown[] = [];

    for (const param of tool.parameters) {
      const bound = this.bindParameter(param, args, signal);
      if (!bound.ok) return bound;
      values.push(bound.value);
    }

    return { ok: true, values };
  }

  private bindParameter(param: DeclaredParameter, args: Record<string, unknown>, signal?: AbortSignal): Coerced {
    if (param.type.kind === 'signal') {
      return ok(signal ?? new AbortController().signal);
    }

    if (!Object.hasOwn(args, param.name)) {
      if (param.schema?.required) {
        return { ok: false, error: missing(param.name, param.type) };
      }
      const fallback = param.default ?? param.schema?.default;
      return ok(fallback !== undefined ? freshDefault(fallback) : zeroValue(param.type));
    }

    return this.coerce(args[param.name], param.type, param.name);
  }

  /**
   * Coerce a raw JSON value to a declared type
   */
  coerce(value: unknown, type: TypeRef, path: string): Coerced {
    if (type.kind === 'unknown') return ok(value);
    if (type.kind === 'signal') return mismatch(path, type, value, 'not bindable from arguments');

    if (value === null || value === undefined) {
      return isNullable(type) ? ok(null) : mismatch(path, type, value, 'null is not allowed');
    }

    switch (type.kind) {
      case 'primitive':
        return this.coercePrimitive(value, type, path);
      case 'enum':
        return this.coerceEnum(value, type.type, type, path);
      case 'array':
        return this.coerceArray(value, type.element, type, path);
      case 'object':
        return this.coerceObject(value, type.type, type, path);
    }
  }

  private coercePrimitive(value: unknown, type: PrimitiveTypeRef, path: string): Coerced {
    const range = INTEGER_RANGES[type.name];
    if (range) {
      return this.coerceInteger(value, range, type, path);
    }

    if (FLOATING_KINDS.has(type.name)) {
      if (typeof value === 'number' && Number.isFinite(value)) return ok(value);
      if (typeof value === 'string' && NUMBER_TEXT.test(value.trim())) {
        const parsed = Number(value.trim());
        return Number.isFinite(parsed) ? ok(parsed) : mismatch(path, type, value, 'out of range');
      }
      return mismatch(path, type, value);
    }

    if (type.name === 'boolean') {
      if (typeof value === 'boolean') return ok(value);
      if (typeof value === 'string') {
        const normalized = value.trim().toLowerCase();
        if (normalized === 'true') return ok(true);
        if (normalized === 'false') return ok(false);
      }
      return mismatch(path, type, value);
    }

    if (typeof value !== 'string') {
      return mismatch(path, type, value);
    }

    switch (type.name) {
      case 'char':
        return [...value].length === 1 ? ok(value) : mismatch(path, type, value, 'expected a single character');
      case 'guid':
        return GUID_TEXT.test(value) ? ok(value) : mismatch(path, type, value, 'not a valid GUID');
      case 'uri':
        return URL.canParse(value) ? ok(value) : mismatch(path, type, value, 'not an absolute URI');
      case 'date-time': {
        const date = parseDateTime(value);
        return date ? ok(date) : mismatch(path, type, value, 'not a valid ISO 8601 date-time');
      }
      case 'date':
        return DATE_TEXT.test(value) && isCalendarDate(value)
          ? ok(value)
          : mismatch(path, type, value, 'expected YYYY-MM-DD');
      case 'time-span':
        return TIME_SPAN_TEXT.test(value) ? ok(value) : mismatch(path, type, value, 'expected [d.]hh:mm:ss');
      default:
        return ok(value);
    }
  }

  private coerceInteger(
    value: unknown,
    [min, max]: readonly [number, number],
    type: PrimitiveTypeRef,
    path: string
  ): Coerced {
    let n: number;
    if (typeof value === 'number') {
      n = value;
    } else if (typeof value === 'string' && INTEGER_TEXT.test(value.trim())) {
      n = Number(value.trim());
    } else {
      return mismatch(path, type, value);
    }

    if (!Number.isInteger(n)) {
      return mismatch(path, type, value, 'not an integer');
    }
    if (n < min || n > max) {
      return mismatch(path, type, value, `out of range ${min}..${max}`);
    }
    return ok(n);
  }

  private coerceEnum(value: unknown, enumType: EnumType, type: TypeRef, path: string): Coerced {
    if (typeof value === 'string') {
      const exact = enumType.members.find(m => m.name === value);
      if (exact) return ok(exact.value);

      const lowered = value.toLowerCase();
      const caseInsensitive = enumType.members.find(m => m.name.toLowerCase() === lowered);
      if (caseInsensitive) return ok(caseInsensitive.value);
    }

    const byValue = enumType.members.find(m => {
      if (typeof m.value === 'number') {
        return value === m.value || (typeof value === 'string' && INTEGER_TEXT.test(value.trim()) && Number(value.trim()) === m.value);
      }
      return value === m.value;
    });
    if (byValue) return ok(byValue.value);

    const allowed = enumType.members.map(m => m.name);
    const expected = describeType(type);
    return {
      ok: false,
      error: new InvalidParamsError(
        `Invalid value for parameter '${path}': expected one of ${allowed.join(', ')}, got ${describeValue(value)}`,
        'ENUM_VIOLATION',
        { path, expected, allowed, received: value }
      ),
    };
  }

  private coerceArray(value: unknown, element: TypeRef, type: TypeRef, path: string): Coerced {
    if (!Array.isArray(value)) {
      return mismatch(path, type, value);
    }

    const items: unknown[] = [];
    for (const [index, item] of value.entries()) {
      const coerced = this.coerce(item, element, `${path}[${index}]`);
      if (!coerced.ok) return coerced;
      items.push(coerced.value);
    }
    return ok(items);
  }

  private coerceObject(value: unknown, cls: ClassType, type: TypeRef, path: string): Coerced {
    if (!isJsonObject(value)) {
      return mismatch(path, type, value);
    }

    const instance = cls.create ? cls.create() : {};

    for (const prop of resolveProperties(cls)) {
      if (prop.type.kind === 'signal') continue;

      const propPath = `${path}.${prop.name}`;
      if (!Object.hasOwn(value, prop.name)) {
        if (prop.required) {
          return { ok: false, error: missing(propPath, prop.type) };
        }
        if (prop.default !== undefined) {
          Reflect.set(instance, prop.name, freshDefault(prop.default));
        }
        continue;
      }

      const coerced = this.coerce(value[prop.name], prop.type, propPath);
      if (!coerced.ok) return coerced;
      Reflect.set(instance, prop.name, coerced.value);
    }

    return ok(instance);
  }
}
