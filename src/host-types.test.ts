/**
 * Tests for host type builders and introspection
 */

import { describe, it, expect } from 'vitest';
import { defineClass, defineEnum, describeType, inheritanceChain, isNullable, resolveProperties, t } from './host-types.js';

enum Level {
  Low = 0,
  High = 2,
}

enum Mixed {
  A = 1,
  B = 'b',
}

describe('defineEnum', () => {
  it('should skip reverse mappings of numeric enums', () => {
    const type = defineEnum('Level', Level);

    expect(type.members).toEqual([
      { name: 'Low', value: 0 },
      { name: 'High', value: 2 },
    ]);
    expect(type.base).toBe('integer');
  });

  it('should detect string and mixed enums', () => {
    expect(defineEnum('Color', { Red: 'red' }).base).toBe('string');
    expect(defineEnum('Mixed', Mixed).base).toBe('mixed');
  });
});

describe('inheritance', () => {
  const Base = defineClass('Base', {
    properties: () => [
      { name: 'id', type: t.int32() },
      { name: 'label', type: t.string(), required: true },
    ],
  });
  const Middle = defineClass('Middle', {
    base: Base,
    properties: () => [{ name: 'label', type: t.string(), description: 'Overridden label' }],
  });
  const Leaf = defineClass('Leaf', {
    base: Middle,
    properties: () => [{ name: 'extra', type: t.boolean() }],
  });

  it('should list ancestors base first', () => {
    expect(inheritanceChain(Leaf).map(c => c.name)).toEqual(['Base', 'Middle', 'Leaf']);
  });

  it('should resolve inherited properties in declaration order', () => {
    const props = resolveProperties(Leaf);

    expect(props.map(p => p.name)).toEqual(['id', 'label', 'extra']);
  });

  it('should keep the most-derived declaration of a redeclared property', () => {
    const label = resolveProperties(Leaf).find(p => p.name === 'label');

    expect(label?.description).toBe('Overridden label');
    expect(label?.declaredBy).toBe(Middle);
    expect(label?.required).toBe(true);
  });
});

describe('describeType', () => {
  it('should render type names', () => {
    const Address = defineClass('Address', { properties: () => [] });

    expect(describeType(t.int32())).toBe('int32');
    expect(describeType(t.string({ nullable: true }))).toBe('string?');
    expect(describeType(t.arrayOf(t.object(Address)))).toBe('Address[]');
    expect(describeType(t.enumOf(defineEnum('Level', Level)))).toBe('Level');
    expect(describeType(t.unknown())).toBe('any');
  });
});

describe('isNullable', () => {
  it('should be true for nullable refs and unknown only', () => {
    expect(isNullable(t.int32({ nullable: true }))).toBe(true);
    expect(isNullable(t.unknown())).toBe(true);
    expect(isNullable(t.int32())).toBe(false);
    expect(isNullable(t.signal())).toBe(false);
  });
});
