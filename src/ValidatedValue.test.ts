import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { EMPTY_KIND_LIST } from './EmptyList';
import { getBuiltinType } from './SchemaModel';
import type { SimpleTypeDefinition } from './SchemaModel';
import { ValidatedValue } from './ValidatedValue';

function builtin(name: string): SimpleTypeDefinition {
  const type = getBuiltinType(name);
  if (!type || type.kind !== 'simple') {
    throw new Error(`Not a built-in simple type: ${name}`);
  }
  return type;
}

function expectEmpty(value: ValidatedValue): void {
  expect(value.getActualValue()).toBeNull();
  expect(value.getActualValueKind()).toBe('unavailable');
  expect(value.getListValueKinds()).toBe(EMPTY_KIND_LIST);
  expect(value.getNormalizedValue()).toBeNull();
  expect(value.getMemberType()).toBeNull();
  expect(value.isEmpty()).toBe(true);
}

describe('ValidatedValue', () => {
  it('should start empty', () => {
    expectEmpty(new ValidatedValue());
  });

  it('should expose a populated value', () => {
    const int = builtin('int');
    const value = new ValidatedValue({
      actualValue: 42,
      actualValueKind: 'int',
      normalizedValue: '42',
      memberType: int
    });

    expect(value.getActualValue()).toBe(42);
    expect(value.getActualValueKind()).toBe('int');
    expect(value.getNormalizedValue()).toBe('42');
    expect(value.getMemberType()).toBe(int);
    expect(value.getListValueKinds()).toEqual([]);
    expect(value.isEmpty()).toBe(false);
  });

  describe('copyFrom', () => {
    it('should copy every field of the source', () => {
      const token = builtin('token');
      const source = new ValidatedValue({
        actualValue: ['a', 'b'],
        actualValueKind: 'list',
        listValueKinds: ['token', 'token'],
        normalizedValue: 'a b',
        memberType: token
      });
      const target = new ValidatedValue();

      target.copyFrom(source);

      expect(target.getActualValue()).toEqual(['a', 'b']);
      expect(target.getActualValueKind()).toBe('list');
      expect(target.getListValueKinds()).toEqual(['token', 'token']);
      expect(target.getNormalizedValue()).toBe('a b');
      expect(target.getMemberType()).toBe(token);
    });

    it('should not share list storage with the source', () => {
      const source = new ValidatedValue({
        actualValue: [1, 2],
        actualValueKind: 'list',
        listValueKinds: ['int', 'int'],
        normalizedValue: '1 2'
      });
      const target = new ValidatedValue();

      target.copyFrom(source);

      expect(target.getActualValue()).not.toBe(source.getActualValue());
      expect(target.getListValueKinds()).not.toBe(source.getListValueKinds());
    });

    it('should empty the target when copying an empty value', () => {
      const target = new ValidatedValue({ actualValue: 7, actualValueKind: 'int', normalizedValue: '7' });

      target.copyFrom(new ValidatedValue());

      expectEmpty(target);
    });
  });

  describe('reset', () => {
    it('should clear a populated value', () => {
      const value = new ValidatedValue({
        actualValue: true,
        actualValueKind: 'boolean',
        normalizedValue: 'true',
        memberType: builtin('boolean')
      });

      value.reset();

      expectEmpty(value);
    });

    it('should give the same state when called twice (property test)', () => {
      fc.assert(
        fc.property(
          fc.integer(),
          fc.constantFrom('int' as const, 'long' as const, 'short' as const),
          (n, kind) => {
            const once = new ValidatedValue({ actualValue: n, actualValueKind: kind, normalizedValue: String(n) });
            const twice = new ValidatedValue({ actualValue: n, actualValueKind: kind, normalizedValue: String(n) });

            once.reset();
            twice.reset();
            twice.reset();

            expect(twice.getActualValue()).toBe(once.getActualValue());
            expect(twice.getActualValueKind()).toBe(once.getActualValueKind());
            expect(twice.getListValueKinds()).toBe(once.getListValueKinds());
            expect(twice.getNormalizedValue()).toBe(once.getNormalizedValue());
            expect(twice.getMemberType()).toBe(once.getMemberType());
          }
        ),
        { numRuns: 50 }
      );
    });
  });
});
