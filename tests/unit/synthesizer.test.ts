import { describe, it, expect } from '@jest/globals';
import {
  synthesize, flatten, dependenciesOf, primitiveType, pointerType, compositeType, unsupportedType,
  UnsupportedTypeKindError, type LocalVariable,
} from '../../src/index.js';

const int = primitiveType('int');
const uint = primitiveType('uint');
const char = primitiveType('char');

describe('synthesize', () => {
  it('should read a struct of two ints and assign its fields', () => {
    const point = compositeType('struct point', [
      { name: 'a', type: int },
      { name: 'b', type: int },
    ]);

    expect(synthesize(flatten(point, 'p'))).toEqual([
      { declaration: 'int a;', assignment: 'scanf("%d", &a);' },
      { declaration: 'int b;', assignment: 'scanf("%d", &b);' },
      { declaration: 'struct point p;', assignment: 'p.a = a; p.b = b;' },
    ]);
  });

  it('should point a pointer at its materialized pointee', () => {
    expect(synthesize(flatten(pointerType(int), 'x'))).toEqual([
      { declaration: 'int x_v;', assignment: 'scanf("%d", &x_v);' },
      { declaration: 'int * x;', assignment: 'x = &x_v;' },
    ]);
  });

  it('should pick the read format from the primitive subkind', () => {
    expect(synthesize(flatten(uint, 'n'))[0].assignment).toBe('scanf("%u", &n);');
    expect(synthesize(flatten(char, 'c'))[0].assignment).toBe('scanf(" %c", &c);');
  });

  it('should use the spelling verbatim', () => {
    const size = primitiveType('uint', 'unsigned');
    const flags = primitiveType('int', 'const int');

    expect(synthesize(flatten(size, 'n'))[0].declaration).toBe('unsigned n;');
    expect(synthesize(flatten(flags, 'f'))[0].declaration).toBe('const int f;');
  });

  it('should leave a field-less struct without assignment', () => {
    expect(synthesize(flatten(compositeType('struct empty', []), 'e'))).toEqual([
      { declaration: 'struct empty e;', assignment: '' },
    ]);
  });

  it('should bind struct fields to whole preceding subtrees', () => {
    const inner = compositeType('struct inner', [
      { name: 'a', type: int },
      { name: 'c', type: char },
    ]);
    const outer = compositeType('struct outer', [
      { name: 'b', type: int },
      { name: 'in', type: inner },
      { name: 'ptr', type: pointerType(uint) },
    ]);

    expect(synthesize(flatten(outer, 'o')).map((init) => init.assignment)).toEqual([
      'scanf("%d", &b);',
      'scanf("%d", &a);',
      'scanf(" %c", &c);',
      'in.a = a; in.c = c;',
      'scanf("%u", &ptr_v);',
      'ptr = &ptr_v;',
      'o.b = b; o.in = in; o.ptr = ptr;',
    ]);
  });

  it('should point at a struct pointee, not its last field', () => {
    const point = compositeType('struct point', [
      { name: 'x', type: int },
      { name: 'y', type: int },
    ]);

    expect(synthesize(flatten(pointerType(point), 'pt')).map((init) => init.assignment)).toEqual([
      'scanf("%d", &x);',
      'scanf("%d", &y);',
      'pt_v.x = x; pt_v.y = y;',
      'pt = &pt_v;',
    ]);
  });

  it('should throw UnsupportedTypeKind for an unsupported entry', () => {
    const sequence: LocalVariable[] = [{ type: unsupportedType('float'), name: 'f', childCount: 0 }];
    expect(() => synthesize(sequence)).toThrow(UnsupportedTypeKindError);
  });

  it('should reject a sequence whose window runs past the start', () => {
    const sequence: LocalVariable[] = [{ type: pointerType(int), name: 'x', childCount: 1 }];
    expect(() => synthesize(sequence)).toThrow(
      'Flat sequence is malformed: "x" at 0 expects 1 dependencies, found 0'
    );
  });
});

describe('dependenciesOf', () => {
  it('should be the plain index window when every dependency is primitive', () => {
    const point = compositeType('struct point', [
      { name: 'a', type: int },
      { name: 'b', type: int },
    ]);
    expect(dependenciesOf(flatten(point, 'p'), 2)).toEqual([0, 1]);
  });

  it('should skip over nested subtrees', () => {
    const inner = compositeType('struct inner', [
      { name: 'a', type: int },
      { name: 'c', type: char },
    ]);
    const outer = compositeType('struct outer', [
      { name: 'b', type: int },
      { name: 'in', type: inner },
    ]);

    // [b, a, c, in, o]
    const sequence = flatten(outer, 'o');
    expect(dependenciesOf(sequence, 4)).toEqual([0, 3]);
    expect(dependenciesOf(sequence, 3)).toEqual([1, 2]);
  });

  it('should return nothing for primitives', () => {
    expect(dependenciesOf(flatten(int, 'n'), 0)).toEqual([]);
  });
});
