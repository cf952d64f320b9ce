import { describe, it, expect } from '@jest/globals';
import { tokenize } from '../../src/index.js';

function types(spelling: string) {
  return tokenize(spelling).map((t) => [t.type, t.value]);
}

describe('tokenize', () => {
  it('should classify builtins and punctuation with offsets', () => {
    expect(tokenize('unsigned int *')).toEqual([
      { type: 'builtin', value: 'unsigned', offset: 0 },
      { type: 'builtin', value: 'int', offset: 9 },
      { type: 'punctuation', value: '*', offset: 13 },
      { type: 'eof', value: '', offset: 14 },
    ]);
  });

  it('should separate qualifiers, keywords and identifiers', () => {
    expect(types('const struct point *restrict')).toEqual([
      ['qualifier', 'const'],
      ['keyword', 'struct'],
      ['identifier', 'point'],
      ['punctuation', '*'],
      ['qualifier', 'restrict'],
      ['eof', ''],
    ]);
  });

  it('should read array extents as numbers', () => {
    expect(types('char [16]')).toEqual([
      ['builtin', 'char'],
      ['punctuation', '['],
      ['number', '16'],
      ['punctuation', ']'],
      ['eof', ''],
    ]);
  });

  it('should keep an unnamed tag location as one token', () => {
    expect(tokenize('struct (unnamed struct at main.c:16:3)')).toEqual([
      { type: 'keyword', value: 'struct', offset: 0 },
      { type: 'anonymous', value: 'unnamed struct at main.c:16:3', offset: 7 },
      { type: 'eof', value: '', offset: 38 },
    ]);
  });

  it('should accept the older "anonymous" wording', () => {
    expect(types('union (anonymous union at ./lib/a.h:2:1)')).toEqual([
      ['keyword', 'union'],
      ['anonymous', 'anonymous union at ./lib/a.h:2:1'],
      ['eof', ''],
    ]);
  });

  it('should treat a parenthesis that is not an unnamed tag as punctuation', () => {
    expect(types('int (*)(char)')).toEqual([
      ['builtin', 'int'],
      ['punctuation', '('],
      ['punctuation', '*'],
      ['punctuation', ')'],
      ['punctuation', '('],
      ['builtin', 'char'],
      ['punctuation', ')'],
      ['eof', ''],
    ]);
  });
});
