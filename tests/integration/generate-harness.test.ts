import { describe, it, expect } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  generateHarness, generateHarnessFromFile, HarnessError, InvalidAstError,
  MissingDeclarationError, NoFunctionFoundError, UnsupportedTypeKindError,
} from '../../src/index.js';

const fixturePath = path.join(__dirname, '../fixtures/main.ast.json');

function loadFixture(): unknown {
  return JSON.parse(fs.readFileSync(fixturePath, 'utf-8'));
}

function lines(...text: string[]): string {
  return text.join('\n') + '\n';
}

describe('generateHarness', () => {
  describe('Target selection', () => {
    it('should harness the last function of the primary file', () => {
      const result = generateHarness(loadFixture());

      expect(result.translationUnit).toBe('main.c');
      expect([result.target.name, result.target.file, result.target.line]).toEqual(['sum', 'main.c', 27]);
      expect(result.code).toBe(lines(
        'int a;',
        'int b;',
        'scanf("%d", &a);',
        'scanf("%d", &b);',
        'sum(a, b);',
      ));
    });

    it('should ignore functions from included headers', () => {
      expect(() => generateHarness(loadFixture(), { functionName: 'helper' })).toThrow(NoFunctionFoundError);
    });

    it('should harness an included function when other files are allowed', () => {
      const result = generateHarness(loadFixture(), { functionName: 'helper', requirePrimaryFile: false });

      expect(result.target.file).toBe('util.h');
      expect(result.code).toBe(lines('int v;', 'scanf("%d", &v);', 'helper(v);'));
    });

    it('should honour an explicit primary file', () => {
      const result = generateHarness(loadFixture(), { primaryFile: 'util.h' });
      expect(result.target.name).toBe('helper');
    });
  });

  describe('Parameter types', () => {
    it('should build a struct and a pointer to int', () => {
      const { code } = generateHarness(loadFixture(), { functionName: 'area' });

      expect(code).toBe(lines(
        'int x;',
        'int y;',
        'struct point p;',
        'int scale_v;',
        'int * scale;',
        'scanf("%d", &x);',
        'scanf("%d", &y);',
        'p.x = x; p.y = y;',
        'scanf("%d", &scale_v);',
        'scale = &scale_v;',
        'area(p, scale);',
      ));
    });

    it('should build a pointer to a typedef of an unnamed struct', () => {
      const { code } = generateHarness(loadFixture(), { functionName: 'parse' });

      expect(code).toBe(lines(
        'char tag;',
        'unsigned int count;',
        'header_t h_v;',
        'header_t * h;',
        'char c;',
        'scanf(" %c", &tag);',
        'scanf("%u", &count);',
        'h_v.tag = tag; h_v.count = count;',
        'h = &h_v;',
        'scanf(" %c", &c);',
        'parse(h, c);',
      ));
    });

    it('should build nested unnamed structs', () => {
      const { code } = generateHarness(loadFixture(), { functionName: 'nest' });

      expect(code).toBe(lines(
        'int a;',
        'struct (unnamed struct at main.c:16:3) inner;',
        'char c;',
        'struct outer o;',
        'scanf("%d", &a);',
        'inner.a = a;',
        'scanf(" %c", &c);',
        'o.inner = inner; o.c = c;',
        'nest(o);',
      ));
    });

    it('should fail on a float parameter', () => {
      expect(() => generateHarness(loadFixture(), { functionName: 'ratio' })).toThrow(
        'Unsupported type kind "float" (float) for variable "a"'
      );
    });

    it('should fail on a pointer to an incomplete struct', () => {
      try {
        generateHarness(loadFixture(), { functionName: 'walk' });
        throw new Error('expected generation to fail');
      } catch (err) {
        expect(err).toBeInstanceOf(MissingDeclarationError);
        expect(err).toBeInstanceOf(HarnessError);
        if (err instanceof HarnessError) {
          expect(err.kind).toBe('MissingDeclaration');
          expect(err.message).toBe('Missing declaration for "struct node": struct has no complete definition');
        }
      }
    });
  });

  describe('Output options', () => {
    it('should wrap the harness in main', () => {
      const { code } = generateHarness(loadFixture(), { wrapInMain: true, includes: ['main.c'] });

      expect(code).toBe(lines(
        '#include <stdio.h>',
        '#include "main.c"',
        '',
        'int main(void) {',
        '    int a;',
        '    int b;',
        '    scanf("%d", &a);',
        '    scanf("%d", &b);',
        '    sum(a, b);',
        '    return 0;',
        '}',
      ));
    });
  });

  describe('Diagnostics', () => {
    it('should report the translation unit and the target', () => {
      const messages: string[] = [];
      generateHarness(loadFixture(), { onDiagnostic: (m) => messages.push(m) });

      expect(messages).toEqual(['Translation unit: main.c', 'Target: sum [main.c:27]']);
    });

    it('should list the locals of every parameter when verbose', () => {
      const messages: string[] = [];
      generateHarness(loadFixture(), {
        functionName: 'parse',
        verbose: true,
        onDiagnostic: (m) => messages.push(m),
      });

      expect(messages).toEqual([
        'Translation unit: main.c',
        'Target: parse [main.c:23]',
        '  header_t * h: tag, count, h_v, h',
        '  char c: c',
      ]);
    });
  });

  describe('Invalid input', () => {
    it('should reject values that are not clang nodes', () => {
      expect(() => generateHarness({})).toThrow(InvalidAstError);
      expect(() => generateHarness({})).toThrow(
        "Input is not a clang JSON AST:\n  / must have required property 'kind'"
      );
    });

    it('should point at the offending child', () => {
      expect(() => generateHarness({ kind: 'TranslationUnitDecl', inner: [{ kind: 5 }] })).toThrow(
        'Input is not a clang JSON AST:\n  /inner/0/kind must be string'
      );
    });

    it('should require a translation unit at the root', () => {
      expect(() => generateHarness({ kind: 'FunctionDecl' })).toThrow(
        'Expected a TranslationUnitDecl at the root, got FunctionDecl'
      );
    });

    it('should fail on a translation unit without functions', () => {
      expect(() => generateHarness({ kind: 'TranslationUnitDecl', inner: [] })).toThrow(
        'No function declarations found in the translation unit'
      );
    });

    it('should reject floating-point parameters in a minimal dump', () => {
      const ast = {
        kind: 'TranslationUnitDecl',
        inner: [{
          kind: 'FunctionDecl',
          name: 'scale',
          loc: { offset: 6, file: 'scale.c', line: 1, col: 6, tokLen: 5 },
          inner: [{ kind: 'ParmVarDecl', name: 'f', loc: { offset: 18, col: 18, tokLen: 1 }, type: { qualType: 'double' } }],
        }],
      };

      expect(() => generateHarness(ast)).toThrow(UnsupportedTypeKindError);
    });
  });
});

describe('generateHarnessFromFile', () => {
  it('should read a saved AST dump', () => {
    const result = generateHarnessFromFile(fixturePath, { functionName: 'area' });
    expect(result.target.name).toBe('area');
    expect(result.spec.parameterNames).toEqual(['p', 'scale']);
  });

  it('should reject a file that is not JSON', () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'harness-synth-'));
    const dump = path.join(dir, 'truncated.json');
    fs.writeFileSync(dump, '{"kind": "TranslationUnitDecl", ');
    try {
      expect(() => generateHarnessFromFile(dump)).toThrow(InvalidAstError);
      expect(() => generateHarnessFromFile(dump)).toThrow(`${dump} is not JSON: `);
    } finally {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });
});
