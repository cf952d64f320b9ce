// ============================================================================
// harness-synth - Input-driven C test harnesses from clang's JSON AST
// ============================================================================
//
// Given a translation unit, picks the target function (the last one declared
// in the primary file) and writes the C statements that build each of its
// arguments from stdin and call it:
//
//   struct point p   ->   int x;  int y;  struct point p;
//                         scanf("%d", &x);  scanf("%d", &y);
//                         p.x = x; p.y = y;
//                         f(p);
//
// Supported parameter types:
//   - int, unsigned int, char (read with %d, %u and " %c")
//   - structs, nested to any depth, through typedefs too
//   - pointers to any supported type (the pointee gets its own "_v" local)
//
// Anything else (floating point, arrays, unions, enums, function pointers,
// bitfields, wider integers) stops generation with UnsupportedTypeKind.
//
// The C front end is clang: the input is what
// `clang -Xclang -ast-dump=json -fsyntax-only file.c` prints.
//
// ============================================================================

export { tokenize } from "./tokenizer.js";
export type { Token, TokenType } from "./tokenizer.js";

export { SpellingParser, ParseError, parseSpelling } from "./parser.js";

export type {
  ClangNode, ClangLocation, ClangBareLocation, ClangRange, ResolvedLocation, SpellingNode,
} from "./ast.js";
export { CLANG_NODE_SCHEMA, isClangNode, assertTranslationUnit } from "./ast-schema.js";

export { TranslationUnitIndex } from "./translation-unit.js";
export type { TranslationUnitOptions } from "./translation-unit.js";

export { primitiveType, pointerType, compositeType, unsupportedType, withSpelling } from "./descriptors.js";
export { flatten, POINTEE_SUFFIX } from "./flattener.js";
export { synthesize, dependenciesOf, READ_FORMATS } from "./synthesizer.js";
export { buildHarnessSpec, emitHarness } from "./emitter.js";
export type { EmitterOptions } from "./emitter.js";
export { selectTarget, selectionKey } from "./selector.js";
export type { SelectorOptions } from "./selector.js";
export { dumpClangAst } from "./clang.js";
export type { ClangOptions } from "./clang.js";

export {
  HarnessError, UnsupportedTypeKindError, NoFunctionFoundError, MissingDeclarationError, InvalidAstError,
} from "./errors.js";
export type { HarnessErrorKind } from "./errors.js";

export type {
  TypeDescriptor, FieldDescriptor, PrimitiveSubkind, LocalVariable, FlatSequence,
  Initializer, FunctionDeclaration, ParameterDeclaration, HarnessSpec,
} from "./types.js";

import * as fs from "fs";
import * as path from "path";
import { assertTranslationUnit } from "./ast-schema.js";
import { dumpClangAst, type ClangOptions } from "./clang.js";
import { buildHarnessSpec, emitHarness, type EmitterOptions } from "./emitter.js";
import { InvalidAstError } from "./errors.js";
import { flatten } from "./flattener.js";
import { selectTarget, type SelectorOptions } from "./selector.js";
import { TranslationUnitIndex, type TranslationUnitOptions } from "./translation-unit.js";
import type { FunctionDeclaration, HarnessSpec } from "./types.js";

export interface HarnessOptions extends TranslationUnitOptions, SelectorOptions, EmitterOptions {
  /**
   * Receives progress lines: the translation unit, the chosen target and
   * the locals each parameter needs. Nothing is printed when unset.
   */
  onDiagnostic?: (message: string) => void;
  /** Also report per-parameter flattening. Default: false */
  verbose?: boolean;
}

export interface HarnessResult {
  /** Primary file of the translation unit, or "<unknown>" */
  translationUnit: string;
  target: FunctionDeclaration;
  spec: HarnessSpec;
  code: string;
}

/**
 * Generate the harness for a parsed clang JSON AST.
 *
 * @example
 * ```ts
 * const ast = JSON.parse(fs.readFileSync("main.ast.json", "utf-8"));
 * const { code } = generateHarness(ast, { primaryFile: "main.c" });
 * ```
 */
export function generateHarness(ast: unknown, options: HarnessOptions = {}): HarnessResult {
  const report = options.onDiagnostic ?? (() => {});
  const root = assertTranslationUnit(ast);
  const unit = new TranslationUnitIndex(root, options);
  const translationUnit = unit.primaryFile ?? "<unknown>";
  report(`Translation unit: ${translationUnit}`);

  const target = selectTarget(unit.functions(), options);
  report(`Target: ${target.name} [${target.file ?? "<unknown>"}:${target.line}]`);

  if (options.verbose) {
    for (const param of target.parameters) {
      const locals = flatten(param.type, param.name);
      report(`  ${param.type.spelling} ${param.name}: ${locals.map((v) => v.name).join(", ")}`);
    }
  }

  const spec = buildHarnessSpec(target);
  return { translationUnit, target, spec, code: emitHarness(spec, options) };
}

/**
 * Generate the harness for a file: a clang JSON AST dump (".json" or "-"
 * for stdin), or a C source, which is handed to clang first.
 */
export function generateHarnessFromFile(
  inputPath: string,
  options: HarnessOptions & ClangOptions = {}
): HarnessResult {
  if (isCSource(inputPath)) {
    const absolute = path.resolve(inputPath);
    const cwd = options.cwd ?? path.dirname(absolute);
    const ast = dumpClangAst(absolute, { ...options, cwd });
    return generateHarness(ast, {
      ...options,
      primaryFile: options.primaryFile ?? absolute,
      baseDir: options.baseDir ?? cwd,
    });
  }

  const source = inputPath === "-" ? fs.readFileSync(0, "utf-8") : fs.readFileSync(inputPath, "utf-8");
  return generateHarness(parseAstJson(source, inputPath), options);
}

export function isCSource(inputPath: string): boolean {
  return /\.[ch]$/i.test(inputPath);
}

function parseAstJson(source: string, inputPath: string): unknown {
  try {
    return JSON.parse(source);
  } catch (err) {
    throw new InvalidAstError(`${inputPath} is not JSON: ${err instanceof Error ? err.message : String(err)}`);
  }
}
