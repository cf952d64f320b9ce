// ============================================================================
// Selector - Picks the function to build a harness for
// ============================================================================

import { NoFunctionFoundError } from "./errors.js";
import type { FunctionDeclaration } from "./types.js";

export interface SelectorOptions {
  /** Only consider declarations with this name */
  functionName?: string;
  /**
   * Fail when no candidate lives in the primary file. With `false`, the
   * ordering key decides among declarations from other files. Default: true
   */
  requirePrimaryFile?: boolean;
}

/** Ordering key: declarations in the primary file first, then by line. */
export function selectionKey(fn: FunctionDeclaration): [number, number] {
  return [fn.inPrimaryFile ? 1 : 0, fn.line];
}

/**
 * The declaration with the greatest `(inPrimaryFile, line)`. Equal keys go
 * to the later declaration.
 */
export function selectTarget(
  functions: readonly FunctionDeclaration[],
  options: SelectorOptions = {}
): FunctionDeclaration {
  const requirePrimaryFile = options.requirePrimaryFile ?? true;
  const { functionName } = options;

  const candidates = functionName === undefined
    ? functions
    : functions.filter((fn) => fn.name === functionName);

  if (candidates.length === 0) {
    throw new NoFunctionFoundError(
      functionName === undefined
        ? "No function declarations found in the translation unit"
        : `No function named "${functionName}" found in the translation unit`
    );
  }

  let best = candidates[0];
  for (const fn of candidates.slice(1)) {
    if (compareKeys(selectionKey(fn), selectionKey(best)) >= 0) {
      best = fn;
    }
  }

  if (requirePrimaryFile && !best.inPrimaryFile) {
    throw new NoFunctionFoundError(
      functionName === undefined
        ? "No function declarations found in the primary file"
        : `Function "${functionName}" is not declared in the primary file`
    );
  }

  return best;
}

function compareKeys(a: [number, number], b: [number, number]): number {
  return a[0] - b[0] || a[1] - b[1];
}
