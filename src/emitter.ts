// ============================================================================
// Emitter - Assembles the harness fragment for one target function
// ============================================================================

import { flatten } from "./flattener.js";
import { synthesize } from "./synthesizer.js";
import type { FunctionDeclaration, HarnessSpec } from "./types.js";

export interface EmitterOptions {
  /** Prefix for every emitted line. Default: "" (four spaces inside main) */
  indent?: string;
  /** Wrap the fragment in `int main(void)` with `#include <stdio.h>`. Default: false */
  wrapInMain?: boolean;
  /** Files to `#include "..."` above main, usually the source under test. Only used with wrapInMain */
  includes?: string[];
}

/**
 * Flatten and synthesize every parameter of `fn`, in declaration order.
 * Each parameter's initializers stay contiguous.
 */
export function buildHarnessSpec(fn: FunctionDeclaration): HarnessSpec {
  return {
    functionName: fn.name,
    parameterNames: fn.parameters.map((p) => p.name),
    initializers: fn.parameters.flatMap((p) => synthesize(flatten(p.type, p.name))),
  };
}

/**
 * Render declarations, then assignments and reads, then the call.
 *
 * @example
 * ```ts
 * emitHarness({
 *   functionName: "area",
 *   parameterNames: ["w"],
 *   initializers: [{ declaration: "int w;", assignment: 'scanf("%d", &w);' }],
 * });
 * // int w;
 * // scanf("%d", &w);
 * // area(w);
 * ```
 */
export function emitHarness(spec: HarnessSpec, options: EmitterOptions = {}): string {
  const wrapInMain = options.wrapInMain ?? false;
  const indent = options.indent ?? (wrapInMain ? "    " : "");

  const body = [
    ...spec.initializers.map((init) => init.declaration),
    ...spec.initializers.map((init) => init.assignment).filter((stmt) => stmt.length > 0),
    `${spec.functionName}(${spec.parameterNames.join(", ")});`,
  ].map((line) => indent + line);

  if (!wrapInMain) {
    return body.join("\n") + "\n";
  }

  return [
    "#include <stdio.h>",
    ...(options.includes ?? []).map((file) => `#include "${file}"`),
    "",
    "int main(void) {",
    ...body,
    `${indent}return 0;`,
    "}",
    "",
  ].join("\n");
}
