// ============================================================================
// Flattener - Decomposes a parameter type into post-ordered locals
// ============================================================================

import { UnsupportedTypeKindError } from "./errors.js";
import type { FlatSequence, LocalVariable, TypeDescriptor } from "./types.js";

/** Appended to a pointer's name to name the variable it points at. */
export const POINTEE_SUFFIX = "_v";

/**
 * Flatten `type` into the locals a harness needs to build a value of it.
 *
 * Every field's (or the pointee's) whole subsequence is emitted before the
 * entry that depends on it, so the sequence can be materialized front to
 * back. The order is what the synthesizer resolves dependencies against.
 *
 * @example
 * ```ts
 * flatten(pointerType(primitiveType("int")), "x");
 * // [{ name: "x_v", childCount: 0 }, { name: "x", childCount: 1 }]
 * ```
 */
export function flatten(type: TypeDescriptor, varname: string): FlatSequence {
  const out: LocalVariable[] = [];
  flattenInto(type, varname, out);
  return out;
}

// No cycle guard: a type that reaches itself, e.g. a list node with a `next`
// pointer, recurses until the stack runs out.
function flattenInto(type: TypeDescriptor, varname: string, out: LocalVariable[]): void {
  switch (type.kind) {
    case "composite": {
      const fields = type.fields();
      for (const field of fields) {
        flattenInto(field.type, field.name, out);
      }
      out.push({ type, name: varname, childCount: fields.length });
      return;
    }
    case "pointer":
      flattenInto(type.pointee(), varname + POINTEE_SUFFIX, out);
      out.push({ type, name: varname, childCount: 1 });
      return;
    case "primitive":
      out.push({ type, name: varname, childCount: 0 });
      return;
    case "unsupported":
      throw new UnsupportedTypeKindError(type.category, type.spelling, varname);
  }
}
