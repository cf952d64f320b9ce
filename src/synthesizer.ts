// ============================================================================
// Synthesizer - Turns a flat sequence into declaration/assignment pairs
// ============================================================================

import { UnsupportedTypeKindError } from "./errors.js";
import type { FlatSequence, Initializer, LocalVariable, PrimitiveSubkind } from "./types.js";

/** scanf conversions per primitive; " %c" skips leading whitespace. */
export const READ_FORMATS: Record<PrimitiveSubkind, string> = {
  int: "%d",
  uint: "%u",
  char: " %c",
};

/**
 * Convert a flattened sequence into one initializer per entry, in the same
 * order. Dependencies are resolved by position only: the entry at `i`
 * binds to the `childCount` subtrees immediately before it. Reordering the
 * sequence between flattening and synthesis breaks every binding.
 */
export function synthesize(sequence: FlatSequence): Initializer[] {
  const extents = subtreeExtents(sequence);

  return sequence.map((variable, index) => ({
    declaration: `${variable.type.spelling} ${variable.name};`,
    assignment: assignmentFor(sequence, extents, index, variable),
  }));
}

/**
 * Indices of the direct dependencies of `sequence[index]`, in field order.
 * Each is the last entry (the root) of its subtree.
 */
export function dependenciesOf(sequence: FlatSequence, index: number): number[] {
  return dependencyRoots(sequence, subtreeExtents(sequence), index);
}

function assignmentFor(
  sequence: FlatSequence,
  extents: number[],
  index: number,
  variable: LocalVariable
): string {
  const { type, name } = variable;

  switch (type.kind) {
    case "composite": {
      const fields = type.fields();
      const roots = dependencyRoots(sequence, extents, index);
      if (roots.length !== fields.length) {
        throw new Error(
          `Flat sequence is malformed: "${name}" has ${fields.length} fields but ${roots.length} dependencies`
        );
      }
      return fields
        .map((field, i) => `${name}.${field.name} = ${sequence[roots[i]].name};`)
        .join(" ");
    }
    case "pointer": {
      const [pointee] = dependencyRoots(sequence, extents, index);
      return `${name} = &${sequence[pointee].name};`;
    }
    case "primitive":
      return `scanf("${READ_FORMATS[type.subkind]}", &${name});`;
    case "unsupported":
      throw new UnsupportedTypeKindError(type.category, type.spelling, name);
  }
}

// Number of entries each subtree occupies, indexed by its root.
function subtreeExtents(sequence: FlatSequence): number[] {
  const extents: number[] = [];
  for (let i = 0; i < sequence.length; i++) {
    extents.push(1 + dependencyRoots(sequence, extents, i).reduce((sum, root) => sum + extents[root], 0));
  }
  return extents;
}

function dependencyRoots(sequence: FlatSequence, extents: number[], index: number): number[] {
  const { childCount, name } = sequence[index];
  const roots: number[] = [];
  let cursor = index - 1;

  for (let n = 0; n < childCount; n++) {
    if (cursor < 0) {
      throw new Error(
        `Flat sequence is malformed: "${name}" at ${index} expects ${childCount} dependencies, found ${n}`
      );
    }
    roots.unshift(cursor);
    cursor -= extents[cursor];
  }

  return roots;
}
