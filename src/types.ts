// ============================================================================
// Pipeline model - Type descriptors, flattened variables and initializers
// ============================================================================

export type PrimitiveSubkind = "int" | "uint" | "char";

/** A named member of a struct. */
export interface FieldDescriptor {
  name: string;
  type: TypeDescriptor;
}

/**
 * A C type as reported by the introspection layer.
 *
 * `pointee()` and `fields()` are evaluated each time they are called, so a
 * struct may point back at itself. `spelling` is what a declaration of this
 * type writes before the variable name.
 */
export type TypeDescriptor =
  | { kind: "primitive"; subkind: PrimitiveSubkind; spelling: string }
  | { kind: "pointer"; spelling: string; pointee: () => TypeDescriptor }
  | { kind: "composite"; spelling: string; fields: () => FieldDescriptor[] }
  | { kind: "unsupported"; category: string; spelling: string };

/**
 * One local of the harness. `childCount` is 1 for pointers, the number of
 * direct fields for composites and 0 for primitives.
 */
export interface LocalVariable {
  type: TypeDescriptor;
  name: string;
  childCount: number;
}

/** Post-order; a non-primitive entry is preceded by its `childCount` dependency subtrees. */
export type FlatSequence = LocalVariable[];

export interface Initializer {
  declaration: string;
  /** Statements that give the variable its value; empty for a struct without fields. */
  assignment: string;
}

export interface ParameterDeclaration {
  name: string;
  type: TypeDescriptor;
}

export interface FunctionDeclaration {
  name: string;
  file: string | undefined;
  line: number;
  column: number;
  inPrimaryFile: boolean;
  parameters: ParameterDeclaration[];
}

export interface HarnessSpec {
  functionName: string;
  parameterNames: string[];
  initializers: Initializer[];
}
