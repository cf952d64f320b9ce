import type { FieldDescriptor, PrimitiveSubkind, TypeDescriptor } from "./types.js";

const PRIMITIVE_SPELLINGS: Record<PrimitiveSubkind, string> = {
  int: "int",
  uint: "unsigned int",
  char: "char",
};

export function primitiveType(subkind: PrimitiveSubkind, spelling = PRIMITIVE_SPELLINGS[subkind]): TypeDescriptor {
  return { kind: "primitive", subkind, spelling };
}

/**
 * Pointer to `pointee`. Pass a function to defer resolution, which is how
 * self-referential structs are expressed; the spelling is then required
 * unless the pointee may be resolved right away.
 */
export function pointerType(
  pointee: TypeDescriptor | (() => TypeDescriptor),
  spelling?: string
): TypeDescriptor {
  const resolve = typeof pointee === "function" ? pointee : () => pointee;
  return {
    kind: "pointer",
    spelling: spelling ?? pointerSpelling(resolve().spelling),
    pointee: resolve,
  };
}

export function compositeType(
  spelling: string,
  fields: FieldDescriptor[] | (() => FieldDescriptor[])
): TypeDescriptor {
  return {
    kind: "composite",
    spelling,
    fields: typeof fields === "function" ? fields : () => fields,
  };
}

export function unsupportedType(category: string, spelling = category): TypeDescriptor {
  return { kind: "unsupported", category, spelling };
}

/** Returns the same descriptor under another spelling (a typedef name). */
export function withSpelling(type: TypeDescriptor, spelling: string): TypeDescriptor {
  return { ...type, spelling };
}

// clang prints "int *", "int **", "const char *".
export function pointerSpelling(pointeeSpelling: string): string {
  return pointeeSpelling.endsWith("*") ? `${pointeeSpelling}*` : `${pointeeSpelling} *`;
}
