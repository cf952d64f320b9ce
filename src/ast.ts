// ============================================================================
// AST Node Types - clang's JSON AST dump and parsed type spellings
// ============================================================================

/**
 * A location as clang prints it. `file` and `line` are left out when they
 * repeat the previously printed location; `{}` means no location.
 */
export interface ClangBareLocation {
  offset?: number;
  file?: string;
  line?: number;
  col?: number;
  tokLen?: number;
  includedFrom?: { file: string };
  isMacroArgExpansion?: boolean;
}

/** Macro-expanded locations come as a spelling/expansion pair. */
export interface ClangLocation extends ClangBareLocation {
  spellingLoc?: ClangBareLocation;
  expansionLoc?: ClangBareLocation;
}

export interface ClangRange {
  begin?: ClangLocation;
  end?: ClangLocation;
}

export interface ClangQualType {
  qualType: string;
  desugaredQualType?: string;
  typeAliasDeclId?: string;
}

/** Any node of `clang -Xclang -ast-dump=json`. Only the fields we read are typed. */
export interface ClangNode {
  id?: string;
  kind: string;
  name?: string;
  loc?: ClangLocation;
  range?: ClangRange;
  type?: ClangQualType;
  tagUsed?: string;
  completeDefinition?: boolean;
  isImplicit?: boolean;
  isBitfield?: boolean;
  decl?: { id?: string; kind?: string; name?: string };
  inner?: ClangNode[];
  array_filler?: ClangNode[];
  [key: string]: unknown;
}

/** A source position after the omitted parts have been filled back in. */
export interface ResolvedLocation {
  file: string | undefined;
  line: number;
  column: number;
  included: boolean;
}

// ---------------------------------------------------------------------------
// Type spellings ("const struct point *", "unsigned int", "point_t")
// ---------------------------------------------------------------------------

export type TagKeyword = "struct" | "union" | "enum";

export type SpellingNode =
  | { kind: "pointer"; pointee: string }
  | { kind: "array" }
  | { kind: "function" }
  | { kind: "builtin"; words: string[] }
  | { kind: "tag"; tag: TagKeyword; name: string }
  | { kind: "anonymous_tag"; tag: TagKeyword; location: string }
  | { kind: "typedef"; name: string };
