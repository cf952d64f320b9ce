// ============================================================================
// Translation Unit - Type introspection over a clang JSON AST dump
// ============================================================================

import type { ClangLocation, ClangBareLocation, ClangNode, ResolvedLocation, SpellingNode } from "./ast.js";
import { compositeType, pointerType, primitiveType, unsupportedType, withSpelling } from "./descriptors.js";
import { MissingDeclarationError } from "./errors.js";
import { ParseError, parseSpelling } from "./parser.js";
import { isPseudoFile, isSameFile, locationKey, parseLocationKey } from "./path-utils.js";
import type {
  FieldDescriptor, FunctionDeclaration, ParameterDeclaration, PrimitiveSubkind, TypeDescriptor,
} from "./types.js";

export interface TranslationUnitOptions {
  /** The file whose functions are candidates. Default: the first file clang reports that was not included */
  primaryFile?: string;
  /** Directory clang ran in; relative file names are resolved against it. Default: process.cwd() */
  baseDir?: string;
}

interface FunctionEntry {
  node: ClangNode;
  location: ResolvedLocation | undefined;
}

/** Builtin spellings the harness can read, keyed by their sorted words. */
const PRIMITIVE_BUILTINS = new Map<string, PrimitiveSubkind>([
  ["int", "int"],
  ["signed", "int"],
  ["int signed", "int"],
  ["unsigned", "uint"],
  ["int unsigned", "uint"],
  ["char", "char"],
]);

/**
 * Indexes one translation unit and answers type questions about it.
 *
 * clang leaves `file` and `line` out of a location when they repeat the
 * previously printed one, so the whole dump is replayed in document order
 * once, here, and every declaration keeps its decoded position.
 */
export class TranslationUnitIndex {
  readonly primaryFile: string | undefined;
  private readonly baseDir: string;

  private lastFile: string | undefined;
  private lastLine = 0;
  private firstMainFile: string | undefined;

  private records = new Map<string, ClangNode>();         // "struct point" -> RecordDecl
  private recordsById = new Map<string, ClangNode>();
  private unnamedRecords = new Map<string, ClangNode>();  // locationKey -> RecordDecl
  private typedefs = new Map<string, string>();           // name -> aliased spelling
  private typedefRecordIds = new Map<string, string>();   // name -> RecordDecl id
  private functionEntries: FunctionEntry[] = [];

  constructor(root: ClangNode, options: TranslationUnitOptions = {}) {
    this.baseDir = options.baseDir ?? process.cwd();
    this.visit(root);
    this.primaryFile = options.primaryFile ?? this.firstMainFile;
  }

  /** Every non-implicit function declaration, in source order. */
  functions(): FunctionDeclaration[] {
    return this.functionEntries.map(({ node, location }): FunctionDeclaration => {
      const file = location?.file;
      const parameterNodes = (node.inner ?? []).filter((child) => child.kind === "ParmVarDecl");
      const resolveParameters = (): ParameterDeclaration[] =>
        parameterNodes.map((param, index) => ({
          name: param.name ?? `arg${index}`,
          type: this.resolveType(param.type?.qualType ?? ""),
        }));

      return {
        name: node.name ?? "",
        file,
        line: location?.line ?? 0,
        column: location?.column ?? 0,
        inPrimaryFile: this.isPrimary(file),
        // Resolved on first read so unrelated declarations never need their types.
        get parameters() {
          return resolveParameters();
        },
      };
    });
  }

  /**
   * Describe the type clang spells as `spelling`. Pointee and field lists
   * are looked up when asked for.
   */
  resolveType(spelling: string): TypeDescriptor {
    let node: SpellingNode;
    try {
      node = parseSpelling(spelling);
    } catch (err) {
      if (err instanceof ParseError) {
        return unsupportedType("unrecognized", spelling);
      }
      throw err;
    }

    switch (node.kind) {
      case "pointer": {
        const pointee = node.pointee;
        return pointerType(() => this.resolveType(pointee), spelling);
      }
      case "array":
        return unsupportedType("array", spelling);
      case "function":
        return unsupportedType(spelling.includes("(*") ? "function pointer" : "function", spelling);
      case "builtin": {
        const subkind = PRIMITIVE_BUILTINS.get([...node.words].sort().join(" "));
        return subkind ? primitiveType(subkind, spelling) : unsupportedType(node.words.join(" "), spelling);
      }
      case "tag":
        if (node.tag !== "struct") return unsupportedType(node.tag, spelling);
        return this.structType(spelling, `struct ${node.name}`, this.findRecord(node.name));
      case "anonymous_tag": {
        if (node.tag !== "struct") return unsupportedType(node.tag, spelling);
        const key = parseLocationKey(node.location, this.baseDir);
        return this.structType(spelling, spelling, key ? this.unnamedRecords.get(key) : undefined);
      }
      case "typedef": {
        const aliased = this.typedefs.get(node.name);
        if (aliased === undefined) {
          throw new MissingDeclarationError(node.name, "no typedef of this name in the translation unit");
        }
        return withSpelling(this.resolveType(aliased), spelling);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Records
  // ---------------------------------------------------------------------------

  private findRecord(name: string): ClangNode | undefined {
    const named = this.records.get(`struct ${name}`);
    if (named) return named;
    // typedef struct { ... } name;  is spelled "struct name"
    const id = this.typedefRecordIds.get(name);
    return id !== undefined ? this.recordsById.get(id) : undefined;
  }

  private structType(spelling: string, declaration: string, record: ClangNode | undefined): TypeDescriptor {
    return compositeType(spelling, () => this.fieldsOf(declaration, record));
  }

  private fieldsOf(declaration: string, record: ClangNode | undefined): FieldDescriptor[] {
    if (!record || record.completeDefinition !== true) {
      throw new MissingDeclarationError(declaration, "struct has no complete definition");
    }

    return (record.inner ?? [])
      .filter((child) => child.kind === "FieldDecl")
      .map((field) => {
        const spelling = field.type?.qualType ?? "";
        if (field.name === undefined || field.name === "") {
          return { name: "", type: unsupportedType("anonymous member", spelling) };
        }
        if (field.isBitfield === true) {
          return { name: field.name, type: unsupportedType("bitfield", spelling) };
        }
        return { name: field.name, type: this.resolveType(spelling) };
      });
  }

  private isPrimary(file: string | undefined): boolean {
    return file !== undefined && this.primaryFile !== undefined && isSameFile(file, this.primaryFile, this.baseDir);
  }

  // ---------------------------------------------------------------------------
  // Walk
  // ---------------------------------------------------------------------------

  private visit(node: ClangNode): void {
    const location = this.readLocation(node.loc);
    this.readLocation(node.range?.begin);
    this.readLocation(node.range?.end);

    this.index(node, location);

    // Children carry locations too; they must be replayed in the order clang printed them.
    for (const key of Object.keys(node)) {
      const children = key === "inner" ? node.inner : key === "array_filler" ? node.array_filler : undefined;
      for (const child of children ?? []) {
        this.visit(child);
      }
    }
  }

  private index(node: ClangNode, location: ResolvedLocation | undefined): void {
    switch (node.kind) {
      case "FunctionDecl":
        if (node.isImplicit !== true) {
          this.functionEntries.push({ node, location });
        }
        break;
      case "RecordDecl":
        this.indexRecord(node, location);
        break;
      case "TypedefDecl":
        if (node.name !== undefined && node.type && !this.typedefs.has(node.name)) {
          this.typedefs.set(node.name, node.type.qualType);
          const recordId = findRecordTypeId(node);
          if (recordId !== undefined) {
            this.typedefRecordIds.set(node.name, recordId);
          }
        }
        break;
    }
  }

  private indexRecord(node: ClangNode, location: ResolvedLocation | undefined): void {
    if (node.id !== undefined) {
      this.recordsById.set(node.id, node);
    }

    if (node.name !== undefined && node.name !== "") {
      const key = `${node.tagUsed ?? "struct"} ${node.name}`;
      const existing = this.records.get(key);
      if (!existing || (existing.completeDefinition !== true && node.completeDefinition === true)) {
        this.records.set(key, node);
      }
      return;
    }

    if (location?.file !== undefined) {
      this.unnamedRecords.set(locationKey(location.file, location.line, location.column, this.baseDir), node);
    }
  }

  private readLocation(loc: ClangLocation | undefined): ResolvedLocation | undefined {
    if (!loc) return undefined;
    if (loc.spellingLoc || loc.expansionLoc) {
      this.readBareLocation(loc.spellingLoc);
      return this.readBareLocation(loc.expansionLoc);
    }
    return this.readBareLocation(loc);
  }

  private readBareLocation(loc: ClangBareLocation | undefined): ResolvedLocation | undefined {
    if (!loc || (loc.offset === undefined && loc.line === undefined && loc.col === undefined)) {
      return undefined;
    }

    if (loc.file !== undefined) this.lastFile = loc.file;
    if (loc.line !== undefined) this.lastLine = loc.line;

    const included = loc.includedFrom !== undefined;
    if (this.firstMainFile === undefined && this.lastFile !== undefined && !included && !isPseudoFile(this.lastFile)) {
      this.firstMainFile = this.lastFile;
    }

    return { file: this.lastFile, line: this.lastLine, column: loc.col ?? 0, included };
  }
}

// A TypedefDecl's inner type tree ends in a RecordType pointing at the record it names.
function findRecordTypeId(node: ClangNode): string | undefined {
  for (const child of node.inner ?? []) {
    if (child.kind === "RecordType" && child.decl?.id !== undefined) {
      return child.decl.id;
    }
    const nested = findRecordTypeId(child);
    if (nested !== undefined) return nested;
  }
  return undefined;
}
