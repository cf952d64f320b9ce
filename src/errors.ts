// ============================================================================
// Errors - Tagged failures of the harness pipeline
// ============================================================================

export type HarnessErrorKind =
  | "UnsupportedTypeKind"
  | "NoFunctionFound"
  | "MissingDeclaration"
  | "InvalidAst";

/**
 * Base class for every fatal condition of a generation run.
 * Callers branch on `kind` rather than on the class.
 */
export abstract class HarnessError extends Error {
  abstract readonly kind: HarnessErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A type kind outside int, unsigned int, char, pointer and struct. */
export class UnsupportedTypeKindError extends HarnessError {
  readonly kind = "UnsupportedTypeKind";

  constructor(
    public readonly typeKind: string,
    public readonly spelling: string,
    public readonly variable?: string
  ) {
    super(
      `Unsupported type kind "${typeKind}" (${spelling})` +
        (variable !== undefined ? ` for variable "${variable}"` : "")
    );
  }
}

export class NoFunctionFoundError extends HarnessError {
  readonly kind = "NoFunctionFound";
}

/** A declaration the pipeline needs is absent, e.g. a struct that is only forward-declared. */
export class MissingDeclarationError extends HarnessError {
  readonly kind = "MissingDeclaration";

  constructor(public readonly declaration: string, detail: string) {
    super(`Missing declaration for "${declaration}": ${detail}`);
  }
}

export class InvalidAstError extends HarnessError {
  readonly kind = "InvalidAst";

  constructor(message: string, public readonly problems: string[] = []) {
    super(problems.length > 0 ? `${message}:\n  ${problems.join("\n  ")}` : message);
  }
}
