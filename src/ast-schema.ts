// ============================================================================
// AST Schema - Validates a clang JSON AST dump before it is walked
// ============================================================================

import Ajv, { type ErrorObject, type SchemaObject } from "ajv";
import { InvalidAstError } from "./errors.js";
import type { ClangNode } from "./ast.js";

const bareLocation = {
  type: "object",
  properties: {
    offset: { type: "integer" },
    file: { type: "string" },
    line: { type: "integer", minimum: 0 },
    col: { type: "integer", minimum: 0 },
    tokLen: { type: "integer" },
    includedFrom: {
      type: "object",
      required: ["file"],
      properties: { file: { type: "string" } },
    },
    isMacroArgExpansion: { type: "boolean" },
  },
};

export const CLANG_NODE_SCHEMA: SchemaObject = {
  $id: "https://harness-synth.local/clang-node.json",
  type: "object",
  required: ["kind"],
  definitions: {
    bareLocation,
    location: {
      type: "object",
      allOf: [{ $ref: "#/definitions/bareLocation" }],
      properties: {
        spellingLoc: { $ref: "#/definitions/bareLocation" },
        expansionLoc: { $ref: "#/definitions/bareLocation" },
      },
    },
  },
  properties: {
    id: { type: "string" },
    kind: { type: "string", minLength: 1 },
    name: { type: "string" },
    loc: { $ref: "#/definitions/location" },
    range: {
      type: "object",
      properties: {
        begin: { $ref: "#/definitions/location" },
        end: { $ref: "#/definitions/location" },
      },
    },
    type: {
      type: "object",
      required: ["qualType"],
      properties: {
        qualType: { type: "string" },
        desugaredQualType: { type: "string" },
        typeAliasDeclId: { type: "string" },
      },
    },
    tagUsed: { type: "string" },
    completeDefinition: { type: "boolean" },
    isImplicit: { type: "boolean" },
    isBitfield: { type: "boolean" },
    decl: { type: "object" },
    inner: { type: "array", items: { $ref: "#" } },
    array_filler: { type: "array", items: { $ref: "#" } },
  },
};

const ajv = new Ajv({ allErrors: true });
const validateNode = ajv.compile<ClangNode>(CLANG_NODE_SCHEMA);

export function isClangNode(value: unknown): value is ClangNode {
  return validateNode(value);
}

/** Validate `value` as a translation-unit dump, throwing `InvalidAstError` otherwise. */
export function assertTranslationUnit(value: unknown): ClangNode {
  if (!validateNode(value)) {
    throw new InvalidAstError("Input is not a clang JSON AST", formatErrors(validateNode.errors));
  }
  if (value.kind !== "TranslationUnitDecl") {
    throw new InvalidAstError(`Expected a TranslationUnitDecl at the root, got ${value.kind}`);
  }
  return value;
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  return (errors ?? []).slice(0, 10).map((err) => `${err.instancePath || "/"} ${err.message ?? "is invalid"}`);
}
