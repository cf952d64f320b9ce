// ============================================================================
// Tokenizer - Breaks a clang type spelling into a stream of tokens
// ============================================================================

export type TokenType =
  | "keyword"       // struct, union, enum
  | "qualifier"     // const, volatile, restrict, ...
  | "builtin"       // int, char, unsigned, long, float, ...
  | "identifier"    // typedef and tag names
  | "number"        // array extents
  | "punctuation"   // * ( ) [ ] ,
  | "anonymous"     // (unnamed struct at main.c:3:9)
  | "eof";

export interface Token {
  type: TokenType;
  value: string;
  /** 0-based position of the token's first character. */
  offset: number;
}

const KEYWORDS = new Set(["struct", "union", "enum"]);

const QUALIFIERS = new Set([
  "const", "volatile", "restrict", "__restrict", "_Atomic",
  "_Nonnull", "_Nullable", "_Null_unspecified", "__unaligned",
]);

const BUILTINS = new Set([
  "void", "char", "short", "int", "long", "float", "double",
  "signed", "unsigned", "_Bool", "bool", "_Complex", "__int128", "_Float16", "__fp16",
]);

const PUNCTUATION = new Set(["*", "(", ")", "[", "]", ","]);

// clang >= 16 says "unnamed", older releases "anonymous".
const ANONYMOUS_TAG = /^\((?:unnamed|anonymous) (?:struct|union|enum) at [^)]*\)/;

export function tokenize(spelling: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  function peek(offset = 0): string {
    return spelling[i + offset] ?? "";
  }

  function readWhile(pattern: RegExp): string {
    let text = "";
    while (i < spelling.length && pattern.test(peek())) {
      text += peek();
      i++;
    }
    return text;
  }

  while (i < spelling.length) {
    readWhile(/\s/);
    if (i >= spelling.length) break;

    const start = i;
    const ch = peek();

    if (ch === "(") {
      const anonymous = ANONYMOUS_TAG.exec(spelling.slice(i));
      if (anonymous) {
        i += anonymous[0].length;
        tokens.push({ type: "anonymous", value: anonymous[0].slice(1, -1), offset: start });
        continue;
      }
    }

    if (/[0-9]/.test(ch)) {
      const value = readWhile(/[0-9a-zA-Z]/);
      tokens.push({ type: "number", value, offset: start });
      continue;
    }

    if (/[a-zA-Z_]/.test(ch)) {
      const word = readWhile(/[a-zA-Z0-9_]/);
      const type: TokenType = KEYWORDS.has(word)
        ? "keyword"
        : QUALIFIERS.has(word)
          ? "qualifier"
          : BUILTINS.has(word)
            ? "builtin"
            : "identifier";
      tokens.push({ type, value: word, offset: start });
      continue;
    }

    if (PUNCTUATION.has(ch)) {
      i++;
      tokens.push({ type: "punctuation", value: ch, offset: start });
      continue;
    }

    // Unknown character - skip
    i++;
  }

  tokens.push({ type: "eof", value: "", offset: spelling.length });
  return tokens;
}
