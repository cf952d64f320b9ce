// ============================================================================
// Parser - Classifies a clang type spelling
// ============================================================================

import { tokenize, type Token, type TokenType } from "./tokenizer.js";
import type { SpellingNode, TagKeyword } from "./ast.js";

export class ParseError extends Error {
  constructor(message: string, public token: Token, public spelling: string) {
    super(`${message} at offset ${token.offset} of "${spelling}" (got ${token.type}: "${token.value}")`);
  }
}

/**
 * Reads the outermost layer of a spelling. Pointers keep the text of their
 * pointee so it can be resolved (and spelled) on its own.
 */
export class SpellingParser {
  private pos = 0;
  private tokens: Token[];

  constructor(private spelling: string) {
    this.tokens = tokenize(spelling);
  }

  parse(): SpellingNode {
    const declarator = this.parseDeclarator();
    if (declarator) {
      return declarator;
    }
    return this.parseSpecifiers();
  }

  // ---------------------------------------------------------------------------
  // Token navigation
  // ---------------------------------------------------------------------------

  private peek(): Token {
    return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1];
  }

  private advance(): Token {
    const token = this.peek();
    if (token.type !== "eof") this.pos++;
    return token;
  }

  private match(type: TokenType, value?: string): Token | null {
    const next = this.peek();
    if (next.type === type && (value === undefined || next.value === value)) {
      return this.advance();
    }
    return null;
  }

  private skipQualifiers(): void {
    while (this.peek().type === "qualifier") {
      this.advance();
    }
  }

  // ---------------------------------------------------------------------------
  // Abstract declarator: "*", "[4]", "(*)(int)"
  // ---------------------------------------------------------------------------

  private parseDeclarator(): SpellingNode | null {
    // The outermost layer is whatever the spelling ends with, qualifiers aside.
    let last = this.tokens.length - 2;
    while (last >= 0 && this.tokens[last].type === "qualifier") {
      last--;
    }
    if (last < 0) return null;

    const token = this.tokens[last];
    if (token.type !== "punctuation") {
      const stray = this.tokens.find((t) => t.type === "punctuation");
      if (stray) {
        throw new ParseError("Unexpected punctuation before the type specifier", stray, this.spelling);
      }
      return null;
    }

    switch (token.value) {
      case "*": {
        const pointee = this.spelling.slice(0, token.offset).trimEnd();
        if (pointee.length === 0) {
          throw new ParseError("Pointer without a pointee type", token, this.spelling);
        }
        return { kind: "pointer", pointee };
      }
      case "]":
        return { kind: "array" };
      case ")":
        return { kind: "function" };
      default:
        throw new ParseError("Unexpected punctuation", token, this.spelling);
    }
  }

  // ---------------------------------------------------------------------------
  // Specifiers: "unsigned int", "struct point", "point_t"
  // ---------------------------------------------------------------------------

  private parseSpecifiers(): SpellingNode {
    this.skipQualifiers();
    const token = this.peek();
    let node: SpellingNode;

    if (token.type === "keyword") {
      node = this.parseTag();
    } else if (token.type === "builtin") {
      const words: string[] = [];
      while (this.peek().type === "builtin") {
        words.push(this.advance().value);
        this.skipQualifiers();
      }
      node = { kind: "builtin", words };
    } else if (token.type === "identifier") {
      node = { kind: "typedef", name: this.advance().value };
    } else {
      throw new ParseError("Expected a type specifier", token, this.spelling);
    }

    this.skipQualifiers();
    const rest = this.peek();
    if (rest.type !== "eof") {
      throw new ParseError("Unexpected token after type specifier", rest, this.spelling);
    }
    return node;
  }

  private parseTag(): SpellingNode {
    const keyword = this.advance();
    const tag = toTagKeyword(keyword.value);
    if (!tag) {
      throw new ParseError("Expected struct, union or enum", keyword, this.spelling);
    }

    const anonymous = this.match("anonymous");
    if (anonymous) {
      // "unnamed struct at main.c:3:9"
      const location = anonymous.value.replace(/^\S+ \S+ at /, "");
      return { kind: "anonymous_tag", tag, location };
    }

    const name = this.match("identifier");
    if (!name) {
      throw new ParseError(`Expected a ${tag} name`, this.peek(), this.spelling);
    }
    return { kind: "tag", tag, name: name.value };
  }
}

/** Parse a single spelling. */
export function parseSpelling(spelling: string): SpellingNode {
  return new SpellingParser(spelling).parse();
}

function toTagKeyword(value: string): TagKeyword | null {
  return value === "struct" || value === "union" || value === "enum" ? value : null;
}
