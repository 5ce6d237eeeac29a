import { ARROW, varBlockScopes } from "./constants.ts";
import type { LineToken, LineTokenType } from "./types.ts";

function createToken(
  type: LineTokenType,
  text: string,
  line: number,
  column: number,
): LineToken {
  return { type, text, line, column };
}

/**
 * Splits a script into classified lines. BDL is line oriented, so every
 * physical line becomes exactly one token and the parser decides what a
 * line means in context (a TEXT line inside a declaration block is part of
 * the block, not dialogue).
 */
export class Lexer {
  position: number = 0;
  line: number = 1;

  sourceLength: number;

  constructor(public source: string) {
    this.sourceLength = source.length;
  }

  *tokenize(): Generator<LineToken, void, undefined> {
    while (this.position < this.sourceLength) {
      const raw = this.readLine();
      yield this.classify(raw, this.line);
      this.line++;
    }
  }

  lex(): LineToken[] {
    return Array.from(this.tokenize());
  }

  private classify(raw: string, line: number): LineToken {
    const text = raw.trim();
    const column = raw.length - raw.trimStart().length + 1;

    switch (true) {
      case text.length === 0:
        return createToken("BLANK", text, line, column);
      case text.startsWith("#"):
        return createToken("COMMENT", text, line, column);
      case this.isVarBlock(text):
        return createToken("VAR_BLOCK", text, line, column);
      case text.startsWith("@"):
        return createToken("NODE_HEADER", text, line, column);
      case text.startsWith("!{"):
        return createToken("CALL", text, line, column);
      case text.startsWith("{") ||
        text.startsWith("?{") ||
        text.startsWith(ARROW):
        return createToken("BRANCH", text, line, column);
      default:
        return createToken("TEXT", text, line, column);
    }
  }

  private isVarBlock(text: string): boolean {
    if (!text.startsWith("$")) return false;
    const colon = text.indexOf(":");
    if (colon === -1) return false;
    return varBlockScopes.has(text.slice(0, colon).trim());
  }

  private readLine(): string {
    let result = "";
    let char = this.peek();
    while (char !== undefined && !this.isNewline(char)) {
      result += char;
      this.position++;
      char = this.peek();
    }

    const newline = char;
    if (newline !== undefined) {
      this.position++;
      if (newline === "\r" && this.peek() === "\n") {
        this.position++; // \r\n counts as one line break
      }
    }
    return result;
  }

  private peek(): string | undefined {
    if (this.position >= this.sourceLength) return undefined;
    return this.source[this.position];
  }

  private isNewline(char: string): boolean {
    return char === "\n" || char === "\r";
  }
}
