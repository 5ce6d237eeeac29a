import type { ParseErrorKind } from "./errors.ts";
import type { LineToken, Value, ValueMap } from "./types.ts";

type Fail = (
  kind: ParseErrorKind,
  message: string,
  line: number,
  column: number,
) => never;

export interface DeclarationBlock {
  values: ValueMap;
  /** Number of line tokens the block spans, counting the opening line. */
  consumed: number;
}

const NUMBER_PATTERN = /^-?\d+(\.\d+)?$/;

/**
 * Reads a brace-delimited `name: value` block that may span several lines
 * and nest. Works over line tokens so positions in errors point back into
 * the script.
 */
export class DeclarationReader {
  private lineIndex = 0;
  private offset = 0;

  constructor(
    private lines: LineToken[],
    private fail: Fail,
  ) {}

  read(): DeclarationBlock {
    this.skipSpaces();
    if (this.peek() !== "{") {
      this.error("Expected '{' to open the declaration block");
    }

    const values = this.readBlock();

    this.skipSpaces();
    if (this.peek() !== undefined && this.peek() !== "\n") {
      this.error("Unexpected text after the closing '}' of the block");
    }

    return { values, consumed: this.lineIndex + 1 };
  }

  private readBlock(): ValueMap {
    const openLine = this.currentLine();
    this.advance(); // {
    const values: ValueMap = new Map();

    for (;;) {
      this.skipSeparators();
      const char = this.peek();

      if (char === undefined) {
        this.fail(
          "MalformedDeclaration",
          "Unterminated declaration block, expected '}'",
          openLine.line,
          openLine.column,
        );
      }
      if (char === "}") {
        this.advance();
        return values;
      }

      const nameLine = this.currentLine().line;
      const nameColumn = this.currentColumn();
      const name = this.readUntil((c) => !this.isNameChar(c));
      if (!name) {
        this.error(`Expected a variable name, got '${char}'`);
      }

      this.skipSpaces();
      if (this.peek() !== ":") {
        this.error(`Expected ':' after variable name '${name}'`);
      }
      this.advance();
      this.skipSpaces();

      const value = this.readValue();
      if (values.has(name)) {
        this.fail(
          "DuplicateVariable",
          `Variable '${name}' is declared more than once in this scope`,
          nameLine,
          nameColumn,
        );
      }
      values.set(name, value);

      this.skipSpaces();
      const next = this.peek();
      if (next !== "," && next !== "\n" && next !== "}" && next !== undefined) {
        this.error(`Expected ',' or a new line after the value of '${name}'`);
      }
    }
  }

  private readValue(): Value {
    const char = this.peek();
    if (
      char === undefined ||
      char === "," ||
      char === "\n" ||
      char === "}"
    ) {
      return null;
    }
    if (char === '"') return this.readString();
    if (char === "{") return this.readBlock();

    const word = this.readUntil(
      (c) => c === "," || c === "}" || c === "\n" || this.isSpace(c),
    );
    if (word === "true") return true;
    if (word === "false") return false;
    if (NUMBER_PATTERN.test(word)) return Number(word);

    this.error(
      `Invalid value '${word}'. Use a quoted string, a number, true, false or {}`,
    );
  }

  private readString(): string {
    this.advance(); // "
    let content = "";

    for (;;) {
      const char = this.peek();
      if (char === undefined || char === "\n") {
        this.error("Unterminated string literal");
      }
      this.advance();

      if (char === '"') return content;
      if (char === "\\") {
        const escaped = this.peek();
        if (escaped === '"' || escaped === "\\") {
          content += escaped;
          this.advance();
          continue;
        }
      }
      content += char;
    }
  }

  private skipSeparators(): void {
    for (;;) {
      if (this.offset === 0 && this.currentLine().text.startsWith("#")) {
        this.skipUntilEndOfLine();
      }
      const char = this.peek();
      if (char === "," || char === "\n" || (char && this.isSpace(char))) {
        this.advance();
        continue;
      }
      return;
    }
  }

  private skipSpaces(): void {
    let char = this.peek();
    while (char !== undefined && this.isSpace(char)) {
      this.advance();
      char = this.peek();
    }
  }

  private skipUntilEndOfLine(): void {
    this.offset = this.currentLine().text.length;
  }

  private readUntil(predicate: (char: string) => boolean): string {
    let result = "";
    let char = this.peek();
    while (char !== undefined && !predicate(char)) {
      result += char;
      this.advance();
      char = this.peek();
    }
    return result;
  }

  /** Line ends read as "\n"; the end of the last line reads as undefined. */
  private peek(): string | undefined {
    const text = this.currentLine().text;
    if (this.offset < text.length) return text[this.offset];
    if (this.lineIndex < this.lines.length - 1) return "\n";
    return undefined;
  }

  private advance(): void {
    if (this.offset < this.currentLine().text.length) {
      this.offset++;
    } else if (this.lineIndex < this.lines.length - 1) {
      this.lineIndex++;
      this.offset = 0;
    }
  }

  private currentLine(): LineToken {
    const token = this.lines[this.lineIndex];
    if (!token) {
      throw new Error(`Declaration reader ran past line ${this.lineIndex}`);
    }
    return token;
  }

  private currentColumn(): number {
    return this.currentLine().column + this.offset;
  }

  private error(message: string): never {
    this.fail(
      "MalformedDeclaration",
      message,
      this.currentLine().line,
      this.currentColumn(),
    );
  }

  private isSpace(char: string): boolean {
    return char === " " || char === "\t";
  }

  private isNameChar(char: string): boolean {
    return (
      (char >= "a" && char <= "z") ||
      (char >= "A" && char <= "Z") ||
      (char >= "0" && char <= "9") ||
      char === "_"
    );
  }
}
