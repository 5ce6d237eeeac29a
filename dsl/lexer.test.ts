import { test, describe } from "node:test";
import assert from "node:assert";
import { Lexer } from "./lexer.ts";

describe("DSL Lexer", () => {
  test("Classifies every physical line", () => {
    const source = [
      "# Topic: Demo",
      "",
      "$local_vars: { a: 1 }",
      "@start",
      "  Hello ${name}",
      "!{lookup} : ~{x}",
      "{yes} -> next",
      "?{x} -> next",
      "-> next",
      "$other: 1",
    ].join("\n");

    const types = new Lexer(source).lex().map((token) => token.type);
    assert.deepStrictEqual(types, [
      "COMMENT",
      "BLANK",
      "VAR_BLOCK",
      "NODE_HEADER",
      "TEXT",
      "CALL",
      "BRANCH",
      "BRANCH",
      "BRANCH",
      "TEXT",
    ]);
  });

  test("Trims text and records the column of the first character", () => {
    const [token] = new Lexer("    Hello there  ").lex();
    assert.deepStrictEqual(token, {
      type: "TEXT",
      text: "Hello there",
      line: 1,
      column: 5,
    });
  });

  test("Counts \\r\\n as one line break", () => {
    const tokens = new Lexer("@a\r\nHi\r\n\r\n@b\n").lex();
    assert.deepStrictEqual(
      tokens.map((token) => [token.type, token.line]),
      [
        ["NODE_HEADER", 1],
        ["TEXT", 2],
        ["BLANK", 3],
        ["NODE_HEADER", 4],
      ],
    );
  });

  test("Yields tokens lazily", () => {
    const iterator = new Lexer("@a\n@b").tokenize();
    const first = iterator.next();
    assert.strictEqual(first.done ? null : first.value.text, "@a");
    const second = iterator.next();
    assert.strictEqual(second.done ? null : second.value.line, 2);
    assert.strictEqual(iterator.next().done, true);
  });
});
