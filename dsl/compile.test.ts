import { test, describe } from "node:test";
import assert from "node:assert";
import { compileDocument, compileToJson } from "./compile.ts";
import { parse } from "./parser.ts";

const source = [
  "# Topic: Demo",
  "# Description: A demo script",
  "# Author: Tester",
  "# Version: 1.0",
  '$local_vars: { n: 1, m: { k: "v" } }',
  "@start",
  "Hi",
  "{go} -> start",
].join("\n");

describe("Compiler", () => {
  test("Compiles a document into plain objects", () => {
    const compiled = compileDocument(parse(source, "t.bdl", false));

    assert.deepStrictEqual(compiled, {
      name: "t.bdl",
      metadata: {
        topic: "Demo",
        description: "A demo script",
        author: "Tester",
        version: "1.0",
      },
      declaresGlobal: false,
      localDefaults: { n: 1, m: { k: "v" } },
      globalDefaults: {},
      nodes: [
        {
          name: "start",
          content: [{ type: "Text", text: "Hi", line: 7, column: 1 }],
          branches: [
            {
              type: "Option",
              keywords: ["go"],
              destination: { type: "Node", node: "start" },
              line: 8,
              column: 1,
            },
          ],
          line: 6,
        },
      ],
    });
  });

  test("Serialises to JSON", () => {
    const document = parse(source, "t.bdl", false);
    const json = compileToJson(document);

    assert.ok(!json.includes("\n"));
    assert.deepStrictEqual(JSON.parse(json), compileDocument(document));
    assert.strictEqual(
      compileToJson(document, true).split("\n")[1],
      '  "name": "t.bdl",',
    );
  });
});
