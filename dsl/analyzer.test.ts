import { test, describe } from "node:test";
import assert from "node:assert";
import { Analyzer, type AnalyzerOptions } from "./analyzer.ts";
import { parse } from "./parser.ts";
import type { AnalysisResult } from "./types.ts";

const HEADER = [
  "# Topic: Demo",
  "# Description: A demo script",
  "# Author: Tester",
  "# Version: 1.0",
  "",
].join("\n");

describe("DSL Analyzer", () => {
  const prepareAnalysis = (
    sources: Record<string, string>,
    options?: AnalyzerOptions,
  ): AnalysisResult => {
    const analyzer = new Analyzer(options);
    for (const [name, body] of Object.entries(sources)) {
      analyzer.analyzeDocument(parse(HEADER + body, name, name === "main.bdl"));
    }
    return analyzer.finalizeAnalysis();
  };

  test("Checks empty nodes", () => {
    const result = prepareAnalysis({
      "main.bdl": "@start\nHi\n-> empty\n@empty\n",
    });

    const warnings = result.warnings.filter((w) => w.type === "empty_node");
    assert.strictEqual(warnings.length, 1);
    assert.strictEqual(warnings[0]?.node, "empty");
    assert.strictEqual(warnings[0]?.line, 8);
    assert.match(warnings[0]?.message ?? "", /empty and has no content/);

    // Warnings alone keep the result valid
    assert.strictEqual(result.valid, true);
  });

  test("Flags nodes without any branch as dead ends", () => {
    const result = prepareAnalysis({
      "main.bdl": [
        "@start",
        "Hello",
        "-> ask",
        "@ask",
        "!{getUserInput} : ~{answer}",
        "?{answer} -> finish",
        "@finish",
        "Goodbye",
      ].join("\n"),
    });

    const deadEnds = result.warnings.filter((w) => w.type === "dead_end");
    assert.deepStrictEqual(
      deadEnds.map((w) => [w.node, w.line]),
      [["finish", 11]],
    );
  });

  test("Checks branches after an unconditional jump", () => {
    const result = prepareAnalysis({
      "main.bdl": "@start\n-> a\n{x} -> a\n@a\n{back} -> start",
    });

    const shadowed = result.warnings.filter((w) => w.type === "shadowed_branch");
    assert.strictEqual(shadowed.length, 1);
    assert.strictEqual(shadowed[0]?.node, "start");
    assert.strictEqual(shadowed[0]?.line, 7);
  });

  test("Checks keywords handled by an earlier option", () => {
    const result = prepareAnalysis({
      "main.bdl": "@start\n{yes} -> a\n{yes, no} -> a\n@a\n{back} -> start",
    });

    const identical = result.warnings.filter(
      (w) => w.type === "identical_keyword",
    );
    assert.strictEqual(identical.length, 1);
    assert.strictEqual(
      identical[0]?.message,
      "Keyword 'yes' is already handled by the option on line 6; this one never matches it.",
    );
    assert.strictEqual(identical[0]?.line, 7);
  });

  test("Checks references to missing nodes", () => {
    const result = prepareAnalysis({
      "main.bdl": "@start\n{go} -> nowhere",
    });

    assert.strictEqual(result.valid, false);
    assert.deepStrictEqual(
      result.errors.map((e) => [e.type, e.message, e.line]),
      [["missing_node", "Reference to non-existent node: 'nowhere'", 6]],
    );
  });

  test("Checks calls against the known functions", () => {
    const source = {
      "main.bdl": "@start\n!{known} : ~{a}\n!{mystery} : ~{b}\n{x} -> start",
    };

    const checked = prepareAnalysis(source, { functions: ["known"] });
    assert.deepStrictEqual(
      checked.errors.map((e) => [e.type, e.message, e.line]),
      [["unknown_function", "Unknown function called: 'mystery'.", 7]],
    );

    const unchecked = prepareAnalysis(source);
    assert.deepStrictEqual(unchecked.errors, []);
  });

  test("Checks transfers between files", () => {
    const result = prepareAnalysis({
      "main.bdl": [
        "@start",
        "{go} -> [side.bdl:start]",
        "{lost} -> [side.bdl:nope]",
        "{far} -> [gone.bdl:start]",
      ].join("\n"),
      "side.bdl": "@start\n{back} -> [main.bdl:start]",
    });

    assert.deepStrictEqual(
      result.errors.map((e) => [e.type, e.file, e.line]),
      [
        ["missing_node", "main.bdl", 7],
        ["missing_file", "main.bdl", 8],
      ],
    );
    assert.deepStrictEqual(
      result.warnings
        .filter((w) => w.type === "undeclared_dependency")
        .map((w) => [w.file, w.line]),
      [
        ["main.bdl", 6],
        ["main.bdl", 7],
        ["main.bdl", 8],
        ["side.bdl", 6],
      ],
    );
  });

  test("Accepts transfers listed in the Required header", () => {
    const result = prepareAnalysis({
      "main.bdl": "# Required: side.bdl\n@start\n{go} -> [side.bdl:start]",
      "side.bdl": "# Required: main.bdl\n@start\n{back} -> [main.bdl:start]",
    });

    assert.deepStrictEqual(result.errors, []);
    assert.deepStrictEqual(result.warnings, []);
  });

  test("Requires a start node in the entry file", () => {
    const result = prepareAnalysis({
      "main.bdl": "@intro\nHi\n{x} -> intro",
    });

    assert.deepStrictEqual(
      result.errors.map((e) => [e.type, e.file, e.line, e.column]),
      [["missing_entry_point", "main.bdl", 1, 1]],
    );
  });

  test("Checks reachability from the start node", () => {
    const result = prepareAnalysis({
      "main.bdl": [
        "@start",
        "{a} -> next",
        "@next",
        "{b} -> start",
        "@island",
        "Alone",
        "{c} -> start",
      ].join("\n"),
    });

    const unreachable = result.warnings.filter(
      (w) => w.type === "unreachable_node",
    );
    assert.deepStrictEqual(
      unreachable.map((w) => [w.node, w.line, w.message]),
      [["island", 9, "Node 'island' is unreachable from the 'start' node."]],
    );
    assert.deepStrictEqual(result.suggestions, []);
  });

  test("Only suggests unreachable nodes when destinations are computed", () => {
    const result = prepareAnalysis({
      "main.bdl": [
        "@start",
        "!{pick} : ~{dest}",
        "-> ${dest}",
        "@island",
        "Alone",
        "{c} -> start",
      ].join("\n"),
    });

    assert.deepStrictEqual(
      result.warnings.filter((w) => w.type === "unreachable_node"),
      [],
    );
    assert.deepStrictEqual(
      result.suggestions.map((s) => [s.type, s.node]),
      [["possibly_unreachable_node", "island"]],
    );
  });

  test("Checks inescapable jump loops", () => {
    const result = prepareAnalysis({
      "main.bdl": "@start\n-> a\n@a\nA\n-> b\n@b\nB\n-> a",
    });

    const circular = result.warnings.filter(
      (w) => w.type === "circular_reference",
    );
    assert.deepStrictEqual(
      circular.map((w) => w.node),
      ["a", "b"],
    );
    assert.strictEqual(
      circular[0]?.message,
      "Node 'a' is part of an inescapable '->' loop: a -> b -> a",
    );
  });

  test("Checks variables that are never declared or bound", () => {
    const result = prepareAnalysis({
      "main.bdl": [
        '$global_vars: { user: "" }',
        "$local_vars: { score: 0 }",
        "@start",
        "!{f} : ~{result}",
        "${user} ${score} ${result} ${ghost} ${user.name}",
        "?{flag} -> start",
        "{x} -> start",
      ].join("\n"),
    });

    assert.deepStrictEqual(
      result.warnings
        .filter((w) => w.type === "undefined_variable")
        .map((w) => [w.message, w.line]),
      [
        ["Variable 'ghost' is never declared or bound; it will read as empty.", 9],
        ["Variable 'flag' is never declared or bound; it will read as empty.", 10],
      ],
    );
  });
});
