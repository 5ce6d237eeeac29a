import { test, describe } from "node:test";
import assert from "node:assert";
import { ParserError } from "../dsl/errors.ts";
import type {
  AnalysisError,
  AnalysisResult,
  AnalysisSuggestion,
  AnalysisWarning,
} from "../dsl/types.ts";
import {
  createStyler,
  formatDiagnostics,
  formatParserError,
  isSeverityLevel,
  selectDiagnostics,
} from "./format.ts";

const plain = createStyler(true);

const error: AnalysisError = {
  type: "missing_node",
  message: "Bad",
  file: "a.bdl",
  line: 7,
  column: 1,
  severity: "error",
};
const warning: AnalysisWarning = {
  type: "dead_end",
  message: "Odd",
  file: "long.bdl",
  line: 12,
  column: 3,
  severity: "warning",
};
const suggestion: AnalysisSuggestion = {
  type: "possibly_unreachable_node",
  message: "Maybe",
  file: "a.bdl",
  line: 9,
  column: 1,
  severity: "info",
};

const result: AnalysisResult = {
  valid: false,
  errors: [error],
  warnings: [warning],
  suggestions: [suggestion],
};

describe("CLI formatting", () => {
  test("Selects diagnostics at or above a level", () => {
    assert.deepStrictEqual(selectDiagnostics(result, "error"), [error]);
    assert.deepStrictEqual(selectDiagnostics(result, "warning"), [error, warning]);
    assert.deepStrictEqual(selectDiagnostics(result, "info"), [
      error,
      warning,
      suggestion,
    ]);
  });

  test("Aligns diagnostic messages", () => {
    assert.deepStrictEqual(formatDiagnostics([error, warning, suggestion], plain), [
      "a.bdl:7:1:     error: Bad",
      "long.bdl:12:3: warning: Odd",
      "a.bdl:9:1:     info: Maybe",
    ]);
  });

  test("Formats parser errors on one line", () => {
    const parserError = new ParserError("MalformedCall", "Bad thing", "x.bdl", 2, 3);
    assert.strictEqual(
      formatParserError(parserError, plain),
      "x.bdl:2:3: error: Bad thing (MalformedCall)",
    );
  });

  test("Recognises severity levels", () => {
    assert.strictEqual(isSeverityLevel("warning"), true);
    assert.strictEqual(isSeverityLevel("fatal"), false);
  });
});
