import { styleText } from "node:util";
import type { ParserError } from "../dsl/errors.ts";
import type {
  AnalysisResult,
  Diagnostic,
  SeverityLevel,
} from "../dsl/types.ts";

export type Styler = ReturnType<typeof createStyler>;

export function createStyler(noColor: boolean) {
  return function style(
    format: Parameters<typeof styleText>[0],
    text: string,
  ): string {
    if (noColor) {
      return text;
    }
    return styleText(format, text);
  };
}

export function isSeverityLevel(level: string): level is SeverityLevel {
  return level === "error" || level === "warning" || level === "info";
}

/** Diagnostics at or above `level`, errors first. */
export function selectDiagnostics(
  result: AnalysisResult,
  level: SeverityLevel,
): Diagnostic[] {
  const diagnostics: Diagnostic[] = [...result.errors];
  if (level === "warning" || level === "info") {
    diagnostics.push(...result.warnings);
  }
  if (level === "info") {
    diagnostics.push(...result.suggestions);
  }
  return diagnostics;
}

export function formatDiagnostics(
  diagnostics: Diagnostic[],
  style: Styler,
): string[] {
  const location = (d: Diagnostic) => `${d.file}:${d.line}:${d.column}:`;
  const width = diagnostics.reduce(
    (max, d) => Math.max(max, location(d).length),
    0,
  );

  return diagnostics.map((diagnostic) => {
    const prefix = location(diagnostic);
    const padding = " ".repeat(width - prefix.length);

    let label: string;
    switch (diagnostic.severity) {
      case "error":
        label = style("red", "error:");
        break;
      case "warning":
        label = style("yellow", "warning:");
        break;
      case "info":
        label = style("blue", "info:");
        break;
    }

    return `${style("cyan", prefix)}${padding} ${label} ${diagnostic.message}`;
  });
}

export function printAnalysisResults(
  result: AnalysisResult,
  style: Styler,
  level: SeverityLevel,
): void {
  const diagnostics = selectDiagnostics(result, level);
  formatDiagnostics(diagnostics, style).forEach((line, index) => {
    if (diagnostics[index]?.severity === "info") {
      console.log(line);
    } else {
      console.error(line);
    }
  });
}

export function formatParserError(error: ParserError, style: Styler): string {
  const prefix = style("cyan", `${error.file}:${error.line}:${error.column}:`);
  return `${prefix} ${style("red", "error:")} ${error.reason} (${error.kind})`;
}
