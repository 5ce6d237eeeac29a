import { command } from "cleye";
import fs from "node:fs/promises";
import path from "node:path";
import { Analyzer } from "../../dsl/analyzer.ts";
import { DEFAULT_ENTRY_FILE } from "../../dsl/constants.ts";
import type { ParserError } from "../../dsl/errors.ts";
import { parseScript } from "../../dsl/parser.ts";
import type { AnalysisResult, SeverityLevel } from "../../dsl/types.ts";
import {
  createStyler,
  formatParserError,
  isSeverityLevel,
  printAnalysisResults,
  selectDiagnostics,
} from "../format.ts";

type OutputFormat = "text" | "json";

export interface CheckFlags {
  format: OutputFormat;
  level: SeverityLevel;
  noColor: boolean;
  entry: string;
}

export interface CheckReport {
  files: string[];
  syntaxErrors: ParserError[];
  /** Files that could not be read, with the reason. */
  unreadable: { file: string; message: string }[];
  analysis: AnalysisResult;
}

/**
 * Parses every file, follows their Required headers to scripts in the same
 * directory, then analyses all documents that parsed.
 */
export async function collectReport(
  files: string[],
  entry: string,
): Promise<CheckReport> {
  const analyzer = new Analyzer();
  const report: Omit<CheckReport, "analysis"> = {
    files: [],
    syntaxErrors: [],
    unreadable: [],
  };

  const pending = files.map((file) => path.resolve(file));
  const seen = new Set<string>();

  for (let filePath = pending.shift(); filePath; filePath = pending.shift()) {
    if (seen.has(filePath)) continue;
    seen.add(filePath);

    const name = path.basename(filePath);
    let source: string;
    try {
      source = await fs.readFile(filePath, { encoding: "utf-8" });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      report.unreadable.push({ file: name, message });
      continue;
    }

    report.files.push(name);
    const result = parseScript(source, name, name === entry);
    report.syntaxErrors.push(...result.errors);
    if (!result.value) continue;

    analyzer.analyzeDocument(result.value);
    for (const dependency of result.value.metadata.required ?? []) {
      pending.push(path.join(path.dirname(filePath), dependency));
    }
  }

  return { ...report, analysis: analyzer.finalizeAnalysis() };
}

export function isClean(report: CheckReport): boolean {
  return (
    report.syntaxErrors.length === 0 &&
    report.unreadable.length === 0 &&
    report.analysis.valid
  );
}

export async function check(files: string[], flags: CheckFlags) {
  const { format, level, noColor, entry } = flags;
  const style = createStyler(noColor);
  const report = await collectReport(files, entry);

  if (format === "json") {
    console.log(
      JSON.stringify(
        {
          type: "check_report",
          files: report.files,
          unreadable: report.unreadable,
          syntaxErrors: report.syntaxErrors.map((err) => ({
            kind: err.kind,
            file: err.file,
            line: err.line,
            column: err.column,
            message: err.reason,
          })),
          errors: report.analysis.errors,
          warnings: report.analysis.warnings,
          suggestions: report.analysis.suggestions,
        },
        null,
        2,
      ),
    );
    return isClean(report);
  }

  for (const { file, message } of report.unreadable) {
    console.error(`${style("red", "Error")} reading file ${file}: ${message}`);
  }
  for (const error of report.syntaxErrors) {
    console.error(formatParserError(error, style));
  }
  printAnalysisResults(report.analysis, style, level);

  const reported =
    report.unreadable.length +
    report.syntaxErrors.length +
    selectDiagnostics(report.analysis, level).length;
  if (reported === 0) {
    console.log(
      style(
        "green",
        `Analysis of ${report.files.join(", ")} completed successfully. No issues found.`,
      ),
    );
  }
  return isClean(report);
}

function Format(format: string): OutputFormat {
  if (format !== "text" && format !== "json") {
    throw new Error(`Invalid output format: "${format}"`);
  }
  return format;
}

function Level(level: string): SeverityLevel {
  if (!isSeverityLevel(level)) {
    throw new Error(`Invalid diagnostic level: "${level}"`);
  }
  return level;
}

const DEFAULT_FORMAT: OutputFormat = "text";
const DEFAULT_LEVEL: SeverityLevel = "error";

export const checkCommand = command(
  {
    name: "check",
    help: {
      description: "Analyze .bdl scripts for errors, warnings, and suggestions",
    },
    parameters: ["<files...>"],
    flags: {
      format: {
        type: Format,
        alias: "f",
        description: "Output format: text (default) or json",
        default: DEFAULT_FORMAT,
      },
      level: {
        type: Level,
        alias: "l",
        description:
          "Minimum diagnostic level: error (default), warning, or info",
        default: DEFAULT_LEVEL,
      },
      noColor: {
        type: Boolean,
        description: "Disable colorized text output",
        default: false,
      },
      entry: {
        type: String,
        alias: "e",
        description: `Name of the entry script (default: ${DEFAULT_ENTRY_FILE})`,
        default: DEFAULT_ENTRY_FILE,
      },
    },
  },
  async (argv) => {
    const clean = await check(argv._.files, argv.flags);
    if (!clean) {
      process.exitCode = 1;
    }
  },
);
