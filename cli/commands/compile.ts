import { command } from "cleye";
import fs from "node:fs/promises";
import path from "node:path";
import { compileToJson } from "../../dsl/compile.ts";
import { DEFAULT_ENTRY_FILE } from "../../dsl/constants.ts";
import { parseScript } from "../../dsl/parser.ts";
import { createStyler, formatParserError } from "../format.ts";

export interface CompileFlags {
  output: string | undefined;
  pretty: boolean;
  entry: string;
  noColor: boolean;
}

/** Returns false when the script could not be read or did not parse. */
export async function compile(file: string, flags: CompileFlags) {
  const style = createStyler(flags.noColor);
  const name = path.basename(file);
  let source: string;
  try {
    source = await fs.readFile(file, { encoding: "utf-8" });
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`${style("red", "Error")} reading file ${name}: ${message}`);
    return false;
  }

  const result = parseScript(source, name, name === flags.entry);

  if (!result.value) {
    for (const error of result.errors) {
      console.error(formatParserError(error, style));
    }
    return false;
  }

  const json = compileToJson(result.value, flags.pretty);
  if (flags.output) {
    await fs.writeFile(flags.output, json + "\n", { encoding: "utf-8" });
    console.log(style("green", `Compiled ${name} to ${flags.output}`));
  } else {
    console.log(json);
  }
  return true;
}

export const compileCommand = command(
  {
    name: "compile",
    help: {
      description: "Transform a .bdl script into machine-readable JSON",
    },
    parameters: ["<file>"],
    flags: {
      output: {
        type: String,
        alias: "o",
        description: "File path to write the output to",
      },
      pretty: {
        type: Boolean,
        alias: "p",
        description: "Format JSON output with indentation",
        default: false,
      },
      entry: {
        type: String,
        alias: "e",
        description: `Name of the entry script (default: ${DEFAULT_ENTRY_FILE})`,
        default: DEFAULT_ENTRY_FILE,
      },
      noColor: {
        type: Boolean,
        description: "Disable colorized text output",
        default: false,
      },
    },
  },
  async (argv) => {
    const compiled = await compile(argv._.file, argv.flags);
    if (!compiled) {
      process.exitCode = 1;
    }
  },
);
