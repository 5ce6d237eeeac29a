import { command } from "cleye";
import path from "node:path";
import { createInterface } from "node:readline/promises";
import { ParserError } from "../../dsl/errors.ts";
import { FunctionDispatcher } from "../../runtime/dispatcher.ts";
import { ResolutionError, RuntimeError } from "../../runtime/errors.ts";
import { EngineLogger } from "../../runtime/logger.ts";
import { Navigator, type Output } from "../../runtime/navigator.ts";
import { DocumentRegistry } from "../../runtime/registry.ts";
import { FileSystemSource } from "../../runtime/sources.ts";
import { createStyler, type Styler } from "../format.ts";
import { demoFunctions } from "../hostFunctions.ts";

export interface PlayFlags {
  root: string | undefined;
  start: string | undefined;
  verbose: boolean;
  noColor: boolean;
}

function printOutput(output: Output, style: Styler): void {
  for (const segment of output.segments) {
    console.log(segment);
  }
  for (const warning of output.warnings) {
    console.error(style("yellow", `warning: ${warning}`));
  }
}

export async function play(file: string, flags: PlayFlags) {
  const style = createStyler(flags.noColor);
  const logger = new EngineLogger("cli", flags.verbose);
  const entry = path.basename(file);
  const root = flags.root ?? path.dirname(file);

  const registry = new DocumentRegistry({
    source: new FileSystemSource(root),
    entryFile: entry,
    logger: logger.child("registry"),
  });
  const dispatcher = new FunctionDispatcher(
    demoFunctions,
    logger.child("dispatcher"),
  );
  const navigator = new Navigator(registry, dispatcher, {
    ...(flags.start ? { startNode: flags.start } : {}),
    logger: logger.child("navigator"),
  });

  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "> ",
  });

  try {
    const first = navigator.start(entry);
    printOutput(first, style);
    if (first.exited) return;

    rl.prompt();
    for await (const line of rl) {
      const output = navigator.submitInput(line);
      printOutput(output, style);
      if (output.exited) break;
      rl.prompt();
    }
  } catch (error) {
    if (
      error instanceof ParserError ||
      error instanceof ResolutionError ||
      error instanceof RuntimeError
    ) {
      console.error(`${style("red", "error:")} ${error.message}`);
      process.exitCode = 1;
      return;
    }
    throw error;
  } finally {
    rl.close();
  }

  console.log(style("green", "Session ended."));
}

export const playCommand = command(
  {
    name: "play",

    help: {
      description:
        "Launch interactive simulator to play through a dialogue script",
    },

    parameters: ["<file>"],

    flags: {
      root: {
        type: String,
        alias: "r",
        description:
          "Directory the scripts are loaded from (default: the entry's directory)",
      },
      start: {
        type: String,
        alias: "s",
        description: "Begin the session at the specified node",
      },
      verbose: {
        type: Boolean,
        alias: "v",
        description: "Log registry, dispatcher and navigator activity",
        default: false,
      },
      noColor: {
        type: Boolean,
        description: "Disable colorized text output",
        default: false,
      },
    },
  },
  async (argv) => {
    await play(argv._.file, argv.flags);
  },
);
