import { cli } from "cleye";
import { checkCommand } from "./commands/check.ts";
import { compileCommand } from "./commands/compile.ts";
import { playCommand } from "./commands/play.ts";

cli({
  name: "bdl",
  version: "1.0.0",
  help: {
    description:
      "BDL CLI - check, compile and play branching-dialogue scripts",
  },
  commands: [checkCommand, compileCommand, playCommand],
});
