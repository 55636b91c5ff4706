#!/usr/bin/env tsx
/**
 * linkage-cli - sweep a rear-suspension linkage document from the command line.
 *
 * Built with Yargs + Zod: yargs declares the flags, zod checks them before
 * anything is loaded.
 */

import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import { DEFAULT_ITERATIONS, DEFAULT_STEPS } from "../ConstraintSolver";
import { CliError, toCliError } from "./cli-error";
import { formatStepTable, runSolve, solveSchema } from "./commands/solve";
import { validateLinkage, validateSchema } from "./commands/validate";

const terminalWidth = typeof process.stdout.columns === "number" ? process.stdout.columns : 120;

function guarded<T>(fn: () => T): T {
  try {
    return fn();
  } catch (err) {
    throw toCliError(err);
  }
}

yargs(hideBin(process.argv))
  .scriptName("linkage-cli")
  .usage("$0 <command> [options]")
  .strict()
  .demandCommand(1, "Specify a command.")
  .command(
    "solve",
    "Sweep the shock through its stroke and print travel and leverage per step.",
    cmd => cmd
      .option("file", { type: "string", demandOption: true, describe: "Linkage document (JSON)." })
      .option("steps", { type: "number", describe: "Stroke increments.", default: DEFAULT_STEPS })
      .option("iterations", { type: "number", describe: "Relaxation passes per step.", default: DEFAULT_ITERATIONS })
      .option("mm", { type: "boolean", describe: "Shock stroke is in millimeters; report lengths in millimeters." })
      .option("scale", { type: "number", describe: "Millimeters per pixel; overrides the document geometry." })
      .option("json", { type: "boolean", describe: "Emit machine-readable JSON." })
      .option("verbose", { type: "boolean", describe: "Log solver progress." }),
    async argv => {
      const options = solveSchema.parse(argv);
      const outcome = guarded(() => runSolve(options));
      if (options.json) {
        console.log(JSON.stringify(outcome, null, 2));
        return;
      }
      for (const line of formatStepTable(outcome)) {
        console.log(line);
      }
    }
  )
  .command(
    "validate",
    "Check that a linkage document compiles into a solvable mechanism.",
    cmd => cmd.option("file", { type: "string", demandOption: true, describe: "Linkage document (JSON)." }),
    async argv => {
      const options = validateSchema.parse(argv);
      for (const line of guarded(() => validateLinkage(options))) {
        console.log(line);
      }
      console.log("OK");
    }
  )
  .fail((msg, err, instance) => {
    if (err instanceof CliError) {
      console.error(err.message);
      process.exit(err.exitCode);
    }
    if (msg) {
      console.error(msg);
    }
    if (err) {
      console.error(err.message);
    }
    instance.showHelp();
    process.exit(1);
  })
  .wrap(Math.min(terminalWidth, 120))
  .parse();
