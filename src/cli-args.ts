/**
 * Command-line argument parsing for the workflow CLI
 */

import { InputError } from "./utils/errors.js";

export type CliCommand =
  | {
      command: "run";
      inputPath: string;
      outputDir?: string;
      stageNames?: string[];
      configPath?: string;
    }
  | {
      command: "resume";
      runDir?: string;
      fromStage: string;
      outputDir?: string;
      stageNames?: string[];
      configPath?: string;
    }
  | { command: "help" }
  | { command: "version" };

export const USAGE = `Usage:
  orm-sql-refinery run --input <dataset.json|dir> [--output <dir>] [--stages a,b,c] [--config <workflow.json>]
  orm-sql-refinery resume --from <stage> [--run <run dir>] [--output <dir>] [--stages a,b,c] [--config <workflow.json>]
  orm-sql-refinery --help | --version

Without --run, resume picks the latest run directory under the output directory.`;

function parseStageList(value: string): string[] {
  const names = value
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
  if (names.length === 0) {
    throw new InputError("--stages needs at least one stage name");
  }
  return names;
}

/**
 * @throws InputError on unknown commands, unknown flags or missing values
 */
export function parseCliArgs(argv: readonly string[]): CliCommand {
  const [command, ...rest] = argv;
  if (command === undefined || command === "--help" || command === "-h" || command === "help") {
    return { command: "help" };
  }
  if (command === "--version" || command === "-v") {
    return { command: "version" };
  }
  if (command !== "run" && command !== "resume") {
    throw new InputError(`Unknown command: ${command}`);
  }

  const flags = new Map<string, string>();
  for (let i = 0; i < rest.length; i += 1) {
    const arg = rest[i];
    if (!arg.startsWith("--")) {
      throw new InputError(`Unexpected argument: ${arg}`);
    }
    const value = rest[i + 1];
    if (value === undefined || value.startsWith("--")) {
      throw new InputError(`Missing value for ${arg}`);
    }
    flags.set(arg.slice(2), value);
    i += 1;
  }

  const allowed = command === "run" ? ["input", "output", "stages", "config"] : ["run", "from", "output", "stages", "config"];
  for (const name of flags.keys()) {
    if (!allowed.includes(name)) {
      throw new InputError(`Unknown option for ${command}: --${name}`);
    }
  }

  const stages = flags.get("stages");
  const common = {
    outputDir: flags.get("output"),
    stageNames: stages === undefined ? undefined : parseStageList(stages),
    configPath: flags.get("config"),
  };

  if (command === "run") {
    const inputPath = flags.get("input");
    if (!inputPath) throw new InputError("run needs --input <dataset.json>");
    return { command, inputPath, ...common };
  }

  const fromStage = flags.get("from");
  if (!fromStage) throw new InputError("resume needs --from <stage>");
  return { command, fromStage, runDir: flags.get("run"), ...common };
}
