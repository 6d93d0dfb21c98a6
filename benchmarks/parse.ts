import yargs from "yargs";
import { hideBin } from "yargs/helpers";
import path from "path";

export type RunArgs = {
  command: "run";
  /** Plan file, or directory of plan files */
  planPath: string;
  repetitions: number | undefined;
  reposRoot: string | undefined;
  output: string | undefined;
};

export type ReportArgs = {
  command: "report";
  resultsFile: string;
};

export type CliArgs = RunArgs | ReportArgs;

/**
 * Parses command line arguments and resolves paths
 */
export async function parseCliArgs(
  args: string[] = hideBin(process.argv),
  cwd: string = process.cwd()
): Promise<CliArgs> {
  const argv = await yargs(args)
    .scriptName("buildbench")
    .usage("Usage: $0 <command> [options]")
    .command("run <plan>", "Run a benchmark plan (or every plan in a directory)", (command) =>
      command
        .positional("plan", {
          describe: "Path to a plan .yml file or a directory of plans",
          type: "string",
          demandOption: true,
        })
        .option("repetitions", {
          alias: "r",
          type: "number",
          description: "Repetitions per suite (overrides the plan)",
        })
        .option("repos-root", {
          type: "string",
          description: "Directory containing the repo checkouts (overrides the plan)",
        })
        .option("output", {
          alias: "o",
          type: "string",
          description: "CSV file to write (overrides the plan)",
        })
    )
    .command("report <results>", "Print a results CSV as a Markdown table", (command) =>
      command.positional("results", {
        describe: "Path to a results CSV",
        type: "string",
        demandOption: true,
      })
    )
    .demandCommand(1, "A command is required")
    .strict()
    .help()
    .alias("h", "help")
    .parseAsync();

  const [command] = argv._;
  const resolve = (value: string) => path.resolve(cwd, value);

  if (command === "report") {
    const results = argv.results;
    if (typeof results !== "string") {
      throw new Error("results is required");
    }
    return { command: "report", resultsFile: resolve(results) };
  }

  if (command !== "run") {
    throw new Error(`Unknown command: ${String(command)}`);
  }

  const plan = argv.plan;
  if (typeof plan !== "string") {
    throw new Error("plan is required");
  }

  let repetitions: number | undefined;
  if (argv.repetitions !== undefined) {
    const value = argv.repetitions;
    if (typeof value !== "number" || !Number.isInteger(value) || value < 1) {
      throw new Error(`--repetitions must be a positive integer, got ${String(value)}`);
    }
    repetitions = value;
  }

  const reposRoot = argv["repos-root"];
  const output = argv.output;

  return {
    command: "run",
    planPath: resolve(plan),
    repetitions,
    reposRoot: typeof reposRoot === "string" ? resolve(reposRoot) : undefined,
    output: typeof output === "string" ? resolve(output) : undefined,
  };
}
