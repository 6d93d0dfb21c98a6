#!/usr/bin/env node

// Handle EPIPE errors gracefully (e.g., when piping to `head` or `jq` that closes early)
process.stdout.on("error", (error: NodeJS.ErrnoException) => {
  if (error.code === "EPIPE") {
    process.exit(0);
  }
  throw error;
});

import { createExecutionContext } from "./context.js";
import { errorMessage } from "./errors.js";
import { getLogger } from "./logger.js";
import { parseCliArgs, type ReportArgs, type RunArgs } from "./parse.js";
import { discoverPlans, loadPlan } from "./plan.js";
import { runPlan } from "./plan-runner.js";
import { formatMarkdownTable, readResultsCsv } from "./report.js";

const logger = getLogger();

async function runCommand(args: RunArgs): Promise<void> {
  const planFiles = discoverPlans(args.planPath);
  if (planFiles.length === 0) {
    throw new Error(`No plan files found in ${args.planPath}`);
  }

  logger.info({ plans: planFiles.length }, `Found ${planFiles.length} plan(s)`);

  // Load every plan up front so a broken file fails before any build runs
  const plans = planFiles.map((file) => loadPlan(file));
  if (plans.length > 1 && args.output !== undefined) {
    throw new Error("--output cannot be combined with a directory of plans");
  }
  const context = createExecutionContext({ logger });

  for (const [index, plan] of plans.entries()) {
    logger.info(`[${index + 1}/${plans.length}] ${plan.file}`);

    const result = await runPlan(
      plan,
      {
        repetitions: args.repetitions,
        reposRoot: args.reposRoot,
        output: args.output,
      },
      context
    );

    console.log(`\n## ${result.plan}\n`);
    console.log(formatMarkdownTable(result.table));
    console.log(`\nResults: ${result.resultsFile}\n`);
  }
}

function reportCommand(args: ReportArgs): void {
  const table = readResultsCsv(args.resultsFile);
  console.log(formatMarkdownTable(table));
}

async function main() {
  const args = await parseCliArgs();

  switch (args.command) {
    case "run":
      await runCommand(args);
      break;
    case "report":
      reportCommand(args);
      break;
  }
}

main().catch((error: unknown) => {
  const err = error instanceof Error ? error : new Error(String(error));
  logger.error({ error: errorMessage(err), stack: err.stack }, "Benchmark failed");
  process.exitCode = 1;
});
