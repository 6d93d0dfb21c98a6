import type { ExecutionContext } from "./context.js";
import { PlanError } from "./errors.js";
import type { ResultTable } from "./model.js";
import { runTests } from "./orchestrator.js";
import { planEnvironment, type BenchmarkPlan } from "./plan.js";
import { buildResultTable, writeResultsCsv } from "./report.js";

/**
 * CLI overrides for plan settings
 */
export type PlanOverrides = {
  repetitions?: number;
  reposRoot?: string;
  output?: string;
};

export type PlanRunResult = {
  plan: string;
  resultsFile: string;
  table: ResultTable;
};

/**
 * Runs every suite of a plan and writes its CSV. Nothing is written when the
 * run fails.
 */
export async function runPlan(
  plan: BenchmarkPlan,
  overrides: PlanOverrides,
  context: ExecutionContext
): Promise<PlanRunResult> {
  const reposRoot = overrides.reposRoot ?? plan.reposRoot;
  if (reposRoot === undefined) {
    throw new PlanError(plan.file, "repos_root is not set; pass --repos-root");
  }

  const repetitions = overrides.repetitions ?? plan.repetitions;
  const output = overrides.output ?? plan.output;

  context.logger.info(
    {
      plan: plan.file,
      repos_root: reposRoot,
      repetitions,
      repos: plan.repos.length,
      suites: plan.suites.length,
    },
    "Running benchmark plan"
  );

  const runContext: ExecutionContext = {
    ...context,
    env: planEnvironment(plan, context.env),
  };

  const repoResults = await runTests({
    repos: plan.repos,
    reposRoot,
    suites: plan.suites,
    repetitions,
    context: runContext,
  });

  const resultsFile = writeResultsCsv(repoResults, output, context.logger);

  return { plan: plan.file, resultsFile, table: buildResultTable(repoResults) };
}
