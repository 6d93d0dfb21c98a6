/**
 * Runs every suite against every configured repo sub-directory.
 *
 * Execution is strictly sequential: concurrent builds would contend for the
 * same working tree and skew the timings. Any error aborts the whole run.
 */

import * as fs from "fs";
import * as path from "path";
import { createExecutionContext, type ExecutionContext } from "./context.js";
import { invariant } from "./errors.js";
import { banner } from "./logger.js";
import type { RepoResults, RepoSpec, TestSuiteResult } from "./model.js";
import { repeatTestSuite } from "./repeater.js";
import { RootedRepo } from "./repo.js";
import type { TestSuite } from "./test-suite.js";

/**
 * Parameters for a benchmark run
 */
export interface RunTestsParams {
  repos: readonly RepoSpec[];
  reposRoot: string;
  suites: readonly TestSuite[];
  repetitions?: number;
  context?: ExecutionContext;
}

export async function runTests(params: RunTestsParams): Promise<RepoResults[]> {
  const { repos, suites, repetitions = 1 } = params;
  const context = params.context ?? createExecutionContext();
  const { logger } = context;

  invariant(
    fs.existsSync(params.reposRoot) && fs.statSync(params.reposRoot).isDirectory(),
    `Repos root is not a directory: ${params.reposRoot}`
  );
  invariant(repos.length > 0, "At least one repo is required");
  invariant(suites.length > 0, "At least one test suite is required");

  const reposRoot = fs.realpathSync(params.reposRoot);
  const rootedRepos = repos.map((repo) => new RootedRepo(reposRoot, repo));

  const repoResults: RepoResults[] = [];

  for (const repo of rootedRepos) {
    for (const subDirectory of repo.subDirectories) {
      // Named after the configured repo, even when its checkout is a symlink
      const displayName = path.join(repo.spec.name, path.relative(repo.root, subDirectory));

      logger.info(banner("", "▇"));
      logger.info(banner(displayName, "▇"));
      logger.info(banner("", "▇"));

      const testSuiteResults: TestSuiteResult[] = [];
      for (const suite of suites) {
        const result = await repeatTestSuite(
          () => suite.run(repo.root, subDirectory, context),
          repetitions,
          logger
        );
        testSuiteResults.push(result);
      }

      repoResults.push({ name: displayName, testSuiteResults });
    }
  }

  invariant(repoResults.length > 0, "Benchmark run produced no results");

  return repoResults;
}
