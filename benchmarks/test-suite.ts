import {
  createExecutionContext,
  withEnvironment,
  type ExecutionContext,
} from "./context.js";
import { banner } from "./logger.js";
import type { TestResult, TestSuiteResult } from "./model.js";
import type { TestCase } from "./test-case.js";

/**
 * Ordered tests sharing a name and environment overrides.
 *
 * The overrides reach spawned processes through the execution context only;
 * `process.env` is never written.
 */
export class TestSuite {
  readonly name: string;
  readonly tests: readonly TestCase[];
  readonly environmentVariables: Readonly<Record<string, string>>;

  constructor(
    name: string,
    tests: readonly TestCase[],
    environmentVariables: Readonly<Record<string, string>> = {}
  ) {
    this.name = name;
    this.tests = tests;
    this.environmentVariables = environmentVariables;
  }

  async run(
    repoRoot?: string,
    workingDirectory?: string,
    context: ExecutionContext = createExecutionContext()
  ): Promise<TestSuiteResult> {
    context.logger.info(banner(this.name, "="));

    const suiteContext = withEnvironment(context, this.environmentVariables);
    const testResults: TestResult[] = [];

    try {
      for (const test of this.tests) {
        testResults.push(await test.run(repoRoot, workingDirectory, suiteContext));
      }
    } catch (error) {
      context.logger.error({ suite: this.name }, `[Failed TestSuite] ${this.name}`);
      throw error;
    }

    return { name: this.name, testResults };
  }
}
