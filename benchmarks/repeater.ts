import { invariant } from "./errors.js";
import { banner, getLogger, type Logger } from "./logger.js";
import type { TestResult, TestSuiteResult } from "./model.js";

/**
 * Runs a test suite `repetitions` times and merges the results into a single
 * TestSuiteResult whose durations are the per-test means.
 *
 * A failure in any repetition aborts the whole operation; completed
 * repetitions are discarded.
 */
export async function repeatTestSuite(
  runner: () => Promise<TestSuiteResult>,
  repetitions: number,
  logger: Logger = getLogger()
): Promise<TestSuiteResult> {
  invariant(
    Number.isInteger(repetitions) && repetitions > 0,
    `Repetitions must be a positive integer, got ${repetitions}`
  );

  const resultsPerName = new Map<string, TestResult[]>();
  let suiteName: string | undefined;

  for (let repetition = 0; repetition < repetitions; repetition++) {
    logger.info(banner(`Repetition ${repetition}`, "+"));

    let suiteResult: TestSuiteResult;
    try {
      suiteResult = await runner();
    } catch (error) {
      logger.error({ repetition }, `[Failed Repetition] ${repetition}`);
      throw error;
    }

    invariant(
      suiteName === undefined || suiteName === suiteResult.name,
      `Repetition ${repetition} returned suite "${suiteResult.name}", expected "${suiteName}"`
    );
    suiteName = suiteResult.name;

    for (const testResult of suiteResult.testResults) {
      const bucket = resultsPerName.get(testResult.name);
      if (bucket) {
        bucket.push(testResult);
      } else {
        resultsPerName.set(testResult.name, [testResult]);
      }
    }
  }

  invariant(suiteName !== undefined, "No repetition produced a result");

  const merged: TestResult[] = [];
  for (const [name, results] of resultsPerName) {
    invariant(
      results.length === repetitions,
      `Test "${name}" ran ${results.length} times in suite "${suiteName}", expected ${repetitions}`
    );
    merged.push(averageTestResults(name, results, repetitions));
  }

  return { name: suiteName, testResults: merged };
}

function averageTestResults(
  name: string,
  results: readonly TestResult[],
  repetitions: number
): TestResult {
  const total = results.reduce((sum, result) => sum + result.durationMs, 0);
  return { name, durationMs: total / repetitions };
}
