import type { Command } from "./command.js";

export type Validation =
  | {
      name?: string;
      type: "include" | "exclude";
      value: string;
    }
  | {
      name?: string;
      type: "regex";
      regex: string;
    };

export type RepoSpec = {
  name: string;
  subDirectories: readonly string[];
};

export type TestResult = {
  readonly name: string;
  readonly durationMs: number;
  /** The validated command instance. Absent once results are averaged. */
  readonly command?: Command;
};

export type TestSuiteResult = {
  readonly name: string;
  readonly testResults: readonly TestResult[];
};

export type RepoResults = {
  /** Sub-directory path relative to the repos root */
  readonly name: string;
  readonly testSuiteResults: readonly TestSuiteResult[];
};

export type ResultTable = {
  header: string[];
  rows: string[][];
};
