/**
 * Flattens repo results into a table and writes it as CSV.
 *
 * Layout:
 *
 *   repo            | <suite name>_<test name> | ...
 *   <repo>/<subdir> | time in seconds          | ...
 */

import * as fs from "fs";
import * as path from "path";
import { parse as parseCsv } from "csv-parse/sync";
import { stringify as stringifyCsv } from "csv-stringify/sync";
import { invariant } from "./errors.js";
import { getLogger, type Logger } from "./logger.js";
import type { RepoResults, ResultTable } from "./model.js";

function columnNames(repoResult: RepoResults): string[] {
  return repoResult.testSuiteResults.flatMap((suiteResult) =>
    suiteResult.testResults.map((testResult) => `${suiteResult.name}_${testResult.name}`)
  );
}

/**
 * Builds the header from the first entry and one row per entry.
 * Entries whose suite/test columns differ from the header are rejected.
 */
export function buildResultTable(repoResults: readonly RepoResults[]): ResultTable {
  const [first] = repoResults;
  invariant(first !== undefined, "Cannot build a result table without results");

  const columns = columnNames(first);

  const rows = repoResults.map((repoResult) => {
    const rowColumns = columnNames(repoResult);
    invariant(
      rowColumns.length === columns.length &&
        rowColumns.every((column, index) => column === columns[index]),
      `Results for "${repoResult.name}" have columns [${rowColumns.join(", ")}], expected [${columns.join(", ")}]`
    );

    const seconds = repoResult.testSuiteResults.flatMap((suiteResult) =>
      suiteResult.testResults.map((testResult) => String(testResult.durationMs / 1000))
    );
    return [repoResult.name, ...seconds];
  });

  return { header: ["repo", ...columns], rows };
}

/**
 * Writes the result table to `resultsFile` and returns its absolute path
 */
export function writeResultsCsv(
  repoResults: readonly RepoResults[],
  resultsFile: string,
  logger: Logger = getLogger()
): string {
  const table = buildResultTable(repoResults);
  const resultsPath = path.resolve(resultsFile);

  fs.mkdirSync(path.dirname(resultsPath), { recursive: true });
  fs.writeFileSync(resultsPath, stringifyCsv([table.header, ...table.rows]), "utf-8");

  logger.info({ resultsFile: resultsPath }, `Wrote results to: ${resultsPath}`);
  return resultsPath;
}

/**
 * Reads a results CSV written by `writeResultsCsv`
 */
export function readResultsCsv(resultsFile: string): ResultTable {
  const content = fs.readFileSync(resultsFile, "utf-8");
  const records: string[][] = parseCsv(content, {
    skip_empty_lines: true,
  });

  const [header, ...rows] = records;
  invariant(header !== undefined, `Results file is empty: ${resultsFile}`);

  return { header, rows };
}

/**
 * Renders a result table as a Markdown table
 */
export function formatMarkdownTable(table: ResultTable): string {
  const escape = (cell: string) => cell.replace(/\|/g, "\\|");

  const lines = [
    `| ${table.header.map(escape).join(" | ")} |`,
    `|${table.header.map(() => "---").join("|")}|`,
  ];

  for (const row of table.rows) {
    lines.push(`| ${row.map(escape).join(" | ")} |`);
  }

  return lines.join("\n");
}
