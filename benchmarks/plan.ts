/**
 * Benchmark plans: YAML files declaring repos, commands and test suites.
 *
 * A plan replaces a hand-written scenario script. Commands are declared once
 * under `commands` and referenced by name from tests and sequences, or
 * written inline.
 */

import * as fs from "fs";
import * as path from "path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import {
  Command,
  CompositeCommand,
  ProcessCommand,
  ShellCommand,
  type ShellName,
} from "./command.js";
import { PlanError, errorMessage } from "./errors.js";
import type { RepoSpec, Validation } from "./model.js";
import { TestCase } from "./test-case.js";
import { TestSuite } from "./test-suite.js";
import { fromValidationSpec } from "./validator.js";

type CommandSpec =
  | { run: string[]; validations?: Validation[] }
  | { shell: string; interpreter?: ShellName; validations?: Validation[] }
  | { sequence: CommandRef[]; validations?: Validation[] };

type CommandRef = string | CommandSpec;

function isValidRegex(pattern: string): boolean {
  try {
    new RegExp(pattern);
    return true;
  } catch {
    return false;
  }
}

const validationSchema: z.ZodType<Validation> = z.union([
  z
    .object({
      name: z.string().optional(),
      type: z.enum(["include", "exclude"]),
      value: z.string(),
    })
    .strict(),
  z
    .object({
      name: z.string().optional(),
      type: z.literal("regex"),
      regex: z.string().refine(isValidRegex, "Invalid regular expression"),
    })
    .strict(),
]);

const commandRefSchema: z.ZodType<CommandRef> = z.lazy(() =>
  z.union([z.string().min(1), commandSpecSchema])
);

const commandSpecSchema: z.ZodType<CommandSpec> = z.union([
  z
    .object({
      run: z.array(z.string()).min(1),
      validations: z.array(validationSchema).optional(),
    })
    .strict(),
  z
    .object({
      shell: z.string(),
      interpreter: z.enum(["powershell", "pwsh", "bash", "sh"]).optional(),
      validations: z.array(validationSchema).optional(),
    })
    .strict(),
  z
    .object({
      sequence: z.array(commandRefSchema).min(1),
      validations: z.array(validationSchema).optional(),
    })
    .strict(),
]);

const environmentSchema = z.record(z.coerce.string());

const planSchema = z
  .object({
    repos_root: z.string().optional(),
    repetitions: z.number().int().positive().default(1),
    output: z.string().default("repo_results.csv"),
    path_prepend: z.array(z.string()).default([]),
    environment: environmentSchema.default({}),
    commands: z.record(commandSpecSchema).default({}),
    repos: z
      .array(
        z
          .object({
            name: z.string().min(1),
            sub_directories: z.array(z.string()).min(1),
          })
          .strict()
      )
      .min(1),
    suites: z
      .array(
        z
          .object({
            name: z.string().min(1),
            environment: environmentSchema.default({}),
            tests: z
              .array(
                z
                  .object({
                    name: z.string().min(1),
                    root_setup: commandRefSchema.optional(),
                    setup: commandRefSchema.optional(),
                    run: commandRefSchema,
                  })
                  .strict()
              )
              .min(1),
          })
          .strict()
      )
      .min(1),
  })
  .strict();

type PlanFile = z.infer<typeof planSchema>;

export interface BenchmarkPlan {
  file: string;
  /** Absolute; undefined when the plan leaves it to the CLI */
  reposRoot: string | undefined;
  repetitions: number;
  /** Absolute path of the CSV to write */
  output: string;
  environment: Record<string, string>;
  pathPrepend: string[];
  repos: RepoSpec[];
  suites: TestSuite[];
}

/**
 * Resolves command references, building each named command once
 */
class CommandResolver {
  private file: string;
  private named: Record<string, CommandSpec>;
  private built = new Map<string, Command>();

  constructor(file: string, named: Record<string, CommandSpec>) {
    this.file = file;
    this.named = named;
  }

  resolve(ref: CommandRef, stack: readonly string[] = []): Command {
    if (typeof ref !== "string") {
      return this.build(ref, stack);
    }

    const cached = this.built.get(ref);
    if (cached) {
      return cached;
    }

    if (stack.includes(ref)) {
      throw new PlanError(
        this.file,
        `Command "${ref}" references itself: ${[...stack, ref].join(" -> ")}`
      );
    }

    const spec = this.named[ref];
    if (!spec) {
      throw new PlanError(this.file, `Unknown command "${ref}"`);
    }

    const command = this.build(spec, [...stack, ref]);
    this.built.set(ref, command);
    return command;
  }

  private build(spec: CommandSpec, stack: readonly string[]): Command {
    const validationChecks = (spec.validations ?? []).map(fromValidationSpec);

    if ("run" in spec) {
      return new ProcessCommand(spec.run, { validationChecks });
    }

    if ("shell" in spec) {
      return new ShellCommand(spec.shell, {
        shell: spec.interpreter,
        validationChecks,
      });
    }

    const composite = new CompositeCommand(
      ...spec.sequence.map((child) => this.resolve(child, stack))
    );
    return validationChecks.length > 0
      ? composite.addValidationChecks(validationChecks)
      : composite;
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => {
      const at = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${at}: ${issue.message}`;
    })
    .join("; ");
}

function findDuplicate(names: readonly string[]): string | undefined {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      return name;
    }
    seen.add(name);
  }
  return undefined;
}

/**
 * Validates parsed plan content and builds its repos and suites
 */
export function parsePlan(content: unknown, file: string): BenchmarkPlan {
  const parsed = planSchema.safeParse(content);
  if (!parsed.success) {
    throw new PlanError(file, formatIssues(parsed.error));
  }
  const plan: PlanFile = parsed.data;
  const planDir = path.dirname(path.resolve(file));

  const duplicateSuite = findDuplicate(plan.suites.map((suite) => suite.name));
  if (duplicateSuite !== undefined) {
    throw new PlanError(file, `Duplicate suite "${duplicateSuite}"`);
  }

  const resolver = new CommandResolver(file, plan.commands);

  const suites = plan.suites.map((suite) => {
    const duplicateTest = findDuplicate(suite.tests.map((test) => test.name));
    if (duplicateTest !== undefined) {
      throw new PlanError(file, `Duplicate test "${duplicateTest}" in suite "${suite.name}"`);
    }

    const tests = suite.tests.map(
      (test) =>
        new TestCase({
          name: test.name,
          testCommand: resolver.resolve(test.run),
          rootSetupCommand: test.root_setup ? resolver.resolve(test.root_setup) : undefined,
          setupCommand: test.setup ? resolver.resolve(test.setup) : undefined,
        })
    );

    return new TestSuite(suite.name, tests, suite.environment);
  });

  return {
    file,
    reposRoot: plan.repos_root ? path.resolve(planDir, plan.repos_root) : undefined,
    repetitions: plan.repetitions,
    output: path.resolve(planDir, plan.output),
    environment: plan.environment,
    pathPrepend: plan.path_prepend,
    repos: plan.repos.map((repo) => ({
      name: repo.name,
      subDirectories: repo.sub_directories,
    })),
    suites,
  };
}

/**
 * Reads and parses a plan file
 */
export function loadPlan(file: string): BenchmarkPlan {
  let content: unknown;
  try {
    content = parseYaml(fs.readFileSync(file, "utf-8"));
  } catch (error) {
    throw new PlanError(file, errorMessage(error));
  }
  return parsePlan(content, file);
}

/**
 * Environment for every command of the plan: the base environment with the
 * plan's variables merged in and `pathPrepend` placed in front of PATH
 */
export function planEnvironment(
  plan: Pick<BenchmarkPlan, "environment" | "pathPrepend">,
  baseEnv: NodeJS.ProcessEnv
): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = { ...baseEnv, ...plan.environment };

  if (plan.pathPrepend.length > 0) {
    // Windows spells it "Path"
    const pathKey = Object.keys(env).find((key) => key.toUpperCase() === "PATH") ?? "PATH";
    const current = env[pathKey];
    env[pathKey] = [...plan.pathPrepend, ...(current ? [current] : [])].join(path.delimiter);
  }

  return env;
}

/**
 * Finds plan files: the file itself, or every .yml/.yaml under a directory
 */
export function discoverPlans(target: string): string[] {
  if (!fs.existsSync(target)) {
    throw new PlanError(target, "Plan file or directory not found");
  }

  if (!fs.statSync(target).isDirectory()) {
    return [target];
  }

  const planFiles: string[] = [];

  function findPlanFiles(dir: string) {
    const entries = fs.readdirSync(dir, { withFileTypes: true });

    for (const entry of entries) {
      const fullPath = path.join(dir, entry.name);

      if (entry.isDirectory()) {
        findPlanFiles(fullPath);
      } else if (entry.name.endsWith(".yml") || entry.name.endsWith(".yaml")) {
        planFiles.push(fullPath);
      }
    }
  }

  findPlanFiles(target);
  return planFiles.sort();
}
