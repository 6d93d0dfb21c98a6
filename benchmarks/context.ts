import { performance } from "perf_hooks";
import { getLogger, type Logger } from "./logger.js";
import { runProcess, type ProcessRunner } from "./process-runner.js";

/**
 * Everything a command needs from its surroundings.
 *
 * Commands never change the process-wide working directory or environment;
 * the directory travels on the command and the environment travels here.
 */
export interface ExecutionContext {
  env: NodeJS.ProcessEnv;
  logger: Logger;
  runner: ProcessRunner;
  /** Monotonic milliseconds */
  clock: () => number;
}

export function createExecutionContext(
  overrides: Partial<ExecutionContext> = {}
): ExecutionContext {
  return {
    env: overrides.env ?? { ...process.env },
    logger: overrides.logger ?? getLogger(),
    runner: overrides.runner ?? runProcess,
    clock: overrides.clock ?? (() => performance.now()),
  };
}

/**
 * Returns a context whose environment has `variables` merged over the parent's
 */
export function withEnvironment(
  context: ExecutionContext,
  variables: Readonly<Record<string, string>>
): ExecutionContext {
  return { ...context, env: { ...context.env, ...variables } };
}
