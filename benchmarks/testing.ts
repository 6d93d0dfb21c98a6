/**
 * In-process stand-ins shared by the test files.
 */
import { pino } from "pino";
import { Command, type CommandOutput } from "./command.js";
import { createExecutionContext, type ExecutionContext } from "./context.js";
import type { ProcessRunner, ProcessRunResult } from "./process-runner.js";
import type { CommandValidator } from "./validator.js";

export type RecordedCall = {
  args: string[];
  cwd: string;
  env: NodeJS.ProcessEnv;
};

/**
 * Records every spawn request and answers with `respond`'s result
 */
export function fakeRunner(
  respond: (args: readonly string[]) => Partial<ProcessRunResult> = () => ({})
): { runner: ProcessRunner; calls: RecordedCall[] } {
  const calls: RecordedCall[] = [];
  const runner: ProcessRunner = async (args, opts) => {
    calls.push({ args: [...args], cwd: opts.cwd, env: opts.env });
    return {
      exitCode: 0,
      stdout: Buffer.from(""),
      stderr: "",
      ...respond(args),
    };
  };
  return { runner, calls };
}

/**
 * A clock that advances by `stepMs` on every read
 */
export function steppingClock(stepMs: number): () => number {
  let now = 0;
  return () => {
    const current = now;
    now += stepMs;
    return current;
  };
}

export function testContext(overrides: Partial<ExecutionContext> = {}): ExecutionContext {
  return createExecutionContext({
    env: {},
    logger: pino({ level: "silent" }),
    runner: fakeRunner().runner,
    clock: steppingClock(1),
    ...overrides,
  });
}

/**
 * Produces a fixed output without spawning anything
 */
export class StaticOutputCommand extends Command {
  readonly output: string;

  constructor(output: string, validationChecks: readonly CommandValidator[] = []) {
    super(validationChecks);
    this.output = output;
  }

  clone(): StaticOutputCommand {
    const clone = new StaticOutputCommand(this.output, this.validationChecks);
    clone.workingDirectory = this.workingDirectory;
    return clone;
  }

  protected async invoke(): Promise<CommandOutput> {
    return this.output;
  }

  protected describe(): string {
    return `StaticOutput(${this.output})`;
  }
}

/**
 * Throws the given error when invoked
 */
export class ThrowingCommand extends Command {
  readonly error: Error;

  constructor(error: Error) {
    super();
    this.error = error;
  }

  clone(): ThrowingCommand {
    const clone = new ThrowingCommand(this.error);
    clone.workingDirectory = this.workingDirectory;
    return clone;
  }

  protected async invoke(): Promise<CommandOutput> {
    throw this.error;
  }
}
