/**
 * Composable units of work.
 *
 * A command carries its working directory and the validators checked against
 * its output. `run` captures output, `validate` checks it. Cloning operations
 * (`withWorkingDirectory`, `addValidationChecks`) leave the original
 * untouched, except on `CompositeCommand`, which retargets its children and
 * returns itself.
 */
import { createExecutionContext, type ExecutionContext } from "./context.js";
import { InvariantError, ProcessFailedError, ValidationError } from "./errors.js";
import { getLogger, type Logger } from "./logger.js";
import type { CommandValidator } from "./validator.js";

export type CommandOutput = string | Buffer;

export type CommandOptions = {
  validationChecks?: readonly CommandValidator[];
};

export abstract class Command {
  workingDirectory: string;
  validationChecks: readonly CommandValidator[];
  /** Set once `run` completes */
  capturedOutput: CommandOutput | undefined;

  constructor(validationChecks: readonly CommandValidator[] = []) {
    this.workingDirectory = process.cwd();
    this.validationChecks = validationChecks;
    this.capturedOutput = undefined;
  }

  async run(
    context: ExecutionContext = createExecutionContext()
  ): Promise<CommandOutput> {
    const representation = this.toString();
    context.logger.info(representation);

    try {
      this.capturedOutput = await this.invoke(context);
      return this.capturedOutput;
    } catch (error) {
      context.logger.error({ err: error }, `[FAILED COMMAND] ${representation}`);
      throw error;
    }
  }

  validate(logger: Logger = getLogger()): void {
    if (this.capturedOutput === undefined) {
      throw new InvariantError("Command must be run before it can be validated");
    }

    const output =
      typeof this.capturedOutput === "string"
        ? this.capturedOutput
        : this.capturedOutput.toString("utf-8");

    for (const validator of this.validationChecks) {
      if (!validator.validate(output)) {
        logger.error({ output }, `Validation failed: ${validator.description}`);
        throw new ValidationError(validator.description);
      }
    }
  }

  withWorkingDirectory(workingDirectory: string): Command {
    const clone = this.clone();
    clone.workingDirectory = workingDirectory;
    return clone;
  }

  addValidationChecks(validationChecks: readonly CommandValidator[]): Command {
    const clone = this.clone();
    clone.validationChecks = [...this.validationChecks, ...validationChecks];
    return clone;
  }

  /**
   * Structural copy with the same working directory and validators, and no
   * captured output
   */
  abstract clone(): Command;

  /**
   * Executes the command in `workingDirectory`.
   * @returns The captured output. Empty when the command produces none.
   */
  protected abstract invoke(context: ExecutionContext): Promise<CommandOutput>;

  protected describe(): string {
    return "";
  }

  toString(): string {
    return `${this.workingDirectory} > ${this.describe()}`;
  }
}

export class NullCommand extends Command {
  constructor() {
    super();
  }

  clone(): NullCommand {
    const clone = new NullCommand();
    clone.workingDirectory = this.workingDirectory;
    clone.validationChecks = this.validationChecks;
    return clone;
  }

  protected async invoke(): Promise<CommandOutput> {
    return "";
  }

  protected describe(): string {
    return "NullCommand";
  }
}

/**
 * Ordered sequence of commands, each run and validated as a unit
 */
export class CompositeCommand extends Command {
  commands: readonly Command[];

  constructor(...commands: Command[]) {
    super();
    this.commands = commands.map((command) => command.clone());
  }

  clone(): CompositeCommand {
    const clone = new CompositeCommand(...this.commands);
    clone.workingDirectory = this.workingDirectory;
    clone.validationChecks = this.validationChecks;
    return clone;
  }

  protected async invoke(context: ExecutionContext): Promise<CommandOutput> {
    for (const command of this.commands) {
      await command.run(context);
    }
    return "";
  }

  validate(logger: Logger = getLogger()): void {
    for (const command of this.commands) {
      command.validate(logger);
    }
  }

  withWorkingDirectory(workingDirectory: string): CompositeCommand {
    this.workingDirectory = workingDirectory;
    this.commands = this.commands.map((command) =>
      command.withWorkingDirectory(workingDirectory)
    );
    return this;
  }

  addValidationChecks(validationChecks: readonly CommandValidator[]): CompositeCommand {
    this.commands = this.commands.map((command) =>
      command.addValidationChecks(validationChecks)
    );
    return this;
  }

  toString(): string {
    return `Composite(${this.commands.length})`;
  }
}

/**
 * Runs an external process and captures its raw stdout
 */
export class ProcessCommand extends Command {
  readonly args: readonly string[];

  constructor(args: readonly string[], options: CommandOptions = {}) {
    super(options.validationChecks);
    this.args = [...args];
  }

  clone(): ProcessCommand {
    const clone = new ProcessCommand(this.args, {
      validationChecks: this.validationChecks,
    });
    clone.workingDirectory = this.workingDirectory;
    return clone;
  }

  protected async invoke(context: ExecutionContext): Promise<CommandOutput> {
    const result = await context.runner(this.args, {
      cwd: this.workingDirectory,
      env: context.env,
    });

    if (result.exitCode !== 0) {
      throw new ProcessFailedError(
        this.args,
        result.exitCode,
        result.stdout.toString("utf-8"),
        result.stderr
      );
    }

    return result.stdout;
  }

  protected describe(): string {
    return this.args.join(" ");
  }
}

export type ShellName = "powershell" | "pwsh" | "bash" | "sh";

const SHELL_PREFIXES: Record<ShellName, readonly string[]> = {
  powershell: ["powershell", "-NoLogo", "-NoProfile", "-NonInteractive", "-Command"],
  pwsh: ["pwsh", "-NoLogo", "-NoProfile", "-NonInteractive", "-Command"],
  bash: ["bash", "--noprofile", "--norc", "-c"],
  sh: ["sh", "-c"],
};

export function defaultShell(platform: NodeJS.Platform = process.platform): ShellName {
  return platform === "win32" ? "powershell" : "bash";
}

export type ShellCommandOptions = CommandOptions & {
  shell?: ShellName;
};

/**
 * Runs a script through a non-interactive shell interpreter
 */
export class ShellCommand extends ProcessCommand {
  readonly script: string;
  readonly shell: ShellName;

  constructor(script: string, options: ShellCommandOptions = {}) {
    const shell = options.shell ?? defaultShell();
    super([...SHELL_PREFIXES[shell], script], options);
    this.script = script;
    this.shell = shell;
  }

  clone(): ShellCommand {
    const clone = new ShellCommand(this.script, {
      shell: this.shell,
      validationChecks: this.validationChecks,
    });
    clone.workingDirectory = this.workingDirectory;
    return clone;
  }
}
