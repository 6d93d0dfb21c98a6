import { Command, NullCommand } from "./command.js";
import { createExecutionContext, type ExecutionContext } from "./context.js";
import { banner } from "./logger.js";
import type { TestResult } from "./model.js";

export type TestCaseOptions = {
  name: string;
  /** The measured command */
  testCommand: Command;
  /** Runs in the repo root before the measured command */
  rootSetupCommand?: Command;
  /** Runs in the working directory before the measured command */
  setupCommand?: Command;
};

/**
 * A named scenario: two setup commands and one timed command.
 *
 * Built once as configuration and run once per repetition. Every run works on
 * fresh clones of its commands.
 */
export class TestCase {
  readonly name: string;
  readonly testCommand: Command;
  readonly rootSetupCommand: Command;
  readonly setupCommand: Command;

  constructor(options: TestCaseOptions) {
    this.name = options.name;
    this.testCommand = options.testCommand;
    this.rootSetupCommand = options.rootSetupCommand ?? new NullCommand();
    this.setupCommand = options.setupCommand ?? new NullCommand();
  }

  async run(
    repoRoot?: string,
    workingDirectory?: string,
    context: ExecutionContext = createExecutionContext()
  ): Promise<TestResult> {
    const { logger, clock } = context;
    logger.info(banner(this.name, "_"));

    const root = repoRoot ?? process.cwd();
    const cwd = workingDirectory ?? process.cwd();

    try {
      // Composites retarget in place, so every run starts from its own copy
      const rootSetupCommand = this.rootSetupCommand.clone().withWorkingDirectory(root);
      await rootSetupCommand.run(context);
      rootSetupCommand.validate(logger);

      const setupCommand = this.setupCommand.clone().withWorkingDirectory(cwd);
      await setupCommand.run(context);
      setupCommand.validate(logger);

      const testCommand = this.testCommand.clone().withWorkingDirectory(cwd);

      const start = clock();
      await testCommand.run(context);
      const durationMs = clock() - start;

      testCommand.validate(logger);

      return { name: this.name, durationMs, command: testCommand };
    } catch (error) {
      logger.error({ test: this.name }, `[Failed test] ${this.name}`);
      throw error;
    }
  }
}
