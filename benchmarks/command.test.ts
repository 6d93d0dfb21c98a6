import { describe, expect, it } from "vitest";
import { pino } from "pino";
import {
  CompositeCommand,
  NullCommand,
  ProcessCommand,
  ShellCommand,
  defaultShell,
} from "./command.js";
import { InvariantError, ProcessFailedError, ValidationError } from "./errors.js";
import {
  StaticOutputCommand,
  ThrowingCommand,
  fakeRunner,
  testContext,
} from "./testing.js";
import { exclude, include } from "./validator.js";

const silent = pino({ level: "silent" });

describe("ProcessCommand", () => {
  it("spawns its arguments in its working directory with the context environment", async () => {
    const { runner, calls } = fakeRunner(() => ({ stdout: Buffer.from("foo") }));
    const context = testContext({ runner, env: { foo: "bar" } });
    const command = new ProcessCommand(["git", "clean", "-xdf"]).withWorkingDirectory("/repos/r1");

    const output = await command.run(context);

    expect(calls).toEqual([{ args: ["git", "clean", "-xdf"], cwd: "/repos/r1", env: { foo: "bar" } }]);
    expect(output).toEqual(Buffer.from("foo"));
    expect(command.capturedOutput).toEqual(Buffer.from("foo"));
  });

  it("defaults its working directory to the current directory", () => {
    expect(new ProcessCommand(["git", "status"]).workingDirectory).toBe(process.cwd());
  });

  it("throws a ProcessFailedError carrying the argument vector on a non-zero exit", async () => {
    const { runner } = fakeRunner(() => ({ exitCode: 1, stderr: "fatal: not a git repository" }));
    const command = new ProcessCommand(["git", "clean", "-xdf"]);

    const error = await command.run(testContext({ runner })).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProcessFailedError);
    if (error instanceof ProcessFailedError) {
      expect(error.args).toEqual(["git", "clean", "-xdf"]);
      expect(error.exitCode).toBe(1);
      expect(error.stderr).toBe("fatal: not a git repository");
    }
    expect(command.capturedOutput).toBeUndefined();
  });

  it("validates raw byte output as text", async () => {
    const { runner } = fakeRunner(() => ({ stdout: Buffer.from("Build succeeded.") }));
    const command = new ProcessCommand(["msbuild"], {
      validationChecks: [include("succeeded")],
    });

    await command.run(testContext({ runner }));

    expect(() => command.validate(silent)).not.toThrow();
  });
});

describe("ShellCommand", () => {
  it("prefixes the script with the interpreter and its non-interactive flags", () => {
    expect(new ShellCommand("Write-Host foo", { shell: "powershell" }).args).toEqual([
      "powershell",
      "-NoLogo",
      "-NoProfile",
      "-NonInteractive",
      "-Command",
      "Write-Host foo",
    ]);
    expect(new ShellCommand("echo foo", { shell: "bash" }).args).toEqual([
      "bash",
      "--noprofile",
      "--norc",
      "-c",
      "echo foo",
    ]);
  });

  it("picks powershell on Windows and bash elsewhere", () => {
    expect(defaultShell("win32")).toBe("powershell");
    expect(defaultShell("linux")).toBe("bash");
  });

  it("keeps its shell and script when cloned", () => {
    const clone = new ShellCommand("echo foo", { shell: "sh" }).withWorkingDirectory("/tmp");

    expect(clone).toBeInstanceOf(ShellCommand);
    expect(clone.toString()).toBe("/tmp > sh -c echo foo");
  });
});

describe("cloning", () => {
  it("withWorkingDirectory returns a new command and leaves the original unchanged", () => {
    const original = new ProcessCommand(["git", "status"]);
    const originalDirectory = original.workingDirectory;

    const clone = original.withWorkingDirectory("/elsewhere");

    expect(clone).not.toBe(original);
    expect(clone.workingDirectory).toBe("/elsewhere");
    expect(original.workingDirectory).toBe(originalDirectory);
  });

  it("withWorkingDirectory clones NullCommand too", () => {
    const original = new NullCommand();
    const clone = original.withWorkingDirectory("/elsewhere");

    expect(clone).not.toBe(original);
    expect(clone.toString()).toBe("/elsewhere > NullCommand");
  });

  it("addValidationChecks appends to a copy", () => {
    const original = new StaticOutputCommand("FooBar", [exclude("oba")]);

    const clone = original.addValidationChecks([exclude("Bar")]);

    expect(clone).not.toBe(original);
    expect(clone.validationChecks.map((check) => check.description)).toEqual([
      "Exclude(oba)",
      "Exclude(Bar)",
    ]);
    expect(original.validationChecks.map((check) => check.description)).toEqual(["Exclude(oba)"]);
  });

  it("clones start without captured output", async () => {
    const command = new StaticOutputCommand("out");
    await command.run(testContext());

    expect(command.withWorkingDirectory("/x").capturedOutput).toBeUndefined();
  });
});

describe("validate", () => {
  it("requires the command to have run", () => {
    expect(() => new StaticOutputCommand("out").validate(silent)).toThrow(InvariantError);
  });

  it("reports the first failing check in attachment order", async () => {
    const command = new StaticOutputCommand("FooBar", [exclude("oba")]).addValidationChecks([
      exclude("Bar"),
    ]);
    await command.run(testContext());

    expect(() => command.validate(silent)).toThrow("Validation failed: Exclude(Bar)");
  });

  it("stops at the first failure", async () => {
    const command = new StaticOutputCommand("FooBar", [exclude("oBa")]).addValidationChecks([
      include("Bar"),
    ]);
    await command.run(testContext());

    expect(() => command.validate(silent)).toThrow("Validation failed: Exclude(oBa)");
  });

  it("throws a ValidationError naming the validator", async () => {
    const command = new StaticOutputCommand("", [include("hello")]);
    await command.run(testContext());

    const error = (() => {
      try {
        command.validate(silent);
        return undefined;
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ValidationError);
    if (error instanceof ValidationError) {
      expect(error.validator).toBe("Include(hello)");
    }
  });
});

describe("run", () => {
  it("rethrows the original error from the command body", async () => {
    const failure = new Error("foo exception");
    const command = new ThrowingCommand(failure);

    await expect(command.run(testContext())).rejects.toBe(failure);
  });
});

describe("CompositeCommand", () => {
  it("runs its children in order", async () => {
    const { runner, calls } = fakeRunner();
    const composite = new CompositeCommand(
      new ProcessCommand(["first"]),
      new ProcessCommand(["second"])
    ).withWorkingDirectory("/repo");

    await composite.run(testContext({ runner }));

    expect(calls.map((call) => [call.args[0], call.cwd])).toEqual([
      ["first", "/repo"],
      ["second", "/repo"],
    ]);
  });

  it("aborts the remaining children when one fails", async () => {
    const { runner, calls } = fakeRunner((args) => (args[0] === "second" ? { exitCode: 2 } : {}));
    const composite = new CompositeCommand(
      new ProcessCommand(["first"]),
      new ProcessCommand(["second"]),
      new ProcessCommand(["third"])
    );

    await expect(composite.run(testContext({ runner }))).rejects.toBeInstanceOf(ProcessFailedError);
    expect(calls.map((call) => call.args[0])).toEqual(["first", "second"]);
  });

  it("retargets its children in place and returns itself", () => {
    const composite = new CompositeCommand(new NullCommand(), new ProcessCommand(["git"]));

    const result = composite.withWorkingDirectory("/repo");

    expect(result).toBe(composite);
    expect(composite.commands.map((command) => command.workingDirectory)).toEqual(["/repo", "/repo"]);
  });

  it("copies the children it is built from", () => {
    const child = new ProcessCommand(["git"]);
    const childDirectory = child.workingDirectory;

    const composite = new CompositeCommand(child).withWorkingDirectory("/repo");

    expect(composite.commands[0]).not.toBe(child);
    expect(child.workingDirectory).toBe(childDirectory);
  });

  it("pushes added checks onto every child and validates each of them", async () => {
    const composite = new CompositeCommand(
      new StaticOutputCommand("ok"),
      new StaticOutputCommand("error: CS1002")
    );

    expect(composite.addValidationChecks([exclude("error")])).toBe(composite);

    await composite.run(testContext());
    expect(() => composite.validate(silent)).toThrow("Validation failed: Exclude(error)");
  });

  it("describes itself by its size", () => {
    expect(new CompositeCommand(new NullCommand(), new NullCommand()).toString()).toBe("Composite(2)");
  });
});
