import os from "node:os";

import { describe, expect, it } from "vitest";

import { CommandError, runCommand } from "../../server/updater/commands.js";
import { CommandDependencyInstaller } from "../../server/updater/dependencies.js";

const node = process.execPath;
const HANG = "setTimeout(() => {}, 10000)";
const NOISY_FAILURE = "process.stderr.write('one\\ntwo\\nthree\\nfour\\n'); process.exit(2)";

describe("runCommand", () => {
  it("returns the captured output", async () => {
    await expect(runCommand(node, ["-e", "process.stdout.write('ready')"], { timeoutMs: 10_000 })).resolves.toEqual({
      stdout: "ready",
      stderr: ""
    });
  });

  it("marks a command killed by its timeout", async () => {
    const failure = runCommand(node, ["-e", HANG], { timeoutMs: 200 });

    await expect(failure).rejects.toBeInstanceOf(CommandError);
    await expect(failure).rejects.toMatchObject({ timedOut: true, exitCode: null });
    await expect(failure).rejects.toThrow(`${node} -e ${HANG} failed: timed out`);
  });

  it("reports the exit code of a failed command", async () => {
    await expect(runCommand(node, ["-e", "process.exit(3)"], { timeoutMs: 10_000 })).rejects.toMatchObject({
      exitCode: 3,
      timedOut: false
    });
  });

  it("keeps the last lines of stderr", async () => {
    const failure = runCommand(node, ["-e", NOISY_FAILURE], { timeoutMs: 10_000 });

    await expect(failure).rejects.toMatchObject({ exitCode: 2, stderr: "two\nthree\nfour" });
    await expect(failure).rejects.toThrow(`${node} -e ${NOISY_FAILURE} failed: two\nthree\nfour`);
  });

  it("drops stdout of any size when asked not to capture it", async () => {
    await expect(
      runCommand(node, ["-e", "process.stdout.write('x'.repeat(4 * 1024 * 1024))"], {
        timeoutMs: 10_000,
        captureStdout: false
      })
    ).resolves.toEqual({ stdout: "", stderr: "" });
  });

  it("applies the timeout and stderr tail without capturing stdout", async () => {
    await expect(runCommand(node, ["-e", HANG], { timeoutMs: 200, captureStdout: false })).rejects.toMatchObject({
      timedOut: true,
      exitCode: null
    });
    await expect(runCommand(node, ["-e", NOISY_FAILURE], { timeoutMs: 10_000, captureStdout: false })).rejects.toMatchObject({
      exitCode: 2,
      timedOut: false,
      stderr: "two\nthree\nfour"
    });
  });
});

describe("CommandDependencyInstaller with the process runner", () => {
  it("completes an install that prints more than a megabyte", async () => {
    const installer = new CommandDependencyInstaller({
      command: [node, "-e", "process.stdout.write('x'.repeat(2 * 1024 * 1024))"],
      workDir: os.tmpdir(),
      timeoutMs: 10_000
    });

    await expect(installer.installAll()).resolves.toBe(true);
  });
});
