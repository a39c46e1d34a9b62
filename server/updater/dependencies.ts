import { runCommand, type CommandRunner } from "./commands.js";
import type { DependencyInstaller } from "./types.js";

export interface CommandDependencyInstallerConfig {
  command: string[];
  workDir: string;
  timeoutMs: number;
}

export class CommandDependencyInstaller implements DependencyInstaller {
  constructor(
    private readonly config: CommandDependencyInstallerConfig,
    private readonly run: CommandRunner = runCommand
  ) {}

  async installAll(): Promise<boolean> {
    const [binary, ...args] = this.config.command;
    if (!binary) {
      return false;
    }

    await this.run(binary, args, {
      cwd: this.config.workDir,
      timeoutMs: this.config.timeoutMs,
      captureStdout: false
    });
    return true;
  }
}
