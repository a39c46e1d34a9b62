import { CommandError, runCommand, type CommandRunner } from "./commands.js";
import type { ProcessSupervisor } from "./types.js";

export interface SystemdSupervisorConfig {
  systemctlBinary: string;
  timeoutMs: number;
}

export class SystemdSupervisor implements ProcessSupervisor {
  constructor(
    private readonly config: SystemdSupervisorConfig,
    private readonly run: CommandRunner = runCommand
  ) {}

  private async systemctl(args: string[]): Promise<string> {
    const { stdout } = await this.run(this.config.systemctlBinary, args, { timeoutMs: this.config.timeoutMs });
    return stdout;
  }

  async start(serviceName: string): Promise<void> {
    await this.systemctl(["start", serviceName]);
  }

  async stop(serviceName: string): Promise<void> {
    await this.systemctl(["stop", serviceName]);
  }

  async isActive(serviceName: string): Promise<boolean> {
    try {
      await this.systemctl(["is-active", "--quiet", serviceName]);
      return true;
    } catch (error) {
      // is-active exits non-zero for inactive, failed and unknown units alike.
      if (error instanceof CommandError && error.exitCode !== null && !error.timedOut) {
        return false;
      }
      throw error;
    }
  }

  async status(serviceName: string): Promise<string> {
    try {
      return (await this.systemctl(["status", serviceName, "--no-pager"])).trim();
    } catch (error) {
      // status exits 3 for a stopped unit but still prints its report.
      if (error instanceof CommandError && error.exitCode === 3) {
        return error.stdout.trim() || "inactive";
      }
      throw error;
    }
  }
}

export interface ComposeSupervisorConfig {
  dockerBinary: string;
  composeFilePath: string;
  timeoutMs: number;
}

export class ComposeSupervisor implements ProcessSupervisor {
  constructor(
    private readonly config: ComposeSupervisorConfig,
    private readonly run: CommandRunner = runCommand
  ) {}

  private async compose(commandArgs: string[]): Promise<string> {
    const args = ["compose", "-f", this.config.composeFilePath, ...commandArgs];
    const { stdout } = await this.run(this.config.dockerBinary, args, { timeoutMs: this.config.timeoutMs });
    return stdout;
  }

  async start(serviceName: string): Promise<void> {
    await this.compose(["up", "-d", "--no-deps", serviceName]);
  }

  async stop(serviceName: string): Promise<void> {
    await this.compose(["stop", serviceName]);
  }

  async isActive(serviceName: string): Promise<boolean> {
    const output = await this.compose(["ps", "--status", "running", "--services"]);
    return output
      .split(/\r?\n/)
      .map((line) => line.trim())
      .includes(serviceName);
  }

  async status(serviceName: string): Promise<string> {
    return (await this.compose(["ps", serviceName])).trim();
  }
}
