import { runCommand, type CommandRunner } from "./commands.js";
import type { VersionControlBackend } from "./types.js";

export interface GitBackendConfig {
  gitBinary: string;
  workDir: string;
  timeoutMs: number;
}

export class GitBackend implements VersionControlBackend {
  constructor(
    private readonly config: GitBackendConfig,
    private readonly run: CommandRunner = runCommand
  ) {}

  private async git(args: string[]): Promise<string> {
    const { stdout } = await this.run(this.config.gitBinary, args, {
      cwd: this.config.workDir,
      timeoutMs: this.config.timeoutMs
    });
    return stdout.trim();
  }

  async currentReference(): Promise<string> {
    const ref = await this.git(["rev-parse", "HEAD"]);
    if (!/^[0-9a-f]{7,64}$/i.test(ref)) {
      throw new Error(`git rev-parse returned an unexpected reference: ${ref || "<empty>"}`);
    }
    return ref;
  }

  async discardLocalChanges(): Promise<void> {
    await this.git(["stash"]);
  }

  async fetchRemote(remote: string, branch: string): Promise<void> {
    await this.git(["fetch", remote, branch]);
  }

  async forceCheckout(ref: string): Promise<void> {
    await this.git(["reset", "--hard", ref]);
  }
}
