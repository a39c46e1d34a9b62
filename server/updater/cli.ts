import { confirm, isCancel } from "@clack/prompts";
import { Command, InvalidArgumentError } from "commander";

import { resolveUpdaterConfig, resolveUpdaterServerConfig, type UpdaterConfig, type UpdaterServerConfig } from "./config.js";
import { mergeEnvFile } from "./envFile.js";
import { UpdaterError, toErrorMessage } from "./errors.js";
import type { UpdaterControl } from "./service.js";
import type { UpdateOutcome, UpdateResult, UpdaterStatus } from "./types.js";

export const EXIT_CODES = {
  success: 0,
  rolledBack: 1,
  partialRollback: 2,
  failed: 3,
  busy: 4,
  usage: 64
} as const;

const OUTCOME_EXIT_CODES: Record<UpdateOutcome, number> = {
  success: EXIT_CODES.success,
  rolled_back: EXIT_CODES.rolledBack,
  partial_rollback: EXIT_CODES.partialRollback,
  failed: EXIT_CODES.failed
};

export interface CliRuntime {
  env: NodeJS.ProcessEnv;
  cwd: string;
  isInteractive: boolean;
  log(message: string): void;
  error(message: string): void;
  setExitCode(code: number): void;
  confirm(message: string): Promise<boolean>;
  createService(config: UpdaterConfig): UpdaterControl;
  serve(config: UpdaterServerConfig, service: UpdaterControl): Promise<void>;
}

interface GlobalOptions {
  envFile?: string;
}

interface JsonOption {
  json?: boolean;
}

interface YesOption {
  yes?: boolean;
}

export async function promptConfirm(message: string): Promise<boolean> {
  const answer = await confirm({ message, initialValue: false });
  return !isCancel(answer) && answer;
}

function parseKeepCount(raw: string): number {
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError("Expected a non-negative integer.");
  }
  return parsed;
}

function exitCodeForError(error: unknown): number {
  if (!(error instanceof UpdaterError)) {
    return EXIT_CODES.failed;
  }
  switch (error.code) {
    case "busy":
      return EXIT_CODES.busy;
    case "invalid_input":
    case "not_found":
    case "state_missing":
      return EXIT_CODES.usage;
    default:
      return EXIT_CODES.failed;
  }
}

function formatUpdateResult(result: UpdateResult): string[] {
  const lines = [`Update ${result.runId}: ${result.outcome}`];
  if (result.backupLocation) {
    lines.push(`Snapshot: ${result.backupLocation}`);
  }
  if (result.failedPhase) {
    lines.push(`Failed phase: ${result.failedPhase} (${result.failedStep ?? "unknown step"}): ${result.error ?? ""}`.trimEnd());
  }
  for (const warning of result.warnings) {
    lines.push(`Warning: ${warning}`);
  }
  for (const step of result.rollback ?? []) {
    lines.push(`Rollback ${step.step}: ${step.status}${step.detail ? ` (${step.detail})` : ""}`);
  }
  return lines;
}

function formatStatus(status: UpdaterStatus): string[] {
  const lines = [
    `Service: ${status.serviceName} (${status.serviceActive ? "active" : "inactive"})`,
    `Revision: ${status.currentRef}`,
    `Snapshots: ${status.snapshotCount}`,
    `State reset requested: ${status.resetRequested ? "yes" : "no"}`
  ];
  if (status.lastRunId) {
    lines.push(`Last update: ${status.lastRunId} at ${status.lastRunAt ?? "unknown time"}: ${status.lastOutcome ?? "unknown"}`);
  }
  if (status.lastError) {
    lines.push(`Last error: ${status.lastError}`);
  }
  return lines;
}

export function createUpdaterProgram(runtime: CliRuntime): Command {
  const program = new Command();

  program
    .name("svc-updater")
    .description("Update, back up and restore a supervised service in place")
    .option("--env-file <path>", "Read UPDATER_* settings from a dotenv file (process env wins)")
    .configureOutput({
      writeOut: (text) => runtime.log(text.trimEnd()),
      writeErr: (text) => runtime.error(text.trimEnd())
    });

  const readEnv = (): NodeJS.ProcessEnv => mergeEnvFile(runtime.env, program.opts<GlobalOptions>().envFile);
  const openService = (): UpdaterControl => runtime.createService(resolveUpdaterConfig(readEnv(), runtime.cwd));

  const confirmed = async (yes: boolean | undefined, message: string): Promise<boolean> => {
    if (yes) {
      return true;
    }
    return runtime.isInteractive ? runtime.confirm(message) : false;
  };

  const run = async (action: () => Promise<number | void>): Promise<void> => {
    try {
      runtime.setExitCode((await action()) ?? EXIT_CODES.success);
    } catch (error) {
      runtime.error(toErrorMessage(error));
      runtime.setExitCode(exitCodeForError(error));
    }
  };

  program
    .command("update")
    .description("Stop, snapshot, pull, install, migrate and restart; roll back on failure")
    .option("--json", "Print the full result as JSON", false)
    .action(async (options: JsonOption) =>
      run(async () => {
        const result = await openService().runUpdate();
        if (options.json) {
          runtime.log(JSON.stringify(result, null, 2));
        } else {
          formatUpdateResult(result).forEach((line) => runtime.log(line));
        }
        return OUTCOME_EXIT_CODES[result.outcome];
      })
    );

  program
    .command("status")
    .description("Show service liveness, revision and the last update run")
    .option("--json", "Print the status as JSON", false)
    .action(async (options: JsonOption) =>
      run(async () => {
        const status = await openService().getStatus();
        if (options.json) {
          runtime.log(JSON.stringify(status, null, 2));
        } else {
          formatStatus(status).forEach((line) => runtime.log(line));
        }
      })
    );

  program
    .command("snapshots")
    .description("List update snapshots, newest first")
    .action(async () =>
      run(async () => {
        const snapshots = await openService().listSnapshots();
        if (snapshots.length === 0) {
          runtime.log("No snapshots.");
          return;
        }
        for (const snapshot of snapshots) {
          runtime.log(`${snapshot.id}  ${snapshot.createdAt}  ref ${snapshot.previousRef}`);
        }
      })
    );

  program
    .command("prune")
    .description("Delete all but the newest snapshots")
    .option("--keep <count>", "Number of snapshots to keep (default: UPDATER_SNAPSHOT_RETENTION)", parseKeepCount)
    .action(async (options: { keep?: number }) =>
      run(async () => {
        const removed = await openService().pruneSnapshots(options.keep);
        runtime.log(removed.length > 0 ? `Removed: ${removed.join(", ")}` : "Nothing to prune.");
      })
    );

  program
    .command("backup")
    .description("Copy the state file to a timestamped backup")
    .action(async () =>
      run(async () => {
        const backup = await openService().createBackup();
        runtime.log(`Backup written to ${backup.path}`);
      })
    );

  program
    .command("backups")
    .description("List manual backups, newest first")
    .action(async () =>
      run(async () => {
        const backups = await openService().listBackups();
        if (backups.length === 0) {
          runtime.log("No backups.");
          return;
        }
        for (const backup of backups) {
          runtime.log(`${backup.path}  ${backup.sizeBytes} bytes  ${backup.modifiedAt}`);
        }
      })
    );

  program
    .command("restore")
    .description("Replace the state file with a backup (the current file is kept as .old)")
    .argument("<path>", "Backup file to restore")
    .option("--yes", "Skip the confirmation prompt", false)
    .action(async (artifactPath: string, options: YesOption) =>
      run(async () => {
        const ok = await confirmed(options.yes, `Replace the current state file with ${artifactPath}?`);
        const restored = await openService().restoreBackup(artifactPath, { confirmed: ok });
        runtime.log(`Restored ${restored.statePath} from ${restored.restoredFrom}`);
        if (restored.sidecarPath) {
          runtime.log(`Previous state kept at ${restored.sidecarPath}`);
        }
        if (!restored.serviceStarted) {
          runtime.error("The service did not start after the restore.");
          return EXIT_CODES.failed;
        }
      })
    );

  program
    .command("reset-state")
    .description("Delete the state file during the next update")
    .option("--yes", "Skip the confirmation prompt", false)
    .action(async (options: YesOption) =>
      run(async () => {
        if (!(await confirmed(options.yes, "Delete all persisted state on the next update?"))) {
          throw new UpdaterError("State reset must be confirmed (use --yes when not on a terminal).", "invalid_input");
        }
        await openService().requestStateReset();
        runtime.log("State reset armed for the next update.");
      })
    );

  program
    .command("cancel-reset")
    .description("Withdraw a pending state reset")
    .action(async () =>
      run(async () => {
        await openService().cancelStateReset();
        runtime.log("State reset cancelled.");
      })
    );

  program
    .command("serve")
    .description("Start the HTTP control API")
    .action(async () =>
      run(async () => {
        const config = resolveUpdaterServerConfig(readEnv(), runtime.cwd);
        await runtime.serve(config, runtime.createService(config));
      })
    );

  return program;
}
