import fs from "node:fs/promises";
import path from "node:path";
import { setTimeout as delay } from "node:timers/promises";

import { attempt, describeAttempt, failed, skipped, type Attempt } from "./attempt.js";
import { toErrorMessage } from "./errors.js";
import { createRollbackMachineState, runMachine } from "./machine.js";
import { UNKNOWN_REFERENCE, type SnapshotStore } from "./snapshots.js";
import type {
  ProcessSupervisor,
  RollbackReport,
  RollbackStep,
  SnapshotRecord,
  StepReport,
  UpdateStep,
  UpdaterLogger,
  VersionControlBackend
} from "./types.js";

export interface RollbackExecutorOptions {
  serviceName: string;
  stateFilePath: string;
  settleMs: number;
  supervisor: ProcessSupervisor;
  vcs: VersionControlBackend;
  snapshots: SnapshotStore;
  logger: UpdaterLogger;
}

export function toStepReport(step: UpdateStep | RollbackStep, result: Attempt<unknown>): StepReport {
  const detail = describeAttempt(result);
  return detail === undefined ? { step, status: result.status } : { step, status: result.status, detail };
}

/**
 * Puts a snapshot back: state file first, then the recorded code revision,
 * then a service start. Every step is best-effort and the start is always
 * attempted, whatever happened before it.
 */
export class RollbackExecutor {
  constructor(private readonly options: RollbackExecutorOptions) {}

  async runStep(step: RollbackStep, snapshot: SnapshotRecord | undefined): Promise<Attempt<unknown>> {
    switch (step) {
      case "restore_state":
        return this.restoreState(snapshot);
      case "revert_code":
        return this.revertCode(snapshot);
      case "restart_service":
        return this.restartService();
    }
  }

  private async restoreState(snapshot: SnapshotRecord | undefined): Promise<Attempt<unknown>> {
    if (!snapshot) {
      return skipped("no snapshot was captured");
    }
    const copyPath = snapshot.stateCopyPath;
    if (!copyPath) {
      return skipped("snapshot holds no state file");
    }

    const { stateFilePath } = this.options;
    return attempt(async () => {
      await fs.mkdir(path.dirname(stateFilePath), { recursive: true });
      await fs.copyFile(copyPath, stateFilePath);
    });
  }

  private async revertCode(snapshot: SnapshotRecord | undefined): Promise<Attempt<unknown>> {
    if (!snapshot) {
      return skipped("no snapshot was captured");
    }
    if (snapshot.previousRef === UNKNOWN_REFERENCE) {
      return skipped("previous reference is unknown, code was left at the current revision");
    }

    const ref = snapshot.previousRef;
    return attempt(() => this.options.vcs.forceCheckout(ref));
  }

  private async restartService(): Promise<Attempt<unknown>> {
    const { supervisor, serviceName, settleMs } = this.options;
    return attempt(async () => {
      await supervisor.start(serviceName);
      await delay(settleMs);
      if (!(await supervisor.isActive(serviceName))) {
        throw new Error(`${serviceName} is not active ${settleMs}ms after the rollback start`);
      }
    });
  }

  logStep(step: RollbackStep, result: Attempt<unknown>, logger: UpdaterLogger = this.options.logger): void {
    switch (result.status) {
      case "ok":
        logger.info(`rollback ${step}: done`);
        return;
      case "skipped":
        logger.warn(`rollback ${step}: skipped (${result.reason})`);
        return;
      case "failed":
        logger.error(`rollback ${step}: ${result.error}`);
        return;
    }
  }

  async rollback(snapshot: SnapshotRecord): Promise<RollbackReport> {
    const release = this.options.snapshots.retain(snapshot.id);
    const steps: StepReport[] = [];

    try {
      const finalState = await runMachine(createRollbackMachineState(), { type: "BEGIN_ROLLBACK" }, {
        runUpdateStep: async (step) => ({ attempt: failed(`${step} is not a rollback step`) }),
        runRollbackStep: async (step) => {
          const result = await this.runStep(step, snapshot);
          steps.push(toStepReport(step, result));
          this.logStep(step, result);
          return result;
        }
      });

      return {
        snapshotId: snapshot.id,
        outcome: finalState.outcome === "rolled_back" ? "rolled_back" : "partial_rollback",
        steps
      };
    } catch (error) {
      this.options.logger.error(`rollback of ${snapshot.id} stopped early: ${toErrorMessage(error)}`);
      return { snapshotId: snapshot.id, outcome: "partial_rollback", steps };
    } finally {
      release();
    }
  }
}
