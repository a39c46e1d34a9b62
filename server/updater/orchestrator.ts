import fs from "node:fs/promises";
import { setTimeout as delay } from "node:timers/promises";
import { nanoid } from "nanoid";

import { attempt, failed, skipped, type Attempt } from "./attempt.js";
import { toErrorMessage } from "./errors.js";
import {
  UPDATE_STEP_POLICIES,
  createUpdateMachineState,
  runMachine,
  type TransitionResult,
  type UpdateMachineState
} from "./machine.js";
import { toStepReport, type RollbackExecutor } from "./rollback.js";
import { UNKNOWN_REFERENCE, type SnapshotStore } from "./snapshots.js";
import type { UpdaterStateStore } from "./state.js";
import type {
  DependencyInstaller,
  ProcessSupervisor,
  RollbackStep,
  SnapshotRecord,
  StepReport,
  UpdatePhase,
  UpdateResult,
  UpdateStep,
  UpdaterLogger,
  VersionControlBackend
} from "./types.js";

export interface UpdateOrchestratorOptions {
  serviceName: string;
  remote: string;
  branch: string;
  stateFilePath: string;
  configFilePath: string;
  settleMs: number;
  snapshotRetention: number;
  supervisor: ProcessSupervisor;
  vcs: VersionControlBackend;
  installer: DependencyInstaller;
  snapshots: SnapshotStore;
  stateStore: UpdaterStateStore;
  rollback: RollbackExecutor;
  logger: UpdaterLogger;
  createRunId?: () => string;
}

interface StepOutcome {
  attempt: Attempt<unknown>;
  warning?: string;
}

interface RunContext {
  snapshot?: SnapshotRecord;
  releaseSnapshot?: () => void;
  resetConsumed: boolean;
  steps: StepReport[];
  rollbackSteps: StepReport[];
  logs: string[];
  logger: UpdaterLogger;
}

const PHASE_ORDER: UpdatePhase[] = ["pre_update", "code_update", "dependencies", "state_migration", "restart_verify"];

const PHASE_LABELS: Record<UpdatePhase, string> = {
  pre_update: "Pre-update",
  code_update: "Code update",
  dependencies: "Dependencies",
  state_migration: "State migration",
  restart_verify: "Restart and verify"
};

function isUpdateStep(step: UpdateStep | RollbackStep): step is UpdateStep {
  return step in UPDATE_STEP_POLICIES;
}

function nowIso(): string {
  return new Date().toISOString();
}

export class UpdateOrchestrator {
  constructor(private readonly options: UpdateOrchestratorOptions) {}

  private createRunLogger(logs: string[]): UpdaterLogger {
    const { logger } = this.options;
    return {
      info: (message) => {
        logs.push(message);
        logger.info(message);
      },
      warn: (message) => {
        logs.push(`warning: ${message}`);
        logger.warn(message);
      },
      error: (message) => {
        logs.push(`error: ${message}`);
        logger.error(message);
      }
    };
  }

  private async stopService(): Promise<Attempt<unknown>> {
    const { supervisor, serviceName } = this.options;
    const active = await attempt(() => supervisor.isActive(serviceName));
    if (active.status !== "ok") {
      return active;
    }
    if (!active.value) {
      return skipped("service was not running");
    }
    return attempt(() => supervisor.stop(serviceName));
  }

  private async captureSnapshot(context: RunContext): Promise<StepOutcome> {
    const { vcs, snapshots, stateFilePath, configFilePath } = this.options;
    const reference = await attempt(() => vcs.currentReference());
    const previousRef = reference.status === "ok" ? reference.value : UNKNOWN_REFERENCE;
    const warning =
      reference.status === "failed"
        ? `previous reference could not be resolved (${reference.error}), recorded as ${UNKNOWN_REFERENCE}`
        : undefined;

    const captured = await attempt(() => snapshots.capture({ stateFilePath, configFilePath, previousRef }));
    if (captured.status === "ok") {
      context.snapshot = captured.value;
      context.releaseSnapshot = snapshots.retain(captured.value.id);
      context.logger.info(`snapshot ${captured.value.id} captured at ${captured.value.path} (previous ref ${previousRef})`);
    }

    return { attempt: captured, warning };
  }

  private async installDependencies(): Promise<Attempt<unknown>> {
    const installed = await attempt(() => this.options.installer.installAll());
    if (installed.status === "ok" && !installed.value) {
      return skipped("no install command configured");
    }
    return installed;
  }

  private async migrateState(context: RunContext): Promise<Attempt<unknown>> {
    const { stateStore, stateFilePath } = this.options;
    const reset = await attempt(async () => {
      if (!stateStore.read().resetRequested) {
        return false;
      }
      await fs.rm(stateFilePath, { force: true });
      context.resetConsumed = true;
      stateStore.patch({ resetRequested: false, resetRequestedAt: undefined });
      return true;
    });

    if (reset.status === "ok" && !reset.value) {
      return skipped("reset not requested, state preserved");
    }
    if (reset.status === "ok") {
      context.logger.warn(`state file ${stateFilePath} removed on request, the service will start empty`);
    }
    return reset;
  }

  private async verifyService(): Promise<Attempt<unknown>> {
    const { supervisor, serviceName, settleMs } = this.options;
    return attempt(async () => {
      await delay(settleMs);
      if (!(await supervisor.isActive(serviceName))) {
        throw new Error(`${serviceName} is not active ${settleMs}ms after start`);
      }
    });
  }

  private async executeUpdateStep(step: UpdateStep, context: RunContext): Promise<StepOutcome> {
    const { supervisor, serviceName, vcs, remote, branch, snapshots, snapshotRetention } = this.options;

    switch (step) {
      case "stop_service":
        return { attempt: await this.stopService() };
      case "capture_snapshot":
        return this.captureSnapshot(context);
      case "discard_local_changes":
        return { attempt: await attempt(() => vcs.discardLocalChanges()) };
      case "fetch_remote":
        return { attempt: await attempt(() => vcs.fetchRemote(remote, branch)) };
      case "checkout_remote":
        return { attempt: await attempt(() => vcs.forceCheckout(`${remote}/${branch}`)) };
      case "install_dependencies":
        return { attempt: await this.installDependencies() };
      case "migrate_state":
        return { attempt: await this.migrateState(context) };
      case "start_service":
        return { attempt: await attempt(() => supervisor.start(serviceName)) };
      case "verify_service":
        return { attempt: await this.verifyService() };
      case "prune_snapshots": {
        const pruned = await attempt(() => snapshots.prune(snapshotRetention));
        if (pruned.status === "ok" && pruned.value.length > 0) {
          context.logger.info(`pruned snapshots: ${pruned.value.join(", ")}`);
        }
        return { attempt: pruned };
      }
    }
  }

  private async runUpdateStep(step: UpdateStep, context: RunContext): Promise<StepOutcome> {
    const outcome = await this.executeUpdateStep(step, context).catch(
      (error: unknown): StepOutcome => ({ attempt: failed(toErrorMessage(error)) })
    );

    context.steps.push(toStepReport(step, outcome.attempt));
    if (outcome.warning) {
      context.logger.warn(outcome.warning);
    }
    switch (outcome.attempt.status) {
      case "ok":
        context.logger.info(`${step}: done`);
        break;
      case "skipped":
        context.logger.info(`${step}: skipped (${outcome.attempt.reason})`);
        break;
      case "failed": {
        const policy = UPDATE_STEP_POLICIES[step];
        if (policy.onFailure === "fatal") {
          context.logger.error(`${step}: ${outcome.attempt.error}`);
        } else {
          context.logger.warn(`${step}: ${outcome.attempt.error}`);
        }
        break;
      }
    }

    return outcome;
  }

  private async runRollbackStep(step: RollbackStep, context: RunContext): Promise<Attempt<unknown>> {
    const { rollback } = this.options;
    const result = await rollback
      .runStep(step, context.snapshot)
      .catch((error: unknown): Attempt<unknown> => failed(toErrorMessage(error)));

    context.rollbackSteps.push(toStepReport(step, result));
    rollback.logStep(step, result, context.logger);
    return result;
  }

  private traceTransition(previous: UpdateMachineState | null, result: TransitionResult, context: RunContext): void {
    const { effect, state } = result;

    if (effect.type === "run_update_step") {
      const phase = UPDATE_STEP_POLICIES[effect.step].phase;
      const previousStep = previous?.status === "updating" ? previous.step : null;
      const previousPhase =
        previousStep !== null && isUpdateStep(previousStep) ? UPDATE_STEP_POLICIES[previousStep].phase : null;
      if (phase !== previousPhase) {
        context.logger.info(`[Phase ${PHASE_ORDER.indexOf(phase) + 1}/${PHASE_ORDER.length}] ${PHASE_LABELS[phase]}`);
      }
      return;
    }

    if (effect.type === "run_rollback_step" && previous?.status === "updating") {
      const target = context.snapshot ? `snapshot ${context.snapshot.id}` : "the previous service state";
      context.logger.warn(
        `${state.failedStep ?? "update"} failed in ${state.failedPhase ?? "an unknown phase"}, rolling back to ${target}`
      );
    }
  }

  private recordRun(runId: string, finishedAt: string, state: UpdateMachineState, context: RunContext): void {
    const { stateStore } = this.options;
    const outcome = state.outcome ?? "failed";

    try {
      if (outcome !== "success" && context.resetConsumed) {
        stateStore.patch({ resetRequested: true, resetRequestedAt: finishedAt });
        context.logger.warn("state reset was re-armed because the update did not succeed");
      }

      stateStore.patch({
        lastRunId: runId,
        lastRunAt: finishedAt,
        lastOutcome: outcome,
        lastFailedPhase: state.failedPhase,
        lastSnapshotId: context.snapshot?.id,
        lastError: state.error
      });
    } catch (error) {
      context.logger.error(`could not record the update run: ${toErrorMessage(error)}`);
    }
  }

  private summarize(state: UpdateMachineState, context: RunContext): void {
    const location = context.snapshot?.path ?? "no snapshot";
    switch (state.outcome) {
      case "success":
        context.logger.info(`update complete, snapshot kept at ${location}`);
        return;
      case "rolled_back":
        context.logger.warn(`update failed in ${state.failedPhase ?? "unknown phase"} and was rolled back from ${location}`);
        return;
      case "partial_rollback":
        context.logger.error(
          `update failed in ${state.failedPhase ?? "unknown phase"} and the rollback was partial, inspect ${location}`
        );
        return;
      default:
        context.logger.error(`update failed before a snapshot was captured: ${state.error ?? "unknown error"}`);
    }
  }

  /**
   * Runs the five update phases. Never throws: every collaborator failure is
   * folded into the returned result.
   */
  async runUpdate(): Promise<UpdateResult> {
    const runId = (this.options.createRunId ?? (() => nanoid(12)))();
    const startedAt = nowIso();
    const logs: string[] = [];
    const context: RunContext = {
      resetConsumed: false,
      steps: [],
      rollbackSteps: [],
      logs,
      logger: this.createRunLogger(logs)
    };
    context.logger.info(`update ${runId} started for ${this.options.serviceName}`);

    let previous: UpdateMachineState | null = null;
    let finalState: UpdateMachineState;
    try {
      finalState = await runMachine(createUpdateMachineState(), { type: "BEGIN_UPDATE" }, {
        runUpdateStep: (step) => this.runUpdateStep(step, context),
        runRollbackStep: (step) => this.runRollbackStep(step, context),
        onTransition: (result) => {
          this.traceTransition(previous, result, context);
          previous = result.state;
        }
      });
    } catch (error) {
      const message = toErrorMessage(error);
      context.logger.error(`update machine stopped: ${message}`);
      finalState = {
        ...createUpdateMachineState(),
        status: "finished",
        outcome: "failed",
        error: message
      };
    } finally {
      context.releaseSnapshot?.();
    }

    const finishedAt = nowIso();
    this.summarize(finalState, context);
    this.recordRun(runId, finishedAt, finalState, context);
    const outcome = finalState.outcome ?? "failed";

    return {
      runId,
      outcome,
      success: outcome === "success",
      startedAt,
      finishedAt,
      backupLocation: context.snapshot?.path,
      snapshotId: context.snapshot?.id,
      previousRef: context.snapshot?.previousRef,
      failedPhase: finalState.failedPhase,
      failedStep: finalState.failedStep,
      error: finalState.error,
      warnings: finalState.warnings,
      steps: context.steps,
      rollback: context.rollbackSteps.length > 0 ? context.rollbackSteps : undefined,
      logs
    };
  }
}
