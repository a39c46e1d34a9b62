import { describe, expect, it } from "vitest";

import { failed, skipped, succeeded } from "../../server/updater/attempt.js";
import {
  InvalidTransitionError,
  createRollbackMachineState,
  createUpdateMachineState,
  runMachine,
  transition,
  type UpdateMachineState
} from "../../server/updater/machine.js";
import type { RollbackStep, UpdateStep } from "../../server/updater/types.js";

function updatingAt(step: UpdateStep, overrides: Partial<UpdateMachineState> = {}): UpdateMachineState {
  return { ...createUpdateMachineState(), status: "updating", step, ...overrides };
}

function rollingBackAt(step: RollbackStep, overrides: Partial<UpdateMachineState> = {}): UpdateMachineState {
  return { ...createUpdateMachineState(), status: "rolling_back", step, snapshotCaptured: true, ...overrides };
}

describe("update machine", () => {
  it("starts at the stop step", () => {
    const result = transition(createUpdateMachineState(), { type: "BEGIN_UPDATE" });

    expect(result.state.status).toBe("updating");
    expect(result.effect).toEqual({ type: "run_update_step", step: "stop_service" });
  });

  it("records a warning and moves on when a non-fatal step fails", () => {
    const result = transition(updatingAt("stop_service"), {
      type: "UPDATE_STEP_FINISHED",
      step: "stop_service",
      attempt: failed("unit is stuck")
    });

    expect(result.state.warnings).toEqual(["pre_update: unit is stuck"]);
    expect(result.effect).toEqual({ type: "run_update_step", step: "capture_snapshot" });
  });

  it("prefixes step warnings with their phase", () => {
    const result = transition(updatingAt("capture_snapshot"), {
      type: "UPDATE_STEP_FINISHED",
      step: "capture_snapshot",
      attempt: succeeded(undefined),
      warning: "reference unresolved"
    });

    expect(result.state.snapshotCaptured).toBe(true);
    expect(result.state.warnings).toEqual(["pre_update: reference unresolved"]);
  });

  it("switches to rollback on a fatal failure", () => {
    const result = transition(updatingAt("fetch_remote", { snapshotCaptured: true }), {
      type: "UPDATE_STEP_FINISHED",
      step: "fetch_remote",
      attempt: failed("timed out")
    });

    expect(result.state).toMatchObject({
      status: "rolling_back",
      step: "restore_state",
      failedPhase: "code_update",
      failedStep: "fetch_remote",
      error: "timed out"
    });
    expect(result.effect).toEqual({ type: "run_rollback_step", step: "restore_state" });
  });

  it("finishes with success after the last step, even when pruning fails", () => {
    const result = transition(updatingAt("prune_snapshots", { snapshotCaptured: true }), {
      type: "UPDATE_STEP_FINISHED",
      step: "prune_snapshots",
      attempt: failed("permission denied")
    });

    expect(result.effect).toEqual({ type: "finish", outcome: "success" });
    expect(result.state.warnings).toEqual(["restart_verify: permission denied"]);
  });

  it("marks a skipped code revert as a partial rollback", () => {
    const afterRevert = transition(rollingBackAt("revert_code"), {
      type: "ROLLBACK_STEP_FINISHED",
      step: "revert_code",
      attempt: skipped("previous reference is unknown")
    });
    const finished = transition(afterRevert.state, {
      type: "ROLLBACK_STEP_FINISHED",
      step: "restart_service",
      attempt: succeeded(undefined)
    });

    expect(finished.effect).toEqual({ type: "finish", outcome: "partial_rollback" });
  });

  it("reports failed when no snapshot was captured", () => {
    const result = transition(rollingBackAt("restart_service", { snapshotCaptured: false }), {
      type: "ROLLBACK_STEP_FINISHED",
      step: "restart_service",
      attempt: succeeded(undefined)
    });

    expect(result.effect).toEqual({ type: "finish", outcome: "failed" });
  });

  it("rejects events that do not match the current step", () => {
    expect(() =>
      transition(updatingAt("fetch_remote"), {
        type: "UPDATE_STEP_FINISHED",
        step: "checkout_remote",
        attempt: succeeded(undefined)
      })
    ).toThrow(InvalidTransitionError);
    expect(() => transition(updatingAt("fetch_remote"), { type: "BEGIN_UPDATE" })).toThrow(
      "Invalid event BEGIN_UPDATE for state updating/fetch_remote"
    );
  });

  it("drives every update step in order", async () => {
    const visited: string[] = [];

    const finalState = await runMachine(createUpdateMachineState(), { type: "BEGIN_UPDATE" }, {
      runUpdateStep: async (step) => {
        visited.push(step);
        return { attempt: succeeded(undefined) };
      },
      runRollbackStep: async (step) => {
        visited.push(step);
        return succeeded(undefined);
      }
    });

    expect(finalState.outcome).toBe("success");
    expect(visited).toEqual([
      "stop_service",
      "capture_snapshot",
      "discard_local_changes",
      "fetch_remote",
      "checkout_remote",
      "install_dependencies",
      "migrate_state",
      "start_service",
      "verify_service",
      "prune_snapshots"
    ]);
  });

  it("attempts the restart even after every earlier rollback step failed", async () => {
    const visited: string[] = [];

    const finalState = await runMachine(createRollbackMachineState(), { type: "BEGIN_ROLLBACK" }, {
      runUpdateStep: async () => ({ attempt: failed("unexpected") }),
      runRollbackStep: async (step) => {
        visited.push(step);
        return step === "restart_service" ? succeeded(undefined) : failed("disk full");
      }
    });

    expect(visited).toEqual(["restore_state", "revert_code", "restart_service"]);
    expect(finalState.outcome).toBe("partial_rollback");
  });
});
