import type { Attempt } from "./attempt.js";
import type { RollbackStep, UpdateOutcome, UpdatePhase, UpdateStep } from "./types.js";

// ========== Step Table ==========

interface UpdateStepPolicy {
  phase: UpdatePhase;
  /** `warn` records the failure and moves on; `fatal` switches to rollback. */
  onFailure: "warn" | "fatal";
  next: UpdateStep | null;
}

export const UPDATE_STEP_POLICIES: Record<UpdateStep, UpdateStepPolicy> = {
  stop_service: { phase: "pre_update", onFailure: "warn", next: "capture_snapshot" },
  capture_snapshot: { phase: "pre_update", onFailure: "fatal", next: "discard_local_changes" },
  discard_local_changes: { phase: "code_update", onFailure: "warn", next: "fetch_remote" },
  fetch_remote: { phase: "code_update", onFailure: "fatal", next: "checkout_remote" },
  checkout_remote: { phase: "code_update", onFailure: "fatal", next: "install_dependencies" },
  install_dependencies: { phase: "dependencies", onFailure: "warn", next: "migrate_state" },
  migrate_state: { phase: "state_migration", onFailure: "warn", next: "start_service" },
  start_service: { phase: "restart_verify", onFailure: "fatal", next: "verify_service" },
  verify_service: { phase: "restart_verify", onFailure: "fatal", next: "prune_snapshots" },
  prune_snapshots: { phase: "restart_verify", onFailure: "warn", next: null }
};

const ROLLBACK_SEQUENCE: Record<RollbackStep, RollbackStep | null> = {
  restore_state: "revert_code",
  revert_code: "restart_service",
  restart_service: null
};

const FIRST_UPDATE_STEP: UpdateStep = "stop_service";
const FIRST_ROLLBACK_STEP: RollbackStep = "restore_state";

// ========== State, Events, Effects ==========

export type UpdateMachineStatus = "idle" | "updating" | "rolling_back" | "finished";

export interface UpdateMachineState {
  status: UpdateMachineStatus;
  step: UpdateStep | RollbackStep | null;
  snapshotCaptured: boolean;
  rollbackDegraded: boolean;
  warnings: string[];
  failedPhase?: UpdatePhase;
  failedStep?: UpdateStep;
  error?: string;
  outcome?: UpdateOutcome;
}

export type UpdateEvent =
  | { type: "BEGIN_UPDATE" }
  | { type: "BEGIN_ROLLBACK" }
  | { type: "UPDATE_STEP_FINISHED"; step: UpdateStep; attempt: Attempt<unknown>; warning?: string }
  | { type: "ROLLBACK_STEP_FINISHED"; step: RollbackStep; attempt: Attempt<unknown> };

export type UpdateEffect =
  | { type: "run_update_step"; step: UpdateStep }
  | { type: "run_rollback_step"; step: RollbackStep }
  | { type: "finish"; outcome: UpdateOutcome };

export interface TransitionResult {
  state: UpdateMachineState;
  effect: UpdateEffect;
}

export class InvalidTransitionError extends Error {
  constructor(state: UpdateMachineState, event: UpdateEvent) {
    const step = "step" in event ? ` (${event.step})` : "";
    super(`Invalid event ${event.type}${step} for state ${state.status}/${state.step ?? "none"}`);
    this.name = "InvalidTransitionError";
  }
}

export function createUpdateMachineState(): UpdateMachineState {
  return {
    status: "idle",
    step: null,
    snapshotCaptured: false,
    rollbackDegraded: false,
    warnings: []
  };
}

/** State for a rollback driven on its own, against an already captured snapshot. */
export function createRollbackMachineState(): UpdateMachineState {
  return {
    ...createUpdateMachineState(),
    snapshotCaptured: true
  };
}

function rollbackOutcome(state: UpdateMachineState): UpdateOutcome {
  if (!state.snapshotCaptured) {
    return "failed";
  }
  return state.rollbackDegraded ? "partial_rollback" : "rolled_back";
}

function finish(state: UpdateMachineState, outcome: UpdateOutcome): TransitionResult {
  return {
    state: { ...state, status: "finished", step: null, outcome },
    effect: { type: "finish", outcome }
  };
}

function enterRollback(state: UpdateMachineState): TransitionResult {
  return {
    state: { ...state, status: "rolling_back", step: FIRST_ROLLBACK_STEP },
    effect: { type: "run_rollback_step", step: FIRST_ROLLBACK_STEP }
  };
}

function onUpdateStepFinished(
  state: UpdateMachineState,
  event: Extract<UpdateEvent, { type: "UPDATE_STEP_FINISHED" }>
): TransitionResult {
  const policy = UPDATE_STEP_POLICIES[event.step];
  const warnings = event.warning ? [...state.warnings, `${policy.phase}: ${event.warning}`] : [...state.warnings];
  const snapshotCaptured =
    state.snapshotCaptured || (event.step === "capture_snapshot" && event.attempt.status === "ok");
  let next: UpdateMachineState = { ...state, warnings, snapshotCaptured };

  if (event.attempt.status === "failed") {
    if (policy.onFailure === "fatal") {
      return enterRollback({
        ...next,
        failedPhase: policy.phase,
        failedStep: event.step,
        error: event.attempt.error
      });
    }
    next = { ...next, warnings: [...next.warnings, `${policy.phase}: ${event.attempt.error}`] };
  }

  if (policy.next === null) {
    return finish(next, "success");
  }

  return {
    state: { ...next, step: policy.next },
    effect: { type: "run_update_step", step: policy.next }
  };
}

function onRollbackStepFinished(
  state: UpdateMachineState,
  event: Extract<UpdateEvent, { type: "ROLLBACK_STEP_FINISHED" }>
): TransitionResult {
  // Skipping the code revert for an unknown reference still leaves the new code running.
  const degraded =
    event.attempt.status === "failed" ||
    (event.step === "revert_code" && event.attempt.status === "skipped" && state.snapshotCaptured);
  const next: UpdateMachineState = { ...state, rollbackDegraded: state.rollbackDegraded || degraded };
  const following = ROLLBACK_SEQUENCE[event.step];

  if (following === null) {
    return finish(next, rollbackOutcome(next));
  }

  return {
    state: { ...next, step: following },
    effect: { type: "run_rollback_step", step: following }
  };
}

// ========== Transition ==========

export function transition(state: UpdateMachineState, event: UpdateEvent): TransitionResult {
  switch (event.type) {
    case "BEGIN_UPDATE":
      if (state.status !== "idle") {
        throw new InvalidTransitionError(state, event);
      }
      return {
        state: { ...state, status: "updating", step: FIRST_UPDATE_STEP },
        effect: { type: "run_update_step", step: FIRST_UPDATE_STEP }
      };

    case "BEGIN_ROLLBACK":
      if (state.status !== "idle") {
        throw new InvalidTransitionError(state, event);
      }
      return enterRollback(state);

    case "UPDATE_STEP_FINISHED":
      if (state.status !== "updating" || state.step !== event.step) {
        throw new InvalidTransitionError(state, event);
      }
      return onUpdateStepFinished(state, event);

    case "ROLLBACK_STEP_FINISHED":
      if (state.status !== "rolling_back" || state.step !== event.step) {
        throw new InvalidTransitionError(state, event);
      }
      return onRollbackStepFinished(state, event);
  }
}

// ========== Driver ==========

export interface MachineHandlers {
  runUpdateStep(step: UpdateStep): Promise<{ attempt: Attempt<unknown>; warning?: string }>;
  runRollbackStep(step: RollbackStep): Promise<Attempt<unknown>>;
  onTransition?(result: TransitionResult, event: UpdateEvent): void;
}

/**
 * Feeds each effect's outcome back into `transition` until the machine
 * reaches `finish`. Handlers must not throw; they report through `Attempt`.
 */
export async function runMachine(
  initial: UpdateMachineState,
  begin: Extract<UpdateEvent, { type: "BEGIN_UPDATE" | "BEGIN_ROLLBACK" }>,
  handlers: MachineHandlers
): Promise<UpdateMachineState> {
  let event: UpdateEvent = begin;
  let result = transition(initial, event);
  handlers.onTransition?.(result, event);

  while (result.effect.type !== "finish") {
    if (result.effect.type === "run_update_step") {
      const step = result.effect.step;
      const { attempt, warning } = await handlers.runUpdateStep(step);
      event = { type: "UPDATE_STEP_FINISHED", step, attempt, warning };
    } else {
      const step = result.effect.step;
      event = { type: "ROLLBACK_STEP_FINISHED", step, attempt: await handlers.runRollbackStep(step) };
    }
    result = transition(result.state, event);
    handlers.onTransition?.(result, event);
  }

  return result.state;
}
