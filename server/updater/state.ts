import fs from "node:fs";
import path from "node:path";

import type { UpdateOutcome, UpdatePhase, UpdaterStateSnapshot } from "./types.js";

const DEFAULT_STATE: UpdaterStateSnapshot = {
  version: 1,
  resetRequested: false
};

const OUTCOMES = new Set<string>(["success", "rolled_back", "partial_rollback", "failed"]);
const PHASES = new Set<string>(["pre_update", "code_update", "dependencies", "state_migration", "restart_verify"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function normalizeString(value: unknown): string | undefined {
  if (typeof value !== "string") {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function isOutcome(value: string): value is UpdateOutcome {
  return OUTCOMES.has(value);
}

function isPhase(value: string): value is UpdatePhase {
  return PHASES.has(value);
}

function normalizeOutcome(value: unknown): UpdateOutcome | undefined {
  const normalized = normalizeString(value);
  return normalized && isOutcome(normalized) ? normalized : undefined;
}

function normalizePhase(value: unknown): UpdatePhase | undefined {
  const normalized = normalizeString(value);
  return normalized && isPhase(normalized) ? normalized : undefined;
}

function normalizeState(value: unknown): UpdaterStateSnapshot {
  if (!isRecord(value)) {
    return { ...DEFAULT_STATE };
  }

  const resetRequested = value.resetRequested === true;

  return {
    version: 1,
    resetRequested,
    resetRequestedAt: resetRequested ? normalizeString(value.resetRequestedAt) : undefined,
    lastRunId: normalizeString(value.lastRunId),
    lastRunAt: normalizeString(value.lastRunAt),
    lastOutcome: normalizeOutcome(value.lastOutcome),
    lastFailedPhase: normalizePhase(value.lastFailedPhase),
    lastSnapshotId: normalizeString(value.lastSnapshotId),
    lastError: normalizeString(value.lastError)
  };
}

export class UpdaterStateStore {
  private state: UpdaterStateSnapshot;

  constructor(private readonly statePath: string) {
    this.state = this.load();
  }

  private load(): UpdaterStateSnapshot {
    try {
      const raw = fs.readFileSync(this.statePath, "utf8");
      return normalizeState(JSON.parse(raw));
    } catch {
      return { ...DEFAULT_STATE };
    }
  }

  private persist(): void {
    const dirPath = path.dirname(this.statePath);
    fs.mkdirSync(dirPath, { recursive: true });
    const tempPath = `${this.statePath}.tmp`;
    fs.writeFileSync(tempPath, `${JSON.stringify(this.state, null, 2)}\n`, "utf8");
    fs.renameSync(tempPath, this.statePath);
  }

  /** Re-reads the file so flags set by another process are seen. */
  read(): UpdaterStateSnapshot {
    this.state = this.load();
    return structuredClone(this.state);
  }

  patch(patch: Partial<UpdaterStateSnapshot>): UpdaterStateSnapshot {
    this.state = normalizeState({
      ...this.load(),
      ...patch
    });
    this.persist();
    return structuredClone(this.state);
  }
}
