export type UpdatePhase = "pre_update" | "code_update" | "dependencies" | "state_migration" | "restart_verify";

export type UpdateStep =
  | "stop_service"
  | "capture_snapshot"
  | "discard_local_changes"
  | "fetch_remote"
  | "checkout_remote"
  | "install_dependencies"
  | "migrate_state"
  | "start_service"
  | "verify_service"
  | "prune_snapshots";

export type RollbackStep = "restore_state" | "revert_code" | "restart_service";

export type UpdateOutcome = "success" | "rolled_back" | "partial_rollback" | "failed";

export type SupervisorKind = "systemd" | "compose";

export interface ProcessSupervisor {
  start(serviceName: string): Promise<void>;
  stop(serviceName: string): Promise<void>;
  isActive(serviceName: string): Promise<boolean>;
  status(serviceName: string): Promise<string>;
}

export interface VersionControlBackend {
  currentReference(): Promise<string>;
  discardLocalChanges(): Promise<void>;
  fetchRemote(remote: string, branch: string): Promise<void>;
  forceCheckout(ref: string): Promise<void>;
}

export interface DependencyInstaller {
  /** Resolves `false` when there is nothing configured to install. */
  installAll(): Promise<boolean>;
}

export interface UpdaterLogger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface SnapshotRecord {
  id: string;
  path: string;
  createdAt: string;
  sequence: number;
  previousRef: string;
  stateCopyPath?: string;
  configCopyPath?: string;
}

export interface StepReport {
  step: UpdateStep | RollbackStep;
  status: "ok" | "skipped" | "failed";
  detail?: string;
}

export interface UpdateResult {
  runId: string;
  outcome: UpdateOutcome;
  success: boolean;
  startedAt: string;
  finishedAt: string;
  backupLocation?: string;
  snapshotId?: string;
  previousRef?: string;
  failedPhase?: UpdatePhase;
  failedStep?: UpdateStep;
  error?: string;
  warnings: string[];
  steps: StepReport[];
  rollback?: StepReport[];
  logs: string[];
}

export interface RollbackReport {
  snapshotId: string;
  outcome: Extract<UpdateOutcome, "rolled_back" | "partial_rollback">;
  steps: StepReport[];
}

export interface UpdaterStateSnapshot {
  version: 1;
  resetRequested: boolean;
  resetRequestedAt?: string;
  lastRunId?: string;
  lastRunAt?: string;
  lastOutcome?: UpdateOutcome;
  lastFailedPhase?: UpdatePhase;
  lastSnapshotId?: string;
  lastError?: string;
}

export interface UpdaterStatus {
  serviceName: string;
  serviceActive: boolean;
  serviceStatus: string;
  currentRef: string;
  resetRequested: boolean;
  busy: boolean;
  snapshotCount: number;
  lastRunId?: string;
  lastRunAt?: string;
  lastOutcome?: UpdateOutcome;
  lastFailedPhase?: UpdatePhase;
  lastSnapshotId?: string;
  lastError?: string;
}

export interface ManualBackupEntry {
  path: string;
  name: string;
  sizeBytes: number;
  modifiedAt: string;
}

export interface RestoreResult {
  statePath: string;
  restoredFrom: string;
  sidecarPath?: string;
  serviceStarted: boolean;
}
