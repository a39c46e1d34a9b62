import { attempt, describeAttempt } from "./attempt.js";
import { ManualBackupManager, type RestoreBackupOptions } from "./backups.js";
import { CommandDependencyInstaller } from "./dependencies.js";
import { UpdaterError } from "./errors.js";
import { GitBackend } from "./git.js";
import { FileUpdaterLock, type UpdaterLock } from "./lock.js";
import { createConsoleLogger } from "./logger.js";
import { UpdateOrchestrator } from "./orchestrator.js";
import { RollbackExecutor } from "./rollback.js";
import { SnapshotStore, UNKNOWN_REFERENCE } from "./snapshots.js";
import { UpdaterStateStore } from "./state.js";
import { ComposeSupervisor, SystemdSupervisor } from "./supervisors.js";
import type { UpdaterConfig } from "./config.js";
import type {
  DependencyInstaller,
  ManualBackupEntry,
  ProcessSupervisor,
  RestoreResult,
  SnapshotRecord,
  UpdateResult,
  UpdaterLogger,
  UpdaterStateSnapshot,
  UpdaterStatus,
  VersionControlBackend
} from "./types.js";

export interface UpdaterControl {
  getStatus(): Promise<UpdaterStatus>;
  runUpdate(): Promise<UpdateResult>;
  requestStateReset(): Promise<UpdaterStateSnapshot>;
  cancelStateReset(): Promise<UpdaterStateSnapshot>;
  listSnapshots(): Promise<SnapshotRecord[]>;
  pruneSnapshots(keepCount?: number): Promise<string[]>;
  createBackup(): Promise<ManualBackupEntry>;
  listBackups(): Promise<ManualBackupEntry[]>;
  restoreBackup(artifactPath: string, options: RestoreBackupOptions): Promise<RestoreResult>;
}

export interface UpdaterServiceDependencies {
  supervisor: ProcessSupervisor;
  vcs: VersionControlBackend;
  installer: DependencyInstaller;
  logger: UpdaterLogger;
  lock: UpdaterLock;
}

function nowIso(): string {
  return new Date().toISOString();
}

export class UpdaterService implements UpdaterControl {
  private readonly stateStore: UpdaterStateStore;
  private readonly snapshots: SnapshotStore;
  private readonly orchestrator: UpdateOrchestrator;
  private readonly backups: ManualBackupManager;
  private busy = false;

  constructor(
    private readonly config: UpdaterConfig,
    private readonly deps: UpdaterServiceDependencies
  ) {
    const { supervisor, vcs, installer, logger } = deps;
    this.stateStore = new UpdaterStateStore(config.updaterStatePath);
    this.snapshots = new SnapshotStore(config.snapshotDir);

    const rollback = new RollbackExecutor({
      serviceName: config.serviceName,
      stateFilePath: config.stateFilePath,
      settleMs: config.settleMs,
      supervisor,
      vcs,
      snapshots: this.snapshots,
      logger
    });

    this.orchestrator = new UpdateOrchestrator({
      serviceName: config.serviceName,
      remote: config.remote,
      branch: config.branch,
      stateFilePath: config.stateFilePath,
      configFilePath: config.configFilePath,
      settleMs: config.settleMs,
      snapshotRetention: config.snapshotRetention,
      supervisor,
      vcs,
      installer,
      snapshots: this.snapshots,
      stateStore: this.stateStore,
      rollback,
      logger
    });

    this.backups = new ManualBackupManager({
      stateFilePath: config.stateFilePath,
      backupDir: config.backupDir,
      serviceName: config.serviceName,
      supervisor,
      logger
    });
  }

  private async exclusive<T>(operation: () => Promise<T>): Promise<T> {
    if (this.busy) {
      throw new UpdaterError("Updater is busy with another operation.", "busy");
    }

    this.busy = true;
    try {
      return await this.deps.lock.runExclusive(operation);
    } finally {
      this.busy = false;
    }
  }

  async getStatus(): Promise<UpdaterStatus> {
    const { supervisor, vcs } = this.deps;
    const { serviceName } = this.config;
    const state = this.stateStore.read();

    const [active, statusText, reference, snapshots] = await Promise.all([
      attempt(() => supervisor.isActive(serviceName)),
      attempt(() => supervisor.status(serviceName)),
      attempt(() => vcs.currentReference()),
      this.snapshots.list()
    ]);

    return {
      serviceName,
      serviceActive: active.status === "ok" && active.value,
      serviceStatus: statusText.status === "ok" ? statusText.value.trim() : `unavailable: ${describeAttempt(statusText) ?? ""}`,
      currentRef: reference.status === "ok" ? reference.value : UNKNOWN_REFERENCE,
      resetRequested: state.resetRequested,
      busy: this.busy,
      snapshotCount: snapshots.length,
      lastRunId: state.lastRunId,
      lastRunAt: state.lastRunAt,
      lastOutcome: state.lastOutcome,
      lastFailedPhase: state.lastFailedPhase,
      lastSnapshotId: state.lastSnapshotId,
      lastError: state.lastError
    };
  }

  async runUpdate(): Promise<UpdateResult> {
    return this.exclusive(() => this.orchestrator.runUpdate());
  }

  async requestStateReset(): Promise<UpdaterStateSnapshot> {
    return this.exclusive(async () => {
      this.deps.logger.warn(`state reset requested, ${this.config.stateFilePath} will be removed by the next update`);
      return this.stateStore.patch({ resetRequested: true, resetRequestedAt: nowIso() });
    });
  }

  async cancelStateReset(): Promise<UpdaterStateSnapshot> {
    return this.exclusive(async () => this.stateStore.patch({ resetRequested: false, resetRequestedAt: undefined }));
  }

  async listSnapshots(): Promise<SnapshotRecord[]> {
    return this.snapshots.list();
  }

  async pruneSnapshots(keepCount = this.config.snapshotRetention): Promise<string[]> {
    return this.exclusive(async () => {
      const removed = await this.snapshots.prune(keepCount);
      this.deps.logger.info(removed.length > 0 ? `pruned snapshots: ${removed.join(", ")}` : "no snapshots to prune");
      return removed;
    });
  }

  async createBackup(): Promise<ManualBackupEntry> {
    return this.exclusive(() => this.backups.createBackup());
  }

  async listBackups(): Promise<ManualBackupEntry[]> {
    return this.backups.listBackups();
  }

  async restoreBackup(artifactPath: string, options: RestoreBackupOptions): Promise<RestoreResult> {
    return this.exclusive(() => this.backups.restoreBackup(artifactPath, options));
  }
}

export function createSupervisor(config: UpdaterConfig): ProcessSupervisor {
  if (config.supervisor === "compose") {
    return new ComposeSupervisor({
      dockerBinary: config.dockerBinary,
      composeFilePath: config.composeFilePath,
      timeoutMs: config.supervisorTimeoutMs
    });
  }

  return new SystemdSupervisor({
    systemctlBinary: config.systemctlBinary,
    timeoutMs: config.supervisorTimeoutMs
  });
}

export function createUpdaterService(
  config: UpdaterConfig,
  logger: UpdaterLogger = createConsoleLogger()
): UpdaterService {
  return new UpdaterService(config, {
    supervisor: createSupervisor(config),
    vcs: new GitBackend({ gitBinary: config.gitBinary, workDir: config.workDir, timeoutMs: config.vcsTimeoutMs }),
    installer: new CommandDependencyInstaller({
      command: config.installCommand,
      workDir: config.workDir,
      timeoutMs: config.installTimeoutMs
    }),
    logger,
    lock: new FileUpdaterLock(config.lockPath)
  });
}
