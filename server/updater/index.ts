export { createUpdaterApp } from "./app.js";
export { ManualBackupManager, formatBackupStamp } from "./backups.js";
export type { ManualBackupOptions, RestoreBackupOptions } from "./backups.js";
export { EXIT_CODES, createUpdaterProgram, promptConfirm } from "./cli.js";
export type { CliRuntime } from "./cli.js";
export { CommandError, runCommand } from "./commands.js";
export type { CommandOptions, CommandOutput, CommandRunner } from "./commands.js";
export { parseCommandLine, resolveUpdaterConfig, resolveUpdaterServerConfig } from "./config.js";
export type { UpdaterConfig, UpdaterServerConfig } from "./config.js";
export { CommandDependencyInstaller } from "./dependencies.js";
export { mergeEnvFile, readEnvFile } from "./envFile.js";
export { UpdaterError, toErrorMessage } from "./errors.js";
export type { UpdaterErrorCode } from "./errors.js";
export { GitBackend } from "./git.js";
export { FileUpdaterLock } from "./lock.js";
export type { UpdaterLock } from "./lock.js";
export { createConsoleLogger } from "./logger.js";
export { InvalidTransitionError, UPDATE_STEP_POLICIES, runMachine, transition } from "./machine.js";
export type { UpdateEffect, UpdateEvent, UpdateMachineState } from "./machine.js";
export { UpdateOrchestrator } from "./orchestrator.js";
export type { UpdateOrchestratorOptions } from "./orchestrator.js";
export { RollbackExecutor } from "./rollback.js";
export type { RollbackExecutorOptions } from "./rollback.js";
export { SnapshotStore, UNKNOWN_REFERENCE, formatSnapshotStamp } from "./snapshots.js";
export { UpdaterStateStore } from "./state.js";
export { ComposeSupervisor, SystemdSupervisor } from "./supervisors.js";
export { UpdaterService, createSupervisor, createUpdaterService } from "./service.js";
export type { UpdaterControl, UpdaterServiceDependencies } from "./service.js";
export type * from "./types.js";
