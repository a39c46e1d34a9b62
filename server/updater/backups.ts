import fs from "node:fs/promises";
import path from "node:path";

import { UpdaterError, toErrorMessage } from "./errors.js";
import type { ManualBackupEntry, ProcessSupervisor, RestoreResult, UpdaterLogger } from "./types.js";

export interface ManualBackupOptions {
  stateFilePath: string;
  backupDir: string;
  serviceName: string;
  supervisor: ProcessSupervisor;
  logger: UpdaterLogger;
  now?: () => Date;
}

export interface RestoreBackupOptions {
  confirmed: boolean;
}

const BACKUP_MARKER = "_backup_";

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Local time, `YYYYMMDD_HHMMSS`. */
export function formatBackupStamp(date: Date): string {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.access(filePath);
    return true;
  } catch {
    return false;
  }
}

async function firstFreePath(basePath: string, suffix: (index: number) => string): Promise<string> {
  for (let index = 0; index < 1000; index += 1) {
    const candidate = `${basePath}${suffix(index)}`;
    if (!(await pathExists(candidate))) {
      return candidate;
    }
  }
  throw new UpdaterError(`No free file name next to ${basePath}.`, "internal");
}

export class ManualBackupManager {
  private readonly now: () => Date;

  constructor(private readonly options: ManualBackupOptions) {
    this.now = options.now ?? (() => new Date());
  }

  private backupPrefix(): string {
    const parsed = path.parse(this.options.stateFilePath);
    return `${parsed.name}${BACKUP_MARKER}`;
  }

  async createBackup(): Promise<ManualBackupEntry> {
    const { stateFilePath, backupDir, logger } = this.options;
    if (!(await pathExists(stateFilePath))) {
      throw new UpdaterError(`State file ${stateFilePath} does not exist, nothing to back up.`, "state_missing");
    }

    await fs.mkdir(backupDir, { recursive: true });
    const extension = path.extname(stateFilePath);
    const stem = path.join(backupDir, `${this.backupPrefix()}${formatBackupStamp(this.now())}`);

    for (let index = 1; index < 1000; index += 1) {
      const targetPath = index === 1 ? `${stem}${extension}` : `${stem}-${index}${extension}`;
      try {
        await fs.copyFile(stateFilePath, targetPath, fs.constants.COPYFILE_EXCL);
      } catch (error) {
        if (hasErrorCode(error, "EEXIST")) {
          continue;
        }
        throw error;
      }

      const stats = await fs.stat(targetPath);
      logger.info(`state file backed up to ${targetPath}`);
      return {
        path: targetPath,
        name: path.basename(targetPath),
        sizeBytes: stats.size,
        modifiedAt: stats.mtime.toISOString()
      };
    }

    throw new UpdaterError(`No free backup name for ${stem}.`, "internal");
  }

  async listBackups(): Promise<ManualBackupEntry[]> {
    const { backupDir } = this.options;
    const prefix = this.backupPrefix();

    let names: string[];
    try {
      names = await fs.readdir(backupDir);
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return [];
      }
      throw error;
    }

    const entries: ManualBackupEntry[] = [];
    for (const name of names.filter((entry) => entry.startsWith(prefix))) {
      const filePath = path.join(backupDir, name);
      const stats = await fs.stat(filePath);
      if (!stats.isFile()) {
        continue;
      }
      entries.push({ path: filePath, name, sizeBytes: stats.size, modifiedAt: stats.mtime.toISOString() });
    }

    return entries.sort((left, right) => {
      const byTime = Date.parse(right.modifiedAt) - Date.parse(left.modifiedAt);
      return byTime !== 0 ? byTime : right.name.localeCompare(left.name);
    });
  }

  /**
   * Replaces the state file with a backup artifact. The current file is kept
   * as a `.old` sidecar and never removed.
   */
  async restoreBackup(artifactPath: string, options: RestoreBackupOptions): Promise<RestoreResult> {
    const { stateFilePath, serviceName, supervisor, logger } = this.options;
    const trimmed = artifactPath.trim();

    if (trimmed.length === 0) {
      throw new UpdaterError("A backup path is required.", "invalid_input");
    }
    const sourcePath = path.resolve(trimmed);
    if (sourcePath === path.resolve(stateFilePath)) {
      throw new UpdaterError("The backup path points at the live state file.", "invalid_input");
    }

    const stats = await fs.stat(sourcePath).catch((error: unknown) => {
      if (hasErrorCode(error, "ENOENT")) {
        return null;
      }
      throw error;
    });
    if (!stats) {
      throw new UpdaterError(`Backup ${sourcePath} does not exist.`, "not_found");
    }
    if (!stats.isFile()) {
      throw new UpdaterError(`Backup ${sourcePath} is not a file.`, "invalid_input");
    }
    if (!options.confirmed) {
      throw new UpdaterError("Restore replaces the current state file and must be confirmed.", "invalid_input");
    }

    try {
      await supervisor.stop(serviceName);
    } catch (error) {
      throw new UpdaterError(`Could not stop ${serviceName}: ${toErrorMessage(error)}`, "service_control");
    }
    logger.info(`${serviceName} stopped for restore`);

    let sidecarPath: string | undefined;
    try {
      if (await pathExists(stateFilePath)) {
        const keepPath = await firstFreePath(`${stateFilePath}.old`, (index) => (index === 0 ? "" : `.${index}`));
        await fs.rename(stateFilePath, keepPath);
        sidecarPath = keepPath;
        logger.info(`current state file kept at ${keepPath}`);
      }
      await fs.mkdir(path.dirname(stateFilePath), { recursive: true });
      await fs.copyFile(sourcePath, stateFilePath);
    } catch (error) {
      const message = toErrorMessage(error);
      logger.error(`restore failed: ${message}`);
      if (sidecarPath) {
        const keptPath = sidecarPath;
        await fs.rename(keptPath, stateFilePath).catch((moveError: unknown) => {
          logger.error(`could not move ${keptPath} back: ${toErrorMessage(moveError)}`);
        });
      }
      await supervisor.start(serviceName).catch((startError: unknown) => {
        logger.error(`${serviceName} did not start after the failed restore: ${toErrorMessage(startError)}`);
      });
      throw new UpdaterError(`Restore from ${sourcePath} failed: ${message}`, "internal");
    }

    let serviceStarted = true;
    try {
      await supervisor.start(serviceName);
    } catch (error) {
      serviceStarted = false;
      logger.error(`${serviceName} did not start after restore: ${toErrorMessage(error)}`);
    }

    logger.info(`state file restored from ${sourcePath}`);
    return { statePath: stateFilePath, restoredFrom: sourcePath, sidecarPath, serviceStarted };
  }
}
