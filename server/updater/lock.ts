import fs from "node:fs";
import path from "node:path";

import { UpdaterError } from "./errors.js";

export interface UpdaterLock {
  runExclusive<T>(operation: () => Promise<T>): Promise<T>;
}

interface LockOwner {
  pid: number;
  acquiredAt: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readOwner(lockPath: string): LockOwner | null {
  try {
    const value: unknown = JSON.parse(fs.readFileSync(lockPath, "utf8"));
    if (!isRecord(value)) {
      return null;
    }
    if (typeof value.pid !== "number" || !Number.isInteger(value.pid) || value.pid <= 0) {
      return null;
    }
    return {
      pid: value.pid,
      acquiredAt: typeof value.acquiredAt === "string" ? value.acquiredAt : ""
    };
  } catch {
    return null;
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM means the pid exists under another user.
    return error instanceof Error && "code" in error && error.code === "EPERM";
  }
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

function sameOwner(left: LockOwner | null, right: LockOwner): boolean {
  return left !== null && left.pid === right.pid && left.acquiredAt === right.acquiredAt;
}

/**
 * Cross-process mutual exclusion through an exclusively created lock file.
 * A lock whose owner pid is gone is reclaimed once.
 */
export class FileUpdaterLock implements UpdaterLock {
  constructor(
    private readonly lockPath: string,
    private readonly isAlive: (pid: number) => boolean = isProcessAlive
  ) {}

  private tryCreate(): boolean {
    fs.mkdirSync(path.dirname(this.lockPath), { recursive: true });
    const owner: LockOwner = { pid: process.pid, acquiredAt: new Date().toISOString() };
    try {
      fs.writeFileSync(this.lockPath, `${JSON.stringify(owner)}\n`, { encoding: "utf8", flag: "wx" });
      return true;
    } catch (error) {
      if (hasErrorCode(error, "EEXIST")) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Moves the stale lock aside under a name only this process uses, then
   * checks that the moved file still names the dead owner. A fresh lock
   * taken by another process in the meantime is linked back in place.
   */
  private removeStale(stale: LockOwner): void {
    const asidePath = `${this.lockPath}.stale-${process.pid}-${Date.now()}`;
    try {
      fs.renameSync(this.lockPath, asidePath);
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return;
      }
      throw error;
    }

    try {
      if (!sameOwner(readOwner(asidePath), stale)) {
        fs.linkSync(asidePath, this.lockPath);
      }
    } catch (error) {
      if (!hasErrorCode(error, "EEXIST")) {
        throw error;
      }
    } finally {
      fs.rmSync(asidePath, { force: true });
    }
  }

  private acquire(): void {
    if (this.tryCreate()) {
      return;
    }

    const owner = readOwner(this.lockPath);
    if (owner && owner.pid !== process.pid && !this.isAlive(owner.pid)) {
      this.removeStale(owner);
      if (this.tryCreate()) {
        return;
      }
    }

    const current = readOwner(this.lockPath) ?? owner;
    const holder = current ? `pid ${current.pid} since ${current.acquiredAt || "an unknown time"}` : "another process";
    throw new UpdaterError(`Another updater operation is in progress (${holder}).`, "busy");
  }

  async runExclusive<T>(operation: () => Promise<T>): Promise<T> {
    this.acquire();
    try {
      return await operation();
    } finally {
      fs.rmSync(this.lockPath, { force: true });
    }
  }
}
