import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";

import { UpdaterError } from "./errors.js";
import type { SnapshotRecord } from "./types.js";

export const UNKNOWN_REFERENCE = "unknown";

const SNAPSHOT_PREFIX = "update_";
const MANIFEST_FILE = "snapshot.json";
const REFERENCE_FILE = "previous_ref.txt";

const manifestSchema = z.object({
  version: z.literal(1),
  id: z.string().min(1),
  createdAt: z.string().refine((value) => Number.isFinite(Date.parse(value)), {
    message: "createdAt must be an ISO timestamp"
  }),
  sequence: z.number().int().min(1),
  previousRef: z.string().min(1),
  stateFile: z.string().min(1).optional(),
  configFile: z.string().min(1).optional()
});

type SnapshotManifest = z.infer<typeof manifestSchema>;

/**
 * `missing`: no manifest yet, the capture never finished.
 * `invalid`: a manifest that does not parse; kept on disk for inspection.
 */
type ManifestRead =
  | { status: "complete"; manifest: SnapshotManifest }
  | { status: "missing" }
  | { status: "invalid" };

interface SnapshotEntry {
  id: string;
  dirPath: string;
  manifest: SnapshotManifest | null;
  status: ManifestRead["status"];
}

export interface CaptureSnapshotInput {
  stateFilePath: string;
  configFilePath: string;
  previousRef: string;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

export function formatSnapshotStamp(date: Date): string {
  const day = `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}`;
  const time = `${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
  return `${day}_${time}_${pad(date.getUTCMilliseconds(), 3)}`;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

function isSnapshotId(id: string): boolean {
  return id.startsWith(SNAPSHOT_PREFIX) && path.basename(id) === id;
}

/** Newest first; equal timestamps fall back to insertion order. */
function compareNewestFirst(left: SnapshotManifest, right: SnapshotManifest): number {
  const byTime = Date.parse(right.createdAt) - Date.parse(left.createdAt);
  if (byTime !== 0) {
    return byTime;
  }
  return right.sequence - left.sequence;
}

async function copyIfPresent(sourcePath: string, targetPath: string): Promise<boolean> {
  try {
    await fs.copyFile(sourcePath, targetPath);
    return true;
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      return false;
    }
    throw error;
  }
}

export class SnapshotStore {
  private readonly retained = new Map<string, number>();

  constructor(
    readonly rootDir: string,
    private readonly now: () => Date = () => new Date()
  ) {}

  private async readManifest(dirPath: string): Promise<ManifestRead> {
    let raw: string;
    try {
      raw = await fs.readFile(path.join(dirPath, MANIFEST_FILE), "utf8");
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return { status: "missing" };
      }
      throw error;
    }

    let value: unknown;
    try {
      value = JSON.parse(raw);
    } catch {
      return { status: "invalid" };
    }
    const parsed = manifestSchema.safeParse(value);
    return parsed.success ? { status: "complete", manifest: parsed.data } : { status: "invalid" };
  }

  private async readEntries(): Promise<SnapshotEntry[]> {
    let names: string[];
    try {
      const dirents = await fs.readdir(this.rootDir, { withFileTypes: true });
      names = dirents
        .filter((dirent) => dirent.isDirectory() && dirent.name.startsWith(SNAPSHOT_PREFIX))
        .map((dirent) => dirent.name);
    } catch (error) {
      if (hasErrorCode(error, "ENOENT")) {
        return [];
      }
      throw error;
    }

    return Promise.all(
      names.map(async (name) => {
        const dirPath = path.join(this.rootDir, name);
        const read = await this.readManifest(dirPath);
        return {
          id: name,
          dirPath,
          manifest: read.status === "complete" ? read.manifest : null,
          status: read.status
        };
      })
    );
  }

  private toRecord(dirPath: string, manifest: SnapshotManifest): SnapshotRecord {
    return {
      id: path.basename(dirPath),
      path: dirPath,
      createdAt: manifest.createdAt,
      sequence: manifest.sequence,
      previousRef: manifest.previousRef,
      stateCopyPath: manifest.stateFile ? path.join(dirPath, manifest.stateFile) : undefined,
      configCopyPath: manifest.configFile ? path.join(dirPath, manifest.configFile) : undefined
    };
  }

  private async allocateDirectory(stamp: string): Promise<string> {
    for (let attempt = 0; attempt < 1000; attempt += 1) {
      const id = attempt === 0 ? `${SNAPSHOT_PREFIX}${stamp}` : `${SNAPSHOT_PREFIX}${stamp}-${attempt}`;
      try {
        await fs.mkdir(path.join(this.rootDir, id));
        return id;
      } catch (error) {
        if (!hasErrorCode(error, "EEXIST")) {
          throw error;
        }
      }
    }
    throw new UpdaterError(`Could not allocate a snapshot directory for ${stamp}.`, "internal");
  }

  /**
   * Copies the state and config files (when they exist) and records the
   * previous reference. The manifest is written last, so a directory without
   * one never counts as a snapshot.
   */
  async capture(input: CaptureSnapshotInput): Promise<SnapshotRecord> {
    await fs.mkdir(this.rootDir, { recursive: true });
    const createdAt = this.now();
    const entries = await this.readEntries();
    const sequence = entries.reduce((max, entry) => Math.max(max, entry.manifest?.sequence ?? 0), 0) + 1;

    const id = await this.allocateDirectory(formatSnapshotStamp(createdAt));
    const dirPath = path.join(this.rootDir, id);

    const stateName = path.basename(input.stateFilePath);
    const configBase = path.basename(input.configFilePath);
    const configName = configBase === stateName ? `config.${configBase}` : configBase;

    const stateCopied = await copyIfPresent(input.stateFilePath, path.join(dirPath, stateName));
    const configCopied = await copyIfPresent(input.configFilePath, path.join(dirPath, configName));

    const previousRef = input.previousRef.trim() || UNKNOWN_REFERENCE;
    await fs.writeFile(path.join(dirPath, REFERENCE_FILE), `${previousRef}\n`, "utf8");

    const manifest: SnapshotManifest = {
      version: 1,
      id,
      createdAt: createdAt.toISOString(),
      sequence,
      previousRef,
      stateFile: stateCopied ? stateName : undefined,
      configFile: configCopied ? configName : undefined
    };
    const manifestPath = path.join(dirPath, MANIFEST_FILE);
    await fs.writeFile(`${manifestPath}.tmp`, `${JSON.stringify(manifest, null, 2)}\n`, "utf8");
    await fs.rename(`${manifestPath}.tmp`, manifestPath);

    return this.toRecord(dirPath, manifest);
  }

  async list(): Promise<SnapshotRecord[]> {
    const entries = await this.readEntries();
    return entries
      .flatMap((entry) => (entry.manifest ? [{ dirPath: entry.dirPath, manifest: entry.manifest }] : []))
      .sort((left, right) => compareNewestFirst(left.manifest, right.manifest))
      .map((entry) => this.toRecord(entry.dirPath, entry.manifest));
  }

  async read(id: string): Promise<SnapshotRecord | null> {
    if (!isSnapshotId(id)) {
      return null;
    }
    const dirPath = path.join(this.rootDir, id);
    const read = await this.readManifest(dirPath);
    return read.status === "complete" ? this.toRecord(dirPath, read.manifest) : null;
  }

  /** Protects a snapshot from pruning until the returned release is called. */
  retain(id: string): () => void {
    this.retained.set(id, (this.retained.get(id) ?? 0) + 1);
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const count = (this.retained.get(id) ?? 1) - 1;
      if (count <= 0) {
        this.retained.delete(id);
      } else {
        this.retained.set(id, count);
      }
    };
  }

  /**
   * Deletes all but the `keepCount` newest complete snapshots, plus any
   * directory whose capture never wrote a manifest. Directories with an
   * unparseable manifest and retained snapshots are never removed.
   */
  async prune(keepCount: number): Promise<string[]> {
    if (!Number.isInteger(keepCount) || keepCount < 0) {
      throw new UpdaterError(`Snapshot retention must be a non-negative integer, got ${keepCount}.`, "invalid_input");
    }

    const entries = await this.readEntries();
    const complete = entries
      .flatMap((entry) => (entry.manifest ? [{ entry, manifest: entry.manifest }] : []))
      .sort((left, right) => compareNewestFirst(left.manifest, right.manifest))
      .map(({ entry }) => entry);
    const incomplete = entries.filter((entry) => entry.status === "missing");

    const doomed = [...complete.slice(keepCount), ...incomplete].filter((entry) => !this.retained.has(entry.id));
    for (const entry of doomed) {
      await fs.rm(entry.dirPath, { recursive: true, force: true });
    }

    return doomed.map((entry) => entry.id).sort();
  }
}
