import os from "node:os";
import path from "node:path";

import { UpdaterError } from "./errors.js";
import type { SupervisorKind } from "./types.js";

export interface UpdaterConfig {
  workDir: string;
  serviceName: string;
  supervisor: SupervisorKind;
  systemctlBinary: string;
  dockerBinary: string;
  composeFilePath: string;
  gitBinary: string;
  remote: string;
  branch: string;
  installCommand: string[];
  stateFilePath: string;
  configFilePath: string;
  snapshotDir: string;
  backupDir: string;
  dataDir: string;
  updaterStatePath: string;
  lockPath: string;
  snapshotRetention: number;
  settleMs: number;
  vcsTimeoutMs: number;
  installTimeoutMs: number;
  supervisorTimeoutMs: number;
}

export interface UpdaterServerConfig extends UpdaterConfig {
  port: number;
  authToken: string;
  corsOrigins: string[];
  allowAnyCorsOrigin: boolean;
}

const defaultPort = 8788;
const defaultDataDir = ".updater";

function parsePort(raw: string | undefined): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed) || parsed < 1 || parsed > 65535) {
    return defaultPort;
  }
  return parsed;
}

function parseIntEnv(raw: string | undefined, fallback: number, min: number, max: number): number {
  const parsed = Number.parseInt(raw ?? "", 10);
  if (!Number.isFinite(parsed)) {
    return fallback;
  }
  return Math.max(min, Math.min(max, parsed));
}

function parseCorsOrigins(raw: string | undefined): {
  corsOrigins: string[];
  allowAnyCorsOrigin: boolean;
} {
  const configured = (raw ?? "")
    .split(",")
    .map((origin) => origin.trim())
    .filter((origin) => origin.length > 0);
  const corsOrigins = configured.length > 0 ? configured : ["http://localhost:5173", "http://127.0.0.1:5173"];

  return {
    corsOrigins,
    allowAnyCorsOrigin: corsOrigins.includes("*")
  };
}

function normalizeSupervisor(raw: string | undefined): SupervisorKind {
  return raw?.trim().toLowerCase() === "compose" ? "compose" : "systemd";
}

function stringEnv(raw: string | undefined, fallback: string): string {
  const trimmed = (raw ?? "").trim();
  return trimmed.length > 0 ? trimmed : fallback;
}

function resolvePathEnv(raw: string | undefined, baseDir: string, fallback: string): string {
  return path.resolve(baseDir, stringEnv(raw, fallback));
}

/**
 * Accepts either a JSON array of arguments or a whitespace separated command.
 * Quoted arguments need the JSON form.
 */
export function parseCommandLine(raw: string | undefined): string[] {
  const trimmed = (raw ?? "").trim();
  if (trimmed.length === 0) {
    return [];
  }

  if (trimmed.startsWith("[")) {
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsed) && parsed.every((entry): entry is string => typeof entry === "string")) {
        return parsed.map((entry) => entry.trim()).filter((entry) => entry.length > 0);
      }
    } catch {
      return [];
    }
    return [];
  }

  return trimmed.split(/\s+/).filter((entry) => entry.length > 0);
}

export function resolveUpdaterConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): UpdaterConfig {
  const workDir = resolvePathEnv(env.UPDATER_WORK_DIR, cwd, ".");
  const dataDir = resolvePathEnv(env.UPDATER_DATA_DIR, workDir, defaultDataDir);

  return {
    workDir,
    serviceName: stringEnv(env.UPDATER_SERVICE_NAME, "app"),
    supervisor: normalizeSupervisor(env.UPDATER_SUPERVISOR),
    systemctlBinary: stringEnv(env.UPDATER_SYSTEMCTL_BINARY, "systemctl"),
    dockerBinary: stringEnv(env.UPDATER_DOCKER_BINARY, "docker"),
    composeFilePath: resolvePathEnv(env.UPDATER_COMPOSE_FILE, workDir, "docker-compose.yml"),
    gitBinary: stringEnv(env.UPDATER_GIT_BINARY, "git"),
    remote: stringEnv(env.UPDATER_REMOTE, "origin"),
    branch: stringEnv(env.UPDATER_BRANCH, "main"),
    installCommand: parseCommandLine(env.UPDATER_INSTALL_COMMAND),
    stateFilePath: resolvePathEnv(env.UPDATER_STATE_FILE, workDir, "app.db"),
    configFilePath: resolvePathEnv(env.UPDATER_CONFIG_FILE, workDir, ".env"),
    snapshotDir: resolvePathEnv(env.UPDATER_SNAPSHOT_DIR, workDir, "backups"),
    backupDir: resolvePathEnv(env.UPDATER_BACKUP_DIR, workDir, os.homedir()),
    dataDir,
    updaterStatePath: path.join(dataDir, "updater-state.json"),
    lockPath: path.join(dataDir, "updater.lock"),
    snapshotRetention: parseIntEnv(env.UPDATER_SNAPSHOT_RETENTION, 5, 1, 100),
    settleMs: parseIntEnv(env.UPDATER_SETTLE_MS, 3_000, 0, 120_000),
    vcsTimeoutMs: parseIntEnv(env.UPDATER_VCS_TIMEOUT_MS, 120_000, 1_000, 3_600_000),
    installTimeoutMs: parseIntEnv(env.UPDATER_INSTALL_TIMEOUT_MS, 600_000, 1_000, 3_600_000),
    supervisorTimeoutMs: parseIntEnv(env.UPDATER_SUPERVISOR_TIMEOUT_MS, 60_000, 1_000, 600_000)
  };
}

export function resolveUpdaterServerConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): UpdaterServerConfig {
  const { corsOrigins, allowAnyCorsOrigin } = parseCorsOrigins(env.UPDATER_CORS_ORIGINS);
  const config: UpdaterServerConfig = {
    ...resolveUpdaterConfig(env, cwd),
    port: parsePort(env.UPDATER_PORT),
    authToken: (env.UPDATER_AUTH_TOKEN ?? "").trim(),
    corsOrigins,
    allowAnyCorsOrigin
  };

  if (config.authToken.length === 0) {
    throw new UpdaterError("UPDATER_AUTH_TOKEN is required for the updater HTTP service.", "invalid_input");
  }

  return config;
}
