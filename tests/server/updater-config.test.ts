import os from "node:os";
import path from "node:path";

import { describe, expect, it } from "vitest";

import { parseCommandLine, resolveUpdaterConfig, resolveUpdaterServerConfig } from "../../server/updater/config.js";

const cwd = path.join(os.tmpdir(), "svc-updater-config");

describe("updater config", () => {
  it("uses defaults", () => {
    const config = resolveUpdaterConfig({}, cwd);

    expect(config.workDir).toBe(cwd);
    expect(config.serviceName).toBe("app");
    expect(config.supervisor).toBe("systemd");
    expect(config.remote).toBe("origin");
    expect(config.branch).toBe("main");
    expect(config.installCommand).toEqual([]);
    expect(config.stateFilePath).toBe(path.join(cwd, "app.db"));
    expect(config.configFilePath).toBe(path.join(cwd, ".env"));
    expect(config.snapshotDir).toBe(path.join(cwd, "backups"));
    expect(config.backupDir).toBe(os.homedir());
    expect(config.dataDir).toBe(path.join(cwd, ".updater"));
    expect(config.updaterStatePath).toBe(path.join(cwd, ".updater", "updater-state.json"));
    expect(config.lockPath).toBe(path.join(cwd, ".updater", "updater.lock"));
    expect(config.snapshotRetention).toBe(5);
    expect(config.settleMs).toBe(3_000);
    expect(config.vcsTimeoutMs).toBe(120_000);
  });

  it("parses overrides relative to the work dir", () => {
    const config = resolveUpdaterConfig(
      {
        UPDATER_WORK_DIR: "service",
        UPDATER_SERVICE_NAME: "bot",
        UPDATER_SUPERVISOR: "Compose",
        UPDATER_BRANCH: "release",
        UPDATER_INSTALL_COMMAND: "npm ci --omit=dev",
        UPDATER_STATE_FILE: "data/bot.db",
        UPDATER_DATA_DIR: "/var/lib/svc-updater",
        UPDATER_SNAPSHOT_RETENTION: "500",
        UPDATER_SETTLE_MS: "-20"
      },
      cwd
    );

    const workDir = path.join(cwd, "service");
    expect(config.workDir).toBe(workDir);
    expect(config.serviceName).toBe("bot");
    expect(config.supervisor).toBe("compose");
    expect(config.branch).toBe("release");
    expect(config.installCommand).toEqual(["npm", "ci", "--omit=dev"]);
    expect(config.stateFilePath).toBe(path.join(workDir, "data", "bot.db"));
    expect(config.composeFilePath).toBe(path.join(workDir, "docker-compose.yml"));
    expect(config.lockPath).toBe(path.join("/var/lib/svc-updater", "updater.lock"));
    expect(config.snapshotRetention).toBe(100);
    expect(config.settleMs).toBe(0);
  });

  it("parses install commands given as JSON arrays", () => {
    expect(parseCommandLine('["pip", "install", "-r", "requirements file.txt"]')).toEqual([
      "pip",
      "install",
      "-r",
      "requirements file.txt"
    ]);
    expect(parseCommandLine("[not json")).toEqual([]);
    expect(parseCommandLine("   ")).toEqual([]);
  });

  it("requires an auth token for the HTTP service", () => {
    expect(() => resolveUpdaterServerConfig({}, cwd)).toThrow("UPDATER_AUTH_TOKEN is required");

    const config = resolveUpdaterServerConfig(
      {
        UPDATER_AUTH_TOKEN: " test-secret ",
        UPDATER_PORT: "9876",
        UPDATER_CORS_ORIGINS: "https://ops.example.com,*"
      },
      cwd
    );
    expect(config.authToken).toBe("test-secret");
    expect(config.port).toBe(9876);
    expect(config.corsOrigins).toEqual(["https://ops.example.com", "*"]);
    expect(config.allowAnyCorsOrigin).toBe(true);
  });
});
