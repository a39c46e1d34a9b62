import fs from "node:fs";

import { afterEach, describe, expect, it } from "vitest";

import { RollbackExecutor } from "../../server/updater/rollback.js";
import { SnapshotStore } from "../../server/updater/snapshots.js";
import {
  FakeSupervisor,
  FakeVcs,
  INITIAL_REF,
  REMOTE_REF,
  createMemoryLogger,
  createWorkspace,
  removeWorkspace,
  type UpdaterWorkspace
} from "../helpers/updaterFakes.js";

const workspaces: UpdaterWorkspace[] = [];

afterEach(() => {
  workspaces.splice(0).forEach(removeWorkspace);
});

async function setup(previousRef = INITIAL_REF) {
  const workspace = createWorkspace();
  workspaces.push(workspace);

  const supervisor = new FakeSupervisor(false);
  const vcs = new FakeVcs(REMOTE_REF);
  const logger = createMemoryLogger();
  const snapshots = new SnapshotStore(workspace.snapshotDir);
  const snapshot = await snapshots.capture({
    stateFilePath: workspace.statePath,
    configFilePath: workspace.configPath,
    previousRef
  });
  fs.writeFileSync(workspace.statePath, "v2-broken", "utf8");

  const executor = new RollbackExecutor({
    serviceName: "app",
    stateFilePath: workspace.statePath,
    settleMs: 0,
    supervisor,
    vcs,
    snapshots,
    logger
  });

  return { workspace, supervisor, vcs, logger, snapshots, snapshot, executor };
}

describe("RollbackExecutor", () => {
  it("restores the state file, reverts the code and starts the service", async () => {
    const { workspace, supervisor, vcs, snapshot, executor } = await setup();

    const report = await executor.rollback(snapshot);

    expect(report).toEqual({
      snapshotId: snapshot.id,
      outcome: "rolled_back",
      steps: [
        { step: "restore_state", status: "ok" },
        { step: "revert_code", status: "ok" },
        { step: "restart_service", status: "ok" }
      ]
    });
    expect(fs.readFileSync(workspace.statePath, "utf8")).toBe("v1");
    expect(vcs.head).toBe(INITIAL_REF);
    expect(supervisor.calls).toEqual(["start:app"]);
  });

  it("leaves the code alone when the previous reference is unknown", async () => {
    const { workspace, vcs, snapshot, executor, logger } = await setup("unknown");

    const report = await executor.rollback(snapshot);

    expect(report.outcome).toBe("partial_rollback");
    expect(vcs.checkouts).toEqual([]);
    expect(vcs.head).toBe(REMOTE_REF);
    expect(fs.readFileSync(workspace.statePath, "utf8")).toBe("v1");
    expect(logger.lines).toContain(
      "warn rollback revert_code: skipped (previous reference is unknown, code was left at the current revision)"
    );
  });

  it("still starts the service after the code revert fails", async () => {
    const { supervisor, vcs, snapshot, executor, logger } = await setup();
    vcs.failures.forceCheckout = new Error("index.lock exists");

    const report = await executor.rollback(snapshot);

    expect(report.outcome).toBe("partial_rollback");
    expect(report.steps[1]).toEqual({ step: "revert_code", status: "failed", detail: "index.lock exists" });
    expect(supervisor.calls).toEqual(["start:app"]);
    expect(supervisor.active).toBe(true);
    expect(logger.lines).toContain("error rollback revert_code: index.lock exists");
  });

  it("reports a service that does not come back as a partial rollback", async () => {
    const { supervisor, snapshot, executor } = await setup();
    supervisor.startResults = [false];

    const report = await executor.rollback(snapshot);

    expect(report.outcome).toBe("partial_rollback");
    expect(report.steps[2]).toEqual({
      step: "restart_service",
      status: "failed",
      detail: "app is not active 0ms after the rollback start"
    });
  });

  it("holds the snapshot against pruning while it runs", async () => {
    const { supervisor, snapshots, snapshot, executor } = await setup();
    let prunedDuringRollback: string[] | null = null;
    supervisor.start = async (serviceName: string) => {
      supervisor.calls.push(`start:${serviceName}`);
      prunedDuringRollback = await snapshots.prune(0);
      supervisor.active = true;
    };

    await executor.rollback(snapshot);

    expect(prunedDuringRollback).toEqual([]);
    expect(await snapshots.prune(0)).toEqual([snapshot.id]);
  });
});
