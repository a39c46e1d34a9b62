import fs from "node:fs";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { SnapshotStore, formatSnapshotStamp } from "../../server/updater/snapshots.js";
import { createWorkspace, removeWorkspace, type UpdaterWorkspace } from "../helpers/updaterFakes.js";

const workspaces: UpdaterWorkspace[] = [];

afterEach(() => {
  workspaces.splice(0).forEach(removeWorkspace);
});

function setup(options: { state?: string | null; config?: string | null } = {}) {
  const workspace = createWorkspace(options);
  workspaces.push(workspace);
  return workspace;
}

/** A clock that returns the given instants in turn and then repeats the last. */
function clock(...instants: string[]): () => Date {
  const queue = [...instants];
  return () => new Date(queue.length > 1 ? queue.shift() ?? "" : queue[0] ?? "");
}

describe("SnapshotStore", () => {
  it("formats stamps in UTC with milliseconds", () => {
    expect(formatSnapshotStamp(new Date(Date.UTC(2026, 0, 2, 3, 4, 5, 6)))).toBe("20260102_030405_006");
  });

  it("copies the state and config files and records the previous reference", async () => {
    const workspace = setup();
    const store = new SnapshotStore(workspace.snapshotDir, clock("2026-03-04T05:06:07.089Z"));

    const record = await store.capture({
      stateFilePath: workspace.statePath,
      configFilePath: workspace.configPath,
      previousRef: "abc1234"
    });

    expect(record.id).toBe("update_20260304_050607_089");
    expect(record.sequence).toBe(1);
    expect(record.createdAt).toBe("2026-03-04T05:06:07.089Z");
    expect(fs.readFileSync(path.join(record.path, "app.db"), "utf8")).toBe("v1");
    expect(fs.readFileSync(path.join(record.path, ".env"), "utf8")).toBe("API_TOKEN=test-secret\n");
    expect(fs.readFileSync(path.join(record.path, "previous_ref.txt"), "utf8")).toBe("abc1234\n");
    expect(record.stateCopyPath).toBe(path.join(record.path, "app.db"));
    expect(await store.read(record.id)).toEqual(record);
  });

  it("skips files that do not exist and records an empty reference as unknown", async () => {
    const workspace = setup({ state: null, config: null });
    const store = new SnapshotStore(workspace.snapshotDir, clock("2026-03-04T05:06:07.089Z"));

    const record = await store.capture({
      stateFilePath: workspace.statePath,
      configFilePath: workspace.configPath,
      previousRef: "  "
    });

    expect(record.previousRef).toBe("unknown");
    expect(record.stateCopyPath).toBeUndefined();
    expect(record.configCopyPath).toBeUndefined();
    expect(fs.readdirSync(record.path).sort()).toEqual(["previous_ref.txt", "snapshot.json"]);
  });

  it("orders snapshots newest first and breaks timestamp ties by insertion order", async () => {
    const workspace = setup();
    const store = new SnapshotStore(
      workspace.snapshotDir,
      clock("2026-03-04T05:06:07.000Z", "2026-03-04T05:06:09.000Z", "2026-03-04T05:06:09.000Z")
    );
    const input = { stateFilePath: workspace.statePath, configFilePath: workspace.configPath, previousRef: "abc1234" };

    const first = await store.capture(input);
    const second = await store.capture(input);
    const third = await store.capture(input);

    expect(second.id).toBe("update_20260304_050609_000");
    expect(third.id).toBe("update_20260304_050609_000-1");
    expect((await store.list()).map((record) => record.id)).toEqual([third.id, second.id, first.id]);
  });

  it("ignores incomplete snapshot directories when listing and removes them when pruning", async () => {
    const workspace = setup();
    const store = new SnapshotStore(workspace.snapshotDir, clock("2026-03-04T05:06:07.000Z"));
    await store.capture({ stateFilePath: workspace.statePath, configFilePath: workspace.configPath, previousRef: "abc1234" });
    fs.mkdirSync(path.join(workspace.snapshotDir, "update_20260101_000000_000"));

    expect(await store.list()).toHaveLength(1);
    expect(await store.read("update_20260101_000000_000")).toBeNull();
    expect(await store.prune(5)).toEqual(["update_20260101_000000_000"]);
    expect(fs.existsSync(path.join(workspace.snapshotDir, "update_20260101_000000_000"))).toBe(false);
  });

  it("keeps a snapshot whose manifest no longer parses out of listings and pruning", async () => {
    const workspace = setup();
    const store = new SnapshotStore(
      workspace.snapshotDir,
      clock("2026-03-04T05:06:01.000Z", "2026-03-04T05:06:02.000Z", "2026-03-04T05:06:03.000Z")
    );
    const input = { stateFilePath: workspace.statePath, configFilePath: workspace.configPath, previousRef: "abc1234" };
    const oldest = await store.capture(input);
    const middle = await store.capture(input);
    const newest = await store.capture(input);
    fs.writeFileSync(path.join(newest.path, "snapshot.json"), "{", "utf8");

    expect((await store.list()).map((record) => record.id)).toEqual([middle.id, oldest.id]);
    expect(await store.read(newest.id)).toBeNull();
    expect(await store.prune(5)).toEqual([]);
    expect(await store.prune(1)).toEqual([oldest.id]);
    expect(fs.existsSync(newest.path)).toBe(true);
  });

  it("aborts pruning when a manifest cannot be read", async () => {
    const workspace = setup();
    const store = new SnapshotStore(workspace.snapshotDir, clock("2026-03-04T05:06:01.000Z"));
    const input = { stateFilePath: workspace.statePath, configFilePath: workspace.configPath, previousRef: "abc1234" };
    const record = await store.capture(input);
    fs.rmSync(path.join(record.path, "snapshot.json"));
    fs.mkdirSync(path.join(record.path, "snapshot.json"));

    await expect(store.prune(0)).rejects.toMatchObject({ code: "EISDIR" });
    expect(fs.existsSync(record.path)).toBe(true);
  });

  it("prunes the oldest snapshots and is idempotent", async () => {
    const workspace = setup();
    const store = new SnapshotStore(
      workspace.snapshotDir,
      clock("2026-03-04T05:06:01.000Z", "2026-03-04T05:06:02.000Z", "2026-03-04T05:06:03.000Z")
    );
    const input = { stateFilePath: workspace.statePath, configFilePath: workspace.configPath, previousRef: "abc1234" };
    await store.capture(input);
    await store.capture(input);
    const newest = await store.capture(input);

    expect(await store.prune(1)).toEqual(["update_20260304_050601_000", "update_20260304_050602_000"]);
    expect(await store.prune(1)).toEqual([]);
    expect((await store.list()).map((record) => record.id)).toEqual([newest.id]);
  });

  it("never prunes a retained snapshot", async () => {
    const workspace = setup();
    const store = new SnapshotStore(
      workspace.snapshotDir,
      clock("2026-03-04T05:06:01.000Z", "2026-03-04T05:06:02.000Z")
    );
    const input = { stateFilePath: workspace.statePath, configFilePath: workspace.configPath, previousRef: "abc1234" };
    const oldest = await store.capture(input);
    await store.capture(input);

    const release = store.retain(oldest.id);
    expect(await store.prune(0)).toEqual(["update_20260304_050602_000"]);

    release();
    release();
    expect(await store.prune(0)).toEqual([oldest.id]);
  });

  it("rejects a negative keep count", async () => {
    const workspace = setup();
    const store = new SnapshotStore(workspace.snapshotDir);

    await expect(store.prune(-1)).rejects.toMatchObject({ code: "invalid_input" });
  });

  it("returns nothing for ids outside the snapshot root", async () => {
    const workspace = setup();
    const store = new SnapshotStore(workspace.snapshotDir);

    expect(await store.read("../app.db")).toBeNull();
    expect(await store.list()).toEqual([]);
  });
});
