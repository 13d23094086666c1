import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import { StateStore } from "../state-store";

describe("StateStore", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "lineup-state-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("starts empty when nothing was saved", async () => {
    const store = new StateStore(join(dir, "state"));

    expect(await store.load()).toEqual({ services: {} });
  });

  it("keeps the pid across outcome updates and drops it once stopped", async () => {
    const store = new StateStore(dir);
    store.recordPid("db", 4242);
    store.recordOutcome("db", { state: "READY", attempts: 1 });

    expect(store.get("db")).toMatchObject({ state: "READY", pid: 4242 });

    store.recordOutcome("db", { state: "STOPPED" });
    expect(store.get("db")?.pid).toBeUndefined();
  });

  it("saves and reloads a snapshot", async () => {
    const store = new StateStore(join(dir, "nested"));
    store.setManifest("/srv/lineup.toml");
    store.recordOutcome("web", { state: "FAILED", reason: "StartFailed", message: "exited with code 2" });
    await store.save();

    const reloaded = new StateStore(join(dir, "nested"));
    const snapshot = await reloaded.load();

    expect(snapshot.manifest).toBe("/srv/lineup.toml");
    expect(snapshot.services.web).toMatchObject({
      state: "FAILED",
      reason: "StartFailed",
      message: "exited with code 2",
    });
    expect(JSON.parse(await readFile(join(dir, "nested", "state.json"), "utf8")).services.web.state).toBe(
      "FAILED",
    );
  });

  it("refuses a corrupt state file", async () => {
    await writeFile(join(dir, "state.json"), "{not json");

    await expect(new StateStore(dir).load()).rejects.toThrow(
      `State file ${join(dir, "state.json")} is corrupt`,
    );
  });
});
