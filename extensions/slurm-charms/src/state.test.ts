import fs from "node:fs/promises";
import path from "node:path";
import { Type } from "@sinclair/typebox";
import { afterEach, describe, expect, it } from "vitest";
import { StateStore, statePath } from "./state.js";
import { makeTempDir, removeTempDirs } from "./testing.js";

afterEach(removeTempDirs);

const Schema = Type.Object({
  installed: Type.Boolean({ default: false }),
  knownNewNodes: Type.Array(Type.String(), { default: [] }),
  lastDatabaseHost: Type.String({ default: "" }),
});

describe("state store", () => {
  it("starts from defaults when nothing was saved", async () => {
    const stateDir = await makeTempDir("slurm-state-");
    const store = new StateStore({ stateDir, name: "slurmctld", schema: Schema });

    expect(await store.load()).toEqual({ installed: false, knownNewNodes: [], lastDatabaseHost: "" });
    expect(store.path).toBe(path.join(stateDir, "slurmctld.json"));
  });

  it("round-trips saved state", async () => {
    const stateDir = await makeTempDir("slurm-state-");
    const store = new StateStore({ stateDir, name: "slurmctld", schema: Schema });

    await store.save({ installed: true, knownNewNodes: ["node1"], lastDatabaseHost: "db-0" });
    const reloaded = new StateStore({ stateDir, name: "slurmctld", schema: Schema });

    expect(await reloaded.load()).toEqual({
      installed: true,
      knownNewNodes: ["node1"],
      lastDatabaseHost: "db-0",
    });
  });

  it("fills fields added since the file was written", async () => {
    const stateDir = await makeTempDir("slurm-state-");
    await fs.writeFile(statePath(stateDir, "slurmctld"), JSON.stringify({ installed: true }), "utf8");
    const store = new StateStore({ stateDir, name: "slurmctld", schema: Schema });

    expect(await store.load()).toEqual({ installed: true, knownNewNodes: [], lastDatabaseHost: "" });
  });

  it("rejects a file that does not match the schema", async () => {
    const stateDir = await makeTempDir("slurm-state-");
    await fs.writeFile(statePath(stateDir, "slurmctld"), JSON.stringify({ installed: "yes" }), "utf8");
    const store = new StateStore({ stateDir, name: "slurmctld", schema: Schema });

    await expect(store.load()).rejects.toThrow("is invalid at /installed");
  });
});
