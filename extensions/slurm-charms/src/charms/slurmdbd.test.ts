import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { CharmModel, type Relation } from "../runtime/model.js";
import { createMockRunner, makeTempDir, removeTempDirs, type MockHandler } from "../testing.js";
import { parseDatabaseEndpoint, SlurmdbdCharm, splitEndpoints } from "./slurmdbd.js";

afterEach(removeTempDirs);

const CLUSTER_INFO = JSON.stringify({
  auth_key: Buffer.from("test-secret").toString("base64"),
  jwt_key: "test-jwt-key",
  slurmctld_host: "ctl-0",
});

async function setup(handlers: Record<string, MockHandler> = {}) {
  const rootDir = await makeTempDir("slurmdbd-root-");
  const stateDir = await makeTempDir("slurmdbd-state-");
  const mock = createMockRunner(handlers);
  const sleep = vi.fn(async (_ms: number) => {});
  const model = new CharmModel({ unitName: "slurmdbd/0", leader: true });
  const charm = await SlurmdbdCharm.create({ model, stateDir, rootDir, runner: mock.runner, sleep });
  await charm.handle({ kind: "install" });
  return { rootDir, model, charm, sleep, ...mock };
}

async function relateDatabase(charm: SlurmdbdCharm, model: CharmModel, endpoints: string) {
  const relation = model.addRelation("database", "mysql");
  relation.data.mysql = { endpoints, username: "slurm", password: "test-secret" };
  return {
    relation,
    outcome: await charm.handle({ kind: "relation-changed", relation: "database", relationId: relation.id }),
  };
}

async function relateController(charm: SlurmdbdCharm, model: CharmModel): Promise<Relation> {
  const relation = model.addRelation("slurmctld", "slurmctld");
  relation.data.slurmctld = { cluster_info: CLUSTER_INFO };
  await charm.handle({ kind: "relation-changed", relation: "slurmctld", relationId: relation.id });
  return relation;
}

describe("database endpoints", () => {
  it("splits and trims candidates", () => {
    expect(splitEndpoints("10.2.5.20:1234 ,10.2.5.21:1234, 10.2.5.21:1234")).toEqual([
      "10.2.5.20:1234",
      "10.2.5.21:1234",
      "10.2.5.21:1234",
    ]);
    expect(splitEndpoints(" , ")).toEqual([]);
  });

  it("parses host, IPv6 and socket endpoints", () => {
    expect(parseDatabaseEndpoint("10.2.5.20:1234")).toEqual({
      kind: "tcp",
      host: "10.2.5.20",
      port: "1234",
    });
    expect(parseDatabaseEndpoint("[fd00::1]:3306")).toEqual({
      kind: "tcp",
      host: "fd00::1",
      port: "3306",
    });
    expect(parseDatabaseEndpoint("[fd00::1]")).toEqual({ kind: "tcp", host: "fd00::1" });
    expect(parseDatabaseEndpoint("db.internal")).toEqual({ kind: "tcp", host: "db.internal" });
    expect(parseDatabaseEndpoint("file:///run/mysqld/mysqld.sock")).toEqual({
      kind: "socket",
      path: "/run/mysqld/mysqld.sock",
    });
  });
});

describe("slurmdbd charm", () => {
  it("installs with the daemon stopped", async () => {
    const { charm, model, commandLines } = await setup();

    expect(commandLines()).toEqual([
      "apt-get install -y slurmdbd munge mysql-client",
      "systemctl disable --now slurmdbd",
      "dpkg-query --show --showformat=${Version} slurmdbd",
    ]);
    expect(charm.snapshot.installed).toBe(true);
    expect(model.status).toEqual({ kind: "blocked", message: "Need relations: database" });
  });

  it("refuses to install on a non-leader", async () => {
    const rootDir = await makeTempDir("slurmdbd-root-");
    const stateDir = await makeTempDir("slurmdbd-state-");
    const { runner, calls } = createMockRunner();
    const model = new CharmModel({ unitName: "slurmdbd/1", leader: false });
    const charm = await SlurmdbdCharm.create({ model, stateDir, rootDir, runner });

    expect(await charm.handle({ kind: "install" })).toBe("deferred");
    expect(calls).toEqual([]);
    expect(model.status).toEqual({
      kind: "blocked",
      message: "slurmdbd high-availability not supported. see logs for further details",
    });
  });

  it("records the first TCP endpoint", async () => {
    const { charm, model } = await setup();

    const { outcome } = await relateDatabase(
      charm,
      model,
      "10.2.5.20:1234 ,10.2.5.21:1234, 10.2.5.21:1234",
    );

    expect(outcome).toBe("handled");
    expect(charm.snapshot.dbInfo).toEqual({
      StorageUser: "slurm",
      StoragePass: "test-secret",
      StorageLoc: "slurm_acct_db",
      StorageHost: "10.2.5.20",
      StoragePort: "1234",
    });
    expect(model.status).toEqual({ kind: "blocked", message: "Need relations: slurmctld" });
  });

  it("uses a unix socket endpoint", async () => {
    const { charm, model, rootDir } = await setup();

    await relateDatabase(charm, model, "file:///run/mysqld/mysqld.sock");

    expect(charm.snapshot.dbInfo).toEqual({
      StorageUser: "slurm",
      StoragePass: "test-secret",
      StorageLoc: "slurm_acct_db",
    });
    expect(await fs.readFile(path.join(rootDir, "etc/default/slurmdbd"), "utf8")).toBe(
      "MYSQL_UNIX_PORT=/run/mysqld/mysqld.sock\n",
    );
  });

  it("blocks on an empty endpoint list", async () => {
    const { charm, model } = await setup();

    await expect(relateDatabase(charm, model, " , ")).rejects.toThrow("No database endpoints provided");
    expect(model.status).toEqual({ kind: "blocked", message: "No database endpoints provided" });
    expect(charm.snapshot.dbInfo).toEqual({});
  });

  it("starts once both the database and the controller are ready", async () => {
    const { charm, model, commandLines } = await setup();
    await relateDatabase(charm, model, "10.2.5.20:1234");

    const relation = await relateController(charm, model);

    expect(await charm.slurmdbd.dbdConfig.load()).toMatchObject({
      DbdPort: "6819",
      DbdHost: "slurmdbd-0",
      StorageType: "accounting_storage/mysql",
      StorageHost: "10.2.5.20",
      StoragePort: "1234",
      StorageLoc: "slurm_acct_db",
    });
    expect(await charm.slurmdbd.jwt.get()).toBe("test-jwt-key");
    expect(commandLines()).toContain("systemctl restart munge");
    expect(commandLines().slice(-2)).toEqual([
      "systemctl restart slurmdbd",
      "systemctl is-active --quiet slurmdbd",
    ]);
    expect(relation.data.slurmdbd?.slurmdbd).toBe(JSON.stringify({ slurmdbd_host: "slurmdbd-0" }));
    expect(model.status).toEqual({ kind: "active", message: "" });
  });

  it("starts when the database arrives after the controller", async () => {
    const { charm, model } = await setup();
    const relation = await relateController(charm, model);
    expect(model.status).toEqual({ kind: "blocked", message: "Need relations: database" });

    await relateDatabase(charm, model, "10.2.5.20:1234");

    expect(relation.data.slurmdbd?.slurmdbd).toBe(JSON.stringify({ slurmdbd_host: "slurmdbd-0" }));
    expect(model.status).toEqual({ kind: "active", message: "" });
  });

  it("blocks when slurmdbd never becomes active", async () => {
    const { charm, model, sleep } = await setup({
      systemctl: (args) => ({ code: args[0] === "is-active" ? 3 : 0 }),
    });
    await relateDatabase(charm, model, "10.2.5.20:1234");

    const relation = await relateController(charm, model);

    expect(sleep).toHaveBeenCalledTimes(4);
    expect(relation.data.slurmdbd).toEqual({});
    expect(model.status).toEqual({ kind: "blocked", message: "cannot start slurmdbd" });
  });

  it("stops and withdraws its host when the database leaves", async () => {
    const { charm, model, commandLines } = await setup();
    const { relation: database } = await relateDatabase(charm, model, "10.2.5.20:1234");
    const controller = await relateController(charm, model);
    model.removeRelation(database.id);

    await charm.handle({ kind: "relation-broken", relation: "database", relationId: database.id });

    expect(charm.snapshot.dbInfo).toEqual({});
    expect(commandLines().at(-1)).toBe("systemctl disable --now slurmdbd");
    expect(controller.data.slurmdbd?.slurmdbd).toBe("");
    expect(model.status).toEqual({ kind: "blocked", message: "Need relations: database" });
  });
});
