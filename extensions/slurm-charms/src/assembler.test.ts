import { describe, expect, it } from "vitest";
import {
  accountingParameters,
  assembleCgroupConfig,
  assembleSlurmConfig,
  slurmctldParameters,
  transitioningNodes,
  type AssemblyInputs,
} from "./assembler.js";
import { renderSlurmConfig } from "./slurmconf.js";

function inputs(overrides: Partial<AssemblyInputs> = {}): AssemblyInputs {
  return {
    clusterName: "test-cluster",
    hostname: "ctl-0",
    ingressAddress: "10.0.0.10",
    container: false,
    slurmdbdHost: "",
    compute: [
      {
        partition: "compute",
        parameters: {},
        nodes: [
          {
            node_name: "node1",
            gres_info: [{ Name: "gpu", Type: "tesla_t4", File: "/dev/nvidia0" }],
          },
        ],
      },
    ],
    ...overrides,
  };
}

function assembled(overrides: Partial<AssemblyInputs> = {}) {
  const result = assembleSlurmConfig(inputs(overrides));
  if (result.kind !== "ok") {
    throw new Error(`expected a document, got ${result.kind}`);
  }
  return result;
}

describe("slurm.conf assembly", () => {
  it("adds a partition for a compute node without accounting", () => {
    const { document, newNodes } = assembled();

    expect(document.partitions).toEqual({ compute: { Nodes: ["node1"], State: "UP" } });
    expect(document.nodes).toEqual({ node1: {} });
    expect(Object.keys(document.options).filter((key) => key.startsWith("AccountingStorage"))).toEqual(
      [],
    );
    expect(document.downNodes).toEqual([]);
    expect(newNodes).toEqual([]);
  });

  it("fills in identity and charm defaults", () => {
    const { document } = assembled();

    expect(document.options.ClusterName).toBe("test-cluster");
    expect(document.options.SlurmctldAddr).toBe("10.0.0.10");
    expect(document.options.SlurmctldHost).toEqual(["ctl-0"]);
    expect(document.options.SlurmctldParameters).toEqual({ enable_configless: true });
    expect(document.options.ProctrackType).toBe("proctrack/cgroup");
    expect(document.options.TaskPlugin).toEqual(["task/cgroup", "task/affinity"]);
    expect(document.options.SlurmdPort).toBe("6818");
  });

  it("picks simpler plugins inside a container", () => {
    const { document } = assembled({ container: true });

    expect(document.options.ProctrackType).toBe("proctrack/linuxproc");
    expect(document.options.TaskPlugin).toEqual(["task/affinity"]);
  });

  it("adds the accounting block once a database host is known", () => {
    const { document } = assembled({ slurmdbdHost: "db-0" });

    expect(document.options.AccountingStorageHost).toBe("db-0");
    expect(document.options.AccountingStorageType).toBe("accounting_storage/slurmdbd");
    expect(document.options.AccountingStoragePass).toBe("/var/run/munge/munge.socket.2");
    expect(document.options.AccountingStoragePort).toBe("6819");
    expect(accountingParameters("")).toEqual({});
  });

  it("keeps '=' inside an override value", () => {
    const { document } = assembled({ userOverrides: { JobAcctGatherFrequency: "task=30,network=40" } });

    expect(document.options.JobAcctGatherFrequency).toBe("task=30,network=40");
  });

  it("lets user overrides win over defaults and accounting", () => {
    const { document } = assembled({
      slurmdbdHost: "db-0",
      userOverrides: {
        SlurmdPort: "7000",
        AccountingStoragePort: "7001",
        ProctrackType: "proctrack/pgid",
      },
    });

    expect(document.options.SlurmdPort).toBe("7000");
    expect(document.options.AccountingStoragePort).toBe("7001");
    expect(document.options.ProctrackType).toBe("proctrack/pgid");
  });

  it("merges SlurmctldParameters key by key", () => {
    const { document } = assembled({
      userOverrides: { SlurmctldParameters: "idle_on_node_suspend,max_dbd_msg_action=discard" },
    });

    expect(document.options.SlurmctldParameters).toEqual({
      enable_configless: true,
      idle_on_node_suspend: true,
      max_dbd_msg_action: "discard",
    });
    expect(slurmctldParameters("enable_configless=no")).toEqual({ enable_configless: "no" });
  });

  it("lists new nodes as down and marks the default partition", () => {
    const { document, newNodes } = assembled({
      defaultPartition: "gpu",
      compute: [
        {
          partition: "gpu",
          parameters: { MaxTime: "60" },
          nodes: [
            { node_name: "node3", new_node: true, node_parameters: { CPUs: "8" } },
            { node_name: "node2", new_node: true },
          ],
        },
        {
          partition: "cpu",
          parameters: {},
          nodes: [{ node_name: "node1", new_node: false }],
        },
      ],
    });

    expect(document.downNodes).toEqual([
      { nodes: ["node2", "node3"], state: "DOWN", reason: "New node." },
    ]);
    expect(newNodes).toEqual(["node2", "node3"]);
    expect(document.nodes.node3).toEqual({ CPUs: "8" });
    expect(document.partitions.gpu).toEqual({
      Nodes: ["node2", "node3"],
      State: "UP",
      Default: "YES",
      MaxTime: "60",
    });
    expect(document.partitions.cpu).toEqual({ Nodes: ["node1"], State: "UP" });
  });

  it("skips partitions without nodes", () => {
    const { document } = assembled({
      compute: [{ partition: "empty", parameters: {}, nodes: [] }],
    });

    expect(document.partitions).toEqual({});
  });

  it("reports missing facts", () => {
    expect(assembleSlurmConfig(inputs({ ingressAddress: undefined }))).toEqual({
      kind: "insufficient-facts",
      reason: "ingress address unavailable",
    });
  });

  it("produces the same text for the same inputs", () => {
    const first = renderSlurmConfig(assembled({ slurmdbdHost: "db-0" }).document);
    const second = renderSlurmConfig(assembled({ slurmdbdHost: "db-0" }).document);

    expect(second).toBe(first);
  });
});

describe("cgroup.conf assembly", () => {
  it("applies overrides on top of the defaults", () => {
    expect(assembleCgroupConfig({ ConstrainSwapSpace: "no", AllowedRAMSpace: "95" })).toEqual({
      ConstrainCores: "yes",
      ConstrainDevices: "yes",
      ConstrainRAMSpace: "yes",
      ConstrainSwapSpace: "no",
      AllowedRAMSpace: "95",
    });
    expect(assembleCgroupConfig()).toEqual({
      ConstrainCores: "yes",
      ConstrainDevices: "yes",
      ConstrainRAMSpace: "yes",
      ConstrainSwapSpace: "yes",
    });
  });
});

describe("transitioning nodes", () => {
  it("returns nodes that are no longer new", () => {
    expect(transitioningNodes(["a", "b", "c"], ["b"])).toEqual(["a", "c"]);
    expect(transitioningNodes([], ["b"])).toEqual([]);
    expect(transitioningNodes(["a"], ["a"])).toEqual([]);
  });
});
