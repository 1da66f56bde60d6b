import {
  CHARM_MAINTAINED_CGROUP_CONF_PARAMETERS,
  CHARM_MAINTAINED_SLURM_CONF_PARAMETERS,
  MUNGE_SOCKET,
  NEW_NODE_REASON,
  SLURMDBD_PORT,
} from "./constants.js";
import { parseCompositeOption } from "./overrides.js";
import type { NodeFactPayload } from "./payloads.js";
import { emptySlurmConfig, newNodeNames } from "./slurmconf.js";
import type { SlurmConfigDocument, SlurmOptionMap, SlurmOptions } from "./types.js";

/** Nodes and partition parameters contributed by one compute application. */
export type ComputeGroup = {
  partition: string;
  parameters: Record<string, string>;
  nodes: NodeFactPayload[];
};

export type AssemblyInputs = {
  clusterName: string;
  hostname: string;
  ingressAddress?: string;
  container: boolean;
  /** Empty when no database has published its host. */
  slurmdbdHost: string;
  compute: ComputeGroup[];
  defaultPartition?: string;
  /** Already-validated `slurm-conf-parameters`. */
  userOverrides?: Record<string, string>;
};

export type Assembly =
  | { kind: "ok"; document: SlurmConfigDocument; newNodes: string[] }
  | { kind: "insufficient-facts"; reason: string };

const COMPOSITE_OPTION = "SlurmctldParameters";

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

export function accountingParameters(slurmdbdHost: string): SlurmOptions {
  if (!slurmdbdHost) {
    return {};
  }
  return {
    AccountingStorageHost: slurmdbdHost,
    AccountingStorageType: "accounting_storage/slurmdbd",
    AccountingStoragePass: MUNGE_SOCKET,
    AccountingStoragePort: SLURMDBD_PORT,
  };
}

export function slurmctldParameters(userValue?: string): SlurmOptionMap {
  return { enable_configless: true, ...parseCompositeOption(userValue ?? "") };
}

function nodeSection(compute: ComputeGroup[]): {
  nodes: Record<string, SlurmOptions>;
  partitions: Record<string, string[]>;
  newNodes: string[];
} {
  const nodes: Record<string, SlurmOptions> = {};
  const partitions: Record<string, string[]> = {};
  const newNodes = new Set<string>();

  for (const group of compute) {
    const members = partitions[group.partition] ?? [];
    for (const node of group.nodes) {
      nodes[node.node_name] = { ...(node.node_parameters ?? {}) };
      members.push(node.node_name);
      if (node.new_node) {
        newNodes.add(node.node_name);
      }
    }
    partitions[group.partition] = members;
  }

  return { nodes, partitions, newNodes: Array.from(newNodes).sort(byName) };
}

/**
 * Merge charm defaults, accounting, compute facts and user overrides into one
 * slurm.conf document. Precedence, lowest first: defaults, accounting,
 * per-node facts, user overrides. `SlurmctldParameters` merges key by key.
 */
export function assembleSlurmConfig(inputs: AssemblyInputs): Assembly {
  if (!inputs.ingressAddress) {
    return { kind: "insufficient-facts", reason: "ingress address unavailable" };
  }

  const { [COMPOSITE_OPTION]: userComposite, ...userOptions } = inputs.userOverrides ?? {};

  const doc = emptySlurmConfig();
  doc.options = {
    ClusterName: inputs.clusterName,
    SlurmctldAddr: inputs.ingressAddress,
    SlurmctldHost: [inputs.hostname],
    [COMPOSITE_OPTION]: slurmctldParameters(userComposite),
    ProctrackType: inputs.container ? "proctrack/linuxproc" : "proctrack/cgroup",
    TaskPlugin: inputs.container ? ["task/affinity"] : ["task/cgroup", "task/affinity"],
    ...accountingParameters(inputs.slurmdbdHost),
    ...CHARM_MAINTAINED_SLURM_CONF_PARAMETERS,
    ...userOptions,
  };

  const section = nodeSection(inputs.compute);
  doc.nodes = section.nodes;
  if (section.newNodes.length > 0) {
    doc.downNodes = [{ nodes: section.newNodes, state: "DOWN", reason: NEW_NODE_REASON }];
  }

  for (const group of inputs.compute) {
    const members = section.partitions[group.partition] ?? [];
    if (members.length === 0) {
      continue;
    }
    doc.partitions[group.partition] = {
      Nodes: Array.from(new Set(members)).sort(byName),
      State: "UP",
      ...(group.partition === inputs.defaultPartition ? { Default: "YES" } : {}),
      ...group.parameters,
    };
  }

  return { kind: "ok", document: doc, newNodes: newNodeNames(doc, NEW_NODE_REASON) };
}

/** cgroup.conf: charm defaults with parsed `cgroup-parameters` applied on top. */
export function assembleCgroupConfig(userOverrides: Record<string, string> = {}): SlurmOptions {
  return { ...CHARM_MAINTAINED_CGROUP_CONF_PARAMETERS, ...userOverrides };
}

/** Nodes recorded as new before this pass that no longer are. */
export function transitioningNodes(previous: readonly string[], current: readonly string[]): string[] {
  const still = new Set(current);
  return Array.from(new Set(previous.filter((node) => !still.has(node))));
}
