import { DEFAULT_CLUSTER_NAME } from "./constants.js";

export type ControllerConfig = {
  clusterName: string;
  defaultPartition?: string;
  /** Raw newline-separated `KEY=VALUE` overrides for slurm.conf. */
  slurmConfParameters?: string;
  cgroupParameters?: string;
  healthCheckParams: string;
};

export type ComputeConfig = {
  /** Whitespace-separated `KEY=VALUE` partition parameters. */
  partitionConfig?: string;
  nhcConf?: string;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

function asObject(value: unknown, label: string): Record<string, unknown> {
  if (value == null) {
    return {};
  }
  if (!isRecord(value)) {
    throw new Error(`${label} must be an object`);
  }
  return value;
}

function readString(value: unknown, field: string): string | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`${field} must be a string`);
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/** Like `readString`, but keeps an empty or multi-line value as given. */
function readText(value: unknown, field: string): string | undefined {
  if (value == null) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new Error(`${field} must be a string`);
  }
  return value;
}

export function parseControllerConfig(value: unknown): ControllerConfig {
  const obj = asObject(value, "slurmctld config");
  return {
    clusterName: readString(obj["cluster-name"], "cluster-name") ?? DEFAULT_CLUSTER_NAME,
    defaultPartition: readString(obj["default-partition"], "default-partition"),
    slurmConfParameters: readText(obj["slurm-conf-parameters"], "slurm-conf-parameters"),
    cgroupParameters: readText(obj["cgroup-parameters"], "cgroup-parameters"),
    healthCheckParams: readString(obj["health-check-params"], "health-check-params") ?? "",
  };
}

export function parseComputeConfig(value: unknown): ComputeConfig {
  const obj = asObject(value, "slurmd config");
  return {
    partitionConfig: readText(obj["partition-config"], "partition-config"),
    nhcConf: readText(obj["nhc-conf"], "nhc-conf") || undefined,
  };
}
