import { runChecked } from "./exec.js";
import { buildGresInfo, normalizeGpuModel, type GpuInventory } from "./gres.js";
import { createLogger, type Logger } from "./logger.js";
import type { CommandResult, CommandRunner, GresEntry } from "./types.js";

export type NodeFact = {
  node_name: string;
  node_parameters: Record<string, string | string[]>;
  new_node: boolean;
  gres_info?: GresEntry[];
};

/**
 * Parse `slurmd -C` output. The trailing `UpTime` token is dropped and
 * comma-separated values (e.g. `Gres=gpu:a:1,gpu:b:1`) become lists.
 */
export function parseSlurmdInfo(stdout: string): Record<string, string | string[]> {
  const info: Record<string, string | string[]> = {};
  for (const token of stdout.trim().split(/\s+/)) {
    const idx = token.indexOf("=");
    if (idx <= 0) {
      continue;
    }
    const key = token.slice(0, idx);
    const value = token.slice(idx + 1);
    if (key === "UpTime") {
      continue;
    }
    info[key] = value.includes(",") ? value.split(",") : value;
  }
  return info;
}

/** Parse `nvidia-smi --query-gpu=name,minor_number --format=csv,noheader`. */
export function parseGpuQuery(stdout: string): GpuInventory {
  const gpus: GpuInventory = {};
  for (const line of stdout.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) {
      continue;
    }
    const idx = trimmed.lastIndexOf(",");
    if (idx <= 0) {
      continue;
    }
    const model = normalizeGpuModel(trimmed.slice(0, idx));
    const minor = Number.parseInt(trimmed.slice(idx + 1).trim(), 10);
    if (!model || !Number.isInteger(minor)) {
      continue;
    }
    gpus[model] = [...(gpus[model] ?? []), minor];
  }
  return gpus;
}

function isMissingCommand(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

export type FactProviderParams = {
  runner: CommandRunner;
  hostname: string;
  logger?: Logger;
};

/** Hardware and accelerator facts about the local machine. */
export class FactProvider {
  private readonly runner: CommandRunner;
  private readonly hostname: string;
  private readonly logger: Logger;

  constructor(params: FactProviderParams) {
    this.runner = params.runner;
    this.hostname = params.hostname;
    this.logger = params.logger ?? createLogger("facts");
  }

  async slurmdInfo(): Promise<Record<string, string | string[]>> {
    const result = await runChecked(this.runner, "slurmd", ["-C"]);
    return parseSlurmdInfo(result.stdout);
  }

  async gpus(): Promise<GpuInventory> {
    let result: CommandResult;
    try {
      result = await this.runner("nvidia-smi", [
        "--query-gpu=name,minor_number",
        "--format=csv,noheader",
      ]);
    } catch (error) {
      if (isMissingCommand(error)) {
        this.logger.debug("nvidia-smi not found; no GPUs");
        return {};
      }
      throw error;
    }
    if (result.code !== 0) {
      this.logger.debug(`nvidia-smi exited ${result.code}; no GPUs`);
      return {};
    }
    return parseGpuQuery(result.stdout);
  }

  /** The compute node's published fact. User parameters are applied last. */
  async nodeFact(params: {
    newNode: boolean;
    userParameters: Record<string, string>;
  }): Promise<NodeFact> {
    const { NodeName, ...hardware } = await this.slurmdInfo();
    const { gres, gresParameter } = buildGresInfo(await this.gpus());

    const nodeParameters: Record<string, string | string[]> = { ...hardware };
    if (gresParameter.length > 0) {
      const detected = nodeParameters.Gres;
      const existing = detected === undefined ? [] : Array.isArray(detected) ? detected : [detected];
      nodeParameters.Gres = [...existing, ...gresParameter];
    }
    nodeParameters.MemSpecLimit = "1024";
    Object.assign(nodeParameters, params.userParameters);

    const nodeName = typeof NodeName === "string" && NodeName ? NodeName : this.hostname;
    const fact: NodeFact = {
      node_name: nodeName,
      node_parameters: nodeParameters,
      new_node: params.newNode,
      ...(gres.length > 0 ? { gres_info: gres } : {}),
    };
    this.logger.debug({ fact }, "node fact");
    return fact;
  }
}
