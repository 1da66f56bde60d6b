import type { GresEntry } from "./types.js";

/**
 * Compress unique ascending integers into Slurm's bracketed range syntax.
 *
 * `[0,1,2,3,4,5,6,8,9,10,12,14,15,16,18]` becomes `"[0-6,8-10,12,14-16,18]"`.
 */
export function rangesAndStrides(nums: number[]): string {
  const parts: string[] = [];
  let start: number | undefined;
  let prev: number | undefined;

  const flush = () => {
    if (start === undefined || prev === undefined) {
      return;
    }
    parts.push(start === prev ? `${start}` : `${start}-${prev}`);
  };

  for (const num of nums) {
    if (prev !== undefined && num === prev + 1) {
      prev = num;
      continue;
    }
    flush();
    start = num;
    prev = num;
  }
  flush();

  return `[${parts.join(",")}]`;
}

/** GPU model name as Slurm autodetect spells it: "Tesla T4" is "tesla_t4". */
export function normalizeGpuModel(name: string): string {
  return name.trim().split(/\s+/).join("_").toLowerCase();
}

export type GpuInventory = Record<string, number[]>;

export function buildGresInfo(gpus: GpuInventory): { gres: GresEntry[]; gresParameter: string[] } {
  const gres: GresEntry[] = [];
  const gresParameter: string[] = [];

  for (const [model, devices] of Object.entries(gpus)) {
    if (devices.length === 0) {
      continue;
    }
    const sorted = Array.from(new Set(devices)).sort((a, b) => a - b);
    const suffix = sorted.length === 1 ? `${sorted[0]}` : rangesAndStrides(sorted);
    gres.push({ Name: "gpu", Type: model, File: `/dev/nvidia${suffix}` });
    gresParameter.push(`gpu:${model}:${sorted.length}`);
  }

  return { gres, gresParameter };
}
