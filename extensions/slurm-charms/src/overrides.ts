import { readFileSync } from "node:fs";
import { tokenizeLine } from "./slurmconf.js";
import type { SlurmOptionMap } from "./types.js";

export type ParseResult<T> = { ok: true; value: T } | { ok: false; error: string };

type OptionSets = {
  node: string[];
  partition: string[];
};

function loadOptionSets(): OptionSets {
  const raw = readFileSync(new URL("../data/slurm-options.json", import.meta.url), "utf8");
  const parsed: unknown = JSON.parse(raw);
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error("slurm-options.json must be an object");
  }
  const readList = (key: "node" | "partition"): string[] => {
    const value: unknown = Reflect.get(parsed, key);
    if (!Array.isArray(value) || !value.every((entry) => typeof entry === "string")) {
      throw new Error(`slurm-options.json: ${key} must be an array of strings`);
    }
    return value;
  };
  return { node: readList("node"), partition: readList("partition") };
}

const OPTION_SETS = loadOptionSets();

export const NODE_OPTIONS: ReadonlySet<string> = new Set(OPTION_SETS.node);
export const PARTITION_OPTIONS: ReadonlySet<string> = new Set(OPTION_SETS.partition);

/**
 * Parse newline-separated `KEY=VALUE` lines. Only the first `=` separates, so
 * `JobAcctGatherFrequency=task=30,network=40` keeps `task=30,network=40`.
 */
export function parseConfigLines(raw: string): ParseResult<Record<string, string>> {
  const params: Record<string, string> = {};
  const lines = raw.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const line = (lines[i] ?? "").trim();
    if (line.length === 0 || line.startsWith("#")) {
      continue;
    }
    const idx = line.indexOf("=");
    if (idx <= 0) {
      return { ok: false, error: `line ${i + 1} "${line}" is not KEY=VALUE` };
    }
    params[line.slice(0, idx).trim()] = line.slice(idx + 1).trim();
  }
  return { ok: true, value: params };
}

/** Parse whitespace-separated `KEY=VALUE` pairs; quoted values are kept verbatim. */
export function parseInlineParameters(raw: string): ParseResult<Record<string, string>> {
  let tokens: string[];
  try {
    tokens = tokenizeLine(raw.trim());
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
  const params: Record<string, string> = {};
  for (const token of tokens) {
    const idx = token.indexOf("=");
    if (idx <= 0) {
      return { ok: false, error: `"${token}" is not KEY=VALUE` };
    }
    params[token.slice(0, idx)] = token.slice(idx + 1);
  }
  return { ok: true, value: params };
}

export function findInvalidKeys(
  params: Record<string, string>,
  allowed: ReadonlySet<string>,
): string[] {
  return Object.keys(params).filter((key) => !allowed.has(key));
}

/** `a=1,b=2,flag` into `{ a: "1", b: "2", flag: true }`. */
export function parseCompositeOption(raw: string): SlurmOptionMap {
  const map: SlurmOptionMap = {};
  for (const entry of raw.split(",")) {
    const trimmed = entry.trim();
    if (!trimmed) {
      continue;
    }
    const idx = trimmed.indexOf("=");
    if (idx < 0) {
      map[trimmed] = true;
    } else {
      map[trimmed.slice(0, idx)] = trimmed.slice(idx + 1);
    }
  }
  return map;
}

export function formatInlineParameters(params: Record<string, string>): string {
  return Object.entries(params)
    .map(([key, value]) => `${key}=${value}`)
    .join(" ");
}
