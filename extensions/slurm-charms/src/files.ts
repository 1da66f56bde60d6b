import fs from "node:fs/promises";
import path from "node:path";
import { SlurmOpsError } from "./errors.js";
import { runChecked } from "./exec.js";
import type { CommandRunner } from "./types.js";

export function rootedPath(rootDir: string, absolute: string): string {
  return path.join(rootDir, absolute);
}

export function ioError(action: string, target: string, error: unknown): SlurmOpsError {
  const reason = error instanceof Error ? error.message : String(error);
  return new SlurmOpsError(`failed to ${action} ${target}: ${reason}`, { output: reason });
}

export async function writeOwnedFile(params: {
  runner: CommandRunner;
  file: string;
  content: string | Buffer;
  mode: number;
  owner?: string;
}): Promise<void> {
  try {
    await fs.mkdir(path.dirname(params.file), { recursive: true });
    await fs.writeFile(params.file, params.content, { mode: params.mode });
    await fs.chmod(params.file, params.mode);
  } catch (error) {
    throw ioError("write", params.file, error);
  }
  if (params.owner) {
    await runChecked(params.runner, "chown", [params.owner, params.file]);
  }
}

export async function readTextFile(file: string): Promise<string> {
  try {
    return await fs.readFile(file, "utf8");
  } catch (error) {
    throw ioError("read", file, error);
  }
}

export async function fileExists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}
