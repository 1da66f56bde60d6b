import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { vi } from "vitest";
import type { CommandResult, CommandRunner } from "./types.js";

export type MockResponse = Partial<CommandResult> | Error;
export type MockHandler = (args: string[]) => MockResponse;

export type MockCall = { command: string; args: string[]; env?: Record<string, string> };

export const SLURMD_C_OUTPUT =
  "NodeName=compute-0 CPUs=4 Boards=1 SocketsPerBoard=1 CoresPerSocket=2 ThreadsPerCore=2 RealMemory=7837 UpTime=0-01:02:03\n";

export function missingCommand(command: string): Error {
  return Object.assign(new Error(`spawn ${command} ENOENT`), { code: "ENOENT" });
}

const DEFAULT_HANDLERS: Record<string, MockHandler> = {
  "dpkg-query": () => ({ stdout: "23.11.4-1.2u1\n" }),
  "systemd-detect-virt": () => ({ code: 1, stdout: "none\n" }),
  slurmd: () => ({ stdout: SLURMD_C_OUTPUT }),
  "nvidia-smi": () => missingCommand("nvidia-smi"),
};

/** A runner that records every call and answers by command name. */
export function createMockRunner(handlers: Record<string, MockHandler> = {}) {
  const calls: MockCall[] = [];
  const runner: CommandRunner = vi.fn(async (command, args, options) => {
    calls.push({ command, args, ...(options?.env ? { env: options.env } : {}) });
    const handler = handlers[command] ?? DEFAULT_HANDLERS[command];
    const response = handler ? handler(args) : {};
    if (response instanceof Error) {
      throw response;
    }
    return { code: 0, stdout: "", stderr: "", ...response };
  });
  const commandLines = () => calls.map((call) => [call.command, ...call.args].join(" "));
  return { runner, calls, commandLines };
}

const tmpDirs: string[] = [];

export async function makeTempDir(prefix: string): Promise<string> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), prefix));
  tmpDirs.push(dir);
  return dir;
}

export async function removeTempDirs(): Promise<void> {
  await Promise.all(
    tmpDirs.splice(0).map(async (dir) => {
      await fs.rm(dir, { recursive: true, force: true });
    }),
  );
}
