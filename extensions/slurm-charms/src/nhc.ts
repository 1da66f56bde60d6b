import { readFileSync } from "node:fs";
import { NHC_WRAPPER_PATH } from "./constants.js";
import { runChecked } from "./exec.js";
import { fileExists, readTextFile, rootedPath, writeOwnedFile } from "./files.js";
import { createLogger, type Logger } from "./logger.js";
import type { CommandRunner } from "./types.js";

const NHC_CONF_PATH = "/etc/nhc/nhc.conf";

export function defaultNhcConfig(): string {
  return readFileSync(new URL("../templates/nhc.conf", import.meta.url), "utf8");
}

export function renderNhcWrapper(params: string): string {
  return ["#!/usr/bin/env bash", "", `/usr/sbin/nhc-wrapper ${params}`.trimEnd(), ""].join("\n");
}

/** Node health check install, `nhc.conf` and the wrapper slurmd runs. */
export class NhcManager {
  readonly confPath: string;
  readonly wrapperPath: string;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;

  constructor(params: { runner: CommandRunner; rootDir: string; logger?: Logger }) {
    this.runner = params.runner;
    this.confPath = rootedPath(params.rootDir, NHC_CONF_PATH);
    this.wrapperPath = rootedPath(params.rootDir, NHC_WRAPPER_PATH);
    this.logger = params.logger ?? createLogger("nhc");
  }

  async install(): Promise<void> {
    this.logger.info("installing node health check (nhc)");
    await runChecked(this.runner, "apt-get", ["install", "-y", "lbnl-nhc"], {
      env: { DEBIAN_FRONTEND: "noninteractive" },
    });
  }

  async getConfig(): Promise<string> {
    if (!(await fileExists(this.confPath))) {
      return `${NHC_CONF_PATH} not found.`;
    }
    return await readTextFile(this.confPath);
  }

  async generateConfig(config?: string): Promise<void> {
    await writeOwnedFile({
      runner: this.runner,
      file: this.confPath,
      content: config || defaultNhcConfig(),
      mode: 0o644,
    });
  }

  async generateWrapper(params: string): Promise<void> {
    this.logger.debug(`generating ${NHC_WRAPPER_PATH}`);
    await writeOwnedFile({
      runner: this.runner,
      file: this.wrapperPath,
      content: renderNhcWrapper(params),
      mode: 0o755,
    });
  }
}
