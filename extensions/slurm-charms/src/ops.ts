import { DAEMON_PACKAGES, JWT_KEY_PATH, REBOOT_REQUIRED_PATH, SLURMCTLD_PORT } from "./constants.js";
import { defaultCommandRunner, runChecked } from "./exec.js";
import { fileExists, ioError, readTextFile, rootedPath, writeOwnedFile } from "./files.js";
import { createLogger, type Logger } from "./logger.js";
import { jwtKeyManager, mungeKeyManager, type KeyManager } from "./secrets.js";
import {
  parseGresConfig,
  parseKeyValueConfig,
  parseSlurmConfig,
  renderGresConfig,
  renderKeyValueConfig,
  renderSlurmConfig,
} from "./slurmconf.js";
import type {
  CommandRunner,
  GresConfigDocument,
  SlurmConfigDocument,
  SlurmDaemon,
  SlurmOptions,
} from "./types.js";

export class ServiceManager {
  readonly name: string;
  private readonly runner: CommandRunner;

  constructor(runner: CommandRunner, name: string) {
    this.runner = runner;
    this.name = name;
  }

  async enable(): Promise<void> {
    await runChecked(this.runner, "systemctl", ["enable", "--now", this.name]);
  }

  async disable(): Promise<void> {
    await runChecked(this.runner, "systemctl", ["disable", "--now", this.name]);
  }

  async restart(): Promise<void> {
    await runChecked(this.runner, "systemctl", ["restart", this.name]);
  }

  async active(): Promise<boolean> {
    try {
      const result = await this.runner("systemctl", ["is-active", "--quiet", this.name]);
      return result.code === 0;
    } catch (error) {
      throw ioError("query", this.name, error);
    }
  }
}

/** A structured document persisted at a fixed path with fixed ownership. */
export class ConfigFile<T> {
  readonly path: string;
  private readonly runner: CommandRunner;
  private readonly mode: number;
  private readonly owner?: string;
  private readonly render: (doc: T) => string;
  private readonly parse: (text: string) => T;

  constructor(params: {
    runner: CommandRunner;
    path: string;
    mode: number;
    owner?: string;
    render: (doc: T) => string;
    parse: (text: string) => T;
  }) {
    this.runner = params.runner;
    this.path = params.path;
    this.mode = params.mode;
    this.owner = params.owner;
    this.render = params.render;
    this.parse = params.parse;
  }

  async loadText(): Promise<string> {
    return await readTextFile(this.path);
  }

  async load(): Promise<T> {
    return this.parse(await this.loadText());
  }

  async exists(): Promise<boolean> {
    return await fileExists(this.path);
  }

  async dump(doc: T): Promise<void> {
    await writeOwnedFile({
      runner: this.runner,
      file: this.path,
      content: this.render(doc),
      mode: this.mode,
      owner: this.owner,
    });
  }

  /** Load (or start from `empty`), apply `mutate`, write back. */
  async edit(empty: () => T, mutate: (doc: T) => void): Promise<T> {
    const doc = (await this.exists()) ? await this.load() : empty();
    mutate(doc);
    await this.dump(doc);
    return doc;
  }
}

/** `/etc/default/<daemon>` style `KEY=VALUE` environment file. */
export class EnvironmentFile {
  private readonly file: ConfigFile<SlurmOptions>;

  constructor(params: { runner: CommandRunner; path: string }) {
    this.file = new ConfigFile({
      runner: params.runner,
      path: params.path,
      mode: 0o644,
      render: renderKeyValueConfig,
      parse: parseKeyValueConfig,
    });
  }

  get path(): string {
    return this.file.path;
  }

  async get(key: string): Promise<string | undefined> {
    if (!(await this.file.exists())) {
      return undefined;
    }
    const value = (await this.file.load())[key];
    return typeof value === "string" ? value : undefined;
  }

  async set(key: string, value: string): Promise<void> {
    await this.file.edit(
      () => ({}),
      (doc) => {
        doc[key] = value;
      },
    );
  }

  async unset(key: string): Promise<void> {
    if (!(await this.file.exists())) {
      return;
    }
    await this.file.edit(
      () => ({}),
      (doc) => {
        delete doc[key];
      },
    );
  }
}

export async function detectContainer(runner: CommandRunner): Promise<boolean> {
  try {
    const result = await runner("systemd-detect-virt", ["--container"]);
    return result.code === 0;
  } catch (error) {
    throw ioError("run", "systemd-detect-virt", error);
  }
}

/** Detect GPGPU hardware and install the recommended driver packages. */
export async function autoinstallGpuDrivers(runner: CommandRunner, logger: Logger): Promise<void> {
  logger.info("detecting GPUs");
  const env = { DEBIAN_FRONTEND: "noninteractive" };
  await runChecked(runner, "apt-get", ["install", "-y", "ubuntu-drivers-common"], { env });
  await runChecked(runner, "ubuntu-drivers", ["install", "--gpgpu"], { env });
}

export type SlurmManagerParams = {
  daemon: SlurmDaemon;
  runner?: CommandRunner;
  rootDir?: string;
  logger?: Logger;
};

/** Package, service, key and config-file control for one Slurm daemon. */
export class SlurmManager {
  readonly daemon: SlurmDaemon;
  readonly runner: CommandRunner;
  readonly rootDir: string;
  readonly service: ServiceManager;
  readonly munge: { key: KeyManager; service: ServiceManager };
  readonly jwt: KeyManager;
  readonly config: ConfigFile<SlurmConfigDocument>;
  readonly cgroup: ConfigFile<SlurmOptions>;
  readonly gres: ConfigFile<GresConfigDocument>;
  readonly dbdConfig: ConfigFile<SlurmOptions>;
  readonly environment: EnvironmentFile;
  private readonly logger: Logger;

  constructor(params: SlurmManagerParams) {
    this.daemon = params.daemon;
    this.runner = params.runner ?? defaultCommandRunner;
    this.rootDir = params.rootDir ?? "/";
    this.logger = params.logger ?? createLogger(params.daemon);

    const at = (absolute: string) => rootedPath(this.rootDir, absolute);

    this.service = new ServiceManager(this.runner, params.daemon);
    this.munge = {
      key: mungeKeyManager({ runner: this.runner, path: at("/etc/munge/munge.key") }),
      service: new ServiceManager(this.runner, "munge"),
    };
    this.jwt = jwtKeyManager({
      runner: this.runner,
      path: at(JWT_KEY_PATH),
    });
    this.config = new ConfigFile({
      runner: this.runner,
      path: at("/etc/slurm/slurm.conf"),
      mode: 0o644,
      owner: "slurm:slurm",
      render: renderSlurmConfig,
      parse: parseSlurmConfig,
    });
    this.cgroup = new ConfigFile({
      runner: this.runner,
      path: at("/etc/slurm/cgroup.conf"),
      mode: 0o644,
      owner: "slurm:slurm",
      render: renderKeyValueConfig,
      parse: parseKeyValueConfig,
    });
    this.gres = new ConfigFile({
      runner: this.runner,
      path: at("/etc/slurm/gres.conf"),
      mode: 0o644,
      owner: "slurm:slurm",
      render: renderGresConfig,
      parse: parseGresConfig,
    });
    this.dbdConfig = new ConfigFile({
      runner: this.runner,
      path: at("/etc/slurm/slurmdbd.conf"),
      mode: 0o600,
      owner: "slurm:slurm",
      render: renderKeyValueConfig,
      parse: parseKeyValueConfig,
    });
    this.environment = new EnvironmentFile({
      runner: this.runner,
      path: at(`/etc/default/${params.daemon}`),
    });
  }

  async install(): Promise<void> {
    const packages = DAEMON_PACKAGES[this.daemon];
    this.logger.info(`installing ${packages.join(", ")}`);
    await runChecked(this.runner, "apt-get", ["install", "-y", ...packages], {
      env: { DEBIAN_FRONTEND: "noninteractive" },
    });
  }

  async version(): Promise<string> {
    const result = await runChecked(this.runner, "dpkg-query", [
      "--show",
      "--showformat=${Version}",
      this.daemon,
    ]);
    return result.stdout.trim();
  }

  async scontrol(...args: string[]): Promise<string> {
    this.logger.info(`scontrol ${args.join(" ")}`);
    const result = await runChecked(this.runner, "scontrol", args);
    return result.stdout;
  }

  /** Point a configless daemon at the controller. */
  async setConfigServer(host: string): Promise<void> {
    await this.environment.set(
      `${this.daemon.toUpperCase()}_OPTIONS`,
      `--conf-server ${host}:${SLURMCTLD_PORT}`,
    );
  }

  async setMysqlUnixPort(socketPath: string): Promise<void> {
    await this.environment.set("MYSQL_UNIX_PORT", socketPath);
  }

  async unsetMysqlUnixPort(): Promise<void> {
    await this.environment.unset("MYSQL_UNIX_PORT");
  }

  /** The distribution drops this marker when an upgrade or driver needs a reboot. */
  async rebootRequired(): Promise<boolean> {
    return await fileExists(rootedPath(this.rootDir, REBOOT_REQUIRED_PATH));
  }
}
