import type { SlurmDaemon, SlurmOptions } from "./types.js";

export const SLURMCTLD_PORT = "6817";
export const SLURMDBD_PORT = "6819";
export const MUNGE_SOCKET = "/var/run/munge/munge.socket.2";
export const JWT_KEY_PATH = "/var/lib/slurm/checkpoint/jwt_hs256.key";
export const REBOOT_REQUIRED_PATH = "/var/run/reboot-required";
export const NHC_WRAPPER_PATH = "/usr/sbin/slurm-nhc-wrapper";
export const SLURM_ACCT_DB = "slurm_acct_db";
export const NEW_NODE_REASON = "New node.";
export const DEFAULT_CLUSTER_NAME = "slurm-cluster";

export const CHARM_MAINTAINED_CGROUP_CONF_PARAMETERS: SlurmOptions = {
  ConstrainCores: "yes",
  ConstrainDevices: "yes",
  ConstrainRAMSpace: "yes",
  ConstrainSwapSpace: "yes",
};

export const CHARM_MAINTAINED_SLURM_CONF_PARAMETERS: SlurmOptions = {
  AuthAltParameters: { jwt_key: JWT_KEY_PATH },
  AuthAltTypes: ["auth/jwt"],
  AuthInfo: { socket: MUNGE_SOCKET },
  AuthType: "auth/munge",
  GresTypes: "gpu",
  HealthCheckInterval: "600",
  HealthCheckNodeState: ["ANY", "CYCLE"],
  HealthCheckProgram: NHC_WRAPPER_PATH,
  MailProg: "/usr/bin/mail.mailutils",
  PluginDir: ["/usr/lib/x86_64-linux-gnu/slurm-wlm"],
  PlugStackConfig: "/etc/slurm/plugstack.conf.d/plugstack.conf",
  SelectType: "select/cons_tres",
  SelectTypeParameters: "CR_CPU_Memory",
  SlurmctldPort: SLURMCTLD_PORT,
  SlurmdPort: "6818",
  StateSaveLocation: "/var/lib/slurm/checkpoint",
  SlurmdSpoolDir: "/var/lib/slurm/slurmd",
  SlurmctldLogFile: "/var/log/slurm/slurmctld.log",
  SlurmdLogFile: "/var/log/slurm/slurmd.log",
  SlurmdPidFile: "/var/run/slurmd.pid",
  SlurmctldPidFile: "/var/run/slurmctld.pid",
  SlurmUser: "slurm",
  SlurmdUser: "root",
  RebootProgram: "/usr/sbin/reboot --reboot",
};

export const CHARM_MAINTAINED_SLURMDBD_CONF_PARAMETERS: SlurmOptions = {
  DbdPort: SLURMDBD_PORT,
  AuthType: "auth/munge",
  AuthInfo: { socket: MUNGE_SOCKET },
  AuthAltTypes: ["auth/jwt"],
  AuthAltParameters: { jwt_key: JWT_KEY_PATH },
  SlurmUser: "slurm",
  PluginDir: ["/usr/lib/x86_64-linux-gnu/slurm-wlm"],
  PidFile: "/var/run/slurmdbd.pid",
  LogFile: "/var/log/slurm/slurmdbd.log",
  StorageType: "accounting_storage/mysql",
};

export const DAEMON_PACKAGES: Record<SlurmDaemon, string[]> = {
  slurmctld: ["slurmctld", "munge", "mailutils"],
  slurmd: ["slurmd", "munge"],
  slurmdbd: ["slurmdbd", "munge", "mysql-client"],
  slurmrestd: ["slurmrestd", "munge"],
  sackd: ["sackd", "munge"],
};
