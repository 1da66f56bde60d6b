export type CommandResult = {
  code: number;
  stdout: string;
  stderr: string;
};

export type CommandRunner = (
  command: string,
  args: string[],
  options?: { cwd?: string; timeoutMs?: number; env?: Record<string, string> },
) => Promise<CommandResult>;

export type SlurmDaemon = "slurmctld" | "slurmd" | "slurmdbd" | "slurmrestd" | "sackd";

export type ClusterRole = "controller" | "compute" | "database" | "rest" | "login";

export type Outcome = "handled" | "deferred";

export type UnitStatus =
  | { kind: "active"; message: string }
  | { kind: "blocked"; message: string }
  | { kind: "waiting"; message: string };

/** A mapping value; `true` renders as a bare flag. */
export type SlurmOptionMap = Record<string, string | true>;

export type SlurmOptionValue = string | string[] | SlurmOptionMap;

export type SlurmOptions = Record<string, SlurmOptionValue>;

export type DownNodesEntry = {
  nodes: string[];
  state: string;
  reason: string;
};

export type SlurmConfigDocument = {
  options: SlurmOptions;
  nodes: Record<string, SlurmOptions>;
  downNodes: DownNodesEntry[];
  partitions: Record<string, SlurmOptions>;
};

export type GresEntry = {
  Name: string;
  Type: string;
  File: string;
};

export type GresConfigDocument = {
  nodes: Record<string, GresEntry[]>;
};

export type ActionResult =
  | { status: "completed"; results: Record<string, string> }
  | { status: "failed"; message: string; results: Record<string, string> };

export type LifecycleEvent =
  | { kind: "install" }
  | { kind: "config-changed" }
  | { kind: "update-status" }
  | { kind: "relation-created"; relation: string; relationId: number }
  | { kind: "relation-joined"; relation: string; relationId: number; unit?: string }
  | { kind: "relation-changed"; relation: string; relationId: number; app?: string; unit?: string }
  | { kind: "relation-departed"; relation: string; relationId: number; unit?: string }
  | { kind: "relation-broken"; relation: string; relationId: number };
