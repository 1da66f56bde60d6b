/** An external control surface (package manager, systemd, scontrol, config file) failed. */
export class SlurmOpsError extends Error {
  readonly command?: string;
  readonly code?: number;
  readonly output: string;

  constructor(message: string, detail: { command?: string; code?: number; output?: string } = {}) {
    super(message);
    this.name = "SlurmOpsError";
    this.command = detail.command;
    this.code = detail.code;
    this.output = detail.output ?? "";
  }
}

/** A relation payload that is present but cannot be decoded. */
export class MalformedFactError extends Error {
  readonly relation: string;
  readonly key: string;

  constructor(relation: string, key: string, reason: string) {
    super(`malformed ${key} payload on relation ${relation}: ${reason}`);
    this.name = "MalformedFactError";
    this.relation = relation;
    this.key = key;
  }
}
