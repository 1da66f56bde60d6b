import { Type } from "@sinclair/typebox";
import { SlurmOpsError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { CharmModel } from "./runtime/model.js";
import type { CommandRunner, Outcome, SlurmDaemon } from "./types.js";

/** Runtime wiring shared by every charm factory. */
export type CharmParams = {
  model: CharmModel;
  stateDir: string;
  runner?: CommandRunner;
  rootDir?: string;
  /** Skip `systemd-detect-virt` and force the container decision. */
  container?: boolean;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
};

export const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

/**
 * Run a handler body, turning an operational failure into a deferral. Any
 * other error propagates.
 */
export async function deferOnOpsError(
  logger: Logger,
  body: () => Promise<Outcome>,
): Promise<Outcome> {
  try {
    return await body();
  } catch (error) {
    if (error instanceof SlurmOpsError) {
      logger.error({ command: error.command, output: error.output }, error.message);
      return "deferred";
    }
    throw error;
  }
}

/** State properties every consuming charm's schema starts from. */
export const ConsumerStateProperties = {
  installed: Type.Boolean({ default: false }),
  upstreamAvailable: Type.Boolean({ default: false }),
  facts: Type.Record(Type.String(), Type.String(), { default: {} }),
};

/** The part of a consumer's durable state the engine owns. */
export type ConsumerState = {
  installed: boolean;
  upstreamAvailable: boolean;
  facts: Record<string, string>;
};

/**
 * What distinguishes one consuming role: the upstream fields it waits for,
 * in order, and how each is installed locally.
 */
export type ConsumerRole<F extends string> = {
  daemon: SlurmDaemon;
  fields: readonly F[];
  apply: Record<F, (value: string) => Promise<void>>;
  /** Restart whatever depends on the installed fields. */
  activate: () => Promise<void>;
  deactivate: () => Promise<void>;
};

export type ConsumerEngineParams<F extends string> = {
  role: ConsumerRole<F>;
  state: () => ConsumerState;
  save: () => Promise<void>;
  checkStatus: () => boolean;
  logger: Logger;
};

/**
 * Readiness protocol for units that consume the controller's facts: store
 * and install each changed field, wait for missing ones, and only then
 * restart and flag the upstream as available.
 */
export class ConsumerEngine<F extends string> {
  private readonly role: ConsumerRole<F>;
  private readonly state: () => ConsumerState;
  private readonly save: () => Promise<void>;
  private readonly checkStatus: () => boolean;
  private readonly logger: Logger;

  constructor(params: ConsumerEngineParams<F>) {
    this.role = params.role;
    this.state = params.state;
    this.save = params.save;
    this.checkStatus = params.checkStatus;
    this.logger = params.logger;
  }

  async available(fact: Partial<Record<F, string>>): Promise<Outcome> {
    const state = this.state();
    if (!state.installed) {
      this.logger.debug(`${this.role.daemon} not installed yet; deferring upstream facts`);
      return "deferred";
    }

    return await deferOnOpsError(this.logger, async () => {
      for (const field of this.role.fields) {
        const incoming = fact[field];
        if (incoming === undefined) {
          this.logger.debug(`'${field}' not in event data`);
          await this.save();
          return "handled";
        }
        if (incoming === state.facts[field]) {
          continue;
        }
        await this.role.apply[field](incoming);
        state.facts[field] = incoming;
        this.logger.debug(`${field} updated`);
      }

      state.upstreamAvailable = true;
      await this.save();
      await this.role.activate();
      this.checkStatus();
      return "handled";
    });
  }

  async unavailable(): Promise<Outcome> {
    const state = this.state();
    state.upstreamAvailable = false;
    state.facts = {};
    await this.save();

    return await deferOnOpsError(this.logger, async () => {
      if (state.installed) {
        await this.role.deactivate();
      }
      this.checkStatus();
      return "handled";
    });
  }
}
