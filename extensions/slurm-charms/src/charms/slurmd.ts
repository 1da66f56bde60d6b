import { Type, type Static } from "@sinclair/typebox";
import {
  COMPUTE_ACTIONS,
  ComputeActionSchema,
  completed,
  failed,
  NodeConfigParamsSchema,
  parseActionName,
  parseActionParams,
} from "../actions.js";
import { parseComputeConfig } from "../config.js";
import {
  ConsumerEngine,
  ConsumerStateProperties,
  deferOnOpsError,
  type CharmParams,
} from "../engine.js";
import { SlurmOpsError } from "../errors.js";
import { FactPublisher, RelationFactExchange } from "../exchange.js";
import { defaultCommandRunner } from "../exec.js";
import { FactProvider } from "../facts.js";
import { createLogger, type Logger } from "../logger.js";
import { NhcManager } from "../nhc.js";
import { autoinstallGpuDrivers, SlurmManager } from "../ops.js";
import {
  findInvalidKeys,
  formatInlineParameters,
  NODE_OPTIONS,
  PARTITION_OPTIONS,
  parseInlineParameters,
} from "../overrides.js";
import {
  clusterInfoCodec,
  NODE_KEY,
  PARTITION_KEY,
  type ClusterInfo,
  type PartitionFact,
} from "../payloads.js";
import { active, blocked, waiting, type CharmModel } from "../runtime/model.js";
import { EventQueue } from "../runtime/queue.js";
import { StateStore } from "../state.js";
import type { ActionResult, CommandRunner, LifecycleEvent, Outcome } from "../types.js";

export const SlurmdStateSchema = Type.Object({
  ...ConsumerStateProperties,
  newNode: Type.Boolean({ default: true }),
  nhcConf: Type.String({ default: "" }),
  userNodeParameters: Type.Record(Type.String(), Type.String(), { default: {} }),
  userPartitionParameters: Type.Record(Type.String(), Type.String(), { default: {} }),
});
export type SlurmdState = Static<typeof SlurmdStateSchema>;

export type SlurmdEvent =
  | LifecycleEvent
  | { kind: "slurmctld-available"; fact: ClusterInfo }
  | { kind: "slurmctld-unavailable" }
  | { kind: "service-started" }
  | { kind: "service-stopped" };

const UPSTREAM = "slurmctld";

function sameParameters(a: Record<string, string>, b: Record<string, string>): boolean {
  const keys = Object.keys(a);
  return keys.length === Object.keys(b).length && keys.every((key) => a[key] === b[key]);
}

function flattenParameters(params: Record<string, string | string[]>): Record<string, string> {
  return Object.fromEntries(
    Object.entries(params).map(([key, value]) => [key, Array.isArray(value) ? value.join(",") : value]),
  );
}

/** Compute node. Publishes its hardware and joins the controller's cluster. */
export class SlurmdCharm {
  readonly model: CharmModel;
  readonly queue: EventQueue<SlurmdEvent>;
  readonly slurmd: SlurmManager;
  readonly nhc: NhcManager;
  private readonly runner: CommandRunner;
  private readonly facts: FactProvider;
  private readonly store: StateStore<typeof SlurmdStateSchema>;
  private readonly slurmctld: RelationFactExchange<ClusterInfo>;
  private readonly publisher: FactPublisher;
  private readonly engine: ConsumerEngine<"slurmctld_host" | "auth_key" | "nhc_params">;
  private readonly logger: Logger;
  private state: SlurmdState;
  /** Last known slurmd state from systemd; unknown until started or probed. */
  private daemonRunning?: boolean;

  private constructor(
    params: CharmParams,
    store: StateStore<typeof SlurmdStateSchema>,
    state: SlurmdState,
  ) {
    this.model = params.model;
    this.logger = params.logger ?? createLogger("slurmd");
    this.runner = params.runner ?? defaultCommandRunner;
    this.store = store;
    this.state = state;
    this.slurmd = new SlurmManager({
      daemon: "slurmd",
      runner: this.runner,
      rootDir: params.rootDir,
      logger: this.logger,
    });
    this.nhc = new NhcManager({
      runner: this.runner,
      rootDir: this.slurmd.rootDir,
      logger: this.logger,
    });
    this.facts = new FactProvider({
      runner: this.runner,
      hostname: this.model.hostname,
      logger: this.logger,
    });
    this.slurmctld = new RelationFactExchange({
      model: this.model,
      relation: UPSTREAM,
      source: "app",
      codec: clusterInfoCodec,
      logger: this.logger,
    });
    this.publisher = new FactPublisher({ model: this.model, relation: UPSTREAM, logger: this.logger });
    this.engine = new ConsumerEngine({
      role: {
        daemon: "slurmd",
        fields: ["slurmctld_host", "auth_key", "nhc_params"],
        apply: {
          slurmctld_host: (host) => this.slurmd.setConfigServer(host),
          auth_key: (key) => this.slurmd.munge.key.set(key),
          nhc_params: (params) => this.nhc.generateWrapper(params),
        },
        activate: async () => {
          await this.slurmd.munge.service.restart();
          await this.slurmd.service.restart();
          this.daemonRunning = true;
        },
        deactivate: async () => {
          await this.slurmd.service.disable();
          this.daemonRunning = undefined;
        },
      },
      state: () => this.state,
      save: () => this.store.save(this.state),
      checkStatus: () => this.checkStatus(),
      logger: this.logger,
    });
    this.queue = new EventQueue({ handler: (event) => this.handle(event), logger: this.logger });
  }

  static async create(params: CharmParams): Promise<SlurmdCharm> {
    const store = new StateStore({
      stateDir: params.stateDir,
      name: "slurmd",
      schema: SlurmdStateSchema,
    });
    return new SlurmdCharm(params, store, await store.load());
  }

  get snapshot(): Readonly<SlurmdState> {
    return this.state;
  }

  async handle(event: SlurmdEvent): Promise<Outcome> {
    switch (event.kind) {
      case "install":
        return await this.onInstall();
      case "config-changed":
        return await this.onConfigChanged();
      case "update-status":
        return await deferOnOpsError(this.logger, async () => {
          if (this.state.installed && this.state.upstreamAvailable) {
            this.daemonRunning = await this.slurmd.service.active();
          }
          this.checkStatus();
          return "handled";
        });
      case "service-started":
        this.daemonRunning = true;
        this.checkStatus();
        return "handled";
      case "service-stopped":
        this.daemonRunning = false;
        this.checkStatus();
        return "handled";
      case "relation-created":
        if (event.relation !== UPSTREAM) {
          return "handled";
        }
        if (!this.state.installed) {
          return "deferred";
        }
        return await deferOnOpsError(this.logger, async () => {
          await this.publishNode();
          this.publishPartition();
          return "handled";
        });
      case "relation-changed":
        if (event.relation !== UPSTREAM) {
          return "handled";
        }
        return await this.slurmctld.changed(event, ({ fact }) =>
          this.queue.emit({ kind: "slurmctld-available", fact }),
        );
      case "relation-broken":
        if (event.relation === UPSTREAM) {
          await this.queue.emit({ kind: "slurmctld-unavailable" });
        }
        return "handled";
      case "slurmctld-available":
        return await this.engine.available(event.fact);
      case "slurmctld-unavailable":
        return await this.engine.unavailable();
      case "relation-joined":
      case "relation-departed":
        return "handled";
      default:
        event satisfies never;
        throw new Error(`Unsupported event: ${String(event)}`);
    }
  }

  private async onInstall(): Promise<Outcome> {
    if (this.state.installed) {
      this.checkStatus();
      return "handled";
    }
    // A pending reboot would leave drivers built against the outgoing kernel.
    if (await this.rebootIfRequired(true)) {
      return "deferred";
    }
    this.model.setStatus(waiting("installing slurmd"));

    const outcome = await deferOnOpsError(this.logger, async () => {
      await this.slurmd.install();
      await this.nhc.install();
      await autoinstallGpuDrivers(this.runner, this.logger);
      this.model.workloadVersion = await this.slurmd.version();
      await this.nhc.generateConfig(this.state.nhcConf || undefined);
      await this.nhc.generateWrapper("");
      this.state.installed = true;
      await this.store.save(this.state);
      return "handled";
    });

    this.checkStatus();
    await this.rebootIfRequired(false);
    return outcome;
  }

  private async rebootIfRequired(now: boolean): Promise<boolean> {
    if (!(await this.slurmd.rebootRequired())) {
      return false;
    }
    this.logger.info(`rebooting unit ${this.model.unitName}`);
    this.model.requestReboot(now);
    return true;
  }

  private async onConfigChanged(): Promise<Outcome> {
    const config = parseComputeConfig(this.model.config);

    return await deferOnOpsError(this.logger, async () => {
      if (config.nhcConf && config.nhcConf !== this.state.nhcConf) {
        await this.nhc.generateConfig(config.nhcConf);
        this.state.nhcConf = config.nhcConf;
        await this.store.save(this.state);
      }

      if (!this.model.isLeader() || config.partitionConfig === undefined) {
        return "handled";
      }

      const parsed = parseInlineParameters(config.partitionConfig);
      if (!parsed.ok) {
        this.logger.error(
          `Error parsing partition-config (${parsed.error}). Please use KEY1=VALUE KEY2=VALUE.`,
        );
        return "handled";
      }
      const invalid = findInvalidKeys(parsed.value, PARTITION_OPTIONS);
      if (invalid.length > 0) {
        this.logger.error(
          `Invalid user supplied partition configuration parameter: ${invalid.join(", ")}.`,
        );
        return "handled";
      }

      this.state.userPartitionParameters = parsed.value;
      await this.store.save(this.state);
      this.publishPartition();
      return "handled";
    });
  }

  private async publishNode(): Promise<void> {
    if (!this.publisher.joined) {
      return;
    }
    const fact = await this.facts.nodeFact({
      newNode: this.state.newNode,
      userParameters: this.state.userNodeParameters,
    });
    this.publisher.publish("unit", NODE_KEY, fact);
  }

  private publishPartition(): void {
    if (!this.publisher.joined || !this.model.isLeader()) {
      return;
    }
    const partition: PartitionFact = {
      partition_name: this.model.appName,
      partition_parameters: this.state.userPartitionParameters,
    };
    this.publisher.publish("app", PARTITION_KEY, partition);
  }

  async runAction(name: string, raw: unknown = {}): Promise<ActionResult> {
    const action = parseActionName(ComputeActionSchema, name);
    if (!action.ok) {
      return failed(`Unknown action "${name}". Available: ${COMPUTE_ACTIONS.join(", ")}`);
    }

    try {
      switch (action.value.action) {
        case "node-configured":
          return await this.nodeConfigured();
        case "node-config":
          return await this.nodeConfig(raw);
        case "show-nhc-config":
          return completed({ "nhc.conf": await this.nhc.getConfig() });
        default:
          action.value.action satisfies never;
          throw new Error(`Unsupported action: ${String(action.value.action)}`);
      }
    } catch (error) {
      if (error instanceof SlurmOpsError) {
        this.logger.error({ output: error.output }, error.message);
        return failed(error.message, error.output ? { output: error.output } : {});
      }
      throw error;
    }
  }

  /** Mark this node configured: it leaves DownNodes on the next controller pass. */
  private async nodeConfigured(): Promise<ActionResult> {
    this.state.newNode = false;
    await this.store.save(this.state);
    await this.publishNode();
    await this.slurmd.service.restart();
    this.logger.debug("node is no longer new");
    return completed();
  }

  /**
   * Get or set user node parameters. An invalid update is rejected as a
   * whole; the current parameters are reported either way.
   */
  private async nodeConfig(raw: unknown): Promise<ActionResult> {
    const params = parseActionParams(NodeConfigParamsSchema, raw);
    if (!params.ok) {
      return failed(`invalid parameters: ${params.error}`);
    }

    let accepted: boolean | undefined;
    if (params.value.parameters !== undefined) {
      accepted = true;
      const parsed = parseInlineParameters(params.value.parameters);
      if (!parsed.ok) {
        this.logger.error("Invalid node parameters specified. Please use KEY1=VAL KEY2=VAL format.");
        accepted = false;
      } else {
        for (const key of findInvalidKeys(parsed.value, NODE_OPTIONS)) {
          this.logger.error(`Invalid user supplied node parameter: ${key}.`);
          accepted = false;
        }
        for (const [key, value] of Object.entries(parsed.value)) {
          if (value === "") {
            this.logger.error(`Invalid user supplied node parameter: ${key}=${value}.`);
            accepted = false;
          }
        }
        if (accepted && !sameParameters(parsed.value, this.state.userNodeParameters)) {
          this.state.userNodeParameters = parsed.value;
          await this.store.save(this.state);
          await this.publishNode();
        }
      }
    }

    const fact = await this.facts.nodeFact({
      newNode: this.state.newNode,
      userParameters: this.state.userNodeParameters,
    });
    const results: Record<string, string> = {
      "node-parameters": formatInlineParameters(flattenParameters(fact.node_parameters)),
    };
    if (accepted !== undefined) {
      results["user-supplied-node-parameters-accepted"] = String(accepted);
    }
    return completed(results);
  }

  checkStatus(): boolean {
    if (!this.state.installed) {
      this.model.setStatus(blocked("failed to install slurmd. see logs for further details"));
      return false;
    }
    if (!this.slurmctld.joined) {
      this.model.setStatus(blocked("Need relations: slurmctld"));
      return false;
    }
    if (!this.state.upstreamAvailable) {
      this.model.setStatus(waiting("Waiting on: slurmctld"));
      return false;
    }
    if (this.daemonRunning === false) {
      this.model.setStatus(blocked("slurmd not running"));
      return false;
    }
    this.model.setStatus(active());
    return true;
  }
}
