import { Type, type Static } from "@sinclair/typebox";
import {
  ConsumerEngine,
  ConsumerStateProperties,
  deferOnOpsError,
  type CharmParams,
} from "../engine.js";
import { RelationFactExchange } from "../exchange.js";
import { createLogger, type Logger } from "../logger.js";
import { SlurmManager } from "../ops.js";
import { clusterInfoCodec, type ClusterInfo } from "../payloads.js";
import { active, blocked, waiting, type CharmModel } from "../runtime/model.js";
import { EventQueue } from "../runtime/queue.js";
import { parseSlurmConfig } from "../slurmconf.js";
import { StateStore } from "../state.js";
import type { LifecycleEvent, Outcome } from "../types.js";

export const SlurmrestdStateSchema = Type.Object({ ...ConsumerStateProperties });
export type SlurmrestdState = Static<typeof SlurmrestdStateSchema>;

export type SlurmrestdEvent =
  | LifecycleEvent
  | { kind: "slurmctld-available"; fact: ClusterInfo }
  | { kind: "slurmctld-unavailable" };

const UPSTREAM = "slurmctld";

/** REST API daemon. Renders the controller's slurm.conf locally. */
export class SlurmrestdCharm {
  readonly model: CharmModel;
  readonly queue: EventQueue<SlurmrestdEvent>;
  readonly slurmrestd: SlurmManager;
  private readonly store: StateStore<typeof SlurmrestdStateSchema>;
  private readonly slurmctld: RelationFactExchange<ClusterInfo>;
  private readonly engine: ConsumerEngine<"auth_key" | "slurm_conf">;
  private readonly logger: Logger;
  private state: SlurmrestdState;

  private constructor(
    params: CharmParams,
    store: StateStore<typeof SlurmrestdStateSchema>,
    state: SlurmrestdState,
  ) {
    this.model = params.model;
    this.logger = params.logger ?? createLogger("slurmrestd");
    this.store = store;
    this.state = state;
    this.slurmrestd = new SlurmManager({
      daemon: "slurmrestd",
      runner: params.runner,
      rootDir: params.rootDir,
      logger: this.logger,
    });
    this.slurmctld = new RelationFactExchange({
      model: this.model,
      relation: UPSTREAM,
      source: "app",
      codec: clusterInfoCodec,
      logger: this.logger,
    });
    this.engine = new ConsumerEngine({
      role: {
        daemon: "slurmrestd",
        fields: ["auth_key", "slurm_conf"],
        apply: {
          auth_key: (key) => this.slurmrestd.munge.key.set(key),
          slurm_conf: (text) => this.slurmrestd.config.dump(parseSlurmConfig(text)),
        },
        activate: async () => {
          await this.slurmrestd.munge.service.restart();
          await this.slurmrestd.service.restart();
        },
        deactivate: async () => {
          await this.slurmrestd.service.disable();
          await this.slurmrestd.munge.service.disable();
        },
      },
      state: () => this.state,
      save: () => this.store.save(this.state),
      checkStatus: () => this.checkStatus(),
      logger: this.logger,
    });
    this.queue = new EventQueue({ handler: (event) => this.handle(event), logger: this.logger });
  }

  static async create(params: CharmParams): Promise<SlurmrestdCharm> {
    const store = new StateStore({
      stateDir: params.stateDir,
      name: "slurmrestd",
      schema: SlurmrestdStateSchema,
    });
    return new SlurmrestdCharm(params, store, await store.load());
  }

  get snapshot(): Readonly<SlurmrestdState> {
    return this.state;
  }

  async handle(event: SlurmrestdEvent): Promise<Outcome> {
    switch (event.kind) {
      case "install":
        return await this.onInstall();
      case "update-status":
        this.checkStatus();
        return "handled";
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
      case "config-changed":
      case "relation-created":
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
    this.model.setStatus(waiting("installing slurmrestd"));

    const outcome = await deferOnOpsError(this.logger, async () => {
      await this.slurmrestd.install();
      this.model.workloadVersion = await this.slurmrestd.version();
      this.state.installed = true;
      await this.store.save(this.state);
      return "handled";
    });

    this.checkStatus();
    return outcome;
  }

  checkStatus(): boolean {
    if (!this.state.installed) {
      this.model.setStatus(blocked("failed to install slurmrestd. see logs for further details"));
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
    this.model.setStatus(active());
    return true;
  }
}
