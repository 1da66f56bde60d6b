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
import { StateStore } from "../state.js";
import type { LifecycleEvent, Outcome } from "../types.js";

export const SackdStateSchema = Type.Object({ ...ConsumerStateProperties });
export type SackdState = Static<typeof SackdStateSchema>;

export type SackdEvent =
  | LifecycleEvent
  | { kind: "slurmctld-available"; fact: ClusterInfo }
  | { kind: "slurmctld-unavailable" };

const UPSTREAM = "slurmctld";

/** Login node: authenticates users against the cluster through sackd. */
export class SackdCharm {
  readonly model: CharmModel;
  readonly queue: EventQueue<SackdEvent>;
  readonly sackd: SlurmManager;
  private readonly store: StateStore<typeof SackdStateSchema>;
  private readonly slurmctld: RelationFactExchange<ClusterInfo>;
  private readonly engine: ConsumerEngine<"slurmctld_host" | "auth_key">;
  private readonly logger: Logger;
  private state: SackdState;

  private constructor(
    params: CharmParams,
    store: StateStore<typeof SackdStateSchema>,
    state: SackdState,
  ) {
    this.model = params.model;
    this.logger = params.logger ?? createLogger("sackd");
    this.store = store;
    this.state = state;
    this.sackd = new SlurmManager({
      daemon: "sackd",
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
        daemon: "sackd",
        fields: ["slurmctld_host", "auth_key"],
        apply: {
          slurmctld_host: (host) => this.sackd.setConfigServer(host),
          auth_key: (key) => this.sackd.munge.key.set(key),
        },
        activate: async () => {
          await this.sackd.munge.service.restart();
          await this.sackd.service.enable();
        },
        deactivate: () => this.sackd.service.disable(),
      },
      state: () => this.state,
      save: () => this.store.save(this.state),
      checkStatus: () => this.checkStatus(),
      logger: this.logger,
    });
    this.queue = new EventQueue({ handler: (event) => this.handle(event), logger: this.logger });
  }

  static async create(params: CharmParams): Promise<SackdCharm> {
    const store = new StateStore({ stateDir: params.stateDir, name: "sackd", schema: SackdStateSchema });
    return new SackdCharm(params, store, await store.load());
  }

  get snapshot(): Readonly<SackdState> {
    return this.state;
  }

  async handle(event: SackdEvent): Promise<Outcome> {
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
    this.model.setStatus(waiting("installing sackd"));

    const outcome = await deferOnOpsError(this.logger, async () => {
      await this.sackd.install();
      // sackd must not start before the controller is known.
      await this.sackd.service.disable();
      this.model.workloadVersion = await this.sackd.version();
      this.state.installed = true;
      await this.store.save(this.state);
      return "handled";
    });

    this.checkStatus();
    return outcome;
  }

  checkStatus(): boolean {
    if (!this.state.installed) {
      this.model.setStatus(blocked("failed to install sackd. see logs for further details"));
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
