import { Type, type Static } from "@sinclair/typebox";
import { CHARM_MAINTAINED_SLURMDBD_CONF_PARAMETERS, SLURM_ACCT_DB } from "../constants.js";
import {
  ConsumerEngine,
  ConsumerStateProperties,
  defaultSleep,
  deferOnOpsError,
  type CharmParams,
} from "../engine.js";
import { FactPublisher, RelationFactExchange } from "../exchange.js";
import { createLogger, type Logger } from "../logger.js";
import { SlurmManager } from "../ops.js";
import {
  clusterInfoCodec,
  databaseCodec,
  SLURMDBD_KEY,
  type ClusterInfo,
  type DatabaseFact,
  type SlurmdbdFact,
} from "../payloads.js";
import { active, blocked, waiting, type CharmModel } from "../runtime/model.js";
import { EventQueue } from "../runtime/queue.js";
import { StateStore } from "../state.js";
import type { LifecycleEvent, Outcome } from "../types.js";

export const SlurmdbdStateSchema = Type.Object({
  ...ConsumerStateProperties,
  dbInfo: Type.Record(Type.String(), Type.String(), { default: {} }),
});
export type SlurmdbdState = Static<typeof SlurmdbdStateSchema>;

export type SlurmdbdEvent =
  | LifecycleEvent
  | { kind: "slurmctld-available"; fact: ClusterInfo }
  | { kind: "slurmctld-unavailable" }
  | { kind: "database-available"; fact: DatabaseFact }
  | { kind: "database-unavailable" };

const UPSTREAM = "slurmctld";
const DATABASE = "database";
const START_ATTEMPTS = 5;
const START_POLL_MS = 1000;

export type DatabaseEndpoint =
  | { kind: "socket"; path: string }
  | { kind: "tcp"; host: string; port?: string };

/** `file:///run/mysqld.sock`, `host:port` or `[v6addr]:port`. */
export function parseDatabaseEndpoint(endpoint: string): DatabaseEndpoint {
  if (endpoint.startsWith("file://")) {
    return { kind: "socket", path: endpoint.slice("file://".length) };
  }
  if (endpoint.startsWith("[")) {
    const close = endpoint.indexOf("]");
    if (close > 0) {
      const port = endpoint.slice(close + 1).replace(/^:/, "");
      return { kind: "tcp", host: endpoint.slice(1, close), ...(port ? { port } : {}) };
    }
  }
  const idx = endpoint.lastIndexOf(":");
  if (idx < 0) {
    return { kind: "tcp", host: endpoint };
  }
  return { kind: "tcp", host: endpoint.slice(0, idx), port: endpoint.slice(idx + 1) };
}

/** Comma-separated candidates; blanks dropped. */
export function splitEndpoints(raw: string): string[] {
  return raw
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

/** Accounting database daemon. Bridges a MySQL provider and the controller. */
export class SlurmdbdCharm {
  readonly model: CharmModel;
  readonly queue: EventQueue<SlurmdbdEvent>;
  readonly slurmdbd: SlurmManager;
  private readonly store: StateStore<typeof SlurmdbdStateSchema>;
  private readonly slurmctld: RelationFactExchange<ClusterInfo>;
  private readonly database: RelationFactExchange<DatabaseFact>;
  private readonly publisher: FactPublisher;
  private readonly engine: ConsumerEngine<"auth_key" | "jwt_key">;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly logger: Logger;
  private state: SlurmdbdState;
  private startFailed = false;

  private constructor(
    params: CharmParams,
    store: StateStore<typeof SlurmdbdStateSchema>,
    state: SlurmdbdState,
  ) {
    this.model = params.model;
    this.logger = params.logger ?? createLogger("slurmdbd");
    this.sleep = params.sleep ?? defaultSleep;
    this.store = store;
    this.state = state;
    this.slurmdbd = new SlurmManager({
      daemon: "slurmdbd",
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
    this.database = new RelationFactExchange({
      model: this.model,
      relation: DATABASE,
      source: "app",
      codec: databaseCodec,
      logger: this.logger,
    });
    this.publisher = new FactPublisher({ model: this.model, relation: UPSTREAM, logger: this.logger });
    this.engine = new ConsumerEngine({
      role: {
        daemon: "slurmdbd",
        fields: ["auth_key", "jwt_key"],
        apply: {
          auth_key: (key) => this.slurmdbd.munge.key.set(key),
          jwt_key: (key) => this.slurmdbd.jwt.set(key),
        },
        activate: async () => {
          await this.slurmdbd.munge.service.restart();
          if (Object.keys(this.state.dbInfo).length > 0) {
            await this.writeConfigAndRestart();
          }
        },
        deactivate: () => this.slurmdbd.service.disable(),
      },
      state: () => this.state,
      save: () => this.store.save(this.state),
      checkStatus: () => this.checkStatus(),
      logger: this.logger,
    });
    this.queue = new EventQueue({ handler: (event) => this.handle(event), logger: this.logger });
  }

  static async create(params: CharmParams): Promise<SlurmdbdCharm> {
    const store = new StateStore({
      stateDir: params.stateDir,
      name: "slurmdbd",
      schema: SlurmdbdStateSchema,
    });
    return new SlurmdbdCharm(params, store, await store.load());
  }

  get snapshot(): Readonly<SlurmdbdState> {
    return this.state;
  }

  async handle(event: SlurmdbdEvent): Promise<Outcome> {
    switch (event.kind) {
      case "install":
        return await this.onInstall();
      case "update-status":
        this.checkStatus();
        return "handled";
      case "relation-changed":
        if (event.relation === UPSTREAM) {
          return await this.slurmctld.changed(event, ({ fact }) =>
            this.queue.emit({ kind: "slurmctld-available", fact }),
          );
        }
        if (event.relation === DATABASE) {
          return await this.database.changed(event, ({ fact }) =>
            this.queue.emit({ kind: "database-available", fact }),
          );
        }
        return "handled";
      case "relation-broken":
        if (event.relation === UPSTREAM) {
          await this.queue.emit({ kind: "slurmctld-unavailable" });
        } else if (event.relation === DATABASE) {
          await this.queue.emit({ kind: "database-unavailable" });
        }
        return "handled";
      case "slurmctld-available":
        return await this.engine.available(event.fact);
      case "slurmctld-unavailable":
        return await this.engine.unavailable();
      case "database-available":
        return await this.onDatabaseAvailable(event.fact);
      case "database-unavailable":
        return await this.onDatabaseUnavailable();
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
    if (!this.model.isLeader()) {
      this.model.setStatus(
        blocked("slurmdbd high-availability not supported. see logs for further details"),
      );
      this.logger.warn("slurmdbd high-availability is not supported; only the leader installs");
      return "deferred";
    }
    if (this.state.installed) {
      this.checkStatus();
      return "handled";
    }
    this.model.setStatus(waiting("installing slurmdbd"));

    const outcome = await deferOnOpsError(this.logger, async () => {
      await this.slurmdbd.install();
      // Started once a database and the controller's keys are in place.
      await this.slurmdbd.service.disable();
      this.model.workloadVersion = await this.slurmdbd.version();
      this.state.installed = true;
      await this.store.save(this.state);
      return "handled";
    });

    this.checkStatus();
    return outcome;
  }

  private async onDatabaseAvailable(fact: DatabaseFact): Promise<Outcome> {
    if (!this.state.installed) {
      return "deferred";
    }

    const [endpoint] = splitEndpoints(fact.endpoints);
    if (!endpoint) {
      this.model.setStatus(blocked("No database endpoints provided"));
      throw new Error("No database endpoints provided");
    }

    return await deferOnOpsError(this.logger, async () => {
      const dbInfo: Record<string, string> = {
        StorageUser: fact.username,
        StoragePass: fact.password,
        StorageLoc: SLURM_ACCT_DB,
      };
      const parsed = parseDatabaseEndpoint(endpoint);
      if (parsed.kind === "socket") {
        await this.slurmdbd.setMysqlUnixPort(parsed.path);
      } else {
        await this.slurmdbd.unsetMysqlUnixPort();
        dbInfo.StorageHost = parsed.host;
        if (parsed.port) {
          dbInfo.StoragePort = parsed.port;
        }
      }

      this.state.dbInfo = dbInfo;
      await this.store.save(this.state);
      return await this.writeConfigAndRestart();
    });
  }

  private async onDatabaseUnavailable(): Promise<Outcome> {
    this.state.dbInfo = {};
    this.startFailed = false;
    await this.store.save(this.state);

    return await deferOnOpsError(this.logger, async () => {
      if (this.state.installed) {
        await this.slurmdbd.service.disable();
      }
      this.publisher.clear("app", SLURMDBD_KEY);
      this.checkStatus();
      return "handled";
    });
  }

  /**
   * Render slurmdbd.conf and restart. Without the controller's keys there is
   * nothing to start yet; activation repeats this once they arrive.
   */
  private async writeConfigAndRestart(): Promise<Outcome> {
    if (!this.state.upstreamAvailable) {
      this.logger.debug("slurmctld keys not received; slurmdbd start postponed");
      this.checkStatus();
      return "handled";
    }

    await this.slurmdbd.dbdConfig.dump({
      ...CHARM_MAINTAINED_SLURMDBD_CONF_PARAMETERS,
      DbdHost: this.model.hostname,
      ...this.state.dbInfo,
    });
    await this.slurmdbd.service.restart();

    this.startFailed = !(await this.waitForActive());
    if (this.startFailed) {
      this.logger.error("slurmdbd did not become active after restart");
      this.checkStatus();
      return "handled";
    }

    const fact: SlurmdbdFact = { slurmdbd_host: this.model.hostname };
    this.publisher.publish("app", SLURMDBD_KEY, fact);
    this.checkStatus();
    return "handled";
  }

  private async waitForActive(): Promise<boolean> {
    for (let attempt = 1; attempt <= START_ATTEMPTS; attempt++) {
      if (await this.slurmdbd.service.active()) {
        return true;
      }
      if (attempt < START_ATTEMPTS) {
        await this.sleep(START_POLL_MS);
      }
    }
    return false;
  }

  checkStatus(): boolean {
    if (!this.state.installed) {
      this.model.setStatus(blocked("failed to install slurmdbd. see logs for further details"));
      return false;
    }
    if (!this.database.joined) {
      this.model.setStatus(blocked("Need relations: database"));
      return false;
    }
    if (Object.keys(this.state.dbInfo).length === 0) {
      this.model.setStatus(waiting("Waiting on: database"));
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
    if (this.startFailed) {
      this.model.setStatus(blocked("cannot start slurmdbd"));
      return false;
    }
    this.model.setStatus(active());
    return true;
  }
}
