import { Type, type Static } from "@sinclair/typebox";
import {
  CONTROLLER_ACTIONS,
  ControllerActionSchema,
  completed,
  DrainParamsSchema,
  failed,
  NoParamsSchema,
  parseActionName,
  parseActionParams,
  ResumeParamsSchema,
} from "../actions.js";
import {
  assembleCgroupConfig,
  assembleSlurmConfig,
  transitioningNodes,
  type ComputeGroup,
} from "../assembler.js";
import { parseControllerConfig } from "../config.js";
import { deferOnOpsError, type CharmParams } from "../engine.js";
import { SlurmOpsError } from "../errors.js";
import { FactPublisher, RelationFactExchange } from "../exchange.js";
import { defaultCommandRunner } from "../exec.js";
import { createLogger, type Logger } from "../logger.js";
import { detectContainer, SlurmManager } from "../ops.js";
import { parseConfigLines } from "../overrides.js";
import {
  CLUSTER_INFO_KEY,
  nodeCodec,
  partitionCodec,
  slurmdbdCodec,
  type ClusterInfo,
  type NodeFactPayload,
  type PartitionFact,
  type SlurmdbdFact,
} from "../payloads.js";
import { active, blocked, waiting, type CharmModel } from "../runtime/model.js";
import { EventQueue } from "../runtime/queue.js";
import { renderSlurmConfig } from "../slurmconf.js";
import { StateStore } from "../state.js";
import type { ActionResult, GresConfigDocument, LifecycleEvent, Outcome } from "../types.js";

export const SlurmctldStateSchema = Type.Object({
  installed: Type.Boolean({ default: false }),
  secretKey: Type.String({ default: "" }),
  signingKey: Type.String({ default: "" }),
  knownNewNodes: Type.Array(Type.String(), { default: [] }),
  lastDatabaseHost: Type.String({ default: "" }),
  lastUserOverrides: Type.String({ default: "" }),
  userOverrideParameters: Type.Record(Type.String(), Type.String(), { default: {} }),
  lastCgroupParameters: Type.String({ default: "" }),
  cgroupOverrides: Type.Record(Type.String(), Type.String(), { default: {} }),
  partitionDefault: Type.String({ default: "" }),
  nhcParams: Type.String({ default: "" }),
});
export type SlurmctldState = Static<typeof SlurmctldStateSchema>;

export type SlurmctldEvent =
  | LifecycleEvent
  | { kind: "slurmd-available"; fact: NodeFactPayload }
  | { kind: "slurmd-departed" }
  | { kind: "partition-available"; fact: PartitionFact }
  | { kind: "slurmdbd-available"; fact: SlurmdbdFact }
  | { kind: "slurmdbd-unavailable" }
  | { kind: "slurmrestd-available"; relationId: number };

const SLURMD = "slurmd";
const SLURMDBD = "slurmdbd";
const SLURMRESTD = "slurmrestd";
const LOGIN_NODE = "login-node";

type ConsumerRelation = typeof SLURMD | typeof SLURMDBD | typeof SLURMRESTD | typeof LOGIN_NODE;

function byName(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Cluster controller. The leader owns the secrets, assembles slurm.conf from
 * every compute, database and override fact, and distributes the result.
 */
export class SlurmctldCharm {
  readonly model: CharmModel;
  readonly queue: EventQueue<SlurmctldEvent>;
  readonly slurmctld: SlurmManager;
  readonly container: boolean;
  private readonly store: StateStore<typeof SlurmctldStateSchema>;
  private readonly nodes: RelationFactExchange<NodeFactPayload>;
  private readonly partitions: RelationFactExchange<PartitionFact>;
  private readonly slurmdbd: RelationFactExchange<SlurmdbdFact>;
  private readonly publishers: Record<ConsumerRelation, FactPublisher>;
  private readonly logger: Logger;
  private state: SlurmctldState;

  private constructor(
    params: CharmParams & { container: boolean },
    store: StateStore<typeof SlurmctldStateSchema>,
    state: SlurmctldState,
  ) {
    this.model = params.model;
    this.container = params.container;
    this.logger = params.logger ?? createLogger("slurmctld");
    this.store = store;
    this.state = state;
    this.slurmctld = new SlurmManager({
      daemon: "slurmctld",
      runner: params.runner,
      rootDir: params.rootDir,
      logger: this.logger,
    });
    this.nodes = new RelationFactExchange({
      model: this.model,
      relation: SLURMD,
      source: "unit",
      codec: nodeCodec,
      logger: this.logger,
    });
    this.partitions = new RelationFactExchange({
      model: this.model,
      relation: SLURMD,
      source: "app",
      codec: partitionCodec,
      logger: this.logger,
    });
    this.slurmdbd = new RelationFactExchange({
      model: this.model,
      relation: SLURMDBD,
      source: "app",
      codec: slurmdbdCodec,
      logger: this.logger,
    });
    const publisher = (relation: ConsumerRelation) =>
      new FactPublisher({ model: this.model, relation, logger: this.logger });
    this.publishers = {
      [SLURMD]: publisher(SLURMD),
      [SLURMDBD]: publisher(SLURMDBD),
      [SLURMRESTD]: publisher(SLURMRESTD),
      [LOGIN_NODE]: publisher(LOGIN_NODE),
    };
    this.queue = new EventQueue({ handler: (event) => this.handle(event), logger: this.logger });
  }

  static async create(params: CharmParams): Promise<SlurmctldCharm> {
    const store = new StateStore({
      stateDir: params.stateDir,
      name: "slurmctld",
      schema: SlurmctldStateSchema,
    });
    const container =
      params.container ?? (await detectContainer(params.runner ?? defaultCommandRunner));
    return new SlurmctldCharm({ ...params, container }, store, await store.load());
  }

  get snapshot(): Readonly<SlurmctldState> {
    return this.state;
  }

  async handle(event: SlurmctldEvent): Promise<Outcome> {
    switch (event.kind) {
      case "install":
        return await this.onInstall();
      case "config-changed":
        return await this.onConfigChanged();
      case "update-status":
        this.checkStatus();
        return "handled";
      case "relation-created":
        return await this.onConsumerCreated(event.relation, event.relationId);
      case "relation-joined":
        if (event.relation === SLURMRESTD) {
          await this.queue.emit({ kind: "slurmrestd-available", relationId: event.relationId });
        }
        return "handled";
      case "relation-changed":
        return await this.onRelationChanged(event);
      case "relation-departed":
        if (event.relation === SLURMD) {
          await this.queue.emit({ kind: "slurmd-departed" });
        }
        return "handled";
      case "relation-broken":
        return await this.onRelationBroken(event.relation, event.relationId);
      case "slurmd-available":
        return await this.reconfigure(() => this.addGres(event.fact));
      case "slurmd-departed":
        return await this.reconfigure(() => this.rebuildGres());
      case "partition-available":
        return await this.reconfigure();
      case "slurmdbd-available":
        this.state.lastDatabaseHost = event.fact.slurmdbd_host;
        await this.store.save(this.state);
        return await this.reconfigure();
      case "slurmdbd-unavailable":
        this.state.lastDatabaseHost = "";
        await this.store.save(this.state);
        return await this.reconfigure();
      case "slurmrestd-available":
        return await this.onSlurmrestdAvailable(event.relationId);
      default:
        event satisfies never;
        throw new Error(`Unsupported event: ${String(event)}`);
    }
  }

  private async onInstall(): Promise<Outcome> {
    if (!this.model.isLeader()) {
      this.model.setStatus(blocked("slurmctld high-availability not supported"));
      this.logger.warn(
        "slurmctld high-availability is not supported yet. please scale down application.",
      );
      return "deferred";
    }

    if (!this.state.installed) {
      this.model.setStatus(waiting("installing slurmctld"));
      const outcome = await deferOnOpsError(this.logger, async () => {
        await this.slurmctld.install();
        await this.slurmctld.jwt.generate();
        this.state.signingKey = await this.slurmctld.jwt.get();
        await this.slurmctld.munge.key.generate();
        this.state.secretKey = await this.slurmctld.munge.key.get();
        await this.slurmctld.munge.service.restart();
        await this.slurmctld.service.restart();
        this.model.workloadVersion = await this.slurmctld.version();
        this.state.installed = true;
        await this.store.save(this.state);
        return "handled";
      });
      if (outcome === "deferred") {
        this.checkStatus();
        return outcome;
      }
    }

    return await this.reconfigure();
  }

  private async onConfigChanged(): Promise<Outcome> {
    const config = parseControllerConfig(this.model.config);
    let changed = false;

    if (config.healthCheckParams && config.healthCheckParams !== this.state.nhcParams) {
      this.logger.debug("health-check-params changed; sending to slurmd");
      this.state.nhcParams = config.healthCheckParams;
      await this.store.save(this.state);
      this.publishClusterInfo(SLURMD);
    }

    if (config.defaultPartition && config.defaultPartition !== this.state.partitionDefault) {
      this.logger.debug("default-partition changed");
      this.state.partitionDefault = config.defaultPartition;
      changed = true;
    }

    const overrides = config.slurmConfParameters;
    if (overrides !== undefined && overrides !== this.state.lastUserOverrides) {
      const parsed = parseConfigLines(overrides);
      if (parsed.ok) {
        this.logger.debug("slurm-conf-parameters changed");
        this.state.lastUserOverrides = overrides;
        this.state.userOverrideParameters = parsed.value;
        changed = true;
      } else {
        this.logger.error(`invalid slurm-conf-parameters: ${parsed.error}`);
      }
    }

    const cgroupParameters = config.cgroupParameters ?? "";
    if (cgroupParameters !== this.state.lastCgroupParameters) {
      const parsed = parseConfigLines(cgroupParameters);
      if (parsed.ok) {
        this.logger.debug("cgroup-parameters changed");
        this.state.lastCgroupParameters = cgroupParameters;
        this.state.cgroupOverrides = parsed.value;
        changed = true;
      } else {
        this.logger.error(`invalid cgroup-parameters: ${parsed.error}`);
      }
    }

    if (!changed) {
      this.checkStatus();
      return "handled";
    }
    await this.store.save(this.state);
    return await this.reconfigure();
  }

  private async onConsumerCreated(relation: string, relationId: number): Promise<Outcome> {
    if (!this.isConsumerRelation(relation)) {
      return "handled";
    }
    if (!this.state.installed) {
      return "deferred";
    }
    this.publishClusterInfo(relation, relationId);
    return "handled";
  }

  private async onRelationChanged(event: {
    relation: string;
    relationId: number;
    unit?: string;
  }): Promise<Outcome> {
    switch (event.relation) {
      case SLURMD:
        if (event.unit) {
          return await this.nodes.changed(event, ({ fact }) =>
            this.queue.emit({ kind: "slurmd-available", fact }),
          );
        }
        return await this.partitions.changed(event, ({ fact }) =>
          this.queue.emit({ kind: "partition-available", fact }),
        );
      case SLURMDBD:
        return await this.slurmdbd.changed(event, ({ fact }) =>
          this.queue.emit({ kind: "slurmdbd-available", fact }),
        );
      default:
        return "handled";
    }
  }

  private async onRelationBroken(relation: string, relationId: number): Promise<Outcome> {
    switch (relation) {
      case SLURMD:
        await this.queue.emit({ kind: "slurmd-departed" });
        return "handled";
      case SLURMDBD:
        await this.queue.emit({ kind: "slurmdbd-unavailable" });
        return "handled";
      case LOGIN_NODE:
        this.publishers[LOGIN_NODE].clear("app", CLUSTER_INFO_KEY, relationId);
        return "handled";
      default:
        return "handled";
    }
  }

  private async onSlurmrestdAvailable(relationId: number): Promise<Outcome> {
    if (!this.model.isLeader()) {
      return "handled";
    }
    return await deferOnOpsError(this.logger, async () => {
      if (!this.state.installed || !(await this.slurmctld.config.exists())) {
        this.logger.debug("cluster not ready yet; deferring slurmrestd");
        return "deferred";
      }
      this.publishClusterInfo(SLURMRESTD, relationId, await this.slurmctld.config.loadText());
      return "handled";
    });
  }

  private isConsumerRelation(relation: string): relation is ConsumerRelation {
    return relation in this.publishers;
  }

  /** Each consumer receives only the fields its role waits for. */
  private clusterInfo(relation: ConsumerRelation, slurmConf?: string): ClusterInfo {
    const base: ClusterInfo = {
      auth_key: this.state.secretKey,
      slurmctld_host: this.model.hostname,
    };
    switch (relation) {
      case SLURMD:
        return { ...base, nhc_params: this.state.nhcParams };
      case SLURMDBD:
        return { ...base, jwt_key: this.state.signingKey };
      case SLURMRESTD:
        return slurmConf === undefined ? base : { ...base, slurm_conf: slurmConf };
      case LOGIN_NODE:
        return base;
      default:
        relation satisfies never;
        throw new Error(`Unsupported relation: ${String(relation)}`);
    }
  }

  private publishClusterInfo(
    relation: ConsumerRelation,
    relationId?: number,
    slurmConf?: string,
  ): void {
    if (!this.state.installed) {
      return;
    }
    this.publishers[relation].publish(
      "app",
      CLUSTER_INFO_KEY,
      this.clusterInfo(relation, slurmConf),
      relationId,
    );
  }

  private async addGres(fact: NodeFactPayload): Promise<void> {
    const entries = fact.gres_info ?? [];
    if (entries.length === 0) {
      return;
    }
    await this.slurmctld.gres.edit(
      () => ({ nodes: {} }),
      (doc) => {
        doc.nodes[fact.node_name] = entries;
      },
    );
  }

  /** Departures carry no node name, so gres.conf is rebuilt from the remaining facts. */
  private async rebuildGres(): Promise<void> {
    const doc: GresConfigDocument = { nodes: {} };
    for (const { fact } of this.nodes.readAll()) {
      if (fact.gres_info && fact.gres_info.length > 0) {
        doc.nodes[fact.node_name] = fact.gres_info;
      }
    }
    await this.slurmctld.gres.dump(doc);
  }

  /** One group per compute application, named by its partition fact or the application. */
  private computeGroups(): ComputeGroup[] {
    const partitionByRelation = new Map<number, PartitionFact>();
    for (const { relation, fact } of this.partitions.readAll()) {
      partitionByRelation.set(relation.id, fact);
    }
    const nodesByRelation = new Map<number, NodeFactPayload[]>();
    for (const { relation, fact } of this.nodes.readAll()) {
      nodesByRelation.set(relation.id, [...(nodesByRelation.get(relation.id) ?? []), fact]);
    }

    const groups = new Map<string, ComputeGroup>();
    for (const relation of this.model.getRelations(SLURMD)) {
      const partition = partitionByRelation.get(relation.id);
      const name = partition?.partition_name ?? relation.app;
      if (!name) {
        continue;
      }
      const group = groups.get(name) ?? {
        partition: name,
        parameters: partition?.partition_parameters ?? {},
        nodes: [],
      };
      group.nodes.push(...(nodesByRelation.get(relation.id) ?? []));
      groups.set(name, group);
    }
    return Array.from(groups.values()).sort((a, b) => byName(a.partition, b.partition));
  }

  /**
   * The reconfiguration pass: assemble slurm.conf, install it, reconfigure
   * the live cluster, resume nodes that stopped being new, and hand the
   * document to slurmrestd. Leader only.
   */
  private async reconfigure(prepare?: () => Promise<void>): Promise<Outcome> {
    if (!this.model.isLeader()) {
      return "handled";
    }
    if (!this.state.installed) {
      this.logger.debug("slurmctld not installed; deferring reconfiguration");
      return "deferred";
    }

    return await deferOnOpsError(this.logger, async () => {
      await prepare?.();

      const config = parseControllerConfig(this.model.config);
      const assembly = assembleSlurmConfig({
        clusterName: config.clusterName,
        hostname: this.model.hostname,
        ingressAddress: this.model.ingressAddress,
        container: this.container,
        slurmdbdHost: this.state.lastDatabaseHost,
        compute: this.computeGroups(),
        defaultPartition: this.state.partitionDefault || undefined,
        userOverrides: this.state.userOverrideParameters,
      });
      if (assembly.kind === "insufficient-facts") {
        this.logger.debug(`cannot assemble slurm.conf yet (${assembly.reason}); deferring`);
        return "deferred";
      }

      await this.slurmctld.service.disable();
      await this.slurmctld.config.dump(assembly.document);
      if (!this.container) {
        await this.slurmctld.cgroup.dump(assembleCgroupConfig(this.state.cgroupOverrides));
      }
      await this.slurmctld.service.enable();
      await this.slurmctld.scontrol("reconfigure");

      const transitioning = transitioningNodes(this.state.knownNewNodes, assembly.newNodes);
      if (transitioning.length > 0) {
        await this.slurmctld.scontrol(
          "update",
          `nodename=${transitioning.join(",")}`,
          "state=resume",
        );
      }
      this.state.knownNewNodes = assembly.newNodes;
      await this.store.save(this.state);

      if (this.publishers[SLURMRESTD].joined) {
        this.publishClusterInfo(SLURMRESTD, undefined, renderSlurmConfig(assembly.document));
      }
      this.checkStatus();
      return "handled";
    });
  }

  async runAction(name: string, raw: unknown = {}): Promise<ActionResult> {
    const action = parseActionName(ControllerActionSchema, name);
    if (!action.ok) {
      return failed(`Unknown action "${name}". Available: ${CONTROLLER_ACTIONS.join(", ")}`);
    }

    switch (action.value.action) {
      case "show-current-config":
        return await this.showCurrentConfig(raw);
      case "drain":
        return await this.drain(raw);
      case "resume":
        return await this.resume(raw);
      default:
        action.value.action satisfies never;
        throw new Error(`Unsupported action: ${String(action.value.action)}`);
    }
  }

  private async showCurrentConfig(raw: unknown): Promise<ActionResult> {
    const params = parseActionParams(NoParamsSchema, raw);
    if (!params.ok) {
      return failed(`invalid parameters: ${params.error}`);
    }
    try {
      return completed({ "slurm.conf": await this.slurmctld.config.loadText() });
    } catch (error) {
      if (error instanceof SlurmOpsError) {
        return failed(error.message);
      }
      throw error;
    }
  }

  private async drain(raw: unknown): Promise<ActionResult> {
    const params = parseActionParams(DrainParamsSchema, raw);
    if (!params.ok) {
      return failed(`invalid parameters: ${params.error}`);
    }
    const { nodename, reason } = params.value;
    this.logger.debug(`Draining ${nodename} because ${reason}.`);
    try {
      await this.slurmctld.scontrol(
        "update",
        `nodename=${nodename}`,
        "state=drain",
        `reason=${reason}`,
      );
      return completed({ status: "draining", nodes: nodename });
    } catch (error) {
      if (error instanceof SlurmOpsError) {
        return failed(`Error draining ${nodename}: ${error.output}`);
      }
      throw error;
    }
  }

  private async resume(raw: unknown): Promise<ActionResult> {
    const params = parseActionParams(ResumeParamsSchema, raw);
    if (!params.ok) {
      return failed(`invalid parameters: ${params.error}`);
    }
    const { nodename } = params.value;
    this.logger.debug(`Resuming ${nodename}.`);
    try {
      await this.slurmctld.scontrol("update", `nodename=${nodename}`, "state=idle");
      return completed({ status: "resuming", nodes: nodename });
    } catch (error) {
      if (error instanceof SlurmOpsError) {
        return failed(`Error resuming ${nodename}: ${error.output}`);
      }
      throw error;
    }
  }

  checkStatus(): boolean {
    if (!this.state.installed) {
      this.model.setStatus(blocked("failed to install slurmctld. see logs for further details"));
      return false;
    }

    const config = parseControllerConfig(this.model.config);
    if (config.slurmConfParameters !== undefined) {
      const overrides = parseConfigLines(config.slurmConfParameters);
      if (!overrides.ok) {
        this.model.setStatus(blocked(`invalid slurm-conf-parameters: ${overrides.error}`));
        return false;
      }
    }
    const cgroup = parseConfigLines(config.cgroupParameters ?? "");
    if (!cgroup.ok) {
      this.model.setStatus(blocked(`invalid cgroup-parameters: ${cgroup.error}`));
      return false;
    }

    this.model.setStatus(active());
    return true;
  }
}
