import type { UnitStatus } from "../types.js";

export type RelationDataBag = Record<string, string>;

export type Relation = {
  id: number;
  name: string;
  /** Remote application, once the counterpart has attached. */
  app?: string;
  units: string[];
  /** Buckets keyed by application or unit name, local and remote. */
  data: Record<string, RelationDataBag>;
};

export type CharmModelParams = {
  unitName: string;
  appName?: string;
  leader?: boolean;
  config?: Record<string, unknown>;
  hostname?: string;
  ingressAddress?: string;
};

/**
 * What the orchestration host exposes to a unit: identity, leadership,
 * configuration, relation buckets and the status it presents.
 */
export class CharmModel {
  readonly unitName: string;
  readonly appName: string;
  config: Record<string, unknown>;
  hostname: string;
  ingressAddress?: string;
  status: UnitStatus = { kind: "waiting", message: "" };
  workloadVersion?: string;
  /** Set when the unit asks the host to reboot it, now or once the event completes. */
  rebootRequest?: "now" | "after-event";

  private leader: boolean;
  private readonly relations: Relation[] = [];
  private nextRelationId = 0;

  constructor(params: CharmModelParams) {
    this.unitName = params.unitName;
    this.appName = params.appName ?? params.unitName.split("/")[0] ?? params.unitName;
    this.leader = params.leader ?? false;
    this.config = params.config ?? {};
    this.hostname = params.hostname ?? this.unitName.replace("/", "-");
    this.ingressAddress = params.ingressAddress;
  }

  isLeader(): boolean {
    return this.leader;
  }

  setLeader(leader: boolean): void {
    this.leader = leader;
  }

  addRelation(name: string, app?: string): Relation {
    const relation: Relation = {
      id: this.nextRelationId++,
      name,
      app,
      units: [],
      data: {
        [this.appName]: {},
        [this.unitName]: {},
        ...(app ? { [app]: {} } : {}),
      },
    };
    this.relations.push(relation);
    return relation;
  }

  /** Attach the remote application once its first unit has joined. */
  attachApp(relation: Relation, app: string): void {
    relation.app = app;
    this.bucket(relation, app);
  }

  addUnit(relation: Relation, unit: string): void {
    if (!relation.units.includes(unit)) {
      relation.units.push(unit);
    }
    this.bucket(relation, unit);
  }

  removeUnit(relation: Relation, unit: string): void {
    relation.units = relation.units.filter((name) => name !== unit);
    delete relation.data[unit];
  }

  removeRelation(id: number): void {
    const idx = this.relations.findIndex((relation) => relation.id === id);
    if (idx >= 0) {
      this.relations.splice(idx, 1);
    }
  }

  getRelations(name: string): Relation[] {
    return this.relations.filter((relation) => relation.name === name);
  }

  relationById(id: number): Relation | undefined {
    return this.relations.find((relation) => relation.id === id);
  }

  isJoined(name: string): boolean {
    return this.getRelations(name).length > 0;
  }

  localAppData(relation: Relation): RelationDataBag {
    return this.bucket(relation, this.appName);
  }

  localUnitData(relation: Relation): RelationDataBag {
    return this.bucket(relation, this.unitName);
  }

  remoteData(relation: Relation, entity: string): RelationDataBag | undefined {
    return relation.data[entity];
  }

  setStatus(status: UnitStatus): void {
    this.status = status;
  }

  requestReboot(now: boolean): void {
    this.rebootRequest = now ? "now" : "after-event";
  }

  private bucket(relation: Relation, entity: string): RelationDataBag {
    const existing = relation.data[entity];
    if (existing) {
      return existing;
    }
    const created: RelationDataBag = {};
    relation.data[entity] = created;
    return created;
  }
}

export const active = (message = ""): UnitStatus => ({ kind: "active", message });
export const blocked = (message: string): UnitStatus => ({ kind: "blocked", message });
export const waiting = (message: string): UnitStatus => ({ kind: "waiting", message });
