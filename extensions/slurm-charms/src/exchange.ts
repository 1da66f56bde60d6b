import type { Static, TObject, TSchema } from "@sinclair/typebox";
import { Value } from "@sinclair/typebox/value";
import { MalformedFactError } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import type { CharmModel, Relation, RelationDataBag } from "./runtime/model.js";
import type { Outcome } from "./types.js";

/** How a fact is laid out in a relation data bucket. */
export type FactCodec<T> = {
  /** Keys that must be present and non-empty before decoding. */
  keys: string[];
  decode: (bag: RelationDataBag, relation: string) => T;
};

function firstError(schema: TSchema, value: unknown): string {
  const error = Value.Errors(schema, value).First();
  return error ? `${error.path || "/"} ${error.message}` : "does not match schema";
}

/** A JSON document stored under a single key. */
export function jsonFact<S extends TSchema>(key: string, schema: S): FactCodec<Static<S>> {
  return {
    keys: [key],
    decode: (bag, relation) => {
      let parsed: unknown;
      try {
        parsed = JSON.parse(bag[key] ?? "");
      } catch (error) {
        throw new MalformedFactError(
          relation,
          key,
          error instanceof Error ? error.message : String(error),
        );
      }
      if (!Value.Check(schema, parsed)) {
        throw new MalformedFactError(relation, key, firstError(schema, parsed));
      }
      return parsed;
    },
  };
}

/** Plain string fields, one key each. */
export function fieldsFact<S extends TObject>(schema: S): FactCodec<Static<S>> {
  const keys = Object.keys(schema.properties);
  return {
    keys,
    decode: (bag, relation) => {
      const value = Object.fromEntries(keys.map((key) => [key, bag[key]]));
      if (!Value.Check(schema, value)) {
        throw new MalformedFactError(relation, keys.join(","), firstError(schema, value));
      }
      return value;
    },
  };
}

export type FactSource = "app" | "unit";

export type FactAvailable<T> = {
  relation: Relation;
  /** The remote application or unit whose bucket held the fact. */
  entity: string;
  fact: T;
};

export type FactReading<T> =
  | { kind: "ignored"; reason: string }
  | { kind: "pending"; missing: string[] }
  | ({ kind: "available" } & FactAvailable<T>);

export type RelationFactExchangeParams<T> = {
  model: CharmModel;
  relation: string;
  source: FactSource;
  codec: FactCodec<T>;
  logger?: Logger;
};

/** Reads one role's fact from a relation. Reading never changes configuration or services. */
export class RelationFactExchange<T> {
  readonly relation: string;
  private readonly model: CharmModel;
  private readonly source: FactSource;
  private readonly codec: FactCodec<T>;
  private readonly logger: Logger;

  constructor(params: RelationFactExchangeParams<T>) {
    this.model = params.model;
    this.relation = params.relation;
    this.source = params.source;
    this.codec = params.codec;
    this.logger = params.logger ?? createLogger(`exchange:${params.relation}`);
  }

  get joined(): boolean {
    return this.model.isJoined(this.relation);
  }

  read(relationId: number, unit?: string): FactReading<T> {
    const relation = this.model.relationById(relationId);
    if (!relation || !relation.app) {
      this.logger.debug(`${this.relation}: no remote application attached`);
      return { kind: "ignored", reason: "no remote application" };
    }

    const entity = this.source === "app" ? relation.app : unit;
    if (!entity) {
      return { kind: "ignored", reason: "no remote unit" };
    }

    const bag = this.model.remoteData(relation, entity);
    if (!bag || Object.keys(bag).length === 0) {
      this.logger.debug(`${this.relation}: ${entity} has not published data yet`);
      return { kind: "ignored", reason: "bucket empty" };
    }

    const missing = this.codec.keys.filter((key) => !bag[key]);
    if (missing.length > 0) {
      this.logger.debug(`${this.relation}: ${entity} is missing ${missing.join(", ")}`);
      return { kind: "pending", missing };
    }

    const fact = this.codec.decode(bag, this.relation);
    this.logger.debug({ entity }, `${this.relation}: fact received`);
    return { kind: "available", relation, entity, fact };
  }

  /**
   * Translate a relation-changed notification: emit the decoded fact, defer
   * while it is incomplete, and ignore buckets that were never written.
   */
  async changed(
    event: { relationId: number; unit?: string },
    emit: (available: FactAvailable<T>) => Promise<Outcome>,
  ): Promise<Outcome> {
    const reading = this.read(event.relationId, event.unit);
    switch (reading.kind) {
      case "ignored":
        return "handled";
      case "pending":
        return "deferred";
      case "available":
        await emit(reading);
        return "handled";
      default:
        reading satisfies never;
        throw new Error("unreachable fact reading");
    }
  }

  /** Every complete fact currently published across all relations of this name. */
  readAll(): FactAvailable<T>[] {
    const facts: FactAvailable<T>[] = [];
    for (const relation of this.model.getRelations(this.relation)) {
      const entities =
        this.source === "app" ? (relation.app ? [relation.app] : []) : [...relation.units].sort();
      for (const entity of entities) {
        const bag = this.model.remoteData(relation, entity);
        if (!bag || this.codec.keys.some((key) => !bag[key])) {
          continue;
        }
        facts.push({ relation, entity, fact: this.codec.decode(bag, this.relation) });
      }
    }
    return facts;
  }
}

/** Writes this unit's own facts into its buckets on relations of one name. */
export class FactPublisher {
  readonly relation: string;
  private readonly model: CharmModel;
  private readonly logger: Logger;

  constructor(params: { model: CharmModel; relation: string; logger?: Logger }) {
    this.model = params.model;
    this.relation = params.relation;
    this.logger = params.logger ?? createLogger(`publisher:${params.relation}`);
  }

  get joined(): boolean {
    return this.model.isJoined(this.relation);
  }

  /** Publish on one relation, or on every relation of this name. */
  publish(target: FactSource, key: string, payload: unknown, relationId?: number): void {
    this.write(target, key, JSON.stringify(payload), relationId);
  }

  clear(target: FactSource, key: string, relationId?: number): void {
    this.write(target, key, "", relationId);
  }

  private write(target: FactSource, key: string, value: string, relationId?: number): void {
    if (target === "app" && !this.model.isLeader()) {
      this.logger.debug(`${this.relation}: only the leader writes application data`);
      return;
    }
    const relations = this.model
      .getRelations(this.relation)
      .filter((relation) => relationId === undefined || relation.id === relationId);
    for (const relation of relations) {
      const bag =
        target === "app" ? this.model.localAppData(relation) : this.model.localUnitData(relation);
      bag[key] = value;
    }
  }
}
