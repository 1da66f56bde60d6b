import { Type, type Static } from "@sinclair/typebox";
import { fieldsFact, jsonFact } from "./exchange.js";

export const GresEntrySchema = Type.Object({
  Name: Type.String(),
  Type: Type.String(),
  File: Type.String(),
});

/**
 * What the controller leader publishes to every consumer. Fields are
 * optional on the wire; each consumer decides which ones it waits for.
 */
export const ClusterInfoSchema = Type.Object({
  auth_key: Type.Optional(Type.String()),
  slurmctld_host: Type.Optional(Type.String()),
  jwt_key: Type.Optional(Type.String()),
  nhc_params: Type.Optional(Type.String()),
  slurm_conf: Type.Optional(Type.String()),
});
export type ClusterInfo = Static<typeof ClusterInfoSchema>;

export const NodeFactSchema = Type.Object({
  node_name: Type.String({ minLength: 1 }),
  node_parameters: Type.Optional(
    Type.Record(Type.String(), Type.Union([Type.String(), Type.Array(Type.String())])),
  ),
  new_node: Type.Optional(Type.Boolean()),
  gres_info: Type.Optional(Type.Array(GresEntrySchema)),
});
export type NodeFactPayload = Static<typeof NodeFactSchema>;

export const PartitionFactSchema = Type.Object({
  partition_name: Type.String({ minLength: 1 }),
  partition_parameters: Type.Optional(Type.Record(Type.String(), Type.String())),
});
export type PartitionFact = Static<typeof PartitionFactSchema>;

export const SlurmdbdFactSchema = Type.Object({
  slurmdbd_host: Type.String({ minLength: 1 }),
});
export type SlurmdbdFact = Static<typeof SlurmdbdFactSchema>;

export const DatabaseFactSchema = Type.Object({
  endpoints: Type.String(),
  username: Type.String(),
  password: Type.String(),
});
export type DatabaseFact = Static<typeof DatabaseFactSchema>;

export const CLUSTER_INFO_KEY = "cluster_info";
export const NODE_KEY = "node";
export const PARTITION_KEY = "partition";
export const SLURMDBD_KEY = "slurmdbd";

export const clusterInfoCodec = jsonFact(CLUSTER_INFO_KEY, ClusterInfoSchema);
export const nodeCodec = jsonFact(NODE_KEY, NodeFactSchema);
export const partitionCodec = jsonFact(PARTITION_KEY, PartitionFactSchema);
export const slurmdbdCodec = jsonFact(SLURMDBD_KEY, SlurmdbdFactSchema);
export const databaseCodec = fieldsFact(DatabaseFactSchema);
