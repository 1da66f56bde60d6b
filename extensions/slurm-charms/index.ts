import { SackdCharm } from "./src/charms/sackd.js";
import { SlurmctldCharm } from "./src/charms/slurmctld.js";
import { SlurmdbdCharm } from "./src/charms/slurmdbd.js";
import { SlurmdCharm } from "./src/charms/slurmd.js";
import { SlurmrestdCharm } from "./src/charms/slurmrestd.js";
import type { CharmParams } from "./src/engine.js";
import type { ClusterRole } from "./src/types.js";

export type CharmByRole = {
  controller: SlurmctldCharm;
  compute: SlurmdCharm;
  database: SlurmdbdCharm;
  rest: SlurmrestdCharm;
  login: SackdCharm;
};

export type Charm = CharmByRole[ClusterRole];

type CharmFactories = { [R in ClusterRole]: (params: CharmParams) => Promise<CharmByRole[R]> };

const factories: CharmFactories = {
  controller: (params) => SlurmctldCharm.create(params),
  compute: (params) => SlurmdCharm.create(params),
  database: (params) => SlurmdbdCharm.create(params),
  rest: (params) => SlurmrestdCharm.create(params),
  login: (params) => SackdCharm.create(params),
};

/** Build the charm for one cluster role, loading its durable state. */
export async function createCharm<R extends ClusterRole>(
  role: R,
  params: CharmParams,
): Promise<CharmByRole[R]> {
  return await factories[role](params);
}

export { SackdCharm, SlurmctldCharm, SlurmdbdCharm, SlurmdCharm, SlurmrestdCharm };
export type { SackdEvent } from "./src/charms/sackd.js";
export type { SlurmctldEvent } from "./src/charms/slurmctld.js";
export type { SlurmdbdEvent } from "./src/charms/slurmdbd.js";
export type { SlurmdEvent } from "./src/charms/slurmd.js";
export type { SlurmrestdEvent } from "./src/charms/slurmrestd.js";
export { CharmModel, active, blocked, waiting } from "./src/runtime/model.js";
export type { Relation, RelationDataBag } from "./src/runtime/model.js";
export { EventQueue } from "./src/runtime/queue.js";
export type { CycleReport } from "./src/runtime/queue.js";
export { assembleCgroupConfig, assembleSlurmConfig, transitioningNodes } from "./src/assembler.js";
export type { Assembly, AssemblyInputs, ComputeGroup } from "./src/assembler.js";
export { FactProvider } from "./src/facts.js";
export { KeyManager } from "./src/secrets.js";
export { FactPublisher, RelationFactExchange } from "./src/exchange.js";
export { parseSlurmConfig, renderSlurmConfig } from "./src/slurmconf.js";
export { MalformedFactError, SlurmOpsError } from "./src/errors.js";
export { defaultCommandRunner } from "./src/exec.js";
export type { CharmParams } from "./src/engine.js";
export type {
  ActionResult,
  ClusterRole,
  CommandResult,
  CommandRunner,
  LifecycleEvent,
  Outcome,
  SlurmConfigDocument,
  SlurmDaemon,
  UnitStatus,
} from "./src/types.js";
