/**
 * @covenant/governance: Governance event store wiring.
 */

import { EventStore } from "@covenant/event-store";
import type { EventStoreOptions } from "@covenant/event-store";
import type { GovernanceEvent } from "./events.js";
import { decodeGovernanceEvent } from "./events.js";
import { createGovernanceValidator } from "./invariants.js";
import type { SafetyPolicy } from "./policy.js";
import { DEFAULT_SAFETY_POLICY } from "./policy.js";
import { governanceProjection } from "./projection.js";
import type { GovernanceState } from "./state.js";

export type GovernanceStore = EventStore<GovernanceEvent, GovernanceState>;

export interface GovernanceStoreOptions
  extends Omit<EventStoreOptions<GovernanceEvent, GovernanceState>, "projection" | "decode" | "validate"> {
  /** Default: DEFAULT_SAFETY_POLICY */
  readonly policy?: SafetyPolicy;
}

/**
 * An event store that admits only governance events satisfying the
 * governance invariants under `policy`.
 */
export function createGovernanceStore(options: GovernanceStoreOptions): GovernanceStore {
  const { policy = DEFAULT_SAFETY_POLICY, ...storeOptions } = options;
  return new EventStore<GovernanceEvent, GovernanceState>({
    ...storeOptions,
    projection: governanceProjection,
    decode: decodeGovernanceEvent,
    validate: createGovernanceValidator(policy),
  });
}
