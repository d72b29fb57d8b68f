export { DeterministicIdGenerator } from './deterministic-id.generator';
export { FixedClock } from './fixed.clock';
