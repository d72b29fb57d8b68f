export { SystemClock } from './system.clock';
export { systemProviders } from './system.providers';
export { UuidIdGenerator } from './uuid-id.generator';
