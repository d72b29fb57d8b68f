export { AirlineController } from './airline.controller';
export { HealthController } from './health.controller';
