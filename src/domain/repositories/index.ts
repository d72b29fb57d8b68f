export { AIRLINE_REPOSITORY } from './airline.repository.interface';
export type { AirlineRepository } from './airline.repository.interface';
