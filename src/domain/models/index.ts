export { Airline } from './airline.model';
export type { AirlinePatch, AirlineProps } from './airline.model';
