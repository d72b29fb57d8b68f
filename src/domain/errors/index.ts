export { AirlineValidationError, DomainError, DuplicateAirlineCodeError } from './domain.error';
export type { AirlineCodeType } from './domain.error';
