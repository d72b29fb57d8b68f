/** Base class for errors raised by the domain and use-case layers. */
export abstract class DomainError extends Error {
  protected constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Airline shape violates a model invariant. */
export class AirlineValidationError extends DomainError {
  constructor(
    message: string,
    public readonly field: string,
  ) {
    super(message);
  }
}

export type AirlineCodeType = 'IATA' | 'ICAO';

/** Another live airline already holds the requested code. */
export class DuplicateAirlineCodeError extends DomainError {
  constructor(
    public readonly codeType: AirlineCodeType,
    public readonly code: string,
  ) {
    super(`Airline with ${codeType} code ${code} already exists`);
  }
}
