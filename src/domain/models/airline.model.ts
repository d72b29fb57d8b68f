import { AirlineValidationError } from '@/domain/errors';

/** Properties for Airline domain model. */
export interface AirlineProps {
  id: string;
  name: string;
  iataCode: string;
  icaoCode: string;
  country: string;
  active: boolean;
  createdAt: Date | null;
  updatedAt: Date | null;
}

/** Fields that may change after creation. Codes, id and createdAt are fixed. */
export interface AirlinePatch {
  name?: string;
  country?: string;
  active?: boolean;
}

const IATA_CODE_LENGTH = 2;
const ICAO_CODE_MIN_LENGTH = 3;
const ICAO_CODE_MAX_LENGTH = 4;

function cloneDate(date: Date | null): Date | null {
  return date ? new Date(date.getTime()) : null;
}

/**
 * Pure domain model for Airline (no framework dependencies).
 * Codes are upper-cased on construction; every change produces a new instance.
 */
export class Airline {
  private readonly props: AirlineProps;

  /**
   * @param props - Airline properties (immutable after construction)
   * @throws {AirlineValidationError} When a field breaks an invariant
   */
  constructor(props: AirlineProps) {
    const normalized: AirlineProps = {
      ...props,
      iataCode: props.iataCode.toUpperCase(),
      icaoCode: props.icaoCode.toUpperCase(),
      createdAt: cloneDate(props.createdAt),
      updatedAt: cloneDate(props.updatedAt),
    };
    Airline.validate(normalized);
    this.props = normalized;
  }

  get id(): string {
    return this.props.id;
  }

  get name(): string {
    return this.props.name;
  }

  get iataCode(): string {
    return this.props.iataCode;
  }

  get icaoCode(): string {
    return this.props.icaoCode;
  }

  get country(): string {
    return this.props.country;
  }

  get active(): boolean {
    return this.props.active;
  }

  /** Timestamps are returned as copies; the instance keeps its own. */
  get createdAt(): Date | null {
    return cloneDate(this.props.createdAt);
  }

  get updatedAt(): Date | null {
    return cloneDate(this.props.updatedAt);
  }

  /**
   * Builds the next version of this airline.
   * Unset patch fields keep their current value; updatedAt becomes `now`.
   */
  withChanges(patch: AirlinePatch, now: Date): Airline {
    return new Airline({
      ...this.props,
      name: patch.name ?? this.props.name,
      country: patch.country ?? this.props.country,
      active: patch.active ?? this.props.active,
      updatedAt: now,
    });
  }

  activate(now: Date): Airline {
    return this.withChanges({ active: true }, now);
  }

  deactivate(now: Date): Airline {
    return this.withChanges({ active: false }, now);
  }

  /**
   * Converts to plain object for serialization.
   * @returns Copy of airline properties, dates included
   */
  toPlainObject(): AirlineProps {
    return {
      ...this.props,
      createdAt: cloneDate(this.props.createdAt),
      updatedAt: cloneDate(this.props.updatedAt),
    };
  }

  private static validate(props: AirlineProps): void {
    if (!props.id) {
      throw new AirlineValidationError('Airline id cannot be empty', 'id');
    }
    if (props.iataCode.length !== IATA_CODE_LENGTH) {
      throw new AirlineValidationError('IATA code must be exactly 2 characters', 'iataCode');
    }
    if (props.icaoCode.length < ICAO_CODE_MIN_LENGTH || props.icaoCode.length > ICAO_CODE_MAX_LENGTH) {
      throw new AirlineValidationError('ICAO code must be 3 or 4 characters', 'icaoCode');
    }
    if (!props.name.trim()) {
      throw new AirlineValidationError('Airline name cannot be empty', 'name');
    }
    if (!props.country.trim()) {
      throw new AirlineValidationError('Country cannot be empty', 'country');
    }
  }
}
