import { Airline } from '@/domain/models';

export const AIRLINE_REPOSITORY = Symbol('AIRLINE_REPOSITORY');

/**
 * Keyed store of airlines.
 * Lookups never throw on a miss: they resolve to null, an empty list or false.
 */
export interface AirlineRepository {
  findById(id: string): Promise<Airline | null>;
  /** Case-insensitive; returns the first match. */
  findByIataCode(iataCode: string): Promise<Airline | null>;
  /** Case-insensitive; returns the first match. */
  findByIcaoCode(icaoCode: string): Promise<Airline | null>;
  findAll(): Promise<Airline[]>;
  findActive(): Promise<Airline[]>;
  /** Upsert keyed by id. */
  save(airline: Airline): Promise<void>;
  /** Resolves true when a record was removed. */
  delete(id: string): Promise<boolean>;
  /** Empties the store. Test and reset use only. */
  clear(): Promise<void>;
  count(): Promise<number>;
}
