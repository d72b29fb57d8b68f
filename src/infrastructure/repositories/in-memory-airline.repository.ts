import { Injectable } from '@nestjs/common';
import { Airline, AirlineProps } from '@/domain/models';
import type { AirlineRepository } from '@/domain/repositories';

/**
 * In-memory implementation of AirlineRepository.
 *
 * Records are kept as detached snapshots: `save` copies the incoming model and
 * every read rebuilds a fresh Airline, so callers never hold a reference into
 * the map. Each method body runs synchronously before its promise settles, so
 * no scan can observe a half-applied write.
 */
@Injectable()
export class InMemoryAirlineRepository implements AirlineRepository {
  private readonly records = new Map<string, AirlineProps>();

  async findById(id: string): Promise<Airline | null> {
    const record = this.records.get(id);
    return record ? InMemoryAirlineRepository.toDomain(record) : null;
  }

  async findByIataCode(iataCode: string): Promise<Airline | null> {
    const code = iataCode.toUpperCase();
    return this.findFirst((record) => record.iataCode === code);
  }

  async findByIcaoCode(icaoCode: string): Promise<Airline | null> {
    const code = icaoCode.toUpperCase();
    return this.findFirst((record) => record.icaoCode === code);
  }

  async findAll(): Promise<Airline[]> {
    return [...this.records.values()].map(InMemoryAirlineRepository.toDomain);
  }

  async findActive(): Promise<Airline[]> {
    return [...this.records.values()].filter((record) => record.active).map(InMemoryAirlineRepository.toDomain);
  }

  async save(airline: Airline): Promise<void> {
    this.records.set(airline.id, InMemoryAirlineRepository.toRecord(airline));
  }

  async delete(id: string): Promise<boolean> {
    return this.records.delete(id);
  }

  async clear(): Promise<void> {
    this.records.clear();
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  private findFirst(predicate: (record: AirlineProps) => boolean): Airline | null {
    for (const record of this.records.values()) {
      if (predicate(record)) {
        return InMemoryAirlineRepository.toDomain(record);
      }
    }
    return null;
  }

  // toPlainObject and the Airline constructor both clone dates.
  private static toRecord(airline: Airline): AirlineProps {
    return airline.toPlainObject();
  }

  private static toDomain(record: AirlineProps): Airline {
    return new Airline(record);
  }
}
