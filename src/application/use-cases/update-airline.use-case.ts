import { Inject, Injectable } from '@nestjs/common';
import { Airline, AirlinePatch } from '@/domain/models';
import type { AirlineRepository } from '@/domain/repositories';
import { AIRLINE_REPOSITORY } from '@/domain/repositories';
import type { Clock, ILogger } from '@/domain/services';
import { CLOCK, LOGGER_SERVICE } from '@/domain/services';

export type UpdateAirlineCommand = AirlinePatch;

/**
 * Applies a partial update to an airline.
 * Codes, id and createdAt are carried over unchanged.
 */
@Injectable()
export class UpdateAirlineUseCase {
  constructor(
    @Inject(AIRLINE_REPOSITORY)
    private readonly airlineRepository: AirlineRepository,
    @Inject(CLOCK)
    private readonly clock: Clock,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {}

  /**
   * @returns The updated airline, or null when the id is unknown
   * @throws {AirlineValidationError} When the patch produces an invalid airline
   */
  async execute(id: string, command: UpdateAirlineCommand): Promise<Airline | null> {
    this.logger.log('Updating airline', { id });

    const existing = await this.airlineRepository.findById(id);
    if (!existing) {
      return null;
    }

    const updated = existing.withChanges(command, this.clock.now());
    await this.airlineRepository.save(updated);

    this.logger.log('Airline updated successfully', { id });

    return updated;
  }
}
