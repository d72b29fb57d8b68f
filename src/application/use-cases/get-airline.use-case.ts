import { Inject, Injectable } from '@nestjs/common';
import { Airline } from '@/domain/models';
import type { AirlineRepository } from '@/domain/repositories';
import { AIRLINE_REPOSITORY } from '@/domain/repositories';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';

/** Looks up one airline. Absence is a null result, not an error. */
@Injectable()
export class GetAirlineUseCase {
  constructor(
    @Inject(AIRLINE_REPOSITORY)
    private readonly airlineRepository: AirlineRepository,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {}

  async execute(id: string): Promise<Airline | null> {
    this.logger.debug('Fetching airline by id', { id });

    return this.airlineRepository.findById(id);
  }
}
