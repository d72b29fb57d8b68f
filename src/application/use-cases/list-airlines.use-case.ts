import { Inject, Injectable } from '@nestjs/common';
import { Airline } from '@/domain/models';
import type { AirlineRepository } from '@/domain/repositories';
import { AIRLINE_REPOSITORY } from '@/domain/repositories';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';

@Injectable()
export class ListAirlinesUseCase {
  constructor(
    @Inject(AIRLINE_REPOSITORY)
    private readonly airlineRepository: AirlineRepository,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {}

  /**
   * Lists the catalog.
   * @param activeOnly - When true, inactive airlines are left out
   */
  async execute(activeOnly = false): Promise<Airline[]> {
    this.logger.debug('Listing airlines', { activeOnly });

    return activeOnly ? this.airlineRepository.findActive() : this.airlineRepository.findAll();
  }
}
