import { Inject, Injectable } from '@nestjs/common';
import type { AirlineRepository } from '@/domain/repositories';
import { AIRLINE_REPOSITORY } from '@/domain/repositories';
import type { ILogger } from '@/domain/services';
import { LOGGER_SERVICE } from '@/domain/services';

@Injectable()
export class DeleteAirlineUseCase {
  constructor(
    @Inject(AIRLINE_REPOSITORY)
    private readonly airlineRepository: AirlineRepository,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {}

  /** Removes an airline. Resolves false when there was nothing to remove. */
  async execute(id: string): Promise<boolean> {
    this.logger.log('Deleting airline', { id });

    const deleted = await this.airlineRepository.delete(id);

    if (deleted) {
      this.logger.log('Airline deleted successfully', { id });
    }

    return deleted;
  }
}
