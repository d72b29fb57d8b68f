import { Inject, Injectable } from '@nestjs/common';
import { DuplicateAirlineCodeError } from '@/domain/errors';
import { Airline } from '@/domain/models';
import type { AirlineRepository } from '@/domain/repositories';
import { AIRLINE_REPOSITORY } from '@/domain/repositories';
import type { Clock, IdGenerator, ILogger } from '@/domain/services';
import { CLOCK, ID_GENERATOR, LOGGER_SERVICE } from '@/domain/services';
import { SerialExecutor } from '@/infrastructure/concurrency';

export interface CreateAirlineCommand {
  name: string;
  iataCode: string;
  icaoCode: string;
  country: string;
  active?: boolean;
}

/**
 * Registers a new airline after checking that neither of its codes is taken.
 * Creates are serialized so two requests for the same code cannot both pass the check.
 */
@Injectable()
export class CreateAirlineUseCase {
  private readonly serial = new SerialExecutor();

  constructor(
    @Inject(AIRLINE_REPOSITORY)
    private readonly airlineRepository: AirlineRepository,
    @Inject(ID_GENERATOR)
    private readonly idGenerator: IdGenerator,
    @Inject(CLOCK)
    private readonly clock: Clock,
    @Inject(LOGGER_SERVICE)
    private readonly logger: ILogger,
  ) {}

  /**
   * @returns The persisted airline
   * @throws {DuplicateAirlineCodeError} When the IATA or ICAO code is already in use
   * @throws {AirlineValidationError} When the airline shape is invalid
   */
  execute(command: CreateAirlineCommand): Promise<Airline> {
    return this.serial.execute(() => this.create(command));
  }

  private async create(command: CreateAirlineCommand): Promise<Airline> {
    const iataCode = command.iataCode.toUpperCase();
    const icaoCode = command.icaoCode.toUpperCase();

    this.logger.log('Creating airline', { iataCode, icaoCode });

    if (await this.airlineRepository.findByIataCode(iataCode)) {
      throw new DuplicateAirlineCodeError('IATA', iataCode);
    }

    if (await this.airlineRepository.findByIcaoCode(icaoCode)) {
      throw new DuplicateAirlineCodeError('ICAO', icaoCode);
    }

    const now = this.clock.now();
    const airline = new Airline({
      id: this.idGenerator.generate(),
      name: command.name,
      iataCode,
      icaoCode,
      country: command.country,
      active: command.active ?? true,
      createdAt: now,
      updatedAt: now,
    });

    await this.airlineRepository.save(airline);

    this.logger.log('Airline created successfully', { id: airline.id });

    return airline;
  }
}
