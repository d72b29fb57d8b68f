import { Test, TestingModule } from '@nestjs/testing';
import { AirlineValidationError, DuplicateAirlineCodeError } from '@/domain/errors';
import type { AirlineRepository } from '@/domain/repositories';
import { AIRLINE_REPOSITORY } from '@/domain/repositories';
import type { ILogger } from '@/domain/services';
import { CLOCK, ID_GENERATOR, LOGGER_SERVICE } from '@/domain/services';
import { InMemoryAirlineRepository } from '@/infrastructure/repositories';
import { DeterministicIdGenerator, FixedClock } from '@/test/fixtures';
import { CreateAirlineCommand, CreateAirlineUseCase } from './create-airline.use-case';

describe('CreateAirlineUseCase', () => {
  let useCase: CreateAirlineUseCase;
  let repository: AirlineRepository;
  let clock: FixedClock;
  let mockLogger: jest.Mocked<ILogger>;

  const delta: CreateAirlineCommand = {
    name: 'Delta Air Lines',
    iataCode: 'DL',
    icaoCode: 'DAL',
    country: 'United States',
  };

  beforeEach(async () => {
    repository = new InMemoryAirlineRepository();
    clock = new FixedClock(new Date('2024-06-01T12:00:00.000Z'));
    mockLogger = {
      log: jest.fn(),
      warn: jest.fn(),
      error: jest.fn(),
      debug: jest.fn(),
    };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CreateAirlineUseCase,
        { provide: AIRLINE_REPOSITORY, useValue: repository },
        { provide: ID_GENERATOR, useValue: new DeterministicIdGenerator('airline') },
        { provide: CLOCK, useValue: clock },
        { provide: LOGGER_SERVICE, useValue: mockLogger },
      ],
    }).compile();

    useCase = module.get<CreateAirlineUseCase>(CreateAirlineUseCase);
  });

  it('should create an airline with a generated id and timestamps', async () => {
    const airline = await useCase.execute(delta);

    expect(airline.toPlainObject()).toEqual({
      id: 'airline-1',
      name: 'Delta Air Lines',
      iataCode: 'DL',
      icaoCode: 'DAL',
      country: 'United States',
      active: true,
      createdAt: new Date('2024-06-01T12:00:00.000Z'),
      updatedAt: new Date('2024-06-01T12:00:00.000Z'),
    });
  });

  it('should give createdAt and updatedAt independent dates', async () => {
    const airline = await useCase.execute(delta);

    airline.createdAt?.setFullYear(1999);

    expect(airline.createdAt).toEqual(new Date('2024-06-01T12:00:00.000Z'));
    expect(airline.updatedAt).toEqual(new Date('2024-06-01T12:00:00.000Z'));
  });

  it('should persist the airline so it can be read back', async () => {
    const airline = await useCase.execute(delta);

    const stored = await repository.findById(airline.id);

    expect(stored?.toPlainObject()).toEqual(airline.toPlainObject());
  });

  it('should respect an explicit inactive flag', async () => {
    const airline = await useCase.execute({ ...delta, active: false });

    expect(airline.active).toBe(false);
  });

  it('should upper-case codes', async () => {
    const airline = await useCase.execute({ ...delta, iataCode: 'dl', icaoCode: 'dal' });

    expect(airline.iataCode).toBe('DL');
    expect(airline.icaoCode).toBe('DAL');
  });

  it('should reject a duplicate IATA code with any ICAO code', async () => {
    await useCase.execute(delta);

    const attempt = useCase.execute({ ...delta, icaoCode: 'XYZ' });

    await expect(attempt).rejects.toThrow(DuplicateAirlineCodeError);
    await expect(useCase.execute({ ...delta, icaoCode: 'XYZ' })).rejects.toThrow(
      'Airline with IATA code DL already exists',
    );
  });

  it('should reject a duplicate ICAO code with a different IATA code', async () => {
    await useCase.execute(delta);

    await expect(useCase.execute({ ...delta, iataCode: 'XX' })).rejects.toMatchObject({
      codeType: 'ICAO',
      code: 'DAL',
      message: 'Airline with ICAO code DAL already exists',
    });
  });

  it('should detect duplicates regardless of input case', async () => {
    await useCase.execute(delta);

    await expect(useCase.execute({ ...delta, iataCode: 'dl', icaoCode: 'xyz' })).rejects.toThrow(
      'Airline with IATA code DL already exists',
    );
  });

  it('should not save or consume an id when the code is taken', async () => {
    await useCase.execute(delta);
    await expect(useCase.execute({ ...delta, icaoCode: 'XYZ' })).rejects.toThrow(DuplicateAirlineCodeError);

    const next = await useCase.execute({ ...delta, iataCode: 'LH', icaoCode: 'DLH' });

    expect(next.id).toBe('airline-2');
    expect(await repository.count()).toBe(2);
  });

  it('should let validation errors propagate and save nothing', async () => {
    await expect(useCase.execute({ ...delta, iataCode: 'DLX' })).rejects.toThrow(AirlineValidationError);
    await expect(useCase.execute({ ...delta, icaoCode: 'DA' })).rejects.toThrow(AirlineValidationError);

    expect(await repository.count()).toBe(0);
  });

  it('should allow only one of two concurrent creates with the same code', async () => {
    const results = await Promise.allSettled([
      useCase.execute(delta),
      useCase.execute({ ...delta, icaoCode: 'XYZ' }),
    ]);

    expect(results.map((r) => r.status)).toEqual(['fulfilled', 'rejected']);
    expect(await repository.count()).toBe(1);
  });

  it('should log the creation', async () => {
    await useCase.execute(delta);

    expect(mockLogger.log).toHaveBeenCalledWith('Creating airline', { iataCode: 'DL', icaoCode: 'DAL' });
    expect(mockLogger.log).toHaveBeenCalledWith('Airline created successfully', { id: 'airline-1' });
  });
});
