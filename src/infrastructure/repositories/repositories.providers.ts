import { Provider } from '@nestjs/common';
import { AIRLINE_REPOSITORY } from '@/domain/repositories';
import { InMemoryAirlineRepository } from './in-memory-airline.repository';

export const repositoriesProviders: Provider[] = [
  {
    provide: AIRLINE_REPOSITORY,
    useClass: InMemoryAirlineRepository,
  },
];
