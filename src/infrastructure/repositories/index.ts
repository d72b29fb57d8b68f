export { InMemoryAirlineRepository } from './in-memory-airline.repository';
export { repositoriesProviders } from './repositories.providers';
