export { CreateAirlineUseCase } from './create-airline.use-case';
export type { CreateAirlineCommand } from './create-airline.use-case';
export { DeleteAirlineUseCase } from './delete-airline.use-case';
export { GetAirlineUseCase } from './get-airline.use-case';
export { ListAirlinesUseCase } from './list-airlines.use-case';
export { UpdateAirlineUseCase } from './update-airline.use-case';
export type { UpdateAirlineCommand } from './update-airline.use-case';
