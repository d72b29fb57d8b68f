export { AirlineResponseDto } from './airline-response.dto';
export { CreateAirlineDto } from './create-airline.dto';
export { HealthResponseDto } from './health-response.dto';
export type { HealthStatus } from './health-response.dto';
export { ListAirlinesQueryDto } from './list-airlines-query.dto';
export { UpdateAirlineDto } from './update-airline.dto';
