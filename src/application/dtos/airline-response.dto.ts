import { ApiProperty } from '@nestjs/swagger';
import { Airline } from '@/domain/models';

export class AirlineResponseDto {
  @ApiProperty({ description: 'Airline ID', example: '3f2b8c1e-6a4d-4c1e-9a52-1b7d0f6e2a90' })
  id!: string;

  @ApiProperty({ description: 'Airline name', example: 'Delta Air Lines' })
  name!: string;

  @ApiProperty({ description: 'IATA code', example: 'DL' })
  iata_code!: string;

  @ApiProperty({ description: 'ICAO code', example: 'DAL' })
  icao_code!: string;

  @ApiProperty({ description: 'Country of origin', example: 'United States' })
  country!: string;

  @ApiProperty({ description: 'Whether the airline is active', example: true })
  active!: boolean;

  @ApiProperty({
    description: 'Creation date',
    example: '2024-01-15T10:30:00.000Z',
    nullable: true,
    type: String,
  })
  created_at!: string | null;

  @ApiProperty({
    description: 'Update date',
    example: '2024-01-15T10:30:00.000Z',
    nullable: true,
    type: String,
  })
  updated_at!: string | null;

  static fromModel(airline: Airline): AirlineResponseDto {
    const dto = new AirlineResponseDto();
    dto.id = airline.id;
    dto.name = airline.name;
    dto.iata_code = airline.iataCode;
    dto.icao_code = airline.icaoCode;
    dto.country = airline.country;
    dto.active = airline.active;
    dto.created_at = airline.createdAt ? airline.createdAt.toISOString() : null;
    dto.updated_at = airline.updatedAt ? airline.updatedAt.toISOString() : null;
    return dto;
  }
}
