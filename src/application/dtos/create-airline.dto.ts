import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsNotEmpty, IsOptional, IsString, Length } from 'class-validator';

export class CreateAirlineDto {
  @ApiProperty({
    description: 'Airline name',
    example: 'Delta Air Lines',
  })
  @IsNotEmpty({ message: 'name is required' })
  @IsString({ message: 'name must be a string' })
  name!: string;

  @ApiProperty({
    description: 'IATA airline code (stored upper-case)',
    example: 'DL',
    minLength: 2,
    maxLength: 2,
  })
  @IsString({ message: 'iata_code must be a string' })
  @Length(2, 2, { message: 'iata_code must be exactly 2 characters' })
  iata_code!: string;

  @ApiProperty({
    description: 'ICAO airline code (stored upper-case)',
    example: 'DAL',
    minLength: 3,
    maxLength: 4,
  })
  @IsString({ message: 'icao_code must be a string' })
  @Length(3, 4, { message: 'icao_code must have 3 or 4 characters' })
  icao_code!: string;

  @ApiProperty({
    description: 'Country of origin',
    example: 'United States',
  })
  @IsNotEmpty({ message: 'country is required' })
  @IsString({ message: 'country must be a string' })
  country!: string;

  @ApiPropertyOptional({
    description: 'Whether the airline is active',
    example: true,
    default: true,
  })
  @IsOptional()
  @IsBoolean({ message: 'active must be a boolean' })
  active?: boolean;
}
