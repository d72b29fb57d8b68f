import { ApiPropertyOptional } from '@nestjs/swagger';
import { IsBoolean, IsNotEmpty, IsOptional, IsString } from 'class-validator';

/** Partial update. Codes cannot be changed once an airline exists. */
export class UpdateAirlineDto {
  @ApiPropertyOptional({
    description: 'Airline name',
    example: 'Delta Air Lines',
  })
  @IsOptional()
  @IsNotEmpty({ message: 'name cannot be empty' })
  @IsString({ message: 'name must be a string' })
  name?: string;

  @ApiPropertyOptional({
    description: 'Country of origin',
    example: 'United States',
  })
  @IsOptional()
  @IsNotEmpty({ message: 'country cannot be empty' })
  @IsString({ message: 'country must be a string' })
  country?: string;

  @ApiPropertyOptional({
    description: 'Whether the airline is active',
    example: false,
  })
  @IsOptional()
  @IsBoolean({ message: 'active must be a boolean' })
  active?: boolean;
}
