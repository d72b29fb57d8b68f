import { ApiProperty } from '@nestjs/swagger';

export type HealthStatus = 'healthy' | 'unhealthy';

export class HealthResponseDto {
  @ApiProperty({
    description: 'Overall application status',
    enum: ['healthy', 'unhealthy'],
    example: 'healthy',
  })
  status!: HealthStatus;
}
