import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { HealthService } from './application/services';
import {
  CreateAirlineUseCase,
  DeleteAirlineUseCase,
  GetAirlineUseCase,
  ListAirlinesUseCase,
  UpdateAirlineUseCase,
} from './application/use-cases';
import { EnvironmentVariables, validate } from './infrastructure/config';
import { loggerProviders } from './infrastructure/logger';
import { repositoriesProviders } from './infrastructure/repositories';
import { systemProviders } from './infrastructure/system';
import { AirlineController, HealthController } from './presentation/controllers';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate,
    }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvironmentVariables, true>) => [
        {
          ttl: configService.get('RATE_LIMIT_TTL', { infer: true }) * 1000,
          limit: configService.get('RATE_LIMIT_MAX', { infer: true }),
        },
      ],
    }),
  ],
  controllers: [AirlineController, HealthController],
  providers: [
    ...repositoriesProviders,
    ...systemProviders,
    ...loggerProviders,
    { provide: APP_GUARD, useClass: ThrottlerGuard },
    CreateAirlineUseCase,
    GetAirlineUseCase,
    ListAirlinesUseCase,
    UpdateAirlineUseCase,
    DeleteAirlineUseCase,
    HealthService,
  ],
})
export class AppModule {}
