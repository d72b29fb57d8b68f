import { Provider, Scope } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { LOGGER_SERVICE } from '@/domain/services';
import type { EnvironmentVariables } from '@/infrastructure/config';
import { LoggerService } from './custom-logger.service';
import { resolveLogLevels } from './log-levels';

/**
 * Providers for logger service dependency injection.
 * Maps the LOGGER_SERVICE token to the concrete implementation.
 *
 * Uses Scope.TRANSIENT to create a new instance per injection,
 * allowing different context per service.
 */
export const loggerProviders: Provider[] = [
  {
    provide: LOGGER_SERVICE,
    inject: [ConfigService],
    useFactory: (configService: ConfigService<EnvironmentVariables, true>) =>
      new LoggerService('', resolveLogLevels(configService.get('LOG_LEVEL', { infer: true }))),
    scope: Scope.TRANSIENT,
  },
];
