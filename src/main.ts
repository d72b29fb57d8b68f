import 'reflect-metadata';
import { ConfigService } from '@nestjs/config';
import { NestFactory } from '@nestjs/core';
import { NestFastifyApplication } from '@nestjs/platform-fastify';
import { AppModule } from './app.module';
import { configureApp, createFastifyAdapter } from './app.setup';
import { EnvironmentVariables, setupSwagger } from './infrastructure/config';
import { LoggerService, resolveLogLevels } from './infrastructure/logger';

const logger = new LoggerService('Main');

async function bootstrap() {
  const app = await NestFactory.create<NestFastifyApplication>(AppModule, createFastifyAdapter(), { logger });

  const configService = app.get<ConfigService<EnvironmentVariables, true>>(ConfigService);
  const logLevels = resolveLogLevels(configService.get('LOG_LEVEL', { infer: true }));
  logger.setLogLevels(logLevels);

  configureApp(app, logLevels);
  setupSwagger(app);

  const port = configService.get('PORT', { infer: true });
  const host = configService.get('HOST', { infer: true });
  await app.listen(port, host);

  logger.log('Application started', { port, docs: '/api/docs' });
}

bootstrap().catch((error: unknown) => {
  logger.error('Application failed to start', {
    error: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 1;
});
