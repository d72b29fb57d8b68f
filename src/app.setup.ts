import { LogLevel, ValidationPipe } from '@nestjs/common';
import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { LoggerService } from './infrastructure/logger';
import { HttpExceptionFilter } from './presentation/filters';
import { correlationIdHook } from './presentation/hooks';
import { LoggingInterceptor } from './presentation/interceptors';

/** Fastify adapter shared by the server and the HTTP tests. `/airlines` and `/airlines/` route alike. */
export function createFastifyAdapter(): FastifyAdapter {
  return new FastifyAdapter({ ignoreTrailingSlash: true });
}

/** Global pipes, filters and interceptors, applied the same way in main and in tests. */
export function configureApp(app: NestFastifyApplication, logLevels: LogLevel[]): void {
  app.getHttpAdapter().getInstance().addHook('onRequest', correlationIdHook);

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      forbidNonWhitelisted: true,
      transform: true,
    }),
  );

  app.useGlobalFilters(new HttpExceptionFilter(new LoggerService(HttpExceptionFilter.name, logLevels)));
  app.useGlobalInterceptors(new LoggingInterceptor(new LoggerService('HTTP', logLevels)));
}
