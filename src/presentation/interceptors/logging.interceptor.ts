import { CallHandler, ExecutionContext, Injectable, NestInterceptor } from '@nestjs/common';
import type { FastifyReply, FastifyRequest } from 'fastify';
import { Observable, tap } from 'rxjs';
import type { ILogger } from '@/domain/services';
import { CORRELATION_ID_HEADER, resolveCorrelationId } from '@/presentation/hooks';

function hasKeys(value: unknown): boolean {
  return typeof value === 'object' && value !== null && Object.keys(value).length > 0;
}

/**
 * Logs each request and response, tagging both with a correlation id.
 * correlationIdHook normally sets the id first; without it one is generated here.
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  constructor(private readonly logger: ILogger) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const ctx = context.switchToHttp();
    const request = ctx.getRequest<FastifyRequest>();
    const response = ctx.getResponse<FastifyReply>();

    const { method, url, body, query, params } = request;
    const correlationId = resolveCorrelationId(request.headers[CORRELATION_ID_HEADER]);
    const startTime = Date.now();

    response.header(CORRELATION_ID_HEADER, correlationId);

    this.logger.log('Request', {
      correlationId,
      method,
      url,
      params: hasKeys(params) ? params : undefined,
      query: hasKeys(query) ? query : undefined,
      body: hasKeys(body) ? body : undefined,
    });

    return next.handle().pipe(
      tap({
        next: () => {
          this.logger.log('Response', {
            correlationId,
            method,
            url,
            statusCode: response.statusCode,
            duration: `${Date.now() - startTime}ms`,
          });
        },
        error: () => {
          // Errors are logged by HttpExceptionFilter
        },
      }),
    );
  }
}
