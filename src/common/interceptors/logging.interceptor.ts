import { CallHandler, ExecutionContext, Injectable, Logger, NestInterceptor } from '@nestjs/common';
import { Request, Response } from 'express';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import type { AuthUser } from '../types';

interface LogContext {
  method: string;
  url: string;
  userId?: string;
  requestId?: string;
  startTime: number;
}

function describeCaller(context: LogContext): string {
  const parts = [context.userId ? `user=${context.userId}` : 'anonymous'];
  if (context.requestId) {
    parts.push(`request=${context.requestId}`);
  }
  return parts.join(' ');
}

/**
 * One log line per request and per outcome. Bodies and headers are never
 * logged; error details are left to HttpExceptionFilter.
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(LoggingInterceptor.name);

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const httpContext = context.switchToHttp();
    const request = httpContext.getRequest<Request & { user?: AuthUser }>();
    const response = httpContext.getResponse<Response>();

    const requestId = request.headers['x-request-id'];
    const logContext: LogContext = {
      method: request.method,
      url: request.url,
      userId: request.user?.id,
      requestId: typeof requestId === 'string' ? requestId : undefined,
      startTime: Date.now(),
    };

    this.logger.debug(`${logContext.method} ${logContext.url} ${describeCaller(logContext)}`);

    return next.handle().pipe(
      tap({
        next: () => {
          const duration = Date.now() - logContext.startTime;
          this.logger.log(
            `${logContext.method} ${logContext.url} ${response.statusCode} ${duration}ms ${describeCaller(logContext)}`,
          );
        },
        error: (error: unknown) => {
          const duration = Date.now() - logContext.startTime;
          const name = error instanceof Error ? error.name : typeof error;
          this.logger.warn(
            `${logContext.method} ${logContext.url} failed (${name}) ${duration}ms ${describeCaller(logContext)}`,
          );
        },
      }),
    );
  }
}
