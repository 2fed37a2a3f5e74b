import { Injectable, NestInterceptor, ExecutionContext, CallHandler, Logger } from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap, catchError } from 'rxjs/operators';
import { Request, Response } from 'express';

function errorStatus(error: unknown): number {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return 500;
}

/**
 * Logs every HTTP request on arrival and again on completion with its status
 * and duration. Errors are logged and rethrown for Nest's exception layer.
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const response = context.switchToHttp().getResponse<Response>();
    const { method, originalUrl, headers, body } = request;
    const startTime = Date.now();

    this.logger.log(`[${method}] ${originalUrl}`, {
      hasAuth: Boolean(headers.authorization),
      contentType: headers['content-type'] || 'none',
      bodySize: JSON.stringify(body || {}).length,
    });

    return next.handle().pipe(
      tap(() => {
        const duration = Date.now() - startTime;
        this.logger.log(`[${method}] ${originalUrl} ${response.statusCode} (${duration}ms)`);
      }),
      catchError((error: unknown) => {
        const duration = Date.now() - startTime;
        const status = errorStatus(error);
        const message = error instanceof Error ? error.message : 'Unknown error';
        if (status >= 500) {
          this.logger.error(
            `[${method}] ${originalUrl} ${status} (${duration}ms): ${message}`,
            process.env.NODE_ENV === 'development' && error instanceof Error ? error.stack : undefined,
          );
        } else {
          this.logger.warn(`[${method}] ${originalUrl} ${status} (${duration}ms): ${message}`);
        }
        throw error;
      }),
    );
  }
}
