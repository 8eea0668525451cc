import { randomUUID } from 'node:crypto';

import { Injectable, type CallHandler, type ExecutionContext, type NestInterceptor } from '@nestjs/common';
import { getLogger } from '@ratesync/logger';
import type { Request, Response } from 'express';
import { throwError, type Observable } from 'rxjs';
import { catchError, tap } from 'rxjs/operators';

const CORRELATION_HEADERS = ['x-correlation-id', 'x-request-id', 'x-trace-id'] as const;

@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = getLogger('HTTP');

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }
    const request = context.switchToHttp().getRequest<Request>();
    const response = context.switchToHttp().getResponse<Response>();
    const startTime = Date.now();
    const correlationId = this.extractOrGenerateCorrelationId(request);
    response.setHeader('x-correlation-id', correlationId);

    this.logger.debug(
      {
        correlationId,
        ip: this.getClientIp(request),
        method: request.method,
        path: request.path,
        type: 'request_start',
        userAgent: request.get('user-agent'),
      },
      `${request.method} ${request.path}`
    );

    return next.handle().pipe(
      tap(() => {
        this.logger.info(
          {
            correlationId,
            duration: Date.now() - startTime,
            method: request.method,
            path: request.path,
            statusCode: response.statusCode,
            type: 'request_complete',
          },
          `${request.method} ${request.path} ${response.statusCode}`
        );
      }),
      catchError((error: unknown) => {
        this.logger.debug(
          {
            correlationId,
            duration: Date.now() - startTime,
            method: request.method,
            path: request.path,
            type: 'request_failed',
          },
          `${request.method} ${request.path} failed`
        );
        return throwError(() => error);
      })
    );
  }

  private extractOrGenerateCorrelationId(request: Request): string {
    for (const header of CORRELATION_HEADERS) {
      const value = request.get(header);
      if (value) return value;
    }
    return randomUUID();
  }

  private getClientIp(request: Request): string {
    const forwarded = request.get('x-forwarded-for');
    const first = forwarded?.split(',')[0]?.trim();
    return first || request.socket.remoteAddress || 'unknown';
  }
}
