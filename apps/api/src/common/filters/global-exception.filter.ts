import { Catch, HttpException, HttpStatus, type ArgumentsHost, type ExceptionFilter } from '@nestjs/common';
import { getErrorMessage, isObject, isRateSyncError, type RateSyncErrorCode } from '@ratesync/core';
import { getLogger } from '@ratesync/logger';
import type { Request, Response } from 'express';

const STATUS_BY_CODE: Record<RateSyncErrorCode, HttpStatus> = {
  FETCH_ERROR: HttpStatus.BAD_GATEWAY,
  INVALID_REQUEST: HttpStatus.BAD_REQUEST,
  LOCK_CONTENTION: HttpStatus.CONFLICT,
  NORMALIZATION_ERROR: HttpStatus.UNPROCESSABLE_ENTITY,
  NOT_FOUND: HttpStatus.NOT_FOUND,
  PARSE_ERROR: HttpStatus.BAD_GATEWAY,
  STORE_ERROR: HttpStatus.INTERNAL_SERVER_ERROR,
  UNKNOWN_PROVIDER: HttpStatus.NOT_FOUND,
};

export interface ErrorBody {
  error: string;
  message: string;
  path: string;
  statusCode: number;
  timestamp: string;
}

interface DescribedException {
  error: string;
  message: string;
  statusCode: number;
}

export function describeException(exception: unknown): DescribedException {
  if (isRateSyncError(exception)) {
    return { error: exception.code, message: exception.message, statusCode: STATUS_BY_CODE[exception.code] };
  }

  if (exception instanceof HttpException) {
    const statusCode = exception.getStatus();
    const body = exception.getResponse();
    const message =
      typeof body === 'string' ? body : isObject(body) && typeof body['message'] === 'string' ? body['message'] : exception.message;
    return { error: HttpStatus[statusCode] ?? 'HTTP_ERROR', message, statusCode };
  }

  return {
    error: 'INTERNAL_ERROR',
    message: 'Internal Server Error',
    statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
  };
}

@Catch()
export class GlobalExceptionFilter implements ExceptionFilter {
  private readonly logger = getLogger('GlobalExceptionFilter');

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const described = describeException(exception);

    const context = { method: request.method, path: request.url, statusCode: described.statusCode };
    if (described.statusCode >= 500) {
      this.logger.error({ ...context, error: exception }, `Request failed: ${getErrorMessage(exception)}`);
    } else {
      this.logger.warn(context, described.message);
    }

    const body: ErrorBody = {
      ...described,
      path: request.url,
      timestamp: new Date().toISOString(),
    };
    response.status(described.statusCode).json(body);
  }
}
