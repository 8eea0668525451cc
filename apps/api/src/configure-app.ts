import type { INestApplication } from '@nestjs/common';

import { GlobalExceptionFilter } from './common/filters/global-exception.filter.js';
import { LoggingInterceptor } from './common/interceptors/logging.interceptor.js';

/**
 * Global filters, interceptors and CORS shared by main.ts and the tests.
 */
export function configureApp<T extends INestApplication>(app: T): T {
  app.useGlobalInterceptors(new LoggingInterceptor());
  app.useGlobalFilters(new GlobalExceptionFilter());
  app.enableCors();
  return app;
}
