import { Module, type DynamicModule, type Provider } from '@nestjs/common';
import { ScheduleModule } from '@nestjs/schedule';
import type { RateQueryService, SyncOrchestrator } from '@ratesync/rates';

import { RatesController } from './rates/rates.controller.js';
import { SyncSchedulerService } from './sync/sync-scheduler.service.js';
import { SyncController } from './sync/sync.controller.js';
import {
  API_INFO,
  DEFAULT_API_INFO,
  RATE_QUERY_SERVICE,
  SYNC_ORCHESTRATOR,
  SYNC_SCHEDULE,
  type ApiInfo,
  type SyncSchedule,
} from './tokens.js';

export interface ApiContext {
  queries: RateQueryService;
  orchestrator: SyncOrchestrator;
  info?: ApiInfo | undefined;
  /** Periodic sync; none when absent */
  schedule?: SyncSchedule | undefined;
}

@Module({})
export class AppModule {
  /**
   * The rate runtime is built outside Nest so the CLI and the server share it;
   * its services are handed in as values.
   */
  static forRoot(context: ApiContext): DynamicModule {
    const providers: Provider[] = [
      { provide: RATE_QUERY_SERVICE, useValue: context.queries },
      { provide: SYNC_ORCHESTRATOR, useValue: context.orchestrator },
      { provide: API_INFO, useValue: context.info ?? DEFAULT_API_INFO },
      SyncSchedulerService,
    ];
    if (context.schedule) {
      providers.push({ provide: SYNC_SCHEDULE, useValue: context.schedule });
    }

    return {
      controllers: [SyncController, RatesController],
      imports: [ScheduleModule.forRoot()],
      module: AppModule,
      providers,
    };
  }
}
