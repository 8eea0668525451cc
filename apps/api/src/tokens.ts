// Injection tokens. Explicit tokens keep DI independent of emitted decorator metadata.
export const RATE_QUERY_SERVICE = 'RATE_QUERY_SERVICE';
export const SYNC_ORCHESTRATOR = 'SYNC_ORCHESTRATOR';
export const API_INFO = 'API_INFO';

export interface ApiInfo {
  name: string;
  version: string;
}

export const DEFAULT_API_INFO: ApiInfo = {
  name: 'ratesync',
  version: '0.1.0',
};

export const SYNC_SCHEDULE = 'SYNC_SCHEDULE';

export interface SyncSchedule {
  /** cron expression, 5 or 6 fields, evaluated in UTC */
  cron: string;
}
