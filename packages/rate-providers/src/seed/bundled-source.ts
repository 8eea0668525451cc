/**
 * Rate source backed by a local historical file
 *
 * Carries the metadata of the live provider it stands in for, so bootstrap
 * rows are stored under the real provider id.
 */

import * as fs from 'node:fs';

import { type CalendarDate, type Currency, FetchError, ParseError, UnknownProviderError, getErrorMessage } from '@ratesync/core';
import { err, ok, type Result } from 'neverthrow';

import { BaseRateSource } from '../core/base-source.js';
import { loadCurrencyCatalog } from '../core/currency-catalog.js';
import type { DailySnapshot, SourceError, SourceMetadata } from '../core/types.js';
import { createEcbMetadata } from '../providers/ecb/provider.js';
import { createNbuMetadata } from '../providers/nbu/provider.js';

import { parseEcbHistoryXml } from './ecb-seed-reader.js';
import { parseNbuHistoryJson } from './nbu-seed-reader.js';

export type HistoryFileParser = (content: string, base: Currency, provider: string) => Result<DailySnapshot[], ParseError>;

export class BundledRateSource extends BaseRateSource {
  readonly metadata: SourceMetadata;
  private snapshots: Promise<Result<DailySnapshot[], SourceError>> | undefined;

  constructor(
    metadata: SourceMetadata,
    readonly filePath: string,
    private readonly parse: HistoryFileParser,
    clock?: () => Date
  ) {
    super('BundledRateSource', clock);
    this.metadata = metadata;
  }

  isAvailable(): boolean {
    return fs.existsSync(this.filePath);
  }

  protected async fetchRangeInternal(
    start: CalendarDate,
    end: CalendarDate
  ): Promise<Result<DailySnapshot[], SourceError>> {
    const all = await this.load();
    return all.map((snapshots) => snapshots.filter((snapshot) => snapshot.date >= start && snapshot.date <= end));
  }

  protected async fetchLatestInternal(): Promise<Result<DailySnapshot, SourceError>> {
    const all = await this.load();
    if (all.isErr()) {
      return err(all.error);
    }
    const latest = all.value.at(-1);
    if (!latest) {
      return err(new ParseError(`History file ${this.filePath} holds no rates`, this.metadata.id));
    }
    return ok(latest);
  }

  /**
   * Read and parse the file once; later calls reuse the result
   */
  private load(): Promise<Result<DailySnapshot[], SourceError>> {
    if (!this.snapshots) {
      this.snapshots = this.readFile();
    }
    return this.snapshots;
  }

  private async readFile(): Promise<Result<DailySnapshot[], SourceError>> {
    let content: string;
    try {
      content = await fs.promises.readFile(this.filePath, 'utf8');
    } catch (error) {
      return err(
        new FetchError(`Cannot read history file ${this.filePath}: ${getErrorMessage(error)}`, this.metadata.id, error)
      );
    }

    this.logger.info({ file: this.filePath, provider: this.metadata.id }, 'Parsing bundled history file');
    return this.parse(content, this.metadata.nativeBase, this.metadata.id);
  }
}

const BUNDLE_FORMATS = {
  ecb: { metadata: createEcbMetadata, parse: parseEcbHistoryXml },
  nbu: { metadata: createNbuMetadata, parse: parseNbuHistoryJson },
} as const;

/**
 * Bundled source for a provider id ('ecb' or 'nbu') reading `filePath`
 */
export function createBundledSource(
  providerId: string,
  filePath: string,
  clock?: () => Date
): Result<BundledRateSource, Error> {
  if (providerId !== 'ecb' && providerId !== 'nbu') {
    return err(new UnknownProviderError(providerId));
  }
  const format = BUNDLE_FORMATS[providerId];

  return loadCurrencyCatalog()
    .andThen(format.metadata)
    .map((metadata) => new BundledRateSource(metadata, filePath, format.parse, clock));
}
