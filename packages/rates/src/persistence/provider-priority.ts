import type { SourceMetadata } from '@ratesync/rate-providers';

/**
 * Decides which provider's row wins when several providers stored the same
 * target for one date.
 */
export interface ProviderPriority {
  /** Registry order */
  readonly order: readonly string[];
  /** Currency code to the first provider (in registry order) that declares it */
  readonly owners: ReadonlyMap<string, string>;
}

export function buildProviderPriority(
  sources: readonly Pick<SourceMetadata, 'currencies' | 'id'>[]
): ProviderPriority {
  const owners = new Map<string, string>();
  for (const source of sources) {
    for (const currency of source.currencies) {
      if (!owners.has(currency.code)) {
        owners.set(currency.code, source.id);
      }
    }
  }
  return { order: sources.map((source) => source.id), owners };
}

function rank(priority: ProviderPriority, target: string, provider: string): number {
  if (priority.owners.get(target) === provider) return -1;
  const index = priority.order.indexOf(provider);
  return index === -1 ? priority.order.length : index;
}

/**
 * Sort rows so that, per target, the winning provider comes first.
 */
export function sortByPriority<T extends { provider: string; target: string }>(
  rows: readonly T[],
  priority: ProviderPriority
): T[] {
  return [...rows].sort((a, b) => {
    const diff = rank(priority, a.target, a.provider) - rank(priority, b.target, b.provider);
    if (diff !== 0) return diff;
    if (a.provider === b.provider) return 0;
    return a.provider < b.provider ? -1 : 1;
  });
}

/**
 * Order provider ids the way the registry lists them; unknown ids go last.
 */
export function sortProviderIds(ids: Iterable<string>, priority: ProviderPriority): string[] {
  const position = (id: string) => {
    const index = priority.order.indexOf(id);
    return index === -1 ? priority.order.length : index;
  };
  return [...new Set(ids)].sort((a, b) => position(a) - position(b) || (a < b ? -1 : a > b ? 1 : 0));
}
