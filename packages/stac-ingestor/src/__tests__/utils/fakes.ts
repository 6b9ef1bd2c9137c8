/**
 * In-process stand-ins for the catalog store and asset storage
 */

import type {
  AssetProbe,
  CatalogStore,
  ProbeOptions,
  ProbeResult,
  StacItem,
  StoreWriteResult,
} from '../../core/types.js';

type ScriptedProbe = ProbeResult | Error | 'hang';

/**
 * Probe answering from a per-href script; unknown hrefs are reachable
 *
 * 'hang' never answers until the caller aborts.
 */
export class FakeAssetProbe implements AssetProbe {
  readonly calls: string[] = [];
  readonly options: ProbeOptions[] = [];

  constructor(
    private readonly script: Readonly<Record<string, ScriptedProbe>> = {},
    private readonly delays: Readonly<Record<string, number>> = {}
  ) {}

  async probe(href: string, options: ProbeOptions): Promise<ProbeResult> {
    this.calls.push(href);
    this.options.push(options);

    const delayMs = this.delays[href];
    if (delayMs !== undefined) {
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }

    const scripted = this.script[href];
    if (scripted === 'hang') {
      return new Promise<ProbeResult>((resolve) => {
        options.signal.addEventListener('abort', () => resolve({ status: 'timed_out' }), { once: true });
      });
    }
    if (scripted instanceof Error) {
      throw scripted;
    }
    return scripted ?? { status: 'reachable' };
  }
}

/**
 * Catalog store held in maps
 */
export class InMemoryCatalogStore implements CatalogStore {
  readonly collections = new Set<string>();
  readonly items = new Map<string, StacItem>();
  lookups = 0;
  bulkWriteCalls = 0;
  /** Thrown by every collection lookup while set */
  lookupError: Error | null = null;
  /** Thrown by every bulk write while set */
  writeError: Error | null = null;
  private readonly scriptedWriteErrors: Error[] = [];

  constructor(collections: readonly string[] = []) {
    for (const id of collections) {
      this.collections.add(id);
    }
  }

  /** Fail the next bulk writes, one error each */
  failNextWrites(...errors: Error[]): void {
    this.scriptedWriteErrors.push(...errors);
  }

  seedItem(item: StacItem): void {
    this.items.set(`${item.collection}/${item.id}`, item);
  }

  async collectionExists(collectionId: string): Promise<boolean> {
    this.lookups++;
    if (this.lookupError) {
      throw this.lookupError;
    }
    return this.collections.has(collectionId);
  }

  async bulkWrite(items: readonly StacItem[]): Promise<readonly StoreWriteResult[]> {
    this.bulkWriteCalls++;

    const scripted = this.scriptedWriteErrors.shift();
    if (scripted) {
      throw scripted;
    }
    if (this.writeError) {
      throw this.writeError;
    }

    return items.map((item): StoreWriteResult => {
      if (!this.collections.has(item.collection)) {
        return { ok: false, code: 'collection_missing', message: `Collection ${item.collection} does not exist` };
      }
      const key = `${item.collection}/${item.id}`;
      if (this.items.has(key)) {
        return {
          ok: false,
          code: 'duplicate_id',
          message: `Item ${item.id} already exists in collection ${item.collection}`,
        };
      }
      this.items.set(key, item);
      return { ok: true };
    });
  }
}

/**
 * Promise with its resolve/reject exposed
 */
export interface Gate<T> {
  readonly promise: Promise<T>;
  resolve(value: T): void;
  reject(error: Error): void;
}

export function gate<T>(): Gate<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
