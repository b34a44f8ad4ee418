import pLimit from 'p-limit';
import { HttpRateCenterLookup } from '../services/rate-center-client.js';
import { logger } from '../utils/logger.js';
import type { Config } from '../utils/config.js';
import type {
  LineClassCodes,
  RateCenterInfo,
  RateCenterLookup,
  RateCenterTableEntry,
} from '../types/order-form.js';

const BLANK_CODES: LineClassCodes = { lcc1: '', lcc2: '', lcc3: '' };

export interface PhonePrefix {
  npa: string;
  nxx: string;
}

/**
 * NPA and NXX of a North American number; null with fewer than six digits
 */
export function splitPrefix(phone: string): PhonePrefix | null {
  let digits = phone.replace(/\D/g, '');
  if (digits.length === 11 && digits.startsWith('1')) {
    digits = digits.slice(1);
  }
  if (digits.length < 6) return null;
  return { npa: digits.slice(0, 3), nxx: digits.slice(3, 6) };
}

export function normalizeRateCenter(name: string): string {
  return name.replace(/\s+/g, ' ').trim().toUpperCase();
}

/**
 * Read-through cache in front of a lookup. Entries, misses included, live as
 * long as the instance; concurrent callers share one in-flight request.
 */
export class CachedRateCenterLookup implements RateCenterLookup {
  private readonly cache = new Map<string, Promise<RateCenterInfo | null>>();

  constructor(private readonly inner: RateCenterLookup) {}

  lookup(npa: string, nxx: string): Promise<RateCenterInfo | null> {
    const key = `${npa}${nxx}`;
    const cached = this.cache.get(key);
    if (cached) return cached;

    const pending = this.inner.lookup(npa, nxx).catch((error: unknown) => {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn('Rate center lookup raised; caching as miss', { npa, nxx, error: message });
      return null;
    });
    this.cache.set(key, pending);
    return pending;
  }

  get size(): number {
    return this.cache.size;
  }
}

let defaultLookup: CachedRateCenterLookup | null = null;

/**
 * Process-wide cached HTTP lookup
 */
export function getDefaultRateCenterLookup(rateCenters: Config['rateCenters']): CachedRateCenterLookup {
  if (!defaultLookup) {
    defaultLookup = new CachedRateCenterLookup(
      new HttpRateCenterLookup({ serviceUrl: rateCenters.serviceUrl, timeout: rateCenters.timeoutMs })
    );
  }
  return defaultLookup;
}

export class RateCenterEnricher {
  private readonly lookup: RateCenterLookup;

  constructor(
    lookup: RateCenterLookup,
    private readonly table: RateCenterTableEntry[]
  ) {
    this.lookup = lookup instanceof CachedRateCenterLookup ? lookup : new CachedRateCenterLookup(lookup);
  }

  async enrich(phone: string): Promise<LineClassCodes> {
    const prefix = splitPrefix(phone);
    if (!prefix) return { ...BLANK_CODES };

    const info = await this.lookup.lookup(prefix.npa, prefix.nxx);

    return {
      lcc1: info ? this.matchEngineeringCode(info.rateCenter) : '',
      lcc2: info?.lata ?? '',
      lcc3: prefix.npa,
    };
  }

  /**
   * Enrich distinct phones with bounded concurrency
   */
  async enrichAll(phones: string[], concurrency: number): Promise<Map<string, LineClassCodes>> {
    const limit = pLimit(concurrency);
    const distinct = [...new Set(phones)];

    const entries = await Promise.all(
      distinct.map((phone) => limit(async (): Promise<[string, LineClassCodes]> => [phone, await this.enrich(phone)]))
    );

    logger.debug('Rate center enrichment complete', { phones: distinct.length });
    return new Map(entries);
  }

  private matchEngineeringCode(rateCenter: string): string {
    const wanted = normalizeRateCenter(rateCenter);
    const entry = this.table.find((row) => normalizeRateCenter(row.rateCenter) === wanted);
    return entry?.code ?? '';
  }
}
