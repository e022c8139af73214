/**
 * CBR daily rate provider.
 * Uses cbr-xml-daily.ru, a free JSON mirror of the Central Bank of Russia feed, no API key.
 *
 * Rates are cached for a few minutes. Any fetch problem (timeout, HTTP error,
 * malformed payload) is logged and answered with a static fallback table, which
 * is never cached, so the next call retries the source.
 */

import {
  BASE_CURRENCY,
  isCurrencyCode,
  type CurrencyCode,
  type RateEntry,
  type RateProvider,
  type RateSource,
  type RateTable,
} from './types.js';

export const DEFAULT_CBR_URL = 'https://www.cbr-xml-daily.ru/daily_json.js';
export const DEFAULT_CACHE_TTL_MS = 300_000;
export const DEFAULT_FETCH_TIMEOUT_MS = 10_000;

const CACHE_KEY = 'cbr_rates';

export interface CbrRateProviderOptions {
  url?: string;
  cacheTtlMs?: number;
  timeoutMs?: number;
}

interface CacheSlot {
  fetchedAt: number;
  table: RateTable;
}

/** Plausible snapshot used when the feed is unreachable: [value, previous] */
const FALLBACK_RATES: ReadonlyArray<[CurrencyCode, number, number]> = [
  ['USD', 91.5, 90.8],
  ['EUR', 99.2, 98.5],
  ['CNY', 12.8, 12.7],
  ['GBP', 115.3, 114.9],
  ['JPY', 0.61, 0.6],
  ['CHF', 105.2, 104.8],
  ['TRY', 2.8, 2.7],
  ['KZT', 0.19, 0.19],
];

function todayString(): string {
  return new Date().toISOString().slice(0, 10);
}

export function buildRateEntry(code: CurrencyCode, value: number, previous: number): RateEntry {
  const change = value - previous;
  // Previous = 0 reports no change instead of Infinity
  const changePercent = previous > 0 ? (change / previous) * 100 : 0;
  return { code, value, previous, change, changePercent };
}

/** Assemble an immutable table; the RUB entry is always present */
export function createRateTable(date: string, source: RateSource, entries: RateEntry[]): RateTable {
  const rates: Partial<Record<CurrencyCode, RateEntry>> = {};
  for (const entry of entries) {
    rates[entry.code] = Object.freeze(entry);
  }
  rates[BASE_CURRENCY] = Object.freeze(buildRateEntry(BASE_CURRENCY, 1, 1));
  return Object.freeze({ date, source, rates: Object.freeze(rates) });
}

export function buildFallbackTable(): RateTable {
  return createRateTable(
    todayString(),
    'fallback',
    FALLBACK_RATES.map(([code, value, previous]) => buildRateEntry(code, value, previous)),
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Turn a daily_json.js payload into a rate table.
 * The feed quotes some currencies per 10 or 100 units (JPY, KZT); Value and Previous
 * are divided by Nominal so every entry is RUB per one unit. Codes we do not support are dropped.
 */
export function parseCbrPayload(data: unknown): RateTable {
  if (!isRecord(data) || typeof data.Date !== 'string' || !isRecord(data.Valute)) {
    throw new Error('Malformed CBR payload: expected { Date, Valute }');
  }

  const entries: RateEntry[] = [];
  for (const [code, info] of Object.entries(data.Valute)) {
    if (!isCurrencyCode(code) || code === BASE_CURRENCY || !isRecord(info)) continue;
    const { Value: value, Previous: previous, Nominal: nominal = 1 } = info;
    if (!isFiniteNumber(value) || !isFiniteNumber(previous) || value <= 0) {
      console.warn(`[Currency] Skipping ${code}: unusable rate ${String(value)}/${String(previous)}`);
      continue;
    }
    if (!isFiniteNumber(nominal) || nominal <= 0) {
      console.warn(`[Currency] Skipping ${code}: unusable nominal ${String(nominal)}`);
      continue;
    }
    entries.push(buildRateEntry(code, value / nominal, previous / nominal));
  }

  return createRateTable(data.Date.slice(0, 10), 'cbr', entries);
}

export class CbrRateProvider implements RateProvider {
  readonly name = 'cbr';

  private readonly url: string;
  private readonly cacheTtlMs: number;
  private readonly timeoutMs: number;
  private cache = new Map<string, CacheSlot>();
  private inflight: Promise<RateTable> | null = null;

  constructor(options: CbrRateProviderOptions = {}) {
    this.url = options.url ?? DEFAULT_CBR_URL;
    this.cacheTtlMs = options.cacheTtlMs ?? DEFAULT_CACHE_TTL_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
  }

  async getRates(): Promise<RateTable> {
    const cached = this.cache.get(CACHE_KEY);
    if (cached && Date.now() - cached.fetchedAt < this.cacheTtlMs) {
      console.debug('[Currency] Using cached currency rates');
      return cached.table;
    }

    // Concurrent misses share one request
    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  clearCache(): void {
    this.cache.delete(CACHE_KEY);
  }

  private async refresh(): Promise<RateTable> {
    try {
      const table = await this.fetchRates();
      this.cache.set(CACHE_KEY, { fetchedAt: Date.now(), table });
      console.log(`[Currency] Fetched CBR rates for ${table.date} (${Object.keys(table.rates).length} currencies)`);
      return table;
    } catch (err) {
      console.error('[Currency] CBR request failed, using fallback rates:', err instanceof Error ? err.message : err);
      return buildFallbackTable();
    }
  }

  private async fetchRates(): Promise<RateTable> {
    console.log('[Currency] Fetching fresh currency rates from CBR');
    const response = await fetch(this.url, {
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`CBR API error: ${response.status} ${text.slice(0, 200)}`);
    }

    return parseCbrPayload(await response.json());
  }
}
