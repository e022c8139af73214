/**
 * Currency plugin domain types.
 */

export const SUPPORTED_CURRENCIES = [
  'USD', 'EUR', 'GBP', 'CNY', 'JPY', 'CHF', 'TRY', 'KZT', 'RUB',
] as const;

export type CurrencyCode = (typeof SUPPORTED_CURRENCIES)[number];

/** Pivot currency: every rate is expressed in RUB per one unit */
export const BASE_CURRENCY: CurrencyCode = 'RUB';

export interface RateEntry {
  code: CurrencyCode;
  /** RUB per one unit of `code` */
  value: number;
  previous: number;
  change: number;
  changePercent: number;
}

export type RateSource = 'cbr' | 'fallback';

export interface RateTable {
  /** As-of date reported by the source, YYYY-MM-DD */
  date: string;
  source: RateSource;
  rates: Readonly<Partial<Record<CurrencyCode, RateEntry>>>;
}

export interface ConversionRequest {
  amount: number;
  fromCurrency: CurrencyCode;
  toCurrency: CurrencyCode;
  originalText: string;
}

export interface ConversionResult {
  request: ConversionRequest;
  /** Unrounded; rounding happens when the result is rendered */
  resultAmount: number;
  fromRate: number;
  toRate: number;
  asOfDate: string;
}

export interface RateProvider {
  readonly name: string;
  /** Always resolves with a usable table */
  getRates(): Promise<RateTable>;
  clearCache(): void;
}

export class CurrencyNotFoundError extends Error {
  readonly missing: CurrencyCode[];

  constructor(missing: CurrencyCode[]) {
    super(`No rate available for ${missing.join(', ')}`);
    this.name = 'CurrencyNotFoundError';
    this.missing = missing;
  }
}

export function isCurrencyCode(value: string): value is CurrencyCode {
  return SUPPORTED_CURRENCIES.some((code) => code === value);
}
