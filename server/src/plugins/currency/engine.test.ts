import { convertCurrency } from './engine.js';
import { buildRateEntry, createRateTable } from './rates.js';
import {
  CurrencyNotFoundError,
  type ConversionRequest,
  type CurrencyCode,
  type RateTable,
} from './types.js';

function request(amount: number, fromCurrency: CurrencyCode, toCurrency: CurrencyCode): ConversionRequest {
  return { amount, fromCurrency, toCurrency, originalText: `${amount} ${fromCurrency} to ${toCurrency}` };
}

const table = createRateTable('2024-05-17', 'cbr', [
  buildRateEntry('USD', 91.5, 90.8),
  buildRateEntry('EUR', 99.2, 98.5),
  buildRateEntry('JPY', 0.61, 0.6),
  buildRateEntry('KZT', 0.19, 0.19),
]);

/** A table as the feed could deliver it: no RUB entry at all */
const usdOnly: RateTable = {
  date: '2024-05-17',
  source: 'cbr',
  rates: { USD: buildRateEntry('USD', 91.5, 90.8) },
};

describe('convertCurrency', () => {
  it('multiplies by the source rate when converting into RUB', () => {
    const result = convertCurrency(request(100, 'USD', 'RUB'), usdOnly);
    expect(result.resultAmount).toBe(9150);
    expect(result.fromRate).toBe(91.5);
    expect(result.toRate).toBe(1);
    expect(result.asOfDate).toBe('2024-05-17');
  });

  it('divides by the target rate when converting out of RUB', () => {
    expect(convertCurrency(request(9150, 'RUB', 'USD'), usdOnly).resultAmount).toBe(100);
  });

  it('crosses through RUB for two foreign currencies', () => {
    const result = convertCurrency(request(50, 'EUR', 'USD'), table);
    expect(result.resultAmount).toBeCloseTo(54.20765, 4);
    expect(result.fromRate).toBe(99.2);
    expect(result.toRate).toBe(91.5);
  });

  it('returns the same amount for RUB → RUB', () => {
    expect(convertCurrency(request(100, 'RUB', 'RUB'), table).resultAmount).toBe(100);
    expect(convertCurrency(request(100, 'RUB', 'RUB'), usdOnly).resultAmount).toBe(100);
  });

  it('keeps the request on the result', () => {
    const req = request(5, 'EUR', 'RUB');
    expect(convertCurrency(req, table).request).toBe(req);
  });

  it('does not round the result', () => {
    expect(convertCurrency(request(1, 'RUB', 'USD'), table).resultAmount).toBe(1 / 91.5);
  });

  it('throws CurrencyNotFoundError for a code absent from the table', () => {
    expect(() => convertCurrency(request(10, 'GBP', 'RUB'), table)).toThrow(CurrencyNotFoundError);
  });

  it('lists every missing code once', () => {
    try {
      convertCurrency(request(10, 'GBP', 'CHF'), table);
      expect.unreachable('conversion should have failed');
    } catch (err) {
      expect(err).toBeInstanceOf(CurrencyNotFoundError);
      expect(err instanceof CurrencyNotFoundError && err.missing).toEqual(['GBP', 'CHF']);
    }

    try {
      convertCurrency(request(10, 'GBP', 'GBP'), table);
      expect.unreachable('conversion should have failed');
    } catch (err) {
      expect(err instanceof CurrencyNotFoundError && err.missing).toEqual(['GBP']);
    }
  });

  const codes: CurrencyCode[] = ['RUB', 'USD', 'EUR', 'JPY', 'KZT'];
  const pairs = codes.flatMap((a) => codes.map((b): [CurrencyCode, CurrencyCode] => [a, b]));

  it.each(pairs)('round-trips %s → %s within a cent', (a, b) => {
    const amount = 1234.56;
    const there = convertCurrency(request(amount, a, b), table).resultAmount;
    const back = convertCurrency(request(there, b, a), table).resultAmount;
    expect(Math.abs(back - amount)).toBeLessThan(0.01);
  });
});
