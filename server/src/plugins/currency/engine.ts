/**
 * Conversion through the RUB base: every rate is RUB per unit, and RUB itself
 * is the implicit rate 1 whether or not the table carries an entry for it.
 */

import {
  BASE_CURRENCY,
  CurrencyNotFoundError,
  type ConversionRequest,
  type ConversionResult,
  type CurrencyCode,
  type RateTable,
} from './types.js';

function rateOf(code: CurrencyCode, table: RateTable): number {
  if (code === BASE_CURRENCY) return 1;
  const entry = table.rates[code];
  if (!entry) throw new CurrencyNotFoundError([code]);
  return entry.value;
}

/**
 * Convert `request.amount` of `fromCurrency` into `toCurrency`.
 * Throws CurrencyNotFoundError listing every requested code the table lacks.
 */
export function convertCurrency(request: ConversionRequest, table: RateTable): ConversionResult {
  const { amount, fromCurrency, toCurrency } = request;

  const missing = [fromCurrency, toCurrency].filter(
    (code, i, all) => code !== BASE_CURRENCY && !table.rates[code] && all.indexOf(code) === i,
  );
  if (missing.length > 0) {
    throw new CurrencyNotFoundError(missing);
  }

  const fromRate = rateOf(fromCurrency, table);
  const toRate = rateOf(toCurrency, table);

  let resultAmount: number;
  if (fromCurrency === BASE_CURRENCY) {
    resultAmount = amount / toRate;
  } else if (toCurrency === BASE_CURRENCY) {
    resultAmount = amount * fromRate;
  } else {
    resultAmount = (amount * fromRate) / toRate;
  }

  return {
    request,
    resultAmount,
    fromRate,
    toRate,
    asOfDate: table.date,
  };
}
