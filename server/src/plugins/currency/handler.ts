/**
 * Currency Plugin function handlers (function-calling surface).
 * Results and argument errors are both returned as JSON strings.
 */
import type { PluginFunctionHandler } from '../base.js';
import { convertCurrency } from './engine.js';
import { normalizeCurrency } from './normalizer.js';
import { parseAmount } from './parser.js';
import {
  CurrencyNotFoundError,
  SUPPORTED_CURRENCIES,
  type CurrencyCode,
  type RateEntry,
  type RateProvider,
} from './types.js';

function readAmount(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) && value > 0 ? value : null;
  }
  if (typeof value === 'string') {
    return parseAmount(value.trim());
  }
  return null;
}

function readCurrency(value: unknown): CurrencyCode | null {
  return typeof value === 'string' ? normalizeCurrency(value) : null;
}

export function createHandlers(rates: RateProvider): Record<string, PluginFunctionHandler> {
  const convert: PluginFunctionHandler = async (args) => {
    const amount = readAmount(args.amount);
    if (amount === null) {
      return JSON.stringify({ error: 'Amount must be a positive number' });
    }

    const from = readCurrency(args.from);
    const to = readCurrency(args.to);
    if (!from || !to) {
      const unknown = !from ? args.from : args.to;
      return JSON.stringify({
        error: `Unsupported currency "${String(unknown)}". Supported: ${SUPPORTED_CURRENCIES.join(', ')}`,
      });
    }

    const table = await rates.getRates();
    try {
      const result = convertCurrency(
        { amount, fromCurrency: from, toCurrency: to, originalText: `${amount} ${from} to ${to}` },
        table,
      );
      return JSON.stringify({
        from,
        to,
        amount,
        rate: result.resultAmount / amount,
        converted: result.resultAmount,
        date: result.asOfDate,
        source: table.source,
      });
    } catch (err) {
      if (err instanceof CurrencyNotFoundError) {
        return JSON.stringify({ error: `No rate available for ${err.missing.join(', ')}` });
      }
      throw err;
    }
  };

  const getRates: PluginFunctionHandler = async (args) => {
    let codes: CurrencyCode[] = [...SUPPORTED_CURRENCIES];
    if (args.codes !== undefined) {
      if (!Array.isArray(args.codes)) {
        return JSON.stringify({ error: 'codes must be an array of currency names or codes' });
      }
      const requested: unknown[] = args.codes;
      const resolved: CurrencyCode[] = [];
      for (const raw of requested) {
        const code = readCurrency(raw);
        if (!code) {
          return JSON.stringify({ error: `Unsupported currency "${String(raw)}"` });
        }
        if (!resolved.includes(code)) resolved.push(code);
      }
      codes = resolved;
    }

    const table = await rates.getRates();
    const selected: Partial<Record<CurrencyCode, RateEntry>> = {};
    for (const code of codes) {
      const entry = table.rates[code];
      if (entry) selected[code] = entry;
    }

    return JSON.stringify({ date: table.date, source: table.source, rates: selected });
  };

  return {
    convert_currency: convert,
    get_currency_rates: getRates,
  };
}
