/**
 * Currency token normalization.
 *
 * Maps what people type ("долларов", "€", "rubles", "usd") to a canonical code.
 * The alias table lives in data/currency-aliases.json and is read once at load.
 */

import fs from 'fs';
import path from 'path';
import { isCurrencyCode, type CurrencyCode } from './types.js';

const ALIASES_PATH = path.join(process.cwd(), 'data', 'currency-aliases.json');

const CURRENCY_NAMES: Record<CurrencyCode, string> = {
  USD: 'Доллар США',
  EUR: 'Евро',
  GBP: 'Фунт стерлингов',
  CNY: 'Китайский юань',
  JPY: 'Японская иена',
  CHF: 'Швейцарский франк',
  TRY: 'Турецкая лира',
  KZT: 'Казахстанский тенге',
  RUB: 'Российский рубль',
};

const CURRENCY_FLAGS: Record<CurrencyCode, string> = {
  USD: '🇺🇸',
  EUR: '🇪🇺',
  GBP: '🇬🇧',
  CNY: '🇨🇳',
  JPY: '🇯🇵',
  CHF: '🇨🇭',
  TRY: '🇹🇷',
  KZT: '🇰🇿',
  RUB: '🇷🇺',
};

/**
 * Build the alias → code lookup from the JSON file ({ "USD": ["$", "доллар", ...] }).
 * Unknown codes and non-string forms are rejected so a typo in the data file
 * fails at startup rather than at lookup time.
 */
export function buildAliasTable(raw: unknown): ReadonlyMap<string, CurrencyCode> {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new Error('Currency alias table must be an object of code → forms');
  }

  const table = new Map<string, CurrencyCode>();
  for (const [code, forms] of Object.entries(raw)) {
    if (!isCurrencyCode(code)) {
      throw new Error(`Unsupported currency code in alias table: "${code}"`);
    }
    if (!Array.isArray(forms)) {
      throw new Error(`Alias list for ${code} must be an array`);
    }
    for (const form of forms) {
      if (typeof form !== 'string' || form.trim() === '') {
        throw new Error(`Invalid alias for ${code}: ${JSON.stringify(form)}`);
      }
      const key = form.trim().toLowerCase();
      const existing = table.get(key);
      if (existing && existing !== code) {
        throw new Error(`Alias "${key}" maps to both ${existing} and ${code}`);
      }
      table.set(key, code);
    }
  }
  return table;
}

const aliasTable = buildAliasTable(JSON.parse(fs.readFileSync(ALIASES_PATH, 'utf-8')));

/**
 * Resolve a free-text currency token to its code.
 * Exact match only; returns null when the token is not a known form.
 */
export function normalizeCurrency(token: string): CurrencyCode | null {
  const clean = token.trim().toLowerCase();
  if (clean === '') return null;

  const alias = aliasTable.get(clean);
  if (alias) return alias;

  const upper = clean.toUpperCase();
  return isCurrencyCode(upper) ? upper : null;
}

export function currencyName(code: CurrencyCode): string {
  return CURRENCY_NAMES[code];
}

export function currencyFlag(code: string): string {
  return isCurrencyCode(code) ? CURRENCY_FLAGS[code] : '💱';
}
