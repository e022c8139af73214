/**
 * Conversion request parser.
 *
 * Rules run in a fixed order and the first one that yields a request wins:
 *   1. menu labels are never conversions
 *   2. special-case pairs with both codes hard-coded (USD/EUR ↔ RUB)
 *   3. general "<amount> <token> to <token>" patterns resolved through the normalizer
 */

import { MENU_LABELS } from './menu.js';
import { normalizeCurrency } from './normalizer.js';
import type { ConversionRequest, CurrencyCode } from './types.js';

interface ParsedConversion {
  amount: number;
  fromCurrency: CurrencyCode;
  toCurrency: CurrencyCode;
}

export interface ConversionRule {
  name: string;
  pattern: RegExp;
  extract(match: RegExpMatchArray): ParsedConversion | null;
}

const AMOUNT = String.raw`(\d+(?:[.,]\d+)?)`;
const CONNECTOR = String.raw`(?:в|во|to|into|in|->|→)`;
const TOKEN = String.raw`([$€£₽₸]|[a-zа-яё]{2,})`;

const USD_WORDS = String.raw`(?:\$|usd|доллар[а-яё]*|бакс[а-яё]*|dollars?)`;
const EUR_WORDS = String.raw`(?:€|eur|евро|euros?)`;
const RUB_WORDS = String.raw`(?:₽|rub|руб[а-яё]*|rubles?|roubles?)`;

// A currency word must not run on into more letters ("rubbish", "usdto")
const WORD_END = String.raw`(?![a-zа-яё])`;

/** "1,5" and "1.5" are the same amount; zero and garbage are not amounts */
export function parseAmount(raw: string): number | null {
  const amount = Number(raw.replace(',', '.'));
  if (!Number.isFinite(amount) || amount <= 0) return null;
  return amount;
}

function fixedPair(
  name: string,
  fromWords: string,
  toWords: string,
  fromCurrency: CurrencyCode,
  toCurrency: CurrencyCode,
): ConversionRule {
  return {
    name,
    pattern: new RegExp(
      String.raw`${AMOUNT}\s*${fromWords}${WORD_END}\s*${CONNECTOR}\s*${toWords}${WORD_END}`,
      'gi',
    ),
    extract(match) {
      const amount = parseAmount(match[1] ?? '');
      return amount === null ? null : { amount, fromCurrency, toCurrency };
    },
  };
}

function tokenPair(name: string, source: string): ConversionRule {
  return {
    name,
    pattern: new RegExp(source, 'gi'),
    extract(match) {
      const amount = parseAmount(match[1] ?? '');
      if (amount === null) return null;

      const fromToken = match[2] ?? '';
      const toToken = match[3] ?? '';
      const fromCurrency = normalizeCurrency(fromToken);
      const toCurrency = normalizeCurrency(toToken);
      if (!fromCurrency || !toCurrency) {
        console.debug(`[Currency] Rule "${name}" skipped unresolved tokens "${fromToken}" → "${toToken}"`);
        return null;
      }
      return { amount, fromCurrency, toCurrency };
    },
  };
}

export const CONVERSION_RULES: readonly ConversionRule[] = [
  fixedPair('usd-to-rub', USD_WORDS, RUB_WORDS, 'USD', 'RUB'),
  fixedPair('eur-to-rub', EUR_WORDS, RUB_WORDS, 'EUR', 'RUB'),
  fixedPair('rub-to-usd', RUB_WORDS, USD_WORDS, 'RUB', 'USD'),
  fixedPair('rub-to-eur', RUB_WORDS, EUR_WORDS, 'RUB', 'EUR'),
  tokenPair(
    'verb-amount-token-to-token',
    String.raw`(?:конвертировать|конвертируй|перевести|переведи|convert)\s+${AMOUNT}\s*${TOKEN}\s+${CONNECTOR}\s+${TOKEN}`,
  ),
  tokenPair('amount-token-to-token', String.raw`${AMOUNT}\s*${TOKEN}\s+${CONNECTOR}\s+${TOKEN}`),
];

/**
 * Extract a conversion request from free text, or null when the text is not one.
 */
export function parseConversionRequest(
  text: string,
  rules: readonly ConversionRule[] = CONVERSION_RULES,
): ConversionRequest | null {
  const trimmed = text.trim();
  if (MENU_LABELS.includes(trimmed)) return null;

  const lower = trimmed.toLowerCase();
  for (const rule of rules) {
    for (const match of lower.matchAll(rule.pattern)) {
      const parsed = rule.extract(match);
      if (parsed) {
        return { ...parsed, originalText: text };
      }
    }
  }
  return null;
}
