/**
 * Reply rendering for the currency plugin (markdown: *bold*, `code`).
 * Pure functions; a value missing from the table renders as N/A.
 */

import { currencyFlag, currencyName } from './normalizer.js';
import {
  BASE_CURRENCY,
  SUPPORTED_CURRENCIES,
  type ConversionRequest,
  type ConversionResult,
  type CurrencyCode,
  type RateEntry,
  type RateTable,
} from './types.js';

const NOT_AVAILABLE = 'N/A';

const FIAT_CODES: CurrencyCode[] = ['USD', 'EUR', 'CNY', 'GBP'];
const ALL_RATE_CODES: CurrencyCode[] = SUPPORTED_CURRENCIES.filter((code) => code !== BASE_CURRENCY);
const CHANGE_CODES: CurrencyCode[] = ['USD', 'EUR', 'CNY'];

export const MESSAGES = {
  LOADING_FIAT: '💵 Получаю курсы валют...',
  LOADING_ALL: '📊 Получаю все курсы...',
  LOADING_CHANGES: '📈 Анализирую изменения...',
  RATES_ERROR: '❌ Ошибка получения курсов валют. Попробуйте позже.',
  CONVERSION_ERROR: '❌ Ошибка при конвертации. Попробуйте позже.',
  BACK_TO_MAIN: '🔙 Возврат в главное меню',
} as const;

function fixed2(value: number): string {
  return value.toFixed(2);
}

function signed(value: number, digits: number): string {
  return `${value >= 0 ? '+' : ''}${value.toFixed(digits)}`;
}

function rateValue(entry: RateEntry | undefined): string {
  return entry ? fixed2(entry.value) : NOT_AVAILABLE;
}

/** Local wall-clock time as HH:MM */
export function formatTime(now: Date): string {
  const hh = String(now.getHours()).padStart(2, '0');
  const mm = String(now.getMinutes()).padStart(2, '0');
  return `${hh}:${mm}`;
}

export function formatConversionPending(request: ConversionRequest): string {
  return `💱 Конвертирую ${request.amount} ${request.fromCurrency} в ${request.toCurrency}...`;
}

export function formatConversion(result: ConversionResult): string {
  const { amount, fromCurrency, toCurrency } = result.request;

  const lines = [
    '💱 *Результат конвертации:*',
    '',
    `💰 *${fixed2(amount)} ${fromCurrency}* (${currencyName(fromCurrency)}) = ` +
      `*${fixed2(result.resultAmount)} ${toCurrency}* (${currencyName(toCurrency)})`,
    '',
  ];

  if (fromCurrency !== BASE_CURRENCY) {
    lines.push(`📊 Курс ${fromCurrency}: ${fixed2(result.fromRate)} RUB`);
  }
  if (toCurrency !== BASE_CURRENCY) {
    lines.push(`📊 Курс ${toCurrency}: ${fixed2(result.toRate)} RUB`);
  }

  lines.push('', `🕐 *Курсы ЦБ РФ на ${result.asOfDate || 'сегодня'}*`);
  return lines.join('\n');
}

export function formatCurrencyNotFound(): string {
  return (
    '❌ Не удалось найти курсы для указанных валют.\n' +
    `Доступные валюты: ${SUPPORTED_CURRENCIES.join(', ')}`
  );
}

export function formatFiatRates(table: RateTable, now: Date): string {
  const lines = ['💵 *Курсы ЦБ РФ на сегодня*', ''];
  for (const code of FIAT_CODES) {
    const entry = table.rates[code];
    const change = entry ? signed(entry.change, 2) : NOT_AVAILABLE;
    lines.push(`${currencyFlag(code)} *${code}:* ${rateValue(entry)} ₽ (${change})`);
  }
  lines.push(
    '',
    `🕐 *Обновлено:* ${formatTime(now)}`,
    `📅 *Дата:* ${table.date || NOT_AVAILABLE}`,
  );
  return lines.join('\n');
}

export function formatAllRates(table: RateTable, now: Date): string {
  const lines = ['📊 *Все курсы ЦБ РФ*', ''];
  for (const code of ALL_RATE_CODES) {
    const entry = table.rates[code];
    if (!entry) continue;
    lines.push(`• ${currencyFlag(code)} *${code}:* ${rateValue(entry)} ₽`);
  }
  lines.push(
    '',
    `🕐 *Обновлено:* ${formatTime(now)}`,
    `📅 *Дата:* ${table.date || NOT_AVAILABLE}`,
  );
  return lines.join('\n');
}

function trendOf(change: number): string {
  if (change > 0) return '📈';
  if (change < 0) return '📉';
  return '➡️';
}

export function formatChanges(table: RateTable, now: Date): string {
  const lines = ['📈 *Изменения курсов за сутки*', ''];
  for (const code of CHANGE_CODES) {
    const entry = table.rates[code];
    if (!entry) continue;
    lines.push(
      `${trendOf(entry.change)} ${currencyFlag(code)} *${code}:* ` +
        `${signed(entry.change, 2)} ₽ (${signed(entry.changePercent, 1)}%)`,
    );
  }
  lines.push('', `🕐 *Обновлено:* ${formatTime(now)}`);
  return lines.join('\n');
}

export function formatMainMenu(): string {
  return [
    '💱 *Курсы валют и конвертер*',
    '',
    '• 💵 *Основные валюты* - USD, EUR, CNY, GBP',
    '• 🔄 *Конвертер* - перевод между валютами',
    '• 📊 *Все курсы* - полный список',
    '• 📈 *Изменения* - динамика за сутки',
    '',
    '*Примеры запросов:*',
    '`100 USD to RUB`',
    '`500 евро в доллары`',
    '`конвертировать 1000 рублей в юани`',
    '',
    'Выберите опцию:',
  ].join('\n');
}

export function formatConverterHelp(): string {
  return [
    '💱 Конвертер валют',
    '',
    'Введите запрос в формате:',
    '`100 USD to RUB`',
    '`1000 RUB to EUR`',
    '`500 долларов в рубли`',
    '`конвертировать 50 евро в доллары`',
    '',
    'Или выберите из меню выше ⬆️',
  ].join('\n');
}
