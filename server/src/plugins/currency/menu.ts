/**
 * Keyboard labels of the currency menu. The parser ignores these so a button
 * press is never read as a conversion request.
 */

export const MENU = {
  CURRENCY: '💱 Курсы валют',
  FIAT_RATES: '💵 Основные валюты',
  CONVERTER: '🔄 Конвертер',
  ALL_RATES: '📊 Все курсы',
  CHANGES: '📈 Изменения',
  BACK: '◀️ Назад',
} as const;

export const CURRENCY_COMMAND = '/currency';

export const MENU_LABELS: readonly string[] = Object.values(MENU);

export const CURRENCY_KEYBOARD: string[][] = [
  [MENU.FIAT_RATES, MENU.ALL_RATES],
  [MENU.CONVERTER, MENU.CHANGES],
  [MENU.BACK],
];

/** The bot's top-level keyboard, shown when leaving the currency menu */
export const MAIN_KEYBOARD: string[][] = [
  ['❓ Помощь', 'ℹ️ О боте'],
  ['🔄 Сбросить диалог', '💡 Примеры запросов'],
  ['📊 Анализ файлов', '🌤️ Погода', MENU.CURRENCY],
];
