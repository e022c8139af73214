/**
 * Currency Plugin Manifest
 */
import type { PluginManifest } from '../base.js';

export const manifest: PluginManifest = {
  name: 'currency',
  version: '1.3.0',
  description: 'CBR exchange rates and a natural-language currency converter (USD, EUR, GBP, CNY, JPY, CHF, TRY, KZT, RUB).',
  author: 'Ratebot',
  commands: ['currency'],
  permissions: ['network'],
  functions: [
    {
      name: 'convert_currency',
      description: 'Convert an amount between two supported currencies using today\'s Central Bank of Russia rates. Currencies may be ISO codes, symbols or names in Russian or English (e.g. "USD", "$", "евро", "рублей").',
      parameters: {
        type: 'object',
        properties: {
          amount: {
            type: 'number',
            description: 'Amount to convert, must be positive',
          },
          from: {
            type: 'string',
            description: 'Source currency, e.g. "USD", "доллар", "€"',
          },
          to: {
            type: 'string',
            description: 'Target currency, e.g. "RUB", "рубли", "yen"',
          },
        },
        required: ['amount', 'from', 'to'],
      },
    },
    {
      name: 'get_currency_rates',
      description: 'Get the current CBR rates (RUB per unit) with the daily change for the supported currencies.',
      parameters: {
        type: 'object',
        properties: {
          codes: {
            type: 'array',
            items: { type: 'string' },
            description: 'Currencies to include (optional, defaults to all supported)',
          },
        },
        required: [],
      },
    },
  ],
  category: 'finance',
  emoji: '💱',
};
