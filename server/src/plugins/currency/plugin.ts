/**
 * Currency plugin: rate menus and free-text conversions.
 */

import {
  markdownReply,
  plainReply,
  type MessagePlugin,
  type PluginFunctionHandler,
  type PluginReply,
  type PluginResult,
} from '../base.js';
import { convertCurrency } from './engine.js';
import {
  MESSAGES,
  formatAllRates,
  formatChanges,
  formatConversion,
  formatConversionPending,
  formatConverterHelp,
  formatCurrencyNotFound,
  formatFiatRates,
  formatMainMenu,
} from './formatter.js';
import { createHandlers } from './handler.js';
import { manifest } from './manifest.js';
import { CURRENCY_COMMAND, CURRENCY_KEYBOARD, MAIN_KEYBOARD, MENU } from './menu.js';
import { parseConversionRequest } from './parser.js';
import {
  CurrencyNotFoundError,
  type ConversionRequest,
  type RateProvider,
  type RateTable,
} from './types.js';

type TableRenderer = (table: RateTable, now: Date) => string;

export class CurrencyPlugin implements MessagePlugin {
  readonly manifest = manifest;
  readonly handlers: Record<string, PluginFunctionHandler>;

  constructor(private readonly rates: RateProvider) {
    this.handlers = createHandlers(rates);
  }

  async handleMessage(text: string): Promise<PluginResult> {
    const message = text.trim();

    switch (message) {
      case CURRENCY_COMMAND:
      case MENU.CURRENCY:
        return handled([markdownReply(formatMainMenu(), CURRENCY_KEYBOARD)]);
      case MENU.FIAT_RATES:
        return this.showRates(MESSAGES.LOADING_FIAT, formatFiatRates);
      case MENU.ALL_RATES:
        return this.showRates(MESSAGES.LOADING_ALL, formatAllRates);
      case MENU.CHANGES:
        return this.showRates(MESSAGES.LOADING_CHANGES, formatChanges);
      case MENU.CONVERTER:
        return handled([markdownReply(formatConverterHelp())]);
      case MENU.BACK:
        return handled([plainReply(MESSAGES.BACK_TO_MAIN, MAIN_KEYBOARD)]);
    }

    const request = parseConversionRequest(message);
    if (!request) {
      return { status: 'not_matched' };
    }
    return this.processConversion(request);
  }

  private async showRates(loading: string, render: TableRenderer): Promise<PluginResult> {
    const replies = [plainReply(loading)];
    try {
      const table = await this.rates.getRates();
      replies.push(markdownReply(render(table, new Date())));
      return handled(replies);
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      console.error('[Currency] Rates display error:', detail);
      replies.push(plainReply(MESSAGES.RATES_ERROR));
      return { status: 'error', detail, replies };
    }
  }

  private async processConversion(request: ConversionRequest): Promise<PluginResult> {
    console.log(
      `[Currency] Converting ${request.amount} ${request.fromCurrency} → ${request.toCurrency}`,
    );
    const replies = [plainReply(formatConversionPending(request))];

    try {
      const table = await this.rates.getRates();
      const result = convertCurrency(request, table);
      replies.push(markdownReply(formatConversion(result)));
      return handled(replies);
    } catch (err) {
      if (err instanceof CurrencyNotFoundError) {
        console.warn(`[Currency] ${err.message}`);
        replies.push(plainReply(formatCurrencyNotFound()));
        return handled(replies);
      }
      const detail = err instanceof Error ? err.message : String(err);
      console.error('[Currency] Conversion error:', detail);
      replies.push(plainReply(MESSAGES.CONVERSION_ERROR));
      return { status: 'error', detail, replies };
    }
  }
}

function handled(replies: PluginReply[]): PluginResult {
  return { status: 'handled', replies };
}
