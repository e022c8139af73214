import { CurrencyPlugin } from './plugin.js';
import { CURRENCY_KEYBOARD, MAIN_KEYBOARD, MENU } from './menu.js';
import { buildRateEntry, createRateTable } from './rates.js';
import type { RateProvider, RateTable } from './types.js';

const table = createRateTable('2024-05-17', 'cbr', [
  buildRateEntry('USD', 91.5, 90.8),
  buildRateEntry('EUR', 99.2, 98.5),
]);

class FakeRateProvider implements RateProvider {
  readonly name = 'fake';
  calls = 0;

  constructor(private readonly table: RateTable) {}

  async getRates(): Promise<RateTable> {
    this.calls++;
    return this.table;
  }

  clearCache(): void {}
}

describe('CurrencyPlugin', () => {
  let rates: FakeRateProvider;
  let plugin: CurrencyPlugin;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    rates = new FakeRateProvider(table);
    plugin = new CurrencyPlugin(rates);
  });

  it('converts a free-text request', async () => {
    const result = await plugin.handleMessage('100 USD to RUB');

    expect(result.status).toBe('handled');
    if (result.status !== 'handled') return;
    expect(result.replies).toHaveLength(2);
    expect(result.replies[0]).toEqual({ text: '💱 Конвертирую 100 USD в RUB...', format: 'plain' });
    expect(result.replies[1].format).toBe('markdown');
    expect(result.replies[1].text).toContain('*9150.00 RUB*');
  });

  it('converts between two foreign currencies', async () => {
    const result = await plugin.handleMessage('конвертировать 50 евро в доллары');

    expect(result.status).toBe('handled');
    if (result.status !== 'handled') return;
    expect(result.replies[1].text).toContain('*54.21 USD*');
  });

  it('does not match unrelated text', async () => {
    expect(await plugin.handleMessage('какая сегодня погода?')).toEqual({ status: 'not_matched' });
    expect(await plugin.handleMessage('10 XYZ to RUB')).toEqual({ status: 'not_matched' });
    expect(rates.calls).toBe(0);
  });

  it('reports a currency missing from the rate table', async () => {
    const result = await plugin.handleMessage('10 gbp to rub');

    expect(result.status).toBe('handled');
    if (result.status !== 'handled') return;
    expect(result.replies[1]).toEqual({
      text: '❌ Не удалось найти курсы для указанных валют.\nДоступные валюты: USD, EUR, GBP, CNY, JPY, CHF, TRY, KZT, RUB',
      format: 'plain',
    });
  });

  it('answers with an apology when rendering fails', async () => {
    rates.getRates = async () => {
      throw new Error('boom');
    };

    const result = await plugin.handleMessage('100 usd to rub');

    expect(result).toEqual({
      status: 'error',
      detail: 'boom',
      replies: [
        { text: '💱 Конвертирую 100 USD в RUB...', format: 'plain' },
        { text: '❌ Ошибка при конвертации. Попробуйте позже.', format: 'plain' },
      ],
    });
  });

  it.each(['/currency', MENU.CURRENCY])('shows the main menu for %s', async (text) => {
    const result = await plugin.handleMessage(text);

    expect(result.status).toBe('handled');
    if (result.status !== 'handled') return;
    expect(result.replies).toHaveLength(1);
    expect(result.replies[0].keyboard).toEqual(CURRENCY_KEYBOARD);
    expect(result.replies[0].text.startsWith('💱 *Курсы валют и конвертер*')).toBe(true);
  });

  it('shows the main rates after a loading message', async () => {
    const result = await plugin.handleMessage(MENU.FIAT_RATES);

    expect(result.status).toBe('handled');
    if (result.status !== 'handled') return;
    expect(result.replies[0]).toEqual({ text: '💵 Получаю курсы валют...', format: 'plain' });
    expect(result.replies[1].text).toContain('🇺🇸 *USD:* 91.50 ₽ (+0.70)');
    expect(rates.calls).toBe(1);
  });

  it('shows all rates', async () => {
    const result = await plugin.handleMessage(MENU.ALL_RATES);

    expect(result.status).toBe('handled');
    if (result.status !== 'handled') return;
    expect(result.replies[1].text).toContain('• 🇪🇺 *EUR:* 99.20 ₽');
  });

  it('shows daily changes', async () => {
    const result = await plugin.handleMessage(MENU.CHANGES);

    expect(result.status).toBe('handled');
    if (result.status !== 'handled') return;
    expect(result.replies[1].text).toContain('📈 🇺🇸 *USD:* +0.70 ₽ (+0.8%)');
  });

  it('explains the converter', async () => {
    const result = await plugin.handleMessage(MENU.CONVERTER);

    expect(result.status).toBe('handled');
    if (result.status !== 'handled') return;
    expect(result.replies[0].text.startsWith('💱 Конвертер валют')).toBe(true);
    expect(rates.calls).toBe(0);
  });

  it('returns to the main keyboard on back', async () => {
    const result = await plugin.handleMessage(MENU.BACK);

    expect(result).toEqual({
      status: 'handled',
      replies: [{ text: '🔙 Возврат в главное меню', format: 'plain', keyboard: MAIN_KEYBOARD }],
    });
  });

  it('exposes a handler for every manifest function', () => {
    for (const fn of plugin.manifest.functions) {
      expect(plugin.handlers[fn.name]).toBeTypeOf('function');
    }
  });
});
