import { buildAliasTable, currencyFlag, currencyName, normalizeCurrency } from './normalizer.js';
import { SUPPORTED_CURRENCIES } from './types.js';

describe('normalizeCurrency', () => {
  test.each(SUPPORTED_CURRENCIES.map((code) => [code]))('resolves lower-case %s', (code) => {
    expect(normalizeCurrency(code.toLowerCase())).toBe(code);
    expect(normalizeCurrency(code)).toBe(code);
  });

  test.each([
    ['доллар', 'USD'],
    ['долларов', 'USD'],
    ['$', 'USD'],
    ['dollars', 'USD'],
    ['евро', 'EUR'],
    ['€', 'EUR'],
    ['фунтов', 'GBP'],
    ['pound', 'GBP'],
    ['юаней', 'CNY'],
    ['yuan', 'CNY'],
    ['иен', 'JPY'],
    ['yen', 'JPY'],
    ['франков', 'CHF'],
    ['franc', 'CHF'],
    ['лиры', 'TRY'],
    ['lira', 'TRY'],
    ['тенге', 'KZT'],
    ['tenge', 'KZT'],
    ['рублей', 'RUB'],
    ['рубли', 'RUB'],
    ['₽', 'RUB'],
    ['rubles', 'RUB'],
  ])('maps "%s" to %s', (token, code) => {
    expect(normalizeCurrency(token)).toBe(code);
  });

  it('trims and lower-cases before lookup', () => {
    expect(normalizeCurrency('  Долларов ')).toBe('USD');
    expect(normalizeCurrency('EURO')).toBe('EUR');
  });

  it('returns null for unknown or partial tokens', () => {
    expect(normalizeCurrency('xyz')).toBeNull();
    expect(normalizeCurrency('долл')).toBeNull();
    expect(normalizeCurrency('btc')).toBeNull();
    expect(normalizeCurrency('')).toBeNull();
    expect(normalizeCurrency('   ')).toBeNull();
  });
});

describe('buildAliasTable', () => {
  it('inverts code → forms into form → code', () => {
    const table = buildAliasTable({ USD: ['$', 'Бакс'], RUB: ['₽'] });
    expect(table.get('$')).toBe('USD');
    expect(table.get('бакс')).toBe('USD');
    expect(table.get('₽')).toBe('RUB');
    expect(table.size).toBe(3);
  });

  it('rejects unsupported codes', () => {
    expect(() => buildAliasTable({ BTC: ['₿'] })).toThrow('Unsupported currency code in alias table: "BTC"');
  });

  it('rejects a form claimed by two currencies', () => {
    expect(() => buildAliasTable({ USD: ['¥'], JPY: ['¥'] })).toThrow('Alias "¥" maps to both USD and JPY');
  });

  it('rejects non-object input', () => {
    expect(() => buildAliasTable(['USD'])).toThrow();
    expect(() => buildAliasTable(null)).toThrow();
  });
});

describe('currency display helpers', () => {
  it('returns the Russian name and flag', () => {
    expect(currencyName('USD')).toBe('Доллар США');
    expect(currencyName('RUB')).toBe('Российский рубль');
    expect(currencyFlag('EUR')).toBe('🇪🇺');
  });

  it('falls back to a generic icon for unknown codes', () => {
    expect(currencyFlag('AUD')).toBe('💱');
  });
});
