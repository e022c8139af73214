import { CurrencyPlugin } from './plugin.js';
import { CbrRateProvider, type CbrRateProviderOptions } from './rates.js';

export { CurrencyPlugin } from './plugin.js';
export { CbrRateProvider, type CbrRateProviderOptions } from './rates.js';
export { manifest } from './manifest.js';

export function createPlugin(options: CbrRateProviderOptions): CurrencyPlugin {
  return new CurrencyPlugin(new CbrRateProvider(options));
}
