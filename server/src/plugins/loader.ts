/**
 * Plugin Loader: registers the built-in plugins at startup.
 *
 * Each plugin is a folder under src/plugins/ whose index.ts exports
 * `createPlugin(options)`. A plugin that fails to load is logged and skipped.
 */

import type { ServerConfig } from '../config.js';
import type { MessagePlugin } from './base.js';
import { pluginRegistry, type PluginRegistry } from './registry.js';

export async function loadBuiltinPlugins(
  config: ServerConfig,
  registry: PluginRegistry = pluginRegistry,
): Promise<void> {
  const plugins: MessagePlugin[] = [];

  try {
    const currency = await import('./currency/index.js');
    plugins.push(currency.createPlugin(config.currency));
  } catch (err) {
    console.error('[PluginLoader] Failed to load currency plugin:', err);
  }

  for (const plugin of plugins) {
    try {
      registry.register(plugin);
    } catch (err) {
      console.error(`[PluginLoader] Failed to register plugin "${plugin.manifest.name}":`, err);
    }
  }

  console.log(`[PluginLoader] Loaded ${registry.list().length} built-in plugins`);
}
