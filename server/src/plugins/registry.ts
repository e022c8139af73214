/**
 * PluginRegistry: plugin registration, message dispatch and function calling.
 *
 * Plugins are asked about each inbound message in registration order; the first
 * one that does not answer `not_matched` owns the reply.
 */

import type {
  MessagePlugin,
  PluginFunction,
  PluginFunctionHandler,
  PluginManifest,
  PluginResult,
} from './base.js';

export interface RegisteredPlugin {
  plugin: MessagePlugin;
  handlers: Map<string, PluginFunctionHandler>;
  enabled: boolean;
}

/**
 * OpenAI Function Calling tool definition.
 */
export interface FunctionCallingTool {
  type: 'function';
  function: {
    name: string;
    description: string;
    parameters: Record<string, unknown>;
  };
}

export interface DispatchOutcome {
  /** Plugin that produced the result; null when nobody matched */
  pluginName: string | null;
  result: PluginResult;
}

export class PluginRegistry {
  private plugins = new Map<string, RegisteredPlugin>();

  /**
   * Register a plugin. Each function in the manifest should have a handler;
   * functions without one are left out.
   */
  register(plugin: MessagePlugin): void {
    const { manifest } = plugin;
    const handlerMap = new Map<string, PluginFunctionHandler>();
    for (const fn of manifest.functions) {
      const handler = plugin.handlers[fn.name];
      if (!handler) {
        console.warn(
          `[PluginRegistry] Plugin "${manifest.name}" missing handler for function "${fn.name}", skipping function`,
        );
        continue;
      }
      handlerMap.set(fn.name, handler);
    }

    this.plugins.set(manifest.name, { plugin, handlers: handlerMap, enabled: true });

    console.log(
      `[PluginRegistry] Registered plugin "${manifest.name}" v${manifest.version} (${handlerMap.size} functions)`,
    );
  }

  get(name: string): RegisteredPlugin | undefined {
    return this.plugins.get(name);
  }

  list(): RegisteredPlugin[] {
    return Array.from(this.plugins.values());
  }

  listEnabled(): RegisteredPlugin[] {
    return this.list().filter((p) => p.enabled);
  }

  listManifests(): PluginManifest[] {
    return this.list().map((p) => p.plugin.manifest);
  }

  setEnabled(name: string, enabled: boolean): boolean {
    const entry = this.plugins.get(name);
    if (!entry) return false;
    entry.enabled = enabled;
    console.log(`[PluginRegistry] Plugin "${name}" ${enabled ? 'enabled' : 'disabled'}`);
    return true;
  }

  /**
   * Offer a message to every enabled plugin in order.
   * A plugin that throws is reported as an error result, not rethrown.
   */
  async dispatch(text: string): Promise<DispatchOutcome> {
    for (const { plugin } of this.listEnabled()) {
      let result: PluginResult;
      try {
        result = await plugin.handleMessage(text);
      } catch (err) {
        const detail = err instanceof Error ? err.message : String(err);
        console.error(`[PluginRegistry] Plugin "${plugin.manifest.name}" failed:`, detail);
        return { pluginName: plugin.manifest.name, result: { status: 'error', detail, replies: [] } };
      }
      if (result.status !== 'not_matched') {
        return { pluginName: plugin.manifest.name, result };
      }
    }
    return { pluginName: null, result: { status: 'not_matched' } };
  }

  /** All enabled plugin functions as OpenAI Function Calling tools */
  toFunctionCallingTools(): FunctionCallingTool[] {
    const tools: FunctionCallingTool[] = [];
    for (const entry of this.listEnabled()) {
      for (const fn of entry.plugin.manifest.functions) {
        if (!entry.handlers.has(fn.name)) continue;
        tools.push({
          type: 'function',
          function: {
            name: fn.name,
            description: fn.description,
            parameters: fn.parameters,
          },
        });
      }
    }
    return tools;
  }

  findFunction(functionName: string): {
    plugin: RegisteredPlugin;
    handler: PluginFunctionHandler;
    functionDef: PluginFunction;
  } | null {
    for (const entry of this.listEnabled()) {
      const handler = entry.handlers.get(functionName);
      const functionDef = entry.plugin.manifest.functions.find((f) => f.name === functionName);
      if (handler && functionDef) {
        return { plugin: entry, handler, functionDef };
      }
    }
    return null;
  }

  /**
   * Execute a function by name. Throws if no enabled plugin provides it.
   */
  async execute(
    functionName: string,
    args: Record<string, unknown>,
  ): Promise<{ pluginName: string; result: string }> {
    const found = this.findFunction(functionName);
    if (!found) {
      throw new Error(`No handler found for function "${functionName}"`);
    }
    const result = await found.handler(args);
    return { pluginName: found.plugin.plugin.manifest.name, result };
  }
}

/** Singleton registry instance */
export const pluginRegistry = new PluginRegistry();
