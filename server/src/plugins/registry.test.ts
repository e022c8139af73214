import { PluginRegistry } from './registry.js';
import { plainReply, type MessagePlugin, type PluginManifest, type PluginResult } from './base.js';

function makeManifest(name: string, functions: string[] = []): PluginManifest {
  return {
    name,
    version: '0.1.0',
    description: `${name} plugin`,
    author: 'Test',
    commands: [],
    permissions: [],
    functions: functions.map((fn) => ({
      name: fn,
      description: `${fn} function`,
      parameters: { type: 'object', properties: {} },
    })),
  };
}

function makePlugin(
  name: string,
  handleMessage: (text: string) => Promise<PluginResult>,
  functions: Record<string, string> = {},
): MessagePlugin {
  const handlers = Object.fromEntries(
    Object.entries(functions).map(([fn, result]) => [fn, async () => result]),
  );
  return { manifest: makeManifest(name, Object.keys(functions)), handlers, handleMessage };
}

const echo = makePlugin(
  'echo',
  async (text) => (text.startsWith('echo ') ? { status: 'handled', replies: [plainReply(text.slice(5))] } : { status: 'not_matched' }),
  { echo_fn: '{"ok":true}' },
);

const catchAll = makePlugin('catch-all', async () => ({ status: 'handled', replies: [plainReply('caught')] }));

describe('PluginRegistry', () => {
  let registry: PluginRegistry;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
    registry = new PluginRegistry();
  });

  it('registers plugins enabled', () => {
    registry.register(echo);
    expect(registry.get('echo')?.enabled).toBe(true);
    expect(registry.listManifests().map((m) => m.name)).toEqual(['echo']);
  });

  it('leaves out functions that have no handler', () => {
    registry.register({ ...echo, manifest: makeManifest('partial', ['echo_fn', 'missing_fn']) });

    expect(registry.get('partial')?.handlers.size).toBe(1);
    expect(registry.findFunction('missing_fn')).toBeNull();
    expect(console.warn).toHaveBeenCalledTimes(1);
  });

  it('dispatches to the first plugin that matches', async () => {
    registry.register(echo);
    registry.register(catchAll);

    expect(await registry.dispatch('echo hi')).toEqual({
      pluginName: 'echo',
      result: { status: 'handled', replies: [{ text: 'hi', format: 'plain' }] },
    });
    expect((await registry.dispatch('something else')).pluginName).toBe('catch-all');
  });

  it('skips disabled plugins', async () => {
    registry.register(echo);
    expect(registry.setEnabled('echo', false)).toBe(true);

    expect(await registry.dispatch('echo hi')).toEqual({ pluginName: null, result: { status: 'not_matched' } });
    expect(registry.listEnabled()).toEqual([]);
  });

  it('returns false when toggling an unknown plugin', () => {
    expect(registry.setEnabled('nope', true)).toBe(false);
  });

  it('turns a throwing plugin into an error result', async () => {
    registry.register(
      makePlugin('broken', async () => {
        throw new Error('kaput');
      }),
    );

    expect(await registry.dispatch('anything')).toEqual({
      pluginName: 'broken',
      result: { status: 'error', detail: 'kaput', replies: [] },
    });
  });

  it('exposes enabled functions as function calling tools', () => {
    registry.register(echo);

    expect(registry.toFunctionCallingTools()).toEqual([
      {
        type: 'function',
        function: {
          name: 'echo_fn',
          description: 'echo_fn function',
          parameters: { type: 'object', properties: {} },
        },
      },
    ]);

    registry.setEnabled('echo', false);
    expect(registry.toFunctionCallingTools()).toEqual([]);
  });

  it('executes a function by name', async () => {
    registry.register(echo);
    expect(await registry.execute('echo_fn', {})).toEqual({ pluginName: 'echo', result: '{"ok":true}' });
  });

  it('throws for an unknown function', async () => {
    await expect(registry.execute('nope', {})).rejects.toThrow('No handler found for function "nope"');
  });
});
