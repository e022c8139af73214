/**
 * Plugin contracts shared by the registry, the WebSocket handler and the HTTP routes.
 */

// ============================================================
// 1. PluginManifest: what a plugin is and what it exposes
// ============================================================

export interface PluginManifest {
  /** Unique plugin identifier, e.g. "currency" */
  name: string;
  /** Semver version */
  version: string;
  /** Human-readable description (also shown to LLM for tool selection) */
  description: string;
  author: string;

  /** Slash commands the plugin answers, without the leading slash */
  commands: string[];

  /** Required permissions */
  permissions: PluginPermission[];

  /** Function definitions in OpenAI Function Calling format */
  functions: PluginFunction[];

  category?: PluginCategory;
  /** Emoji icon shown next to the plugin name */
  emoji?: string;
}

export type PluginCategory = 'tools' | 'knowledge' | 'finance' | 'general';

export type PluginPermission = 'network' | 'filesystem';

export interface PluginFunction {
  name: string;
  description: string;
  parameters: Record<string, unknown>; // JSON Schema
}

/** Function handler: receives parsed arguments, returns a JSON string result */
export type PluginFunctionHandler = (args: Record<string, unknown>) => Promise<string>;

// ============================================================
// 2. Message handling
// ============================================================

export type ReplyFormat = 'plain' | 'markdown';

export interface PluginReply {
  text: string;
  format: ReplyFormat;
  /** Reply keyboard rows; omitted when the current keyboard stays */
  keyboard?: string[][];
}

/**
 * Outcome of offering a message to a plugin.
 * `not_matched` lets the host try the next plugin.
 */
export type PluginResult =
  | { status: 'handled'; replies: PluginReply[] }
  | { status: 'not_matched' }
  | { status: 'error'; detail: string; replies: PluginReply[] };

export interface MessagePlugin {
  readonly manifest: PluginManifest;
  /** One handler per manifest function, keyed by function name */
  readonly handlers: Record<string, PluginFunctionHandler>;
  handleMessage(text: string): Promise<PluginResult>;
}

export function plainReply(text: string, keyboard?: string[][]): PluginReply {
  return keyboard ? { text, format: 'plain', keyboard } : { text, format: 'plain' };
}

export function markdownReply(text: string, keyboard?: string[][]): PluginReply {
  return keyboard ? { text, format: 'markdown', keyboard } : { text, format: 'markdown' };
}
