import { WebSocket } from 'ws';
import { v4 as uuidv4 } from 'uuid';
import {
  MessageType,
  ErrorCode,
  toManifestInfo,
  type ClientMessage,
  type ServerMessage,
  type ChatSendMessage,
  type PluginToggleMessage,
} from '../types/protocol.js';
import { pluginRegistry, type PluginRegistry } from '../plugins/registry.js';

/** Sends one server message; bound to a socket in handleConnection */
export type SendFn = (message: ServerMessage) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate an inbound frame. Returns null for anything that is not a
 * well-formed client message.
 */
export function parseClientMessage(raw: string): ClientMessage | null {
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(data) || typeof data.type !== 'string') return null;

  const id = typeof data.id === 'string' ? data.id : uuidv4();
  const timestamp = typeof data.timestamp === 'number' ? data.timestamp : Date.now();
  const payload = isRecord(data.payload) ? data.payload : {};

  switch (data.type) {
    case MessageType.CHAT_SEND:
      if (typeof payload.content !== 'string') return null;
      return {
        id,
        timestamp,
        type: MessageType.CHAT_SEND,
        payload: {
          conversationId: typeof payload.conversationId === 'string' ? payload.conversationId : uuidv4(),
          content: payload.content,
        },
      };
    case MessageType.PLUGIN_LIST_REQUEST:
      return { id, timestamp, type: MessageType.PLUGIN_LIST_REQUEST };
    case MessageType.PLUGIN_TOGGLE:
      if (typeof payload.pluginName !== 'string' || typeof payload.enabled !== 'boolean') return null;
      return {
        id,
        timestamp,
        type: MessageType.PLUGIN_TOGGLE,
        payload: { pluginName: payload.pluginName, enabled: payload.enabled },
      };
    case MessageType.PING:
      return { id, timestamp, type: MessageType.PING };
    default:
      return null;
  }
}

function sendError(send: SendFn, code: ErrorCode, message: string, conversationId?: string): void {
  send({
    id: uuidv4(),
    type: MessageType.ERROR,
    timestamp: Date.now(),
    payload: { code, message, conversationId },
  });
}

async function handleChatSend(
  send: SendFn,
  registry: PluginRegistry,
  message: ChatSendMessage,
): Promise<void> {
  const { conversationId, content } = message.payload;
  const { pluginName, result } = await registry.dispatch(content);

  if (result.status !== 'not_matched') {
    for (const reply of result.replies) {
      send({
        id: uuidv4(),
        type: MessageType.CHAT_REPLY,
        timestamp: Date.now(),
        payload: {
          conversationId,
          content: reply.text,
          format: reply.format,
          ...(reply.keyboard ? { keyboard: reply.keyboard } : {}),
        },
      });
    }
  }

  if (result.status === 'error') {
    sendError(send, ErrorCode.PLUGIN_ERROR, `Plugin "${pluginName}" could not complete the request`, conversationId);
  }

  send({
    id: uuidv4(),
    type: MessageType.CHAT_DONE,
    timestamp: Date.now(),
    payload: {
      conversationId,
      handled: result.status !== 'not_matched',
      ...(pluginName ? { pluginName } : {}),
    },
  });
}

function handlePluginList(send: SendFn, registry: PluginRegistry): void {
  send({
    id: uuidv4(),
    type: MessageType.PLUGIN_LIST_RESPONSE,
    timestamp: Date.now(),
    payload: {
      plugins: registry.list().map((entry) => toManifestInfo(entry.plugin.manifest, entry.enabled)),
    },
  });
}

function handlePluginToggle(send: SendFn, registry: PluginRegistry, message: PluginToggleMessage): void {
  const { pluginName, enabled } = message.payload;
  if (!registry.setEnabled(pluginName, enabled)) {
    sendError(send, ErrorCode.INVALID_MESSAGE, `Plugin "${pluginName}" not found`);
    return;
  }
  handlePluginList(send, registry);
}

/**
 * Handle one inbound frame. Errors are reported to the client, never thrown.
 */
export async function handleClientMessage(
  raw: string,
  send: SendFn,
  registry: PluginRegistry = pluginRegistry,
): Promise<void> {
  const message = parseClientMessage(raw);
  if (!message) {
    sendError(send, ErrorCode.INVALID_MESSAGE, 'Invalid or unknown message');
    return;
  }

  try {
    switch (message.type) {
      case MessageType.CHAT_SEND:
        await handleChatSend(send, registry, message);
        break;

      case MessageType.PLUGIN_LIST_REQUEST:
        handlePluginList(send, registry);
        break;

      case MessageType.PLUGIN_TOGGLE:
        handlePluginToggle(send, registry, message);
        break;

      case MessageType.PING:
        send({ id: uuidv4(), type: MessageType.PONG, timestamp: Date.now() });
        break;
    }
  } catch (error) {
    console.error('[WS] Handler error:', error);
    sendError(send, ErrorCode.INTERNAL_ERROR, 'Internal error');
  }
}

export function handleConnection(ws: WebSocket, registry: PluginRegistry = pluginRegistry): void {
  const sessionId = uuidv4();
  const send: SendFn = (message) => {
    if (ws.readyState === WebSocket.OPEN) {
      ws.send(JSON.stringify(message));
    }
  };

  send({
    id: uuidv4(),
    type: MessageType.CONNECTED,
    timestamp: Date.now(),
    payload: {
      sessionId,
      plugins: registry.listEnabled().map((entry) => entry.plugin.manifest.name),
    },
  });

  ws.on('message', (data) => {
    handleClientMessage(data.toString(), send, registry).catch((err) => {
      console.error('[WS] Unhandled message error:', err);
    });
  });

  // Keep-alive ping every 30 seconds to prevent NAT/firewall timeout
  const pingInterval = setInterval(() => {
    if (ws.readyState === ws.OPEN) {
      ws.ping();
    }
  }, 30000);

  ws.on('close', () => {
    clearInterval(pingInterval);
    console.log(`[WS] Session ${sessionId} disconnected`);
  });

  // Client protocol violations (bad RSV bits, invalid UTF-8) arrive here
  ws.on('error', (error) => {
    console.error(`[WS] Session ${sessionId} error:`, error);
  });
}
