/**
 * Ratebot WebSocket Protocol v1
 * Shared type definitions for client-server communication.
 */

import type { PluginManifest, ReplyFormat } from '../plugins/base.js';

// ===== Enums =====

export enum MessageType {
  // Client -> Server
  CHAT_SEND = 'chat.send',
  PLUGIN_LIST_REQUEST = 'plugin.list.request',
  PLUGIN_TOGGLE = 'plugin.toggle',

  // Server -> Client
  CONNECTED = 'connected',
  CHAT_REPLY = 'chat.reply',
  CHAT_DONE = 'chat.done',
  PLUGIN_LIST_RESPONSE = 'plugin.list.response',
  ERROR = 'error',

  // Bidirectional
  PING = 'ping',
  PONG = 'pong',
}

export enum ErrorCode {
  INVALID_MESSAGE = 'INVALID_MESSAGE',
  PLUGIN_ERROR = 'PLUGIN_ERROR',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

// ===== Base =====

export interface BaseMessage {
  id: string;
  type: MessageType;
  timestamp: number;
}

// ===== Client -> Server =====

export interface ChatSendMessage extends BaseMessage {
  type: MessageType.CHAT_SEND;
  payload: {
    conversationId: string;
    content: string;
  };
}

export interface PluginListRequestMessage extends BaseMessage {
  type: MessageType.PLUGIN_LIST_REQUEST;
}

export interface PluginToggleMessage extends BaseMessage {
  type: MessageType.PLUGIN_TOGGLE;
  payload: {
    pluginName: string;
    enabled: boolean;
  };
}

// ===== Server -> Client =====

export interface ConnectedMessage extends BaseMessage {
  type: MessageType.CONNECTED;
  payload: {
    sessionId: string;
    plugins: string[];
  };
}

export interface ChatReplyMessage extends BaseMessage {
  type: MessageType.CHAT_REPLY;
  payload: {
    conversationId: string;
    content: string;
    format: ReplyFormat;
    keyboard?: string[][];
  };
}

export interface ChatDoneMessage extends BaseMessage {
  type: MessageType.CHAT_DONE;
  payload: {
    conversationId: string;
    /** false when no plugin recognised the message */
    handled: boolean;
    pluginName?: string;
  };
}

export interface PluginListResponseMessage extends BaseMessage {
  type: MessageType.PLUGIN_LIST_RESPONSE;
  payload: {
    plugins: PluginManifestInfo[];
  };
}

export interface PluginManifestInfo {
  name: string;
  version: string;
  description: string;
  enabled: boolean;
  emoji?: string;
  commands: string[];
  functions: Array<{ name: string; description: string }>;
}

export interface ErrorMessage extends BaseMessage {
  type: MessageType.ERROR;
  payload: {
    code: ErrorCode;
    message: string;
    conversationId?: string;
  };
}

// ===== Bidirectional =====

export interface PingMessage extends BaseMessage {
  type: MessageType.PING;
}

export interface PongMessage extends BaseMessage {
  type: MessageType.PONG;
}

// ===== Union =====

export type ClientMessage =
  | ChatSendMessage
  | PluginListRequestMessage
  | PluginToggleMessage
  | PingMessage;

export type ServerMessage =
  | ConnectedMessage
  | ChatReplyMessage
  | ChatDoneMessage
  | PluginListResponseMessage
  | ErrorMessage
  | PongMessage;

export function toManifestInfo(manifest: PluginManifest, enabled: boolean): PluginManifestInfo {
  return {
    name: manifest.name,
    version: manifest.version,
    description: manifest.description,
    enabled,
    emoji: manifest.emoji,
    commands: manifest.commands,
    functions: manifest.functions.map((f) => ({ name: f.name, description: f.description })),
  };
}
