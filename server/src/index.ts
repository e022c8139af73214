import 'dotenv/config';
import { createServer } from 'http';
import { WebSocketServer } from 'ws';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { loadBuiltinPlugins } from './plugins/loader.js';
import { handleConnection } from './websocket/handler.js';

const config = loadConfig();

const app = createApp();
const server = createServer(app);

// Load built-in plugins (currency)
loadBuiltinPlugins(config).catch((err) => {
  console.error('[Ratebot] Failed to load plugins:', err);
});

// WebSocket server
const wss = new WebSocketServer({ server, path: '/ws' });

wss.on('connection', (ws, req) => {
  const clientIp = req.headers['x-forwarded-for'] || req.socket.remoteAddress;
  console.log(`[WS] New connection from ${clientIp}`);
  handleConnection(ws);
});

wss.on('error', (error) => {
  console.error('[WS] Server error:', error);
});

server.listen(config.port, config.host, () => {
  console.log(`[Ratebot] Server running on ${config.host}:${config.port}`);
  console.log(`[Ratebot] WebSocket endpoint: ws://${config.host}:${config.port}/ws`);
  console.log(`[Ratebot] Health check: http://${config.host}:${config.port}/health`);
});
