import express from 'express';
import type { Express } from 'express';
import { pluginRegistry, type PluginRegistry } from './plugins/registry.js';
import { createPluginRoutes } from './plugins/routes.js';

export function createApp(registry: PluginRegistry = pluginRegistry): Express {
  const app = express();

  // Parse JSON bodies
  app.use(express.json());

  // Plugin management routes
  app.use('/plugins', createPluginRoutes(registry));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: Date.now() });
  });

  return app;
}
