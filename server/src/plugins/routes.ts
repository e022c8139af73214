/**
 * Plugin REST API Routes.
 *
 * GET  /plugins                       List plugin manifests with their enabled flag
 * POST /plugins/invoke/:functionName  Call a plugin function, JSON body = arguments
 * POST /plugins/:name/toggle          Enable or disable a plugin, body { enabled }
 */

import { Router } from 'express';
import type { Request, Response } from 'express';
import type { PluginRegistry } from './registry.js';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function createPluginRoutes(registry: PluginRegistry): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      plugins: registry.list().map((entry) => ({
        ...entry.plugin.manifest,
        enabled: entry.enabled,
      })),
    });
  });

  /**
   * POST /plugins/invoke/:functionName
   * Body: the function's arguments as a JSON object
   */
  router.post('/invoke/:functionName', async (req: Request, res: Response) => {
    const { functionName } = req.params;
    const args: unknown = req.body ?? {};
    if (!isRecord(args)) {
      res.status(400).json({ error: 'Request body must be a JSON object of arguments' });
      return;
    }

    if (!registry.findFunction(functionName)) {
      res.status(404).json({ error: `Unknown function "${functionName}"` });
      return;
    }

    try {
      const { pluginName, result } = await registry.execute(functionName, args);
      res.json({ plugin: pluginName, function: functionName, result: JSON.parse(result) });
    } catch (err) {
      console.error(`[Plugins] Function "${functionName}" failed:`, err);
      res.status(500).json({ error: 'Function execution failed' });
    }
  });

  /**
   * POST /plugins/:name/toggle
   * Body: { enabled: boolean }
   */
  router.post('/:name/toggle', (req: Request, res: Response) => {
    const body: unknown = req.body;
    if (!isRecord(body) || typeof body.enabled !== 'boolean') {
      res.status(400).json({ error: 'Required field: enabled (boolean)' });
      return;
    }

    if (!registry.setEnabled(req.params.name, body.enabled)) {
      res.status(404).json({ error: `Plugin "${req.params.name}" not found` });
      return;
    }
    res.json({ name: req.params.name, enabled: body.enabled });
  });

  return router;
}
