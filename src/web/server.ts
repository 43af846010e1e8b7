import express from 'express';
import type { Server } from 'http';
import { z } from 'zod';
import { config } from '../config.js';
import { logger } from '../core/logger.js';
import { errorMessage } from '../core/errors.js';
import { createOrchestrator } from '../pipeline/factory.js';
import type { FinalArtifact } from '../pipeline/types.js';

export interface HarvestRunner {
  run(query: string, deadlineMs?: number): Promise<FinalArtifact>;
}

const harvestRequestSchema = z.object({
  query: z.string().trim().min(1, 'query must not be empty'),
  timeoutSeconds: z.number().positive().max(3600).optional(),
});

export function createApp(runner: HarvestRunner) {
  const app = express();

  // JSON parsing
  app.use(express.json());

  app.get('/api/health', (req, res) => {
    res.json({
      status: 'ok',
      uptimeSeconds: Math.round(process.uptime()),
    });
  });

  app.post('/api/harvest', async (req, res) => {
    const parsed = harvestRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: 'Invalid request', issues: parsed.error.issues.map(issue => issue.message) });
    }

    const { query, timeoutSeconds } = parsed.data;
    try {
      const artifact = await runner.run(query, timeoutSeconds !== undefined ? Math.round(timeoutSeconds * 1000) : undefined);
      res.json(artifact);
    } catch (error) {
      logger.error(`Harvest for "${query}" failed`, { error: errorMessage(error) });
      res.status(500).json({ error: 'Harvest failed. Check server logs.' });
    }
  });

  return app;
}

export function startServer(runner: HarvestRunner = createOrchestrator(config)): Server {
  const app = createApp(runner);
  return app.listen(config.port, () => {
    logger.info(`Harvest API listening at http://localhost:${config.port}`);
  });
}
