import express from 'express';
import { randomUUID } from 'crypto';
import type { DiscoveryOrchestrator } from '../discovery/orchestrator.js';
import type { RunHistory } from '../lib/run-history.js';
import type { RunLogStore } from '../lib/run-logger.js';
import { errorMessage } from '../sources/types.js';

export type RunsRouterDeps = {
  orchestrator: DiscoveryOrchestrator;
  history: RunHistory;
  logs: RunLogStore;
};

/**
 *   POST /runs       start a discovery run in the background (202, or 409 while one is running)
 *   GET  /runs       recent run summaries, newest first
 *   GET  /runs/:id   one summary (the live one while it runs)
 *   GET  /runs/:id/logs  log entries flushed for a finished run
 */
export function createRunsRouter({ orchestrator, history, logs }: RunsRouterDeps) {
  const router = express.Router();

  router.post('/runs', (_req, res) => {
    if (orchestrator.isRunning) {
      return res.status(409).json({ error: 'A discovery run is already in progress', runId: orchestrator.currentRun?.runId });
    }

    const runId = randomUUID();
    orchestrator.run({ runId }).catch((err) => {
      console.error(`[runs] run ${runId} crashed:`, errorMessage(err));
    });
    res.status(202).json({ runId });
  });

  router.get('/runs', async (req, res) => {
    const raw = Number(req.query.limit ?? 20);
    const limit = Number.isInteger(raw) && raw > 0 ? Math.min(raw, 100) : 20;
    try {
      const runs = await history.list(limit);
      const live = orchestrator.currentRun;
      res.json({ running: live, runs });
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  router.get('/runs/:id', async (req, res) => {
    const live = orchestrator.currentRun;
    if (live && live.runId === req.params.id) return res.json(live);

    try {
      const stats = await history.get(req.params.id);
      if (!stats) return res.status(404).json({ error: `Run ${req.params.id} not found` });
      res.json(stats);
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  router.get('/runs/:id/logs', async (req, res) => {
    try {
      const entries = await logs.read(req.params.id);
      if (entries.length === 0 && !(await history.get(req.params.id))) {
        return res.status(404).json({ error: `Run ${req.params.id} not found` });
      }
      res.json({ runId: req.params.id, entries });
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  return router;
}
