import express from 'express';
import type { DiscoveryOrchestrator } from './discovery/orchestrator.js';
import type { LotStore } from './lib/lot-store.js';
import type { RunHistory } from './lib/run-history.js';
import type { RunLogStore } from './lib/run-logger.js';
import { createLotsRouter } from './routes/lots.js';
import { createRunsRouter } from './routes/runs.js';

export type AppDeps = {
  store: LotStore;
  history: RunHistory;
  logs: RunLogStore;
  orchestrator: DiscoveryOrchestrator;
};

export function createApp(deps: AppDeps) {
  const app = express();
  app.use(express.json({ limit: '1mb' }));

  // health
  app.get('/health', (_req, res) => res.json({ ok: true, running: deps.orchestrator.isRunning }));

  app.use(createLotsRouter(deps.store));
  app.use(createRunsRouter(deps));

  return app;
}
