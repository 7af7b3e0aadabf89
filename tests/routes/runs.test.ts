import express from 'express';
import request from 'supertest';
import { DiscoveryOrchestrator } from '../../src/discovery/orchestrator.js';
import { MemoryRunHistory } from '../../src/lib/run-history.js';
import { memoryRunLogs, type RunLogStore } from '../../src/lib/run-logger.js';
import { createRunsRouter } from '../../src/routes/runs.js';
import { deferred, waitFor, type Deferred } from '../helpers/lots.js';
import { testOptions } from '../helpers/orchestrator.js';

describe('runs router', () => {
  let gate: Deferred<void>;
  let history: MemoryRunHistory;
  let logs: RunLogStore;
  let orchestrator: DiscoveryOrchestrator;
  let app: express.Application;

  beforeEach(() => {
    gate = deferred();
    history = new MemoryRunHistory();
    logs = memoryRunLogs();
    orchestrator = new DiscoveryOrchestrator(
      testOptions({
        history,
        logSink: logs.sink,
        streams: [
          {
            name: 'summary',
            source: 'summary',
            run: async ({ emit }) => {
              await gate.promise;
              await emit([{ lot_id: 1 }]);
            },
          },
        ],
      }),
    );
    app = express();
    app.use(createRunsRouter({ orchestrator, history, logs }));
  });

  afterEach(async () => {
    gate.resolve();
    await waitFor(() => !orchestrator.isRunning);
  });

  it('starts a run in the background and refuses a second one', async () => {
    const started = await request(app).post('/runs');
    expect(started.status).toBe(202);
    expect(typeof started.body.runId).toBe('string');

    const again = await request(app).post('/runs');
    expect(again.status).toBe(409);
    expect(again.body).toEqual({ error: 'A discovery run is already in progress', runId: started.body.runId });
  });

  it('serves the live run, then the stored summary', async () => {
    const { body } = await request(app).post('/runs');

    const live = await request(app).get(`/runs/${body.runId}`);
    expect(live.status).toBe(200);
    expect(live.body).toMatchObject({ runId: body.runId, phase: 'fetching' });

    gate.resolve();
    await waitFor(() => !orchestrator.isRunning);

    const done = await request(app).get(`/runs/${body.runId}`);
    expect(done.body).toMatchObject({ runId: body.runId, phase: 'done', lotsDiscovered: 1 });

    const list = await request(app).get('/runs');
    expect(list.body.running).toBeNull();
    expect(list.body.runs.map((r: { runId: string }) => r.runId)).toEqual([body.runId]);
  });

  it('returns 404 for an unknown run', async () => {
    const response = await request(app).get('/runs/nope');

    expect(response.status).toBe(404);
    expect(response.body).toEqual({ error: 'Run nope not found' });
  });

  it('serves the flushed log of a finished run', async () => {
    const { body } = await request(app).post('/runs');
    gate.resolve();
    await waitFor(() => !orchestrator.isRunning);

    const response = await request(app).get(`/runs/${body.runId}/logs`);
    expect(response.status).toBe(200);
    expect(response.body.runId).toBe(body.runId);
    expect(response.body.entries.at(-1).msg).toBe('[discovery] run finished');

    expect((await request(app).get('/runs/nope/logs')).status).toBe(404);
  });
});
