import type { AppConfig } from '../config.js';
import { sessionFromCredentials, type AuthSession } from '../lib/auth-session.js';
import { BidAugmenter } from '../lib/bid-augmenter.js';
import { MemoryLotStore, RedisLotStore, type LotStore } from '../lib/lot-store.js';
import { MemoryRunHistory, RedisRunHistory, type RunHistory } from '../lib/run-history.js';
import { createConsoleLogger, memoryRunLogs, redisRunLogs, type RunLogStore } from '../lib/run-logger.js';
import { createUpstashClient, isUpstashConfigured } from '../lib/upstash.js';
import { createSourceClients, type SourceClients } from '../sources/index.js';
import { DiscoveryOrchestrator, cursorStream, summaryStream, type DiscoveryStream } from './orchestrator.js';

export type Discovery = {
  store: LotStore;
  history: RunHistory;
  logs: RunLogStore;
  orchestrator: DiscoveryOrchestrator;
  clients: SourceClients;
  session: AuthSession | null;
};

export type DiscoveryOverrides = {
  store?: LotStore;
  history?: RunHistory;
  logs?: RunLogStore;
  session?: AuthSession | null;
};

export function buildStreams(c: AppConfig, clients: SourceClients, session: AuthSession | null): DiscoveryStream[] {
  const streams: DiscoveryStream[] = [];

  if (clients.summary) streams.push(summaryStream(clients.summary));

  if (clients.search) {
    for (const term of c.search.terms) {
      streams.push(cursorStream(`search:${term.label}`, clients.search, clients.search.firstCursor(term)));
    }
  }

  if (clients.rendered && c.rendered.seedLotIds.length > 0) {
    streams.push(
      cursorStream('rendered:seed', clients.rendered, clients.rendered.firstCursor(c.rendered.seedLotIds, session)),
    );
  }

  return streams;
}

/**
 * Wire clients, store, history and orchestrator from configuration.
 * Without Upstash credentials everything is kept in memory.
 */
export function buildDiscovery(c: AppConfig, overrides: DiscoveryOverrides = {}): Discovery {
  const redis = isUpstashConfigured(c.redis) ? createUpstashClient(c.redis) : null;
  const store = overrides.store ?? (redis ? new RedisLotStore(redis) : new MemoryLotStore());
  const history = overrides.history ?? (redis ? new RedisRunHistory(redis) : new MemoryRunHistory());
  const logs = overrides.logs ?? (redis ? redisRunLogs(redis) : memoryRunLogs());

  const clients = createSourceClients(c, createConsoleLogger('sources'));
  const session = overrides.session !== undefined ? overrides.session : sessionFromCredentials(c.session);

  const augmenter = clients.rendered
    ? new BidAugmenter(clients.rendered, store, {
        freshnessMs: c.discovery.bidFreshnessMs,
        logger: createConsoleLogger('augment'),
      })
    : null;

  const orchestrator = new DiscoveryOrchestrator({
    store,
    streams: buildStreams(c, clients, session),
    augmenter,
    session,
    history,
    logSink: logs.sink,
    concurrency: c.discovery.concurrency,
    fetchTimeoutMs: c.discovery.fetchTimeoutMs,
    augmentBatchSize: c.discovery.augmentBatchSize,
    augmentConcurrency: c.discovery.augmentConcurrency,
    excludeSameDayClosing: c.discovery.excludeSameDayClosing,
    runTimeoutMs: c.discovery.runTimeoutMs,
    rankedLimit: c.discovery.rankedLimit,
    scoring: { weights: c.scoring.weights, freshnessMs: c.discovery.bidFreshnessMs },
  });

  return { store, history, logs, orchestrator, clients, session };
}
