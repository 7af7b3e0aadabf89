/**
 * Discovery run: fetch every channel, reconcile into the store, refresh bid
 * state for open lots, re-score, and return the ranked open lots.
 *
 *   idle → fetching → reconciling → augmenting → scoring → done | failed
 *
 * A run fails only when every configured channel failed, nothing is
 * configured, or it was cancelled / timed out. Anything less is recorded as
 * a warning and the run still completes. Each channel fetches on its own
 * pool, and the fetch deadline ends the fetching phase without failing the run.
 */

import { randomUUID } from 'crypto';
import type { Lot, RawRecord, SourceTag } from '../types/lot.js';
import type { AuthSession } from '../lib/auth-session.js';
import type { AugmentOutcome, BidAugmenter } from '../lib/bid-augmenter.js';
import { canonicalizeBatch } from '../lib/canonicalize.js';
import type { LotStore } from '../lib/lot-store.js';
import { mapLimit } from '../lib/map-limit.js';
import { cancelledError } from '../lib/retry.js';
import type { RunHistory, RunPhase, RunStats, StreamReport } from '../lib/run-history.js';
import { createRunLogger, type LogSink, type Logger, type RunLogger } from '../lib/run-logger.js';
import { applyScores, type ScoringOptions } from '../lib/scoring.js';
import { isCancelled } from '../lib/source-http.js';
import type { SummaryClient, SummaryCursor } from '../sources/summary-client.js';
import { SessionExpiredError, errorMessage, type SourceClient } from '../sources/types.js';

export type StreamContext = {
  signal: AbortSignal;
  logger: Logger;
  /** Hand one fetched page to canonicalization and the store */
  emit(records: RawRecord[]): Promise<void>;
};

export interface DiscoveryStream {
  readonly name: string;
  readonly source: SourceTag;
  run(ctx: StreamContext): Promise<void>;
}

/** Walk a cursor stream page by page until the client says it's exhausted */
export function cursorStream<C>(name: string, client: SourceClient<C>, first: C): DiscoveryStream {
  return {
    name,
    source: client.source,
    async run({ signal, emit }) {
      let cursor: C | null = first;
      while (cursor !== null) {
        const page = await client.fetchPage(cursor, signal);
        await emit(page.records);
        cursor = page.hasMore ? page.nextCursor : null;
      }
    },
  };
}

/** Locate the last page first, then read pages 1..last in order */
export function summaryStream(client: SummaryClient): DiscoveryStream {
  return {
    name: 'summary',
    source: client.source,
    async run({ signal, emit, logger }) {
      const last = await client.findLastPage(undefined, signal);
      logger.info(`${last} page(s) available`);

      let cursor: SummaryCursor | null = last > 0 ? client.firstCursor() : null;
      while (cursor !== null) {
        const page = await client.fetchPage(cursor, signal);
        if (page.records.length === 0) break;
        await emit(page.records);
        cursor = page.nextCursor;
      }
    },
  };
}

export type OrchestratorOptions = {
  store: LotStore;
  streams: DiscoveryStream[];
  augmenter?: BidAugmenter | null;
  session?: AuthSession | null;
  history?: RunHistory | null;
  logSink?: LogSink;

  concurrency: number;
  /** Budget for the fetching phase; defaults to three quarters of runTimeoutMs */
  fetchTimeoutMs?: number;
  augmentBatchSize: number;
  augmentConcurrency: number;
  excludeSameDayClosing: boolean;
  runTimeoutMs: number;
  rankedLimit: number;
  scoring: ScoringOptions;

  now?: () => number;
  /** No console output from run loggers */
  quiet?: boolean;
};

export type RunOptions = {
  runId?: string;
  signal?: AbortSignal;
};

export type RunResult = {
  stats: RunStats;
  ranked: Lot[];
};

export function newRunStats(runId: string, startedAt: number): RunStats {
  return {
    runId,
    phase: 'idle',
    startedAt,
    finishedAt: null,
    recordsFetched: 0,
    unmappable: 0,
    lotsDiscovered: 0,
    lotsAugmented: 0,
    lotsUpdated: 0,
    lotsDegraded: 0,
    augmentFailures: 0,
    lotsScored: 0,
    sourcesFailed: [],
    streams: [],
    sessionExpired: false,
    warnings: [],
    error: null,
  };
}

/**
 * Split the pool between channels: every channel gets at least one worker,
 * channels with more streams take the remainder.
 */
export function channelPools(streams: readonly DiscoveryStream[], concurrency: number): Array<[DiscoveryStream[], number]> {
  const bySource = new Map<SourceTag, DiscoveryStream[]>();
  for (const stream of streams) {
    const group = bySource.get(stream.source) ?? [];
    group.push(stream);
    bySource.set(stream.source, group);
  }

  const groups = Array.from(bySource.values()).sort((a, b) => b.length - a.length);
  const base = Math.floor(concurrency / groups.length);
  const extra = concurrency % groups.length;
  return groups.map((group, i) => [group, Math.max(1, base + (i < extra ? 1 : 0))]);
}

function byClosingSoonest(a: Lot, b: Lot): number {
  if (a.closesAt !== b.closesAt) {
    if (a.closesAt === null) return 1;
    if (b.closesAt === null) return -1;
    return a.closesAt - b.closesAt;
  }
  return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
}

export class DiscoveryOrchestrator {
  private active: RunStats | null = null;
  private readonly now: () => number;

  constructor(private readonly options: OrchestratorOptions) {
    this.now = options.now ?? Date.now;
  }

  get isRunning(): boolean {
    return this.active !== null;
  }

  /** Snapshot of the run in progress, if any */
  get currentRun(): RunStats | null {
    return this.active ? structuredClone(this.active) : null;
  }

  async run(runOptions: RunOptions = {}): Promise<RunResult> {
    if (this.active) throw new Error('A discovery run is already in progress');

    const stats = newRunStats(runOptions.runId ?? randomUUID(), this.now());
    this.active = stats;

    const logger = createRunLogger(stats.runId, {
      prefix: 'discovery',
      sink: this.options.logSink,
      quiet: this.options.quiet,
      now: this.now,
    });

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (runOptions.signal?.aborted) controller.abort();
    runOptions.signal?.addEventListener('abort', onAbort, { once: true });

    let timedOut = false;
    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.options.runTimeoutMs);

    let ranked: Lot[] = [];
    try {
      try {
        ranked = await this.execute(stats, logger, controller.signal);
        this.transition(stats, logger, 'done');
      } catch (err) {
        stats.error = isCancelled(err)
          ? timedOut
            ? `Run timed out after ${this.options.runTimeoutMs}ms`
            : 'Run cancelled'
          : errorMessage(err);
        this.transition(stats, logger, 'failed');
        logger.error(`run failed: ${stats.error}`);
      } finally {
        clearTimeout(timer);
        runOptions.signal?.removeEventListener('abort', onAbort);
      }

      stats.finishedAt = this.now();
      logger.info('run finished', {
        phase: stats.phase,
        lotsDiscovered: stats.lotsDiscovered,
        lotsAugmented: stats.lotsAugmented,
        lotsDegraded: stats.lotsDegraded,
        sourcesFailed: stats.sourcesFailed,
        ranked: ranked.length,
      });
      await this.persist(stats, logger);
    } finally {
      this.active = null;
    }

    return { stats: structuredClone(stats), ranked };
  }

  private transition(stats: RunStats, logger: Logger, phase: RunPhase) {
    logger.debug(`${stats.phase} → ${phase}`);
    stats.phase = phase;
  }

  private async persist(stats: RunStats, logger: RunLogger) {
    try {
      await logger.flush();
    } catch (err) {
      console.error('[discovery] failed to flush run logs:', errorMessage(err));
    }
    if (!this.options.history) return;
    try {
      await this.options.history.save(stats);
    } catch (err) {
      console.error('[discovery] failed to save run summary:', errorMessage(err));
    }
  }

  private async execute(stats: RunStats, logger: RunLogger, signal: AbortSignal): Promise<Lot[]> {
    const { streams, store } = this.options;
    if (streams.length === 0) throw new Error('No discovery sources configured');

    this.transition(stats, logger, 'fetching');
    const discovered = new Set<string>();
    await this.fetchPhase(stats, discovered, logger, signal);

    this.transition(stats, logger, 'reconciling');
    this.summarizeSources(stats, logger);
    stats.lotsDiscovered = discovered.size;
    logger.info(`${discovered.size} distinct lot(s) from ${stats.recordsFetched} record(s)`, {
      unmappable: stats.unmappable,
    });

    this.transition(stats, logger, 'augmenting');
    const augmented = await this.augmentPhase(stats, logger, signal);

    this.transition(stats, logger, 'scoring');
    await this.scorePhase(stats, logger, new Set([...discovered, ...augmented]), signal);

    if (signal.aborted) throw cancelledError();
    return store.query({
      open: true,
      excludeSameDay: this.options.excludeSameDayClosing,
      limit: this.options.rankedLimit,
      now: this.now(),
    });
  }

  private async fetchPhase(stats: RunStats, discovered: Set<string>, logger: RunLogger, signal: AbortSignal) {
    const { streams, runTimeoutMs } = this.options;
    const fetchTimeoutMs = this.options.fetchTimeoutMs ?? Math.floor(runTimeoutMs * 0.75);

    const controller = new AbortController();
    const onAbort = () => controller.abort();
    if (signal.aborted) controller.abort();
    signal.addEventListener('abort', onAbort, { once: true });

    let cutOff = false;
    const timer = setTimeout(() => {
      cutOff = true;
      controller.abort();
    }, fetchTimeoutMs);

    try {
      const pools = channelPools(streams, this.options.concurrency);
      const settled = await Promise.allSettled(
        pools.map(([group, size]) =>
          mapLimit(group, size, (stream) => this.runStream(stream, stats, discovered, logger, controller.signal), controller.signal),
        ),
      );

      if (signal.aborted) throw cancelledError();
      for (const result of settled) {
        if (result.status === 'rejected' && !isCancelled(result.reason)) throw result.reason;
      }
    } finally {
      clearTimeout(timer);
      signal.removeEventListener('abort', onAbort);
    }

    // reports in configuration order, whichever pool started first
    const order = new Map(streams.map((stream, i) => [stream.name, i]));
    stats.streams.sort((a, b) => (order.get(a.name) ?? 0) - (order.get(b.name) ?? 0));

    if (cutOff) {
      const finished = stats.streams.filter((s) => s.status !== 'cancelled').length;
      const incomplete = streams.length - finished;
      if (incomplete > 0) {
        stats.warnings.push(`Fetching stopped after ${fetchTimeoutMs}ms; ${incomplete} stream(s) incomplete`);
        logger.warn(`fetch deadline reached with ${incomplete} stream(s) unfinished`);
      }
    }
  }

  private async runStream(
    stream: DiscoveryStream,
    stats: RunStats,
    discovered: Set<string>,
    logger: RunLogger,
    signal: AbortSignal,
  ): Promise<void> {
    const report: StreamReport = {
      name: stream.name,
      source: stream.source,
      pages: 0,
      records: 0,
      unmappable: 0,
      status: 'ok',
    };
    stats.streams.push(report);
    const log = logger.child(stream.name);

    const emit = async (records: RawRecord[]) => {
      report.pages++;
      report.records += records.length;
      stats.recordsFetched += records.length;

      const { lots, unmappable } = canonicalizeBatch(records, stream.source, this.now());
      if (unmappable > 0) {
        report.unmappable += unmappable;
        stats.unmappable += unmappable;
        log.debug(`${unmappable} record(s) without a lot id on page ${report.pages}`);
      }

      await mapLimit(lots, this.options.concurrency, (lot) => this.options.store.upsert(lot), signal);
      for (const lot of lots) discovered.add(lot.id);
    };

    try {
      await stream.run({ signal, logger: log, emit });
      log.info(`done: ${report.pages} page(s), ${report.records} record(s)`);
    } catch (err) {
      if (isCancelled(err)) {
        report.status = 'cancelled';
        return;
      }
      report.status = 'failed';
      report.error = errorMessage(err);
      log.error(`stream failed after ${report.pages} page(s): ${report.error}`);
    }
  }

  private summarizeSources(stats: RunStats, logger: Logger) {
    const configured = Array.from(new Set(stats.streams.map((s) => s.source)));
    const failedSources = configured.filter((source) =>
      stats.streams.filter((s) => s.source === source).every((s) => s.status === 'failed'),
    );
    stats.sourcesFailed = failedSources;

    if (failedSources.length === configured.length) {
      throw new Error(`All sources failed: ${failedSources.join(', ')}`);
    }

    for (const source of failedSources) {
      stats.warnings.push(`Source ${source} failed; results may be incomplete`);
    }
    for (const s of stats.streams) {
      if (s.status === 'failed' && !failedSources.includes(s.source)) {
        stats.warnings.push(`Stream ${s.name} failed: ${s.error ?? 'unknown error'}`);
      }
    }
    if (stats.warnings.length > 0) logger.warn(`${stats.warnings.length} warning(s)`, stats.warnings);
  }

  /** Returns the ids of the lots it attempted */
  private async augmentPhase(stats: RunStats, logger: RunLogger, signal: AbortSignal): Promise<string[]> {
    const { augmenter, session, store } = this.options;
    const log = logger.child('augment');

    if (!augmenter) {
      log.info('bid augmentation not configured');
      return [];
    }
    if (!session) {
      stats.warnings.push('Bid augmentation skipped: no authenticated session');
      log.warn('no authenticated session, skipping');
      return [];
    }

    const ts = this.now();
    const candidates = (
      await store.query({ open: true, excludeSameDay: this.options.excludeSameDayClosing, now: ts })
    )
      .filter((lot) => augmenter.needsAugment(lot, ts))
      .sort(byClosingSoonest)
      .slice(0, this.options.augmentBatchSize);
    log.info(`${candidates.length} lot(s) need fresh bid state`);

    let renewal: Promise<boolean> | null = null;
    let sessionDead = false;

    const renewOnce = (): Promise<boolean> => {
      if (!renewal) {
        log.warn('session rejected, renewing');
        renewal = session.renew().then(
          () => true,
          (err: unknown) => {
            log.error(`session renewal failed: ${errorMessage(err)}`);
            return false;
          },
        );
      }
      return renewal;
    };

    const attempt = async (lot: Lot): Promise<AugmentOutcome | null> => {
      if (sessionDead) return null;
      try {
        return await augmenter.augment(lot, session, signal);
      } catch (err) {
        if (!(err instanceof SessionExpiredError)) throw err;
        if (!(await renewOnce())) {
          sessionDead = true;
          return null;
        }
        try {
          return await augmenter.augment(lot, session, signal);
        } catch (retryErr) {
          if (!(retryErr instanceof SessionExpiredError)) throw retryErr;
          sessionDead = true;
          return null;
        }
      }
    };

    const outcomes = await mapLimit(candidates, this.options.augmentConcurrency, attempt, signal);

    for (const outcome of outcomes) {
      if (!outcome) continue;
      switch (outcome.status) {
        case 'updated':
          stats.lotsAugmented++;
          stats.lotsUpdated++;
          break;
        case 'unchanged':
          stats.lotsAugmented++;
          break;
        case 'degraded':
          stats.lotsDegraded++;
          break;
        case 'failed':
          stats.augmentFailures++;
          break;
      }
    }

    if (sessionDead) {
      stats.sessionExpired = true;
      stats.warnings.push(`Session expired; bid augmentation stopped after ${stats.lotsAugmented} lot(s)`);
    }
    log.info(`refreshed ${stats.lotsAugmented}, changed ${stats.lotsUpdated}, degraded ${stats.lotsDegraded}`, {
      failed: stats.augmentFailures,
    });
    return candidates.map((lot) => lot.id);
  }

  /**
   * Re-score the working set: every open lot plus whatever this run touched,
   * so a lot that closed during the run drops to zero.
   */
  private async scorePhase(stats: RunStats, logger: RunLogger, touched: Set<string>, signal: AbortSignal) {
    const { store, scoring, concurrency } = this.options;
    const ts = this.now();

    const workingSet = new Map<string, Lot>();
    for (const lot of await store.query({ open: true, now: ts })) workingSet.set(lot.id, lot);
    const missing = Array.from(touched).filter((id) => !workingSet.has(id));
    for (const lot of await mapLimit(missing, concurrency, (id) => store.get(id), signal)) {
      if (lot) workingSet.set(lot.id, lot);
    }

    await mapLimit(
      Array.from(workingSet.values()),
      concurrency,
      async (lot) => {
        await store.upsert(applyScores(lot, ts, scoring));
        stats.lotsScored++;
      },
      signal,
    );
    logger.child('score').info(`scored ${stats.lotsScored} lot(s)`);
  }
}
