import 'dotenv/config';
import { defaultSearchTerms, termsFromKeywords } from './config/search-terms.js';
import { normalizeWeights, type ScoreWeights } from './lib/scoring.js';
import type { HttpPolicy } from './lib/source-http.js';
import type { SearchTerm } from './sources/search-client.js';

type Env = Record<string, string | undefined>;

export type ChannelRate = {
  ratePerSec: number;
  burst: number;
};

export interface AppConfig {
  port: number;
  redis: { url: string; token: string };
  http: HttpPolicy;

  summary: ChannelRate & { baseUrl: string; pageSize: number; maxPages: number };
  search: ChannelRate & {
    host: string;
    apiKey: string;
    collection: string;
    pageSize: number;
    maxDepth: number;
    locations: string[];
    terms: SearchTerm[];
  };
  rendered: ChannelRate & { baseUrl: string; seedLotIds: string[] };
  session: { cookie: string; expiresAt: number | null };

  discovery: {
    concurrency: number;
    augmentBatchSize: number;
    augmentConcurrency: number;
    bidFreshnessMs: number;
    excludeSameDayClosing: boolean;
    runTimeoutMs: number;
    /** Budget for the fetching phase; streams still running at the deadline are cut off */
    fetchTimeoutMs: number;
    rankedLimit: number;
    /** 0 disables the scheduler */
    intervalMinutes: number;
  };

  scoring: { weights: ScoreWeights };
}

/** Number in [min, max]; anything unparseable or out of range falls back */
function envNumber(env: Env, key: string, fallback: number, min = 0, max = Number.MAX_SAFE_INTEGER): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const n = Number(raw);
  return Number.isFinite(n) && n >= min && n <= max ? n : fallback;
}

function envInt(env: Env, key: string, fallback: number, min = 0, max = Number.MAX_SAFE_INTEGER): number {
  return Math.floor(envNumber(env, key, fallback, min, max));
}

function envFlag(env: Env, key: string, fallback: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function envList(env: Env, key: string): string[] {
  return (env[key] || '')
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function envTimestamp(env: Env, key: string): number | null {
  const raw = (env[key] || '').trim();
  if (!raw) return null;
  const n = /^\d+$/.test(raw) ? Number(raw) : Date.parse(raw);
  return Number.isFinite(n) ? n : null;
}

function channelRate(env: Env, prefix: string, defaultRate: number): ChannelRate {
  const ratePerSec = envNumber(env, `${prefix}_RATE_PER_SEC`, defaultRate, 0);
  return {
    ratePerSec,
    burst: envInt(env, `${prefix}_BURST`, Math.max(1, Math.ceil(ratePerSec)), 1),
  };
}

export function loadConfig(env: Env = process.env): AppConfig {
  const keywords = envList(env, 'SEARCH_TERMS');
  const concurrency = envInt(env, 'DISCOVERY_CONCURRENCY', 5);
  const runTimeoutMs = envInt(env, 'RUN_TIMEOUT_MS', 10 * 60_000, 1_000);

  return {
    port: envInt(env, 'PORT', 3000, 1, 65535),
    redis: {
      url: (env.UPSTASH_REDIS_REST_URL || '').replace(/\/$/, ''),
      token: env.UPSTASH_REDIS_REST_TOKEN || '',
    },
    http: {
      timeoutMs: envInt(env, 'HTTP_TIMEOUT_MS', 15_000, 100),
      maxAttempts: envInt(env, 'HTTP_MAX_ATTEMPTS', 3, 1, 10),
      baseDelayMs: envInt(env, 'HTTP_BASE_DELAY_MS', 500, 0),
      maxDelayMs: envInt(env, 'HTTP_MAX_DELAY_MS', 8_000, 0),
    },

    summary: {
      ...channelRate(env, 'SUMMARY', 2),
      baseUrl: env.SUMMARY_BASE_URL || '',
      pageSize: envInt(env, 'SUMMARY_PAGE_SIZE', 100, 1, 1000),
      maxPages: envInt(env, 'SUMMARY_MAX_PAGES', 5000, 1),
    },
    search: {
      ...channelRate(env, 'SEARCH', 2),
      host: env.SEARCH_HOST || '',
      apiKey: env.SEARCH_API_KEY || '',
      collection: env.SEARCH_COLLECTION || 'lots',
      pageSize: envInt(env, 'SEARCH_PAGE_SIZE', 250, 1, 250),
      maxDepth: envInt(env, 'SEARCH_MAX_DEPTH', 10_000, 1),
      locations: envList(env, 'SEARCH_LOCATIONS'),
      terms: keywords.length > 0 ? [{ label: 'all', q: '*' }, ...termsFromKeywords(keywords)] : defaultSearchTerms(),
    },
    rendered: {
      ...channelRate(env, 'RENDERED', 1),
      baseUrl: env.RENDERED_BASE_URL || '',
      seedLotIds: envList(env, 'RENDERED_SEED_LOT_IDS'),
    },
    session: {
      cookie: env.SESSION_COOKIE || '',
      expiresAt: envTimestamp(env, 'SESSION_EXPIRES_AT'),
    },

    discovery: {
      // pool size is kept between 3 and 10 whatever is configured
      concurrency: Math.min(10, Math.max(3, concurrency)),
      augmentBatchSize: envInt(env, 'AUGMENT_BATCH_SIZE', 50, 0),
      augmentConcurrency: envInt(env, 'AUGMENT_CONCURRENCY', 3, 1, 10),
      bidFreshnessMs: envNumber(env, 'BID_FRESHNESS_MINUTES', 15, 0) * 60_000,
      excludeSameDayClosing: envFlag(env, 'EXCLUDE_SAME_DAY_CLOSING', true),
      runTimeoutMs,
      fetchTimeoutMs: envInt(env, 'FETCH_TIMEOUT_MS', Math.floor(runTimeoutMs * 0.75), 500, runTimeoutMs),
      rankedLimit: envInt(env, 'RANKED_LIMIT', 100, 1),
      intervalMinutes: envNumber(env, 'DISCOVERY_INTERVAL_MINUTES', 0, 0),
    },

    scoring: {
      weights: normalizeWeights({
        discount: envNumber(env, 'SCORE_WEIGHT_DISCOUNT', 0.5, 0),
        scarcity: envNumber(env, 'SCORE_WEIGHT_SCARCITY', 0.3, 0),
        noBid: envNumber(env, 'SCORE_WEIGHT_NO_BID', 0.2, 0),
      }),
    },
  };
}

/** Human-readable notes about channels that will be skipped */
export function configWarnings(c: AppConfig): string[] {
  const warnings: string[] = [];
  if (!c.redis.url || !c.redis.token) {
    warnings.push('Upstash Redis env vars missing. Lots and run history are kept in memory only.');
  }
  if (!c.summary.baseUrl) warnings.push('SUMMARY_BASE_URL not set; summary channel disabled.');
  if (!c.search.host || !c.search.apiKey) {
    warnings.push('SEARCH_HOST / SEARCH_API_KEY not set; search channel disabled.');
  }
  if (!c.rendered.baseUrl) {
    warnings.push('RENDERED_BASE_URL not set; bid augmentation and seeded lots disabled.');
  } else if (!c.session.cookie) {
    warnings.push('SESSION_COOKIE not set; bid augmentation will be skipped.');
  }
  return warnings;
}

export const cfg = loadConfig();
