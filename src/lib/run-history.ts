import { z } from "zod";
import { resultList, resultString, type UpstashClient } from "./upstash.js";

export const RUN_PHASES = ["idle", "fetching", "reconciling", "augmenting", "scoring", "done", "failed"] as const;

export const StreamReportSchema = z.object({
  name: z.string(),
  source: z.enum(["summary", "search", "rendered"]),
  pages: z.number(),
  records: z.number(),
  unmappable: z.number(),
  status: z.enum(["ok", "failed", "cancelled"]),
  error: z.string().optional(),
});

export const RunStatsSchema = z.object({
  runId: z.string(),
  phase: z.enum(RUN_PHASES),
  startedAt: z.number(),
  finishedAt: z.number().nullable(),
  recordsFetched: z.number(),
  unmappable: z.number(),
  lotsDiscovered: z.number(),
  lotsAugmented: z.number(),
  lotsUpdated: z.number(),
  lotsDegraded: z.number(),
  augmentFailures: z.number(),
  lotsScored: z.number(),
  sourcesFailed: z.array(z.enum(["summary", "search", "rendered"])),
  streams: z.array(StreamReportSchema),
  sessionExpired: z.boolean(),
  warnings: z.array(z.string()),
  error: z.string().nullable(),
});

export type RunPhase = (typeof RUN_PHASES)[number];
export type StreamReport = z.infer<typeof StreamReportSchema>;
export type RunStats = z.infer<typeof RunStatsSchema>;

export interface RunHistory {
  save(stats: RunStats): Promise<void>;
  get(runId: string): Promise<RunStats | null>;
  /** Most recent first */
  list(limit?: number): Promise<RunStats[]>;
}

export const MAX_RUN_HISTORY = 100;

export class MemoryRunHistory implements RunHistory {
  private runs = new Map<string, RunStats>();
  private order: string[] = [];

  async save(stats: RunStats): Promise<void> {
    if (!this.runs.has(stats.runId)) {
      this.order.unshift(stats.runId);
      for (const dropped of this.order.splice(MAX_RUN_HISTORY)) this.runs.delete(dropped);
    }
    this.runs.set(stats.runId, structuredClone(stats));
  }

  async get(runId: string): Promise<RunStats | null> {
    const stats = this.runs.get(runId);
    return stats ? structuredClone(stats) : null;
  }

  async list(limit = 20): Promise<RunStats[]> {
    return this.order.slice(0, limit).flatMap((id) => {
      const stats = this.runs.get(id);
      return stats ? [structuredClone(stats)] : [];
    });
  }
}

// 7 days
const RUN_TTL_SEC = 7 * 24 * 60 * 60;

function parseStats(raw: string | null): RunStats | null {
  if (!raw) return null;
  try {
    const parsed = RunStatsSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

/**
 * Run summaries in Upstash: `run:{id}` with a 7 day TTL, ids pushed onto
 * the `runs:index` list (trimmed to the newest 100).
 */
export class RedisRunHistory implements RunHistory {
  constructor(
    private readonly redis: UpstashClient,
    private readonly ttlSec = RUN_TTL_SEC,
  ) {}

  private key(runId: string) {
    return `run:${runId}`;
  }

  async save(stats: RunStats): Promise<void> {
    const existed = resultString(await this.redis.call("GET", this.key(stats.runId))) !== null;
    await this.redis.call("SETEX", this.key(stats.runId), `${this.ttlSec}`, JSON.stringify(stats));
    if (!existed) {
      await this.redis.call("LPUSH", "runs:index", stats.runId);
      await this.redis.call("LTRIM", "runs:index", "0", `${MAX_RUN_HISTORY - 1}`);
    }
  }

  async get(runId: string): Promise<RunStats | null> {
    return parseStats(resultString(await this.redis.call("GET", this.key(runId))));
  }

  async list(limit = 20): Promise<RunStats[]> {
    const ids = resultList(await this.redis.call("LRANGE", "runs:index", "0", `${Math.max(0, limit - 1)}`));
    const out: RunStats[] = [];
    for (const id of ids) {
      if (!id) continue;
      const stats = await this.get(id);
      if (stats) out.push(stats);
    }
    return out;
  }
}
