export interface AttemptRecord {
  engine: string;
  success: boolean;
  cacheHit: boolean;
  /** Engine call time. Ignored for cache hits. */
  durationMs: number;
}

export interface Counters {
  total: number;
  success: number;
  fail: number;
  cacheHit: number;
  totalDurationMs: number;
}

export interface CountersSnapshot extends Counters {
  /** Mean engine latency over attempts that reached the engine. */
  avgLatencyMs: number;
  /** Percentages in the range 0-100. */
  hitRate: number;
  failRate: number;
}

export interface StatsSnapshot extends CountersSnapshot {
  byEngine: Record<string, CountersSnapshot>;
}

function emptyCounters(): Counters {
  return { total: 0, success: 0, fail: 0, cacheHit: 0, totalDurationMs: 0 };
}

function apply(counters: Counters, record: AttemptRecord): void {
  counters.total++;
  if (record.success) {
    counters.success++;
  } else {
    counters.fail++;
  }
  if (record.cacheHit) {
    counters.cacheHit++;
  } else {
    counters.totalDurationMs += Math.max(0, record.durationMs);
  }
}

function derive(counters: Counters): CountersSnapshot {
  const engineCalls = counters.total - counters.cacheHit;
  const percent = (part: number) =>
    counters.total > 0 ? (part / counters.total) * 100 : 0;

  return {
    ...counters,
    avgLatencyMs: engineCalls > 0 ? counters.totalDurationMs / engineCalls : 0,
    hitRate: percent(counters.cacheHit),
    failRate: percent(counters.fail),
  };
}

/**
 * Global and per-engine translation counters.
 *
 * Every update happens inside a single synchronous call, so observers never
 * see the global and per-engine counters disagree.
 */
export class StatsCollector {
  private global: Counters = emptyCounters();
  private byEngine: Map<string, Counters> = new Map();

  record(record: AttemptRecord): void {
    const engine = record.engine || 'unknown';
    let counters = this.byEngine.get(engine);
    if (!counters) {
      counters = emptyCounters();
      this.byEngine.set(engine, counters);
    }

    apply(this.global, record);
    apply(counters, record);
  }

  snapshot(): StatsSnapshot {
    const byEngine: Record<string, CountersSnapshot> = {};
    for (const [engine, counters] of this.byEngine) {
      byEngine[engine] = derive(counters);
    }
    return { ...derive(this.global), byEngine };
  }

  reset(): void {
    this.global = emptyCounters();
    this.byEngine.clear();
  }
}

export default StatsCollector;
