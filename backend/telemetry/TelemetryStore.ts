export type TelemetryEvent = {
  ts: string;
  name: string;
  durationMs?: number;
  tags?: Record<string, string | number | boolean | null | undefined>;
  metrics?: Record<string, number | null | undefined>;
  message?: string;
};

type StageAggregate = {
  count: number;
  failures: number;
  sumMs: number;
  maxMs: number;
  /** Last finite value seen per metric. */
  lastMetrics: Map<string, number>;
};

export type StageSummary = {
  name: string;
  count: number;
  failures: number;
  avgMs: number;
  maxMs: number;
  lastMetrics: Record<string, number>;
};

export type TelemetrySnapshot = {
  generatedAt: string;
  stages: StageSummary[];
  recentEvents: readonly TelemetryEvent[];
};

const compareStrings = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

const nowIso = () => new Date().toISOString();

const finite = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

/**
 * In-process ring of pipeline stage events (`graph.build`, `inventory.validate`,
 * `view.select`, ...) with per-stage aggregates, served by `/api/telemetry`.
 */
export class TelemetryStore {
  private readonly maxEvents: number;
  private readonly events: TelemetryEvent[] = [];
  private readonly stages = new Map<string, StageAggregate>();

  constructor(args?: { maxEvents?: number }) {
    this.maxEvents = Math.max(100, Math.trunc(args?.maxEvents ?? 2000));
  }

  reset(): void {
    this.events.length = 0;
    this.stages.clear();
  }

  record(event: Omit<TelemetryEvent, 'ts'> & { ts?: string }): TelemetryEvent {
    const e: TelemetryEvent = { ...event, ts: event.ts ?? nowIso() };

    this.events.push(e);
    if (this.events.length > this.maxEvents) this.events.splice(0, this.events.length - this.maxEvents);

    const agg = this.stages.get(e.name) ?? { count: 0, failures: 0, sumMs: 0, maxMs: 0, lastMetrics: new Map() };
    agg.count += 1;
    if (e.tags?.failed === true) agg.failures += 1;

    const durationMs = finite(e.durationMs);
    if (durationMs !== null) {
      agg.sumMs += durationMs;
      if (durationMs > agg.maxMs) agg.maxMs = durationMs;
    }

    for (const [metric, raw] of Object.entries(e.metrics ?? {})) {
      const value = finite(raw);
      if (value !== null) agg.lastMetrics.set(metric, value);
    }

    this.stages.set(e.name, agg);
    return e;
  }

  listRecent(limit = 200): readonly TelemetryEvent[] {
    const n = Math.max(0, Math.trunc(limit));
    if (n === 0) return [];
    return this.events.slice(Math.max(0, this.events.length - n));
  }

  /** Events recorded under `name`, oldest first. */
  eventsNamed(name: string): readonly TelemetryEvent[] {
    return this.events.filter((e) => e.name === name);
  }

  snapshot(limit = 200): TelemetrySnapshot {
    const stages = Array.from(this.stages.entries())
      .map(([name, agg]) => ({
        name,
        count: agg.count,
        failures: agg.failures,
        avgMs: agg.count > 0 ? agg.sumMs / agg.count : 0,
        maxMs: agg.maxMs,
        lastMetrics: Object.fromEntries(agg.lastMetrics),
      }))
      .sort((a, b) => compareStrings(a.name, b.name));

    return { generatedAt: nowIso(), stages, recentEvents: this.listRecent(limit) };
  }
}

// Singleton for the running process.
export const telemetryStore = new TelemetryStore();
