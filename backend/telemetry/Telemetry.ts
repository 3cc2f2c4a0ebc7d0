import { performance } from 'node:perf_hooks';

import { telemetryStore, type TelemetryEvent } from './TelemetryStore';

const envFlag = (name: string): string => String(process.env[name] ?? '').trim();

const flagEnabled = (name: string): boolean => {
  const v = envFlag(name);
  if (!v) return true;
  return v === '1' || v.toLowerCase() === 'true' || v.toLowerCase() === 'yes';
};

const isEnabled = (): boolean => flagEnabled('INVENTORY_TELEMETRY');

const isStructuredLogsEnabled = (): boolean => flagEnabled('INVENTORY_TELEMETRY_LOGS');

const nowMs = (): number => performance.now();

export const telemetry = {
  nowMs,

  record(event: Omit<TelemetryEvent, 'ts'> & { ts?: string }) {
    if (!isEnabled()) return;

    const stored = telemetryStore.record(event);

    if (isStructuredLogsEnabled()) {
      // Structured, one-line JSON logs.
      // eslint-disable-next-line no-console
      console.info(
        JSON.stringify({
          type: 'inventory.telemetry',
          ts: stored.ts,
          name: stored.name,
          durationMs: stored.durationMs,
          tags: stored.tags,
          metrics: stored.metrics,
          message: stored.message,
        }),
      );
    }
  },

  /** Runs `fn` and records its duration under `name`, also when it throws. */
  measure<T>(
    name: string,
    tags: TelemetryEvent['tags'],
    fn: () => T,
    metricsOf?: (result: T) => TelemetryEvent['metrics'],
  ): T {
    const startedAtMs = nowMs();
    let failed = true;
    let metrics: TelemetryEvent['metrics'] = {};
    try {
      const result = fn();
      failed = false;
      metrics = metricsOf ? metricsOf(result) : {};
      return result;
    } finally {
      telemetry.record({
        name,
        durationMs: nowMs() - startedAtMs,
        tags: { ...tags, failed },
        metrics,
      });
    }
  },
};
