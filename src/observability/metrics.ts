import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

import type { HorizonsErrorKind } from '../nasa/horizonsClient.js';

export const registry = new Registry();

const horizonsLatency = new Histogram({
  name: 'solar_map_horizons_request_seconds',
  help: 'Latency of single-body Horizons vector requests',
  labelNames: ['outcome'] as const,
  buckets: [0.1, 0.25, 0.5, 1, 2, 5, 10, 20],
  registers: [registry]
});

const horizonsFailures = new Counter({
  name: 'solar_map_horizons_failures_total',
  help: 'Failed Horizons fetches by body and error kind',
  labelNames: ['body', 'kind'] as const,
  registers: [registry]
});

const refreshCycles = new Counter({
  name: 'solar_map_refresh_cycles_total',
  help: 'Completed ephemeris refresh cycles',
  labelNames: ['status'] as const,
  registers: [registry]
});

const knownBodies = new Gauge({
  name: 'solar_map_known_bodies',
  help: 'Bodies with a known position after the last cycle',
  registers: [registry]
});

export const metricsContentType = registry.contentType;

let defaultMetricsEnabled = false;

export function enableDefaultMetrics(): void {
  if (defaultMetricsEnabled) {
    return;
  }
  defaultMetricsEnabled = true;
  collectDefaultMetrics({ register: registry, prefix: 'solar_map_' });
}

export function recordHorizonsLatency(latencyMs: number, outcome: 'ok' | 'error'): void {
  horizonsLatency.observe({ outcome }, latencyMs / 1000);
}

export function recordHorizonsFailure(body: string, kind: HorizonsErrorKind): void {
  horizonsFailures.inc({ body, kind });
}

export function recordRefreshCycle(failed: boolean, known: number): void {
  refreshCycles.inc({ status: failed ? 'partial' : 'ok' });
  knownBodies.set(known);
}

export async function getMetricsSnapshot(): Promise<string> {
  return registry.metrics();
}
