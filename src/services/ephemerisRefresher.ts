import { setTimeout as delay } from 'timers/promises';

import { BODIES, PLANET_NAMES, type PlanetName } from '../config/bodies.js';
import type { EphemerisVector } from '../models/ephemeris-vector.js';
import { type HorizonsClient, HorizonsError, windowStartingAt } from '../nasa/horizonsClient.js';
import { errorMessage, logInfo, logWarn } from '../observability/logger.js';
import { recordHorizonsFailure, recordHorizonsLatency, recordRefreshCycle } from '../observability/metrics.js';
import { type EphemerisCycleResult, applyEphemerisCycle } from '../state/viewState.js';
import type { ViewStateStore } from '../state/viewStateStore.js';

export type Sleep = (ms: number) => Promise<void>;

export interface EphemerisRefresherOptions {
  client: HorizonsClient;
  store: ViewStateStore;
  requestDelayMs: number;
  cycleIntervalMs: number;
  sleep?: Sleep;
  now?: () => Date;
  bodies?: readonly PlanetName[];
}

/** ISO-8601 UTC with whole seconds, e.g. `2026-10-19T08:15:00Z`. */
export function formatUpdateLabel(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

export function describeFailure(body: PlanetName, err: unknown): string {
  return `Fetch error (${body}): ${errorMessage(err)}`;
}

/**
 * Background loop that walks every planet once per cycle, one request at a
 * time, and publishes the cycle's results to the store in a single update.
 */
export class EphemerisRefresher {
  private readonly client: HorizonsClient;
  private readonly store: ViewStateStore;
  private readonly requestDelayMs: number;
  private readonly cycleIntervalMs: number;
  private readonly sleep: Sleep;
  private readonly now: () => Date;
  private readonly bodies: readonly PlanetName[];
  private running = false;
  private loop: Promise<void> | null = null;

  constructor(options: EphemerisRefresherOptions) {
    this.client = options.client;
    this.store = options.store;
    this.requestDelayMs = options.requestDelayMs;
    this.cycleIntervalMs = options.cycleIntervalMs;
    this.sleep = options.sleep ?? ((ms) => delay(ms, undefined, { ref: false }));
    this.now = options.now ?? (() => new Date());
    this.bodies = options.bodies ?? PLANET_NAMES;
  }

  get isRunning(): boolean {
    return this.running;
  }

  async runCycle(): Promise<EphemerisCycleResult> {
    const startedAt = this.now();
    const window = windowStartingAt(startedAt);
    const positions: Partial<Record<PlanetName, EphemerisVector>> = {};
    let status = 'OK';

    for (const name of this.bodies) {
      const started = Date.now();
      try {
        positions[name] = await this.client.fetchBodyVector(BODIES[name].horizonsId, window);
        recordHorizonsLatency(Date.now() - started, 'ok');
      } catch (err) {
        recordHorizonsLatency(Date.now() - started, 'error');
        recordHorizonsFailure(name, err instanceof HorizonsError ? err.kind : 'network');
        status = describeFailure(name, err);
        logWarn('horizons_fetch_failed', {
          body: name,
          kind: err instanceof HorizonsError ? err.kind : undefined,
          error: errorMessage(err)
        });
      }
      await this.sleep(this.requestDelayMs);
    }

    const result: EphemerisCycleResult = {
      positions,
      status,
      completedAt: formatUpdateLabel(startedAt)
    };
    const next = this.store.update(applyEphemerisCycle(result));
    const known = next.bodies.filter((body) => body.posAu !== null).length;
    recordRefreshCycle(status !== 'OK', known);
    logInfo('ephemeris_cycle_completed', {
      fetched: Object.keys(positions).length,
      requested: this.bodies.length,
      known,
      status
    });
    return result;
  }

  start(): Promise<void> {
    // A loop that was asked to stop but has not reached its next check picks up again.
    this.running = true;
    if (this.loop) {
      return this.loop;
    }
    this.loop = this.runLoop().finally(() => {
      this.running = false;
      this.loop = null;
    });
    return this.loop;
  }

  /** Stops after the current await; an in-flight request is not aborted. */
  stop(): void {
    this.running = false;
  }

  private async runLoop(): Promise<void> {
    logInfo('ephemeris_refresher_started', {
      bodies: this.bodies.length,
      requestDelayMs: this.requestDelayMs,
      cycleIntervalMs: this.cycleIntervalMs
    });
    while (this.running) {
      await this.runCycle();
      if (!this.running) {
        break;
      }
      await this.sleep(this.cycleIntervalMs);
    }
    logInfo('ephemeris_refresher_stopped');
  }
}
