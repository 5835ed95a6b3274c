#!/usr/bin/env node
import React from 'react';
import { render } from 'ink';
import { Command, InvalidArgumentError } from 'commander';
import type { Server } from 'http';

import { type CliOverrides, loadSettings } from './config/settings.js';
import { createHorizonsClient } from './nasa/horizonsClient.js';
import { configureLogger, errorMessage, logError, logInfo } from './observability/logger.js';
import { startStatusServer } from './server.js';
import { EphemerisRefresher } from './services/ephemerisRefresher.js';
import { createInitialState } from './state/viewState.js';
import { ViewStateStore } from './state/viewStateStore.js';
import { App } from './ui/App.js';

function parseInteger(min: number, max: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
      throw new InvalidArgumentError(`Expected an integer between ${min} and ${max}.`);
    }
    return parsed;
  };
}

function closeServer(server: Server): Promise<void> {
  return new Promise((resolve) => server.close(() => resolve()));
}

async function main(): Promise<void> {
  const program = new Command();

  program
    .name('solar-map')
    .description('Live top-down map of the Sun and planets from JPL Horizons vectors')
    .option('--unicode', 'Use astronomical symbols instead of ASCII letters for bodies')
    .option('--log-file <path>', 'Append JSON log lines to this file')
    .option('--status-port <port>', 'Serve /metrics and /api/ephemeris/planets on this port', parseInteger(1, 65_535))
    .option('--interval <ms>', 'Pause between refresh cycles in milliseconds', parseInteger(0, 86_400_000))
    .parse(process.argv);

  const settings = loadSettings(process.env, program.opts<CliOverrides>());
  configureLogger({ level: settings.logLevel, file: settings.logFile });

  if (!process.stdout.isTTY) {
    throw new Error('solar-map needs an interactive terminal');
  }

  const store = new ViewStateStore(createInitialState(settings.iconStyle));
  const client = createHorizonsClient({
    baseUrl: settings.horizonsApiUrl,
    timeoutMs: settings.horizonsTimeoutMs,
    userAgent: settings.horizonsUserAgent
  });
  const refresher = new EphemerisRefresher({
    client,
    store,
    requestDelayMs: settings.requestDelayMs,
    cycleIntervalMs: settings.cycleIntervalMs
  });

  const server = settings.statusPort !== undefined ? await startStatusServer(store, settings.statusPort) : null;

  void refresher.start().catch((err: unknown) => {
    logError('ephemeris_refresher_crashed', { error: errorMessage(err) });
  });

  const app = render(<App store={store} />, { exitOnCtrlC: true });
  logInfo('ui_started', { iconStyle: settings.iconStyle, statusPort: settings.statusPort });

  await app.waitUntilExit();

  refresher.stop();
  store.complete();
  if (server) {
    await closeServer(server);
  }
  logInfo('ui_stopped');
  // In-flight Horizons requests are not cancelled; leave without waiting on them.
  process.exit(0);
}

main().catch((error: unknown) => {
  logError('fatal', { error: errorMessage(error) });
  process.stderr.write(`Fatal error: ${errorMessage(error)}\n`);
  process.exit(1);
});
