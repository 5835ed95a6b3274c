import type { IconStyle } from './bodies.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Settings {
  horizonsApiUrl: string;
  horizonsTimeoutMs: number;
  horizonsUserAgent: string;
  /** Pause between two body requests inside one cycle. */
  requestDelayMs: number;
  /** Sleep after a full pass over all bodies. */
  cycleIntervalMs: number;
  logLevel: LogLevel;
  logFile?: string;
  statusPort?: number;
  iconStyle: IconStyle;
}

// A type alias rather than an interface so commander's `opts<T>()` accepts it.
export type CliOverrides = {
  unicode?: boolean;
  logFile?: string;
  statusPort?: number;
  interval?: number;
};

const DEFAULT_HORIZONS_API_URL = 'https://ssd.jpl.nasa.gov/api/horizons.api';
const DEFAULT_USER_AGENT = 'solar-map/0.1 (terminal)';
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

function readNumber(raw: string | undefined, fallback: number, min = 0): number {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }
  const value = Number(raw);
  return Number.isFinite(value) && value >= min ? value : fallback;
}

function readPort(raw: string | undefined): number | undefined {
  const port = readNumber(raw, Number.NaN, 1);
  return Number.isInteger(port) && port <= 65_535 ? port : undefined;
}

function readLogLevel(raw: string | undefined): LogLevel {
  const normalized = raw?.toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? 'info';
}

export function loadSettings(
  env: NodeJS.ProcessEnv = process.env,
  cli: CliOverrides = {}
): Settings {
  const fromEnv: Settings = {
    horizonsApiUrl: env.HORIZONS_API_URL || DEFAULT_HORIZONS_API_URL,
    horizonsTimeoutMs: readNumber(env.HORIZONS_TIMEOUT_MS, 15_000, 1),
    horizonsUserAgent: env.HORIZONS_USER_AGENT || DEFAULT_USER_AGENT,
    requestDelayMs: readNumber(env.HORIZONS_REQUEST_DELAY_MS, 120),
    cycleIntervalMs: readNumber(env.HORIZONS_CYCLE_INTERVAL_MS, 5_000),
    logLevel: readLogLevel(env.LOG_LEVEL),
    logFile: env.LOG_FILE || undefined,
    statusPort: readPort(env.STATUS_PORT),
    iconStyle: 'ascii'
  };

  return {
    ...fromEnv,
    iconStyle: cli.unicode ? 'unicode' : fromEnv.iconStyle,
    logFile: cli.logFile ?? fromEnv.logFile,
    statusPort: cli.statusPort ?? fromEnv.statusPort,
    cycleIntervalMs: cli.interval ?? fromEnv.cycleIntervalMs
  };
}
