import axios, { type AxiosInstance } from 'axios';

import type { EphemerisVector } from '../models/ephemeris-vector.js';

export type HorizonsErrorKind =
  | 'network'
  | 'http'
  | 'malformed-response'
  | 'api-error'
  | 'missing-markers'
  | 'unparseable-row';

export class HorizonsError extends Error {
  readonly kind: HorizonsErrorKind;
  readonly status?: number;

  constructor(kind: HorizonsErrorKind, message: string, options?: { status?: number; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'HorizonsError';
    this.kind = kind;
    this.status = options?.status;
  }
}

export interface TimeWindow {
  start: string;
  stop: string;
}

export interface HorizonsClientOptions {
  baseUrl: string;
  timeoutMs: number;
  userAgent: string;
  /** Pre-built axios instance; tests pass one with a stub adapter. */
  http?: AxiosInstance;
}

export interface HorizonsClient {
  fetchBodyVector(horizonsId: string, window: TimeWindow): Promise<EphemerisVector>;
}

const SOE = '$$SOE';
const EOE = '$$EOE';

/** `YYYY-MM-DD HH:MM:SS` in UTC, a form Horizons accepts for START_TIME/STOP_TIME. */
export function formatHorizonsTime(date: Date): string {
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function windowStartingAt(start: Date, lengthMs = 60_000): TimeWindow {
  return {
    start: formatHorizonsTime(start),
    stop: formatHorizonsTime(new Date(start.getTime() + lengthMs))
  };
}

export function buildHorizonsParams(horizonsId: string, window: TimeWindow): Record<string, string> {
  return {
    format: 'json',
    MAKE_EPHEM: 'YES',
    OBJ_DATA: 'NO',
    EPHEM_TYPE: 'VECTORS',
    COMMAND: horizonsId,
    CENTER: '500@10',
    REF_PLANE: 'ECLIPTIC',
    REF_SYSTEM: 'ICRF',
    OUT_UNITS: 'AU-D',
    CSV_FORMAT: 'YES',
    VEC_TABLE: '1',
    TIME_TYPE: 'UT',
    START_TIME: `'${window.start}'`,
    STOP_TIME: `'${window.stop}'`,
    STEP_SIZE: "'1 m'"
  };
}

export function extractTableLines(resultText: string): string[] {
  const so = resultText.indexOf(SOE);
  if (so < 0) {
    throw new HorizonsError('missing-markers', `Missing ${SOE} marker`);
  }
  const eo = resultText.indexOf(EOE);
  if (eo < 0) {
    throw new HorizonsError('missing-markers', `Missing ${EOE} marker`);
  }
  if (eo <= so) {
    throw new HorizonsError('missing-markers', `${EOE} occurs before ${SOE}`);
  }
  return resultText
    .slice(so + SOE.length, eo)
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}

function parseCoordinate(raw: string, axis: string, row: string): number {
  const value = Number(raw);
  if (raw === '' || !Number.isFinite(value)) {
    throw new HorizonsError('unparseable-row', `Cannot parse ${axis} from row: ${row}`);
  }
  return value;
}

/** Reads x, y, z from the last three columns of a CSV vector row. */
export function parseVectorRow(row: string): EphemerisVector {
  const cols = row
    .split(',')
    .map((col) => col.trim())
    .filter((col) => col.length > 0);

  if (cols.length < 5) {
    throw new HorizonsError('unparseable-row', `Unexpected CSV format: ${row}`);
  }

  return {
    x_au: parseCoordinate(cols[cols.length - 3], 'x', row),
    y_au: parseCoordinate(cols[cols.length - 2], 'y', row),
    z_au: parseCoordinate(cols[cols.length - 1], 'z', row)
  };
}

interface HorizonsEnvelope {
  result: string;
  error?: string;
}

export function parseEnvelope(body: string): HorizonsEnvelope {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (err) {
    throw new HorizonsError('malformed-response', 'Cannot parse Horizons JSON', { cause: err });
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new HorizonsError('malformed-response', 'Horizons response is not a JSON object');
  }

  const result = 'result' in parsed ? parsed.result : undefined;
  const error = 'error' in parsed ? parsed.error : undefined;
  if (typeof result !== 'string' && result !== undefined) {
    throw new HorizonsError('malformed-response', 'Horizons "result" is not a string');
  }
  return {
    result: typeof result === 'string' ? result : '',
    error: typeof error === 'string' && error.length > 0 ? error : undefined
  };
}

export function vectorFromResponse(body: string, horizonsId: string): EphemerisVector {
  const envelope = parseEnvelope(body);
  if (envelope.error) {
    throw new HorizonsError('api-error', `Horizons error: ${envelope.error}`);
  }
  for (const line of extractTableLines(envelope.result)) {
    try {
      return parseVectorRow(line);
    } catch {
      // Header or separator rows inside the table are skipped.
      continue;
    }
  }
  throw new HorizonsError('unparseable-row', `No parseable vector row for body ${horizonsId}`);
}

function toTransportError(err: unknown): HorizonsError {
  if (err instanceof HorizonsError) {
    return err;
  }
  if (axios.isAxiosError(err)) {
    if (err.response) {
      return new HorizonsError('http', `HTTP ${err.response.status} from Horizons`, {
        status: err.response.status,
        cause: err
      });
    }
    return new HorizonsError('network', err.message || 'Network error', { cause: err });
  }
  return new HorizonsError('network', err instanceof Error ? err.message : String(err), { cause: err });
}

export function createHorizonsClient(options: HorizonsClientOptions): HorizonsClient {
  const http =
    options.http ??
    axios.create({
      timeout: options.timeoutMs,
      headers: { 'User-Agent': options.userAgent }
    });

  return {
    async fetchBodyVector(horizonsId: string, window: TimeWindow): Promise<EphemerisVector> {
      let body: string;
      try {
        const response = await http.get<string>(options.baseUrl, {
          params: buildHorizonsParams(horizonsId, window),
          responseType: 'text',
          transformResponse: [(data: unknown) => (typeof data === 'string' ? data : String(data))]
        });
        body = response.data;
      } catch (err) {
        throw toTransportError(err);
      }
      return vectorFromResponse(body, horizonsId);
    }
  };
}
