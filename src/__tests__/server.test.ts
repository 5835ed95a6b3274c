import type { Server } from 'http';
import { afterEach, describe, expect, it } from 'vitest';

import { buildEphemerisSnapshot } from '../routes/ephemeris.js';
import { createStatusApp } from '../server.js';
import { type ViewState, createInitialState } from '../state/viewState.js';
import { ViewStateStore } from '../state/viewStateStore.js';

class UnreadableStore extends ViewStateStore {
  override snapshot(): ViewState {
    throw new Error('state unavailable');
  }
}

let server: Server | null = null;

async function listen(store: ViewStateStore): Promise<string> {
  const app = createStatusApp(store);
  const started = await new Promise<Server>((resolve, reject) => {
    const s = app.listen(0, '127.0.0.1', () => resolve(s));
    s.once('error', reject);
  });
  server = started;
  const address = started.address();
  if (!address || typeof address === 'string') {
    throw new Error('expected a TCP address');
  }
  return `http://127.0.0.1:${address.port}`;
}

afterEach(async () => {
  const current = server;
  server = null;
  if (current) {
    await new Promise<void>((resolve) => current.close(() => resolve()));
  }
});

describe('status server', () => {
  it('serves metrics in the Prometheus text format', async () => {
    const base = await listen(new ViewStateStore(createInitialState()));
    const res = await fetch(`${base}/metrics`);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toContain('text/plain');
    expect(await res.text()).toContain('# HELP solar_map_refresh_cycles_total');
  });

  it('returns the current snapshot without touching the store', async () => {
    const store = new ViewStateStore(createInitialState());
    const before = store.snapshot();
    const base = await listen(store);

    const res = await fetch(`${base}/api/ephemeris/planets`);

    expect(res.status).toBe(200);
    expect(res.headers.get('content-type')).toContain('application/json');
    expect(await res.json()).toEqual(buildEphemerisSnapshot(before));
    expect(store.snapshot()).toBe(before);
  });

  it('echoes the caller request id', async () => {
    const base = await listen(new ViewStateStore(createInitialState()));
    const res = await fetch(`${base}/api/ephemeris/planets`, {
      headers: { 'X-Request-Id': 'test-request-1' }
    });

    expect(res.headers.get('x-request-id')).toBe('test-request-1');
  });

  it('generates a request id when none is sent', async () => {
    const base = await listen(new ViewStateStore(createInitialState()));
    const res = await fetch(`${base}/`);

    expect(res.headers.get('x-request-id')).toMatch(/^[0-9a-f-]{36}$/);
  });

  it('answers 500 JSON when the snapshot cannot be built', async () => {
    const base = await listen(new UnreadableStore(createInitialState()));
    const res = await fetch(`${base}/api/ephemeris/planets`, {
      headers: { 'X-Request-Id': 'test-request-2' }
    });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: 'Failed to build ephemeris snapshot',
      requestId: 'test-request-2'
    });
  });
});
