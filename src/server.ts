import express, { type Express } from 'express';
import cors from 'cors';
import type { Server } from 'http';

import { createEphemerisRouter } from './routes/ephemeris.js';
import { errorMessage, logError, logInfo } from './observability/logger.js';
import { enableDefaultMetrics, getMetricsSnapshot, metricsContentType } from './observability/metrics.js';
import { applyRequestTracing } from './observability/requestTracing.js';
import type { ViewStateStore } from './state/viewStateStore.js';

export function createStatusApp(store: ViewStateStore): Express {
  const app = express();

  app.use(applyRequestTracing());
  app.use(cors());

  app.use('/api/ephemeris', createEphemerisRouter(() => store.snapshot()));

  app.get('/', (_req, res) => {
    res.send('solar-map status API');
  });

  app.get('/metrics', async (req, res) => {
    try {
      const metrics = await getMetricsSnapshot();
      res.setHeader('Content-Type', metricsContentType);
      res.send(metrics);
    } catch (err) {
      logError('metrics_failed', { error: errorMessage(err), requestId: req.requestId });
      res.status(500).send(`# Metrics error: ${errorMessage(err)}`);
    }
  });

  return app;
}

export function startStatusServer(store: ViewStateStore, port: number): Promise<Server> {
  enableDefaultMetrics();
  const app = createStatusApp(store);

  return new Promise((resolve, reject) => {
    const server = app.listen(port, () => {
      logInfo('status_server_started', { port });
      resolve(server);
    });
    server.once('error', reject);
  });
}
