import { Router, type Request, type Response } from 'express';

import { BODIES } from '../config/bodies.js';
import { errorMessage, logError } from '../observability/logger.js';
import type { ViewState } from '../state/viewState.js';

export interface EphemerisBody {
  name: string;
  horizonsId: string;
  x_au: number;
  y_au: number;
  z_au: number;
}

export interface EphemerisSnapshot {
  timestamp: string | null;
  status: string;
  metadata: {
    source: string;
    referenceFrame: string;
    distanceUnit: string;
    partial: boolean;
    missingBodies?: string[];
  };
  bodies: EphemerisBody[];
}

export function buildEphemerisSnapshot(state: ViewState): EphemerisSnapshot {
  const bodies: EphemerisBody[] = [];
  const missing: string[] = [];

  for (const body of state.bodies) {
    if (!body.posAu) {
      missing.push(body.name);
      continue;
    }
    bodies.push({
      name: body.name,
      horizonsId: BODIES[body.name].horizonsId,
      x_au: body.posAu.x_au,
      y_au: body.posAu.y_au,
      z_au: body.posAu.z_au
    });
  }

  return {
    timestamp: state.lastUpdateUtc,
    status: state.status,
    metadata: {
      source: 'NASA-JPL-Horizons',
      referenceFrame: 'ICRF-ECLIPTIC',
      distanceUnit: 'AU',
      partial: missing.length > 0,
      missingBodies: missing.length ? missing : undefined
    },
    bodies
  };
}

export function createEphemerisRouter(getState: () => ViewState): Router {
  const router = Router();

  router.get('/planets', (req: Request, res: Response) => {
    try {
      res.json(buildEphemerisSnapshot(getState()));
    } catch (err) {
      logError('ephemeris_snapshot_failed', {
        error: errorMessage(err),
        requestId: req.requestId
      });
      res.status(500).json({ error: 'Failed to build ephemeris snapshot', requestId: req.requestId });
    }
  });

  return router;
}
