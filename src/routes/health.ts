import { Router } from 'express';
import { log } from '../log';

export type HealthProbe = () => Promise<void>;

export function createHealthRouter(probes: Record<string, HealthProbe>): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const names = Object.keys(probes);
    void Promise.allSettled(names.map((name) => probes[name]())).then((results) => {
      const checks: Record<string, 'ok' | 'down'> = {};
      results.forEach((result, i) => {
        const name = names[i];
        checks[name] = result.status === 'fulfilled' ? 'ok' : 'down';
        if (result.status === 'rejected') {
          log.warn({ event: 'health_probe_failed', probe: name, err: result.reason }, 'health probe failed');
        }
      });
      const healthy = Object.values(checks).every((status) => status === 'ok');
      res.status(healthy ? 200 : 503).json({ status: healthy ? 'ok' : 'degraded', checks });
    });
  });

  return router;
}
