import { Router } from 'express';
import type { FeatureFlags } from '../dialogue/orchestrator';

export interface HealthSource {
  features(): FeatureFlags;
  activeCallCount(): number;
}

export interface ServiceInfo {
  service: string;
  version: string;
}

const startTime = Date.now();

export function createHealthRouter(source: HealthSource, info: ServiceInfo): Router {
  const router = Router();

  // Liveness probe (always 200 while the process is up)
  router.get('/live', (_req, res) => {
    res.status(200).json({ status: 'ok' });
  });

  router.get('/', (_req, res) => {
    res.status(200).json({
      status: 'healthy',
      service: info.service,
      version: info.version,
      uptime_seconds: Math.floor((Date.now() - startTime) / 1000),
      active_calls: source.activeCallCount(),
      features: source.features(),
    });
  });

  return router;
}
