import type { Request, Response, NextFunction, RequestHandler } from 'express';
import client from 'prom-client';

/**
 * Runtime Prometheus metrics.
 *
 * prom-client Histogram.startTimer() measures seconds; this module records
 * milliseconds to match the *_ms metric names.
 */

const register = new client.Registry();
const METRICS_PREFIX = 'voice_dialogue_runtime_';

client.collectDefaultMetrics({
  register,
  prefix: METRICS_PREFIX,
});

const httpRequestDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}http_request_duration_ms`,
  help: 'HTTP request duration in milliseconds (Express)',
  labelNames: ['method', 'route', 'code'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000],
  registers: [register],
});

// Collaborator stage duration (completion/tts/stt)
const stageDurationMs = new client.Histogram({
  name: `${METRICS_PREFIX}stage_duration_ms`,
  help: 'Stage duration in milliseconds (completion/tts/stt)',
  labelNames: ['stage'] as const,
  buckets: [5, 10, 25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 20000, 60000],
  registers: [register],
});

const stageErrorsTotal = new client.Counter({
  name: `${METRICS_PREFIX}stage_errors_total`,
  help: 'Count of errors by stage (completion/tts/stt)',
  labelNames: ['stage'] as const,
  registers: [register],
});

const replySourceTotal = new client.Counter({
  name: `${METRICS_PREFIX}reply_source_total`,
  help: 'Replies produced, by the strategy that produced them',
  labelNames: ['source'] as const,
  registers: [register],
});

const callCompletionsTotal = new client.Counter({
  name: `${METRICS_PREFIX}call_completions_total`,
  help: 'Calls that reached the ended state',
  labelNames: ['direction', 'reason'] as const,
  registers: [register],
});

const callTurns = new client.Histogram({
  name: `${METRICS_PREFIX}call_turns`,
  help: 'Number of turns per call',
  labelNames: ['direction'] as const,
  buckets: [0, 1, 2, 3, 5, 10, 20],
  registers: [register],
});

function nowNs(): bigint {
  return process.hrtime.bigint();
}

function nsToMs(ns: bigint): number {
  return Number(ns) / 1_000_000;
}

// Avoid high-cardinality route labels
function getRouteLabel(req: Request): string {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string') {
    return `${req.baseUrl}${routePath}`;
  }

  const raw = req.path || req.url || 'unknown';
  return raw
    .replace(/\b[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}\b/gi, ':uuid')
    .replace(/\b[0-9a-f]{16,}\b/gi, ':id')
    .replace(/\b\d{6,}\b/g, ':n');
}

export const metricsMiddleware: RequestHandler = (req: Request, res: Response, next: NextFunction) => {
  const start = nowNs();

  res.on('finish', () => {
    try {
      httpRequestDurationMs.observe(
        {
          method: req.method,
          route: getRouteLabel(req),
          code: String(res.statusCode),
        },
        nsToMs(nowNs() - start),
      );
    } catch {
      // never break requests due to metrics
    }
  });

  next();
};

export async function metricsHandler(_req: Request, res: Response): Promise<void> {
  res.setHeader('Content-Type', register.contentType);
  res.status(200).send(await register.metrics());
}

/**
 * Starts a stage timer and returns an end() function that records
 * milliseconds in stageDurationMs.
 */
export function startStageTimer(stage: string): () => void {
  const start = nowNs();

  return () => {
    try {
      stageDurationMs.observe({ stage }, nsToMs(nowNs() - start));
    } catch {
      // swallow
    }
  };
}

export function incStageError(stage: string): void {
  stageErrorsTotal.inc({ stage });
}

export function incReplySource(source: string): void {
  replySourceTotal.inc({ source });
}

export function recordCallMetrics(opts: { direction: string; reason?: string; turns: number }): void {
  try {
    callCompletionsTotal.inc({ direction: opts.direction, reason: opts.reason ?? 'unknown' });
    callTurns.observe({ direction: opts.direction }, opts.turns);
  } catch {
    // swallow
  }
}
