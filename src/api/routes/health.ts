import { Router, type Request, type Response } from 'express';
import { config, configuredApiKeys } from '../../config.js';
import { pingDb } from '../../db/client.js';
import { pingRedis } from '../../cache/redis.js';
import { logger } from '../../utils/logger.js';

export interface HealthProbes {
  /** Round-trip in ms; throws when the database is down */
  database: () => Promise<number>;
  /** Round-trip in ms, or null when Redis is not connected */
  redis: () => Promise<number | null>;
  apiKeys: () => Record<string, boolean>;
}

export const defaultProbes: HealthProbes = {
  database: () => pingDb(),
  redis: () => pingRedis(),
  apiKeys: configuredApiKeys,
};

export type OverallStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface ComponentCheck {
  status: 'healthy' | 'unhealthy' | 'unavailable';
  response_time_ms?: number;
  error?: string;
}

export interface DetailedHealth {
  status: OverallStatus;
  timestamp: string;
  version: string;
  environment: string;
  components: {
    database: ComponentCheck;
    redis: ComponentCheck;
    api_keys: Record<string, boolean>;
  };
}

async function checkDatabase(probes: HealthProbes): Promise<ComponentCheck> {
  try {
    return { status: 'healthy', response_time_ms: await probes.database() };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.error('Health', 'Database check failed', message);
    return { status: 'unhealthy', error: message };
  }
}

async function checkRedis(probes: HealthProbes): Promise<ComponentCheck> {
  try {
    const ms = await probes.redis();
    return ms === null ? { status: 'unavailable' } : { status: 'healthy', response_time_ms: ms };
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logger.warn('Health', 'Redis check failed', message);
    return { status: 'unhealthy', error: message };
  }
}

export async function detailedHealth(probes: HealthProbes = defaultProbes): Promise<DetailedHealth> {
  const [database, redis] = await Promise.all([checkDatabase(probes), checkRedis(probes)]);

  let status: OverallStatus = 'healthy';
  if (database.status !== 'healthy') {
    status = 'unhealthy';
  } else if (redis.status !== 'healthy') {
    status = 'degraded';
  }

  return {
    status,
    timestamp: new Date().toISOString(),
    version: config.APP_VERSION,
    environment: config.NODE_ENV,
    components: { database, redis, api_keys: probes.apiKeys() },
  };
}

export function createHealthRouter(probes: HealthProbes = defaultProbes): Router {
  const router = Router();

  router.get('/', (_req: Request, res: Response) => {
    res.json({
      status: 'healthy',
      timestamp: new Date().toISOString(),
      version: config.APP_VERSION,
      environment: config.NODE_ENV,
      service: config.APP_NAME,
    });
  });

  router.get('/detailed', async (_req: Request, res: Response) => {
    const health = await detailedHealth(probes);
    res.status(health.status === 'unhealthy' ? 503 : 200).json(health);
  });

  router.get('/ready', async (_req: Request, res: Response) => {
    const database = await checkDatabase(probes);
    if (database.status === 'healthy') {
      res.json({ status: 'ready', timestamp: new Date().toISOString() });
    } else {
      res.status(503).json({ status: 'not_ready', timestamp: new Date().toISOString(), error: database.error });
    }
  });

  router.get('/live', (_req: Request, res: Response) => {
    res.json({ status: 'alive', timestamp: new Date().toISOString(), uptime_seconds: Math.round(process.uptime()) });
  });

  return router;
}
