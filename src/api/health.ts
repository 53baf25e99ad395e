import { Router } from 'express';
import { asyncHandler } from '@/api/error-handler';
import type { FeedFilterStats } from '@/services/feed-filter';
import type { CacheStats } from '@/core/expiring-cache';
import logger from '@/utils/logger';

interface HealthCheckable {
  healthCheck: () => Promise<boolean>;
}

export interface HealthServices {
  metrics: HealthCheckable;
  filter: {
    replyFilteringEnabled: boolean;
    stats: () => FeedFilterStats;
  };
  caches: {
    participants: { stats: () => CacheStats };
    following: { stats: () => CacheStats };
  };
  accounts: Array<{ id: string; platform: string; handle: string }>;
}

interface ServiceCheck {
  service: string;
  status: string;
  healthy: boolean;
  error?: string;
}

export function createHealthRouter(services: HealthServices): Router {
  const router = Router();

  router.get('/health', asyncHandler(async (req, res) => {
    const startTime = Date.now();

    const serviceChecks: ServiceCheck[] = [
      await checkService('metrics', services.metrics),
      {
        service: 'accounts',
        status: services.accounts.length > 0 ? 'configured' : 'none_linked',
        healthy: true
      }
    ];

    const allHealthy = serviceChecks.every(check => check.healthy);

    res.status(allHealthy ? 200 : 503).json({
      status: allHealthy ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      version: process.env.npm_package_version || '1.0.0',
      uptime: process.uptime(),
      responseTime: Date.now() - startTime,
      replyFiltering: {
        enabled: services.filter.replyFilteringEnabled,
        stats: services.filter.stats()
      },
      caches: {
        participants: services.caches.participants.stats(),
        following: services.caches.following.stats()
      },
      accounts: services.accounts.map(account => ({
        id: account.id,
        platform: account.platform,
        handle: account.handle
      })),
      services: Object.fromEntries(serviceChecks.map(check => [
        check.service,
        { status: check.status, healthy: check.healthy, ...(check.error ? { error: check.error } : {}) }
      ]))
    });

    if (!allHealthy) {
      logger.warn('Health check failed', {
        unhealthyServices: serviceChecks.filter(c => !c.healthy).map(c => c.service)
      });
    }
  }));

  router.get('/health/live', (req, res) => {
    // Liveness check - is the process alive?
    res.status(200).json({
      status: 'alive',
      timestamp: new Date().toISOString(),
      pid: process.pid,
      uptime: process.uptime()
    });
  });

  return router;
}

async function checkService(name: string, service: HealthCheckable): Promise<ServiceCheck> {
  try {
    const healthy = await service.healthCheck();
    return {
      service: name,
      status: healthy ? 'healthy' : 'unhealthy',
      healthy
    };
  } catch (error) {
    return {
      service: name,
      status: 'error',
      healthy: false,
      error: error instanceof Error ? error.message : 'Unknown error'
    };
  }
}
