import 'dotenv/config';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import type { Server } from 'http';

// Core
import { ExpiringCache } from '@/core/expiring-cache';
import { IdentitySet } from '@/core/identity-set';

// Services
import { MetricsService } from '@/services/metrics';
import { MastodonClient } from '@/services/mastodon';
import { BlueskyClient } from '@/services/bluesky';
import {
  ThreadResolverRegistry,
  MastodonThreadResolver,
  BlueskyThreadResolver,
  ThreadParticipants
} from '@/services/resolvers';
import { FollowingAggregator } from '@/services/following';
import { FeedFilterCoordinator } from '@/services/feed-filter';
import { TimelineAssembler } from '@/services/timeline';

// API
import { createHealthRouter } from '@/api/health';
import { createMetricsRouter } from '@/api/metrics';
import { createFlagsRouter } from '@/api/flags';
import { createTimelineRouter } from '@/api/timeline';
import { errorHandler, notFoundHandler } from '@/api/error-handler';

// Config & Utils
import appConfig from '@/config';
import type { Config } from '@/types/config';
import logger from '@/utils/logger';

class FeedServer {
  private readonly app: express.Application;
  private server: Server | null = null;

  private readonly metricsService: MetricsService;
  private readonly participantCache: ExpiringCache<ThreadParticipants>;
  private readonly followingCache: ExpiringCache<IdentitySet>;
  private readonly feedFilter: FeedFilterCoordinator;
  private readonly following: FollowingAggregator;
  private readonly assembler: TimelineAssembler;

  constructor(private readonly config: Config = appConfig) {
    // The logger is created before config loads
    logger.level = config.logging.level;

    this.app = express();
    this.setupMiddleware();

    const { filter, following, cache, timeline, accounts } = config;

    this.metricsService = new MetricsService();

    this.participantCache = new ExpiringCache<ThreadParticipants>({
      defaultTtlMs: filter.participantTtlSeconds * 1000,
      maxEntries: cache.maxEntries
    });
    this.followingCache = new ExpiringCache<IdentitySet>({
      defaultTtlMs: following.ttlSeconds * 1000,
      maxEntries: cache.maxEntries
    });

    // Platform clients
    const mastodon = new MastodonClient(accounts, {
      timeoutMs: timeline.timeoutMs,
      maxFollowingPages: following.maxPages
    });
    const bluesky = new BlueskyClient(accounts, {
      timeoutMs: timeline.timeoutMs,
      maxFollowingPages: following.maxPages
    });

    this.feedFilter = new FeedFilterCoordinator(
      new ThreadResolverRegistry([
        new MastodonThreadResolver(mastodon),
        new BlueskyThreadResolver(bluesky)
      ]),
      this.participantCache,
      {
        enabled: filter.replyFilteringEnabled,
        minFollowedParticipants: filter.minFollowedParticipants,
        participantTtlMs: filter.participantTtlSeconds * 1000,
        resolutionTimeoutMs: filter.resolutionTimeoutMs,
        maxConcurrentResolutions: filter.maxConcurrentResolutions
      },
      this.metricsService
    );

    this.following = new FollowingAggregator(
      [
        { platform: 'mastodon', fetchFollowing: (id, signal) => mastodon.getFollowing(id, signal) },
        { platform: 'bluesky', fetchFollowing: (id, signal) => bluesky.getFollows(id, signal) }
      ],
      this.followingCache,
      { ttlMs: following.ttlSeconds * 1000, fetchTimeoutMs: following.fetchTimeoutMs },
      this.metricsService
    );

    this.assembler = new TimelineAssembler(
      accounts,
      [
        { platform: 'mastodon', fetchHomeTimeline: (id, limit, signal) => mastodon.getHomeTimeline(id, limit, signal) },
        { platform: 'bluesky', fetchHomeTimeline: (id, limit, signal) => bluesky.getTimeline(id, limit, signal) }
      ],
      this.following,
      this.feedFilter,
      { pageSize: timeline.pageSize, timeoutMs: timeline.timeoutMs }
    );

    this.setupRoutes();
    // Error handlers must be registered after the routes
    this.setupErrorHandling();
  }

  private setupMiddleware(): void {
    this.app.use(helmet());
    this.app.use(cors(this.config.server.cors));
    this.app.use(express.json({ limit: '100kb' }));

    // Request logging
    this.app.use((req, res, next) => {
      logger.debug('HTTP Request', {
        method: req.method,
        url: req.url,
        ip: req.ip
      });
      next();
    });
  }

  private setupRoutes(): void {
    this.app.use('/api', createHealthRouter({
      metrics: this.metricsService,
      filter: this.feedFilter,
      caches: {
        participants: this.participantCache,
        following: this.followingCache
      },
      accounts: this.config.accounts
    }));
    this.app.use('/api', createFlagsRouter(this.feedFilter));
    this.app.use('/api', createTimelineRouter(this.assembler));
    this.app.use('/', createMetricsRouter(this.metricsService));

    this.app.get('/', (req, res) => {
      res.json({
        name: 'crossfeed',
        version: process.env.npm_package_version || '1.0.0',
        status: 'running',
        timestamp: new Date().toISOString()
      });
    });
  }

  private setupErrorHandling(): void {
    this.app.use(notFoundHandler);
    this.app.use(errorHandler);
  }

  async start(): Promise<void> {
    logger.info('Starting crossfeed...', {
      accounts: this.config.accounts.map(account => `${account.platform}:${account.id} (${account.handle})`),
      replyFiltering: this.feedFilter.replyFilteringEnabled
    });

    const sweepMs = this.config.cache.sweepIntervalSeconds * 1000;
    this.participantCache.startSweeper(sweepMs);
    this.followingCache.startSweeper(sweepMs);

    const { host, port } = this.config.server;
    await new Promise<void>((resolve, reject) => {
      const server = this.app.listen(port, host, () => {
        logger.info(`HTTP server listening on ${host}:${port}`);
        resolve();
      });
      server.on('error', (error: Error) => {
        logger.error('HTTP server error:', error);
        reject(error);
      });
      this.server = server;
    });
  }

  async stop(): Promise<void> {
    logger.info('Stopping crossfeed...');

    this.participantCache.stopSweeper();
    this.followingCache.stopSweeper();

    const server = this.server;
    if (server) {
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
      });
      this.server = null;
    }

    logger.info('crossfeed stopped');
  }

  getApp(): express.Application {
    return this.app;
  }
}

// Handle process signals
function setupSignalHandlers(server: FeedServer): void {
  const signals: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

  signals.forEach((signal) => {
    process.on(signal, () => {
      logger.info(`Received ${signal}, shutting down gracefully...`);
      server.stop()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
          logger.error('Error during shutdown:', error);
          process.exit(1);
        });
    });
  });

  process.on('uncaughtException', (error) => {
    logger.error('Uncaught exception:', error);
    process.exit(1);
  });

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled rejection:', reason);
    process.exit(1);
  });
}

// Start server if this file is run directly
if (require.main === module) {
  const server = new FeedServer();

  setupSignalHandlers(server);

  server.start().catch((error: unknown) => {
    logger.error('Failed to start server:', error);
    process.exit(1);
  });
}

export default FeedServer;
