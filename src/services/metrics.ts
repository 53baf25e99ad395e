import client from 'prom-client';
import logger from '@/utils/logger';
import type { FilterReason } from '@/types/post';
import type { Platform } from '@/types/identity';

export type ResolutionOutcome = 'success' | 'network' | 'not_found' | 'decode' | 'cancelled' | 'no_resolver';

/**
 * Where the feed pipeline reports what it did. The pipeline writes to it
 * but does not own it; MetricsService is the production implementation.
 */
export interface FeedMetricsSink {
  recordDecision(reason: FilterReason, platform: Platform): void;
  recordResolution(platform: Platform, outcome: ResolutionOutcome, durationSeconds: number): void;
  recordParticipantCache(result: 'hit' | 'miss'): void;
  recordFollowingFetch(platform: Platform, status: 'fetched' | 'cached' | 'failed'): void;
}

export class MetricsService implements FeedMetricsSink {
  private readonly registry: client.Registry;

  // Counters
  private readonly decisionsTotal: client.Counter<string>;
  private readonly participantCacheTotal: client.Counter<string>;
  private readonly followingFetchesTotal: client.Counter<string>;

  // Histograms
  private readonly resolutionDuration: client.Histogram<string>;

  constructor(options: { collectDefaults?: boolean } = {}) {
    this.registry = new client.Registry();

    this.decisionsTotal = new client.Counter({
      name: 'crossfeed_filter_decisions_total',
      help: 'Reply filter decisions by reason',
      labelNames: ['reason', 'platform'],
      registers: [this.registry]
    });

    this.participantCacheTotal = new client.Counter({
      name: 'crossfeed_participant_cache_total',
      help: 'Thread participant cache lookups',
      labelNames: ['result'],
      registers: [this.registry]
    });

    this.followingFetchesTotal = new client.Counter({
      name: 'crossfeed_following_fetches_total',
      help: 'Per-account following set lookups',
      labelNames: ['platform', 'status'],
      registers: [this.registry]
    });

    this.resolutionDuration = new client.Histogram({
      name: 'crossfeed_thread_resolution_duration_seconds',
      help: 'Thread participant resolution time in seconds',
      labelNames: ['platform', 'outcome'],
      buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
      registers: [this.registry]
    });

    if (options.collectDefaults ?? true) {
      client.collectDefaultMetrics({ register: this.registry });
    }

    logger.info('Metrics service initialized');
  }

  recordDecision(reason: FilterReason, platform: Platform): void {
    this.decisionsTotal.inc({ reason, platform });
  }

  recordResolution(platform: Platform, outcome: ResolutionOutcome, durationSeconds: number): void {
    this.resolutionDuration.observe({ platform, outcome }, durationSeconds);
  }

  recordParticipantCache(result: 'hit' | 'miss'): void {
    this.participantCacheTotal.inc({ result });
  }

  recordFollowingFetch(platform: Platform, status: 'fetched' | 'cached' | 'failed'): void {
    this.followingFetchesTotal.inc({ platform, status });
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  getRegistry(): client.Registry {
    return this.registry;
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.getMetrics();
      return true;
    } catch (error) {
      logger.error('Metrics health check failed:', error);
      return false;
    }
  }
}

/**
 * Sink that discards everything, for wiring without metrics
 */
export const noopMetrics: FeedMetricsSink = {
  recordDecision: () => undefined,
  recordResolution: () => undefined,
  recordParticipantCache: () => undefined,
  recordFollowingFetch: () => undefined
};
