import { env } from './config/env';
import { initPool, closePool, databaseHealthCheck } from './shared/db';
import { describeError, logger } from './shared/logger';
import { createApp, type HealthChecks } from './app';
import { initRedis, closeRedis, redisHealthCheck } from './cache/redis';
import { createRedisCacheStore } from './cache/cache';
import { buildBudgetPolicy } from './modules/cost/budget';
import { CostGovernor } from './modules/cost/cost-governor';
import { pgCostLedgerStore } from './modules/cost/cost-ledger.repository';
import { Deduplicator } from './modules/dedup/deduplicator';
import { pgPlaceIndexStore } from './modules/dedup/place-index.repository';
import { EnrichmentCache } from './modules/enrichment/enrichment-cache';
import { pgCacheStore, purgeExpired } from './modules/enrichment/enrichment-cache.repository';
import { pgEnrichmentResultStore, pgJobOutputReader } from './modules/enrichment/enrichment-result.repository';
import { createStrategyRegistry } from './modules/enrichment/strategy-registry';
import { EnrichmentWaterfall } from './modules/enrichment/waterfall';
import { JobOrchestrator } from './modules/jobs/job-orchestrator';
import { pgJobStore } from './modules/jobs/job.repository';
import { ProgressBus } from './modules/jobs/progress-bus';
import { pgBusinessStore } from './modules/search/business.repository';
import { createGeocoder } from './modules/search/geocoder';
import { createMapsSearchClient, SEARCH_PAGE_SIZE } from './modules/search/maps-search.client';
import { SearchProvider } from './modules/search/search-provider';

const CACHE_PURGE_INTERVAL_MS = 60 * 60 * 1000;

async function main(): Promise<void> {
  initPool({ connectionString: env.DATABASE_URL });

  // Redis is optional; without it the enrichment cache lives in Postgres
  if (env.REDIS_URL) {
    initRedis(env.REDIS_URL);
  }

  // One governor per process owns every budget window
  const governor = await CostGovernor.create({
    policy: buildBudgetPolicy({
      dailySpend: env.BUDGET_DAILY_SPEND,
      weeklySpend: env.BUDGET_WEEKLY_SPEND,
      monthlySpend: env.BUDGET_MONTHLY_SPEND,
      dailyRequests: env.BUDGET_DAILY_REQUESTS,
      weeklyRequests: env.BUDGET_WEEKLY_REQUESTS,
      monthlyRequests: env.BUDGET_MONTHLY_REQUESTS,
      providers: env.PROVIDER_BUDGETS,
    }),
    ledger: pgCostLedgerStore,
    searchCostPerPage: env.SEARCH_COST_PER_PAGE,
    searchMaxPages: env.SEARCH_MAX_PAGES,
    searchPageSize: SEARCH_PAGE_SIZE,
  });

  const search = new SearchProvider({
    transport: createMapsSearchClient({ apiUrl: env.SEARCH_API_URL, apiKey: env.SEARCH_API_KEY }),
    geocoder: createGeocoder(env.GEOCODER_URL),
    budget: governor,
    costPerPage: env.SEARCH_COST_PER_PAGE,
    maxPages: env.SEARCH_MAX_PAGES,
  });

  const registry = createStrategyRegistry({
    hunterApiKey: env.HUNTER_API_KEY,
    hunterCostPerCall: env.HUNTER_COST_PER_CALL,
    maxEmails: env.MAX_EMAILS_PER_BUSINESS,
  });
  const strategies = registry.resolveOrder(env.WATERFALL_ORDER);
  const order = strategies.map((s) => s.slug);
  logger.info('Enrichment waterfall configured', { order });

  const cacheStore = env.REDIS_URL ? createRedisCacheStore(pgCacheStore) : pgCacheStore;
  const waterfall = new EnrichmentWaterfall({
    strategies,
    budget: governor,
    cache: new EnrichmentCache(cacheStore, env.ENRICHMENT_CACHE_TTL),
    results: pgEnrichmentResultStore,
    threshold: env.EMAIL_CONFIDENCE_THRESHOLD,
    maxEmails: env.MAX_EMAILS_PER_BUSINESS,
    strategyTimeoutMs: env.STRATEGY_TIMEOUT_MS,
  });

  const progress = new ProgressBus();
  progress.subscribe((event) => {
    logger.info('Job progress', {
      jobId: event.jobId,
      batchId: event.batchId,
      status: event.status,
      progressPercent: event.progressPercent,
      detail: event.detailMessage,
    });
  });

  const orchestrator = new JobOrchestrator({
    jobs: pgJobStore,
    businesses: pgBusinessStore,
    dedup: new Deduplicator(pgPlaceIndexStore),
    search,
    waterfall,
    output: pgJobOutputReader,
    progress,
    concurrency: env.ENRICHMENT_CONCURRENCY,
    strictBudget: env.STRICT_BUDGET,
  });

  const health: HealthChecks = { postgres: databaseHealthCheck };
  if (env.REDIS_URL) health.redis = redisHealthCheck;

  const app = createApp({
    orchestrator,
    costs: {
      governor,
      estimateEnrichmentCost: (records) => registry.estimateCost(records, order),
    },
    health,
  });

  const purgeTimer = setInterval(() => {
    purgeExpired()
      .then((removed) => {
        if (removed > 0) logger.info('Purged expired enrichment cache entries', { removed });
      })
      .catch((err: unknown) => {
        logger.warn('Enrichment cache purge failed', { error: describeError(err) });
      });
  }, CACHE_PURGE_INTERVAL_MS);
  purgeTimer.unref();

  const server = app.listen(env.PORT, () => {
    logger.info(`Server listening on port ${env.PORT}`, {
      port: env.PORT,
      nodeEnv: env.NODE_ENV,
    });
  });

  // Graceful shutdown
  async function shutdown(signal: string): Promise<void> {
    logger.info(`Received ${signal}, shutting down gracefully`);

    // Stop accepting new connections
    server.close();
    clearInterval(purgeTimer);

    // Running jobs stop at the next record boundary and stay resumable
    await orchestrator.shutdown();

    await closeRedis();
    await closePool();

    logger.info('Shutdown complete');
    process.exit(0);
  }

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
}

main().catch((err: unknown) => {
  logger.error('Server failed to start', { error: describeError(err) });
  process.exit(1);
});
