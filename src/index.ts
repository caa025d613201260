import type { Server } from 'http';
import { config } from './config.js';
import { logger } from './utils/logger.js';
import { captureError, flushSentry, initSentry } from './utils/sentry.js';
import { createApp } from './api/app.js';
import { defaultProbes } from './api/routes/health.js';
import { disconnectDb, getQueryable, pingDb } from './db/client.js';
import { disconnectRedis, initRedis, invalidatePrefix } from './cache/redis.js';
import { PgAnalysisRepository } from './repositories/analysis.js';
import { PgCompanyRepository } from './repositories/company.js';
import { PgJobRepository } from './repositories/job.js';
import { AnalysisService } from './services/analysis-service.js';
import { CompanyService } from './services/company-service.js';
import { JobIngestionService } from './services/ingestion.js';
import { JobService } from './services/job-service.js';
import { IndeedScraper } from './scrapers/indeed.js';
import { ScraperManager } from './scrapers/manager.js';
import { initScheduler, stopScheduler } from './scheduler/cron.js';

let server: Server | null = null;

function closeServer(): Promise<void> {
  return new Promise((resolve, reject) => {
    if (!server) {
      resolve();
      return;
    }
    server.close((error) => (error ? reject(error) : resolve()));
  });
}

// Graceful shutdown
async function shutdown(signal: string): Promise<void> {
  logger.info('Server', `${signal} received, shutting down...`);
  stopScheduler();
  try {
    await closeServer();
    await disconnectRedis();
    await disconnectDb();
  } catch (error) {
    logger.error('Server', 'Error during shutdown', error);
    process.exitCode = 1;
  }
  await flushSentry();
  process.exit();
}

process.on('SIGINT', () => void shutdown('SIGINT'));
process.on('SIGTERM', () => void shutdown('SIGTERM'));

async function start(): Promise<void> {
  logger.info('Server', `=== ${config.APP_NAME} ${config.APP_VERSION} starting (${config.NODE_ENV}) ===`);
  initSentry();

  logger.info('Server', 'Testing database connection...');
  const ms = await pingDb();
  logger.info('Server', `Database connected (${ms}ms)`);

  await initRedis();

  const db = getQueryable();
  const jobRepository = new PgJobRepository(db);
  const companyRepository = new PgCompanyRepository(db);
  const analysisRepository = new PgAnalysisRepository(db);

  const jobs = new JobService(jobRepository);
  const companies = new CompanyService(companyRepository, jobRepository);
  const analysis = new AnalysisService(jobRepository, analysisRepository);

  if (config.ENABLE_SCHEDULER) {
    const scrapers = new ScraperManager();
    scrapers.register(new IndeedScraper());
    initScheduler({
      jobs: jobRepository,
      analyses: analysisRepository,
      analysis,
      companies,
      scrapers,
      ingestion: new JobIngestionService(jobRepository),
      probes: defaultProbes,
      invalidate: invalidatePrefix,
    });
  } else {
    logger.info('Server', 'Scheduler disabled (ENABLE_SCHEDULER=false)');
  }

  const app = createApp({ jobs, companies, analysis });
  server = app.listen(config.PORT, () => {
    logger.info('Server', `Listening on port ${config.PORT}`);
    logger.info('Server', '=== Ready for requests ===');
  });
}

start().catch(async (error: unknown) => {
  logger.error('Server', 'Failed to start', error);
  captureError(error, { phase: 'startup' });
  await flushSentry();
  process.exit(1);
});
