import type { IScheduledTask, TaskResult } from '../core/interfaces.js';
import type { ScrapedJob } from '../core/types.js';
import { config, type Config } from '../config.js';
import { detailedHealth, type HealthProbes } from '../api/routes/health.js';
import type { AnalysisRepository } from '../repositories/analysis.js';
import type { JobRepository } from '../repositories/job.js';
import type { ScraperManager } from '../scrapers/manager.js';
import type { AnalysisService } from '../services/analysis-service.js';
import type { CompanyService } from '../services/company-service.js';
import { COMPANIES_CACHE_PREFIX } from '../services/company-service.js';
import type { JobIngestionService } from '../services/ingestion.js';
import { JOBS_CACHE_PREFIX, type Invalidate } from '../services/job-service.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const ANALYSIS_BATCH_SIZE = 50;

export interface TaskDependencies {
  jobs: Pick<JobRepository, 'deactivateOlderThan' | 'countCreatedSince' | 'getStatistics'>;
  analyses: Pick<AnalysisRepository, 'deleteFailedOlderThan' | 'countCreatedSince' | 'getStatistics'>;
  analysis: Pick<AnalysisService, 'analyzeUnanalyzed'>;
  companies: Pick<CompanyService, 'refreshJobCounts'>;
  scrapers: Pick<ScraperManager, 'scrapeAll'>;
  ingestion: Pick<JobIngestionService, 'execute'>;
  probes: HealthProbes;
  invalidate: Invalidate;
  now?: () => Date;
}

export type TaskSettings = Pick<
  Config,
  'SCRAPE_INTERVAL_HOURS' | 'SCRAPE_QUERIES' | 'SCRAPE_LOCATIONS' | 'DATA_RETENTION_DAYS'
>;

export const TASK_NAMES = [
  'scrape_jobs',
  'analyze_new_jobs',
  'cleanup_old_data',
  'health_check',
  'daily_report',
  'refresh_cache',
  'update_job_stats',
] as const;

export type TaskName = (typeof TASK_NAMES)[number];

interface TaskDefinition extends IScheduledTask {
  readonly name: TaskName;
}

/**
 * The periodic maintenance and ingestion tasks, wired to their dependencies
 */
export function createTasks(deps: TaskDependencies, settings: TaskSettings = config): TaskDefinition[] {
  const now = deps.now ?? (() => new Date());
  const completed = (data: Record<string, unknown>): TaskResult => ({
    status: 'completed',
    ...data,
    timestamp: now().toISOString(),
  });

  return [
    {
      name: 'scrape_jobs',
      schedule: `0 */${settings.SCRAPE_INTERVAL_HOURS} * * *`,
      async run(log) {
        const collected: ScrapedJob[] = [];
        let searches = 0;
        let scraperErrors = 0;

        for (const query of settings.SCRAPE_QUERIES) {
          for (const location of settings.SCRAPE_LOCATIONS) {
            const { jobs, runs } = await deps.scrapers.scrapeAll(query, { location });
            searches++;
            scraperErrors += runs.filter((run) => run.error !== undefined).length;
            collected.push(...jobs);
            log.debug(`"${query}" in ${location}: ${jobs.length} jobs`);
          }
        }

        const ingestion = await deps.ingestion.execute(collected);
        log.info(`Scraped ${collected.length} jobs in ${searches} searches, inserted ${ingestion.inserted}`);
        return completed({ searches, scraped: collected.length, scraper_errors: scraperErrors, ...ingestion });
      },
    },
    {
      name: 'analyze_new_jobs',
      schedule: '30 */2 * * *',
      async run(log) {
        const result = await deps.analysis.analyzeUnanalyzed(ANALYSIS_BATCH_SIZE);
        log.info(`Analyzed ${result.analyzed}/${result.candidates} jobs (${result.failed} failed)`);
        return completed({ ...result });
      },
    },
    {
      name: 'cleanup_old_data',
      schedule: '0 2 * * *',
      async run(log) {
        const cutoff = new Date(now().getTime() - settings.DATA_RETENTION_DAYS * DAY_MS);
        const deactivatedJobs = await deps.jobs.deactivateOlderThan(cutoff);
        const deletedAnalyses = await deps.analyses.deleteFailedOlderThan(cutoff);
        if (deactivatedJobs > 0) {
          await deps.invalidate(JOBS_CACHE_PREFIX);
        }
        log.info(`Deactivated ${deactivatedJobs} jobs, deleted ${deletedAnalyses} failed analyses`);
        return completed({ cutoff: cutoff.toISOString(), deactivated_jobs: deactivatedJobs, deleted_analyses: deletedAnalyses });
      },
    },
    {
      name: 'health_check',
      schedule: '*/5 * * * *',
      async run(log) {
        const health = await detailedHealth(deps.probes);
        const summary = `database=${health.components.database.status} redis=${health.components.redis.status}`;
        if (health.status === 'healthy') {
          log.debug(`System healthy (${summary})`);
        } else {
          log.warn(`System ${health.status} (${summary})`);
        }
        return completed({ health: health.status, components: health.components });
      },
    },
    {
      name: 'daily_report',
      schedule: '0 6 * * *',
      async run(log) {
        const since = new Date(now().getTime() - DAY_MS);
        const [newJobs, newAnalyses, jobStats, analysisStats] = await Promise.all([
          deps.jobs.countCreatedSince(since),
          deps.analyses.countCreatedSince(since),
          deps.jobs.getStatistics(),
          deps.analyses.getStatistics(),
        ]);

        const report = {
          period_start: since.toISOString(),
          new_jobs: newJobs,
          new_analyses: newAnalyses,
          active_jobs: jobStats.activeJobs,
          remote_jobs: jobStats.remoteJobs,
          analysis_success_rate: analysisStats.successRate,
          average_match_score: analysisStats.averageMatchScore,
        };
        log.info('Daily report', report);
        return completed({ report });
      },
    },
    {
      name: 'refresh_cache',
      schedule: '0 * * * *',
      async run(log) {
        const invalidated =
          (await deps.invalidate(JOBS_CACHE_PREFIX)) + (await deps.invalidate(COMPANIES_CACHE_PREFIX));
        log.info(`Invalidated ${invalidated} cached responses`);
        return completed({ invalidated_keys: invalidated });
      },
    },
    {
      name: 'update_job_stats',
      schedule: '*/30 * * * *',
      async run(log) {
        const updated = await deps.companies.refreshJobCounts();
        log.info(`Refreshed job counts of ${updated} companies`);
        return completed({ updated_companies: updated });
      },
    },
  ];
}
