import express, { type Express } from 'express';
import { config } from '../config.js';
import { errorHandler, notFoundHandler } from '../errors/error-handler.js';
import type { AnalysisService } from '../services/analysis-service.js';
import type { CompanyService } from '../services/company-service.js';
import type { JobService } from '../services/job-service.js';
import { apiRateLimiter, corsMiddleware, requestLogger } from './middleware.js';
import { createAnalysisRouter, type ErrorSources } from './routes/analysis.js';
import { createCompaniesRouter } from './routes/companies.js';
import { createHealthRouter, type HealthProbes } from './routes/health.js';
import { createJobsRouter } from './routes/jobs.js';
import { createMetricsRouter } from './routes/metrics.js';

export interface AppDependencies {
  jobs: JobService;
  companies: CompanyService;
  analysis: AnalysisService;
  probes?: HealthProbes;
  errorSources?: ErrorSources;
  rateLimitPerMinute?: number;
  corsOrigins?: readonly string[];
}

export function createApp(deps: AppDependencies): Express {
  const app = express();

  // Trust proxy for rate limiting behind reverse proxy
  app.set('trust proxy', 1);
  app.disable('x-powered-by');

  app.use(express.json({ limit: '1mb' }));
  app.use(corsMiddleware(deps.corsOrigins ?? config.CORS_ORIGINS));
  app.use(requestLogger());
  app.use('/api', apiRateLimiter(deps.rateLimitPerMinute ?? config.RATE_LIMIT_PER_MINUTE));

  app.get('/', (_req, res) => {
    res.json({ service: config.APP_NAME, version: config.APP_VERSION, health: '/health', api: '/api/v1' });
  });

  const jobsRouter = createJobsRouter(deps.jobs);
  app.use('/health', createHealthRouter(deps.probes));
  app.use('/metrics', createMetricsRouter());
  app.use('/api/v1/jobs', jobsRouter);
  app.use('/jobs', jobsRouter);
  app.use('/api/v1/companies', createCompaniesRouter(deps.companies));
  app.use('/api/v1/analysis', createAnalysisRouter(deps.analysis, deps.errorSources));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
