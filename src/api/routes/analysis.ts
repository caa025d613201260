import { Router, type Request, type Response, type NextFunction } from 'express';
import { toAnalysisResponse, toAnalysisStatisticsResponse } from '../../models/analysis.js';
import {
  analysisCreateSchema,
  analysisListQuerySchema,
  analyzeJobBodySchema,
  toAnalysisCreateInput,
  toAnalysisSearch,
  toUserProfile,
} from '../../schemas/analysis.js';
import { toPageResponse } from '../../schemas/common.js';
import { errorTracker, type ErrorTracker } from '../../errors/error-handler.js';
import { recoveryHandler, type UserFriendlyErrorHandler } from '../../errors/recovery.js';
import type { AnalysisService } from '../../services/analysis-service.js';
import { parseId, parseWith } from '../validation.js';

export interface ErrorSources {
  recovery: Pick<UserFriendlyErrorHandler, 'getRecoveryMetrics'>;
  tracker: Pick<ErrorTracker, 'getStatistics'>;
}

export function createAnalysisRouter(
  service: AnalysisService,
  errors: ErrorSources = { recovery: recoveryHandler, tracker: errorTracker }
): Router {
  const router = Router();

  /**
   * POST /jobs/:id/analyze - Match a job against a profile, reusing a recent result
   */
  router.post('/jobs/:id/analyze', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const jobId = parseId(req.params.id, 'job_id');
      const body = parseWith(analyzeJobBodySchema, req.body, 'Invalid analysis request');
      const { analysis, reused } = await service.analyzeJob(jobId, {
        userId: body.user_id,
        profile: body.user_profile ? toUserProfile(body.user_profile) : undefined,
        forceRefresh: body.force_refresh,
      });
      res.json({ analysis: toAnalysisResponse(analysis), reused });
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseWith(analysisCreateSchema, req.body, 'Invalid analysis data');
      const analysis = await service.createAnalysis(toAnalysisCreateInput(body));
      res.status(201).json(toAnalysisResponse(analysis));
    } catch (error) {
      next(error);
    }
  });

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const { filters, pagination } = toAnalysisSearch(parseWith(analysisListQuerySchema, req.query));
      const page = await service.search(filters, pagination);
      res.json(toPageResponse(page, (analysis) => toAnalysisResponse(analysis)));
    } catch (error) {
      next(error);
    }
  });

  router.get('/statistics', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(toAnalysisStatisticsResponse(await service.getStatistics()));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /errors/statistics - Recovery handler and API error counters
   */
  router.get('/errors/statistics', (_req: Request, res: Response) => {
    res.json({
      recovery: errors.recovery.getRecoveryMetrics(),
      api_errors: errors.tracker.getStatistics(),
      timestamp: new Date().toISOString(),
    });
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const analysis = await service.getById(parseId(req.params.id, 'analysis_id'));
      res.json(toAnalysisResponse(analysis));
    } catch (error) {
      next(error);
    }
  });

  return router;
}
