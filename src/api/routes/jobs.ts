import { Router, type Request, type Response, type NextFunction } from 'express';
import { ValidationError } from '../../errors/application-errors.js';
import { toJobResponse, toJobStatisticsResponse } from '../../models/job.js';
import { jobCreateSchema, jobSearchQuerySchema, jobUpdateSchema, toJobCreateInput, toJobSearch, toJobUpdateInput, type JobSearchQuery } from '../../schemas/job.js';
import { toPageResponse } from '../../schemas/common.js';
import { buildCacheKey, cachedJson } from '../../cache/redis.js';
import type { JobService } from '../../services/job-service.js';
import { parseId, parseWith } from '../validation.js';

/**
 * Jobs API: list, search, statistics, CRUD
 */
export function createJobsRouter(service: JobService): Router {
  const router = Router();

  const listJobs = (parsed: JobSearchQuery, cachePrefix: string) => {
    const { filters, pagination } = toJobSearch(parsed);
    return cachedJson(buildCacheKey(cachePrefix, parsed), async () =>
      toPageResponse(await service.search(filters, pagination), (job) => toJobResponse(job))
    );
  };

  /**
   * GET / - Paginated, filtered job list
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = parseWith(jobSearchQuerySchema, req.query);
      res.json(await listJobs(parsed, 'jobs:list'));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /search - Same as the list, with a required query
   */
  router.get('/search', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = parseWith(jobSearchQuerySchema, req.query);
      if (!parsed.query) {
        throw new ValidationError('Search query is required', { query: ['Required'] });
      }
      res.json(await listJobs(parsed, 'jobs:search'));
    } catch (error) {
      next(error);
    }
  });

  router.get('/statistics/summary', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const stats = await cachedJson('jobs:stats', async () => toJobStatisticsResponse(await service.getStatistics()));
      res.json(stats);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const job = await service.getById(parseId(req.params.id, 'job_id'));
      res.json(toJobResponse(job));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseWith(jobCreateSchema, req.body, 'Invalid job data');
      const job = await service.create(toJobCreateInput(body));
      res.status(201).json(toJobResponse(job));
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseId(req.params.id, 'job_id');
      const body = parseWith(jobUpdateSchema, req.body, 'Invalid job data');
      const job = await service.update(id, toJobUpdateInput(body));
      res.json(toJobResponse(job));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await service.delete(parseId(req.params.id, 'job_id'));
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
