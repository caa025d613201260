import { Router, type Request, type Response, type NextFunction } from 'express';
import { ValidationError } from '../../errors/application-errors.js';
import { toCompanyResponse, toCompanyStatisticsResponse } from '../../models/company.js';
import { toJobResponse } from '../../models/job.js';
import {
  companyCreateSchema,
  companySearchQuerySchema,
  companyUpdateSchema,
  toCompanyCreateInput,
  toCompanySearch,
  toCompanyUpdateInput,
  type CompanySearchQuery,
} from '../../schemas/company.js';
import { paginationSchema, toPageResponse, toPaginationParams } from '../../schemas/common.js';
import { buildCacheKey, cachedJson } from '../../cache/redis.js';
import type { CompanyService } from '../../services/company-service.js';
import { parseId, parseWith } from '../validation.js';

export function createCompaniesRouter(service: CompanyService): Router {
  const router = Router();

  const listCompanies = (parsed: CompanySearchQuery, cachePrefix: string) => {
    const { filters, pagination } = toCompanySearch(parsed);
    return cachedJson(buildCacheKey(cachePrefix, parsed), async () =>
      toPageResponse(await service.search(filters, pagination), (company) => toCompanyResponse(company))
    );
  };

  router.get('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.json(await listCompanies(parseWith(companySearchQuerySchema, req.query), 'companies:list'));
    } catch (error) {
      next(error);
    }
  });

  router.get('/search', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const parsed = parseWith(companySearchQuerySchema, req.query);
      if (!parsed.query) {
        throw new ValidationError('Search query is required', { query: ['Required'] });
      }
      res.json(await listCompanies(parsed, 'companies:search'));
    } catch (error) {
      next(error);
    }
  });

  router.get('/statistics/summary', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const stats = await cachedJson('companies:stats', async () =>
        toCompanyStatisticsResponse(await service.getStatistics())
      );
      res.json(stats);
    } catch (error) {
      next(error);
    }
  });

  router.get('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const company = await service.getById(parseId(req.params.id, 'company_id'));
      res.json(toCompanyResponse(company));
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /:id/jobs - The company's active jobs
   */
  router.get('/:id/jobs', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseId(req.params.id, 'company_id');
      const pagination = toPaginationParams(parseWith(paginationSchema, req.query));
      const page = await service.listJobs(id, pagination);
      res.json(toPageResponse(page, (job) => toJobResponse(job)));
    } catch (error) {
      next(error);
    }
  });

  router.post('/', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const body = parseWith(companyCreateSchema, req.body, 'Invalid company data');
      const company = await service.create(toCompanyCreateInput(body));
      res.status(201).json(toCompanyResponse(company));
    } catch (error) {
      next(error);
    }
  });

  router.put('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      const id = parseId(req.params.id, 'company_id');
      const body = parseWith(companyUpdateSchema, req.body, 'Invalid company data');
      res.json(toCompanyResponse(await service.update(id, toCompanyUpdateInput(body))));
    } catch (error) {
      next(error);
    }
  });

  router.delete('/:id', async (req: Request, res: Response, next: NextFunction) => {
    try {
      await service.delete(parseId(req.params.id, 'company_id'));
      res.status(204).end();
    } catch (error) {
      next(error);
    }
  });

  return router;
}
