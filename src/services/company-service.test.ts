import { describe, it, expect, vi } from 'vitest';
import { ConflictError, NotFoundError } from '../errors/application-errors.js';
import type { CompanyCreateInput } from '../core/types.js';
import { fakeCompanyRepository, fakeJobRepository, makeCompany } from '../testing/fixtures.js';
import { CompanyService } from './company-service.js';

function createService() {
  const companies = fakeCompanyRepository();
  const jobs = fakeJobRepository();
  const invalidate = vi.fn().mockResolvedValue(0);
  return { companies, jobs, invalidate, service: new CompanyService(companies, jobs, invalidate) };
}

function companyInput(): CompanyCreateInput {
  const { id: _id, createdAt: _c, updatedAt: _u, isActive: _a, jobCount: _j, ...input } = makeCompany();
  return input;
}

const pagination = { page: 2, size: 10, sortOrder: 'desc' as const };

describe('CompanyService', () => {
  it('rejects a duplicate name before inserting', async () => {
    const { companies, service } = createService();
    companies.findByName.mockResolvedValueOnce(makeCompany({ id: 7 }));

    await expect(service.create(companyInput())).rejects.toThrow(ConflictError);
    expect(companies.create).not.toHaveBeenCalled();
  });

  it('creates and invalidates the company cache', async () => {
    const { companies, invalidate, service } = createService();
    companies.findByName.mockResolvedValueOnce(null);
    companies.create.mockResolvedValueOnce(makeCompany());

    const company = await service.create(companyInput());

    expect(company.name).toBe('Acme Corp');
    expect(invalidate).toHaveBeenCalledWith('companies');
  });

  it('allows an update that keeps its own name', async () => {
    const { companies, service } = createService();
    companies.findByName.mockResolvedValueOnce(makeCompany({ id: 1 }));
    companies.update.mockResolvedValueOnce(makeCompany({ industry: 'Fintech' }));

    const company = await service.update(1, { name: 'Acme Corp', industry: 'Fintech' });

    expect(company.industry).toBe('Fintech');
  });

  it('rejects renaming onto another company', async () => {
    const { companies, service } = createService();
    companies.findByName.mockResolvedValueOnce(makeCompany({ id: 2 }));

    await expect(service.update(1, { name: 'Acme Corp' })).rejects.toThrow('Company "Acme Corp" already exists');
  });

  it('lists jobs by the exact company name', async () => {
    const { companies, jobs, service } = createService();
    companies.findById.mockResolvedValueOnce(makeCompany({ name: 'Globex' }));
    jobs.search.mockResolvedValueOnce({ items: [], totalCount: 0, page: 2, size: 10, totalPages: 0, hasNext: false, hasPrevious: true });

    await service.listJobs(1, pagination);

    expect(jobs.search).toHaveBeenCalledWith({ companyExact: 'Globex' }, pagination);
  });

  it('reports unknown companies', async () => {
    const { companies, service } = createService();
    companies.findById.mockResolvedValueOnce(null);
    companies.softDelete.mockResolvedValueOnce(false);

    await expect(service.listJobs(5, pagination)).rejects.toThrow(NotFoundError);
    await expect(service.delete(5)).rejects.toThrow(NotFoundError);
  });

  it('only invalidates when job counts changed', async () => {
    const { companies, invalidate, service } = createService();
    companies.refreshJobCounts.mockResolvedValueOnce(0).mockResolvedValueOnce(4);

    expect(await service.refreshJobCounts()).toBe(0);
    expect(invalidate).not.toHaveBeenCalled();
    expect(await service.refreshJobCounts()).toBe(4);
    expect(invalidate).toHaveBeenCalledTimes(1);
  });
});
