import { describe, it, expect } from 'vitest';
import { makeJob } from '../testing/fixtures.js';
import { salaryRangeDisplay, toJobResponse } from './job.js';

describe('salaryRangeDisplay', () => {
  it('formats full and open-ended ranges', () => {
    expect(salaryRangeDisplay({ salaryMin: 120000, salaryMax: 150000, currency: 'USD' })).toBe('$120,000 - $150,000');
    expect(salaryRangeDisplay({ salaryMin: 90000, salaryMax: null, currency: 'USD' })).toBe('$90,000+');
    expect(salaryRangeDisplay({ salaryMin: null, salaryMax: 200000, currency: 'USD' })).toBe('Up to $200,000');
    expect(salaryRangeDisplay({ salaryMin: null, salaryMax: null, currency: 'USD' })).toBeNull();
  });

  it('prefixes other currencies with their code', () => {
    expect(salaryRangeDisplay({ salaryMin: 50000, salaryMax: 60000, currency: 'EUR' })).toBe('EUR 50,000 - EUR 60,000');
  });
});

describe('toJobResponse', () => {
  it('adds the derived flags', () => {
    const job = makeJob({ expiresDate: new Date('2024-03-05T00:00:00Z') });

    const response = toJobResponse(job, new Date('2024-03-10T12:00:00Z'));

    expect(response).toMatchObject({
      company_name: 'Acme Corp',
      posted_date: '2024-03-01T00:00:00.000Z',
      expires_date: '2024-03-05T00:00:00.000Z',
      salary_range_display: '$90,000 - $110,000',
      is_recent: true,
      has_salary_info: true,
      is_expired: true,
    });
  });

  it('treats jobs posted over 30 days ago as not recent', () => {
    const response = toJobResponse(makeJob({ salaryMin: null, salaryMax: null }), new Date('2024-04-15T00:00:00Z'));

    expect(response.is_recent).toBe(false);
    expect(response.has_salary_info).toBe(false);
    expect(response.is_expired).toBe(false);
  });
});
