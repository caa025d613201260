import { describe, it, expect } from 'vitest';
import { makeCompany } from '../testing/fixtures.js';
import { companyAge, displayLocation, hasGoodRating, isStartup, toCompanyResponse } from './company.js';

const NOW = new Date('2024-03-10T12:00:00Z');

describe('company model', () => {
  it('joins headquarters parts, falling back to the free-text location', () => {
    expect(displayLocation(makeCompany())).toBe('Austin, Texas, United States');
    expect(
      displayLocation(
        makeCompany({
          headquartersCity: null,
          headquartersState: null,
          headquartersCountry: null,
          headquartersLocation: 'Berlin',
        })
      )
    ).toBe('Berlin');
  });

  it('derives age and startup status from the founding year', () => {
    expect(companyAge({ foundedYear: 2001 }, NOW)).toBe(23);
    expect(companyAge({ foundedYear: null }, NOW)).toBeNull();
    expect(isStartup({ size: 'medium', foundedYear: 2018 }, NOW)).toBe(true);
    expect(isStartup({ size: 'medium', foundedYear: 2001 }, NOW)).toBe(false);
    expect(isStartup({ size: 'startup', foundedYear: null }, NOW)).toBe(true);
    expect(isStartup({ size: null, foundedYear: null }, NOW)).toBe(false);
  });

  it('calls a rating of 4.0 or more good', () => {
    expect(hasGoodRating({ glassdoorRating: 4.0 })).toBe(true);
    expect(hasGoodRating({ glassdoorRating: 3.9 })).toBe(false);
    expect(hasGoodRating({ glassdoorRating: null })).toBe(false);
  });

  it('maps to the response shape', () => {
    expect(toCompanyResponse(makeCompany(), NOW)).toMatchObject({
      name: 'Acme Corp',
      headquarters_city: 'Austin',
      job_count: 3,
      display_location: 'Austin, Texas, United States',
      company_age: 23,
      is_startup: false,
      has_good_rating: true,
      created_at: '2024-03-01T00:00:00.000Z',
    });
  });
});
