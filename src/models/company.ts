import type { Company, CompanyStatistics, NameCount } from '../core/types.js';

const STARTUP_MAX_AGE_YEARS = 10;
const GOOD_RATING = 4.0;

export function displayLocation(company: Company): string | null {
  const parts = [company.headquartersCity, company.headquartersState, company.headquartersCountry].filter(
    (part): part is string => Boolean(part)
  );
  if (parts.length > 0) {
    return parts.join(', ');
  }
  return company.headquartersLocation;
}

export function companyAge(company: Pick<Company, 'foundedYear'>, now = new Date()): number | null {
  if (company.foundedYear === null) {
    return null;
  }
  return now.getFullYear() - company.foundedYear;
}

export function isStartup(company: Pick<Company, 'size' | 'foundedYear'>, now = new Date()): boolean {
  if (company.size === 'startup') {
    return true;
  }
  const age = companyAge(company, now);
  return age !== null && age <= STARTUP_MAX_AGE_YEARS;
}

export function hasGoodRating(company: Pick<Company, 'glassdoorRating'>): boolean {
  return company.glassdoorRating !== null && company.glassdoorRating >= GOOD_RATING;
}

export interface CompanyResponse {
  id: number;
  name: string;
  description: string | null;
  website: string | null;
  industry: string | null;
  size: string | null;
  company_type: string | null;
  founded_year: number | null;
  headquarters_location: string | null;
  headquarters_country: string | null;
  headquarters_state: string | null;
  headquarters_city: string | null;
  logo_url: string | null;
  linkedin_url: string | null;
  glassdoor_url: string | null;
  glassdoor_rating: number | null;
  employee_count: number | null;
  tags: string[];
  benefits: string[];
  culture_keywords: string[];
  is_active: boolean;
  is_hiring: boolean;
  job_count: number;
  created_at: string;
  updated_at: string;
  display_location: string | null;
  company_age: number | null;
  is_startup: boolean;
  has_good_rating: boolean;
}

export function toCompanyResponse(company: Company, now = new Date()): CompanyResponse {
  return {
    id: company.id,
    name: company.name,
    description: company.description,
    website: company.website,
    industry: company.industry,
    size: company.size,
    company_type: company.companyType,
    founded_year: company.foundedYear,
    headquarters_location: company.headquartersLocation,
    headquarters_country: company.headquartersCountry,
    headquarters_state: company.headquartersState,
    headquarters_city: company.headquartersCity,
    logo_url: company.logoUrl,
    linkedin_url: company.linkedinUrl,
    glassdoor_url: company.glassdoorUrl,
    glassdoor_rating: company.glassdoorRating,
    employee_count: company.employeeCount,
    tags: company.tags,
    benefits: company.benefits,
    culture_keywords: company.cultureKeywords,
    is_active: company.isActive,
    is_hiring: company.isHiring,
    job_count: company.jobCount,
    created_at: company.createdAt.toISOString(),
    updated_at: company.updatedAt.toISOString(),
    display_location: displayLocation(company),
    company_age: companyAge(company, now),
    is_startup: isStartup(company, now),
    has_good_rating: hasGoodRating(company),
  };
}

export interface CompanyStatisticsResponse {
  total_companies: number;
  active_companies: number;
  hiring_companies: number;
  well_rated_companies: number;
  top_industries: NameCount[];
  top_countries: NameCount[];
  size_distribution: Record<string, number>;
}

export function toCompanyStatisticsResponse(stats: CompanyStatistics): CompanyStatisticsResponse {
  return {
    total_companies: stats.totalCompanies,
    active_companies: stats.activeCompanies,
    hiring_companies: stats.hiringCompanies,
    well_rated_companies: stats.wellRatedCompanies,
    top_industries: stats.topIndustries,
    top_countries: stats.topCountries,
    size_distribution: stats.sizeDistribution,
  };
}
