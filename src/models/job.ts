import type { Job, JobStatistics, NameCount } from '../core/types.js';

const DAY_MS = 24 * 60 * 60 * 1000;
const RECENT_DAYS = 30;

function formatAmount(amount: number, currency: string): string {
  const formatted = Math.round(amount).toLocaleString('en-US');
  return currency === 'USD' ? `$${formatted}` : `${currency} ${formatted}`;
}

/**
 * Human readable salary range: "$120,000 - $150,000", "$90,000+", "Up to $200,000"
 */
export function salaryRangeDisplay(job: Pick<Job, 'salaryMin' | 'salaryMax' | 'currency'>): string | null {
  const { salaryMin, salaryMax, currency } = job;
  if (salaryMin !== null && salaryMax !== null) {
    return `${formatAmount(salaryMin, currency)} - ${formatAmount(salaryMax, currency)}`;
  }
  if (salaryMin !== null) {
    return `${formatAmount(salaryMin, currency)}+`;
  }
  if (salaryMax !== null) {
    return `Up to ${formatAmount(salaryMax, currency)}`;
  }
  return null;
}

export function isRecentJob(job: Pick<Job, 'postedDate'>, now = new Date()): boolean {
  if (!job.postedDate) {
    return false;
  }
  return now.getTime() - job.postedDate.getTime() <= RECENT_DAYS * DAY_MS;
}

export function hasSalaryInfo(job: Pick<Job, 'salaryMin' | 'salaryMax'>): boolean {
  return job.salaryMin !== null || job.salaryMax !== null;
}

export function isExpiredJob(job: Pick<Job, 'expiresDate'>, now = new Date()): boolean {
  return job.expiresDate !== null && job.expiresDate.getTime() < now.getTime();
}

export interface JobResponse {
  id: number;
  title: string;
  company_name: string;
  company_id: number | null;
  location: string | null;
  salary_min: number | null;
  salary_max: number | null;
  currency: string;
  description: string | null;
  requirements: string | null;
  job_level: string | null;
  employment_type: string | null;
  remote_friendly: boolean;
  posted_date: string | null;
  expires_date: string | null;
  source_url: string;
  source_platform: string;
  company_logo_url: string | null;
  ai_fit_score: number | null;
  ai_summary: string | null;
  extracted_skills: string[];
  is_active: boolean;
  created_at: string;
  updated_at: string;
  salary_range_display: string | null;
  is_recent: boolean;
  has_salary_info: boolean;
  is_expired: boolean;
}

export function toJobResponse(job: Job, now = new Date()): JobResponse {
  return {
    id: job.id,
    title: job.title,
    company_name: job.companyName,
    company_id: job.companyId,
    location: job.location,
    salary_min: job.salaryMin,
    salary_max: job.salaryMax,
    currency: job.currency,
    description: job.description,
    requirements: job.requirements,
    job_level: job.jobLevel,
    employment_type: job.employmentType,
    remote_friendly: job.remoteFriendly,
    posted_date: job.postedDate?.toISOString() ?? null,
    expires_date: job.expiresDate?.toISOString() ?? null,
    source_url: job.sourceUrl,
    source_platform: job.sourcePlatform,
    company_logo_url: job.companyLogoUrl,
    ai_fit_score: job.aiFitScore,
    ai_summary: job.aiSummary,
    extracted_skills: job.extractedSkills,
    is_active: job.isActive,
    created_at: job.createdAt.toISOString(),
    updated_at: job.updatedAt.toISOString(),
    salary_range_display: salaryRangeDisplay(job),
    is_recent: isRecentJob(job, now),
    has_salary_info: hasSalaryInfo(job),
    is_expired: isExpiredJob(job, now),
  };
}

export interface JobStatisticsResponse {
  total_jobs: number;
  active_jobs: number;
  recent_jobs: number;
  jobs_with_salary: number;
  remote_jobs: number;
  average_salary_min: number | null;
  average_salary_max: number | null;
  top_companies: NameCount[];
  top_locations: NameCount[];
}

export function toJobStatisticsResponse(stats: JobStatistics): JobStatisticsResponse {
  return {
    total_jobs: stats.totalJobs,
    active_jobs: stats.activeJobs,
    recent_jobs: stats.recentJobs,
    jobs_with_salary: stats.jobsWithSalary,
    remote_jobs: stats.remoteJobs,
    average_salary_min: stats.averageSalaryMin,
    average_salary_max: stats.averageSalaryMax,
    top_companies: stats.topCompanies,
    top_locations: stats.topLocations,
  };
}
