/**
 * Core types - shared across the application
 */

export const EMPLOYMENT_TYPES = ['Full-time', 'Part-time', 'Contract', 'Internship', 'Temporary'] as const;
export type EmploymentType = (typeof EMPLOYMENT_TYPES)[number];

export const SOURCE_PLATFORMS = ['linkedin', 'indeed', 'levelfyi', 'manual'] as const;
export type SourcePlatform = (typeof SOURCE_PLATFORMS)[number];

export const COMPANY_SIZES = ['startup', 'small', 'medium', 'large', 'enterprise'] as const;
export type CompanySize = (typeof COMPANY_SIZES)[number];

export const COMPANY_TYPES = ['public', 'private', 'non-profit', 'government', 'startup'] as const;
export type CompanyType = (typeof COMPANY_TYPES)[number];

export const ANALYSIS_TYPES = [
  'job_match',
  'market_analysis',
  'trend_analysis',
  'salary_analysis',
  'skill_gap',
  'company_analysis',
] as const;
export type AnalysisType = (typeof ANALYSIS_TYPES)[number];

export const ANALYSIS_STATUSES = ['pending', 'processing', 'completed', 'failed'] as const;
export type AnalysisStatus = (typeof ANALYSIS_STATUSES)[number];

export type SortOrder = 'asc' | 'desc';
export type SalaryPeriod = 'hourly' | 'weekly' | 'monthly' | 'annual';

// ----------------------------------------------------------------------------
// Jobs
// ----------------------------------------------------------------------------

export interface Job {
  id: number;
  title: string;
  companyName: string;
  companyId: number | null;
  location: string | null;
  salaryMin: number | null;
  salaryMax: number | null;
  currency: string;
  description: string | null;
  requirements: string | null;
  jobLevel: string | null;
  employmentType: EmploymentType | null;
  remoteFriendly: boolean;
  postedDate: Date | null;
  expiresDate: Date | null;
  sourceUrl: string;
  sourcePlatform: SourcePlatform;
  companyLogoUrl: string | null;
  aiFitScore: number | null;
  aiSummary: string | null;
  extractedSkills: string[];
  createdAt: Date;
  updatedAt: Date;
  isActive: boolean;
}

export type JobCreateInput = Omit<Job, 'id' | 'createdAt' | 'updatedAt' | 'isActive' | 'aiFitScore' | 'aiSummary'>;

export type JobUpdateInput = Partial<Omit<Job, 'id' | 'createdAt' | 'updatedAt'>>;

export interface JobSearchFilters {
  query?: string;
  location?: string;
  company?: string;
  companyExact?: string;
  jobType?: EmploymentType;
  jobLevel?: string;
  sourcePlatform?: SourcePlatform;
  salaryMin?: number;
  salaryMax?: number;
  isRemote?: boolean;
  hasSalary?: boolean;
  postedDaysAgo?: number;
  skills?: string[];
}

export interface NameCount {
  name: string;
  count: number;
}

export interface JobStatistics {
  totalJobs: number;
  activeJobs: number;
  recentJobs: number;
  jobsWithSalary: number;
  remoteJobs: number;
  averageSalaryMin: number | null;
  averageSalaryMax: number | null;
  topCompanies: NameCount[];
  topLocations: NameCount[];
}

// ----------------------------------------------------------------------------
// Companies
// ----------------------------------------------------------------------------

export interface Company {
  id: number;
  name: string;
  description: string | null;
  website: string | null;
  industry: string | null;
  size: CompanySize | null;
  companyType: CompanyType | null;
  foundedYear: number | null;
  headquartersLocation: string | null;
  headquartersCountry: string | null;
  headquartersState: string | null;
  headquartersCity: string | null;
  logoUrl: string | null;
  linkedinUrl: string | null;
  glassdoorUrl: string | null;
  glassdoorRating: number | null;
  employeeCount: number | null;
  tags: string[];
  benefits: string[];
  cultureKeywords: string[];
  isActive: boolean;
  isHiring: boolean;
  jobCount: number;
  createdAt: Date;
  updatedAt: Date;
}

export type CompanyCreateInput = Omit<Company, 'id' | 'createdAt' | 'updatedAt' | 'isActive' | 'jobCount'>;

export type CompanyUpdateInput = Partial<Omit<Company, 'id' | 'createdAt' | 'updatedAt' | 'jobCount'>>;

export interface CompanySearchFilters {
  query?: string;
  industry?: string;
  size?: CompanySize;
  companyType?: CompanyType;
  location?: string;
  minRating?: number;
  isHiring?: boolean;
  hasJobs?: boolean;
  foundedAfter?: number;
  foundedBefore?: number;
  tags?: string[];
}

export interface CompanyStatistics {
  totalCompanies: number;
  activeCompanies: number;
  hiringCompanies: number;
  wellRatedCompanies: number;
  topIndustries: NameCount[];
  topCountries: NameCount[];
  sizeDistribution: Record<string, number>;
}

// ----------------------------------------------------------------------------
// Analyses
// ----------------------------------------------------------------------------

export interface Insight {
  category: string;
  insight: string;
  importance: 'high' | 'medium' | 'low';
  timestamp: string;
}

export interface Recommendation {
  recommendation: string;
  action_type: string;
  priority: 'high' | 'medium' | 'low';
  timestamp: string;
}

export interface Analysis {
  id: number;
  jobId: number;
  userId: string | null;
  analysisType: AnalysisType;
  analysisVersion: string;
  aiModelUsed: string | null;
  results: Record<string, unknown>;
  confidenceScore: number | null;
  matchScore: number | null;
  skillMatchScore: number | null;
  experienceMatchScore: number | null;
  locationMatchScore: number | null;
  salaryMatchScore: number | null;
  cultureMatchScore: number | null;
  keyInsights: Insight[];
  recommendations: Recommendation[];
  redFlags: string[];
  status: AnalysisStatus;
  errorMessage: string | null;
  processingTimeSeconds: number | null;
  createdAt: Date;
  updatedAt: Date;
}

export type AnalysisCreateInput = Omit<Analysis, 'id' | 'createdAt' | 'updatedAt'>;

export interface AnalysisSearchFilters {
  jobId?: number;
  userId?: string;
  analysisType?: AnalysisType;
  status?: AnalysisStatus;
  minMatchScore?: number;
}

export interface AnalysisStatistics {
  totalAnalyses: number;
  completedAnalyses: number;
  failedAnalyses: number;
  highMatchAnalyses: number;
  recentAnalyses: number;
  successRate: number;
  highMatchRate: number;
  averageMatchScore: number | null;
  averageConfidenceScore: number | null;
  analysisTypes: Record<string, number>;
  aiModelsUsed: Record<string, number>;
}

// ----------------------------------------------------------------------------
// Pagination
// ----------------------------------------------------------------------------

export interface PaginationParams {
  page: number;
  size: number;
  sortBy?: string;
  sortOrder: SortOrder;
}

export interface Page<T> {
  items: T[];
  totalCount: number;
  page: number;
  size: number;
  totalPages: number;
  hasNext: boolean;
  hasPrevious: boolean;
}

// ----------------------------------------------------------------------------
// Matching
// ----------------------------------------------------------------------------

export type ExperienceLevel = 'entry' | 'junior' | 'mid' | 'senior' | 'lead' | 'principal';

export interface UserProfile {
  skills: string[];
  experienceLevel: ExperienceLevel;
  preferredLocations: string[];
  salaryExpectationMin: number | null;
  salaryExpectationMax: number | null;
}

export interface MatchInsights {
  strengths: string[];
  concerns: string[];
  opportunities: string[];
}

export interface MatchRecommendation {
  type: 'apply' | 'improve' | 'research';
  text: string;
  priority: 'high' | 'medium' | 'low';
}

/**
 * Rule-based match result. Persisted as-is in analyses.results, so keys are snake_case.
 */
export interface JobMatchResult {
  overall_score: number;
  skill_match_score: number;
  experience_match_score: number;
  location_match_score: number;
  salary_match_score: number;
  culture_match_score: number;
  confidence_score: number;
  matching_skills: string[];
  missing_skills: string[];
  match_reasons: string[];
  insights: MatchInsights;
  recommendations: MatchRecommendation[];
  application_priority: 'high' | 'medium' | 'low';
}

// ----------------------------------------------------------------------------
// Scraping
// ----------------------------------------------------------------------------

export interface ScrapedJob {
  title: string;
  companyName: string;
  location: string | null;
  description: string | null;
  requirements: string | null;
  salaryMin: number | null;
  salaryMax: number | null;
  salaryCurrency: string;
  salaryPeriod: SalaryPeriod | null;
  employmentType: EmploymentType | null;
  experienceLevel: string | null;
  postedDate: Date | null;
  sourcePlatform: SourcePlatform;
  sourceJobId: string | null;
  sourceUrl: string | null;
  skills: string[];
  isRemote: boolean;
  companyLogoUrl: string | null;
}

export interface IngestionResult {
  processed: number;
  inserted: number;
  duplicates: number;
  invalid: number;
}
