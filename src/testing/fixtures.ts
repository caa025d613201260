import { vi } from 'vitest';
import type { Analysis, Company, Job } from '../core/types.js';

const CREATED = new Date('2024-03-01T00:00:00Z');

export function makeJob(overrides: Partial<Job> = {}): Job {
  return {
    id: 1,
    title: 'Data Analyst',
    companyName: 'Acme Corp',
    companyId: null,
    location: 'Remote',
    salaryMin: 90000,
    salaryMax: 110000,
    currency: 'USD',
    description: 'Analyze product usage with SQL and Python.',
    requirements: null,
    jobLevel: null,
    employmentType: 'Full-time',
    remoteFriendly: true,
    postedDate: CREATED,
    expiresDate: null,
    sourceUrl: 'https://example.com/jobs/1',
    sourcePlatform: 'indeed',
    companyLogoUrl: null,
    aiFitScore: null,
    aiSummary: null,
    extractedSkills: ['SQL', 'Python'],
    isActive: true,
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  };
}

export function makeCompany(overrides: Partial<Company> = {}): Company {
  return {
    id: 1,
    name: 'Acme Corp',
    description: null,
    website: null,
    industry: 'Software',
    size: 'medium',
    companyType: 'private',
    foundedYear: 2001,
    headquartersLocation: null,
    headquartersCountry: 'United States',
    headquartersState: 'Texas',
    headquartersCity: 'Austin',
    logoUrl: null,
    linkedinUrl: null,
    glassdoorUrl: null,
    glassdoorRating: 4.2,
    employeeCount: 800,
    tags: [],
    benefits: [],
    cultureKeywords: [],
    isActive: true,
    isHiring: true,
    jobCount: 3,
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  };
}

export function makeAnalysis(overrides: Partial<Analysis> = {}): Analysis {
  return {
    id: 10,
    jobId: 1,
    userId: null,
    analysisType: 'job_match',
    analysisVersion: '1.0',
    aiModelUsed: 'rule_based',
    results: {},
    confidenceScore: null,
    matchScore: null,
    skillMatchScore: null,
    experienceMatchScore: null,
    locationMatchScore: null,
    salaryMatchScore: null,
    cultureMatchScore: null,
    keyInsights: [],
    recommendations: [],
    redFlags: [],
    status: 'processing',
    errorMessage: null,
    processingTimeSeconds: null,
    createdAt: CREATED,
    updatedAt: CREATED,
    ...overrides,
  };
}

export function fakeJobRepository() {
  return {
    search: vi.fn(),
    findById: vi.fn(),
    findBySourceUrl: vi.fn(),
    findActiveByTitleAndCompany: vi.fn(),
    findWithoutAnalysis: vi.fn(),
    create: vi.fn(),
    update: vi.fn(),
    softDelete: vi.fn(),
    deactivateOlderThan: vi.fn(),
    countCreatedSince: vi.fn(),
    getStatistics: vi.fn(),
  };
}

export function fakeCompanyRepository() {
  return {
    search: vi.fn(),
    findById: vi.fn(),
    findByName: vi.fn(),
    create: vi.fn(),
    update: vi.fn(),
    softDelete: vi.fn(),
    refreshJobCounts: vi.fn(),
    getStatistics: vi.fn(),
  };
}

export function fakeAnalysisRepository() {
  return {
    create: vi.fn(),
    findById: vi.fn(),
    search: vi.fn(),
    findLatestCompleted: vi.fn(),
    save: vi.fn(),
    deleteFailedOlderThan: vi.fn(),
    countCreatedSince: vi.fn(),
    getStatistics: vi.fn(),
  };
}
