import { z } from 'zod';
import {
  ANALYSIS_STATUSES,
  ANALYSIS_TYPES,
  type AnalysisCreateInput,
  type AnalysisSearchFilters,
  type ExperienceLevel,
  type PaginationParams,
  type UserProfile,
} from '../core/types.js';
import { MAX_INT, checkRange, optionalText, paginationShape, toPaginationParams } from './common.js';

const EXPERIENCE_LEVELS = ['entry', 'junior', 'mid', 'senior', 'lead', 'principal'] as const satisfies readonly ExperienceLevel[];

const score = z.number().min(0).max(1);

export const userProfileSchema = z
  .object({
    skills: z.array(z.string().trim().min(1).max(100)).max(200).default([]),
    experience_level: z.enum(EXPERIENCE_LEVELS).default('mid'),
    preferred_locations: z.array(z.string().trim().min(1).max(255)).max(50).default([]),
    salary_expectation_min: z.number().min(0).nullish(),
    salary_expectation_max: z.number().min(0).nullish(),
  })
  .superRefine((value, ctx) =>
    checkRange(
      value.salary_expectation_min,
      value.salary_expectation_max,
      ctx,
      'salary_expectation_max',
      'salary_expectation_min must be less than or equal to salary_expectation_max'
    )
  );

export function toUserProfile(parsed: z.infer<typeof userProfileSchema>): UserProfile {
  return {
    skills: parsed.skills,
    experienceLevel: parsed.experience_level,
    preferredLocations: parsed.preferred_locations,
    salaryExpectationMin: parsed.salary_expectation_min ?? null,
    salaryExpectationMax: parsed.salary_expectation_max ?? null,
  };
}

export const analyzeJobBodySchema = z.object({
  user_id: z.string().trim().min(1).max(100).optional(),
  user_profile: userProfileSchema.optional(),
  force_refresh: z.boolean().default(false),
});

export const analysisCreateSchema = z.object({
  job_id: z.number().int().positive().max(MAX_INT),
  user_id: z.string().trim().min(1).max(100).nullish(),
  analysis_type: z.enum(ANALYSIS_TYPES).default('job_match'),
  ai_model_used: z.string().trim().max(100).nullish(),
  results: z.record(z.unknown()).default({}),
  confidence_score: score.nullish(),
  match_score: score.nullish(),
  skill_match_score: score.nullish(),
  experience_match_score: score.nullish(),
  location_match_score: score.nullish(),
  salary_match_score: score.nullish(),
  culture_match_score: score.nullish(),
  red_flags: z.array(z.string()).default([]),
  status: z.enum(ANALYSIS_STATUSES).default('pending'),
});

export type AnalysisCreateBody = z.infer<typeof analysisCreateSchema>;

export function toAnalysisCreateInput(body: AnalysisCreateBody): AnalysisCreateInput {
  return {
    jobId: body.job_id,
    userId: body.user_id ?? null,
    analysisType: body.analysis_type,
    analysisVersion: '1.0',
    aiModelUsed: body.ai_model_used ?? null,
    results: body.results,
    confidenceScore: body.confidence_score ?? null,
    matchScore: body.match_score ?? null,
    skillMatchScore: body.skill_match_score ?? null,
    experienceMatchScore: body.experience_match_score ?? null,
    locationMatchScore: body.location_match_score ?? null,
    salaryMatchScore: body.salary_match_score ?? null,
    cultureMatchScore: body.culture_match_score ?? null,
    keyInsights: [],
    recommendations: [],
    redFlags: body.red_flags,
    status: body.status,
    errorMessage: null,
    processingTimeSeconds: null,
  };
}

export const analysisListQuerySchema = z.object({
  ...paginationShape,
  job_id: z.coerce.number().int().positive().max(MAX_INT).optional(),
  user_id: optionalText(100),
  analysis_type: z.enum(ANALYSIS_TYPES).optional(),
  status: z.enum(ANALYSIS_STATUSES).optional(),
  min_match_score: z.coerce.number().min(0).max(1).optional(),
});

export function toAnalysisSearch(
  parsed: z.infer<typeof analysisListQuerySchema>
): { filters: AnalysisSearchFilters; pagination: PaginationParams } {
  return {
    filters: {
      jobId: parsed.job_id,
      userId: parsed.user_id,
      analysisType: parsed.analysis_type,
      status: parsed.status,
      minMatchScore: parsed.min_match_score,
    },
    pagination: toPaginationParams(parsed),
  };
}
