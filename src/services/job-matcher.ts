import type { IService } from '../core/interfaces.js';
import type {
  ExperienceLevel,
  Job,
  JobMatchResult,
  MatchInsights,
  MatchRecommendation,
  UserProfile,
} from '../core/types.js';
import { extractSkills } from '../utils/skill-extractor.js';

export const MATCH_WEIGHTS = {
  skill: 0.4,
  experience: 0.2,
  location: 0.15,
  salary: 0.15,
  culture: 0.1,
} as const;

const CULTURE_SCORE = 0.75;
const CONFIDENCE_SCORE = 0.85;

const EXPERIENCE_RANK: Record<ExperienceLevel, number> = {
  entry: 1,
  junior: 2,
  mid: 3,
  senior: 4,
  lead: 5,
  principal: 6,
};

export const DEFAULT_USER_PROFILE: UserProfile = {
  skills: ['Python', 'Data Analysis', 'SQL', 'Machine Learning'],
  experienceLevel: 'mid',
  preferredLocations: ['Remote', 'San Francisco'],
  salaryExpectationMin: 80000,
  salaryExpectationMax: 120000,
};

type MatchableJob = Pick<
  Job,
  | 'title'
  | 'jobLevel'
  | 'description'
  | 'requirements'
  | 'location'
  | 'remoteFriendly'
  | 'salaryMin'
  | 'salaryMax'
  | 'extractedSkills'
>;

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function jobSkills(job: MatchableJob): string[] {
  return job.extractedSkills.length > 0 ? job.extractedSkills : extractSkills(job.description, job.requirements);
}

export function calculateSkillMatch(
  required: string[],
  userSkills: string[]
): { score: number; matching: string[]; missing: string[] } {
  if (required.length === 0) {
    return { score: 0.8, matching: [], missing: [] };
  }
  const owned = new Set(userSkills.map((skill) => skill.toLowerCase()));
  const matching = required.filter((skill) => owned.has(skill.toLowerCase()));
  const missing = required.filter((skill) => !owned.has(skill.toLowerCase()));
  return { score: round3(Math.min(matching.length / required.length, 1)), matching, missing };
}

/**
 * Seniority implied by the job's level, title and description (2, 3, 4 or 5)
 */
export function inferJobLevel(job: Pick<Job, 'jobLevel' | 'title' | 'description'>): number {
  const text = `${job.jobLevel ?? ''} ${job.title} ${job.description ?? ''}`.toLowerCase();
  if (/\b(?:entry|junior)\b/.test(text)) return 2;
  if (/\bsenior\b/.test(text)) return 4;
  if (/\b(?:lead|principal)\b/.test(text)) return 5;
  return 3;
}

export function calculateExperienceMatch(
  job: Pick<Job, 'jobLevel' | 'title' | 'description'>,
  level: ExperienceLevel
): number {
  const diff = Math.abs(EXPERIENCE_RANK[level] - inferJobLevel(job));
  return round3(Math.max(0, 1 - diff * 0.2));
}

export function calculateLocationMatch(
  job: Pick<Job, 'location' | 'remoteFriendly'>,
  preferences: string[]
): number {
  if (!job.location) {
    return 0.5;
  }
  if (preferences.length === 0) {
    return 0.7;
  }

  const location = job.location.toLowerCase();
  const isRemote = job.remoteFriendly || location.includes('remote');
  for (const preference of preferences.map((p) => p.toLowerCase())) {
    if (location.includes(preference) || preference.includes(location)) {
      return 1;
    }
    if (preference.includes('remote') && isRemote) {
      return 1;
    }
  }
  return 0.3;
}

export function calculateSalaryMatch(
  job: Pick<Job, 'salaryMin' | 'salaryMax'>,
  expectationMin: number | null,
  expectationMax: number | null
): number {
  const userMin = expectationMin ?? expectationMax;
  const userMax = expectationMax ?? expectationMin;
  if (userMin === null || userMax === null) {
    return 0.7;
  }
  const jobMin = job.salaryMin ?? job.salaryMax;
  const jobMax = job.salaryMax ?? job.salaryMin;
  if (jobMin === null || jobMax === null) {
    return 0.6;
  }

  const overlapMin = Math.max(userMin, jobMin);
  const overlapMax = Math.min(userMax, jobMax);
  if (overlapMin <= overlapMax) {
    const userRange = userMax - userMin;
    const jobRange = jobMax - jobMin;
    if (userRange > 0 && jobRange > 0) {
      return round3(Math.min((overlapMax - overlapMin) / Math.max(userRange, jobRange), 1));
    }
    return 0.8;
  }

  // Pays more than expected
  if (jobMin > userMax) {
    return 0.9;
  }
  const gap = userMin - jobMax;
  const penalty = userMin > 0 ? Math.min(gap / userMin, 0.8) : 0.8;
  return round3(Math.max(0.1, 1 - penalty));
}

export function applicationPriority(overall: number): JobMatchResult['application_priority'] {
  if (overall >= 0.8) return 'high';
  if (overall >= 0.6) return 'medium';
  return 'low';
}

type ComponentScores = Pick<
  JobMatchResult,
  | 'overall_score'
  | 'skill_match_score'
  | 'experience_match_score'
  | 'location_match_score'
  | 'salary_match_score'
  | 'culture_match_score'
>;

function buildInsights(scores: ComponentScores): MatchInsights {
  const insights: MatchInsights = { strengths: [], concerns: [], opportunities: [] };

  if (scores.skill_match_score > 0.8) insights.strengths.push('Strong skill alignment with job requirements');
  if (scores.experience_match_score > 0.8) insights.strengths.push('Experience level matches job expectations');
  if (scores.location_match_score > 0.9) insights.strengths.push('Location preference perfectly aligned');

  if (scores.skill_match_score < 0.5) insights.concerns.push('Significant skill gap identified');
  if (scores.salary_match_score < 0.4) insights.concerns.push('Salary expectations may not align');

  if (scores.overall_score >= 0.6 && scores.overall_score <= 0.8) {
    insights.opportunities.push('Good match with room for growth');
  }
  return insights;
}

function buildRecommendations(overall: number, missingSkills: string[]): MatchRecommendation[] {
  const recommendations: MatchRecommendation[] = [];

  if (overall > 0.8) {
    recommendations.push({ type: 'apply', text: 'Highly recommended - apply immediately', priority: 'high' });
    recommendations.push({ type: 'apply', text: 'Tailor your resume to highlight matching skills', priority: 'high' });
  } else if (overall > 0.6) {
    recommendations.push({ type: 'apply', text: 'Good candidate - consider applying', priority: 'medium' });
    recommendations.push({ type: 'improve', text: 'Address skill gaps before applying', priority: 'medium' });
  } else {
    recommendations.push({ type: 'improve', text: 'Focus on developing the required skills', priority: 'low' });
    recommendations.push({ type: 'research', text: 'Research the company culture and values', priority: 'low' });
  }

  if (missingSkills.length > 0) {
    recommendations.push({
      type: 'improve',
      text: `Build experience with: ${missingSkills.slice(0, 5).join(', ')}`,
      priority: 'medium',
    });
  }
  return recommendations;
}

function buildMatchReasons(scores: ComponentScores): string[] {
  const reasons: string[] = [];
  if (scores.skill_match_score > 0.8) reasons.push('Strong skill alignment');
  if (scores.experience_match_score > 0.8) reasons.push('Experience level matches');
  if (scores.location_match_score > 0.8) reasons.push('Location preference aligned');
  if (scores.salary_match_score > 0.8) reasons.push('Salary expectations met');
  if (scores.culture_match_score > 0.8) reasons.push('Culture fit');
  return reasons;
}

export interface MatchInput {
  job: MatchableJob;
  profile: UserProfile;
}

/**
 * JobMatcherService - weighted rule-based fit between a job and a user profile
 */
export class JobMatcherService implements IService<MatchInput, JobMatchResult> {
  async execute(input: MatchInput): Promise<JobMatchResult> {
    return this.match(input.job, input.profile);
  }

  match(job: MatchableJob, profile: UserProfile = DEFAULT_USER_PROFILE): JobMatchResult {
    const skills = calculateSkillMatch(jobSkills(job), profile.skills);
    const experience = calculateExperienceMatch(job, profile.experienceLevel);
    const location = calculateLocationMatch(job, profile.preferredLocations);
    const salary = calculateSalaryMatch(job, profile.salaryExpectationMin, profile.salaryExpectationMax);

    const overall = round3(
      skills.score * MATCH_WEIGHTS.skill +
        experience * MATCH_WEIGHTS.experience +
        location * MATCH_WEIGHTS.location +
        salary * MATCH_WEIGHTS.salary +
        CULTURE_SCORE * MATCH_WEIGHTS.culture
    );

    const scores: ComponentScores = {
      overall_score: overall,
      skill_match_score: skills.score,
      experience_match_score: experience,
      location_match_score: location,
      salary_match_score: salary,
      culture_match_score: CULTURE_SCORE,
    };

    return {
      ...scores,
      confidence_score: CONFIDENCE_SCORE,
      matching_skills: skills.matching,
      missing_skills: skills.missing,
      match_reasons: buildMatchReasons(scores),
      insights: buildInsights(scores),
      recommendations: buildRecommendations(overall, skills.missing),
      application_priority: applicationPriority(overall),
    };
  }
}
