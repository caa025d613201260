import type { Analysis, AnalysisStatistics, Insight, Recommendation } from '../core/types.js';

const RECENT_MS = 24 * 60 * 60 * 1000;

export type MatchLevel = 'excellent' | 'good' | 'fair' | 'poor' | 'unknown';
export type ConfidenceLevel = 'high' | 'medium' | 'low' | 'unknown';

/**
 * Clamp a score to [0, 1]. null stays null.
 */
export function clampScore(score: number | null | undefined): number | null {
  if (score === null || score === undefined || Number.isNaN(score)) {
    return null;
  }
  return Math.min(1, Math.max(0, score));
}

export function matchLevel(matchScore: number | null): MatchLevel {
  if (matchScore === null) return 'unknown';
  if (matchScore >= 0.9) return 'excellent';
  if (matchScore >= 0.7) return 'good';
  if (matchScore >= 0.5) return 'fair';
  return 'poor';
}

export function confidenceLevel(confidenceScore: number | null): ConfidenceLevel {
  if (confidenceScore === null) return 'unknown';
  if (confidenceScore >= 0.8) return 'high';
  if (confidenceScore >= 0.6) return 'medium';
  return 'low';
}

export function isHighMatch(analysis: Pick<Analysis, 'matchScore'>): boolean {
  return analysis.matchScore !== null && analysis.matchScore >= 0.8;
}

export function isGoodMatch(analysis: Pick<Analysis, 'matchScore'>): boolean {
  return analysis.matchScore !== null && analysis.matchScore >= 0.6;
}

export function isRecentAnalysis(analysis: Pick<Analysis, 'createdAt'>, now = new Date()): boolean {
  return now.getTime() - analysis.createdAt.getTime() <= RECENT_MS;
}

type ScoreKey =
  | 'matchScore'
  | 'confidenceScore'
  | 'skillMatchScore'
  | 'experienceMatchScore'
  | 'locationMatchScore'
  | 'salaryMatchScore'
  | 'cultureMatchScore';

export type ScoreUpdate = Partial<Record<ScoreKey, number | null>>;

/**
 * Apply score updates, clamping each to [0, 1]
 */
export function updateScores<T extends Pick<Analysis, ScoreKey>>(target: T, scores: ScoreUpdate): T {
  const pick = (key: ScoreKey): number | null => {
    const value = scores[key];
    return value === undefined ? clampScore(target[key]) : clampScore(value);
  };

  return {
    ...target,
    matchScore: pick('matchScore'),
    confidenceScore: pick('confidenceScore'),
    skillMatchScore: pick('skillMatchScore'),
    experienceMatchScore: pick('experienceMatchScore'),
    locationMatchScore: pick('locationMatchScore'),
    salaryMatchScore: pick('salaryMatchScore'),
    cultureMatchScore: pick('cultureMatchScore'),
  };
}

export function addInsight<T extends Pick<Analysis, 'keyInsights'>>(
  analysis: T,
  category: string,
  insight: string,
  importance: Insight['importance'] = 'medium'
): T {
  return {
    ...analysis,
    keyInsights: [...analysis.keyInsights, { category, insight, importance, timestamp: new Date().toISOString() }],
  };
}

export function addRecommendation<T extends Pick<Analysis, 'recommendations'>>(
  analysis: T,
  recommendation: string,
  actionType: string,
  priority: Recommendation['priority'] = 'medium'
): T {
  return {
    ...analysis,
    recommendations: [
      ...analysis.recommendations,
      { recommendation, action_type: actionType, priority, timestamp: new Date().toISOString() },
    ],
  };
}

export function markAsCompleted<T extends Pick<Analysis, 'status' | 'processingTimeSeconds' | 'errorMessage'>>(
  analysis: T,
  processingTimeSeconds: number
): T {
  return { ...analysis, status: 'completed', processingTimeSeconds, errorMessage: null };
}

export function markAsFailed<T extends Pick<Analysis, 'status' | 'errorMessage'>>(analysis: T, errorMessage: string): T {
  return { ...analysis, status: 'failed', errorMessage };
}

export interface AnalysisResponse {
  id: number;
  job_id: number;
  user_id: string | null;
  analysis_type: string;
  analysis_version: string;
  ai_model_used: string | null;
  results: Record<string, unknown>;
  confidence_score: number | null;
  match_score: number | null;
  skill_match_score: number | null;
  experience_match_score: number | null;
  location_match_score: number | null;
  salary_match_score: number | null;
  culture_match_score: number | null;
  key_insights: Insight[];
  recommendations: Recommendation[];
  red_flags: string[];
  status: string;
  error_message: string | null;
  processing_time_seconds: number | null;
  created_at: string;
  updated_at: string;
  match_level: MatchLevel;
  confidence_level: ConfidenceLevel;
  is_high_match: boolean;
  is_good_match: boolean;
  is_recent: boolean;
}

export function toAnalysisResponse(analysis: Analysis, now = new Date()): AnalysisResponse {
  return {
    id: analysis.id,
    job_id: analysis.jobId,
    user_id: analysis.userId,
    analysis_type: analysis.analysisType,
    analysis_version: analysis.analysisVersion,
    ai_model_used: analysis.aiModelUsed,
    results: analysis.results,
    confidence_score: analysis.confidenceScore,
    match_score: analysis.matchScore,
    skill_match_score: analysis.skillMatchScore,
    experience_match_score: analysis.experienceMatchScore,
    location_match_score: analysis.locationMatchScore,
    salary_match_score: analysis.salaryMatchScore,
    culture_match_score: analysis.cultureMatchScore,
    key_insights: analysis.keyInsights,
    recommendations: analysis.recommendations,
    red_flags: analysis.redFlags,
    status: analysis.status,
    error_message: analysis.errorMessage,
    processing_time_seconds: analysis.processingTimeSeconds,
    created_at: analysis.createdAt.toISOString(),
    updated_at: analysis.updatedAt.toISOString(),
    match_level: matchLevel(analysis.matchScore),
    confidence_level: confidenceLevel(analysis.confidenceScore),
    is_high_match: isHighMatch(analysis),
    is_good_match: isGoodMatch(analysis),
    is_recent: isRecentAnalysis(analysis, now),
  };
}

export interface AnalysisStatisticsResponse {
  total_analyses: number;
  completed_analyses: number;
  failed_analyses: number;
  high_match_analyses: number;
  recent_analyses: number;
  success_rate: number;
  high_match_rate: number;
  average_match_score: number | null;
  average_confidence_score: number | null;
  analysis_types: Record<string, number>;
  ai_models_used: Record<string, number>;
}

export function toAnalysisStatisticsResponse(stats: AnalysisStatistics): AnalysisStatisticsResponse {
  return {
    total_analyses: stats.totalAnalyses,
    completed_analyses: stats.completedAnalyses,
    failed_analyses: stats.failedAnalyses,
    high_match_analyses: stats.highMatchAnalyses,
    recent_analyses: stats.recentAnalyses,
    success_rate: stats.successRate,
    high_match_rate: stats.highMatchRate,
    average_match_score: stats.averageMatchScore,
    average_confidence_score: stats.averageConfidenceScore,
    analysis_types: stats.analysisTypes,
    ai_models_used: stats.aiModelsUsed,
  };
}
