import { describe, it, expect } from 'vitest';
import { makeAnalysis } from '../testing/fixtures.js';
import {
  clampScore,
  confidenceLevel,
  markAsCompleted,
  markAsFailed,
  matchLevel,
  toAnalysisResponse,
  updateScores,
} from './analysis.js';

describe('analysis model', () => {
  it('clamps scores to [0, 1]', () => {
    expect(clampScore(1.4)).toBe(1);
    expect(clampScore(-0.2)).toBe(0);
    expect(clampScore(0.42)).toBe(0.42);
    expect(clampScore(Number.NaN)).toBeNull();
    expect(clampScore(undefined)).toBeNull();
  });

  it('buckets match and confidence scores', () => {
    expect([0.9, 0.7, 0.5, 0.49, null].map(matchLevel)).toEqual(['excellent', 'good', 'fair', 'poor', 'unknown']);
    expect([0.8, 0.6, 0.2, null].map(confidenceLevel)).toEqual(['high', 'medium', 'low', 'unknown']);
  });

  it('updates only the given scores', () => {
    const updated = updateScores(makeAnalysis({ matchScore: 0.5, skillMatchScore: 0.3 }), {
      confidenceScore: 1.3,
      skillMatchScore: null,
    });

    expect(updated.matchScore).toBe(0.5);
    expect(updated.confidenceScore).toBe(1);
    expect(updated.skillMatchScore).toBeNull();
  });

  it('tracks completion and failure', () => {
    const failed = markAsFailed(makeAnalysis(), 'model unavailable');
    expect(failed.status).toBe('failed');
    expect(failed.errorMessage).toBe('model unavailable');

    const completed = markAsCompleted(failed, 1.25);
    expect(completed).toMatchObject({ status: 'completed', processingTimeSeconds: 1.25, errorMessage: null });
  });

  it('adds derived fields to the response', () => {
    const analysis = makeAnalysis({
      matchScore: 0.85,
      confidenceScore: 0.65,
      createdAt: new Date('2024-03-10T00:00:00Z'),
    });

    expect(toAnalysisResponse(analysis, new Date('2024-03-10T12:00:00Z'))).toMatchObject({
      match_score: 0.85,
      match_level: 'good',
      confidence_level: 'medium',
      is_high_match: true,
      is_good_match: true,
      is_recent: true,
    });
    expect(toAnalysisResponse(analysis, new Date('2024-03-12T00:00:00Z')).is_recent).toBe(false);
  });
});
