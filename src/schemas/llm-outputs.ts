import { z } from 'zod';

/**
 * Schema for AI job analysis - structured LLM output
 */
export const JobAnalysisSchema = z.object({
  fitScore: z.number()
    .int('Score must be an integer')
    .min(0, 'Score must be at least 0')
    .max(100, 'Score must be at most 100')
    .describe('Fit score from 0-100'),

  summary: z.string()
    .min(10, 'Summary must be at least 10 characters')
    .describe('Two or three sentence summary of the fit'),

  strengths: z.array(z.string())
    .describe('Reasons the candidate fits the role'),

  concerns: z.array(z.string())
    .describe('Gaps or drawbacks for this candidate'),

  redFlags: z.array(z.string())
    .describe('Warning signs in the posting itself'),
});

export type JobAnalysisOutput = z.infer<typeof JobAnalysisSchema>;

/**
 * JSON Schema for LLM structured output
 */
export const JobAnalysisJsonSchema = {
  type: 'object',
  properties: {
    fitScore: {
      type: 'integer',
      minimum: 0,
      maximum: 100,
      description: 'Fit score from 0-100',
    },
    summary: {
      type: 'string',
      description: 'Two or three sentence summary of the fit',
    },
    strengths: {
      type: 'array',
      items: { type: 'string' },
      description: 'Reasons the candidate fits the role',
    },
    concerns: {
      type: 'array',
      items: { type: 'string' },
      description: 'Gaps or drawbacks for this candidate',
    },
    redFlags: {
      type: 'array',
      items: { type: 'string' },
      description: 'Warning signs in the posting itself',
    },
  },
  required: ['fitScore', 'summary', 'strengths', 'concerns', 'redFlags'],
  additionalProperties: false,
} as const;
