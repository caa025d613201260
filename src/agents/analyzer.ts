import { logger } from '../utils/logger.js';
import { config } from '../config.js';
import { callLLM } from '../llm/client.js';
import { SKILL_CATEGORIES, categorizeSkills, extractCategorizedSkills } from '../utils/skill-extractor.js';
import { JobAnalysisJsonSchema, JobAnalysisSchema, type JobAnalysisOutput } from '../schemas/llm-outputs.js';
import type { Job, JobMatchResult, UserProfile } from '../core/types.js';
import type { IAgent, VerifiedOutput } from '../core/interfaces.js';

export interface AnalyzerInput {
  job: Job;
  profile: UserProfile;
  match: JobMatchResult;
}

const SYSTEM_PROMPT = `You are a career advisor reviewing job postings for a candidate.

You MUST respond with a valid JSON object only.

JSON object must contain these exact fields:
- fitScore: integer from 0-100 (how well the candidate fits)
- summary: string (two or three sentences on the fit)
- strengths: array of strings (reasons the candidate fits)
- concerns: array of strings (gaps or drawbacks)
- redFlags: array of strings (warning signs in the posting itself, e.g. vague duties, unrealistic requirements)

Score guidelines:
- 90-100: Excellent fit
- 70-89: Good fit
- 50-69: Fair fit
- 0-49: Poor fit

A rule-based pre-score is included. Use it as a reference, not as the answer.`;

function describeProfile(profile: UserProfile): string {
  const salary =
    profile.salaryExpectationMin !== null || profile.salaryExpectationMax !== null
      ? `${profile.salaryExpectationMin ?? '?'} - ${profile.salaryExpectationMax ?? '?'}`
      : 'Not specified';
  return `Skills: ${profile.skills.join(', ') || 'Not specified'}
Experience level: ${profile.experienceLevel}
Preferred locations: ${profile.preferredLocations.join(', ') || 'Any'}
Salary expectation: ${salary}`;
}

function describeMentionedSkills(job: Job): string {
  const skills = extractCategorizedSkills(`${job.description ?? ''} ${job.requirements ?? ''}`, 15);
  const grouped = categorizeSkills(skills);
  const byCategory = SKILL_CATEGORIES.flatMap((category) => {
    const names = grouped[category];
    return names ? [`${category}: ${names.join(', ')}`] : [];
  });
  return byCategory.join('; ') || 'none';
}

export function buildUserPrompt({ job, profile, match }: AnalyzerInput): string {
  return `Analyze this job for the candidate.

JOB POSTING:
Title: ${job.title}
Company: ${job.companyName}
Location: ${job.location || 'Not specified'}
Remote: ${job.remoteFriendly ? 'Yes' : 'No'}
${job.salaryMin !== null ? `Salary: ${job.currency} ${job.salaryMin}${job.salaryMax !== null ? ` - ${job.salaryMax}` : ''}` : ''}

Description:
${job.description ?? 'Not provided'}
${job.requirements ? `\nRequirements:\n${job.requirements}` : ''}
Skills mentioned: ${describeMentionedSkills(job)}

---

CANDIDATE:
${describeProfile(profile)}

RULE-BASED PRE-SCORE: ${Math.round(match.overall_score * 100)}/100
Matching skills: ${match.matching_skills.join(', ') || 'none'}
Missing skills: ${match.missing_skills.join(', ') || 'none'}

Provide your analysis in the required JSON format.`;
}

/**
 * JobAnalyzerAgent - LLM summary and fit score layered on the rule-based match
 */
export class JobAnalyzerAgent implements IAgent<AnalyzerInput, JobAnalysisOutput> {
  readonly model = config.OPENAI_MODEL;

  async execute(input: AnalyzerInput): Promise<JobAnalysisOutput> {
    try {
      return await callLLM<JobAnalysisOutput>(
        [
          { role: 'system', content: SYSTEM_PROMPT },
          { role: 'user', content: buildUserPrompt(input) },
        ],
        JobAnalysisSchema,
        JobAnalysisJsonSchema,
        { schemaName: 'job_analysis' }
      );
    } catch (error) {
      logger.error('Analyzer', 'Analysis failed', error);
      throw error;
    }
  }

  /**
   * Compare the LLM output with the rule-based match it was given
   */
  async verify(output: JobAnalysisOutput, source: JobMatchResult): Promise<VerifiedOutput<JobAnalysisOutput>> {
    const warnings: string[] = [];

    const ruleScore = Math.round(source.overall_score * 100);
    if (Math.abs(output.fitScore - ruleScore) > 40) {
      warnings.push(`Fit score ${output.fitScore} is far from rule-based score ${ruleScore}`);
    }

    if (output.fitScore > 90 && output.concerns.length > 2) {
      warnings.push('High score but many concerns - may be hallucination');
    }

    if (warnings.length > 0) {
      logger.debug('Analyzer', `Verification warnings: ${warnings.length}`, warnings);
    }

    return {
      data: output,
      verified: warnings.length === 0,
      warnings,
    };
  }
}
