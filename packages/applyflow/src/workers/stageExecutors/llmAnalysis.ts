import { z } from 'zod';
import { extractJson } from '../../lib/json-repair.js';
import type { Requirements } from '../../lifecycle/types.js';
import {
  failed,
  succeeded,
  type AnalysisExecutor,
  type LLMCapability,
  type ResourceRequest,
  type StageContext,
  type StageOutcome,
} from './types.js';

const requirementSchema = z.object({
  category: z.enum(['technical', 'experience', 'education', 'other']).catch('other'),
  skill: z.string().min(1),
  importance: z.enum(['required', 'preferred', 'nice_to_have']).catch('preferred'),
  yearsExperience: z.number().nonnegative().optional(),
});

export const requirementsSchema = z.object({
  skills: z.array(z.string()).default([]),
  keywords: z.array(z.string()).default([]),
  items: z.array(requirementSchema).default([]),
});

const SYSTEM_PROMPT = 'You extract structured hiring requirements from job postings. Reply with JSON only.';

// Postings beyond this are truncated before prompting
const MAX_POSTING_CHARS = 30_000;

export function buildAnalysisPrompt(postingText: string): string {
  return `Parse this job posting into structured requirements.

JOB POSTING:
${postingText.slice(0, MAX_POSTING_CHARS)}

Return ONLY valid JSON:
{
  "skills": ["Skill names the posting asks for"],
  "keywords": ["Terms an applicant-tracking system would match on"],
  "items": [
    {
      "category": "technical | experience | education | other",
      "skill": "The requirement",
      "importance": "required | preferred | nice_to_have",
      "yearsExperience": 3
    }
  ]
}`;
}

/** Analysis executor that asks an LLM for the posting's requirements. */
export class LLMAnalysisExecutor implements AnalysisExecutor {
  readonly name = 'llm-analysis';

  constructor(private readonly llm: LLMCapability) {}

  resources(): ResourceRequest[] {
    return [{ kind: 'budget', resourceId: `llm:${this.llm.provider}` }];
  }

  async analyze(postingText: string, ctx: StageContext): Promise<StageOutcome<Requirements>> {
    if (!postingText.trim()) {
      return failed('platform_rejected_input', 'Job posting text is empty');
    }

    const text = await this.llm.complete(buildAnalysisPrompt(postingText), 'analysis', {
      signal: ctx.signal,
      system: SYSTEM_PROMPT,
    });

    const parsed = requirementsSchema.safeParse(extractJson(text));
    if (!parsed.success) {
      ctx.logger.warn('Analysis response did not match the requirements shape', {
        issues: parsed.error.issues.length,
      });
      return failed('internal_error', 'Analysis response was not valid requirements JSON');
    }
    return succeeded(parsed.data);
  }
}
