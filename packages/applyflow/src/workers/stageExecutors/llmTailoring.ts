import { z } from 'zod';
import { extractJson } from '../../lib/json-repair.js';
import type { Requirements, Resume, TailoringMode } from '../../lifecycle/types.js';
import {
  failed,
  succeeded,
  type LLMCapability,
  type ResourceRequest,
  type ResumeDraft,
  type StageContext,
  type StageOutcome,
  type TailoringExecutor,
} from './types.js';

const draftSchema = z.object({
  content: z.string().min(1),
  notes: z.string().nullable().default(null),
  matchScore: z.number().min(0).max(1).nullable().catch(null),
});

const MODE_INSTRUCTIONS: Record<TailoringMode, string> = {
  conservative: 'Reorder and rephrase existing bullet points only. Do not add new claims.',
  moderate: 'Rephrase bullets to surface matching skills and adjust the summary. Do not invent experience.',
  aggressive: 'Rewrite freely to foreground every matching skill the candidate has evidence for. Do not invent experience.',
};

export function buildTailoringPrompt(resume: Resume, requirements: Requirements, mode: TailoringMode): string {
  return `Tailor this resume to the job requirements.

MODE: ${mode}
${MODE_INSTRUCTIONS[mode]}

REQUIRED SKILLS: ${requirements.skills.join(', ') || 'none listed'}
KEYWORDS: ${requirements.keywords.join(', ') || 'none listed'}

RESUME:
${resume.content}

Return ONLY valid JSON:
{
  "content": "The full tailored resume text",
  "notes": "One sentence on what changed",
  "matchScore": 0.0
}

matchScore is how well the tailored resume covers the required skills, from 0 to 1.`;
}

/** Tailoring executor that asks an LLM to rewrite the resume. */
export class LLMTailoringExecutor implements TailoringExecutor {
  readonly name = 'llm-tailoring';

  constructor(private readonly llm: LLMCapability) {}

  resources(): ResourceRequest[] {
    return [{ kind: 'budget', resourceId: `llm:${this.llm.provider}` }];
  }

  async tailor(
    resume: Resume,
    requirements: Requirements,
    mode: TailoringMode,
    ctx: StageContext,
  ): Promise<StageOutcome<ResumeDraft>> {
    const text = await this.llm.complete(buildTailoringPrompt(resume, requirements, mode), 'generation', {
      signal: ctx.signal,
      maxTokens: 8192,
    });

    const parsed = draftSchema.safeParse(extractJson(text));
    if (!parsed.success) {
      return failed('internal_error', 'Tailoring response was not a valid resume draft');
    }
    return succeeded(parsed.data);
  }
}
