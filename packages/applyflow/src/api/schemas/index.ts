import { z } from 'zod';
import { APPLICATION_OUTCOMES } from '../../lifecycle/types.js';

const PlatformSchema = z.enum([
  'linkedin', 'greenhouse', 'lever', 'workday', 'amazon',
  'icims', 'taleo', 'smartrecruiters', 'other',
]);

// --- Resumes ---

export const RegisterResumeSchema = z.object({
  candidateId: z.string().min(1).max(200),
  content: z.string().min(1).max(200_000),
});

export type RegisterResumeBody = z.infer<typeof RegisterResumeSchema>;

// --- Applications ---

export const SubmitApplicationSchema = z.object({
  candidateId: z.string().min(1).max(200),
  resumeId: z.string().min(1).max(200),
  tailoringMode: z.enum(['conservative', 'moderate', 'aggressive']).optional(),
  automationLevel: z.enum(['full', 'assisted']).optional(),
  job: z.object({
    sourceUrl: z.string().url().max(2048),
    title: z.string().min(1).max(300),
    company: z.string().min(1).max(300),
    postingText: z.string().min(1).max(100_000),
    platform: PlatformSchema.optional(),
  }),
});

export type SubmitApplicationBody = z.infer<typeof SubmitApplicationSchema>;

export const ReviewDecisionSchema = z.object({
  reason: z.string().min(1).max(1000).optional(),
});

export const RecordOutcomeSchema = z.object({
  outcome: z.enum(APPLICATION_OUTCOMES),
  reason: z.string().min(1).max(1000).optional(),
});

export type RecordOutcomeBody = z.infer<typeof RecordOutcomeSchema>;

// --- Events ---

export const EventsQuerySchema = z.object({
  after: z.coerce.number().int().min(0).default(0),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});
