import { z } from 'zod';
import { mcqIdFor } from '@/lib/ids';
import type {
  BatchResult,
  CritiqueResult,
  CritiqueScores,
  GenerationResult,
  MCQ,
  PublishedResult,
  ValidationResult,
  ValidationStatus
} from '@/lib/types';

export const OPTION_LABELS = ['A', 'B', 'C', 'D'] as const;

export const DifficultySchema = z.enum(['easy', 'medium', 'hard']);

export const ValidationStatusSchema = z.enum(['valid', 'invalid', 'needs_revision']);

// Models sometimes answer "Medium" or " hard"
const LooseDifficultySchema = z.preprocess(
  (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
  DifficultySchema
);

// Numeric strings are accepted; null, booleans and blanks are not scores
const ScoreSchema = z.union([z.number(), z.string().trim().min(1)]).pipe(z.coerce.number().finite());

export const GeneratedOptionSchema = z.object({
  label: z.string(),
  text: z.string()
});

export const GeneratedItemSchema = z.object({
  question: z.string(),
  options: z.array(GeneratedOptionSchema),
  correct_answer: z.string(),
  explanation: z.string(),
  difficulty: LooseDifficultySchema.optional(),
  fragment_index: z.number().int().nullable().optional()
});

export const GeneratedBatchSchema = z.array(GeneratedItemSchema);

export const RevisedItemSchema = GeneratedItemSchema.omit({ fragment_index: true });

export const CritiqueResponseSchema = z.object({
  clarity_score: ScoreSchema.optional(),
  correctness_score: ScoreSchema.optional(),
  grounding_score: ScoreSchema.optional(),
  difficulty_assessment: LooseDifficultySchema.optional(),
  issues: z.array(z.string()).optional(),
  suggestions: z.array(z.string()).optional()
});

export type GeneratedItem = z.infer<typeof GeneratedItemSchema>;
export type RevisedItem = z.infer<typeof RevisedItemSchema>;
export type CritiqueResponse = z.infer<typeof CritiqueResponseSchema>;

export const PublishedMcqSchema = z.object({
  id: z.string().min(1).optional(),
  question: z.string(),
  options: z.array(
    z.object({
      label: z.string(),
      text: z.string(),
      is_correct: z.boolean().default(false)
    })
  ),
  correct_answer: z.string(),
  explanation: z.string(),
  difficulty: DifficultySchema,
  fragment_id: z.string(),
  source_filename: z.string(),
  context_snippet: z.string().default(''),
  metadata: z
    .object({
      generation_order: z.number().int().optional(),
      revised_from: z.string().optional(),
      revision: z.number().int().optional()
    })
    .catchall(z.union([z.string(), z.number(), z.boolean()]))
    .default({})
});

/**
 * Rebuilds a frozen MCQ from its published form. Option flags are kept as
 * stored; a record without an id gets the one `buildMcq` would have given it.
 */
export function parsePublishedMcq(data: unknown): MCQ {
  const parsed = PublishedMcqSchema.parse(data);
  return Object.freeze({
    id:
      parsed.id ??
      mcqIdFor({
        question: parsed.question,
        fragment_id: parsed.fragment_id,
        order: parsed.metadata.generation_order ?? 0,
        revised_from: parsed.metadata.revised_from
      }),
    question: parsed.question,
    options: Object.freeze(
      parsed.options.map((opt) => Object.freeze({ label: opt.label, text: opt.text, is_correct: opt.is_correct }))
    ),
    correct_answer: parsed.correct_answer,
    explanation: parsed.explanation,
    difficulty: parsed.difficulty,
    fragment_id: parsed.fragment_id,
    source_filename: parsed.source_filename,
    context_snippet: parsed.context_snippet,
    metadata: Object.freeze({ ...parsed.metadata })
  });
}

export const PipelineRequestSchema = z.object({
  count: z.number().int().min(1),
  difficulty: DifficultySchema.optional(),
  topK: z.number().int().min(1)
});

export type PipelineRequest = z.infer<typeof PipelineRequestSchema>;

export function overallScore(scores: CritiqueScores): number {
  return (scores.clarity_score + scores.correctness_score + scores.grounding_score) / 3;
}

/** The overall score is always derived here; callers cannot supply it. */
export function createCritiqueResult(input: Omit<CritiqueResult, 'overall_score'>): CritiqueResult {
  return Object.freeze({
    mcq_index: input.mcq_index,
    mcq_id: input.mcq_id,
    clarity_score: input.clarity_score,
    correctness_score: input.correctness_score,
    grounding_score: input.grounding_score,
    difficulty_assessment: input.difficulty_assessment,
    issues: Object.freeze([...input.issues]),
    suggestions: Object.freeze([...input.suggestions]),
    overall_score: overallScore(input)
  });
}

export function createValidationResult(input: ValidationResult): ValidationResult {
  return Object.freeze({ ...input, validation_errors: Object.freeze([...input.validation_errors]) });
}

/**
 * Accepted only when the status is valid AND every flag agrees. The flags are
 * checked on their own so a new check that sets a flag without touching the
 * status still rejects the MCQ.
 */
export function isValid(validation: ValidationResult): boolean {
  return (
    validation.status === 'valid' &&
    validation.is_context_grounded &&
    validation.is_properly_formatted &&
    validation.has_required_metadata &&
    !validation.has_hallucination
  );
}

export function createGenerationResult(input: {
  query: string;
  mcqs: readonly MCQ[];
  critiques: readonly CritiqueResult[];
  validations: readonly ValidationResult[];
}): GenerationResult {
  const byId = new Map(input.validations.map((v) => [v.mcq_id, v]));
  const valid: MCQ[] = [];
  const invalid: MCQ[] = [];
  for (const mcq of input.mcqs) {
    const validation = byId.get(mcq.id);
    if (validation && isValid(validation)) {
      valid.push(mcq);
    } else {
      invalid.push(mcq);
    }
  }
  return Object.freeze({
    query: input.query,
    mcqs: Object.freeze([...input.mcqs]),
    critiques: Object.freeze([...input.critiques]),
    validations: Object.freeze([...input.validations]),
    valid_mcqs: Object.freeze(valid),
    invalid_mcqs: Object.freeze(invalid)
  });
}

export function emptyGenerationResult(query: string): GenerationResult {
  return createGenerationResult({ query, mcqs: [], critiques: [], validations: [] });
}

export function toPublishedResult(result: GenerationResult): PublishedResult {
  return {
    query: result.query,
    total_mcqs: result.mcqs.length,
    valid_count: result.valid_mcqs.length,
    invalid_count: result.invalid_mcqs.length,
    mcqs: result.mcqs.map(publishMcq),
    critiques: result.critiques.map((c) => ({ ...c, issues: [...c.issues], suggestions: [...c.suggestions] })),
    validations: result.validations.map((v) => ({
      ...v,
      validation_errors: [...v.validation_errors],
      is_valid: isValid(v)
    })),
    valid_mcqs: result.valid_mcqs.map(publishMcq)
  };
}

function publishMcq(mcq: MCQ): MCQ {
  return {
    ...mcq,
    options: mcq.options.map((opt) => ({ label: opt.label, text: opt.text, is_correct: opt.is_correct })),
    metadata: { ...mcq.metadata }
  };
}

export function summarizeBatch(results: readonly GenerationResult[]): Omit<BatchResult, 'results' | 'failures'> {
  const totalGenerated = results.reduce((sum, r) => sum + r.mcqs.length, 0);
  const totalValid = results.reduce((sum, r) => sum + r.valid_mcqs.length, 0);
  return {
    total_generated: totalGenerated,
    total_valid: totalValid,
    success_rate: totalGenerated === 0 ? 0 : totalValid / totalGenerated
  };
}

export function describeStatus(status: ValidationStatus): string {
  switch (status) {
    case 'valid':
      return 'VALID';
    case 'needs_revision':
      return 'NEEDS_REVISION';
    case 'invalid':
      return 'INVALID';
    default: {
      const unreachable: never = status;
      return unreachable;
    }
  }
}
