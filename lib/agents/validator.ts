import { PIPELINE_DEFAULTS, type ValidationThresholds } from '@/config/pipeline';
import { OPTION_LABELS, createValidationResult } from '@/lib/mcq';
import type { CritiqueResult, MCQ, ValidationResult, ValidationStatus } from '@/lib/types';

export function checkFormat(mcq: MCQ, errors: string[], thresholds: ValidationThresholds): boolean {
  let ok = true;

  if (mcq.question.trim().length < thresholds.minQuestionLength) {
    errors.push('Question is too short or empty');
    ok = false;
  }

  if (mcq.options.length !== 4) {
    errors.push(`Must have exactly 4 options, found ${mcq.options.length}`);
    ok = false;
  }

  const correct = mcq.options.filter((opt) => opt.is_correct).length;
  if (correct !== 1) {
    errors.push(`Must have exactly 1 correct answer, found ${correct}`);
    ok = false;
  }

  if (mcq.explanation.trim().length < thresholds.minExplanationLength) {
    errors.push('Explanation is too short or empty');
    ok = false;
  }

  const labels = new Set(mcq.options.map((opt) => opt.label));
  const expected = new Set<string>(OPTION_LABELS);
  const sameLabels = labels.size === expected.size && [...labels].every((label) => expected.has(label));
  if (!sameLabels) {
    errors.push(`Invalid option labels: ${[...labels].sort().join(', ') || '(none)'}`);
    ok = false;
  }

  return ok;
}

export function checkMetadata(mcq: MCQ, errors: string[]): boolean {
  let ok = true;
  if (!mcq.fragment_id) {
    errors.push('Missing fragment_id');
    ok = false;
  }
  if (!mcq.source_filename) {
    errors.push('Missing source_filename');
    ok = false;
  }
  if (!mcq.difficulty) {
    errors.push('Missing difficulty level');
    ok = false;
  }
  return ok;
}

function decideStatus(
  errors: readonly string[],
  critique: CritiqueResult | undefined,
  thresholds: ValidationThresholds
): ValidationStatus {
  if (errors.length === 0) return 'valid';
  if (critique && critique.overall_score >= thresholds.revisionScore) return 'needs_revision';
  return 'invalid';
}

export function validateMcq(
  mcq: MCQ,
  index: number,
  critique: CritiqueResult | undefined,
  thresholds: ValidationThresholds = PIPELINE_DEFAULTS.thresholds
): ValidationResult {
  const errors: string[] = [];
  const isProperlyFormatted = checkFormat(mcq, errors, thresholds);
  const hasRequiredMetadata = checkMetadata(mcq, errors);

  let isContextGrounded = true;
  if (critique && critique.grounding_score < thresholds.groundingScore) {
    isContextGrounded = false;
    errors.push(`Low grounding score: ${critique.grounding_score}/10`);
  }

  let hasHallucination = false;
  if (critique && critique.grounding_score < thresholds.hallucinationScore) {
    hasHallucination = true;
    errors.push('Potential hallucination detected');
  }

  return createValidationResult({
    mcq_index: index,
    mcq_id: mcq.id,
    status: decideStatus(errors, critique, thresholds),
    is_context_grounded: isContextGrounded,
    is_properly_formatted: isProperlyFormatted,
    has_required_metadata: hasRequiredMetadata,
    has_hallucination: hasHallucination,
    validation_errors: errors
  });
}

/**
 * Deterministic verdict per MCQ, in input order. Each MCQ is matched to its
 * critique by id; an MCQ without one gets no grounding check. Grounding is
 * judged from the critique, which already saw the source fragment.
 */
export function validateMcqs(
  mcqs: readonly MCQ[],
  critiques: readonly CritiqueResult[],
  thresholds: ValidationThresholds = PIPELINE_DEFAULTS.thresholds
): ValidationResult[] {
  const byId = new Map(critiques.map((c) => [c.mcq_id, c]));
  return mcqs.map((mcq, index) => validateMcq(mcq, index, byId.get(mcq.id), thresholds));
}
