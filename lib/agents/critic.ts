import { resolveParameters } from '@/config/pipeline';
import { requestStructured } from '@/lib/llm-response';
import { CritiqueResponseSchema, createCritiqueResult, type CritiqueResponse } from '@/lib/mcq';
import { loadPrompt, renderTemplate } from '@/lib/prompts';
import type { ContextFragment, CritiqueResult, MCQ } from '@/lib/types';
import type { StageDeps } from './generator';

function clampScore(value: number): number {
  return Math.min(10, Math.max(0, value));
}

export function formatOptions(mcq: MCQ): string {
  return mcq.options.map((opt) => `${opt.label}. ${opt.text}`).join('\n');
}

/** Source fragment by id, else the first fragment, else none. */
export function findSourceFragment(mcq: MCQ, fragments: readonly ContextFragment[]): ContextFragment | undefined {
  return fragments.find((f) => f.fragment_id === mcq.fragment_id) ?? fragments[0];
}

export function buildCritiquePrompt(mcq: MCQ, fragment: ContextFragment): string {
  return renderTemplate(loadPrompt('mcq-critic.user.md'), {
    context: fragment.text,
    question: mcq.question,
    options: formatOptions(mcq),
    correct_answer: mcq.correct_answer,
    explanation: mcq.explanation
  });
}

export function unverifiableCritique(mcq: MCQ, index: number): CritiqueResult {
  return createCritiqueResult({
    mcq_index: index,
    mcq_id: mcq.id,
    clarity_score: 5,
    correctness_score: 5,
    grounding_score: 0,
    difficulty_assessment: mcq.difficulty,
    issues: ['Could not find source context for verification'],
    suggestions: ['Verify MCQ against original source']
  });
}

export function fallbackCritique(mcq: MCQ, index: number, score: number): CritiqueResult {
  return createCritiqueResult({
    mcq_index: index,
    mcq_id: mcq.id,
    clarity_score: score,
    correctness_score: score,
    grounding_score: score,
    difficulty_assessment: mcq.difficulty,
    issues: ['Could not complete full critique'],
    suggestions: ['Manual review recommended']
  });
}

function fromResponse(mcq: MCQ, index: number, response: CritiqueResponse, missingScore: number): CritiqueResult {
  return createCritiqueResult({
    mcq_index: index,
    mcq_id: mcq.id,
    clarity_score: clampScore(response.clarity_score ?? missingScore),
    correctness_score: clampScore(response.correctness_score ?? missingScore),
    grounding_score: clampScore(response.grounding_score ?? missingScore),
    difficulty_assessment: response.difficulty_assessment ?? 'medium',
    issues: response.issues ?? [],
    suggestions: response.suggestions ?? []
  });
}

export async function critiqueMcq(
  mcq: MCQ,
  index: number,
  fragments: readonly ContextFragment[],
  deps: StageDeps
): Promise<CritiqueResult> {
  const params = deps.params ?? resolveParameters();
  const fragment = findSourceFragment(mcq, fragments);
  if (!fragment) {
    return unverifiableCritique(mcq, index);
  }

  const outcome = await requestStructured(deps.generator, buildCritiquePrompt(mcq, fragment), {
    system: loadPrompt('mcq-critic.system.md'),
    model: params.models.critic,
    temperature: params.temps.critic,
    agent: 'MCQCritic',
    shape: 'object',
    parser: CritiqueResponseSchema
  });

  switch (outcome.kind) {
    case 'ok':
      return fromResponse(mcq, index, outcome.value, params.missingScoreDefault);
    case 'service':
    case 'malformed':
      console.warn(`[mcq][critic] critique of MCQ ${index} failed (${outcome.kind}): ${outcome.error.message}`);
      return fallbackCritique(mcq, index, params.fallbackCritiqueScore);
  }
}

/**
 * One critique per MCQ, in input order. A failed critique is replaced by a
 * neutral fallback and the remaining MCQs are still critiqued.
 */
export async function critiqueMcqs(
  mcqs: readonly MCQ[],
  fragments: readonly ContextFragment[],
  deps: StageDeps
): Promise<CritiqueResult[]> {
  const critiques: CritiqueResult[] = [];
  for (const [index, mcq] of mcqs.entries()) {
    critiques.push(await critiqueMcq(mcq, index, fragments, deps));
  }
  return critiques;
}
