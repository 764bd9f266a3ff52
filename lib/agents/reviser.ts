import { resolveParameters } from '@/config/pipeline';
import { requestStructured } from '@/lib/llm-response';
import { RevisedItemSchema } from '@/lib/mcq';
import { loadPrompt, renderTemplate } from '@/lib/prompts';
import type { ContextFragment, CritiqueResult, MCQ } from '@/lib/types';
import { formatOptions } from './critic';
import { buildMcq, type StageDeps } from './generator';

function bullets(lines: readonly string[]): string {
  return lines.length > 0 ? lines.map((line) => `- ${line}`).join('\n') : '- (none)';
}

export function buildRevisionPrompt(mcq: MCQ, critique: CritiqueResult, fragment: ContextFragment): string {
  return renderTemplate(loadPrompt('mcq-reviser.user.md'), {
    context: fragment.text,
    question: mcq.question,
    options: formatOptions(mcq),
    correct_answer: mcq.correct_answer,
    explanation: mcq.explanation,
    difficulty: mcq.difficulty,
    issues: bullets(critique.issues),
    suggestions: bullets(critique.suggestions)
  });
}

/**
 * Asks the generator to rewrite `mcq` from its critique. The result is a new
 * MCQ that records the id it was revised from; on any failure the original is
 * returned untouched.
 */
export async function reviseMcq(
  mcq: MCQ,
  critique: CritiqueResult,
  fragment: ContextFragment,
  deps: StageDeps
): Promise<MCQ> {
  const params = deps.params ?? resolveParameters();
  const outcome = await requestStructured(deps.generator, buildRevisionPrompt(mcq, critique, fragment), {
    system: loadPrompt('mcq-reviser.system.md'),
    model: params.models.reviser,
    temperature: params.temps.reviser,
    agent: 'MCQReviser',
    shape: 'object',
    parser: RevisedItemSchema
  });

  switch (outcome.kind) {
    case 'ok': {
      const previous = typeof mcq.metadata.revision === 'number' ? mcq.metadata.revision : 0;
      return buildMcq(outcome.value, fragment, mcq.metadata.generation_order ?? critique.mcq_index, {
        snippetLength: params.snippetLength,
        revisedFrom: mcq.id,
        metadata: { revised_from: mcq.id, revision: previous + 1 }
      });
    }
    case 'service':
    case 'malformed':
      console.warn(`[mcq][reviser] revision of ${mcq.id} failed (${outcome.kind}): ${outcome.error.message}`);
      return mcq;
  }
}
