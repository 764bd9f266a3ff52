import { resolveParameters, type PipelineParameters } from '@/config/pipeline';
import { mcqIdFor } from '@/lib/ids';
import { requestStructured, type TextGenerator } from '@/lib/llm-response';
import { GeneratedBatchSchema, type GeneratedItem } from '@/lib/mcq';
import { loadPrompt, renderTemplate } from '@/lib/prompts';
import type { ContextFragment, Difficulty, MCQ, MCQMetadata } from '@/lib/types';

export type StageDeps = {
  generator: TextGenerator;
  params?: PipelineParameters;
};

export function formatContext(fragments: readonly ContextFragment[]): string {
  return fragments
    .map((fragment, i) => `[Fragment ${i} from ${fragment.source} (id ${fragment.fragment_id})]:\n${fragment.text}`)
    .join('\n\n');
}

export function buildGenerationPrompt(
  fragments: readonly ContextFragment[],
  count: number,
  difficulty?: Difficulty
): string {
  return renderTemplate(loadPrompt('mcq-generator.user.md'), {
    count: String(count),
    context: formatContext(fragments),
    difficulty_instruction: difficulty ? `Generate ${difficulty} difficulty questions. ` : ''
  });
}

export function contextSnippet(text: string, length: number): string {
  return `${text.slice(0, length)}...`;
}

function resolveFragment(fragments: readonly ContextFragment[], index: number | null | undefined): ContextFragment {
  if (typeof index === 'number' && index >= 0 && index < fragments.length) {
    return fragments[index];
  }
  return fragments[0];
}

export function buildMcq(
  item: Omit<GeneratedItem, 'fragment_index'>,
  fragment: ContextFragment,
  order: number,
  options: { snippetLength: number; metadata?: MCQMetadata; revisedFrom?: string }
): MCQ {
  return Object.freeze({
    id: mcqIdFor({
      question: item.question,
      fragment_id: fragment.fragment_id,
      order,
      revised_from: options.revisedFrom
    }),
    question: item.question,
    options: Object.freeze(
      item.options.map((opt) =>
        Object.freeze({ label: opt.label, text: opt.text, is_correct: opt.label === item.correct_answer })
      )
    ),
    correct_answer: item.correct_answer,
    explanation: item.explanation,
    difficulty: item.difficulty ?? 'medium',
    fragment_id: fragment.fragment_id,
    source_filename: fragment.source,
    context_snippet: contextSnippet(fragment.text, options.snippetLength),
    metadata: Object.freeze({ generation_order: order, ...options.metadata })
  });
}

/**
 * Generates up to `count` candidate MCQs from the fragments with a single
 * completion call. Any service or grammar failure discards the whole batch and
 * yields an empty list.
 */
export async function generateMcqs(
  fragments: readonly ContextFragment[],
  count: number,
  difficulty: Difficulty | undefined,
  deps: StageDeps
): Promise<MCQ[]> {
  if (fragments.length === 0) {
    return [];
  }
  const params = deps.params ?? resolveParameters();

  const outcome = await requestStructured(deps.generator, buildGenerationPrompt(fragments, count, difficulty), {
    system: loadPrompt('mcq-generator.system.md'),
    model: params.models.generator,
    temperature: params.temps.generator,
    agent: 'MCQGenerator',
    shape: 'array',
    parser: GeneratedBatchSchema
  });

  switch (outcome.kind) {
    case 'service':
      console.warn(`[mcq][generator] service error, no MCQs generated: ${outcome.error.message}`);
      return [];
    case 'malformed':
      console.warn(`[mcq][generator] malformed response, no MCQs generated: ${outcome.error.message}`, {
        issues: outcome.error.issues.slice(0, 5)
      });
      return [];
    case 'ok':
      return outcome.value.map((item, order) =>
        buildMcq(item, resolveFragment(fragments, item.fragment_index), order, {
          snippetLength: params.snippetLength
        })
      );
  }
}
