import { resolveParameters, type DeepPartial, type PipelineParameters } from '@/config/pipeline';
import { critiqueMcq, critiqueMcqs, findSourceFragment } from '@/lib/agents/critic';
import { generateMcqs, type StageDeps } from '@/lib/agents/generator';
import { reviseMcq } from '@/lib/agents/reviser';
import { validateMcq, validateMcqs } from '@/lib/agents/validator';
import { errorMessage } from '@/lib/errors';
import type { TextGenerator } from '@/lib/llm-response';
import {
  PipelineRequestSchema,
  createGenerationResult,
  emptyGenerationResult,
  summarizeBatch
} from '@/lib/mcq';
import type { Retriever } from '@/lib/retrieval';
import type {
  BatchFailure,
  BatchResult,
  ContextFragment,
  CritiqueResult,
  Difficulty,
  GenerationResult,
  MCQ,
  RunStage,
  ValidationResult
} from '@/lib/types';

export type PipelineDeps = {
  retriever: Retriever;
  generator: TextGenerator;
};

export type StageEvent = {
  query: string;
  stage: RunStage;
  count: number;
};

export type PipelineOptions = {
  params?: DeepPartial<PipelineParameters>;
  onStage?: (event: StageEvent) => void;
};

export type RunOptions = {
  count?: number;
  difficulty?: Difficulty;
  topK?: number;
};

export type McqPipeline = {
  run(query: string, options?: RunOptions): Promise<GenerationResult>;
  runBatch(queries: readonly string[], options?: RunOptions): Promise<BatchResult>;
  readonly params: PipelineParameters;
};

type Evaluated = {
  mcqs: MCQ[];
  critiques: CritiqueResult[];
  validations: ValidationResult[];
};

async function reviseFlagged(
  evaluated: Evaluated,
  fragments: readonly ContextFragment[],
  deps: StageDeps & { params: PipelineParameters }
): Promise<Evaluated & { revised: number }> {
  const mcqs = [...evaluated.mcqs];
  const critiques = [...evaluated.critiques];
  const validations = [...evaluated.validations];
  let revised = 0;

  for (const [index, validation] of evaluated.validations.entries()) {
    if (validation.status !== 'needs_revision') continue;
    const original = mcqs[index];
    const fragment = findSourceFragment(original, fragments);
    if (!fragment) continue;

    const candidate = await reviseMcq(original, critiques[index], fragment, deps);
    if (candidate === original) continue;

    // replace in place so positions stay aligned across all three lists
    const critique = await critiqueMcq(candidate, index, fragments, deps);
    mcqs[index] = candidate;
    critiques[index] = critique;
    validations[index] = validateMcq(candidate, index, critique, deps.params.thresholds);
    revised++;
  }

  return { mcqs, critiques, validations, revised };
}

export function createMcqPipeline(deps: PipelineDeps, options: PipelineOptions = {}): McqPipeline {
  const params = resolveParameters(options.params);
  const stageDeps = { generator: deps.generator, params };

  const report = (query: string, stage: RunStage, count: number) => {
    console.info(`[mcq][pipeline] stage=${stage} count=${count} query=${JSON.stringify(query)}`);
    options.onStage?.({ query, stage, count });
  };

  async function run(query: string, runOptions: RunOptions = {}): Promise<GenerationResult> {
    const request = PipelineRequestSchema.parse({
      count: runOptions.count ?? params.count,
      difficulty: runOptions.difficulty,
      topK: runOptions.topK ?? params.topK
    });

    const fragments = await deps.retriever.retrieve(query, request.topK);
    if (fragments.length === 0) {
      report(query, 'no_context', 0);
      return emptyGenerationResult(query);
    }
    report(query, 'retrieved', fragments.length);

    const mcqs = await generateMcqs(fragments, request.count, request.difficulty, stageDeps);
    if (mcqs.length === 0) {
      report(query, 'generation_empty', 0);
      return emptyGenerationResult(query);
    }
    report(query, 'generated', mcqs.length);

    const critiques = await critiqueMcqs(mcqs, fragments, stageDeps);
    report(query, 'critiqued', critiques.length);

    const validations = validateMcqs(mcqs, critiques, params.thresholds);
    report(query, 'validated', validations.length);

    let evaluated: Evaluated = { mcqs, critiques, validations };
    if (params.revise) {
      const { revised, ...rest } = await reviseFlagged(evaluated, fragments, stageDeps);
      evaluated = rest;
      report(query, 'revised', revised);
    }

    const result = createGenerationResult({ query, ...evaluated });
    const avg =
      evaluated.critiques.length > 0
        ? evaluated.critiques.reduce((sum, c) => sum + c.overall_score, 0) / evaluated.critiques.length
        : 0;
    console.info(
      `[mcq][pipeline] total=${result.mcqs.length} valid=${result.valid_mcqs.length} invalid=${
        result.invalid_mcqs.length
      } avg_score=${avg.toFixed(2)}`
    );
    report(query, 'aggregated', result.valid_mcqs.length);
    return result;
  }

  async function runBatch(queries: readonly string[], runOptions: RunOptions = {}): Promise<BatchResult> {
    const results: GenerationResult[] = [];
    const failures: BatchFailure[] = [];

    for (const [index, query] of queries.entries()) {
      console.info(`[mcq][batch] query ${index + 1}/${queries.length}`);
      try {
        results.push(await run(query, runOptions));
      } catch (err) {
        console.error('[mcq][batch] query failed', { query, message: errorMessage(err) });
        failures.push({ query, index, message: errorMessage(err) });
        results.push(emptyGenerationResult(query));
      }
    }

    const summary = summarizeBatch(results);
    console.info(
      `[mcq][batch] queries=${queries.length} generated=${summary.total_generated} valid=${
        summary.total_valid
      } success_rate=${(summary.success_rate * 100).toFixed(1)}%`
    );
    return { results, failures, ...summary };
  }

  return { run, runBatch, params };
}
