import { describe, expect, it } from 'vitest';
import { CostLimitError } from '@/lib/cost-tracker';
import { createMcqPipeline, type StageEvent } from '@/lib/pipeline/orchestrator';
import {
  PHOTOSYNTHESIS,
  RESPIRATION,
  createFixedRetriever,
  createScriptedGenerator,
  critiqueJson,
  generatedItem
} from '../fakes';

const FRAGMENTS = [PHOTOSYNTHESIS, RESPIRATION];

const RESPIRATION_ITEM = generatedItem({
  question: 'What does cellular respiration produce from glucose?',
  options: [
    { label: 'A', text: 'Oxygen' },
    { label: 'B', text: 'ATP' },
    { label: 'C', text: 'Chlorophyll' },
    { label: 'D', text: 'Starch' }
  ],
  correct_answer: 'B',
  explanation: 'The context says respiration produces ATP from glucose.',
  fragment_index: 1
});

function stagesOf(events: StageEvent[]) {
  return events.map((e) => `${e.stage}:${e.count}`);
}

describe('createMcqPipeline().run', () => {
  it('stops before generation when nothing is retrieved', async () => {
    const { retriever } = createFixedRetriever([]);
    const { generator, calls } = createScriptedGenerator({});
    const events: StageEvent[] = [];
    const pipeline = createMcqPipeline({ retriever, generator }, { onStage: (e) => events.push(e) });

    const result = await pipeline.run('quantum chromodynamics');

    expect(result.query).toBe('quantum chromodynamics');
    expect(result.mcqs).toEqual([]);
    expect(result.valid_mcqs).toEqual([]);
    expect(calls).toHaveLength(0);
    expect(stagesOf(events)).toEqual(['no_context:0']);
  });

  it('skips critique when generation yields nothing', async () => {
    const { retriever } = createFixedRetriever(FRAGMENTS);
    const { generator, callsFor } = createScriptedGenerator({ MCQGenerator: ['Sorry, no questions today.'] });
    const events: StageEvent[] = [];
    const pipeline = createMcqPipeline({ retriever, generator }, { onStage: (e) => events.push(e) });

    const result = await pipeline.run('photosynthesis');

    expect(result.mcqs).toEqual([]);
    expect(callsFor('MCQCritic')).toHaveLength(0);
    expect(stagesOf(events)).toEqual(['retrieved:2', 'generation_empty:0']);
  });

  it('runs every stage and partitions the result', async () => {
    const { retriever, queries } = createFixedRetriever(FRAGMENTS);
    const { generator, callsFor } = createScriptedGenerator({
      MCQGenerator: [JSON.stringify([generatedItem(), RESPIRATION_ITEM])],
      MCQCritic: [
        critiqueJson({ clarity: 9, correctness: 9, grounding: 9 }),
        critiqueJson({ clarity: 8, correctness: 8, grounding: 3 })
      ]
    });
    const events: StageEvent[] = [];
    const pipeline = createMcqPipeline({ retriever, generator }, { onStage: (e) => events.push(e) });

    const result = await pipeline.run('plant cells', { count: 2, difficulty: 'easy' });

    expect(queries).toEqual([{ query: 'plant cells', topK: 5 }]);
    expect(callsFor('MCQGenerator')[0].prompt).toContain('generate 2 multiple choice questions');
    expect(callsFor('MCQCritic')).toHaveLength(2);

    expect(result.mcqs).toHaveLength(2);
    expect(result.critiques.map((c) => c.mcq_id)).toEqual(result.mcqs.map((m) => m.id));
    expect(result.validations.map((v) => v.status)).toEqual(['valid', 'invalid']);
    expect(result.validations[1].validation_errors).toEqual([
      'Low grounding score: 3/10',
      'Potential hallucination detected'
    ]);
    expect(result.valid_mcqs).toEqual([result.mcqs[0]]);
    expect(result.invalid_mcqs).toEqual([result.mcqs[1]]);
    expect(stagesOf(events)).toEqual([
      'retrieved:2',
      'generated:2',
      'critiqued:2',
      'validated:2',
      'aggregated:1'
    ]);
  });

  it('rejects out-of-range requests before retrieving', async () => {
    const { retriever, queries } = createFixedRetriever(FRAGMENTS);
    const { generator } = createScriptedGenerator({});
    const pipeline = createMcqPipeline({ retriever, generator });

    await expect(pipeline.run('plant cells', { count: 0 })).rejects.toThrow();
    await expect(pipeline.run('plant cells', { topK: 0 })).rejects.toThrow();
    expect(queries).toHaveLength(0);
  });

  it('accepts large counts and topK values', async () => {
    const { retriever, queries } = createFixedRetriever(FRAGMENTS);
    const { generator, callsFor } = createScriptedGenerator({ MCQGenerator: ['[]'] });
    const pipeline = createMcqPipeline({ retriever, generator });

    await expect(pipeline.run('plant cells', { count: 30, topK: 100 })).resolves.toMatchObject({ mcqs: [] });
    expect(queries).toEqual([{ query: 'plant cells', topK: 100 }]);
    expect(callsFor('MCQGenerator')[0].prompt).toContain('generate 30 multiple choice questions');
  });

  it('uses configured defaults for count and topK', async () => {
    const { retriever, queries } = createFixedRetriever(FRAGMENTS);
    const { generator, callsFor } = createScriptedGenerator({ MCQGenerator: ['[]'] });
    const pipeline = createMcqPipeline({ retriever, generator }, { params: { count: 3, topK: 8 } });

    await pipeline.run('plant cells');

    expect(queries).toEqual([{ query: 'plant cells', topK: 8 }]);
    expect(callsFor('MCQGenerator')[0].prompt).toContain('generate 3 multiple choice questions');
  });

  it('aborts the run when the cost budget is exceeded', async () => {
    const { retriever } = createFixedRetriever(FRAGMENTS);
    const { generator } = createScriptedGenerator({
      MCQGenerator: [JSON.stringify([generatedItem()])],
      MCQCritic: [new CostLimitError('OpenAI cost limit exceeded')]
    });
    const pipeline = createMcqPipeline({ retriever, generator });

    await expect(pipeline.run('plant cells')).rejects.toBeInstanceOf(CostLimitError);
  });
});

describe('revision', () => {
  const FLAWED = generatedItem({ explanation: 'Short.' });
  const FIXED = generatedItem({ explanation: 'The context places photosynthesis in the chloroplasts.' });

  it('replaces MCQs marked for revision and re-evaluates only those', async () => {
    const { retriever } = createFixedRetriever(FRAGMENTS);
    const { generator, callsFor } = createScriptedGenerator({
      MCQGenerator: [JSON.stringify([RESPIRATION_ITEM, FLAWED])],
      MCQCritic: [
        critiqueJson({ clarity: 9, correctness: 9, grounding: 9 }),
        critiqueJson({ clarity: 8, correctness: 8, grounding: 8 }),
        critiqueJson({ clarity: 9, correctness: 9, grounding: 9 })
      ],
      MCQReviser: [JSON.stringify(FIXED)]
    });
    const events: StageEvent[] = [];
    const pipeline = createMcqPipeline(
      { retriever, generator },
      { params: { revise: true }, onStage: (e) => events.push(e) }
    );

    const result = await pipeline.run('cells');

    expect(callsFor('MCQReviser')).toHaveLength(1);
    expect(callsFor('MCQCritic')).toHaveLength(3);
    const [kept, revised] = result.mcqs;
    expect(kept.question).toBe('What does cellular respiration produce from glucose?');
    expect(revised.explanation).toBe('The context places photosynthesis in the chloroplasts.');
    expect(revised.metadata).toMatchObject({ generation_order: 1, revision: 1 });
    expect(revised.metadata.revised_from).toMatch(/^mcq_/);
    expect(result.critiques[1].mcq_id).toBe(revised.id);
    expect(result.validations[1]).toMatchObject({ mcq_index: 1, mcq_id: revised.id, status: 'valid' });
    expect(result.valid_mcqs).toEqual([kept, revised]);
    expect(stagesOf(events)).toContain('revised:1');
  });

  it('leaves flawed MCQs alone when revision is off', async () => {
    const { retriever } = createFixedRetriever(FRAGMENTS);
    const { generator, callsFor } = createScriptedGenerator({
      MCQGenerator: [JSON.stringify([FLAWED])],
      MCQCritic: [critiqueJson({ clarity: 8, correctness: 8, grounding: 8 })]
    });
    const pipeline = createMcqPipeline({ retriever, generator });

    const result = await pipeline.run('cells');

    expect(callsFor('MCQReviser')).toHaveLength(0);
    expect(result.validations[0].status).toBe('needs_revision');
    expect(result.invalid_mcqs).toHaveLength(1);
  });
});

describe('createMcqPipeline().runBatch', () => {
  it('isolates a failing query and aggregates the rest', async () => {
    const { retriever } = createFixedRetriever((query) => {
      if (query === 'broken') throw new Error('index offline');
      return FRAGMENTS;
    });
    const { generator } = createScriptedGenerator({
      MCQGenerator: [JSON.stringify([generatedItem()]), JSON.stringify([generatedItem(), RESPIRATION_ITEM])],
      MCQCritic: [
        critiqueJson({ clarity: 9, correctness: 9, grounding: 9 }),
        critiqueJson({ clarity: 9, correctness: 9, grounding: 9 }),
        critiqueJson({ clarity: 8, correctness: 8, grounding: 3 })
      ]
    });
    const pipeline = createMcqPipeline({ retriever, generator });

    const batch = await pipeline.runBatch(['photosynthesis', 'broken', 'respiration']);

    expect(batch.results.map((r) => r.query)).toEqual(['photosynthesis', 'broken', 'respiration']);
    expect(batch.results[1].mcqs).toEqual([]);
    expect(batch.failures).toEqual([{ query: 'broken', index: 1, message: 'index offline' }]);
    expect(batch.total_generated).toBe(3);
    expect(batch.total_valid).toBe(2);
    expect(batch.success_rate).toBeCloseTo(2 / 3);
  });

  it('reports a zero success rate for an empty batch', async () => {
    const { retriever } = createFixedRetriever([]);
    const { generator } = createScriptedGenerator({});
    const batch = await createMcqPipeline({ retriever, generator }).runBatch([]);
    expect(batch).toEqual({ results: [], failures: [], total_generated: 0, total_valid: 0, success_rate: 0 });
  });
});
