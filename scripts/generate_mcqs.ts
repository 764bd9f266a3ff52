#!/usr/bin/env tsx
import { join } from 'node:path';
import { z } from 'zod';
import { getCumulativeCostUsd, runWithCostTracking } from '@/lib/cost-tracker';
import { formatResultAsText } from '@/lib/export';
import { DifficultySchema, toPublishedResult } from '@/lib/mcq';
import { createOpenAITextGenerator } from '@/lib/openai-client';
import { createMcqPipeline } from '@/lib/pipeline/orchestrator';
import { createStaticRetriever, loadFragmentsFile } from '@/lib/retrieval';

const USAGE =
  'Usage: npm run generate -- "<query>" ["<query>" ...] [--fragments=path] [--n=5] [--top-k=5] ' +
  '[--difficulty=easy|medium|hard] [--revise] [--format=json|text] [--all]';

const ArgsSchema = z.object({
  queries: z.array(z.string().min(1)).min(1),
  fragments: z.string().default(join(process.cwd(), 'scripts', 'data', 'sample-fragments.json')),
  n: z.coerce.number().int().min(1).default(5),
  topK: z.coerce.number().int().min(1).default(5),
  difficulty: DifficultySchema.optional(),
  revise: z.boolean().default(false),
  format: z.enum(['json', 'text']).default('json'),
  all: z.boolean().default(false)
});

function flag(args: string[], name: string): string | undefined {
  const prefix = `--${name}=`;
  return args.find((arg) => arg.startsWith(prefix))?.slice(prefix.length);
}

async function main() {
  const args = process.argv.slice(2);
  const parsed = ArgsSchema.safeParse({
    queries: args.filter((arg) => !arg.startsWith('--')),
    fragments: flag(args, 'fragments'),
    n: flag(args, 'n'),
    topK: flag(args, 'top-k'),
    difficulty: flag(args, 'difficulty')?.toLowerCase(),
    revise: args.includes('--revise'),
    format: flag(args, 'format'),
    all: args.includes('--all')
  });
  if (!parsed.success) {
    console.error(USAGE);
    for (const issue of parsed.error.issues) {
      console.error(`  ${issue.path.join('.')}: ${issue.message}`);
    }
    process.exit(1);
  }
  const opts = parsed.data;

  const fragments = loadFragmentsFile(opts.fragments);
  console.error(`Loaded ${fragments.length} fragments from ${opts.fragments}`);

  const pipeline = createMcqPipeline(
    { retriever: createStaticRetriever(fragments), generator: createOpenAITextGenerator() },
    { params: { revise: opts.revise } }
  );
  const runOptions = { count: opts.n, topK: opts.topK, difficulty: opts.difficulty };

  const { value: batch, cost } = await runWithCostTracking(() => pipeline.runBatch(opts.queries, runOptions));
  console.error(
    `Estimated cost: $${cost.total_cost_usd.toFixed(4)} (${cost.total_tokens} tokens, ${cost.calls} calls), ` +
      `process total $${getCumulativeCostUsd().toFixed(4)}`
  );
  for (const failure of batch.failures) {
    console.error(`Query ${failure.index + 1} failed: ${failure.message}`);
  }

  if (opts.format === 'text') {
    console.log(batch.results.map((r) => formatResultAsText(r, { includeInvalid: opts.all })).join('\n\n'));
    return;
  }
  const published = batch.results.map(toPublishedResult);
  console.log(JSON.stringify(published.length === 1 ? published[0] : published, null, 2));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
