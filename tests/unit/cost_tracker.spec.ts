import { afterEach, describe, expect, it } from 'vitest';
import { getPricingForModel, setCustomPricing } from '@/config/pricing';
import {
  CostLimitError,
  getCumulativeCostUsd,
  isCostLimitError,
  recordUsage,
  runWithCostTracking
} from '@/lib/cost-tracker';

describe('getPricingForModel', () => {
  it('matches exact names, then the longest prefix, then the default', () => {
    expect(getPricingForModel('gpt-4o')).toEqual({ input: 0.0025, output: 0.01 });
    expect(getPricingForModel('GPT-4o-mini-2024-07-18')).toEqual({ input: 0.00015, output: 0.0006 });
    expect(getPricingForModel('some-local-model')).toEqual({ input: 0.01, output: 0.03 });
    expect(getPricingForModel(undefined)).toEqual({ input: 0.01, output: 0.03 });
  });

  it('accepts custom pricing', () => {
    setCustomPricing('Test-Model', { input: 1, output: 2 });
    expect(getPricingForModel('test-model')).toEqual({ input: 1, output: 2 });
  });
});

describe('runWithCostTracking', () => {
  const originalLimit = process.env.OPENAI_MAX_COST_USD;

  afterEach(() => {
    if (originalLimit === undefined) delete process.env.OPENAI_MAX_COST_USD;
    else process.env.OPENAI_MAX_COST_USD = originalLimit;
  });

  it('ignores usage recorded outside a run', () => {
    expect(() => recordUsage('gpt-4o', { input_tokens: 10, output_tokens: 10 })).not.toThrow();
  });

  it('accumulates usage per call and agent', async () => {
    const { value, cost } = await runWithCostTracking(async () => {
      recordUsage('gpt-4o-mini', { input_tokens: 1000, output_tokens: 2000 }, 'MCQGenerator');
      recordUsage('gpt-4o', { prompt_tokens: 500, completion_tokens: 500 }, 'MCQCritic');
      recordUsage('gpt-4o', { total_tokens: 100, output_tokens: 40 }, 'MCQCritic');
      return 'done';
    });

    expect(value).toBe('done');
    expect(cost.calls).toBe(3);
    expect(cost.total_input_tokens).toBe(1560);
    expect(cost.total_output_tokens).toBe(2540);
    expect(cost.total_tokens).toBe(4100);
    expect(cost.limit_usd).toBe(Number.POSITIVE_INFINITY);
    expect(cost.breakdown.map((entry) => entry.agent)).toEqual(['MCQGenerator', 'MCQCritic', 'MCQCritic']);
    expect(cost.breakdown[0].cost_usd).toBeCloseTo(0.00135, 10);
    expect(cost.breakdown[1].cost_usd).toBeCloseTo(0.00625, 10);
    expect(cost.breakdown[2].cost_usd).toBeCloseTo(0.00055, 10);
    expect(cost.total_cost_usd).toBeCloseTo(0.00815, 10);
  });

  it('adds every run to the process-wide total', async () => {
    const before = getCumulativeCostUsd();
    await runWithCostTracking(async () => {
      recordUsage('gpt-4o', { input_tokens: 1000, output_tokens: 0 });
    });
    await runWithCostTracking(async () => {
      recordUsage('gpt-4o', { input_tokens: 0, output_tokens: 1000 });
    });
    expect(getCumulativeCostUsd() - before).toBeCloseTo(0.0125, 10);
  });

  it('keeps concurrent runs apart', async () => {
    const tick = () => new Promise((resolve) => setTimeout(resolve, 1));
    const [a, b] = await Promise.all([
      runWithCostTracking(async () => {
        recordUsage('gpt-4o', { input_tokens: 1000, output_tokens: 0 });
        await tick();
        recordUsage('gpt-4o', { input_tokens: 1000, output_tokens: 0 });
      }),
      runWithCostTracking(async () => {
        await tick();
        recordUsage('gpt-4o', { input_tokens: 10, output_tokens: 0 });
      })
    ]);
    expect(a.cost.total_input_tokens).toBe(2000);
    expect(b.cost.total_input_tokens).toBe(10);
  });

  it('throws once the run exceeds its budget', async () => {
    const run = runWithCostTracking(
      async () => {
        recordUsage('gpt-4o', { input_tokens: 1000, output_tokens: 0 });
      },
      { limitUsd: 0.001 }
    );
    await expect(run).rejects.toBeInstanceOf(CostLimitError);
  });

  it('reads the budget from the environment', async () => {
    process.env.OPENAI_MAX_COST_USD = '0';
    const run = runWithCostTracking(async () => {
      recordUsage('gpt-4o', { input_tokens: 1, output_tokens: 0 });
    });
    await expect(run).rejects.toThrow('OpenAI cost limit exceeded');
  });
});

describe('isCostLimitError', () => {
  it('recognises the error class and its code', () => {
    expect(isCostLimitError(new CostLimitError('over'))).toBe(true);
    expect(isCostLimitError({ code: 'MCQ_COST_LIMIT' })).toBe(true);
    expect(isCostLimitError(new Error('over'))).toBe(false);
    expect(isCostLimitError(null)).toBe(false);
  });
});
