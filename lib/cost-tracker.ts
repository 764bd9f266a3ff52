import { AsyncLocalStorage } from 'node:async_hooks';
import { getPricingForModel } from '@/config/pricing';

export type UsageReport = {
  input_tokens?: number | null;
  output_tokens?: number | null;
  prompt_tokens?: number | null;
  completion_tokens?: number | null;
  total_tokens?: number | null;
};

export type CostBreakdownEntry = {
  model: string;
  agent: string;
  input_tokens: number;
  output_tokens: number;
  cost_usd: number;
};

export type CostSummary = {
  total_cost_usd: number;
  total_input_tokens: number;
  total_output_tokens: number;
  total_tokens: number;
  limit_usd: number;
  calls: number;
  breakdown: CostBreakdownEntry[];
};

type CostState = {
  totalCostUsd: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  breakdown: CostBreakdownEntry[];
  limitUsd: number;
  runId: string;
};

const storage = new AsyncLocalStorage<CostState>();
let callCounter = 0;
let cumulativeCostUsd = 0;

const COST_LIMIT_ERROR = 'MCQ_COST_LIMIT';

export class CostLimitError extends Error {
  readonly code = COST_LIMIT_ERROR;

  constructor(message: string) {
    super(message);
    this.name = 'CostLimitError';
  }
}

function resolveLimit(limitUsd?: number): number {
  if (typeof limitUsd === 'number' && Number.isFinite(limitUsd) && limitUsd >= 0) {
    return limitUsd;
  }
  const parsed = Number(process.env.OPENAI_MAX_COST_USD ?? 'NaN');
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : Number.POSITIVE_INFINITY;
}

/**
 * Runs `fn` with its own cost ledger. Every `recordUsage` call made while `fn`
 * is pending (including across awaits) is charged to this ledger only, so
 * concurrent runs never share counters.
 */
export async function runWithCostTracking<T>(
  fn: () => Promise<T> | T,
  options: { limitUsd?: number } = {}
): Promise<{ value: T; cost: CostSummary }> {
  const state: CostState = {
    totalCostUsd: 0,
    totalInputTokens: 0,
    totalOutputTokens: 0,
    breakdown: [],
    limitUsd: resolveLimit(options.limitUsd),
    runId: Math.random().toString(36).slice(2, 8)
  };

  return storage.run(state, async () => {
    const value = await fn();
    return { value, cost: summarize(state) };
  });
}

export function recordUsage(model: string, usage: UsageReport, agent = 'unknown'): void {
  const state = storage.getStore();
  if (!state) return;

  const pricing = getPricingForModel(model);
  const inputTokens = normalizeTokens(usage.input_tokens ?? usage.prompt_tokens);
  const outputTokens = normalizeTokens(usage.output_tokens ?? usage.completion_tokens);
  const totalTokens = normalizeTokens(usage.total_tokens);

  const inputTok = inputTokens ?? (totalTokens !== null ? Math.max(totalTokens - (outputTokens ?? 0), 0) : 0);
  const outputTok = outputTokens ?? (totalTokens !== null ? Math.max(totalTokens - inputTok, 0) : 0);

  const costUsd = (inputTok / 1000) * pricing.input + (outputTok / 1000) * pricing.output;

  state.totalInputTokens += inputTok;
  state.totalOutputTokens += outputTok;
  state.totalCostUsd += costUsd;
  state.breakdown.push({
    model,
    agent,
    input_tokens: inputTok,
    output_tokens: outputTok,
    cost_usd: costUsd
  });

  cumulativeCostUsd += costUsd;
  callCounter += 1;
  const precision = Math.max(0, Math.min(8, Number(process.env.OPENAI_COST_LOG_PRECISION ?? 6)));
  const fmt = (n: number) => n.toFixed(precision);
  console.info(
    `[OpenAI][rid=${state.runId}][#${callCounter}] agent=${agent} cost=$${fmt(costUsd)} run_total=$${fmt(
      state.totalCostUsd
    )} cum=$${fmt(cumulativeCostUsd)} tokens(in=${inputTok}, out=${outputTok}) model=${model}`
  );

  if (state.totalCostUsd > state.limitUsd) {
    throw new CostLimitError(
      `OpenAI cost limit exceeded: $${state.totalCostUsd.toFixed(4)} > $${state.limitUsd.toFixed(4)}`
    );
  }
}

function summarize(state: CostState): CostSummary {
  return {
    total_cost_usd: state.totalCostUsd,
    total_input_tokens: state.totalInputTokens,
    total_output_tokens: state.totalOutputTokens,
    total_tokens: state.totalInputTokens + state.totalOutputTokens,
    limit_usd: state.limitUsd,
    calls: state.breakdown.length,
    breakdown: [...state.breakdown]
  };
}

function normalizeTokens(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  return null;
}

export function isCostLimitError(error: unknown): error is CostLimitError {
  if (error instanceof CostLimitError) return true;
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    error.code === COST_LIMIT_ERROR
  );
}

export function getCumulativeCostUsd(): number {
  return cumulativeCostUsd;
}
