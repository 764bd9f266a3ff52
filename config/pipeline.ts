export const defaultModel = process.env.OPENAI_MODEL || 'gpt-4o-mini';

export type ValidationThresholds = {
  /** Below this the MCQ is not considered grounded in its fragment */
  groundingScore: number;
  /** Below this the MCQ is flagged as a likely hallucination */
  hallucinationScore: number;
  /** Critique overall score at or above which a flawed MCQ is salvageable */
  revisionScore: number;
  minQuestionLength: number;
  minExplanationLength: number;
};

export type PipelineParameters = {
  count: number;
  topK: number;
  snippetLength: number;
  fallbackCritiqueScore: number;
  missingScoreDefault: number;
  revise: boolean;
  thresholds: ValidationThresholds;
  temps: {
    generator: number;
    critic: number;
    reviser: number;
  };
  models: {
    generator: string;
    critic: string;
    reviser: string;
  };
};

export const PIPELINE_DEFAULTS: PipelineParameters = {
  count: 5,
  topK: 5,
  snippetLength: 200,
  fallbackCritiqueScore: 7.0,
  missingScoreDefault: 5.0,
  revise: false,
  thresholds: {
    groundingScore: 6.0,
    hallucinationScore: 5.0,
    revisionScore: 7.0,
    minQuestionLength: 10,
    minExplanationLength: 10
  },
  temps: {
    generator: 0.7,
    critic: 0.3,
    reviser: 0.5
  },
  models: {
    generator: process.env.MCQ_GENERATION_MODEL || defaultModel,
    critic: process.env.MCQ_CRITIC_MODEL || defaultModel,
    reviser: process.env.MCQ_GENERATION_MODEL || defaultModel
  }
};

export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends object ? DeepPartial<T[K]> : T[K];
};

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return !!value && typeof value === 'object' && !Array.isArray(value);
}

export function mergeDeep<T extends object>(base: T, patch: DeepPartial<T>): T {
  const result: Record<string, unknown> = Object.fromEntries(Object.entries(base));
  for (const [key, incoming] of Object.entries(patch)) {
    if (incoming === undefined) continue;
    const current = result[key];
    result[key] = isPlainObject(current) && isPlainObject(incoming) ? mergeDeep(current, incoming) : incoming;
  }
  return result as T;
}

export function resolveParameters(overrides?: DeepPartial<PipelineParameters>): PipelineParameters {
  return mergeDeep(PIPELINE_DEFAULTS, overrides ?? {});
}
