import OpenAI from 'openai';
import { defaultModel } from '@/config/pipeline';
import { recordUsage } from '@/lib/cost-tracker';
import { ServiceError, errorMessage } from '@/lib/errors';
import type { CompletionOptions, TextGenerator } from '@/lib/llm-response';

type Effort = 'low' | 'medium' | 'high';

function resolveEffort(): Effort {
  const effort = (process.env.OPENAI_REASONING_EFFORT || 'medium').trim().toLowerCase();
  return effort === 'low' || effort === 'high' ? effort : 'medium';
}

function reasoningBlockFor(model: string): { reasoning?: { effort: Effort } } {
  // Only reasoning models accept the effort knob
  if (/^(o\d|gpt-5)/i.test(model)) {
    return { reasoning: { effort: resolveEffort() } };
  }
  return {};
}

let client: OpenAI | null = null;

function getClient(): OpenAI {
  if (!process.env.OPENAI_API_KEY) {
    throw new ServiceError('OPENAI_API_KEY missing');
  }
  if (!client) {
    const timeout = Number(process.env.OPENAI_TIMEOUT_MS ?? 120_000);
    client = new OpenAI({
      apiKey: process.env.OPENAI_API_KEY,
      timeout: Number.isFinite(timeout) && timeout > 0 ? timeout : 120_000,
      maxRetries: 2
    });
  }
  return client;
}

export function resetClientForTests(): void {
  client = null;
}

function toServiceError(err: unknown): ServiceError {
  if (err instanceof ServiceError) return err;
  if (err instanceof OpenAI.APIError) {
    return new ServiceError(`OpenAI error ${err.status ?? ''}: ${err.message}`, { status: err.status, cause: err });
  }
  return new ServiceError(`OpenAI error: ${errorMessage(err)}`, { cause: err });
}

export type TextCallParams = {
  system?: string;
  user: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  agent?: string;
};

export async function callText({
  system,
  user,
  model = defaultModel,
  temperature,
  maxOutputTokens,
  agent = 'unknown'
}: TextCallParams): Promise<string> {
  const openai = getClient();

  const create = (includeTemperature: boolean) =>
    openai.responses.create({
      model,
      input: [
        ...(system ? [{ role: 'system' as const, content: system }] : []),
        { role: 'user' as const, content: user }
      ],
      text: { format: { type: 'text' } },
      ...(includeTemperature && typeof temperature === 'number' ? { temperature } : {}),
      ...(typeof maxOutputTokens === 'number' ? { max_output_tokens: maxOutputTokens } : {}),
      ...reasoningBlockFor(model)
    });

  console.info(`[LLM][agent=${agent}] callText model=${model}`);
  let res: Awaited<ReturnType<typeof create>>;
  try {
    res = await create(true);
  } catch (err) {
    // Some models reject sampling parameters; retry once without them
    if (/Unsupported parameter: 'temperature'/.test(errorMessage(err))) {
      try {
        res = await create(false);
      } catch (err2) {
        throw toServiceError(err2);
      }
    } else {
      throw toServiceError(err);
    }
  }

  if (res.usage) {
    recordUsage(model, res.usage, agent);
    console.info(
      `[LLM][agent=${agent}] done tokens in=${res.usage.input_tokens} out=${res.usage.output_tokens} model=${model}`
    );
  }

  const text = res.output_text;
  if (!text) {
    throw new ServiceError('OpenAI returned empty response');
  }
  return text.trim();
}

/** TextGenerator backed by the OpenAI Responses API. */
export function createOpenAITextGenerator(defaults: CompletionOptions = {}): TextGenerator {
  return {
    complete(prompt: string, options: CompletionOptions = {}) {
      const merged = { ...defaults, ...options };
      return callText({
        system: merged.system,
        user: prompt,
        model: merged.model,
        temperature: merged.temperature,
        maxOutputTokens: merged.maxOutputTokens,
        agent: merged.agent
      });
    }
  };
}
