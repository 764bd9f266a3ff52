import { z } from 'zod';
import { MalformedResponseError, ServiceError, errorMessage } from '@/lib/errors';
import { isCostLimitError } from '@/lib/cost-tracker';

export type CompletionOptions = {
  system?: string;
  model?: string;
  temperature?: number;
  maxOutputTokens?: number;
  agent?: string;
};

/** Port for the external text-completion service. Rejects with ServiceError. */
export interface TextGenerator {
  complete(prompt: string, options?: CompletionOptions): Promise<string>;
}

export type StructuredOutcome<T> =
  | { kind: 'ok'; value: T; raw: string }
  | { kind: 'malformed'; error: MalformedResponseError; raw: string }
  | { kind: 'service'; error: ServiceError };

export type ResponseShape = 'array' | 'object';

/** Removes a surrounding ```json fence (or a bare ``` fence) when present. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const fenced = trimmed.match(/```(?:json|JSON)?\s*([\s\S]*?)```/);
  if (fenced) {
    return fenced[1].trim();
  }
  return trimmed;
}

/**
 * Cuts the first balanced JSON array or object out of `text`. Brackets inside
 * string literals are ignored.
 */
export function extractJson(text: string, shape: ResponseShape): string {
  const cleaned = stripCodeFence(text);
  const open = shape === 'array' ? '[' : '{';
  const start = cleaned.indexOf(open);
  if (start === -1) {
    throw new MalformedResponseError(`No JSON ${shape} found in response`);
  }

  let depth = 0;
  let inString = false;
  let escaped = false;
  for (let i = start; i < cleaned.length; i++) {
    const char = cleaned[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (char === '\\') escaped = true;
      else if (char === '"') inString = false;
      continue;
    }
    if (char === '"') inString = true;
    else if (char === '[' || char === '{') depth++;
    else if (char === ']' || char === '}') {
      depth--;
      if (depth === 0) {
        return cleaned.slice(start, i + 1);
      }
    }
  }
  throw new MalformedResponseError(`Unterminated JSON ${shape} in response`);
}

export function parseStructured<T>(text: string, shape: ResponseShape, parser: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const json = extractJson(text, shape);
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (err) {
    throw new MalformedResponseError(`Response is not valid JSON: ${errorMessage(err)}`);
  }
  const parsed = parser.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new MalformedResponseError(`Response does not match the expected ${shape} grammar`, issues);
  }
  return parsed.data;
}

/**
 * Calls the generator and parses its answer. Service and grammar failures come
 * back as data; only a cost-limit error is rethrown since it ends the run.
 */
export async function requestStructured<T>(
  generator: TextGenerator,
  prompt: string,
  options: CompletionOptions & { shape: ResponseShape; parser: z.ZodType<T, z.ZodTypeDef, unknown> }
): Promise<StructuredOutcome<T>> {
  const { shape, parser, ...completion } = options;
  let raw: string;
  try {
    raw = await generator.complete(prompt, completion);
  } catch (err) {
    if (isCostLimitError(err)) throw err;
    const error = err instanceof ServiceError ? err : new ServiceError(errorMessage(err), { cause: err });
    return { kind: 'service', error };
  }

  try {
    return { kind: 'ok', value: parseStructured(raw, shape, parser), raw };
  } catch (err) {
    const error = err instanceof MalformedResponseError ? err : new MalformedResponseError(errorMessage(err));
    return { kind: 'malformed', error, raw };
  }
}
