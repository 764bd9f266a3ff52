import { createHash } from 'node:crypto';

type HashInput = string | number | boolean | null | HashInput[] | { [key: string]: HashInput };

function normalize(input: HashInput): string {
  if (Array.isArray(input)) {
    return `[${input.map((item) => normalize(item)).join(',')}]`;
  }
  if (input && typeof input === 'object') {
    const entries = Object.entries(input)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([key, value]) => `"${key}":${normalize(value)}`);
    return `{${entries.join(',')}}`;
  }
  if (typeof input === 'string') {
    return JSON.stringify(input);
  }
  if (typeof input === 'number') {
    return Number.isFinite(input) ? String(input) : '"NaN"';
  }
  if (typeof input === 'boolean') {
    return input ? 'true' : 'false';
  }
  return 'null';
}

/**
 * Stable identifier for a generated question. The same generator output always
 * hashes to the same id, so a re-run over identical responses is reproducible.
 */
export function mcqIdFor(parts: { question: string; fragment_id: string; order: number; revised_from?: string }): string {
  const hash = createHash('sha1');
  hash.update(
    normalize({
      question: parts.question.trim(),
      fragment_id: parts.fragment_id,
      order: parts.order,
      revised_from: parts.revised_from ?? null
    })
  );
  return `mcq_${hash.digest('hex').slice(0, 16)}`;
}
