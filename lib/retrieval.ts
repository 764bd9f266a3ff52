import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { RetrievedFragment } from '@/lib/types';

/** Port for the external context retrieval service. */
export interface Retriever {
  retrieve(query: string, topK: number): Promise<RetrievedFragment[]>;
}

export const FragmentSchema = z.object({
  text: z.string().min(1),
  source: z.string(),
  fragment_id: z.union([z.string(), z.number()]).transform(String)
});

export const FragmentFileSchema = z.object({
  fragments: z.array(FragmentSchema)
});

export type StoredFragment = z.infer<typeof FragmentSchema>;

export function loadFragmentsFile(path: string): StoredFragment[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return FragmentFileSchema.parse(raw).fragments;
}

function terms(text: string): Set<string> {
  return new Set(
    text
      .toLowerCase()
      .split(/[^\p{L}\p{N}]+/u)
      .filter((t) => t.length > 2)
  );
}

/**
 * In-process retriever over a fixed fragment list. Scores are the share of
 * query terms found in the fragment; fragments under `scoreThreshold` are
 * dropped, mirroring the upstream relevance filter.
 */
export function createStaticRetriever(
  fragments: readonly StoredFragment[],
  options: { scoreThreshold?: number } = {}
): Retriever {
  const threshold = options.scoreThreshold ?? 0.1;
  const indexed = fragments.map((fragment) => ({ fragment, terms: terms(fragment.text) }));

  return {
    async retrieve(query: string, topK: number) {
      const queryTerms = [...terms(query)];
      if (queryTerms.length === 0) return [];
      return indexed
        .map(({ fragment, terms: fragmentTerms }) => ({
          ...fragment,
          score: queryTerms.filter((t) => fragmentTerms.has(t)).length / queryTerms.length
        }))
        .filter((f) => f.score >= threshold)
        .sort((a, b) => b.score - a.score)
        .slice(0, topK);
    }
  };
}
