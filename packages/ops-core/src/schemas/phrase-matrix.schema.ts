import { z } from 'zod';

/**
 * Exact-phrase matrix for the release suite
 */
export const phraseMatrixSchema = z.object({
  shouldHit: z.array(z.string().min(1)).min(1),
  shouldMiss: z.array(z.string().min(1)).min(1)
});

export type PhraseMatrix = z.infer<typeof phraseMatrixSchema>;
