import { z } from 'zod';

const VECTOR_SCHEMA = z.array(z.number()).min(1);

/*
 * Embedding responses arrive in several shapes depending on SDK version and
 * endpoint: a bare vector, `{ values }`, `{ embedding: { values } }` or the
 * batch form `{ embeddings: [{ values }] }`. All normalize to number[].
 */
export const EMBEDDING_RESPONSE_SCHEMA = z.union([
  VECTOR_SCHEMA,
  z.object({ values: VECTOR_SCHEMA }).transform((r) => r.values),
  z.object({ embedding: z.object({ values: VECTOR_SCHEMA }) }).transform((r) => r.embedding.values),
  z
    .object({ embeddings: z.array(z.object({ values: VECTOR_SCHEMA })).nonempty() })
    .transform((r) => r.embeddings[0].values),
]);
