import { z } from 'zod';
import type { JsonValue } from '../types.js';

export const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

export const JsonObjectSchema = z.record(JsonValueSchema);

/** Any item the service returns carries its string key. */
export const BaseRecordSchema = z.object({ key: z.string() }).catchall(JsonValueSchema);

/** PUT /items → 207 */
export const PutResponseSchema = z.object({
  processed: z.object({ items: z.array(BaseRecordSchema) }).optional(),
  failed: z.object({ items: z.array(JsonObjectSchema) }).optional(),
});

/** POST /query → 200 */
export const QueryResponseSchema = z.object({
  paging: z.object({
    size: z.number().int().nonnegative(),
    last: z.string().optional(),
  }),
  items: z.array(BaseRecordSchema),
});

/** Body of 4xx/5xx responses. */
export const ErrorBodySchema = z.object({
  errors: z.array(z.string()),
});
