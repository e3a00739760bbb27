import { z } from "zod";
import { ValidationError } from "../errors.js";

export const createEmbedBodySchema = z.object({
  cypherQuery: z.string({
    required_error: "cypherQuery is required",
    invalid_type_error: "cypherQuery must be a string",
  }),
  // Range checks live in the embed service so the legacy 0 fallback applies.
  expiresInDays: z
    .number({ invalid_type_error: "expiresInDays must be a number" })
    .int("expiresInDays must be an integer")
    .nullish()
    .transform((v) => v ?? undefined),
});

export const proxyQueryBodySchema = z.object({
  cypher: z.string({
    required_error: "cypher is required",
    invalid_type_error: "cypher must be a string",
  }),
  params: z
    .record(z.unknown(), { invalid_type_error: "params must be an object" })
    .nullish()
    .transform((v) => v ?? {}),
});

export type CreateEmbedBody = z.infer<typeof createEmbedBodySchema>;
export type ProxyQueryBody = z.infer<typeof proxyQueryBodySchema>;

export function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.output<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ValidationError(issue ? issue.message : "Invalid request body");
  }
  return parsed.data;
}
