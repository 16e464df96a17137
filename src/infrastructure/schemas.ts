import { z } from "zod";
import type { JsonValue } from "../domain/types.js";

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

export const expectedErrorSchema = z.object({
  code: z.number().int().optional(),
  message: z.string().optional(),
  details: jsonValueSchema.optional(),
}).strict();

export const verbPluginSchema = z.object({
  name: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/, "must be an identifier"),
  description: z.string().optional(),
  requiresMetadata: z.boolean().optional(),
  evaluate: z.custom<(...args: unknown[]) => unknown>((v) => typeof v === "function", "must be a function"),
});
