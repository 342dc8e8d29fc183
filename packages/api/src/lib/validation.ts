import type { z } from "zod";
import { WorkflowError } from "@caseflow/shared";

/** Parses service input, reporting failures as VALIDATION_FAILED. */
export function parseInput<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  input: unknown,
  what: string,
): T {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new WorkflowError(`Invalid ${what}`, "VALIDATION_FAILED", {
      issues: result.error.errors.map((e) => ({ path: e.path.join("."), message: e.message })),
    });
  }
  return result.data;
}
