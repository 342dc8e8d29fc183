import { z } from "zod";

export const uuidParam = z.object({
  id: z.string().uuid(),
});

/** Every write to a record names the version it was computed against. */
export const expectedVersion = z.number().int().min(1);

export const booleanQuery = z
  .enum(["true", "false"])
  .transform((v) => v === "true");
