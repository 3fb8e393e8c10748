import { Response } from "express";
import { z, ZodTypeAny } from "zod";

/** Parses `input`, or answers 422 and returns null. */
export function validateInput<T extends ZodTypeAny>(schema: T, input: unknown, res: Response): z.infer<T> | null {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    res.status(422).json({ error: "validation_failed", details: parsed.error.flatten() });
    return null;
  }
  return parsed.data;
}
