import type { z } from "zod";

/** Validate transformer arguments or fitted state; throws with the issue paths. */
export function parseWith<T extends z.ZodTypeAny>(schema: T, value: unknown, what: string): z.infer<T> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues.map(i => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new Error(`${what}: ${issues}`);
  }
  return result.data;
}
