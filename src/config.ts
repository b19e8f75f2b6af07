import { z } from "zod";

const flag = (fallback: boolean) =>
  z
    .string()
    .optional()
    .transform(v => (v === undefined || v === "" ? fallback : v !== "0" && v.toLowerCase() !== "false"));

const envSchema = z.object({
  EXPERIMENT_DIR: z.string().min(1).default("./experiments/default"),
  RUN_ID: z.string().optional().transform(v => (v ? v : undefined)),
  QUIET: flag(false),
  LOG_STEPS: flag(true),
  LOG_CACHE: flag(false)
});

export interface Config {
  experimentDir: string;
  runId?: string;
  quiet: boolean;
  logSteps: boolean;
  logCache: boolean;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  const e = parsed.data;
  return {
    experimentDir: e.EXPERIMENT_DIR,
    runId: e.RUN_ID,
    quiet: e.QUIET,
    logSteps: e.LOG_STEPS,
    logCache: e.LOG_CACHE
  };
}
