import { z } from "zod";

export const LOG_LEVELS = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
] as const;

export const ConfigSchema = z.object({
  GEOCHECK_RULES_PATH: z
    .string()
    .min(1)
    .default("./data/rules/compliance_rules.json"),
  GEOCHECK_SNIPPETS_PATH: z
    .string()
    .min(1)
    .default("./data/policy_snippets.json"),
  GEOCHECK_ARTIFACTS_DIR: z.string().min(1).default("./artifacts"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),

  // Reasoning collaborator
  GEMINI_API_KEY: z.string().optional(),
  GOOGLE_API_KEY: z.string().optional(),
  GEMINI_MODEL: z.string().min(1).default("gemini-1.5-pro"),
  GEMINI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.2),
  REASONING_TIMEOUT_MS: z.coerce.number().int().min(1).default(30000),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if a variable is present but invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

/**
 * The collaborator key, preferring GEMINI_API_KEY. Empty strings count as unset.
 */
export function reasoningApiKey(config: AppConfig): string | undefined {
  const key = config.GEMINI_API_KEY || config.GOOGLE_API_KEY;
  return key ? key : undefined;
}
