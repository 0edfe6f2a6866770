import { z } from "zod";
import { InvalidInputError, MissingCredentialError } from "./errors.js";

export const DEFAULT_MODEL = "gpt-4.1-mini";
export const DEFAULT_TIMEOUT_MS = 120_000;

/*────────────────────── ENV SCHEMA ───────────────────*/
const envSchema = z.object({
  OPENAI_API_KEY   : z.string().trim().optional(),
  OPENAI_MODEL     : z.string().trim().min(1).optional(),
  OPENAI_TIMEOUT_MS: z.coerce.number().int().positive().optional(),
});

export interface ResearchConfig {
  apiKey   : string;
  model    : string;
  timeoutMs: number;
}

/**
 * Reads the model credentials from the environment. A missing key is fatal
 * before any call is made.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ResearchConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join("."));
    throw new InvalidInputError(`Invalid environment: ${fields.join(", ")}`);
  }

  const { OPENAI_API_KEY, OPENAI_MODEL, OPENAI_TIMEOUT_MS } = parsed.data;
  if (!OPENAI_API_KEY) throw new MissingCredentialError("OPENAI_API_KEY");

  return {
    apiKey   : OPENAI_API_KEY,
    model    : OPENAI_MODEL ?? DEFAULT_MODEL,
    timeoutMs: OPENAI_TIMEOUT_MS ?? DEFAULT_TIMEOUT_MS,
  };
}
