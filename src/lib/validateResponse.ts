import type { z } from "zod";
import { InvalidResponseSchemaError } from "./errors.js";

/**
 * Pulls the JSON object out of a model reply. Grounded replies often wrap the
 * payload in prose or a markdown fence, so three layers are tried in order:
 * 1. the whole text
 * 2. a ```json fenced block
 * 3. the outermost {...} span
 * Returns undefined when none of them parses.
 */
export function extractJson(raw: string): unknown {
  const text = raw.trim();

  try {
    return JSON.parse(text);
  } catch {
    // continue to the fenced block
  }

  const fenced = text.match(/```(?:json)?\s*\n?([\s\S]*?)\n?\s*```/);
  if (fenced?.[1]) {
    try {
      return JSON.parse(fenced[1]);
    } catch {
      // continue to the outermost object
    }
  }

  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start !== -1 && end > start) {
    try {
      return JSON.parse(text.slice(start, end + 1));
    } catch {
      // nothing parseable
    }
  }

  return undefined;
}

/** "strategic_statements.0.relevance_score", or "$" for the root. */
export const issuePath = (path: (string | number)[]): string =>
  path.length === 0 ? "$" : path.join(".");

/**
 * Parses and validates a model reply against the query's schema. Throws
 * InvalidResponseSchemaError listing every missing or mistyped field.
 */
export function validateResponse<S extends z.ZodTypeAny>(
  raw: string,
  schema: S,
  label: string,
): z.output<S> {
  const payload = extractJson(raw);
  if (payload === undefined || payload === null || typeof payload !== "object" || Array.isArray(payload)) {
    throw new InvalidResponseSchemaError(label, ["$"]);
  }

  const result = schema.safeParse(payload);
  if (!result.success) {
    const fields = [...new Set(result.error.issues.map((issue) => issuePath(issue.path)))];
    throw new InvalidResponseSchemaError(label, fields, { cause: result.error });
  }
  return result.data;
}
