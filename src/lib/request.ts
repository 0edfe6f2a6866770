import { z } from "zod";
import { InvalidInputError } from "./errors.js";

export const RESEARCH_MODES = ["discovery", "revenue", "deep_analysis"] as const;
export type ResearchMode = (typeof RESEARCH_MODES)[number];

export interface ResearchRequestFor<M extends ResearchMode> {
  readonly domain      : string;
  readonly company_name: string;
  readonly mode        : M;
}

/** One member per mode, so checking `mode` narrows the request. */
export type ResearchRequest = { [M in ResearchMode]: ResearchRequestFor<M> }[ResearchMode];

/*────────────────────── INPUT SCHEMA ───────────────────*/
const researchRequestInputSchema = z.object({
  domain      : z.string().trim().min(3).refine((v) => /\./.test(v), "domain needs a dot"),
  company_name: z.string().trim().min(1).optional(),
  mode        : z.enum(RESEARCH_MODES),
});

/** "https://www.Acme.com/" → "acme.com" */
export const normalizeDomain = (raw: string): string =>
  raw
    .trim()
    .toLowerCase()
    .replace(/^https?:\/\//, "")
    .replace(/^www\./, "")
    .replace(/\/+$/, "");

/** "acme-tools.com" → "Acme-tools" */
export const companyNameFromDomain = (domain: string): string => {
  const label = domain.split(".")[0] ?? domain;
  return label.charAt(0).toUpperCase() + label.slice(1);
};

export function createResearchRequest(raw: unknown): ResearchRequest {
  const parsed = researchRequestInputSchema.safeParse(
    typeof raw === "object" && raw !== null && "domain" in raw && typeof raw.domain === "string"
      ? { ...raw, domain: normalizeDomain(raw.domain) }
      : raw,
  );
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw new InvalidInputError(`Invalid research request (${fields.join("; ")})`);
  }

  const { domain, company_name, mode } = parsed.data;
  return Object.freeze({
    domain,
    company_name: company_name ?? companyNameFromDomain(domain),
    mode,
  });
}
