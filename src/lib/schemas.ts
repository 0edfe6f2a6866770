/* ──────────────────────────────────────────────────────────────────────────
   src/lib/schemas.ts
   --------------------------------------------------------------------------
   Expected shape of every model response, one zod schema per query.
     • required fields fail validation when missing or mistyped
     • optional text comes back as null, optional lists as []
     • numeric strings ("27.9", "1,200") are coerced where a number is declared
   Field order here is the order fields appear in the JSON output.
   ------------------------------------------------------------------------ */

import { z } from "zod";

/*──────────────────────── PRIMITIVES ───────────────────────*/
const NUMERIC_STRING = /^[-+]?(\d{1,3}(,\d{3})+|\d+)(\.\d+)?$/;

/** "1,200.5" → 1200.5; anything else is handed to zod untouched. */
export const coerceNumericString = (value: unknown): unknown => {
  if (typeof value !== "string") return value;
  const trimmed = value.trim();
  return NUMERIC_STRING.test(trimmed) ? Number(trimmed.replace(/,/g, "")) : value;
};

const numeric = () => z.preprocess(coerceNumericString, z.number());

const score = () =>
  z.preprocess(coerceNumericString, z.number().min(0).max(100)).transform((n) => Math.round(n));

const optionalText = () =>
  z.string().nullish().transform((v) => (v === undefined || v === null || v.trim() === "" ? null : v));

const optionalNumber = () =>
  z.preprocess(coerceNumericString, z.number().nullish()).transform((v) => v ?? null);

const optionalYear = () =>
  z.preprocess(coerceNumericString, z.number().int().nullish()).transform((v) => v ?? null);

const textList = () => z.array(z.string()).default([]);

/** "PE Investment" → "pe_investment" before the enum check. */
const enumToken = (value: unknown): unknown =>
  typeof value === "string" ? value.trim().toLowerCase().replace(/[\s-]+/g, "_") : value;

/*──────────────────────── DISCOVERY ────────────────────────*/
export const SOURCE_TYPES = [
  "youtube",
  "podcast",
  "press_release",
  "interview",
  "news",
  "sec_filing",
  "conference",
  "article",
] as const;

export const strategicStatementSchema = z.object({
  quote           : z.string().min(1),
  speaker         : optionalText(),
  speaker_title   : optionalText(),
  source_name     : optionalText(),
  source_type     : optionalText(),
  source_url      : optionalText(),
  date            : optionalText(),
  strategic_themes: textList(),
  relevance_score : score(),
  outreach_angle  : optionalText(),
});

export const executiveSchema = z.object({
  name          : z.string().min(1),
  title         : optionalText(),
  notable_quotes: textList(),
});

export const OWNERSHIP_CHANGE_TYPES = [
  "acquisition",
  "merger",
  "pe_investment",
  "vc_funding",
  "ipo",
  "spin_off",
] as const;

export const ownershipChangeSchema = z.object({
  date               : optionalText(),
  type               : z.preprocess(enumToken, z.enum(OWNERSHIP_CHANGE_TYPES)),
  counterparty_name  : optionalText(),
  counterparty_domain: optionalText(),
  amount             : optionalText(),
  details            : optionalText(),
});

export const discoveryResponseSchema = z.object({
  company_name        : optionalText(),
  domain              : optionalText(),
  strategic_statements: z.array(strategicStatementSchema),
  company_priorities  : z.array(z.string()),
  key_executives      : z.array(executiveSchema),
  ownership_changes   : z.array(ownershipChangeSchema),
  company_context     : optionalText(),
  collection_notes    : optionalText(),
});

/*──────────────────────── ACQUIRER ─────────────────────────*/
export const acquirerIntelSchema = z.object({
  acquirer_name              : optionalText(),
  acquirer_domain            : optionalText(),
  philosophy                 : z.string(),
  other_acquisitions         : z.array(z.object({
    name   : z.string().min(1),
    date   : optionalText(),
    details: optionalText(),
  })),
  key_executives             : z.array(executiveSchema).default([]),
  post_acquisition_statements: z.array(z.object({
    statement: z.string(),
    speaker  : optionalText(),
    date     : optionalText(),
  })).default([]),
  recent_developments        : z.array(z.object({
    date     : optionalText(),
    headline : z.string(),
    relevance: optionalText(),
  })).default([]),
  strategic_priorities       : textList(),
  outreach_implications      : optionalText(),
});

/*──────────────────────── REVENUE ──────────────────────────*/
export const OWNERSHIP_TYPES = [
  "public",
  "private",
  "subsidiary_public",
  "subsidiary_private",
  "unknown",
] as const;

export const revenueEstimateSchema = z.object({
  amount_millions  : numeric(),
  amount_display   : optionalText(),
  source_name      : z.string().min(1),
  source_url       : optionalText(),
  source_tier      : optionalNumber(),
  credibility_score: optionalNumber(),
  year             : optionalYear(),
  notes            : optionalText(),
});

export const revenueResponseSchema = z.object({
  company_name     : optionalText(),
  domain           : optionalText(),
  revenue_estimates: z.array(revenueEstimateSchema),
  employee_count   : z.object({
    count : optionalNumber(),
    source: optionalText(),
    year  : optionalYear(),
  }).nullish().transform((v) => v ?? null),
  ownership        : z.object({
    type               : z.preprocess(enumToken, z.enum(OWNERSHIP_TYPES)).catch("unknown"),
    parent_company_name: optionalText(),
    parent_ticker      : optionalText(),
  }).default({ type: "unknown" }),
  company_context  : optionalText(),
  research_quality : z.object({
    sources_found     : optionalNumber(),
    highest_tier_found: optionalNumber(),
    red_flags         : textList(),
  }).default({}),
});

/*──────────────────────── DEEP ANALYSIS ────────────────────*/
export const videoAnalysisSchema = z.object({
  executives_found: z.array(z.object({
    name      : z.string().min(1),
    title     : optionalText(),
    key_quotes: textList(),
  })),
  strategic_insights: z.array(z.object({
    topic     : z.string(),
    detail    : z.string(),
    confidence: optionalText(),
  })),
  business_events: z.array(z.object({
    event : z.string(),
    detail: optionalText(),
    date  : optionalText(),
  })).default([]),
  pain_points    : textList(),
  outreach_angles: z.array(z.object({
    angle   : z.string(),
    evidence: optionalText(),
  })).default([]),
  video_summary  : optionalText(),
});

export const articleAnalysisSchema = z.object({
  headline_summary : optionalText(),
  key_announcements: textList(),
  executive_quotes : z.array(z.object({
    speaker: optionalText(),
    title  : optionalText(),
    quote  : z.string().min(1),
  })),
  metrics_mentioned: z.array(z.object({
    metric : z.string(),
    value  : z.string(),
    context: optionalText(),
  })).default([]),
  strategic_implications: textList(),
  relevance_score  : score().nullish().transform((v) => v ?? null),
});

/**
 * A discovery report read back from disk as deep-analysis input. Lenient:
 * only the fields source selection needs, and a statement without a usable
 * relevance score counts as 0.
 */
export const discoveryInputSchema = z.object({
  company_name        : optionalText(),
  domain              : optionalText(),
  strategic_statements: z.array(z.object({
    quote          : optionalText(),
    source_name    : optionalText(),
    source_type    : z.preprocess(enumToken, z.string().nullish()).transform((v) => v ?? null),
    source_url     : optionalText(),
    relevance_score: z.preprocess(coerceNumericString, z.number()).catch(0),
  })).default([]),
});

/*──────────────────────── TYPES ────────────────────────────*/
export type StrategicStatement = z.infer<typeof strategicStatementSchema>;
export type Executive          = z.infer<typeof executiveSchema>;
export type OwnershipChange    = z.infer<typeof ownershipChangeSchema>;
export type DiscoveryResponse  = z.infer<typeof discoveryResponseSchema>;
export type AcquirerIntel      = z.infer<typeof acquirerIntelSchema>;
export type RevenueEstimateRaw = z.infer<typeof revenueEstimateSchema>;
export type RevenueResponse    = z.infer<typeof revenueResponseSchema>;
export type VideoAnalysis      = z.infer<typeof videoAnalysisSchema>;
export type ArticleAnalysis    = z.infer<typeof articleAnalysisSchema>;
export type DiscoveryInput     = z.infer<typeof discoveryInputSchema>;
