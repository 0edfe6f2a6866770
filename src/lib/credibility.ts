/* ──────────────────────────────────────────────────────────────────────────
   src/lib/credibility.ts
   --------------------------------------------------------------------------
   Source credibility for revenue estimates.
     • tierFor()         – named source → tier 1..4 (unknown → 3)
     • credibilityFor()  – tier → midpoint of its credibility band
     • deriveConfidence() – set of estimates → HIGH … INSUFFICIENT
     • assessConfidence() – deriveConfidence + red-flag downgrades
   ------------------------------------------------------------------------ */

import type { RevenueEstimateRaw } from "./schemas.js";

/*──────────────────────── TYPES ──────────────────────────*/
export type SourceTier = 1 | 2 | 3 | 4;

export type ConfidenceLevel = "HIGH" | "MODERATE_HIGH" | "MODERATE" | "LOW" | "INSUFFICIENT";

export const CONFIDENCE_LEVELS: readonly ConfidenceLevel[] = [
  "INSUFFICIENT",
  "LOW",
  "MODERATE",
  "MODERATE_HIGH",
  "HIGH",
];

export interface RevenueEstimate {
  amount_millions  : number;
  amount_display   : string | null;
  source_name      : string;
  source_url       : string | null;
  source_tier      : SourceTier;
  credibility_score: number;
  year             : number | null;
  notes            : string | null;
}

/*──────────────────────── TABLES ─────────────────────────*/
export const CREDIBILITY_BANDS: Record<SourceTier, { min: number; max: number }> = {
  1: { min: 90, max: 100 },
  2: { min: 70, max: 89 },
  3: { min: 50, max: 69 },
  4: { min: 30, max: 49 },
};

const TIER_MIDPOINTS: Record<SourceTier, number> = { 1: 95, 2: 80, 3: 60, 4: 40 };

/**
 * Keyword table matched against the lowercased source name and URL. Checked
 * top to bottom; the first hit decides the tier.
 */
export const SOURCE_TIER_TABLE: ReadonlyArray<{ keyword: string; tier: SourceTier }> = [
  // filings and audited numbers
  { keyword: "sec.gov",              tier: 1 },
  { keyword: "edgar",                tier: 1 },
  { keyword: "10-k",                 tier: 1 },
  { keyword: "10-q",                 tier: 1 },
  { keyword: "annual report",        tier: 1 },
  { keyword: "audited",              tier: 1 },
  { keyword: "investor relations",   tier: 1 },
  { keyword: "earnings release",     tier: 1 },
  // executives, analysts, announced rounds
  { keyword: "ceo interview",        tier: 2 },
  { keyword: "cfo interview",        tier: 2 },
  { keyword: "earnings call",        tier: 2 },
  { keyword: "analyst report",       tier: 2 },
  { keyword: "pitchbook",            tier: 2 },
  { keyword: "crunchbase",           tier: 2 },
  { keyword: "businesswire",         tier: 2 },
  { keyword: "prnewswire",           tier: 2 },
  { keyword: "globenewswire",        tier: 2 },
  { keyword: "inc. 5000",            tier: 2 },
  // trade and financial press
  { keyword: "reuters",              tier: 3 },
  { keyword: "bloomberg",            tier: 3 },
  { keyword: "wsj",                  tier: 3 },
  { keyword: "wall street journal",  tier: 3 },
  { keyword: "forbes",               tier: 3 },
  { keyword: "bizjournals",          tier: 3 },
  { keyword: "business journal",     tier: 3 },
  { keyword: "techcrunch",           tier: 3 },
  { keyword: "trade journal",        tier: 3 },
  { keyword: "cnbc",                 tier: 3 },
  // data aggregators
  { keyword: "growjo",               tier: 4 },
  { keyword: "rocketreach",          tier: 4 },
  { keyword: "zoominfo",             tier: 4 },
  { keyword: "owler",                tier: 4 },
  { keyword: "leadiq",               tier: 4 },
  { keyword: "zippia",               tier: 4 },
  { keyword: "dnb.com",              tier: 4 },
  { keyword: "dun & bradstreet",     tier: 4 },
  { keyword: "apollo.io",            tier: 4 },
];

export const DEFAULT_TIER: SourceTier = 3;

/*──────────────────────── HELPERS ────────────────────────*/
const isTier = (n: number | null | undefined): n is SourceTier =>
  n === 1 || n === 2 || n === 3 || n === 4;

/** Table tier for a source, or null when no keyword matches. */
export function matchSourceTier(sourceName: string, sourceUrl?: string | null): SourceTier | null {
  const haystack = `${sourceName} ${sourceUrl ?? ""}`.toLowerCase();
  const hit = SOURCE_TIER_TABLE.find((entry) => haystack.includes(entry.keyword));
  return hit ? hit.tier : null;
}

export const tierFor = (sourceName: string, sourceUrl?: string | null): SourceTier =>
  matchSourceTier(sourceName, sourceUrl) ?? DEFAULT_TIER;

export const credibilityFor = (tier: SourceTier): number => TIER_MIDPOINTS[tier];

export const withinBand = (score: number, tier: SourceTier): boolean =>
  score >= CREDIBILITY_BANDS[tier].min && score <= CREDIBILITY_BANDS[tier].max;

/**
 * Brings a model-reported estimate in line with the tier table. A table hit
 * overrides the model's tier; a credibility score outside the tier's band is
 * replaced by the band midpoint.
 */
export function normalizeEstimate(raw: RevenueEstimateRaw): RevenueEstimate {
  const reportedTier = raw.source_tier === null ? null : Math.round(raw.source_tier);
  const tier = matchSourceTier(raw.source_name, raw.source_url)
    ?? (isTier(reportedTier) ? reportedTier : DEFAULT_TIER);

  const reportedScore = raw.credibility_score === null ? null : Math.round(raw.credibility_score);
  const credibility = reportedScore !== null && withinBand(reportedScore, tier)
    ? reportedScore
    : credibilityFor(tier);

  return {
    amount_millions  : raw.amount_millions,
    amount_display   : raw.amount_display ?? formatMillions(raw.amount_millions),
    source_name      : raw.source_name,
    source_url       : raw.source_url,
    source_tier      : tier,
    credibility_score: credibility,
    year             : raw.year,
    notes            : raw.notes,
  };
}

export const formatMillions = (amount: number): string =>
  amount >= 1000 ? `$${+(amount / 1000).toFixed(2)}B` : `$${+amount.toFixed(1)}M`;

/*──────────────────────── VARIANCE ───────────────────────*/
/** (max − min) / max over positive amounts; 0 for fewer than two. */
export function spread(amounts: number[]): number {
  const positive = amounts.filter((a) => a > 0);
  if (positive.length < 2) return 0;
  const max = Math.max(...positive);
  const min = Math.min(...positive);
  return (max - min) / max;
}

/**
 * Amounts the variance check compares. With several years present, only the
 * most recent year holding two or more estimates is compared; when no year
 * has two, every estimate is one pool.
 */
export function varianceSample(estimates: Pick<RevenueEstimate, "amount_millions" | "year">[]): number[] {
  const byYear = new Map<number, number[]>();
  for (const e of estimates) {
    if (e.year === null) continue;
    const bucket = byYear.get(e.year) ?? [];
    bucket.push(e.amount_millions);
    byYear.set(e.year, bucket);
  }

  if (byYear.size > 1) {
    const years = [...byYear.keys()].sort((a, b) => b - a);
    for (const year of years) {
      const bucket = byYear.get(year) ?? [];
      if (bucket.length >= 2) return bucket;
    }
  }
  return estimates.map((e) => e.amount_millions);
}

/*──────────────────────── CONFIDENCE ─────────────────────*/
type ScoredEstimate = Pick<RevenueEstimate, "amount_millions" | "credibility_score" | "year">;

/** Only positive amounts count as estimates; a zero placeholder is no source. */
export function deriveConfidence(estimates: ScoredEstimate[]): ConfidenceLevel {
  const usable = estimates.filter((e) => e.amount_millions > 0);
  if (usable.length === 0) return "INSUFFICIENT";

  const best = Math.max(...usable.map((e) => e.credibility_score));
  const count = usable.length;
  const variance = spread(varianceSample(usable));

  if (best >= 80 && count >= 2 && variance <= 0.2) return "HIGH";
  if (best >= 70 && count >= 2 && variance <= 0.4) return "MODERATE_HIGH";
  if (best >= 50 && count >= 2) return "MODERATE";
  return "LOW";
}

const HIGH_VARIANCE_RATIO = 3;
const STALE_AFTER_YEARS = 3;

/** Red flags implied by the estimates themselves, independent of what the model reported. */
export function detectRedFlags(estimates: RevenueEstimate[], referenceYear: number): string[] {
  const flags: string[] = [];
  if (estimates.length === 0) return flags;

  if (estimates.every((e) => e.source_tier === 4)) flags.push("all_aggregators");
  if (estimates.length === 1) flags.push("single_source");

  const amounts = estimates.map((e) => e.amount_millions).filter((a) => a > 0);
  if (amounts.length >= 2 && Math.max(...amounts) > HIGH_VARIANCE_RATIO * Math.min(...amounts)) {
    flags.push("high_variance");
  }

  const years = estimates.map((e) => e.year).filter((y): y is number => y !== null);
  if (years.length > 0 && referenceYear - Math.max(...years) > STALE_AFTER_YEARS) {
    flags.push("stale_data");
  }
  return flags;
}

export interface ConfidenceAssessment {
  level    : ConfidenceLevel;
  base     : ConfidenceLevel;
  red_flags: string[];
}

/**
 * deriveConfidence() with the red-flag downgrades applied: high_variance caps
 * at MODERATE, stale_data drops one level but never below LOW.
 */
export function assessConfidence(
  estimates: RevenueEstimate[],
  reportedFlags: string[],
  referenceYear: number,
): ConfidenceAssessment {
  const base = deriveConfidence(estimates);
  const redFlags = [...new Set([...reportedFlags, ...detectRedFlags(estimates, referenceYear)])];

  let level = base;
  if (redFlags.includes("high_variance") && (level === "HIGH" || level === "MODERATE_HIGH")) {
    level = "MODERATE";
  }
  if (redFlags.includes("stale_data") && level !== "INSUFFICIENT" && level !== "LOW") {
    level = CONFIDENCE_LEVELS[CONFIDENCE_LEVELS.indexOf(level) - 1] ?? level;
  }

  return { level, base, red_flags: redFlags };
}

/** Highest-credibility estimate; the first one wins a tie. */
export function pickBestEstimate(estimates: RevenueEstimate[]): RevenueEstimate | null {
  return estimates.reduce<RevenueEstimate | null>(
    (best, e) => (best === null || e.credibility_score > best.credibility_score ? e : best),
    null,
  );
}
