/* ──────────────────────────────────────────────────────────────────────────
   src/lib/queryBuilder.ts
   --------------------------------------------------------------------------
   Prompt + schema for every call the pipeline makes:
     • discovery        – statements, executives, priorities, ownership
     • revenue          – sourced revenue estimates
     • video / article  – deep analysis of one source
     • acquirer         – follow-up on a detected acquirer
   No I/O here; each builder is a pure template fill.
   ------------------------------------------------------------------------ */

import type { z } from "zod";
import {
  OWNERSHIP_CHANGE_TYPES,
  SOURCE_TYPES,
  acquirerIntelSchema,
  articleAnalysisSchema,
  discoveryResponseSchema,
  revenueResponseSchema,
  videoAnalysisSchema,
  type AcquirerIntel,
  type ArticleAnalysis,
  type DiscoveryResponse,
  type OwnershipChange,
  type RevenueResponse,
  type VideoAnalysis,
} from "./schemas.js";
import type { ResearchRequest, ResearchRequestFor } from "./request.js";

export interface ResearchQuery<T> {
  label           : string;
  instructions?   : string;
  prompt          : string;
  schema          : z.ZodType<T, z.ZodTypeDef, unknown>;
  grounding       : boolean;
  maxOutputTokens?: number;
}

/*──────────────────────── CONSTANTS ──────────────────────*/
export const STRATEGIC_THEMES = [
  "mobile_commerce",
  "customer_experience",
  "digital_transformation",
  "site_performance",
  "ecommerce_platform",
  "international_expansion",
  "personalization",
  "conversion_optimization",
  "technology_modernization",
  "headless_commerce",
  "omnichannel",
  "sustainability",
  "ai_ml_adoption",
] as const;

const MAX_TOKENS_VIDEO_ANALYSIS   = 4000;
const MAX_TOKENS_ARTICLE_ANALYSIS = 2000;
const MAX_PAGE_CHARS_IN_PROMPT    = 12_000;

const JSON_ONLY = "Return ONLY the JSON object: no markdown fences, no commentary.";

/*──────────────────────── DISCOVERY ──────────────────────*/
export function buildDiscoveryQuery(request: ResearchRequest): ResearchQuery<DiscoveryResponse> {
  const { company_name, domain } = request;
  const prompt = `Search for public statements, interviews and media appearances by or about ${company_name} (${domain}).

Work through these sources, most valuable first:
1. YouTube: the company channel, executive interviews, product demos, webinars
2. Podcast appearances by executives or founders
3. Press releases and company announcements
4. Executive interviews in trade or business media
5. Conference talks, keynotes and panels
6. Partnership and product announcements
7. SEC filings or annual reports, if the company is public
8. News on strategic moves, funding or growth

Also search for ownership changes: has the company been acquired, merged, or taken
PE/VC investment? Who was the counterparty, when, and what is their website?

For video and podcast content, note the episode or video title and the key quotes.

Strategic themes to tag statements with: ${STRATEGIC_THEMES.join(", ")}

Reply with JSON in exactly this shape:
{
  "company_name": "${company_name}",
  "domain": "${domain}",
  "strategic_statements": [
    {
      "quote": "The exact quote or statement",
      "speaker": "Name if known, otherwise null",
      "speaker_title": "Title if known, otherwise null",
      "source_name": "Publication, podcast or channel",
      "source_type": "${SOURCE_TYPES.join("|")}",
      "source_url": "URL if available",
      "date": "YYYY-MM-DD if known",
      "strategic_themes": ["theme"],
      "relevance_score": 85,
      "outreach_angle": "Why this matters for a B2B outreach conversation"
    }
  ],
  "company_priorities": ["priority"],
  "key_executives": [
    { "name": "Name", "title": "Title", "notable_quotes": ["Their best quote"] }
  ],
  "ownership_changes": [
    {
      "date": "YYYY-MM-DD",
      "type": "${OWNERSHIP_CHANGE_TYPES.join("|")}",
      "counterparty_name": "Acquirer, investor or merged company",
      "counterparty_domain": "Their domain if known",
      "amount": "Deal value if disclosed",
      "details": "One-line description of the transaction"
    }
  ],
  "company_context": "2-3 sentence company summary",
  "collection_notes": "Notes on what could and could not be found"
}

relevance_score is an integer from 0 to 100.
${JSON_ONLY}`;

  return { label: "discovery", prompt, schema: discoveryResponseSchema, grounding: true };
}

/*──────────────────────── ACQUIRER ───────────────────────*/
export function buildAcquirerQuery(
  trigger: OwnershipChange,
  acquiredCompany: string,
): ResearchQuery<AcquirerIntel> {
  const acquirer = trigger.counterparty_name ?? "the acquirer";
  const acquirerDomain = trigger.counterparty_domain ?? "unknown";
  const when = trigger.date ?? "unknown date";

  const prompt = `Search for strategic intelligence about ${acquirer} (${acquirerDomain}).

Focus on:
1. Their acquisition strategy: which other companies have they acquired?
2. Leadership and what they say about growth and acquisition philosophy
3. How they integrate and run acquired companies
4. Public statements about their acquisition of ${acquiredCompany} (${when})
5. News and developments from ${when} to the present

Reply with JSON in exactly this shape:
{
  "acquirer_name": "${acquirer}",
  "acquirer_domain": "${acquirerDomain}",
  "philosophy": "Their stated approach to acquisitions",
  "other_acquisitions": [
    { "name": "Company", "date": "YYYY-MM-DD", "details": "One line" }
  ],
  "key_executives": [
    { "name": "Name", "title": "Title", "notable_quotes": ["Quote about strategy"] }
  ],
  "post_acquisition_statements": [
    { "statement": "Quote about ${acquiredCompany}", "speaker": "Name", "date": "YYYY-MM-DD" }
  ],
  "recent_developments": [
    { "date": "YYYY-MM-DD", "headline": "What happened", "relevance": "Why it matters" }
  ],
  "strategic_priorities": ["priority"],
  "outreach_implications": "How this changes outreach to ${acquiredCompany}"
}

${JSON_ONLY}`;

  return { label: `acquirer:${acquirer}`, prompt, schema: acquirerIntelSchema, grounding: true };
}

/*──────────────────────── REVENUE ────────────────────────*/
const REVENUE_INSTRUCTIONS = `You are a financial research analyst who estimates revenue for private companies.

Use web search to find the company's most recent annual revenue figures and record every estimate you find.

Rank sources by credibility:
- Tier 1 (90-100): SEC filings, audited financials, official company reports
- Tier 2 (70-89): CEO/CFO interviews, analyst reports, verified funding announcements
- Tier 3 (50-69): industry publications, trade journals, financial news
- Tier 4 (30-49): data aggregators such as Growjo, RocketReach, ZoomInfo, Owler, LeadIQ, Zippia

For each estimate record: amount in millions (number), display form such as "$27.9M",
source name, source URL, tier (1-4), credibility score (0-100) and the year of the figure.

Classify ownership as public, private, subsidiary_public, subsidiary_private or unknown.
For a subsidiary, report the SUBSIDIARY's revenue, never the parent's total.
Report what you find even when sources conflict, and include the employee count if available.

Flag problems with these red_flags: all_aggregators (only tier 4 sources), high_variance
(sources differ by more than 3x), stale_data (newest figure older than 3 years),
parent_revenue_only, single_source.

Reply with JSON in exactly this shape:
{
  "company_name": "string",
  "domain": "string",
  "revenue_estimates": [
    {
      "amount_millions": 27.9,
      "amount_display": "$27.9M",
      "source_name": "Growjo",
      "source_url": "https://...",
      "source_tier": 4,
      "credibility_score": 45,
      "year": 2025,
      "notes": ""
    }
  ],
  "employee_count": { "count": 175, "source": "RocketReach", "year": 2025 },
  "ownership": { "type": "private", "parent_company_name": "", "parent_ticker": "" },
  "company_context": "2-3 sentence company summary",
  "research_quality": { "sources_found": 3, "highest_tier_found": 4, "red_flags": [] }
}

${JSON_ONLY}`;

export function buildRevenueQuery(request: ResearchRequest): ResearchQuery<RevenueResponse> {
  return {
    label       : "revenue",
    instructions: REVENUE_INSTRUCTIONS,
    prompt      : `Research annual revenue for: ${request.company_name} (domain: ${request.domain})`,
    schema      : revenueResponseSchema,
    grounding   : true,
  };
}

/*──────────────────────── DEEP ANALYSIS ──────────────────*/
export function buildVideoAnalysisQuery(url: string, companyName: string): ResearchQuery<VideoAnalysis> {
  const prompt = `Analyse this video for strategic business intelligence${companyName ? ` about ${companyName}` : ""}: ${url}

Use web search to find its transcript, description, and coverage of it.

Extract:
1. Executive statements from the CEO, founders or other executives on strategy and priorities,
   future plans and expansion, technology investment, competitive positioning, culture and values
2. Business intelligence: acquisitions, mergers or PE involvement; revenue or growth indicators;
   partnerships; market positioning; challenges and pain points discussed
3. Outreach angles: which pain points or priorities would matter in a B2B outreach conversation?

Reply with JSON in exactly this shape:
{
  "executives_found": [
    { "name": "Name", "title": "Title", "key_quotes": ["quote"] }
  ],
  "strategic_insights": [
    { "topic": "expansion", "detail": "Planning 10 new stores", "confidence": "high" }
  ],
  "business_events": [
    { "event": "PE acquisition", "detail": "Acquired by a PE firm in 2023", "date": "2023" }
  ],
  "pain_points": ["inventory management"],
  "outreach_angles": [
    { "angle": "Their tech stack needs modernizing", "evidence": "Quote about legacy systems" }
  ],
  "video_summary": "2-3 sentence executive summary"
}

${JSON_ONLY}`;

  return {
    label          : `video:${url}`,
    prompt,
    schema         : videoAnalysisSchema,
    grounding      : true,
    maxOutputTokens: MAX_TOKENS_VIDEO_ANALYSIS,
  };
}

export function buildArticleAnalysisQuery(
  url: string,
  companyName: string,
  pageText?: string | null,
): ResearchQuery<ArticleAnalysis> {
  const pageBlock = pageText
    ? `\n\nARTICLE TEXT (fetched from the URL, may be truncated):\n${pageText.slice(0, MAX_PAGE_CHARS_IN_PROMPT)}`
    : "";

  const prompt = `Analyse this news article or press release for strategic business intelligence about ${companyName || "the company it covers"}.

URL: ${url}${pageBlock}

Extract:
1. Key announcements
2. Executive quotes, with attribution
3. Strategic implications
4. Metrics or numbers mentioned
5. Competitive context

Reply with JSON in exactly this shape:
{
  "headline_summary": "One sentence summary",
  "key_announcements": ["announcement"],
  "executive_quotes": [
    { "speaker": "Name", "title": "Title", "quote": "The quote" }
  ],
  "metrics_mentioned": [ { "metric": "revenue", "value": "$50M", "context": "annual" } ],
  "strategic_implications": ["implication"],
  "relevance_score": 85
}

${JSON_ONLY}`;

  return {
    label          : `article:${url}`,
    prompt,
    schema         : articleAnalysisSchema,
    // fetched text stands in for search; without it the model has to look the page up
    grounding      : !pageText,
    maxOutputTokens: MAX_TOKENS_ARTICLE_ANALYSIS,
  };
}

/*──────────────────────── DISPATCH ───────────────────────*/
export type AnalysisTarget =
  | { kind: "video"; url: string }
  | { kind: "article"; url: string; pageText?: string | null };

export function buildQuery(request: ResearchRequestFor<"discovery">): ResearchQuery<DiscoveryResponse>;
export function buildQuery(request: ResearchRequestFor<"revenue">): ResearchQuery<RevenueResponse>;
export function buildQuery(
  request: ResearchRequestFor<"deep_analysis">,
  target: AnalysisTarget,
): ResearchQuery<VideoAnalysis | ArticleAnalysis>;
export function buildQuery(request: ResearchRequest, target?: AnalysisTarget): ResearchQuery<unknown>;
export function buildQuery(request: ResearchRequest, target?: AnalysisTarget): ResearchQuery<unknown> {
  switch (request.mode) {
    case "discovery":
      return buildDiscoveryQuery(request);
    case "revenue":
      return buildRevenueQuery(request);
    case "deep_analysis":
      if (!target) throw new Error("deep_analysis queries need a video or article target");
      return target.kind === "video"
        ? buildVideoAnalysisQuery(target.url, request.company_name)
        : buildArticleAnalysisQuery(target.url, request.company_name, target.pageText);
    default: {
      const unknownRequest: never = request;
      throw new Error(`Unknown research mode: ${JSON.stringify(unknownRequest)}`);
    }
  }
}
