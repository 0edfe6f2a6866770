/* ──────────────────────────────────────────────────────────────────────────
   src/lib/ResearchPipeline.ts
   --------------------------------------------------------------------------
   Research runs, one per mode. Every run walks the RunTracker lifecycle:
     • runDiscovery()    – primary call → optional acquirer follow-up
     • runRevenue()      – primary call → tier normalisation → confidence
     • runDeepAnalysis() – one video / article, or every qualifying source
                           of an earlier discovery report, processed in turn

   Key behaviour:
     • primary failures are fatal and propagate as ResearchError
     • the acquirer follow-up is best-effort: its failure is logged and
       recorded as followup_error, never thrown
     • one model call in flight at a time, no retries
   ------------------------------------------------------------------------ */

import { readFile } from "node:fs/promises";
import { performance } from "node:perf_hooks";
import {
  discoveryInputSchema,
  type AcquirerIntel,
  type ArticleAnalysis,
  type DiscoveryInput,
  type DiscoveryResponse,
  type OwnershipChange,
  type RevenueResponse,
  type StrategicStatement,
  type VideoAnalysis,
} from "./schemas.js";
import {
  assessConfidence,
  normalizeEstimate,
  pickBestEstimate,
  type ConfidenceLevel,
  type RevenueEstimate,
} from "./credibility.js";
import {
  buildAcquirerQuery,
  buildArticleAnalysisQuery,
  buildQuery,
  buildVideoAnalysisQuery,
  type ResearchQuery,
} from "./queryBuilder.js";
import type { ModelUsage, ResearchModel } from "./researchModel.js";
import type { ResearchRequest } from "./request.js";
import { createPageFetcher, type PageFetcher } from "./fetchPage.js";
import { silentProgress, type Progress } from "./progress.js";
import { RunTracker, type RunState } from "./runState.js";
import { validateResponse } from "./validateResponse.js";
import { InvalidInputError, toError } from "./errors.js";
import { log } from "./log.js";

/*──────────────────────── CONSTANTS ──────────────────────*/
export const DEFAULT_RELEVANCE_THRESHOLD = 80;
export const MAX_ARTICLE_SOURCES         = 5;

const ARTICLE_SOURCE_TYPES = new Set(["news", "press_release", "interview", "article"]);
const YOUTUBE_URL          = /^https?:\/\/(www\.|m\.)?(youtube\.com|youtu\.be)\//i;

/*──────────────────────── TYPES ──────────────────────────*/
export interface PipelineDeps {
  model     : ResearchModel;
  progress? : Progress;
  fetchPage?: PageFetcher;
  now?      : () => Date;
}

export interface RunMetadata {
  mode                   : "discovery" | "revenue" | "deep_analysis";
  collected_at           : string;
  domain                 : string | null;
  company_name           : string | null;
  model                  : string | null;
  collection_time_seconds: number;
  run_states             : RunState[];
  model_usage?           : ModelUsage;
}

export interface AcquisitionInfo {
  acquirer_name   : string;
  acquirer_domain : string | null;
  acquisition_date: string | null;
  details         : string | null;
  acquirer_intel? : AcquirerIntel;
  followup_error? : string;
}

export interface DiscoveryResult extends DiscoveryResponse {
  acquisition_info?: AcquisitionInfo;
  _metadata        : RunMetadata;
}

export interface RevenueResult {
  company_name     : string;
  domain           : string;
  revenue_estimates: RevenueEstimate[];
  best_estimate    : RevenueEstimate | null;
  confidence       : ConfidenceLevel;
  employee_count   : RevenueResponse["employee_count"];
  ownership        : RevenueResponse["ownership"];
  company_context  : string | null;
  research_quality : {
    sources_found     : number;
    highest_tier_found: number | null;
    red_flags         : string[];
  };
  _metadata        : RunMetadata & { confidence_before_red_flags: ConfidenceLevel };
}

export interface VideoIntel extends VideoAnalysis {
  url                : string;
  source_name        : string | null;
  original_relevance : number | null;
}

export interface ArticleIntel extends ArticleAnalysis {
  url                : string;
  source_name        : string | null;
  original_relevance : number | null;
  page_fetched       : boolean;
}

export interface SourceError {
  url  : string;
  kind : "video" | "article";
  error: string;
}

export interface DeepAnalysisResult {
  company_name      : string | null;
  domain            : string | null;
  youtube_intel     : VideoIntel[];
  article_intel     : ArticleIntel[];
  executives_found  : VideoAnalysis["executives_found"];
  strategic_insights: VideoAnalysis["strategic_insights"];
  outreach_angles   : VideoAnalysis["outreach_angles"];
  key_quotes        : ArticleAnalysis["executive_quotes"];
  pain_points       : string[];
  source_errors     : SourceError[];
  _metadata         : RunMetadata & { youtube_count: number; article_count: number; threshold: number | null };
}

export type DeepAnalysisTarget =
  | { kind: "video"; url: string }
  | { kind: "article"; url: string }
  | { kind: "discovery"; input: DiscoveryInput; threshold: number };

export interface DeepAnalysisContext {
  company_name?: string | null;
  domain?      : string | null;
}

/*──────────────────────── HELPERS ────────────────────────*/
async function ask<T>(model: ResearchModel, query: ResearchQuery<T>): Promise<T> {
  const raw = await model.generate(query);
  return validateResponse(raw, query.schema, query.label);
}

const elapsedSeconds = (t0: number): number => +((performance.now() - t0) / 1000).toFixed(1);

function metadata(
  mode: RunMetadata["mode"],
  deps: PipelineDeps,
  tracker: RunTracker,
  t0: number,
  subject: { domain: string | null; company_name: string | null },
): RunMetadata {
  const usage = deps.model.usage?.();
  return {
    mode,
    collected_at           : (deps.now ?? (() => new Date()))().toISOString(),
    domain                 : subject.domain,
    company_name           : subject.company_name,
    model                  : usage?.model ?? null,
    collection_time_seconds: elapsedSeconds(t0),
    run_states             : [...tracker.history],
    ...(usage ? { model_usage: usage } : {}),
  };
}

const wrongMode = (expected: string, actual: string): InvalidInputError =>
  new InvalidInputError(`Expected a ${expected} request, got ${actual}`);

/** Descending relevance; equal scores keep their original order. */
export const sortStatements = (statements: StrategicStatement[]): StrategicStatement[] =>
  [...statements].sort((a, b) => b.relevance_score - a.relevance_score);

/** First acquisition with a named acquirer, if any. */
export function findAcquisitionTrigger(changes: OwnershipChange[]): OwnershipChange | null {
  return changes.find((c) => c.type === "acquisition" && (c.counterparty_name ?? "").trim() !== "") ?? null;
}

/*──────────────────────── DISCOVERY ──────────────────────*/
export interface DiscoveryOptions {
  followUp: boolean;
}

export async function runDiscovery(
  request: ResearchRequest,
  deps: PipelineDeps,
  options: DiscoveryOptions = { followUp: true },
): Promise<DiscoveryResult> {
  const progress = deps.progress ?? silentProgress;
  const tracker = new RunTracker();
  const t0 = performance.now();
  const totalSteps = options.followUp ? 2 : 1;

  if (request.mode !== "discovery") throw wrongMode("discovery", request.mode);

  try {
    progress.step(1, totalSteps, "Collecting company intelligence...");
    tracker.apply("send_primary");
    const intel = await ask(deps.model, buildQuery(request));
    tracker.apply("primary_valid");
    progress.detail(`Found ${intel.strategic_statements.length} strategic statements`);
    progress.detail(`Found ${intel.key_executives.length} executives`);

    let acquisitionInfo: AcquisitionInfo | undefined;
    const trigger = options.followUp ? findAcquisitionTrigger(intel.ownership_changes) : null;

    if (options.followUp) progress.step(2, totalSteps, "Checking for acquisitions...");

    if (trigger && trigger.counterparty_name) {
      const acquirerName = trigger.counterparty_name;
      progress.detail(`Acquisition detected: ${request.company_name} acquired by ${acquirerName} (${trigger.date ?? "date unknown"})`);
      progress.detail("Running follow-up research on the acquirer...");

      acquisitionInfo = {
        acquirer_name   : acquirerName,
        acquirer_domain : trigger.counterparty_domain,
        acquisition_date: trigger.date,
        details         : trigger.details,
      };

      tracker.apply("send_followup");
      try {
        acquisitionInfo.acquirer_intel = await ask(deps.model, buildAcquirerQuery(trigger, request.company_name));
        progress.detail(`Acquirer executives: ${acquisitionInfo.acquirer_intel.key_executives.length}`);
        progress.detail(`Other acquisitions: ${acquisitionInfo.acquirer_intel.other_acquisitions.length}`);
      } catch (e: unknown) {
        const err = toError(e);
        log.warn(`[Pipeline] acquirer follow-up for ${acquirerName} failed: ${err.message}`);
        acquisitionInfo.followup_error = err.message;
      }
      tracker.apply("followup_settled");
    } else {
      if (options.followUp) progress.detail("No acquisitions detected");
      tracker.apply("assemble");
    }

    const result: DiscoveryResult = {
      ...intel,
      company_name        : intel.company_name ?? request.company_name,
      domain              : intel.domain ?? request.domain,
      strategic_statements: sortStatements(intel.strategic_statements),
      ...(acquisitionInfo ? { acquisition_info: acquisitionInfo } : {}),
      _metadata           : metadata("discovery", deps, tracker, t0, request),
    };
    tracker.apply("finish");
    result._metadata.run_states = [...tracker.history];
    return result;
  } catch (e: unknown) {
    tracker.fail();
    throw e;
  }
}

/*──────────────────────── REVENUE ────────────────────────*/
export async function runRevenue(request: ResearchRequest, deps: PipelineDeps): Promise<RevenueResult> {
  const progress = deps.progress ?? silentProgress;
  const tracker = new RunTracker();
  const t0 = performance.now();
  const now = (deps.now ?? (() => new Date()))();

  if (request.mode !== "revenue") throw wrongMode("revenue", request.mode);

  try {
    progress.step(1, 2, "Researching revenue...");
    tracker.apply("send_primary");
    const data = await ask(deps.model, buildQuery(request));
    tracker.apply("primary_valid");
    progress.detail(`Found ${data.revenue_estimates.length} revenue estimates`);

    progress.step(2, 2, "Calculating confidence...");
    tracker.apply("assemble");
    const estimates = data.revenue_estimates
      .map(normalizeEstimate)
      .sort((a, b) => b.credibility_score - a.credibility_score);
    const assessment = assessConfidence(estimates, data.research_quality.red_flags, now.getFullYear());
    progress.detail(`Confidence: ${assessment.level}`);

    const tiers = estimates.map((e) => e.source_tier);
    const result: RevenueResult = {
      company_name     : data.company_name ?? request.company_name,
      domain           : data.domain ?? request.domain,
      revenue_estimates: estimates,
      best_estimate    : pickBestEstimate(estimates),
      confidence       : assessment.level,
      employee_count   : data.employee_count,
      ownership        : data.ownership,
      company_context  : data.company_context,
      research_quality : {
        sources_found     : estimates.length,
        highest_tier_found: tiers.length > 0 ? Math.min(...tiers) : data.research_quality.highest_tier_found,
        red_flags         : assessment.red_flags,
      },
      _metadata        : {
        ...metadata("revenue", deps, tracker, t0, request),
        confidence_before_red_flags: assessment.base,
      },
    };
    tracker.apply("finish");
    result._metadata.run_states = [...tracker.history];
    return result;
  } catch (e: unknown) {
    tracker.fail();
    throw e;
  }
}

/*──────────────────────── DEEP ANALYSIS ──────────────────*/
interface SourceRef {
  url        : string;
  relevance  : number | null;
  source_name: string | null;
}

export interface SelectedSource extends SourceRef {
  kind     : "video" | "article";
  relevance: number;
}

export const isYouTubeUrl = (url: string): boolean => YOUTUBE_URL.test(url);

/**
 * Statements at or above the threshold that carry a URL, split into videos
 * and articles. Each URL is taken once; articles are capped.
 */
export function selectSources(
  input: DiscoveryInput,
  threshold: number,
): { videos: SelectedSource[]; articles: SelectedSource[] } {
  const seen = new Set<string>();
  const videos: SelectedSource[] = [];
  const articles: SelectedSource[] = [];

  for (const st of input.strategic_statements) {
    const url = st.source_url?.trim();
    if (!url || st.relevance_score < threshold || seen.has(url)) continue;

    const base = { url, relevance: st.relevance_score, source_name: st.source_name };
    if (st.source_type === "youtube" || isYouTubeUrl(url)) {
      seen.add(url);
      videos.push({ ...base, kind: "video" });
    } else if (st.source_type !== null && ARTICLE_SOURCE_TYPES.has(st.source_type)) {
      seen.add(url);
      articles.push({ ...base, kind: "article" });
    }
  }
  return { videos, articles: articles.slice(0, MAX_ARTICLE_SOURCES) };
}

/** Reads an earlier discovery report; unreadable or malformed files are InvalidInput. */
export async function loadDiscoveryInput(path: string): Promise<DiscoveryInput> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (e: unknown) {
    throw new InvalidInputError(`Could not read input file ${path}: ${toError(e).message}`, { cause: e });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (e: unknown) {
    throw new InvalidInputError(`Input file ${path} is not valid JSON: ${toError(e).message}`, { cause: e });
  }

  const parsed = discoveryInputSchema.safeParse(json);
  if (!parsed.success) {
    throw new InvalidInputError(`Input file ${path} is not a discovery report`, { cause: parsed.error });
  }
  return parsed.data;
}

/** Pain points deduplicated case-insensitively, first spelling and order kept. */
export function dedupeStrings(values: string[]): string[] {
  const seen = new Set<string>();
  return values.filter((v) => {
    const key = v.trim().toLowerCase();
    if (key === "" || seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function mergeDeepIntel(
  videos: VideoIntel[],
  articles: ArticleIntel[],
): Pick<DeepAnalysisResult, "executives_found" | "strategic_insights" | "outreach_angles" | "key_quotes" | "pain_points"> {
  return {
    executives_found  : videos.flatMap((v) => v.executives_found),
    strategic_insights: videos.flatMap((v) => v.strategic_insights),
    outreach_angles   : videos.flatMap((v) => v.outreach_angles),
    key_quotes        : articles.flatMap((a) => a.executive_quotes),
    pain_points       : dedupeStrings(videos.flatMap((v) => v.pain_points)),
  };
}

async function analyseVideo(
  source: SourceRef,
  companyName: string,
  deps: PipelineDeps,
): Promise<VideoIntel> {
  const analysis = await ask(deps.model, buildVideoAnalysisQuery(source.url, companyName));
  return { url: source.url, source_name: source.source_name, original_relevance: source.relevance, ...analysis };
}

async function analyseArticle(
  source: SourceRef,
  companyName: string,
  deps: PipelineDeps,
): Promise<ArticleIntel> {
  const fetchPage = deps.fetchPage ?? createPageFetcher();
  const pageText = await fetchPage(source.url);
  const analysis = await ask(deps.model, buildArticleAnalysisQuery(source.url, companyName, pageText));
  return {
    url               : source.url,
    source_name       : source.source_name,
    original_relevance: source.relevance,
    page_fetched      : pageText !== null,
    ...analysis,
  };
}

export async function runDeepAnalysis(
  target: DeepAnalysisTarget,
  context: DeepAnalysisContext,
  deps: PipelineDeps,
): Promise<DeepAnalysisResult> {
  const progress = deps.progress ?? silentProgress;
  const tracker = new RunTracker();
  const t0 = performance.now();

  const fromFile = target.kind === "discovery" ? target.input : null;
  const companyName = context.company_name ?? fromFile?.company_name ?? null;
  const domain = context.domain ?? fromFile?.domain ?? null;
  const promptCompany = companyName ?? "";

  const youtube: VideoIntel[] = [];
  const articles: ArticleIntel[] = [];
  const sourceErrors: SourceError[] = [];
  let firstFailure: Error | undefined;

  try {
    tracker.apply("send_primary");

    if (target.kind === "video") {
      progress.step(1, 2, "Processing YouTube video...");
      youtube.push(await analyseVideo({ url: target.url, relevance: null, source_name: null }, promptCompany, deps));
      progress.step(2, 2, "Complete!");
    } else if (target.kind === "article") {
      progress.step(1, 2, "Processing article...");
      articles.push(await analyseArticle({ url: target.url, relevance: null, source_name: null }, promptCompany, deps));
      progress.step(2, 2, "Complete!");
    } else {
      progress.step(1, 4, "Selecting sources from discovery results...");
      const { videos, articles: articleSources } = selectSources(target.input, target.threshold);
      progress.detail(`Found ${videos.length + articleSources.length} sources at or above ${target.threshold} relevance`);
      progress.detail(`YouTube: ${videos.length}, Articles: ${articleSources.length}`);
      if (videos.length + articleSources.length === 0) {
        log.warn(`[Pipeline] no sources at or above relevance ${target.threshold}`);
      }

      progress.step(2, 4, videos.length ? `Deep processing ${videos.length} YouTube sources...` : "No YouTube sources to process");
      for (const src of videos) {
        try {
          youtube.push(await analyseVideo(src, promptCompany, deps));
        } catch (e: unknown) {
          const err = toError(e);
          log.warn(`[Pipeline] video ${src.url} failed: ${err.message}`);
          sourceErrors.push({ url: src.url, kind: "video", error: err.message });
          firstFailure ??= err;
        }
      }

      progress.step(3, 4, articleSources.length ? `Deep processing ${articleSources.length} articles...` : "No articles to process");
      for (const src of articleSources) {
        try {
          articles.push(await analyseArticle(src, promptCompany, deps));
        } catch (e: unknown) {
          const err = toError(e);
          log.warn(`[Pipeline] article ${src.url} failed: ${err.message}`);
          sourceErrors.push({ url: src.url, kind: "article", error: err.message });
          firstFailure ??= err;
        }
      }

      const attempted = videos.length + articleSources.length;
      if (firstFailure && sourceErrors.length === attempted) {
        log.error(`[Pipeline] all ${attempted} sources failed`);
        throw firstFailure;
      }
      progress.step(4, 4, "Merging results...");
    }

    tracker.apply("primary_valid");
    tracker.apply("assemble");

    const result: DeepAnalysisResult = {
      company_name : companyName,
      domain,
      youtube_intel: youtube,
      article_intel: articles,
      ...mergeDeepIntel(youtube, articles),
      source_errors: sourceErrors,
      _metadata    : {
        ...metadata("deep_analysis", deps, tracker, t0, { domain, company_name: companyName }),
        youtube_count: youtube.length,
        article_count: articles.length,
        threshold    : target.kind === "discovery" ? target.threshold : null,
      },
    };
    tracker.apply("finish");
    result._metadata.run_states = [...tracker.history];
    return result;
  } catch (e: unknown) {
    tracker.fail();
    throw e;
  }
}
