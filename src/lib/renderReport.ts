/* ──────────────────────────────────────────────────────────────────────────
   src/lib/renderReport.ts
   --------------------------------------------------------------------------
   Plain-text and JSON views of a result bundle
   • renderDiscoveryText()    – overview, executives, ownership, statements
   • renderRevenueText()      – estimates by credibility + recommendation
   • renderDeepAnalysisText() – merged video / article intelligence
   • renderReport()           – both views for whichever mode ran
   ------------------------------------------------------------------------ */

import {
  sortStatements,
  type DeepAnalysisResult,
  type DiscoveryResult,
  type RevenueResult,
} from "./ResearchPipeline.js";

export const MAX_STATEMENTS_IN_TEXT = 10;

const RULE = "=".repeat(70);

/* helpers ----------------------------------------------------------------- */
/** Counts code points, so an emoji is never cut in half. */
export const truncateText = (s: string, n: number): string => {
  const chars = Array.from(s);
  return chars.length <= n ? s : `${chars.slice(0, n - 1).join("")}…`;
};

/** "pe_investment" → "Pe Investment" */
export const titleCase = (token: string): string =>
  token
    .split("_")
    .filter(Boolean)
    .map((w) => w.charAt(0).toUpperCase() + w.slice(1))
    .join(" ");

const header = (title: string, domain: string | null, stamp: string): string[] => [
  RULE,
  title,
  `Domain: ${domain ?? "Unknown"}`,
  `Collected: ${stamp}`,
  RULE,
];

const section = (name: string, count?: number): string =>
  `\n## ${name}${count === undefined ? "" : ` (${count})`}\n`;

/* discovery --------------------------------------------------------------- */
export function renderDiscoveryText(r: DiscoveryResult): string {
  const lines = header(
    `COMPANY INTELLIGENCE REPORT: ${r.company_name ?? r._metadata.company_name ?? "Unknown"}`,
    r.domain,
    r._metadata.collected_at,
  );

  if (r.company_context) {
    lines.push(section("COMPANY OVERVIEW"), r.company_context);
  }

  if (r.key_executives.length) {
    lines.push(section("KEY EXECUTIVES", r.key_executives.length));
    for (const ex of r.key_executives) {
      lines.push(`  • ${ex.name} — ${ex.title ?? "Unknown title"}`);
      const quote = ex.notable_quotes[0];
      if (quote) lines.push(`    "${truncateText(quote, 100)}"`);
    }
  }

  if (r.company_priorities.length) {
    lines.push(section("STRATEGIC PRIORITIES", r.company_priorities.length));
    r.company_priorities.forEach((p, i) => lines.push(`  ${i + 1}. ${p}`));
  }

  if (r.ownership_changes.length) {
    lines.push(section("OWNERSHIP CHANGES", r.ownership_changes.length));
    for (const ch of r.ownership_changes) {
      const amount = ch.amount ? ` (${ch.amount})` : "";
      lines.push(`  • [${ch.date ?? "Unknown date"}] ${titleCase(ch.type)}: ${ch.counterparty_name ?? "Unknown"}${amount}`);
      if (ch.details) lines.push(`    ${truncateText(ch.details, 100)}`);
    }
  }

  const acq = r.acquisition_info;
  if (acq) {
    lines.push(section(`ACQUIRER INTELLIGENCE: ${acq.acquirer_name}`));
    const intel = acq.acquirer_intel;
    if (intel) {
      if (intel.philosophy) lines.push(`  Philosophy: ${truncateText(intel.philosophy, 150)}`);
      if (intel.other_acquisitions.length) {
        lines.push(`\n  Other acquisitions by this company (${intel.other_acquisitions.length}):`);
        for (const oa of intel.other_acquisitions.slice(0, 5)) {
          lines.push(`    • ${oa.name} (${oa.date ?? "Unknown"})`);
        }
      }
      if (intel.key_executives.length) {
        lines.push("\n  Acquirer executives:");
        for (const ex of intel.key_executives.slice(0, 3)) {
          lines.push(`    • ${ex.name} — ${ex.title ?? ""}`);
        }
      }
      if (intel.outreach_implications) {
        lines.push(`\n  Outreach implications: ${intel.outreach_implications}`);
      }
    } else if (acq.followup_error) {
      lines.push(`  Follow-up research failed: ${acq.followup_error}`);
    }
  }

  if (r.strategic_statements.length) {
    lines.push(section("STRATEGIC STATEMENTS", r.strategic_statements.length));
    sortStatements(r.strategic_statements)
      .slice(0, MAX_STATEMENTS_IN_TEXT)
      .forEach((st, i) => {
        const kind = st.source_type ? ` (${st.source_type})` : "";
        lines.push(`  [${i + 1}] Relevance: ${st.relevance_score}/100 | Source: ${st.source_name ?? "Unknown source"}${kind}`);
        if (st.speaker) lines.push(`      Speaker: ${st.speaker}${st.speaker_title ? `, ${st.speaker_title}` : ""}`);
        lines.push(`      "${truncateText(st.quote, 200)}"`);
        if (st.outreach_angle) lines.push(`      → Outreach angle: ${truncateText(st.outreach_angle, 100)}`);
        lines.push("");
      });
  }

  lines.push(
    RULE,
    `Collection completed in ${r._metadata.collection_time_seconds.toFixed(1)} seconds`,
    RULE,
  );
  return lines.join("\n");
}

/* revenue ----------------------------------------------------------------- */
export function renderRevenueText(r: RevenueResult): string {
  const lines = header(`REVENUE ESTIMATE REPORT: ${r.company_name}`, r.domain, r._metadata.collected_at);

  if (r.company_context) {
    lines.push(section("COMPANY OVERVIEW"), r.company_context);
  }

  lines.push(section("OWNERSHIP"), `  Type: ${titleCase(r.ownership.type)}`);
  if (r.ownership.parent_company_name) {
    lines.push(`  Parent: ${r.ownership.parent_company_name}`);
    if (r.ownership.parent_ticker) lines.push(`  Ticker: ${r.ownership.parent_ticker}`);
  }

  if (r.revenue_estimates.length) {
    lines.push(`\n## REVENUE ESTIMATES (${r.revenue_estimates.length} sources)\n`);
    r.revenue_estimates.forEach((e, i) => {
      lines.push(`  [${i + 1}] ${e.amount_display ?? "N/A"} — ${e.source_name}`);
      lines.push(`      Credibility: ${e.credibility_score}/100 (Tier ${e.source_tier})`);
      lines.push(`      Year: ${e.year ?? "Unknown"}`);
      if (e.source_url) lines.push(`      URL: ${truncateText(e.source_url, 60)}`);
      lines.push("");
    });
  } else {
    lines.push(section("REVENUE ESTIMATES"), "  No reliable revenue data found");
  }

  const employees = r.employee_count;
  if (employees && employees.count !== null) {
    const year = employees.year === null ? "" : `, ${employees.year}`;
    lines.push(section("EMPLOYEE COUNT"), `  ${employees.count} employees (${employees.source ?? "Unknown"}${year})`);
  }

  const q = r.research_quality;
  lines.push(
    section("RESEARCH QUALITY"),
    `  Sources found: ${q.sources_found}`,
    `  Highest tier: ${q.highest_tier_found ?? "N/A"}`,
    `  Confidence: ${r.confidence}`,
  );
  if (q.red_flags.length) lines.push(`  Red flags: ${q.red_flags.join(", ")}`);

  lines.push(section("RECOMMENDATION"));
  if (r.best_estimate) {
    lines.push(
      `  Use ${r.best_estimate.amount_display ?? "N/A"} from ${r.best_estimate.source_name}`,
      `  Confidence: ${r.confidence}`,
    );
  } else {
    lines.push("  No reliable data available");
  }

  lines.push(`\n${RULE}`);
  return lines.join("\n");
}

/* deep analysis ----------------------------------------------------------- */
export function renderDeepAnalysisText(r: DeepAnalysisResult): string {
  const lines = header(`DEEP ANALYSIS REPORT: ${r.company_name ?? "Unknown"}`, r.domain, r._metadata.collected_at);

  if (r.executives_found.length) {
    lines.push(section("EXECUTIVES FOUND", r.executives_found.length));
    for (const ex of r.executives_found) {
      lines.push(`  • ${ex.name} — ${ex.title ?? "Unknown"}`);
      for (const q of ex.key_quotes.slice(0, 2)) lines.push(`    "${truncateText(q, 100)}"`);
      lines.push("");
    }
  } else {
    lines.push(section("EXECUTIVES FOUND"), "  No executives identified");
  }

  if (r.strategic_insights.length) {
    lines.push(section("STRATEGIC INSIGHTS", r.strategic_insights.length));
    r.strategic_insights.forEach((ins, i) => {
      lines.push(`  [${i + 1}] ${ins.topic.toUpperCase()} (${ins.confidence ?? "medium"})`, `      ${ins.detail}`, "");
    });
  } else {
    lines.push(section("STRATEGIC INSIGHTS"), "  No strategic insights extracted");
  }

  if (r.pain_points.length) {
    lines.push(section("PAIN POINTS IDENTIFIED", r.pain_points.length));
    for (const pp of r.pain_points) lines.push(`  • ${pp}`);
  } else {
    lines.push(section("PAIN POINTS IDENTIFIED"), "  None identified");
  }

  if (r.outreach_angles.length) {
    lines.push(section("OUTREACH ANGLES", r.outreach_angles.length));
    r.outreach_angles.forEach((a, i) => {
      lines.push(`  [${i + 1}] ${a.angle}`);
      if (a.evidence) lines.push(`      Evidence: ${truncateText(a.evidence, 100)}`);
      lines.push("");
    });
  } else {
    lines.push(section("OUTREACH ANGLES"), "  No specific outreach angles identified");
  }

  if (r.key_quotes.length) {
    lines.push(section("KEY EXECUTIVE QUOTES", r.key_quotes.length));
    for (const q of r.key_quotes) {
      lines.push(`  "${truncateText(q.quote, 150)}"`, `    — ${q.speaker ?? "Unknown"}${q.title ? `, ${q.title}` : ""}`, "");
    }
  }

  lines.push(
    section("SOURCES PROCESSED"),
    `  YouTube videos: ${r.youtube_intel.length}`,
    `  Articles/News: ${r.article_intel.length}`,
  );
  if (r.source_errors.length) {
    lines.push(`  Failed: ${r.source_errors.length}`);
    for (const err of r.source_errors) lines.push(`    • ${err.url}: ${err.error}`);
  }

  lines.push(`\n${RULE}`);
  return lines.join("\n");
}

/* dispatch ---------------------------------------------------------------- */
export type RenderableResult =
  | { mode: "discovery"; result: DiscoveryResult }
  | { mode: "revenue"; result: RevenueResult }
  | { mode: "deep_analysis"; result: DeepAnalysisResult };

export interface RenderedReport {
  json: string;
  text: string;
}

export const renderJson = (bundle: unknown): string => JSON.stringify(bundle, null, 2);

export function renderText(r: RenderableResult): string {
  switch (r.mode) {
    case "discovery":
      return renderDiscoveryText(r.result);
    case "revenue":
      return renderRevenueText(r.result);
    case "deep_analysis":
      return renderDeepAnalysisText(r.result);
  }
}

export function renderReport(r: RenderableResult): RenderedReport {
  return { json: renderJson(r.result), text: renderText(r) };
}
