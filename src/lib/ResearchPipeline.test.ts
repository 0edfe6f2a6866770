import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { acquirerReply, discoveryReply, ScriptedModel } from "../test/scriptedModel.js";
import { InvalidInputError, InvalidResponseSchemaError, NetworkFailureError } from "./errors.js";
import { log } from "./log.js";
import { createResearchRequest } from "./request.js";
import {
  dedupeStrings,
  findAcquisitionTrigger,
  loadDiscoveryInput,
  runDeepAnalysis,
  runDiscovery,
  runRevenue,
  selectSources,
  type PipelineDeps,
} from "./ResearchPipeline.js";
import { discoveryInputSchema } from "./schemas.js";

const NOW = new Date("2025-05-01T12:00:00Z");
const request = createResearchRequest({ domain: "acme-tools.com", company_name: "Acme Tools", mode: "discovery" });

const depsFor = (model: ScriptedModel, extra: Partial<PipelineDeps> = {}): PipelineDeps => ({
  model,
  now      : () => NOW,
  fetchPage: async () => null,
  ...extra,
});

beforeEach(() => {
  vi.spyOn(log, "warn").mockImplementation(() => undefined);
  vi.spyOn(log, "error").mockImplementation(() => undefined);
});

afterEach(() => {
  vi.restoreAllMocks();
});

/*──────────────────────── DISCOVERY ──────────────────────*/
describe("findAcquisitionTrigger", () => {
  it("takes the first acquisition with a named acquirer", () => {
    const trigger = findAcquisitionTrigger([
      { date: null, type: "merger", counterparty_name: "Other Co", counterparty_domain: null, amount: null, details: null },
      { date: null, type: "acquisition", counterparty_name: null, counterparty_domain: null, amount: null, details: null },
      { date: "2024", type: "acquisition", counterparty_name: "Road Runner Industries", counterparty_domain: null, amount: null, details: null },
    ]);
    expect(trigger?.counterparty_name).toBe("Road Runner Industries");
  });

  it("ignores mergers and investments", () => {
    expect(findAcquisitionTrigger([
      { date: null, type: "pe_investment", counterparty_name: "Test Capital", counterparty_domain: null, amount: null, details: null },
    ])).toBeNull();
  });
});

describe("runDiscovery", () => {
  it("issues exactly one acquirer follow-up and attaches its intel", async () => {
    const model = new ScriptedModel([discoveryReply(), acquirerReply()]);
    const result = await runDiscovery(request, depsFor(model), { followUp: true });

    expect(model.queries.map((q) => q.label)).toEqual(["discovery", "acquirer:Road Runner Industries"]);
    expect(result.acquisition_info).toMatchObject({
      acquirer_name   : "Road Runner Industries",
      acquirer_domain : "roadrunner.example",
      acquisition_date: "2024-01-15",
      details         : "Acquired the tools business",
    });
    expect(result.acquisition_info?.acquirer_intel?.philosophy).toBe("Buy and build");
    expect(result.acquisition_info?.followup_error).toBeUndefined();
    expect(result._metadata.run_states).toEqual([
      "START",
      "PRIMARY_QUERY_SENT",
      "PRIMARY_VALIDATED",
      "FOLLOWUP_QUERY_SENT",
      "ASSEMBLED",
      "DONE",
    ]);
  });

  it("issues no follow-up when disabled", async () => {
    const model = new ScriptedModel([discoveryReply()]);
    const result = await runDiscovery(request, depsFor(model), { followUp: false });

    expect(model.queries).toHaveLength(1);
    expect(result.acquisition_info).toBeUndefined();
    expect(result._metadata.run_states).toEqual(["START", "PRIMARY_QUERY_SENT", "PRIMARY_VALIDATED", "ASSEMBLED", "DONE"]);
  });

  it("issues no follow-up without an acquisition", async () => {
    const model = new ScriptedModel([
      discoveryReply({ ownership_changes: [{ type: "pe_investment", counterparty_name: "Test Capital" }] }),
    ]);
    const result = await runDiscovery(request, depsFor(model));
    expect(model.queries).toHaveLength(1);
    expect(result.acquisition_info).toBeUndefined();
  });

  it("records a failed follow-up instead of failing the run", async () => {
    const model = new ScriptedModel([discoveryReply(), new Error("follow-up down")]);
    const result = await runDiscovery(request, depsFor(model));

    expect(result.acquisition_info?.acquirer_intel).toBeUndefined();
    expect(result.acquisition_info?.followup_error).toBe("follow-up down");
    expect(log.warn).toHaveBeenCalledWith("[Pipeline] acquirer follow-up for Road Runner Industries failed: follow-up down");
    expect(result._metadata.run_states.at(-1)).toBe("DONE");
  });

  it("records a malformed follow-up reply the same way", async () => {
    const model = new ScriptedModel([discoveryReply(), "no json"]);
    const result = await runDiscovery(request, depsFor(model));
    expect(result.acquisition_info?.followup_error).toBe(
      "acquirer:Road Runner Industries: response failed schema validation ($)",
    );
  });

  it("sorts statements by relevance and fills metadata", async () => {
    const model = new ScriptedModel([discoveryReply()]);
    const result = await runDiscovery(request, depsFor(model), { followUp: false });

    expect(result.strategic_statements.map((s) => s.relevance_score)).toEqual([91, 72]);
    expect(result.collection_notes).toBeNull();
    expect(result._metadata).toMatchObject({
      mode        : "discovery",
      collected_at: "2025-05-01T12:00:00.000Z",
      domain      : "acme-tools.com",
      company_name: "Acme Tools",
      model       : "test-model",
    });
    expect(result._metadata.model_usage?.calls).toBe(1);
  });

  it("fails on a primary schema violation", async () => {
    const model = new ScriptedModel([JSON.stringify({ strategic_statements: [] })]);
    await expect(runDiscovery(request, depsFor(model))).rejects.toBeInstanceOf(InvalidResponseSchemaError);
    expect(model.queries).toHaveLength(1);
  });

  it("refuses a request made for another mode", async () => {
    const revenueRequest = createResearchRequest({ domain: "acme-tools.com", mode: "revenue" });
    const model = new ScriptedModel([discoveryReply()]);
    await expect(runDiscovery(revenueRequest, depsFor(model))).rejects.toBeInstanceOf(InvalidInputError);
    expect(model.queries).toHaveLength(0);
  });

  it("fails on a primary network failure", async () => {
    const model = new ScriptedModel([new NetworkFailureError("discovery", "connect ECONNREFUSED")]);
    await expect(runDiscovery(request, depsFor(model))).rejects.toBeInstanceOf(NetworkFailureError);
  });
});

/*──────────────────────── REVENUE ────────────────────────*/
describe("runRevenue", () => {
  const revenueRequest = createResearchRequest({ domain: "acme-tools.com", company_name: "Acme Tools", mode: "revenue" });

  it("normalises estimates and derives confidence", async () => {
    const model = new ScriptedModel([
      JSON.stringify({
        company_name     : "Acme Tools",
        domain           : "acme-tools.com",
        revenue_estimates: [
          { amount_millions: "27.9", source_name: "Growjo", source_tier: 4, credibility_score: 45, year: 2025 },
          {
            amount_millions  : 31,
            amount_display   : "$31M",
            source_name      : "CEO interview with Trade Weekly",
            source_tier      : 2,
            credibility_score: 82,
            year             : 2025,
          },
        ],
        employee_count  : { count: "175", source: "RocketReach", year: 2025 },
        ownership       : { type: "Private" },
        research_quality: { red_flags: [] },
      }),
    ]);
    const result = await runRevenue(revenueRequest, depsFor(model));

    expect(result.revenue_estimates.map((e) => [e.source_name, e.source_tier, e.credibility_score, e.amount_display])).toEqual([
      ["CEO interview with Trade Weekly", 2, 82, "$31M"],
      ["Growjo", 4, 45, "$27.9M"],
    ]);
    expect(result.confidence).toBe("HIGH");
    expect(result.best_estimate?.source_name).toBe("CEO interview with Trade Weekly");
    expect(result.research_quality).toEqual({ sources_found: 2, highest_tier_found: 2, red_flags: [] });
    expect(result.ownership.type).toBe("private");
    expect(result.employee_count?.count).toBe(175);
    expect(result._metadata.confidence_before_red_flags).toBe("HIGH");
  });

  it("builds its query from the request mode and refuses other modes", async () => {
    const model = new ScriptedModel([JSON.stringify({ revenue_estimates: [] })]);
    await runRevenue(revenueRequest, depsFor(model));
    expect(model.queries[0]?.label).toBe("revenue");

    await expect(runRevenue(request, depsFor(new ScriptedModel([])))).rejects.toThrow(
      "Expected a revenue request, got discovery",
    );
  });

  it("is INSUFFICIENT with no estimates", async () => {
    const model = new ScriptedModel([JSON.stringify({ revenue_estimates: [] })]);
    const result = await runRevenue(revenueRequest, depsFor(model));
    expect(result.confidence).toBe("INSUFFICIENT");
    expect(result.best_estimate).toBeNull();
    expect(result.company_name).toBe("Acme Tools");
  });
});

/*──────────────────────── DEEP ANALYSIS ──────────────────*/
const videoReply = (painPoints: string[] = ["inventory management"]): string =>
  JSON.stringify({
    executives_found  : [{ name: "Jane Roe", title: "CEO", key_quotes: ["We are doubling down on speed."] }],
    strategic_insights: [{ topic: "expansion", detail: "Opening two warehouses", confidence: "high" }],
    pain_points       : painPoints,
    outreach_angles   : [{ angle: "Warehouse software", evidence: "Two new sites" }],
    video_summary     : "The CEO talks about growth.",
  });

const articleReply = (): string =>
  JSON.stringify({
    headline_summary : "Acme opens a warehouse",
    executive_quotes : [{ speaker: "Sam Poe", title: "COO", quote: "Capacity doubles this year." }],
    relevance_score  : 80,
  });

const statement = (url: string | null, source_type: string | null, relevance_score: number) =>
  ({ quote: "Test quote", source_name: "Test Source", source_url: url, source_type, relevance_score });

describe("selectSources", () => {
  it("splits qualifying sources into videos and articles", () => {
    const input = discoveryInputSchema.parse({
      strategic_statements: [
        statement("https://www.youtube.com/watch?v=test1", "youtube", 90),
        statement("https://example.com/news/1", "news", 85),
        statement("https://example.com/podcast/1", "podcast", 95),
        statement("https://example.com/news/2", "news", 70),
        statement(null, "news", 99),
        statement("https://youtu.be/test2", "interview", 88),
        statement("https://example.com/news/1", "press_release", 92),
      ],
    });
    const { videos, articles } = selectSources(input, 80);
    expect(videos.map((s) => s.url)).toEqual(["https://www.youtube.com/watch?v=test1", "https://youtu.be/test2"]);
    expect(articles.map((s) => s.url)).toEqual(["https://example.com/news/1"]);
  });

  it("caps articles at five", () => {
    const input = discoveryInputSchema.parse({
      strategic_statements: Array.from({ length: 7 }, (_, i) => statement(`https://example.com/a/${i}`, "article", 90)),
    });
    expect(selectSources(input, 80).articles).toHaveLength(5);
  });
});

describe("dedupeStrings", () => {
  it("keeps the first spelling in first-seen order", () => {
    expect(dedupeStrings(["Inventory", "Shipping", "inventory ", ""])).toEqual(["Inventory", "Shipping"]);
  });
});

describe("runDeepAnalysis", () => {
  it("analyses a single video", async () => {
    const model = new ScriptedModel([videoReply()]);
    const result = await runDeepAnalysis(
      { kind: "video", url: "https://www.youtube.com/watch?v=test1" },
      { company_name: "Acme Tools" },
      depsFor(model),
    );
    expect(model.queries[0]?.label).toBe("video:https://www.youtube.com/watch?v=test1");
    expect(result.youtube_intel).toHaveLength(1);
    expect(result.executives_found.map((e) => e.name)).toEqual(["Jane Roe"]);
    expect(result.pain_points).toEqual(["inventory management"]);
    expect(result._metadata).toMatchObject({ youtube_count: 1, article_count: 0, threshold: null });
  });

  it("attaches fetched article text to the prompt", async () => {
    const model = new ScriptedModel([articleReply()]);
    const fetchPage = vi.fn(async () => "Acme opened its second warehouse in Ohio this spring.");
    const result = await runDeepAnalysis(
      { kind: "article", url: "https://example.com/news/1" },
      { company_name: "Acme Tools" },
      depsFor(model, { fetchPage }),
    );

    expect(fetchPage).toHaveBeenCalledWith("https://example.com/news/1");
    expect(model.queries[0]?.grounding).toBe(false);
    expect(model.queries[0]?.prompt).toContain("Acme opened its second warehouse in Ohio this spring.");
    expect(result.article_intel[0]?.page_fetched).toBe(true);
    expect(result.key_quotes).toEqual([{ speaker: "Sam Poe", title: "COO", quote: "Capacity doubles this year." }]);
  });

  it("fails when a direct target fails", async () => {
    const model = new ScriptedModel(["not json"]);
    await expect(
      runDeepAnalysis({ kind: "video", url: "https://youtu.be/test2" }, {}, depsFor(model)),
    ).rejects.toBeInstanceOf(InvalidResponseSchemaError);
  });

  it("records per-source failures from a discovery report", async () => {
    const input = discoveryInputSchema.parse({
      company_name        : "Acme Tools",
      domain              : "acme-tools.com",
      strategic_statements: [
        statement("https://www.youtube.com/watch?v=test1", "youtube", 90),
        statement("https://example.com/news/1", "news", 85),
      ],
    });
    const model = new ScriptedModel([new Error("quota exceeded"), articleReply()]);
    const result = await runDeepAnalysis({ kind: "discovery", input, threshold: 80 }, {}, depsFor(model));

    expect(result.company_name).toBe("Acme Tools");
    expect(result.youtube_intel).toHaveLength(0);
    expect(result.article_intel[0]?.original_relevance).toBe(85);
    expect(result.source_errors).toEqual([
      { url: "https://www.youtube.com/watch?v=test1", kind: "video", error: "quota exceeded" },
    ]);
    expect(result._metadata.threshold).toBe(80);
  });

  it("fails when every source from a report fails", async () => {
    const input = discoveryInputSchema.parse({
      strategic_statements: [statement("https://example.com/news/1", "news", 85)],
    });
    const model = new ScriptedModel([new Error("quota exceeded")]);
    await expect(
      runDeepAnalysis({ kind: "discovery", input, threshold: 80 }, {}, depsFor(model)),
    ).rejects.toThrow("quota exceeded");
  });

  it("merges pain points across videos without duplicates", async () => {
    const input = discoveryInputSchema.parse({
      strategic_statements: [
        statement("https://youtu.be/test1", "youtube", 90),
        statement("https://youtu.be/test2", "youtube", 90),
      ],
    });
    const model = new ScriptedModel([videoReply(["Slow checkout", "Returns"]), videoReply(["returns", "Staffing"])]);
    const result = await runDeepAnalysis({ kind: "discovery", input, threshold: 80 }, {}, depsFor(model));
    expect(result.pain_points).toEqual(["Slow checkout", "Returns", "Staffing"]);
    expect(result.executives_found).toHaveLength(2);
  });

  it("returns an empty report when nothing clears the threshold", async () => {
    const input = discoveryInputSchema.parse({
      strategic_statements: [statement("https://example.com/news/1", "news", 50)],
    });
    const model = new ScriptedModel([]);
    const result = await runDeepAnalysis({ kind: "discovery", input, threshold: 80 }, {}, depsFor(model));
    expect(model.queries).toHaveLength(0);
    expect(result.article_intel).toEqual([]);
    expect(log.warn).toHaveBeenCalledWith("[Pipeline] no sources at or above relevance 80");
  });
});

describe("loadDiscoveryInput", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "company-intel-"));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it("reads a discovery report", async () => {
    const file = path.join(dir, "acme.json");
    await writeFile(file, discoveryReply(), "utf8");
    const input = await loadDiscoveryInput(file);
    expect(input.company_name).toBe("Acme Tools");
    expect(input.strategic_statements).toHaveLength(2);
  });

  it("rejects a missing file", async () => {
    await expect(loadDiscoveryInput(path.join(dir, "missing.json"))).rejects.toBeInstanceOf(InvalidInputError);
  });

  it("rejects a file that is not JSON", async () => {
    const file = path.join(dir, "broken.json");
    await writeFile(file, "{ not json", "utf8");
    await expect(loadDiscoveryInput(file)).rejects.toThrow(`Input file ${file} is not valid JSON`);
  });
});
