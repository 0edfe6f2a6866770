import { describe, expect, it } from "vitest";
import {
  CREDIBILITY_BANDS,
  SOURCE_TIER_TABLE,
  assessConfidence,
  credibilityFor,
  deriveConfidence,
  detectRedFlags,
  formatMillions,
  normalizeEstimate,
  pickBestEstimate,
  spread,
  tierFor,
  varianceSample,
  withinBand,
  type RevenueEstimate,
  type SourceTier,
} from "./credibility.js";

const est = (over: Partial<RevenueEstimate> = {}): RevenueEstimate => ({
  amount_millions  : 100,
  amount_display   : null,
  source_name      : "Test Source",
  source_url       : null,
  source_tier      : 3,
  credibility_score: 60,
  year             : null,
  notes            : null,
  ...over,
});

describe("tierFor", () => {
  it.each(SOURCE_TIER_TABLE.map((e) => [e.keyword, e.tier] as const))("%s → tier %i", (keyword, tier) => {
    expect(tierFor(keyword)).toBe(tier);
  });

  it("matches case-insensitively inside longer names", () => {
    expect(tierFor("Growjo Company Data")).toBe(4);
    expect(tierFor("Reuters Business")).toBe(3);
  });

  it("matches on the URL when the name is unknown", () => {
    expect(tierFor("Quarterly filing", "https://www.sec.gov/Archives/acme")).toBe(1);
  });

  it("defaults unrecognised sources to tier 3", () => {
    expect(tierFor("Acme Weekly")).toBe(3);
  });
});

describe("credibilityFor", () => {
  it.each([1, 2, 3, 4] as const)("tier %i midpoint lies in its band", (tier: SourceTier) => {
    const score = credibilityFor(tier);
    expect(score).toBeGreaterThanOrEqual(CREDIBILITY_BANDS[tier].min);
    expect(score).toBeLessThanOrEqual(CREDIBILITY_BANDS[tier].max);
  });

  it("uses the fixed midpoints", () => {
    expect(([1, 2, 3, 4] as const).map(credibilityFor)).toEqual([95, 80, 60, 40]);
  });
});

describe("normalizeEstimate", () => {
  it("lets the tier table override the reported tier and resets an out-of-band score", () => {
    const e = normalizeEstimate({
      amount_millions  : 27.9,
      amount_display   : null,
      source_name      : "Growjo",
      source_url       : null,
      source_tier      : 2,
      credibility_score: 85,
      year             : 2025,
      notes            : null,
    });
    expect(e.source_tier).toBe(4);
    expect(e.credibility_score).toBe(40);
    expect(e.amount_display).toBe("$27.9M");
  });

  it("keeps the reported tier and an in-band score for an unknown source", () => {
    const e = normalizeEstimate({
      amount_millions  : 12,
      amount_display   : "$12M",
      source_name      : "Mystery Blog",
      source_url       : null,
      source_tier      : 2,
      credibility_score: 75,
      year             : null,
      notes            : null,
    });
    expect(e.source_tier).toBe(2);
    expect(e.credibility_score).toBe(75);
    expect(e.amount_display).toBe("$12M");
  });

  it("falls back to tier 3 and its midpoint when nothing is reported", () => {
    const e = normalizeEstimate({
      amount_millions  : 5,
      amount_display   : null,
      source_name      : "Mystery Blog",
      source_url       : null,
      source_tier      : null,
      credibility_score: null,
      year             : null,
      notes            : null,
    });
    expect(e.source_tier).toBe(3);
    expect(e.credibility_score).toBe(60);
    expect(withinBand(e.credibility_score, e.source_tier)).toBe(true);
  });
});

describe("formatMillions", () => {
  it("formats millions and billions", () => {
    expect(formatMillions(27.94)).toBe("$27.9M");
    expect(formatMillions(1500)).toBe("$1.5B");
  });
});

describe("spread / varianceSample", () => {
  it("is (max - min) / max over positive amounts", () => {
    expect(spread([100, 80])).toBeCloseTo(0.2);
    expect(spread([0, 50])).toBe(0);
    expect(spread([])).toBe(0);
  });

  it("compares the most recent year holding two estimates", () => {
    const sample = varianceSample([
      { amount_millions: 40, year: 2023 },
      { amount_millions: 100, year: 2024 },
      { amount_millions: 105, year: 2024 },
    ]);
    expect(sample).toEqual([100, 105]);
  });

  it("pools everything when no year holds two estimates", () => {
    const sample = varianceSample([
      { amount_millions: 100, year: 2024 },
      { amount_millions: 50, year: 2023 },
    ]);
    expect(sample).toEqual([100, 50]);
  });
});

describe("deriveConfidence", () => {
  it("is INSUFFICIENT without estimates", () => {
    expect(deriveConfidence([])).toBe("INSUFFICIENT");
  });

  it("is LOW for one estimate at 45", () => {
    expect(deriveConfidence([est({ credibility_score: 45 })])).toBe("LOW");
  });

  it("is HIGH for 95 and 92 at 100.0 and 115.0", () => {
    const level = deriveConfidence([
      est({ credibility_score: 95, amount_millions: 100.0 }),
      est({ credibility_score: 92, amount_millions: 115.0 }),
    ]);
    expect(level).toBe("HIGH");
  });

  it("does not count a zero amount as a second source", () => {
    const level = deriveConfidence([
      est({ credibility_score: 95, amount_millions: 100 }),
      est({ credibility_score: 92, amount_millions: 0 }),
    ]);
    expect(level).toBe("LOW");
  });

  it("is INSUFFICIENT when every amount is zero", () => {
    expect(deriveConfidence([est({ amount_millions: 0 }), est({ amount_millions: 0 })])).toBe("INSUFFICIENT");
  });

  it("is MODERATE_HIGH when the best source is under 80", () => {
    const level = deriveConfidence([
      est({ credibility_score: 75, amount_millions: 100 }),
      est({ credibility_score: 60, amount_millions: 130 }),
    ]);
    expect(level).toBe("MODERATE_HIGH");
  });

  it("is MODERATE when strong sources disagree widely", () => {
    const level = deriveConfidence([
      est({ credibility_score: 85, amount_millions: 100 }),
      est({ credibility_score: 85, amount_millions: 200 }),
    ]);
    expect(level).toBe("MODERATE");
  });

  it("is LOW for two weak sources", () => {
    const level = deriveConfidence([
      est({ credibility_score: 40, amount_millions: 100 }),
      est({ credibility_score: 45, amount_millions: 100 }),
    ]);
    expect(level).toBe("LOW");
  });

  it("never drops when a second strong estimate lands within 20%", () => {
    const single = [est({ credibility_score: 90, amount_millions: 100 })];
    const withSecond = [...single, est({ credibility_score: 85, amount_millions: 110 })];
    const withThird = [...withSecond, est({ credibility_score: 82, amount_millions: 105 })];

    const order = ["INSUFFICIENT", "LOW", "MODERATE", "MODERATE_HIGH", "HIGH"];
    const rank = (e: RevenueEstimate[]) => order.indexOf(deriveConfidence(e));
    expect(rank(withSecond)).toBeGreaterThanOrEqual(rank(single));
    expect(rank(withThird)).toBeGreaterThanOrEqual(rank(withSecond));
    expect(deriveConfidence(withThird)).toBe("HIGH");
  });
});

describe("detectRedFlags / assessConfidence", () => {
  const strongPair = (year: number) => [
    est({ credibility_score: 95, amount_millions: 100, year }),
    est({ credibility_score: 92, amount_millions: 115, year }),
  ];

  it("flags aggregator-only, single and stale data", () => {
    const flags = detectRedFlags([est({ source_tier: 4, credibility_score: 45, year: 2015 })], 2025);
    expect(flags).toEqual(["all_aggregators", "single_source", "stale_data"]);
  });

  it("flags more than 3x between estimates as high variance", () => {
    expect(detectRedFlags([est({ amount_millions: 10 }), est({ amount_millions: 50 })], 2025)).toEqual(["high_variance"]);
  });

  it("caps at MODERATE on reported high variance", () => {
    const a = assessConfidence(strongPair(2025), ["high_variance"], 2025);
    expect(a).toEqual({ level: "MODERATE", base: "HIGH", red_flags: ["high_variance"] });
  });

  it("drops one level on stale data", () => {
    const a = assessConfidence(strongPair(2019), [], 2025);
    expect(a).toEqual({ level: "MODERATE_HIGH", base: "HIGH", red_flags: ["stale_data"] });
  });

  it("never drops stale data below LOW", () => {
    const a = assessConfidence([est({ source_tier: 4, credibility_score: 45, year: 2015 })], [], 2025);
    expect(a.level).toBe("LOW");
  });
});

describe("pickBestEstimate", () => {
  it("returns the highest credibility, first on a tie", () => {
    const first = est({ source_name: "First", credibility_score: 80 });
    const second = est({ source_name: "Second", credibility_score: 80 });
    expect(pickBestEstimate([est({ credibility_score: 40 }), first, second])).toBe(first);
    expect(pickBestEstimate([])).toBeNull();
  });
});
