/**
 * company-intel revenue
 *
 * Sourced revenue estimates with a credibility-weighted confidence level.
 */

import { createResearchRequest } from "../../lib/request.js";
import { runRevenue } from "../../lib/ResearchPipeline.js";
import { banner, emitReport, prepareRun, runCommand, type CliEnv, type OutputCliOptions } from "../shared.js";

export interface RevenueCliOptions extends OutputCliOptions {
  domain      : string;
  companyName?: string;
}

export function revenue(cli: CliEnv) {
  return (options: RevenueCliOptions): Promise<void> =>
    runCommand(cli, async () => {
      const request = createResearchRequest({
        domain      : options.domain,
        company_name: options.companyName,
        mode        : "revenue",
      });
      const { deps, progress } = prepareRun(cli, Boolean(options.quiet));
      banner(progress, `Revenue Estimator — ${request.domain}`);

      const result = await runRevenue(request, deps);
      await emitReport({ mode: "revenue", result }, options, cli, progress);

      const best = result.best_estimate;
      if (best) {
        banner(progress, `Best estimate: ${best.amount_display ?? "N/A"} (${best.source_name})\nConfidence: ${result.confidence}`);
      }
    });
}
