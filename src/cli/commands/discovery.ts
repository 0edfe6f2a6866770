/**
 * company-intel discovery
 *
 * Strategic statements, executives, priorities and ownership history for a
 * company, plus follow-up research on its acquirer when one is found.
 */

import { createResearchRequest } from "../../lib/request.js";
import { runDiscovery } from "../../lib/ResearchPipeline.js";
import { banner, emitReport, prepareRun, runCommand, type CliEnv, type OutputCliOptions } from "../shared.js";

export interface DiscoveryCliOptions extends OutputCliOptions {
  domain      : string;
  companyName?: string;
  acquirer    : boolean;
}

export function discovery(cli: CliEnv) {
  return (options: DiscoveryCliOptions): Promise<void> =>
    runCommand(cli, async () => {
      const request = createResearchRequest({
        domain      : options.domain,
        company_name: options.companyName,
        mode        : "discovery",
      });
      const { deps, progress } = prepareRun(cli, Boolean(options.quiet));
      banner(progress, `Company Intelligence Discovery — ${request.domain}`);

      const result = await runDiscovery(request, deps, { followUp: options.acquirer });
      await emitReport({ mode: "discovery", result }, options, cli, progress);
    });
}
