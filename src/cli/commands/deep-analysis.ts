/**
 * company-intel deep-analysis
 *
 * Deep read of one YouTube video or article, or of every high-relevance
 * source in an earlier discovery report (--input).
 */

import { InvalidInputError } from "../../lib/errors.js";
import { normalizeDomain } from "../../lib/request.js";
import {
  loadDiscoveryInput,
  runDeepAnalysis,
  type DeepAnalysisTarget,
} from "../../lib/ResearchPipeline.js";
import { banner, emitReport, prepareRun, runCommand, type CliEnv, type OutputCliOptions } from "../shared.js";

export interface DeepAnalysisCliOptions extends OutputCliOptions {
  youtubeUrl? : string;
  articleUrl? : string;
  input?      : string;
  companyName?: string;
  domain?     : string;
  threshold   : number;
}

async function resolveTarget(options: DeepAnalysisCliOptions): Promise<DeepAnalysisTarget> {
  const given = [options.youtubeUrl, options.articleUrl, options.input].filter((v) => v !== undefined);
  if (given.length !== 1) {
    throw new InvalidInputError("Give exactly one of --youtube-url, --article-url or --input");
  }
  if (options.youtubeUrl) return { kind: "video", url: options.youtubeUrl };
  if (options.articleUrl) return { kind: "article", url: options.articleUrl };
  if (options.input) {
    return { kind: "discovery", input: await loadDiscoveryInput(options.input), threshold: options.threshold };
  }
  throw new InvalidInputError("Empty source argument");
}

export function deepAnalysis(cli: CliEnv) {
  return (options: DeepAnalysisCliOptions): Promise<void> =>
    runCommand(cli, async () => {
      const target = await resolveTarget(options);
      const { deps, progress } = prepareRun(cli, Boolean(options.quiet));
      banner(progress, "Deep Analysis Pipeline");

      const result = await runDeepAnalysis(
        target,
        {
          company_name: options.companyName,
          domain      : options.domain ? normalizeDomain(options.domain) : undefined,
        },
        deps,
      );
      await emitReport({ mode: "deep_analysis", result }, options, cli, progress);
    });
}
