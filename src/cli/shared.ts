import { loadConfig, type ResearchConfig } from "../lib/config.js";
import { isResearchError, toError } from "../lib/errors.js";
import type { PageFetcher } from "../lib/fetchPage.js";
import { log } from "../lib/log.js";
import { consoleProgress, type Progress } from "../lib/progress.js";
import { renderReport, type RenderableResult } from "../lib/renderReport.js";
import type { PipelineDeps } from "../lib/ResearchPipeline.js";
import { OpenAiResearchModel, type ResearchModel } from "../lib/researchModel.js";
import { writeReport, type OutputFormat } from "../lib/writeReport.js";

/** Everything a command touches outside its own arguments. */
export interface CliEnv {
  env         : NodeJS.ProcessEnv;
  createModel : (config: ResearchConfig) => ResearchModel;
  fetchPage?  : PageFetcher;
  now?        : () => Date;
  write?      : (chunk: string) => void;
  makeProgress: (quiet: boolean) => Progress;
  setExitCode : (code: number) => void;
}

export const defaultCliEnv = (): CliEnv => ({
  env         : process.env,
  createModel : (config) => OpenAiResearchModel.fromConfig(config),
  makeProgress: consoleProgress,
  setExitCode : (code) => {
    process.exitCode = code;
  },
});

export interface OutputCliOptions {
  output?: string;
  format : OutputFormat;
  quiet? : boolean;
}

const RULE = "=".repeat(60);

export const banner = (progress: Progress, title: string): void =>
  progress.done(`\n${RULE}\n${title}\n${RULE}`);

/** Config, model and progress for one run; a missing key fails here, before any call. */
export function prepareRun(cli: CliEnv, quiet: boolean): { deps: PipelineDeps; progress: Progress } {
  const config = loadConfig(cli.env);
  const progress = cli.makeProgress(quiet);
  return {
    progress,
    deps: {
      model    : cli.createModel(config),
      progress,
      fetchPage: cli.fetchPage,
      now      : cli.now,
    },
  };
}

export async function emitReport(
  result: RenderableResult,
  options: OutputCliOptions,
  cli: CliEnv,
  progress: Progress,
): Promise<void> {
  const written = await writeReport(renderReport(result), {
    format: options.format,
    output: options.output,
    write : cli.write,
  });
  for (const file of written) progress.done(`\nSaved ${file}`);
}

/** Runs a command body; any failure prints "Error: …" and sets exit code 1. */
export async function runCommand(cli: CliEnv, body: () => Promise<void>): Promise<void> {
  try {
    await body();
  } catch (e: unknown) {
    const err = toError(e);
    log.error(`Error: ${err.message}`);
    if (!isResearchError(e)) log.debug(err.stack);
    cli.setExitCode(1);
  }
}
