import { Command, InvalidArgumentError, Option } from "commander";
import { DEFAULT_RELEVANCE_THRESHOLD } from "../lib/ResearchPipeline.js";
import { OUTPUT_FORMATS } from "../lib/writeReport.js";
import { deepAnalysis } from "./commands/deep-analysis.js";
import { discovery } from "./commands/discovery.js";
import { revenue } from "./commands/revenue.js";
import type { CliEnv } from "./shared.js";

export const VERSION = "0.1.0";

const parseThreshold = (value: string): number => {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0 || n > 100) {
    throw new InvalidArgumentError("must be an integer from 0 to 100");
  }
  return n;
};

const outputOptions = (cmd: Command): Command =>
  cmd
    .option("-o, --output <path>", "write <base>.json / <base>.txt instead of stdout")
    .addOption(new Option("-f, --format <format>", "output format").choices(OUTPUT_FORMATS).default("json"))
    .option("-q, --quiet", "no progress output");

export function buildProgram(cli: CliEnv): Command {
  const program = new Command();

  program
    .name("company-intel")
    .description("Company intelligence from web-grounded AI research")
    .version(VERSION);

  outputOptions(
    program
      .command("discovery")
      .description("Strategic statements, executives and ownership changes")
      .requiredOption("-d, --domain <domain>", "company domain, e.g. example.com")
      .option("-n, --company-name <name>", "company name (inferred from the domain if omitted)")
      .option("--no-acquirer", "skip follow-up research on a detected acquirer"),
  ).action(discovery(cli));

  outputOptions(
    program
      .command("revenue")
      .description("Revenue estimates with source credibility and confidence")
      .requiredOption("-d, --domain <domain>", "company domain, e.g. example.com")
      .option("-n, --company-name <name>", "company name (inferred from the domain if omitted)"),
  ).action(revenue(cli));

  outputOptions(
    program
      .command("deep-analysis")
      .alias("deep_analysis")
      .description("Deep analysis of a video, an article, or the best sources of a discovery report")
      .option("--youtube-url <url>", "analyse one YouTube video")
      .option("--article-url <url>", "analyse one article")
      .option("-i, --input <file>", "discovery JSON report to take sources from")
      .option("-n, --company-name <name>", "company name for context")
      .option("-d, --domain <domain>", "company domain")
      .option(
        "-t, --threshold <n>",
        "minimum relevance score of sources taken from --input",
        parseThreshold,
        DEFAULT_RELEVANCE_THRESHOLD,
      ),
  ).action(deepAnalysis(cli));

  return program;
}
