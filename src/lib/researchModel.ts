/* ──────────────────────────────────────────────────────────────────────────
   src/lib/researchModel.ts
   --------------------------------------------------------------------------
   The one boundary to the hosted model. Orchestration only ever sees
   ResearchModel.generate(query) → raw text; everything behind it (OpenAI
   Responses API, web-search grounding, token accounting) stays here.
   ------------------------------------------------------------------------ */

import OpenAI from "openai";
import type { ResearchQuery } from "./queryBuilder.js";
import type { ResearchConfig } from "./config.js";
import { NetworkFailureError, toError } from "./errors.js";
import { log } from "./log.js";

export interface ResearchModel {
  /** Sends one query and resolves with the model's raw text reply. */
  generate(query: ResearchQuery<unknown>): Promise<string>;
  usage?(): ModelUsage;
}

export interface ModelUsage {
  model             : string;
  calls             : number;
  input_tokens      : number;
  output_tokens     : number;
  estimated_cost_usd: number;
}

/*──────────────────────── TRANSPORT ──────────────────────*/
export interface TransportRequest {
  model          : string;
  instructions?  : string;
  input          : string;
  grounding      : boolean;
  temperature    : number;
  maxOutputTokens?: number;
}

export interface TransportResult {
  text        : string;
  inputTokens : number;
  outputTokens: number;
}

export type ModelTransport = (request: TransportRequest) => Promise<TransportResult>;

/** Responses API call, with the web_search_preview tool when grounding is on. */
export function openAiTransport(config: Pick<ResearchConfig, "apiKey" | "timeoutMs">): ModelTransport {
  const ai = new OpenAI({ apiKey: config.apiKey, timeout: config.timeoutMs, maxRetries: 0 });

  return async (request) => {
    const response = await ai.responses.create({
      model            : request.model,
      instructions     : request.instructions,
      input            : request.input,
      tools            : request.grounding ? [{ type: "web_search_preview" }] : [],
      temperature      : request.temperature,
      max_output_tokens: request.maxOutputTokens,
    });
    return {
      text        : response.output_text,
      inputTokens : response.usage?.input_tokens ?? 0,
      outputTokens: response.usage?.output_tokens ?? 0,
    };
  };
}

/*──────────────────────── MODEL ──────────────────────────*/
const TEMPERATURE = 0.2;

// gpt-4.1-mini list prices, USD per million tokens
const INPUT_TOKEN_PRICE_PER_MILLION  = 0.40;
const OUTPUT_TOKEN_PRICE_PER_MILLION = 1.60;

export const calculateLlmCost = (inputTokens: number, outputTokens: number): number =>
  (inputTokens / 1_000_000) * INPUT_TOKEN_PRICE_PER_MILLION +
  (outputTokens / 1_000_000) * OUTPUT_TOKEN_PRICE_PER_MILLION;

const statusOf = (e: unknown): number | undefined =>
  e instanceof OpenAI.APIError && typeof e.status === "number" ? e.status : undefined;

export class OpenAiResearchModel implements ResearchModel {
  private calls = 0;
  private inputTokens = 0;
  private outputTokens = 0;

  constructor(
    private readonly modelId: string,
    private readonly transport: ModelTransport,
  ) {}

  static fromConfig(config: ResearchConfig): OpenAiResearchModel {
    return new OpenAiResearchModel(config.model, openAiTransport(config));
  }

  async generate(query: ResearchQuery<unknown>): Promise<string> {
    this.calls++;
    const t0 = Date.now();
    log.debug(`[Model] ${query.label} → ${this.modelId} (grounding: ${query.grounding})`);

    let result: TransportResult;
    try {
      result = await this.transport({
        model          : this.modelId,
        instructions   : query.instructions,
        input          : query.prompt,
        grounding      : query.grounding,
        temperature    : TEMPERATURE,
        maxOutputTokens: query.maxOutputTokens,
      });
    } catch (e: unknown) {
      const err = toError(e);
      log.error(`[Model] ${query.label} failed after ${Date.now() - t0}ms: ${err.message}`);
      throw new NetworkFailureError(query.label, err.message, statusOf(e), { cause: err });
    }

    this.inputTokens += result.inputTokens;
    this.outputTokens += result.outputTokens;
    log.debug(
      `[Model] ${query.label} done in ${Date.now() - t0}ms (${result.inputTokens} in / ${result.outputTokens} out)`,
    );
    return result.text.trim();
  }

  usage(): ModelUsage {
    return {
      model             : this.modelId,
      calls             : this.calls,
      input_tokens      : this.inputTokens,
      output_tokens     : this.outputTokens,
      estimated_cost_usd: +calculateLlmCost(this.inputTokens, this.outputTokens).toFixed(4),
    };
  }
}
