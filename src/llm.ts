import OpenAI from "openai";
import { zodTextFormat } from "openai/helpers/zod";
import type { z } from "zod";
import { log } from "./logger.js";
import { ExtractionFailureError, errorMessage } from "./errors.js";
import type { SubstrateConfig } from "./types.js";

export interface LlmRequest {
  /** Name of the structured output format, e.g. "crystal". */
  name: string;
  instructions: string;
  input: string;
}

/**
 * Structured-output model handle. Components receive one at construction and
 * never share or swap it; a restart builds a new substrate with a new handle.
 */
export interface LlmClient {
  parse<T>(schema: z.ZodType<T>, request: LlmRequest): Promise<T>;
}

export class OpenAiLlmClient implements LlmClient {
  private readonly client: OpenAI;

  constructor(
    private readonly config: Pick<SubstrateConfig, "openaiApiKey" | "openaiBaseUrl" | "model">,
  ) {
    if (!config.openaiApiKey) {
      throw new Error("openaiApiKey is required for the OpenAI LLM client");
    }
    this.client = new OpenAI({
      apiKey: config.openaiApiKey,
      ...(config.openaiBaseUrl ? { baseURL: config.openaiBaseUrl } : {}),
    });
  }

  async parse<T>(schema: z.ZodType<T>, request: LlmRequest): Promise<T> {
    const started = Date.now();
    try {
      const response = await this.client.responses.parse({
        model: this.config.model,
        instructions: request.instructions,
        input: request.input,
        text: { format: zodTextFormat(schema, request.name) },
      });
      log.debug(`llm ${request.name}: ${Date.now() - started}ms`);

      const parsed = schema.safeParse(response.output_parsed);
      if (!parsed.success) {
        throw new ExtractionFailureError(`${request.name}: model returned no usable output`);
      }
      return parsed.data;
    } catch (err) {
      if (err instanceof ExtractionFailureError) throw err;
      log.warn(`llm ${request.name} failed after ${Date.now() - started}ms`, err);
      throw new ExtractionFailureError(`${request.name}: ${errorMessage(err)}`, { cause: err });
    }
  }
}
