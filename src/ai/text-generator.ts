/**
 * Text generation capability used by every node that talks to a model.
 *
 * Nodes only see the `TextGenerator` interface, so tests substitute a
 * scripted implementation and production wires in LangChain chat models.
 */

import { BaseMessage, HumanMessage } from "@langchain/core/messages";
import { GenerationError, GenerationTimeoutError } from "#roadmap/ai/error.js";
import {
  ModelPurpose,
  ModelWithOptions,
  setupPlanningModel,
  setupResearchModel,
  setupValidationModel,
} from "#roadmap/ai/model-config.js";
import { getNumericConfig } from "#roadmap/config.js";
import { createLogger } from "#roadmap/util/logging.js";

const log = createLogger("TextGenerator");

export type GenerationPurpose =
  | "analysis"
  | "structuring"
  | "research"
  | "validation"
  | "replanning";

export interface GenerateOptions {
  purpose: GenerationPurpose;
  /** Let the model consult live web search while answering. */
  grounded?: boolean;
}

export interface TextGenerator {
  /**
   * Resolves with non-empty text or rejects with a GenerationError.
   */
  generate(prompt: string, options: GenerateOptions): Promise<string>;
}

export const DEFAULT_GENERATION_TIMEOUT_MS = 60_000;

/** Anthropic server-side web search, run by the provider during generation. */
export const WEB_SEARCH_TOOL = {
  type: "web_search_20250305",
  name: "web_search",
  max_uses: 5,
} as const;

const PURPOSE_MODELS: Record<GenerationPurpose, ModelPurpose> = {
  analysis: "planning",
  structuring: "planning",
  replanning: "planning",
  research: "research",
  validation: "validation",
};

/**
 * Joins the text blocks of a model response. Tool-use and search-result
 * blocks are skipped.
 */
export function extractText(content: BaseMessage["content"]): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .map((block) => ("text" in block && typeof block.text === "string" ? block.text : ""))
    .join("");
}

export class ModelTextGenerator implements TextGenerator {
  constructor(
    private readonly models: Record<ModelPurpose, ModelWithOptions>,
    private readonly timeoutMs: number = DEFAULT_GENERATION_TIMEOUT_MS
  ) {}

  async generate(prompt: string, options: GenerateOptions): Promise<string> {
    const setup = this.models[PURPOSE_MODELS[options.purpose]];
    const signal = AbortSignal.timeout(this.timeoutMs);
    const grounded = options.grounded === true;

    log.debug(`${options.purpose} via ${setup.modelName}${grounded ? " (grounded)" : ""}`);

    let response: BaseMessage;
    try {
      response = await this.invoke(setup, prompt, grounded, signal);
    } catch (error) {
      if (signal.aborted) {
        throw new GenerationTimeoutError(this.timeoutMs, { cause: error });
      }
      const reason = error instanceof Error ? error.message : String(error);
      throw new GenerationError(`${options.purpose} generation failed: ${reason}`, {
        cause: error,
      });
    }

    const text = extractText(response.content).trim();
    if (!text) {
      throw new GenerationError(`${options.purpose} generation returned no text`);
    }
    return text;
  }

  private async invoke(
    setup: ModelWithOptions,
    prompt: string,
    grounded: boolean,
    signal: AbortSignal
  ): Promise<BaseMessage> {
    const messages = [new HumanMessage(prompt)];
    const config = {
      ...setup.invokeOptions,
      signal,
      metadata: { workflow: "roadmap", grounded },
    };
    if (grounded && setup.model.bindTools) {
      return setup.model.bindTools([WEB_SEARCH_TOOL]).invoke(messages, config);
    }
    return setup.model.invoke(messages, config);
  }
}

/**
 * Builds the production generator from configured models.
 * @throws ConfigurationError when a model or its credentials are missing
 */
export async function createModelTextGenerator(): Promise<ModelTextGenerator> {
  const [planning, research, validation] = await Promise.all([
    setupPlanningModel(),
    setupResearchModel(),
    setupValidationModel(),
  ]);
  return new ModelTextGenerator(
    { planning, research, validation },
    getNumericConfig("generation-timeout-ms", DEFAULT_GENERATION_TIMEOUT_MS)
  );
}
