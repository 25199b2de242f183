import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { LangChainTracer } from "@langchain/core/tracers/tracer_langchain";
import { getModel } from "#roadmap/ai/model.js";
import { ConfigurationError } from "#roadmap/ai/error.js";
import { ConfigKey, getConfig } from "#roadmap/config.js";
import { createLogger, logSecretStatus } from "#roadmap/util/logging.js";

const log = createLogger("model-config");

/**
 * Which part of the workflow a model serves. Each purpose may be pointed at
 * its own model; all of them fall back to ROADMAP_MODEL_NAME.
 */
export type ModelPurpose = "planning" | "research" | "validation";

/**
 * Model setup result
 */
export interface ModelWithOptions {
  model: BaseChatModel;
  modelName: string;
  tracerProjectName?: string;
  invokeOptions: {
    callbacks: LangChainTracer[];
  };
}

export interface ModelConfigOptions {
  modelName?: string;
  tracerProjectName?: string;
  purpose?: ModelPurpose;
  maxTokens?: number;
}

const PURPOSE_CONFIG_KEYS: Record<ModelPurpose, ConfigKey> = {
  planning: "planning-model",
  research: "research-model",
  validation: "validation-model",
};

export function resolveModelName(purpose?: ModelPurpose): string {
  const purposeModel = purpose ? getConfig(PURPOSE_CONFIG_KEYS[purpose]) : "";
  return purposeModel || getConfig("model-name");
}

/**
 * Configure a model for one workflow purpose.
 * @throws ConfigurationError when no model name is configured or the
 * provider's credentials are missing
 */
export const setupModel = async (
  options: ModelConfigOptions = {}
): Promise<ModelWithOptions> => {
  const modelName = options.modelName || resolveModelName(options.purpose);
  const tracerProjectName =
    options.tracerProjectName || getConfig("tracer-project") || undefined;

  log.debug(
    `setupModel - purpose: ${options.purpose ?? "default"}, modelName: ${modelName}, tracerProjectName: ${tracerProjectName}`
  );

  if (!modelName) {
    throw new ConfigurationError(
      "Model name must be provided either through options or the ROADMAP_MODEL_NAME environment variable"
    );
  }

  if (modelName.startsWith("claude-")) {
    logSecretStatus("ANTHROPIC_API_KEY", process.env.ANTHROPIC_API_KEY);
    if (!process.env.ANTHROPIC_API_KEY) {
      throw new ConfigurationError(
        `Model ${modelName} requires ANTHROPIC_API_KEY to be set`
      );
    }
  }

  const model = await getModel(modelName, options.maxTokens);

  return {
    model,
    modelName,
    tracerProjectName,
    invokeOptions: {
      callbacks: createTracerCallbacks(tracerProjectName),
    },
  };
};

export const setupPlanningModel = async (
  options: Omit<ModelConfigOptions, "purpose"> = {}
): Promise<ModelWithOptions> => setupModel({ ...options, purpose: "planning" });

export const setupResearchModel = async (
  options: Omit<ModelConfigOptions, "purpose"> = {}
): Promise<ModelWithOptions> => setupModel({ ...options, purpose: "research" });

export const setupValidationModel = async (
  options: Omit<ModelConfigOptions, "purpose"> = {}
): Promise<ModelWithOptions> => setupModel({ ...options, purpose: "validation" });

/**
 * Create callbacks array with tracer project name if provided
 */
export const createTracerCallbacks = (tracerProjectName?: string): LangChainTracer[] => {
  if (!tracerProjectName) {
    return [];
  }

  log.debug(`Created tracer for project: ${tracerProjectName}`);
  return [new LangChainTracer({ projectName: tracerProjectName })];
};
