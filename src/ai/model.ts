import { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { initChatModel } from "langchain/chat_models/universal";
import { ChatAnthropic } from "@langchain/anthropic";
import { createLogger } from "#roadmap/util/logging.js";

const log = createLogger("getModel");

// Cache models by name AND maxTokens to avoid re-initialization
const modelCache = new Map<string, BaseChatModel>();

export const getModel = async (
  modelName: string,
  maxTokens?: number
): Promise<BaseChatModel> => {
  const cacheKey = maxTokens ? `${modelName}:${maxTokens}` : modelName;

  const cached = modelCache.get(cacheKey);
  if (cached) {
    log.debug(`Returning cached model: ${cacheKey}`);
    return cached;
  }

  log.debug(`Initializing new model: ${modelName}${maxTokens ? ` with maxTokens: ${maxTokens}` : ""}`);

  let model: BaseChatModel;
  // Stage plans and grounded book lists run long; the SDK default of 2048 truncates them
  if (modelName.startsWith("claude-")) {
    model = new ChatAnthropic({
      model: modelName,
      maxTokens: maxTokens || 8192,
      temperature: 0.7,
    });
  } else {
    model = await initChatModel(modelName);
  }

  modelCache.set(cacheKey, model);
  return model;
};
