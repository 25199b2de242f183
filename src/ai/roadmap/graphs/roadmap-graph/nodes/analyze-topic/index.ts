/**
 * Topic Analysis Node (Analizador_Tema)
 *
 * Breaks the topic into tiered knowledge areas that later steer the level
 * filter and the stage structure.
 */

import { PromptTemplate } from "@langchain/core/prompts";
import type { TextGenerator } from "#roadmap/ai/text-generator.js";
import type { KnowledgeArea } from "#roadmap/ai/roadmap/schemas.js";
import { parseKnowledgeAreas } from "#roadmap/ai/roadmap/extraction/knowledge-areas.js";
import { createLogger } from "#roadmap/util/logging.js";
import { defineNode } from "../../node-shared.js";
import { ANALYZE_TOPIC_PROMPT } from "./prompts.js";

const log = createLogger("Analizador_Tema");

export const MIN_KNOWLEDGE_AREAS = 4;
export const MAX_KNOWLEDGE_AREAS = 7;

export function defaultKnowledgeAreas(topic: string): KnowledgeArea[] {
  return [
    { name: `Foundations of ${topic}`, tier: "introductory" },
    { name: `Core concepts of ${topic}`, tier: "core" },
    { name: `Practical applications of ${topic}`, tier: "core" },
    { name: `Advanced topics in ${topic}`, tier: "advanced" },
  ];
}

export function createAnalyzeTopic(generator: TextGenerator) {
  const template = PromptTemplate.fromTemplate(ANALYZE_TOPIC_PROMPT);

  return defineNode({
    name: "Analizador_Tema",
    reads: ["topic"],
    writes: ["knowledgeAreas"],
    run: async ({ topic }) => {
      log.info(`Analyzing: ${topic}`);

      let areas: KnowledgeArea[] = [];
      try {
        const prompt = await template.format({ topic });
        const text = await generator.generate(prompt, { purpose: "analysis" });
        areas = parseKnowledgeAreas(text).slice(0, MAX_KNOWLEDGE_AREAS);
      } catch (error) {
        log.warn("Analysis failed, using default areas:", error instanceof Error ? error.message : error);
      }

      if (areas.length < MIN_KNOWLEDGE_AREAS) {
        log.warn(`Only ${areas.length} areas parsed, using default areas`);
        areas = defaultKnowledgeAreas(topic);
      }

      log.info(`Identified ${areas.length} knowledge areas`);
      return { knowledgeAreas: areas };
    },
  });
}
