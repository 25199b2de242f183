/**
 * Central Zod Schemas for Roadmap Data
 *
 * Types are derived from these schemas with z.infer so the values parsed out
 * of generated text are validated against the same shapes the graph state
 * uses.
 */

import { z } from "zod";

export const UserLevelSchema = z
  .enum(["beginner", "intermediate", "advanced"])
  .describe("Learner's starting level");

export type UserLevel = z.infer<typeof UserLevelSchema>;

export const KnowledgeTierSchema = z.enum(["introductory", "core", "advanced"]);

export type KnowledgeTier = z.infer<typeof KnowledgeTierSchema>;

export const KnowledgeAreaSchema = z.object({
  name: z.string().min(1).describe("Short name of the knowledge area"),
  tier: KnowledgeTierSchema.describe("Depth at which the area is usually studied"),
});

export type KnowledgeArea = z.infer<typeof KnowledgeAreaSchema>;

/**
 * One ordered phase of the roadmap.
 */
export const StageInfoSchema = z.object({
  name: z.string().min(1),
  description: z.string(),
  duration: z.string().describe("Estimate such as '4 weeks' or '2 months'"),
  prerequisites: z.array(z.string()),
  objectives: z.array(z.string()),
  covered: z.boolean(),
});

export type StageInfo = z.infer<typeof StageInfoSchema>;

/**
 * A recommended book. Accepted books must be rated above the quality
 * threshold; candidates are validated here before they reach the gate.
 */
export const BookInfoSchema = z.object({
  title: z.string().min(1),
  author: z.string().min(1),
  year: z.string().optional(),
  rating: z.number().min(0).max(5),
  reviewCount: z.number().int().nonnegative(),
  rationale: z.string(),
  score: z.number().nonnegative().describe("rating × ln(reviewCount + 1)"),
});

export type BookInfo = z.infer<typeof BookInfoSchema>;
