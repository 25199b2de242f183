import { describe, expect, it } from "@jest/globals";
import { parseStages, DEFAULT_STAGE_DURATION } from "../stage-parser.js";

describe("parseStages", () => {
  const plan = [
    "Here is your plan.",
    "Stage 9: Too far",
    "Stage 1: Foundations of Machine Learning",
    "Description: Core vocabulary and workflows.",
    "Duration: 4 weeks",
    "Prerequisites: Basic Programming, High-school algebra",
    "Objectives:",
    "- Explain supervised learning",
    "- Train a linear model",
    "",
    "**Stage 2: Model Evaluation**",
    "Duration: 2 months",
    "Prerequisites: None",
    "1. Choose validation metrics",
    "",
    "Phase 3: Deployment",
    "Practical concerns of shipping models.",
  ].join("\n");

  it("extracts stages in document order", () => {
    const stages = parseStages(plan);

    expect(stages.map((stage) => stage.name)).toEqual([
      "Foundations of Machine Learning",
      "Model Evaluation",
      "Deployment",
    ]);
    expect(stages.every((stage) => stage.covered === false)).toBe(true);
  });

  it("attaches fields and objectives to the open stage", () => {
    const [first, second, third] = parseStages(plan);

    expect(first).toEqual({
      name: "Foundations of Machine Learning",
      description: "Core vocabulary and workflows.",
      duration: "4 weeks",
      prerequisites: ["Basic Programming", "High-school algebra"],
      objectives: ["Explain supervised learning", "Train a linear model"],
      covered: false,
    });
    expect(second.duration).toBe("2 months");
    expect(second.prerequisites).toEqual([]);
    expect(second.objectives).toEqual(["Choose validation metrics"]);
    expect(third.description).toBe("Practical concerns of shipping models.");
    expect(third.duration).toBe(DEFAULT_STAGE_DURATION);
  });

  it("drops repeated stage names", () => {
    const stages = parseStages("Stage 1: Basics\nStage 2: Basics\nStage 3: Practice");
    expect(stages.map((stage) => stage.name)).toEqual(["Basics", "Practice"]);
  });

  it("returns nothing when no header matches", () => {
    expect(parseStages("1. Learn basics\n2. Learn more")).toEqual([]);
  });
});
