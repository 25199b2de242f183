import { describe, expect, it } from "@jest/globals";
import type { BookInfo } from "#roadmap/ai/roadmap/schemas.js";
import { createTestStage, createTestState } from "../../../../../test/scripted-generator.js";
import { runNode } from "../../../node-shared.js";
import { createDetectGaps, findStageGaps, isObjectiveEvidenced } from "../index.js";

const regressionBook: BookInfo = {
  title: "Regression and Other Stories",
  author: "Andrew Gelman",
  rating: 4.6,
  reviewCount: 400,
  rationale: "Applied regression modelling",
  score: 27,
};

describe("isObjectiveEvidenced", () => {
  it("matches keywords against titles and rationales", () => {
    expect(isObjectiveEvidenced("Linear regression models", [regressionBook])).toBe(true);
    expect(isObjectiveEvidenced("Causal inference", [regressionBook])).toBe(false);
  });

  it("treats objectives without keywords as evidenced", () => {
    expect(isObjectiveEvidenced("Do it", [])).toBe(true);
  });
});

describe("findStageGaps", () => {
  it("reports missing books before unaddressed objectives", () => {
    expect(
      findStageGaps("Regression", ["Linear regression models", "Causal inference"], [regressionBook])
    ).toEqual([
      "Regression: only 1 of 2 recommended books found",
      'Regression: no book addresses "Causal inference"',
    ]);
  });

  it("flags a stage when most books have few reviews", () => {
    const obscure = { ...regressionBook, title: "Obscure Regression Notes", reviewCount: 12 };
    const niche = { ...regressionBook, title: "Niche Regression", reviewCount: 49 };

    expect(findStageGaps("Regression", [], [obscure, niche, regressionBook])).toEqual([
      "Regression: 2 of 3 books have fewer than 50 reviews",
    ]);
  });

  it("accepts a stage when half of its books have few reviews", () => {
    const obscure = { ...regressionBook, title: "Obscure Regression Notes", reviewCount: 12 };

    expect(findStageGaps("Regression", [], [obscure, regressionBook])).toEqual([]);
  });
});

describe("Detector_Gaps", () => {
  const stages = [
    createTestStage("Statistics", { covered: true }),
    createTestStage("Regression", { objectives: ["Linear regression models", "Causal inference"] }),
    createTestStage("Classification"),
  ];

  it("appends new gaps, marks the stage covered and releases it", async () => {
    const state = createTestState({
      stages,
      stageBeingProcessed: "Regression",
      booksByStage: { Regression: [regressionBook] },
      knowledgeGaps: ["Regression: only 1 of 2 recommended books found"],
    });

    const update = await runNode(createDetectGaps(), state);

    expect(update.knowledgeGaps).toEqual([
      "Regression: only 1 of 2 recommended books found",
      'Regression: no book addresses "Causal inference"',
    ]);
    expect(update.stages?.map((stage) => stage.covered)).toEqual([true, true, false]);
    expect(update.stageBeingProcessed).toBeNull();
    expect(update.allStagesCovered).toBe(false);
  });

  it("sets full coverage once the last stage is covered", async () => {
    const state = createTestState({
      stages: stages.map((stage) => ({ ...stage, covered: stage.name !== "Classification" })),
      stageBeingProcessed: "Classification",
    });

    const update = await runNode(createDetectGaps(), state);

    expect(update.allStagesCovered).toBe(true);
    expect(update.knowledgeGaps).toEqual(["Classification: only 0 of 2 recommended books found"]);
  });

  it("only recomputes coverage without a selected stage", async () => {
    await expect(runNode(createDetectGaps(), createTestState({ stages }))).resolves.toEqual({
      allStagesCovered: false,
    });
  });
});
