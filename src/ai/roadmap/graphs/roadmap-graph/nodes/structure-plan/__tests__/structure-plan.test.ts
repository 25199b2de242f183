import { describe, expect, it } from "@jest/globals";
import { GenerationError } from "#roadmap/ai/error.js";
import type { BookInfo, UserLevel } from "#roadmap/ai/roadmap/schemas.js";
import {
  ScriptedGenerator,
  createTestStage,
  createTestState,
  stagePlanText,
} from "../../../../../test/scripted-generator.js";
import { runNode } from "../../../node-shared.js";
import { defaultStages } from "../default-stages.js";
import { createStructurePlan } from "../index.js";

const book: BookInfo = {
  title: "Linear Algebra Done Right",
  author: "Sheldon Axler",
  year: "2015",
  rating: 4.5,
  reviewCount: 800,
  rationale: "Proof-based linear algebra",
  score: 30,
};

describe("Estructurador_Plan", () => {
  it("parses the generated stages", async () => {
    const generator = new ScriptedGenerator({
      structuring: stagePlanText(["Programming", "Linear Algebra", "Statistics", "Models"]),
    });

    const update = await runNode(createStructurePlan(generator), createTestState());

    expect(update.stages?.map((stage) => stage.name)).toEqual([
      "Programming",
      "Linear Algebra",
      "Statistics",
      "Models",
    ]);
    expect(update.stages?.[1]).toEqual({
      name: "Linear Algebra",
      description: "Work through Linear Algebra.",
      duration: "4 weeks",
      prerequisites: ["Programming"],
      objectives: ["Study Linear Algebra"],
      covered: false,
    });
    expect(update.booksByStage).toEqual({});
    expect(update.bookSearchIterations).toEqual({});
  });

  it("keeps only the first seven stages", async () => {
    const names = ["A1", "B2", "C3", "D4", "E5", "F6", "G7"];
    const generator = new ScriptedGenerator({
      structuring: `${stagePlanText(names)}\n\nStage 7: H8\nDescription: One too many`,
    });

    const update = await runNode(createStructurePlan(generator), createTestState());

    expect(update.stages?.map((stage) => stage.name)).toEqual(names);
  });

  const templateSizes: Array<[UserLevel, number]> = [
    ["beginner", 5],
    ["intermediate", 4],
    ["advanced", 3],
  ];

  it.each(templateSizes)("uses the %s template when fewer than three stages are parsed", async (level, count) => {
    const generator = new ScriptedGenerator({ structuring: stagePlanText(["Only", "Two"]) });

    const update = await runNode(createStructurePlan(generator), createTestState({ userLevel: level }));

    expect(update.stages).toEqual(defaultStages("Machine Learning", level));
    expect(update.stages).toHaveLength(count);
  });

  it("uses the template when generation fails", async () => {
    const generator = new ScriptedGenerator({ structuring: new GenerationError("down") });

    const update = await runNode(createStructurePlan(generator), createTestState());

    expect(update.stages?.[0].name).toBe("Introduction to Machine Learning");
  });

  it("carries coverage and books of surviving stages through a replan", async () => {
    const generator = new ScriptedGenerator({
      structuring: stagePlanText(["Programming", "Linear Algebra", "Probability"]),
    });
    const state = createTestState({
      stages: [
        createTestStage("Programming", { covered: true }),
        createTestStage("Linear Algebra", { covered: true }),
        createTestStage("Calculus"),
      ],
      booksByStage: { "Linear Algebra": [book, { ...book, title: "Matrix Analysis" }], Calculus: [] },
      bookSearchIterations: { Programming: 3, "Linear Algebra": 1, Calculus: 0 },
      replanGuidance: "Replace Calculus with Probability",
    });

    const update = await runNode(createStructurePlan(generator), state);

    expect(update.stages?.map((stage) => [stage.name, stage.covered])).toEqual([
      ["Programming", true],
      ["Linear Algebra", true],
      ["Probability", false],
    ]);
    expect(Object.keys(update.booksByStage ?? {})).toEqual(["Linear Algebra"]);
    expect(update.bookSearchIterations).toEqual({ Programming: 3, "Linear Algebra": 1 });
    expect(generator.calls[0].prompt).toContain("Replace Calculus with Probability");
    expect(generator.calls[0].prompt).toContain("Stage 3: Calculus");
  });

  it("keeps the current plan when a revision cannot be parsed", async () => {
    const generator = new ScriptedGenerator({ structuring: "I would rather not." });
    const stages = ["Programming", "Statistics", "Models"].map((name) => createTestStage(name));

    const update = await runNode(createStructurePlan(generator), createTestState({ stages }));

    expect(update.stages).toEqual(stages);
  });
});
