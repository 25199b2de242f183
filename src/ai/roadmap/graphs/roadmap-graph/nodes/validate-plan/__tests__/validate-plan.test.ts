import { describe, expect, it } from "@jest/globals";
import { GenerationTimeoutError } from "#roadmap/ai/error.js";
import type { BookInfo } from "#roadmap/ai/roadmap/schemas.js";
import {
  ScriptedGenerator,
  createTestStage,
  createTestState,
} from "../../../../../test/scripted-generator.js";
import { runNode } from "../../../node-shared.js";
import { createValidatePlan, extractIssues } from "../index.js";

function book(title: string, rating: number): BookInfo {
  return { title, author: "Test Author", rating, reviewCount: 10, rationale: "Useful", score: 1 };
}

const state = createTestState({
  stages: ["Statistics", "Regression", "Classification"].map((name) =>
    createTestStage(name, { covered: true })
  ),
  booksByStage: {
    Statistics: [book("All of Statistics", 4.4), book("Think Stats", 4.2)],
    Regression: [book("Regression and Other Stories", 4.6)],
  },
  bookSearchIterations: { Statistics: 1, Regression: 3, Classification: 3 },
  knowledgeGaps: ["Classification: only 0 of 2 recommended books found"],
});

describe("extractIssues", () => {
  it("keeps the first three bullets", () => {
    expect(extractIssues("Score: 4/10\n- One\n* Two\nnot a bullet\n- Three\n- Four")).toEqual([
      "One",
      "Two",
      "Three",
    ]);
  });
});

describe("Validador_Global", () => {
  it("records an acceptable score without feedback", async () => {
    const generator = new ScriptedGenerator({ validation: "Score: 8/10\n- Minor wording issues" });

    await expect(runNode(createValidatePlan(generator), state)).resolves.toEqual({
      validationIterations: 1,
      lastValidationScore: 8,
    });
    expect(generator.calls[0].prompt).toContain(
      "2. Regression (4 weeks): 1 books, average rating 4.6"
    );
    expect(generator.calls[0].prompt).toContain(
      "- Classification: only 0 of 2 recommended books found"
    );
  });

  it("appends feedback for a critical score", async () => {
    const generator = new ScriptedGenerator({
      validation: "Score: 4/10\n- Stage order is confusing\n- Too few exercises\n- Missing projects\n- Fourth issue",
    });

    const update = await runNode(
      createValidatePlan(generator),
      { ...state, validationIterations: 1, validationFeedback: ["Earlier feedback"] }
    );

    expect(update).toEqual({
      validationIterations: 2,
      lastValidationScore: 4,
      validationFeedback: [
        "Earlier feedback",
        "Validation 2: score 4/10 is below 6",
        'Stage "Regression" has 1 of 2 recommended books',
        'Stage "Classification" has 0 of 2 recommended books',
        "Stage order is confusing",
        "Too few exercises",
        "Missing projects",
      ],
    });
  });

  it("assumes a neutral score when validation fails", async () => {
    const generator = new ScriptedGenerator({ validation: new GenerationTimeoutError(500) });

    await expect(runNode(createValidatePlan(generator), state)).resolves.toEqual({
      validationIterations: 1,
      lastValidationScore: 7,
    });
  });
});
