import { describe, expect, it } from "@jest/globals";
import type { BookInfo } from "#roadmap/ai/roadmap/schemas.js";
import { createTestStage, createTestState } from "../../../../../test/scripted-generator.js";
import { runNode } from "../../../node-shared.js";
import { admitBooks, createQualityGate } from "../index.js";

function book(title: string, rating: number, score: number): BookInfo {
  return { title, author: "Test Author", rating, reviewCount: 10, rationale: "Useful", score };
}

const stages = ["Statistics", "Regression", "Classification"].map((name) => createTestStage(name));

describe("admitBooks", () => {
  it("admits unique titles rated above the threshold, best score first", () => {
    const current = [book("Bayesian Data Analysis", 4.5, 20)];
    const candidates = [
      book("Borderline Book", 4.0, 50),
      book("Statistical Rethinking", 4.8, 30),
      book("  bayesian   data analysis ", 4.9, 40),
      book("Think Bayes", 4.2, 10),
      book("Statistical Rethinking", 4.8, 30),
    ];

    expect(admitBooks(current, candidates).map((b) => b.title)).toEqual([
      "Statistical Rethinking",
      "Bayesian Data Analysis",
      "Think Bayes",
    ]);
  });

  it("keeps the five best books", () => {
    const current = [1, 2, 3, 4].map((n) => book(`Kept ${n}`, 4.5, n * 10));
    const candidates = [book("New 45", 4.5, 45), book("New 5", 4.5, 5), book("New 25", 4.5, 25)];

    expect(admitBooks(current, candidates).map((b) => b.title)).toEqual([
      "New 45",
      "Kept 4",
      "Kept 3",
      "New 25",
      "Kept 2",
    ]);
  });
});

describe("Validador_Calidad", () => {
  it("drains the pool and counts one search", async () => {
    const state = createTestState({
      stages,
      stageBeingProcessed: "Regression",
      pendingCandidates: [book("Regression and Other Stories", 4.6, 25), book("Weak Book", 3.9, 99)],
      booksByStage: { Statistics: [book("All of Statistics", 4.4, 12)] },
      bookSearchIterations: { Statistics: 1, Regression: 1 },
    });

    const update = await runNode(createQualityGate(), state);

    expect(update).toEqual({
      pendingCandidates: [],
      booksByStage: {
        Statistics: [book("All of Statistics", 4.4, 12)],
        Regression: [book("Regression and Other Stories", 4.6, 25)],
      },
      bookSearchIterations: { Statistics: 1, Regression: 2 },
    });
  });

  it("records an attempt even when nothing passes", async () => {
    const state = createTestState({
      stages,
      stageBeingProcessed: "Statistics",
      pendingCandidates: [book("Weak Book", 3.5, 10)],
    });

    const update = await runNode(createQualityGate(), state);

    expect(update.booksByStage).toEqual({ Statistics: [] });
    expect(update.bookSearchIterations).toEqual({ Statistics: 1 });
  });

  it("only clears the pool without a selected stage", async () => {
    await expect(
      runNode(createQualityGate(), createTestState({ pendingCandidates: [book("Stray", 4.5, 1)] }))
    ).resolves.toEqual({ pendingCandidates: [] });
  });
});
