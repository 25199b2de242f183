import { describe, expect, it } from "@jest/globals";
import type { BookInfo } from "#roadmap/ai/roadmap/schemas.js";
import { createTestStage, createTestState } from "../../../test/scripted-generator.js";
import {
  decideBookSearch,
  decideStageCoverage,
  decideValidation,
  shouldContinueOrEnd,
} from "../decisions.js";

function book(title: string): BookInfo {
  return { title, author: "Test Author", rating: 4.5, reviewCount: 10, rationale: "Useful", score: 1 };
}

const stages = ["Statistics", "Regression", "Models"].map((name) => createTestStage(name));

describe("decideBookSearch", () => {
  const base = createTestState({ stages, stageBeingProcessed: "Regression" });

  it("accepts the current books once the search budget is spent", () => {
    const state = {
      ...base,
      bookSearchIterations: { Regression: 3 },
      knowledgeGaps: ["Regression: only 0 of 2 recommended books found"],
    };
    expect(decideBookSearch(state)).toBe("aceptar_libros_actuales");
  });

  it("moves on with enough books", () => {
    const state = {
      ...base,
      bookSearchIterations: { Regression: 1 },
      booksByStage: { Regression: [book("One"), book("Two")] },
    };
    expect(decideBookSearch(state)).toBe("libros_suficientes");
  });

  it("searches specifically when the stage has open gaps", () => {
    const state = {
      ...base,
      bookSearchIterations: { Regression: 2 },
      knowledgeGaps: ["Regression: only 1 of 2 recommended books found"],
    };
    expect(decideBookSearch(state)).toBe("busqueda_especifica");
  });

  it("ignores gaps of other stages", () => {
    const state = {
      ...base,
      bookSearchIterations: { Regression: 1 },
      knowledgeGaps: ["Statistics: only 1 of 2 recommended books found"],
    };
    expect(decideBookSearch(state)).toBe("reintentar_busqueda");
  });

  it("does not take gaps of a stage whose name extends the selected one", () => {
    const state = createTestState({
      stages: ["Calculus", "Calculus: Integrals", "Series"].map((name) => createTestStage(name)),
      stageBeingProcessed: "Calculus",
      bookSearchIterations: { Calculus: 1 },
      knowledgeGaps: ["Calculus: Integrals: only 0 of 2 recommended books found"],
    });
    expect(decideBookSearch(state)).toBe("reintentar_busqueda");
  });

  it("has nothing to search without a selected stage", () => {
    expect(decideBookSearch({ ...base, stageBeingProcessed: null })).toBe("libros_suficientes");
  });

  it("checks the ceiling before the book count", () => {
    const state = {
      ...base,
      bookSearchIterations: { Regression: 3 },
      booksByStage: { Regression: [book("One"), book("Two")] },
    };
    expect(decideBookSearch(state)).toBe("aceptar_libros_actuales");
  });
});

describe("decideStageCoverage", () => {
  it("continues while a stage is uncovered", () => {
    expect(decideStageCoverage({ stages })).toBe("siguiente_etapa");
  });

  it("moves to validation once every stage is covered", () => {
    const covered = stages.map((stage) => ({ ...stage, covered: true }));
    expect(decideStageCoverage({ stages: covered })).toBe("validacion_global");
  });
});

describe("decideValidation", () => {
  const critical = ["Validation 1: score 3/10 is below 6"];

  it("forces the exit at the validation ceiling", () => {
    expect(
      decideValidation({
        validationIterations: 5,
        planRefinementIterations: 0,
        validationFeedback: critical,
      })
    ).toBe("forzar_salida");
  });

  it("replans critical feedback while refinements remain", () => {
    expect(
      decideValidation({
        validationIterations: 2,
        planRefinementIterations: 1,
        validationFeedback: critical,
      })
    ).toBe("replantear");
  });

  it("formats once refinements are spent", () => {
    expect(
      decideValidation({
        validationIterations: 3,
        planRefinementIterations: 2,
        validationFeedback: critical,
      })
    ).toBe("formatear");
  });

  it("formats a plan without critical feedback", () => {
    expect(
      decideValidation({
        validationIterations: 1,
        planRefinementIterations: 0,
        validationFeedback: [],
      })
    ).toBe("formatear");
  });
});

describe("shouldContinueOrEnd", () => {
  it("ends once the output exists", () => {
    expect(shouldContinueOrEnd({ finalOutput: null })).toBe("continue");
    expect(shouldContinueOrEnd({ finalOutput: "done" })).toBe("end");
  });
});
