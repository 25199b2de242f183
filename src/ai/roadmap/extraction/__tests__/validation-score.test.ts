import { describe, expect, it } from "@jest/globals";
import { extractValidationScore } from "../validation-score.js";

describe("extractValidationScore", () => {
  it("reads an n/10 score", () => {
    expect(extractValidationScore("Overall score: 8/10\nOrdering is sound.")).toBe(8);
  });

  it("falls back to a labelled score", () => {
    expect(extractValidationScore("Score: 4 - objectives are thin")).toBe(4);
  });

  it("clamps to the 1-10 scale", () => {
    expect(extractValidationScore("11/10, flawless")).toBe(10);
    expect(extractValidationScore("0/10")).toBe(1);
  });

  it("returns undefined without a score", () => {
    expect(extractValidationScore("Looks reasonable overall.")).toBeUndefined();
  });
});
