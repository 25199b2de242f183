import { describe, expect, it } from "@jest/globals";
import { extractRating } from "../rating.js";

describe("extractRating", () => {
  it("reads the three supported notations", () => {
    expect(extractRating("4.5/5")).toBe(4.5);
    expect(extractRating("Rated 4.7 out of 5 on Goodreads")).toBe(4.7);
    expect(extractRating("4 stars")).toBe(4);
    expect(extractRating("3.9 star average")).toBe(3.9);
  });

  it("accepts a decimal denominator", () => {
    expect(extractRating("4.2/5.0")).toBe(4.2);
  });

  it("returns undefined for a bare number", () => {
    expect(extractRating("4.5")).toBeUndefined();
    expect(extractRating("excellent")).toBeUndefined();
  });

  it("rejects values outside the scale and other denominators", () => {
    expect(extractRating("7/5")).toBeUndefined();
    expect(extractRating("12/50")).toBeUndefined();
  });
});
