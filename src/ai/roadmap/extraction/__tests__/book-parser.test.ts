import { describe, expect, it } from "@jest/globals";
import { bookScore, parseBookCandidates } from "../book-parser.js";

describe("parseBookCandidates", () => {
  it("parses separated blocks and drops unrated candidates", () => {
    const text = [
      "Title: Hands-On Machine Learning",
      "Author: Aurélien Géron",
      "Year: 2019 (2nd edition)",
      "Rating: 4.6/5",
      "Reviews: 3,400",
      "Why: Practical introduction with code",
      "---",
      'Title: "Pattern Recognition and Machine Learning"',
      "Author: Christopher Bishop",
      "Year: 2006",
      "Rating: 4.3 out of 5",
      "Reviews: 900",
      "Why: Rigorous probabilistic treatment",
      "---",
      "Title: Unrated Book",
      "Author: Someone",
      "Rating: excellent",
      "---",
    ].join("\n");

    const { books, dropped } = parseBookCandidates(text);

    expect(dropped).toBe(1);
    expect(books).toHaveLength(2);
    expect(books[0]).toEqual({
      title: "Hands-On Machine Learning",
      author: "Aurélien Géron",
      year: "2019",
      rating: 4.6,
      reviewCount: 3400,
      rationale: "Practical introduction with code",
      score: bookScore(4.6, 3400),
    });
    expect(books[1].title).toBe("Pattern Recognition and Machine Learning");
    expect(books[1].rating).toBe(4.3);
  });

  it("starts a new block on a repeated title and fills defaults", () => {
    const { books } = parseBookCandidates("Title: A\nRating: 4.5/5\nTitle: B\nRating: 4.8 stars");

    expect(books.map((book) => book.title)).toEqual(["A", "B"]);
    expect(books[0].author).toBe("Unknown");
    expect(books[0].reviewCount).toBe(0);
    expect(books[0].rationale).toBe("Recommended for this stage");
    expect(books[0].year).toBeUndefined();
  });

  it("returns no books for free text", () => {
    expect(parseBookCandidates("I could not find any books.")).toEqual({ books: [], dropped: 0 });
  });
});

describe("bookScore", () => {
  it("weights the rating by the log of the review count", () => {
    expect(bookScore(4.5, 99)).toBeCloseTo(4.5 * Math.log(100));
    expect(bookScore(4.9, 0)).toBe(0);
  });
});
