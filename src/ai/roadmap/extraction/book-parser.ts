/**
 * Book candidate extraction from grounded search answers.
 *
 * Expected block format, blocks separated by a line containing only "---":
 *
 *   Title: Deep Learning
 *   Author: Ian Goodfellow
 *   Year: 2016
 *   Rating: 4.4/5
 *   Reviews: 5200
 *   Why: Standard reference for neural network theory
 */

import { BookInfo, BookInfoSchema } from "../schemas.js";
import { extractRating } from "./rating.js";

const FIELD_LINE = /^(?:[-*]\s*)?(?:\*\*)?(title|author|year|rating|reviews|why)(?:\*\*)?\s*:\s*(.*)$/i;
const YEAR_PATTERN = /\b(1[5-9]\d{2}|20\d{2})\b/;

interface RawBlock {
  title?: string;
  author?: string;
  year?: string;
  rating?: string;
  reviews?: string;
  why?: string;
}

export interface ParsedCandidates {
  books: BookInfo[];
  /** Blocks with a title that were discarded (no rating, invalid fields). */
  dropped: number;
}

/**
 * rating × ln(reviewCount + 1): favours well-reviewed books over a perfect
 * score from a handful of readers.
 */
export function bookScore(rating: number, reviewCount: number): number {
  return rating * Math.log(reviewCount + 1);
}

function parseReviewCount(value: string | undefined): number {
  if (!value) return 0;
  const match = /(\d[\d,]*)/.exec(value);
  return match ? Number.parseInt(match[1].replace(/,/g, ""), 10) : 0;
}

function toBook(block: RawBlock): BookInfo | undefined {
  if (!block.title || block.rating === undefined) {
    return undefined;
  }
  const rating = extractRating(block.rating);
  if (rating === undefined) {
    return undefined;
  }
  const reviewCount = parseReviewCount(block.reviews);
  const year = block.year ? YEAR_PATTERN.exec(block.year)?.[1] : undefined;

  const parsed = BookInfoSchema.safeParse({
    title: block.title.replace(/^["“]|["”]$/g, "").trim(),
    author: block.author || "Unknown",
    year,
    rating,
    reviewCount,
    rationale: block.why || "Recommended for this stage",
    score: bookScore(rating, reviewCount),
  });
  return parsed.success ? parsed.data : undefined;
}

export function parseBookCandidates(text: string): ParsedCandidates {
  const blocks: RawBlock[] = [];
  let current: RawBlock = {};

  const flush = () => {
    if (current.title) {
      blocks.push(current);
    }
    current = {};
  };

  for (const rawLine of text.split("\n")) {
    const line = rawLine.trim();
    if (line === "---") {
      flush();
      continue;
    }
    const field = FIELD_LINE.exec(line);
    if (!field) continue;

    const key = field[1].toLowerCase();
    const value = field[2].trim();
    if (key === "title") {
      // A new title without a separator still starts a new block
      if (current.title) flush();
      current.title = value;
    } else if (key === "author") {
      current.author = value;
    } else if (key === "year") {
      current.year = value;
    } else if (key === "rating") {
      current.rating = value;
    } else if (key === "reviews") {
      current.reviews = value;
    } else {
      current.why = value;
    }
  }
  flush();

  const books: BookInfo[] = [];
  for (const block of blocks) {
    const book = toBook(block);
    if (book) books.push(book);
  }
  return { books, dropped: blocks.length - books.length };
}
