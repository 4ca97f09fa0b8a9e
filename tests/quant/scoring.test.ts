/**
 * Gap Scoring & Ranking Tests
 */

import { describe, it, expect } from "vitest";
import { scoreIvGap, rankScoreEntries, compareScoreDesc } from "../../src/quant/scoring.js";

describe("scoreIvGap", () => {
  it("should compute gap and ratio score", () => {
    const { gap, score } = scoreIvGap(0.35, 0.25);
    expect(gap).toBeCloseTo(0.1, 12);
    expect(score).toBeCloseTo(0.4, 12);
  });

  it("should return zeros when iv equals rv", () => {
    expect(scoreIvGap(0.3, 0.3)).toEqual({ gap: 0, score: 0 });
  });

  it("should return nulls for zero rv", () => {
    expect(scoreIvGap(0.3, 0)).toEqual({ gap: null, score: null });
  });

  it("should return nulls when either input is missing", () => {
    expect(scoreIvGap(null, 0.2)).toEqual({ gap: null, score: null });
    expect(scoreIvGap(0.2, null)).toEqual({ gap: null, score: null });
  });

  it("should give a negative score when options are cheap", () => {
    expect(scoreIvGap(0.2, 0.4).score).toBeCloseTo(-0.5, 12);
  });
});

describe("compareScoreDesc", () => {
  it("should sort absent scores after every present score", () => {
    expect(compareScoreDesc({ ticker: "A", score: null }, { ticker: "B", score: -5 })).toBeGreaterThan(0);
    expect(compareScoreDesc({ ticker: "A", score: -5 }, { ticker: "B", score: null })).toBeLessThan(0);
    expect(compareScoreDesc({ ticker: "A", score: null }, { ticker: "B", score: null })).toBe(0);
  });

  it("should break score ties by ticker", () => {
    expect(compareScoreDesc({ ticker: "AAA", score: 0.2 }, { ticker: "BBB", score: 0.2 })).toBeLessThan(0);
  });
});

describe("rankScoreEntries", () => {
  const entries = [
    { ticker: "LOW", score: -0.1 },
    { ticker: "N1", score: null },
    { ticker: "HIGH", score: 0.9 },
    { ticker: "N2", score: null },
    { ticker: "MID", score: 0.3 },
    { ticker: "N3", score: null },
  ];

  it("should rank scored entries descending, then append unscored ones", () => {
    const ranked = rankScoreEntries(entries, { top: 10 });
    expect(ranked.map((e) => e.ticker)).toEqual(["HIGH", "MID", "LOW", "N1", "N2", "N3"]);
  });

  it("should cap the two groups separately", () => {
    const ranked = rankScoreEntries(entries, { top: 2, maxUnscored: 1 });
    expect(ranked.map((e) => e.ticker)).toEqual(["HIGH", "MID", "N1"]);
  });

  it("should default to 10 unscored entries", () => {
    const many = Array.from({ length: 15 }, (_, i) => ({ ticker: `U${i}`, score: null }));
    expect(rankScoreEntries(many, { top: 5 })).toHaveLength(10);
  });

  it("scored order should not depend on input order", () => {
    const reversed = [...entries].reverse();
    const a = rankScoreEntries(entries, { top: 10 }).filter((e) => e.score !== null);
    const b = rankScoreEntries(reversed, { top: 10 }).filter((e) => e.score !== null);
    expect(b.map((e) => e.ticker)).toEqual(a.map((e) => e.ticker));
  });

  it("unscored entries should keep their relative input order", () => {
    const reversed = [...entries].reverse();
    const ranked = rankScoreEntries(reversed, { top: 10 });
    expect(ranked.slice(3).map((e) => e.ticker)).toEqual(["N3", "N2", "N1"]);
  });

  it("should not mutate its input", () => {
    const copy = entries.map((e) => ({ ...e }));
    rankScoreEntries(entries, { top: 1 });
    expect(entries).toEqual(copy);
  });
});
