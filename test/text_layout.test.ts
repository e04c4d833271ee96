import { describe, expect, it } from "vitest";
import { barDomain, decimalsForStep, niceTicks } from "../src/chart_math.js";
import { charsForWidth, estimateTextWidth, wrapText } from "../src/text_layout.js";

describe("wrapText", () => {
  it("wraps greedily at word boundaries", () => {
    expect(wrapText("Alpha beta gamma", 10)).toEqual(["Alpha beta", "gamma"]);
  });

  it("truncates whatever does not fit in the last line", () => {
    expect(wrapText("Quarterly revenue by region", 12)).toEqual(["Quarterly", "revenue by…"]);
    expect(wrapText("Hello world", 5, 1)).toEqual(["Hell…"]);
  });

  it("hard-splits a word longer than a line", () => {
    expect(wrapText("Supercalifragilistic", 8)).toEqual(["Supercal", "ifragil…"]);
  });

  it("returns no lines for blank text", () => {
    expect(wrapText("   ", 10)).toEqual([]);
  });
});

describe("text metrics", () => {
  it("estimates width from glyph count and font size", () => {
    expect(estimateTextWidth("abcd", 10)).toBeCloseTo(24);
    expect(charsForWidth(100, 10)).toBe(16);
  });
});

describe("axis math", () => {
  it("snaps a bar domain to nice ticks with headroom", () => {
    expect(barDomain([100])).toEqual({ min: 0, max: 150, step: 50, ticks: [0, 50, 100, 150] });
  });

  it("pads both sides when bars grow both ways", () => {
    const domain = barDomain([-10, 20]);
    expect(domain.min).toBe(-20);
    expect(domain.max).toBe(30);
    expect(domain.ticks).toEqual([-20, -10, 0, 10, 20, 30]);
  });

  it("widens a flat range", () => {
    expect(niceTicks(5, 5, 5).ticks).toEqual([4.5, 5, 5.5]);
  });

  it("picks decimals from the tick step", () => {
    expect(decimalsForStep(5)).toBe(0);
    expect(decimalsForStep(0.1)).toBe(1);
    expect(decimalsForStep(0.25)).toBe(2);
  });
});
