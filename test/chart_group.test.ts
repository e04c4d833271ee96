import { describe, expect, it } from "vitest";
import { renderChartGroup, resolveYLabel, titleLinesFor, type ChartGroupInput } from "../src/chart_group.js";
import { createDataTable } from "../src/data_table.js";
import { ConfigurationError, LayoutError } from "../src/errors.js";
import { planLayout } from "../src/layout_plan.js";
import { resolveStyle } from "../src/style_resolve.js";
import type { Cell, ColumnGroup, FormatClass } from "../src/types.js";
import { formatColumn } from "../src/value_format.js";
import { styleTables } from "./helpers.js";

function inputFor(columns: Record<string, Cell[]>, overrides: Partial<ChartGroupInput> = {}): ChartGroupInput {
  const names: ColumnGroup = Object.keys(columns);
  const rowCount = Object.values(columns)[0]?.length ?? 0;
  const table = createDataTable({
    indexName: "Region",
    index: ["North", "South", "East", "West"].slice(0, rowCount),
    columns: names.map((name) => ({ name, cells: columns[name] ?? [] })),
  });
  const formats = names.map((name) => formatColumn(columns[name] ?? [], name));
  const formatClasses: FormatClass[] = formats.flatMap((f) => (f.ok ? [f.format.formatClass] : []));
  return {
    groupIndex: 0,
    columns: names,
    table,
    title: "Regional share",
    style: resolveStyle(styleTables, "corporate", "presentation", names),
    formats,
    layout: planLayout({ slotCount: names.length, formatClasses }),
    ...overrides,
  };
}

function subplotMarkup(svg: string, column: string): string {
  const start = svg.indexOf(`<g data-column="${column}">`);
  return start < 0 ? "" : svg.slice(start, svg.indexOf("</g>", start));
}

function tickLabels(markup: string): string[] {
  return [...markup.matchAll(/text-anchor="end" dominant-baseline="central">([^<]*)<\/text>/g)].map((m) => m[1] ?? "");
}

function barHeights(markup: string): number[] {
  return [...markup.matchAll(/<rect [^>]*height="([\d.]+)"[^>]*fill-opacity/g)].map((m) => Number(m[1]));
}

describe("renderChartGroup", () => {
  it("renders a single percentage column", () => {
    const unit = renderChartGroup(inputFor({ Share: [0.25, 0.5] }));
    expect(unit.widthPx).toBe(600);
    expect(unit.heightPx).toBe(450);
    expect(unit.titleLines).toEqual(["Regional share"]);
    expect(unit.blankCells).toBe(0);
    expect(unit.svg.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="600" height="450" viewBox="0 0 600 450">')).toBe(
      true
    );

    const [subplot] = unit.subplots;
    expect(subplot).toMatchObject({
      column: "Share",
      titleLines: ["Share"],
      row: 0,
      col: 0,
      yLabel: "Percentage",
      formatClass: "percentage",
      degraded: false,
    });
    expect(subplot?.bars).toEqual([
      { category: "North", value: 0.25, label: "25.0%", fill: "#003f5c", placement: "above" },
      { category: "South", value: 0.5, label: "50.0%", fill: "#003f5c", placement: "above" },
    ]);
  });

  it("labels percentage ticks in display units", () => {
    const unit = renderChartGroup(inputFor({ Share: [0.25, 0.5] }));
    expect(unit.svg).toContain(">60%</text>");
    expect(unit.svg).toContain(">50.0%</text>");
  });

  it("shares one display-unit axis between fraction and point percentages", () => {
    const unit = renderChartGroup(inputFor({ Share: [0.25, 0.5], "Growth rate": [20, 40] }));
    expect(unit.layout.shareY).toBe(true);

    const share = subplotMarkup(unit.svg, "Share");
    const growth = subplotMarkup(unit.svg, "Growth rate");
    for (const markup of [share, growth]) {
      expect(tickLabels(markup)).toEqual(["0%", "20%", "40%", "60%"]);
    }

    const [share25 = 0, share50 = 0] = barHeights(share);
    const [growth20 = 0, growth40 = 0] = barHeights(growth);
    expect(share50 / growth40).toBeCloseTo(1.25, 2);
    expect(share25 / growth20).toBeCloseTo(1.25, 2);
    expect(share50 / share25).toBeCloseTo(2, 2);
  });

  it("escapes text content", () => {
    const unit = renderChartGroup(inputFor({ Share: [0.25] }, { title: "R&D <share>" }));
    expect(unit.svg).toContain(">R&amp;D &lt;share&gt;</text>");
  });

  it("places negative value labels below the bar", () => {
    const unit = renderChartGroup(inputFor({ Delta: [-5] }));
    expect(unit.subplots[0]?.bars[0]?.placement).toBe("below");
  });

  it("moves a label inside the bar when it would leave the plot", () => {
    const input = inputFor({ Units: [56.5] });
    const unit = renderChartGroup({ ...input, layout: planLayout({ slotCount: 1, rows: 2, formatClasses: ["count"] }) });
    expect(unit.blankCells).toBe(1);
    expect(unit.subplots[0]?.bars[0]).toMatchObject({ label: "57", placement: "inside" });
  });

  it("omits labels when showValues is off", () => {
    const unit = renderChartGroup(inputFor({ Share: [0.25] }, { showValues: false }));
    expect(unit.subplots[0]?.bars[0]?.placement).toBeNull();
    expect(unit.svg).not.toContain(">25.0%</text>");
  });

  it("skips grid lines for backgrounds without a grid", () => {
    const input = inputFor({ Share: [0.25] });
    const unit = renderChartGroup({ ...input, style: resolveStyle(styleTables, "corporate", "minimal", ["Share"]) });
    expect(unit.svg).not.toContain('stroke-dasharray="4 3"');
    expect(renderChartGroup(input).svg).toContain('stroke-opacity="0.2"');
  });

  it("keeps degraded columns on the chart with literal labels", () => {
    const unit = renderChartGroup(inputFor({ Deals: [12, 30], Notes: ["10", "n/a"] }));
    const notes = unit.subplots[1];
    expect(notes).toMatchObject({ column: "Notes", degraded: true, formatClass: null, yLabel: "Value", row: 0, col: 1 });
    expect(notes?.bars.map((b) => b.label)).toEqual(["10", "n/a"]);
    expect(notes?.bars.map((b) => b.value)).toEqual([10, null]);
  });

  it("uses custom column titles", () => {
    const unit = renderChartGroup(inputFor({ Deals: [12] }, { columnTitles: { Deals: "Closed deals" } }));
    expect(unit.subplots[0]?.titleLines).toEqual(["Closed deals"]);
  });

  it("refuses formats that do not line up with the columns", () => {
    const input = inputFor({ Deals: [12] });
    expect(() => renderChartGroup({ ...input, formats: [] })).toThrow(ConfigurationError);
  });

  it("refuses a layout with too few cells", () => {
    const input = inputFor({ A: [1], B: [2] });
    expect(() => renderChartGroup({ ...input, layout: { ...input.layout, rows: 1, cols: 1 } })).toThrow(LayoutError);
  });

  it("is deterministic", () => {
    const input = inputFor({ Deals: [12, 30, 7], Revenue: [1200, 34567.8, 980] });
    expect(renderChartGroup(input).svg).toBe(renderChartGroup(input).svg);
  });
});

describe("titleLinesFor", () => {
  it("keeps a title that fits on one line", () => {
    expect(titleLinesFor("Short title", 600)).toEqual(["Short title"]);
  });

  it("wraps a long title into two lines", () => {
    const title = "Quarterly pipeline health for every region and product line in the enterprise segment";
    const lines = titleLinesFor(title, 600);
    expect(lines).toEqual([
      "Quarterly pipeline health for every region",
      "and product line in the enterprise segment",
    ]);
  });
});

describe("resolveYLabel", () => {
  const counts = formatColumn([3, 4], "Deals");
  const decimals = formatColumn([1.5, 4], "Score");

  it("infers Count for integral data and Value otherwise", () => {
    expect(resolveYLabel(undefined, counts)).toBe("Count");
    expect(resolveYLabel(undefined, decimals)).toBe("Value");
  });

  it("uses a global label for every column", () => {
    expect(resolveYLabel({ kind: "global", label: "Units" }, decimals)).toBe("Units");
  });

  it("falls back to Value for columns missing from a per-column map", () => {
    const spec = { kind: "per_column", labels: { Deals: "Hits" } } as const;
    expect(resolveYLabel(spec, counts)).toBe("Hits");
    expect(resolveYLabel(spec, decimals)).toBe("Value");
  });
});
