import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterAll, describe, expect, it } from "vitest";
import { loadDashboardConfig, parseDashboardConfig } from "../src/config.js";
import { createDashboardComposer } from "../src/dashboard.js";
import { ConfigurationError } from "../src/errors.js";
import { catchError, salesTable, styleTables } from "./helpers.js";

describe("parseDashboardConfig", () => {
  it("maps snake_case keys onto compose and export options", () => {
    const { config, messages } = parseDashboardConfig({
      sheet_name: "Q1",
      index_column: "Region",
      drop_rows: ["Sub total"],
      column_groups: [["Win rate", "Deals"], ["Revenue"]],
      title_prefix: "FY24",
      custom_titles: { "0": "Pipeline" },
      value_formats: { "Win rate": { is_percentage: true }, "1": { Revenue: { precision: 2 } } },
      color_schemes: ["vibrant", "pastel"],
      bg_style: "classic",
      layouts: { "0": { rows: 1, cols: 2, share_y: false } },
      bar_styles: { "0": { Deals: { bar_fill: "#112233", bar_alpha: 0.5 } } },
      y_labels: "Amount",
      show_values: false,
      value_rotation: 45,
      export: { output_path: "out", dpi: 150, format: "svg" },
    });

    expect(messages).toEqual([]);
    expect(config).not.toBeNull();
    if (!config) return;
    expect(config.sheetName).toBe("Q1");
    expect(config.indexColumn).toBe("Region");
    expect(config.dropRows).toEqual(["Sub total"]);
    expect(config.columnGroups).toEqual([["Win rate", "Deals"], ["Revenue"]]);
    expect(config.export).toEqual({ outputPath: "out", dpi: 150, format: "svg" });

    const c = config.compose;
    expect(c.titlePrefix).toBe("FY24");
    expect({ ...c.customTitles }).toEqual({ "0": "Pipeline" });
    expect({ ...c.valueFormats?.byColumn }).toEqual({ "Win rate": { isPercentage: true } });
    expect({ ...c.valueFormats?.byGroup?.["1"] }).toEqual({ Revenue: { precision: 2 } });
    expect(c.colorSchemeCycle).toEqual(["vibrant", "pastel"]);
    expect(c.colorSchemes).toBeUndefined();
    expect(c.bgStyle).toBe("classic");
    expect(c.layouts?.["0"]).toEqual({ rows: 1, cols: 2, shareY: false });
    expect(c.barStyles?.["0"]?.["Deals"]).toEqual({ barFill: "#112233", barAlpha: 0.5 });
    expect(c.yLabels).toEqual({ kind: "global", label: "Amount" });
    expect(c.showValues).toBe(false);
    expect(c.valueRotation).toBe(45);
  });

  it("reads an object of color schemes as a group map and y_labels as a column map", () => {
    const { config } = parseDashboardConfig({ color_schemes: { "1": "brand" }, y_labels: { Deals: "Hits" } });
    expect({ ...config?.compose.colorSchemes }).toEqual({ "1": "brand" });
    const yLabels = config?.compose.yLabels;
    expect(yLabels?.kind).toBe("per_column");
    if (yLabels?.kind === "per_column") expect({ ...yLabels.labels }).toEqual({ Deals: "Hits" });
  });

  it("collects every problem before giving up", () => {
    const { config, messages } = parseDashboardConfig({
      colour: "red",
      custom_titles: { first: "x" },
      value_formats: { Deals: { precision: 20 }, Revenue: { scale: 2 } },
      export: { format: "gif" },
    });
    expect(config).toBeNull();
    expect(messages.map((m) => [m.severity, m.key])).toEqual([
      ["warning", "colour"],
      ["error", "custom_titles[first]"],
      ["error", "value_formats.Deals.precision"],
      ["error", "value_formats[Revenue]"],
      ["error", "export.format"],
    ]);
  });

  it("reads an index key with an empty object as an empty group entry", () => {
    const { config, messages } = parseDashboardConfig({ value_formats: { "0": {} } });
    expect(messages).toEqual([]);
    expect({ ...config?.compose.valueFormats?.byColumn }).toEqual({});
    expect({ ...config?.compose.valueFormats?.byGroup?.["0"] }).toEqual({});
    const artifact = createDashboardComposer(styleTables).compose(salesTable(), "Q1", [["Deals"]], config?.compose);
    expect(artifact.units).toHaveLength(1);
  });

  it("keeps unknown keys as warnings only", () => {
    const { config, messages } = parseDashboardConfig({ theme: "dark" });
    expect(config).not.toBeNull();
    expect(messages.map((m) => m.code)).toEqual(["BD_CONFIG_UNKNOWN_KEY"]);
  });

  it("rejects a non-object root", () => {
    expect(parseDashboardConfig([]).config).toBeNull();
  });

  it("produces options the composer accepts", () => {
    const { config } = parseDashboardConfig({
      custom_titles: { "0": "Pipeline" },
      value_formats: { "0": { Deals: { is_percentage: true, precision: 0 } } },
    });
    const artifact = createDashboardComposer(styleTables).compose(salesTable(), "Q1", [["Deals"]], config?.compose);
    expect(artifact.units[0]?.provenance.title).toBe("Pipeline");
    expect(artifact.units[0]?.chart.subplots[0]?.bars.map((b) => b.label)).toEqual(["12%", "30%", "7%"]);
  });
});

describe("loadDashboardConfig", () => {
  const dir = mkdtempSync(join(tmpdir(), "barboard-config-"));
  afterAll(() => rmSync(dir, { recursive: true, force: true }));

  it("loads a file from disk", () => {
    const path = join(dir, "ok.json");
    writeFileSync(path, JSON.stringify({ title_prefix: "FY24" }));
    expect(loadDashboardConfig(path).config.compose.titlePrefix).toBe("FY24");
  });

  it("throws ConfigurationError for unreadable JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");
    expect(catchError(ConfigurationError, () => loadDashboardConfig(path)).key).toBe("config");
  });

  it("throws ConfigurationError carrying every error message", () => {
    const path = join(dir, "invalid.json");
    writeFileSync(path, JSON.stringify({ show_values: "yes", layouts: { "0": { rows: 0 } } }));
    const e = catchError(ConfigurationError, () => loadDashboardConfig(path));
    expect(e.messages.map((m) => m.key)).toEqual(["layouts[0].rows", "show_values"]);
    expect(e.key).toBe("layouts[0].rows");
  });
});
