/**
 * Purpose: Write rendered chart units to disk as SVG or PNG.
 * Intent: Report per file so one failed write never discards the others.
 */

import * as fs from "node:fs/promises";
import { dirname } from "node:path";
import { Resvg } from "@resvg/resvg-js";
import { ConfigurationError } from "./errors.js";
import type { DashboardArtifact } from "./types.js";

export type ExportFormat = "png" | "svg";

export const DEFAULT_DPI = 300;
// Chart geometry is laid out at this many px per inch.
const BASE_DPI = 100;

export interface ExportOptions {
  /** Prefix for every file; the group index and extension are appended. */
  outputPath: string;
  format?: ExportFormat;
  dpi?: number;
}

export interface ExportDeps {
  writeFile(path: string, data: string | Uint8Array): Promise<void>;
  rasterize(svg: string, dpi: number): Uint8Array;
}

export interface ExportResult {
  groupIndex: number;
  path: string;
  ok: boolean;
  error?: string;
}

export function rasterizeSvg(svg: string, dpi: number): Uint8Array {
  const resvg = new Resvg(svg, {
    fitTo: { mode: "zoom", value: dpi / BASE_DPI },
    background: "#ffffff",
    font: { loadSystemFonts: true, defaultFontFamily: "Arial" },
  });
  return resvg.render().asPng();
}

export const defaultExportDeps: ExportDeps = {
  async writeFile(path, data) {
    await fs.mkdir(dirname(path), { recursive: true });
    await fs.writeFile(path, data);
  },
  rasterize: rasterizeSvg,
};

export function exportPath(outputPath: string, groupIndex: number, format: ExportFormat): string {
  return `${outputPath}${groupIndex}.${format}`;
}

export async function exportDashboard(
  artifact: DashboardArtifact,
  options: ExportOptions,
  deps: ExportDeps = defaultExportDeps
): Promise<ExportResult[]> {
  const format = options.format ?? "png";
  const dpi = options.dpi ?? DEFAULT_DPI;
  if (format !== "png" && format !== "svg") {
    throw new ConfigurationError(`Unsupported export format: ${String(format)}`, "export.format");
  }
  if (!Number.isInteger(dpi) || dpi < 1) {
    throw new ConfigurationError(`dpi must be a positive integer, got ${dpi}`, "export.dpi");
  }

  const results: ExportResult[] = [];
  for (const unit of artifact.units) {
    const { groupIndex } = unit.provenance;
    const path = exportPath(options.outputPath, groupIndex, format);
    try {
      const data = format === "svg" ? unit.chart.svg : deps.rasterize(unit.chart.svg, dpi);
      await deps.writeFile(path, data);
      results.push({ groupIndex, path, ok: true });
    } catch (e) {
      results.push({ groupIndex, path, ok: false, error: e instanceof Error ? e.message : String(e) });
    }
  }
  return results;
}
