/**
 * Purpose: Load the named palettes, background variants, and bar defaults used for styling.
 * Intent: Build one immutable table set at engine start and pass it by reference.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { asString, err, hasErrors, isPlainObject, safeEntries } from "./diagnostics.js";
import { deepFreeze } from "./data_table.js";
import { ConfigurationError } from "./errors.js";
import type { DashboardMessage } from "./types.js";

export interface BackgroundVariant {
  gridVisible: boolean;
  gridAlpha: number;
  fontWeightTitle: string;
  plotBackground: string;
}

export interface BarDefaults {
  edgeColor: string;
  edgeWidth: number;
  alpha: number;
}

export interface StyleTables {
  readonly schemes: Readonly<Record<string, readonly string[]>>;
  readonly backgrounds: Readonly<Record<string, Readonly<BackgroundVariant>>>;
  readonly bar: Readonly<BarDefaults>;
}

export const DEFAULT_STYLE_TABLES_PATH = fileURLToPath(new URL("../config/style_tables.json", import.meta.url));

function isUnitInterval(v: unknown): v is number {
  return typeof v === "number" && Number.isFinite(v) && v >= 0 && v <= 1;
}

function parseSchemes(raw: unknown, messages: DashboardMessage[]): Record<string, readonly string[]> {
  const out: Record<string, readonly string[]> = Object.create(null);
  if (!isPlainObject(raw)) {
    err(messages, "BD_STYLE_SCHEMES", "schemes must be an object of palette arrays", { key: "schemes" });
    return out;
  }
  for (const [name, palette] of safeEntries(raw)) {
    const key = `schemes.${name}`;
    if (!Array.isArray(palette) || palette.length === 0) {
      err(messages, "BD_STYLE_PALETTE", "palette must be a non-empty array of colors", { key });
      continue;
    }
    const colors = palette.map(asString);
    if (colors.some((c) => c === null)) {
      err(messages, "BD_STYLE_PALETTE_COLOR", "palette colors must be non-empty strings", { key });
      continue;
    }
    out[name] = colors.filter((c): c is string => c !== null);
  }
  if (Object.keys(raw).length === 0) {
    err(messages, "BD_STYLE_SCHEMES", "at least one color scheme is required", { key: "schemes" });
  }
  return out;
}

function parseBackground(raw: unknown, key: string, messages: DashboardMessage[]): BackgroundVariant | null {
  if (!isPlainObject(raw)) {
    err(messages, "BD_STYLE_BACKGROUND", "background variant must be an object", { key });
    return null;
  }

  const gridVisible = typeof raw.grid_visible === "boolean" ? raw.grid_visible : null;
  if (gridVisible === null) {
    err(messages, "BD_STYLE_BACKGROUND", "grid_visible must be a boolean", { key: `${key}.grid_visible` });
  }
  const gridAlpha = isUnitInterval(raw.grid_alpha) ? raw.grid_alpha : null;
  if (gridAlpha === null) {
    err(messages, "BD_STYLE_BACKGROUND", "grid_alpha must be a number in [0, 1]", { key: `${key}.grid_alpha` });
  }
  const fontWeightTitle = asString(raw.font_weight_title);
  if (!fontWeightTitle) {
    err(messages, "BD_STYLE_BACKGROUND", "font_weight_title must be a non-empty string", { key: `${key}.font_weight_title` });
  }
  const plotBackground = raw.plot_background === undefined ? "#ffffff" : asString(raw.plot_background);
  if (!plotBackground) {
    err(messages, "BD_STYLE_BACKGROUND", "plot_background must be a non-empty string", { key: `${key}.plot_background` });
  }

  if (gridVisible === null || gridAlpha === null || !fontWeightTitle || !plotBackground) return null;
  return { gridVisible, gridAlpha, fontWeightTitle, plotBackground };
}

function parseBar(raw: unknown, messages: DashboardMessage[]): BarDefaults {
  const fallback: BarDefaults = { edgeColor: "none", edgeWidth: 0, alpha: 0.9 };
  if (raw === undefined) return fallback;
  if (!isPlainObject(raw)) {
    err(messages, "BD_STYLE_BAR", "bar must be an object", { key: "bar" });
    return fallback;
  }

  const edgeColor = raw.edge_color === undefined ? fallback.edgeColor : asString(raw.edge_color);
  if (!edgeColor) err(messages, "BD_STYLE_BAR", "edge_color must be a non-empty string", { key: "bar.edge_color" });

  const rawWidth = raw.edge_width ?? fallback.edgeWidth;
  const edgeWidth = typeof rawWidth === "number" && Number.isFinite(rawWidth) && rawWidth >= 0 ? rawWidth : null;
  if (edgeWidth === null) err(messages, "BD_STYLE_BAR", "edge_width must be a finite number >= 0", { key: "bar.edge_width" });

  const rawAlpha = raw.alpha ?? fallback.alpha;
  const alpha = isUnitInterval(rawAlpha) ? rawAlpha : null;
  if (alpha === null) err(messages, "BD_STYLE_BAR", "alpha must be a number in [0, 1]", { key: "bar.alpha" });

  return {
    edgeColor: edgeColor ?? fallback.edgeColor,
    edgeWidth: edgeWidth ?? fallback.edgeWidth,
    alpha: alpha ?? fallback.alpha,
  };
}

export function validateStyleTables(raw: unknown): { tables: StyleTables | null; messages: DashboardMessage[] } {
  const messages: DashboardMessage[] = [];
  if (!isPlainObject(raw)) {
    err(messages, "BD_STYLE_ROOT", "style tables must be a JSON object");
    return { tables: null, messages };
  }

  const schemes = parseSchemes(raw.schemes, messages);

  const backgrounds: Record<string, BackgroundVariant> = Object.create(null);
  if (!isPlainObject(raw.backgrounds)) {
    err(messages, "BD_STYLE_BACKGROUNDS", "backgrounds must be an object of variants", { key: "backgrounds" });
  } else {
    for (const [name, variant] of safeEntries(raw.backgrounds)) {
      const parsed = parseBackground(variant, `backgrounds.${name}`, messages);
      if (parsed) backgrounds[name] = parsed;
    }
  }

  const bar = parseBar(raw.bar, messages);

  if (hasErrors(messages)) return { tables: null, messages };
  return { tables: deepFreeze({ schemes, backgrounds, bar }), messages };
}

export function parseStyleTables(raw: unknown): StyleTables {
  const { tables, messages } = validateStyleTables(raw);
  if (!tables) throw ConfigurationError.fromMessages("Invalid style tables", messages);
  return tables;
}

export function loadStyleTables(path: string = DEFAULT_STYLE_TABLES_PATH): StyleTables {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf8"));
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigurationError(`Cannot read style tables from ${path}: ${reason}`, "styles");
  }
  return parseStyleTables(raw);
}
