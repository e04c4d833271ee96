/**
 * Purpose: Render one column group into a titled grid of bar subplots.
 * Intent: Produce deterministic SVG plus a structured summary of what was drawn.
 */

import { barDomain, decimalsForStep, px, type AxisTicks } from "./chart_math.js";
import { ConfigurationError, LayoutError } from "./errors.js";
import { el, svgDocument, text } from "./svg.js";
import { charsForWidth, estimateTextWidth, wrapText } from "./text_layout.js";
import { formatNumber, type ColumnFormatResult } from "./value_format.js";
import type {
  BarSummary,
  ChartUnit,
  ColumnGroup,
  ColumnStyle,
  DataTable,
  LabelPlacement,
  LayoutPlan,
  StyleSpec,
  SubplotSummary,
  YLabelSpec,
} from "./types.js";

export const PX_PER_INCH = 100;

const FONT_FAMILY = "Arial, Helvetica, DejaVu Sans, sans-serif";
const TEXT_COLOR = "#1f2333";
const MUTED_COLOR = "#6a718a";
const AXIS_COLOR = "#c9cedf";
const GRID_COLOR = "#8c90a3";
const VALUE_LABEL_COLOR = "#303030";

const TITLE_FONT_SIZE = 20;
const TITLE_LINE_HEIGHT = 26;
const SUBTITLE_FONT_SIZE = 14;
const SUBTITLE_LINE_HEIGHT = 22;
const COLUMN_TITLE_FONT_SIZE = 13;
const COLUMN_TITLE_LINE_HEIGHT = 16;
const AXIS_LABEL_FONT_SIZE = 11;
const TICK_FONT_SIZE = 10;
const VALUE_FONT_SIZE = 10;

const FIGURE_PADDING_X = 32;
const HEADER_TOP = 12;
const HEADER_GAP = 10;
const SUBPLOT_MARGIN = Object.freeze({ top: 44, right: 14, bottom: 50, left: 64 });
const MIN_PLOT_SIZE = 10;
const VALUE_LABEL_OFFSET = 5;
const BAR_WIDTH_RATIO = 0.7;
const COLUMN_TITLE_WRAP = 30;

export interface ChartGroupInput {
  groupIndex: number;
  columns: ColumnGroup;
  table: DataTable;
  title: string;
  subtitle?: string;
  columnTitles?: Readonly<Record<string, string>>;
  xLabel?: string;
  yLabels?: YLabelSpec;
  style: StyleSpec;
  formats: readonly ColumnFormatResult[];
  layout: LayoutPlan;
  showValues?: boolean;
  valueRotation?: number;
}

export function titleLinesFor(title: string, widthPx: number): string[] {
  const trimmed = title.trim();
  if (!trimmed) return [];
  const available = widthPx - 2 * FIGURE_PADDING_X;
  if (estimateTextWidth(trimmed, TITLE_FONT_SIZE) <= available) return [trimmed];
  return wrapText(trimmed, charsForWidth(available, TITLE_FONT_SIZE), 2);
}

export function columnTitleLines(column: string, columnTitles?: Readonly<Record<string, string>>): string[] {
  const custom = columnTitles && Object.hasOwn(columnTitles, column) ? columnTitles[column] : undefined;
  if (custom !== undefined) return [custom];
  return wrapText(column, COLUMN_TITLE_WRAP, 2);
}

function isIntegral(values: readonly (number | null)[]): boolean {
  return values.every((v) => v === null || Math.abs(v - Math.round(v)) < 0.01);
}

export function resolveYLabel(spec: YLabelSpec | undefined, result: ColumnFormatResult): string {
  if (spec?.kind === "global") return spec.label;
  if (spec?.kind === "per_column") {
    return Object.hasOwn(spec.labels, result.column) ? spec.labels[result.column] ?? "Value" : "Value";
  }
  if (!result.ok) return "Value";
  if (result.format.isPercentage) return "Percentage";
  return isIntegral(result.values) ? "Count" : "Value";
}

/** Ticks are already in display units. */
function formatTick(v: number, result: ColumnFormatResult, step: number): string {
  const textValue = formatNumber(v, decimalsForStep(step));
  return result.ok && result.format.isPercentage ? `${textValue}%` : textValue;
}

/** Values as they are labelled: fractions scaled to percentage points. */
function displayValues(result: ColumnFormatResult): (number | null)[] {
  if (!result.ok) return result.values;
  const { scale } = result.format;
  return result.values.map((v) => (v === null ? null : v * scale));
}

function presentValues(values: readonly (number | null)[]): number[] {
  return values.filter((v): v is number => v !== null);
}

function assertAligned(input: ChartGroupInput): void {
  const { columns, formats, style, layout, groupIndex } = input;
  const key = `groups[${groupIndex}]`;
  if (columns.length === 0) throw new ConfigurationError("Column group must not be empty", key);
  columns.forEach((column, i) => {
    if (formats[i]?.column !== column) {
      throw new ConfigurationError(`Value format for ${column} is missing or out of order`, `${key}.formats`);
    }
    if (style.columns[i]?.column !== column) {
      throw new ConfigurationError(`Bar style for ${column} is missing or out of order`, `${key}.style`);
    }
  });
  if (layout.rows * layout.cols < columns.length) {
    throw new LayoutError(`Layout ${layout.rows}x${layout.cols} cannot hold ${columns.length} charts`);
  }
}

interface Cell {
  x: number;
  y: number;
  w: number;
  h: number;
}

interface SubplotContext {
  cell: Cell;
  row: number;
  col: number;
  result: ColumnFormatResult;
  columnStyle: ColumnStyle;
  domain: AxisTicks;
}

function renderSubplot(input: ChartGroupInput, ctx: SubplotContext): { markup: string[]; summary: SubplotSummary } {
  const { style, table } = input;
  const { cell, result, columnStyle, domain } = ctx;
  const showValues = input.showValues ?? true;
  const rotation = input.valueRotation ?? 0;

  const x0 = cell.x + SUBPLOT_MARGIN.left;
  const y0 = cell.y + SUBPLOT_MARGIN.top;
  const plotW = Math.max(MIN_PLOT_SIZE, cell.w - SUBPLOT_MARGIN.left - SUBPLOT_MARGIN.right);
  const plotH = Math.max(MIN_PLOT_SIZE, cell.h - SUBPLOT_MARGIN.top - SUBPLOT_MARGIN.bottom);
  const sy = (v: number) => y0 + plotH - ((v - domain.min) / (domain.max - domain.min)) * plotH;
  const yZero = sy(0);

  const out: string[] = [];
  out.push(el("rect", { x: px(x0), y: px(y0), width: px(plotW), height: px(plotH), fill: style.plotBackground }));

  if (style.gridVisible && style.gridAlpha > 0) {
    const lines = domain.ticks.map((t) => `M ${px(x0)} ${px(sy(t))} L ${px(x0 + plotW)} ${px(sy(t))}`);
    out.push(
      el("path", {
        d: lines.join(" "),
        fill: "none",
        stroke: GRID_COLOR,
        "stroke-opacity": style.gridAlpha,
        "stroke-width": 1,
        "stroke-dasharray": "4 3",
      })
    );
  }

  out.push(
    el("path", {
      d: `M ${px(x0)} ${px(y0)} L ${px(x0)} ${px(y0 + plotH)} L ${px(x0 + plotW)} ${px(y0 + plotH)}`,
      fill: "none",
      stroke: AXIS_COLOR,
      "stroke-width": 1,
    })
  );

  for (const t of domain.ticks) {
    out.push(
      text(formatTick(t, result, domain.step), {
        x: px(x0 - 8),
        y: px(sy(t)),
        fill: MUTED_COLOR,
        "font-size": TICK_FONT_SIZE,
        "text-anchor": "end",
        "dominant-baseline": "central",
      })
    );
  }

  const categories = table.index;
  const band = plotW / Math.max(1, categories.length);
  const barW = Math.max(2, band * BAR_WIDTH_RATIO);
  const inset = (band - barW) / 2;
  const bars: BarSummary[] = [];
  const plotted = displayValues(result);

  categories.forEach((category, j) => {
    const value = result.values[j] ?? null;
    const shown = plotted[j] ?? null;
    const label = result.labels[j] ?? "N/A";
    const bandX = x0 + j * band;

    let placement: LabelPlacement | null = null;
    let labelY = yZero - VALUE_LABEL_OFFSET;
    let labelFill = VALUE_LABEL_COLOR;

    if (shown !== null) {
      const yv = sy(shown);
      out.push(
        el("rect", {
          x: px(bandX + inset),
          y: px(Math.min(yv, yZero)),
          width: px(barW),
          height: px(Math.abs(yZero - yv)),
          fill: columnStyle.barFill,
          "fill-opacity": columnStyle.barAlpha,
          stroke: columnStyle.barEdgeWidth > 0 ? columnStyle.barEdgeColor : "none",
          "stroke-width": columnStyle.barEdgeWidth > 0 ? columnStyle.barEdgeWidth : undefined,
        })
      );

      if (shown >= 0) {
        labelY = yv - VALUE_LABEL_OFFSET;
        placement = "above";
        if (labelY - VALUE_FONT_SIZE < y0) {
          labelY = yv + VALUE_FONT_SIZE + VALUE_LABEL_OFFSET;
          placement = "inside";
        }
      } else {
        labelY = yv + VALUE_LABEL_OFFSET + VALUE_FONT_SIZE;
        placement = "below";
        if (labelY > y0 + plotH) {
          labelY = yv - VALUE_LABEL_OFFSET;
          placement = "inside";
        }
      }
      if (placement === "inside") labelFill = "#ffffff";
    } else if (showValues) {
      placement = "above";
    }

    if (showValues) {
      const cx = bandX + band / 2;
      out.push(
        text(label, {
          x: px(cx),
          y: px(labelY),
          fill: labelFill,
          "font-size": VALUE_FONT_SIZE,
          "font-weight": "bold",
          "text-anchor": "middle",
          stroke: placement === "inside" ? undefined : "#ffffff",
          "stroke-width": placement === "inside" ? undefined : 2,
          "paint-order": placement === "inside" ? undefined : "stroke",
          transform: rotation ? `rotate(${rotation} ${px(cx)} ${px(labelY)})` : undefined,
        })
      );
    }

    bars.push({ category, value, label, fill: columnStyle.barFill, placement: showValues ? placement : null });
  });

  const rotateCategories = categories.some((c) => estimateTextWidth(c, TICK_FONT_SIZE) > band * 0.95);
  categories.forEach((category, j) => {
    const cx = x0 + j * band + band / 2;
    const cy = y0 + plotH + 16;
    out.push(
      text(category, {
        x: px(cx),
        y: px(cy),
        fill: MUTED_COLOR,
        "font-size": TICK_FONT_SIZE,
        "text-anchor": rotateCategories ? "end" : "middle",
        transform: rotateCategories ? `rotate(-35 ${px(cx)} ${px(cy)})` : undefined,
      })
    );
  });

  const titleLines = columnTitleLines(result.column, input.columnTitles);
  titleLines.forEach((line, k) => {
    out.push(
      text(line, {
        x: px(cell.x + cell.w / 2),
        y: px(cell.y + 18 + k * COLUMN_TITLE_LINE_HEIGHT),
        fill: TEXT_COLOR,
        "font-size": COLUMN_TITLE_FONT_SIZE,
        "font-weight": "bold",
        "text-anchor": "middle",
      })
    );
  });

  const xLabel = (input.xLabel ?? "").trim() || table.indexName;
  if (xLabel) {
    out.push(
      text(xLabel, {
        x: px(x0 + plotW / 2),
        y: px(cell.y + cell.h - 6),
        fill: MUTED_COLOR,
        "font-size": AXIS_LABEL_FONT_SIZE,
        "text-anchor": "middle",
      })
    );
  }

  const yLabel = resolveYLabel(input.yLabels, result);
  const yLabelX = cell.x + 14;
  const yLabelY = y0 + plotH / 2;
  out.push(
    text(yLabel, {
      x: px(yLabelX),
      y: px(yLabelY),
      fill: MUTED_COLOR,
      "font-size": AXIS_LABEL_FONT_SIZE,
      "text-anchor": "middle",
      transform: `rotate(-90 ${px(yLabelX)} ${px(yLabelY)})`,
    })
  );

  return {
    markup: [el("g", { "data-column": result.column }, out)],
    summary: {
      column: result.column,
      titleLines,
      row: ctx.row,
      col: ctx.col,
      yLabel,
      formatClass: result.ok ? result.format.formatClass : null,
      degraded: !result.ok,
      bars,
    },
  };
}

export function renderChartGroup(input: ChartGroupInput): ChartUnit {
  assertAligned(input);
  const { layout, style, formats } = input;

  const widthPx = Math.round(layout.figureWidth * PX_PER_INCH);
  const heightPx = Math.round(layout.figureHeight * PX_PER_INCH);

  const titleLines = titleLinesFor(input.title, widthPx);
  const subtitle = (input.subtitle ?? "").trim();
  const headerH =
    HEADER_TOP + titleLines.length * TITLE_LINE_HEIGHT + (subtitle ? SUBTITLE_LINE_HEIGHT : 0) + HEADER_GAP;

  const header: string[] = [];
  titleLines.forEach((line, k) => {
    header.push(
      text(line, {
        x: px(widthPx / 2),
        y: px(HEADER_TOP + TITLE_FONT_SIZE + k * TITLE_LINE_HEIGHT),
        fill: TEXT_COLOR,
        "font-size": TITLE_FONT_SIZE,
        "font-weight": style.fontWeightTitle,
        "text-anchor": "middle",
      })
    );
  });
  if (subtitle) {
    header.push(
      text(subtitle, {
        x: px(widthPx / 2),
        y: px(HEADER_TOP + titleLines.length * TITLE_LINE_HEIGHT + SUBTITLE_FONT_SIZE + 2),
        fill: MUTED_COLOR,
        "font-size": SUBTITLE_FONT_SIZE,
        "font-style": "italic",
        "text-anchor": "middle",
      })
    );
  }

  const sharedValues = formats.filter((f) => f.ok).flatMap((f) => presentValues(displayValues(f)));
  const sharedDomain = layout.shareY && sharedValues.length > 0 ? barDomain(sharedValues) : null;

  const gridH = Math.max(heightPx - headerH, layout.rows * (SUBPLOT_MARGIN.top + SUBPLOT_MARGIN.bottom + MIN_PLOT_SIZE));
  const cellW = widthPx / layout.cols;
  const cellH = gridH / layout.rows;

  const body: string[] = [];
  const subplots: SubplotSummary[] = [];
  input.columns.forEach((_, i) => {
    const result = formats[i];
    const columnStyle = style.columns[i];
    if (!result || !columnStyle) return;
    const row = Math.floor(i / layout.cols);
    const col = i % layout.cols;
    const domain = result.ok && sharedDomain ? sharedDomain : barDomain(presentValues(displayValues(result)));
    const rendered = renderSubplot(input, {
      cell: { x: col * cellW, y: headerH + row * cellH, w: cellW, h: cellH },
      row,
      col,
      result,
      columnStyle,
      domain,
    });
    body.push(...rendered.markup);
    subplots.push(rendered.summary);
  });

  const totalH = Math.round(headerH + gridH);
  const fontAttrs = { "font-family": FONT_FAMILY };
  const svg = svgDocument(widthPx, totalH, [
    el("rect", { x: 0, y: 0, width: widthPx, height: totalH, fill: "#ffffff" }),
    el("g", fontAttrs, [...header, ...body]),
  ]);

  return {
    groupIndex: input.groupIndex,
    title: input.title,
    titleLines,
    ...(subtitle ? { subtitle } : {}),
    layout,
    widthPx,
    heightPx: totalH,
    subplots,
    blankCells: layout.rows * layout.cols - input.columns.length,
    svg,
  };
}
