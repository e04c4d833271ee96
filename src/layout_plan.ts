/**
 * Purpose: Turn a chart count and optional row/column hints into a subplot grid and figure size.
 * Intent: Keep grids wide-biased and figures inside a fixed size envelope.
 */

import { round2 } from "./chart_math.js";
import { LayoutError } from "./errors.js";
import type { FormatClass, LayoutPlan } from "./types.js";

// Inches; the renderer draws at PX_PER_INCH.
export const UNIT_WIDTH = 4.5;
export const UNIT_HEIGHT = 3.6;
export const MIN_FIGURE_WIDTH = 6;
export const MIN_FIGURE_HEIGHT = 4.5;
export const MAX_FIGURE_WIDTH = 16;
export const MAX_FIGURE_HEIGHT = 12;

export interface LayoutRequest {
  slotCount: number;
  rows?: number;
  cols?: number;
  shareY?: boolean;
  /** Format class of every column that formatted cleanly. */
  formatClasses?: readonly FormatClass[];
}

function assertPositiveInt(n: number, what: string): void {
  if (!Number.isInteger(n) || n < 1) throw new LayoutError(`${what} must be a positive integer, got ${n}`);
}

export function planGrid(slotCount: number, rowHint?: number, colHint?: number): { rows: number; cols: number } {
  assertPositiveInt(slotCount, "slotCount");
  if (rowHint !== undefined) assertPositiveInt(rowHint, "rows");
  if (colHint !== undefined) assertPositiveInt(colHint, "cols");

  if (rowHint !== undefined && colHint !== undefined) {
    if (rowHint * colHint < slotCount) {
      throw new LayoutError(`Layout ${rowHint}x${colHint} has ${rowHint * colHint} cells for ${slotCount} charts`);
    }
    return { rows: rowHint, cols: colHint };
  }
  if (rowHint !== undefined) return { rows: rowHint, cols: Math.ceil(slotCount / rowHint) };
  if (colHint !== undefined) return { rows: Math.ceil(slotCount / colHint), cols: colHint };

  // Near-square, never taller than wide.
  const cols = Math.ceil(Math.sqrt(slotCount));
  return { rows: Math.ceil(slotCount / cols), cols };
}

export function figureSize(rows: number, cols: number): { width: number; height: number } {
  let width = Math.max(MIN_FIGURE_WIDTH, cols * UNIT_WIDTH);
  let height = Math.max(MIN_FIGURE_HEIGHT, rows * UNIT_HEIGHT);
  const aspect = (cols * UNIT_WIDTH) / (rows * UNIT_HEIGHT);

  if (width <= MAX_FIGURE_WIDTH && height <= MAX_FIGURE_HEIGHT) {
    return { width: round2(width), height: round2(height) };
  }

  if (width >= height) {
    width = Math.min(width, MAX_FIGURE_WIDTH);
    height = width / aspect;
    if (height > MAX_FIGURE_HEIGHT) {
      height = MAX_FIGURE_HEIGHT;
      width = height * aspect;
    }
  } else {
    height = Math.min(height, MAX_FIGURE_HEIGHT);
    width = height * aspect;
    if (width > MAX_FIGURE_WIDTH) {
      width = MAX_FIGURE_WIDTH;
      height = width / aspect;
    }
  }
  // Minimums outrank the aspect ratio.
  return {
    width: round2(Math.max(MIN_FIGURE_WIDTH, width)),
    height: round2(Math.max(MIN_FIGURE_HEIGHT, height)),
  };
}

/** Percent and count bars never share an axis, whatever was requested. */
export function resolveShareY(formatClasses: readonly FormatClass[], requested?: boolean): boolean {
  const first = formatClasses[0];
  const uniform = formatClasses.every((c) => c === first);
  if (!uniform) return false;
  return requested ?? true;
}

export function planLayout(req: LayoutRequest): LayoutPlan {
  const { rows, cols } = planGrid(req.slotCount, req.rows, req.cols);
  const { width, height } = figureSize(rows, cols);
  return {
    rows,
    cols,
    slotCount: req.slotCount,
    figureWidth: width,
    figureHeight: height,
    shareY: resolveShareY(req.formatClasses ?? [], req.shareY),
  };
}
