/**
 * Purpose: Shared chart math helpers (axis domains, ticks, rounding).
 * Intent: Keep SVG chart rendering readable and deterministic.
 */

export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function px(n: number): string {
  return n.toFixed(2);
}

export function decimalsForStep(step: number): number {
  const abs = Math.abs(step);
  if (!Number.isFinite(abs) || abs === 0) return 0;
  for (let d = 0; d <= 6; d++) {
    const scaled = abs * 10 ** d;
    if (Math.abs(scaled - Math.round(scaled)) < 1e-9) return d;
  }
  return abs < 1 ? 2 : 0;
}

function niceStep(range: number, tickCount: number): number {
  const raw = range / Math.max(1, tickCount - 1);
  if (!Number.isFinite(raw) || raw === 0) return 1;
  const exp = Math.floor(Math.log10(Math.abs(raw)));
  const base = 10 ** exp;
  const f = Math.abs(raw) / base;
  const niceF = f <= 1 ? 1 : f <= 2 ? 2 : f <= 5 ? 5 : 10;
  return niceF * base;
}

export interface AxisTicks {
  min: number;
  max: number;
  step: number;
  ticks: number[];
}

export function niceTicks(min: number, max: number, tickCount: number): AxisTicks {
  if (!Number.isFinite(min) || !Number.isFinite(max)) return { min: 0, max: 1, step: 1, ticks: [0, 1] };
  if (min === max) {
    const step = min === 0 ? 1 : Math.abs(min) * 0.1;
    return { min: min - step, max: max + step, step, ticks: [min - step, min, max + step] };
  }

  const lo = Math.min(min, max);
  const hi = Math.max(min, max);
  const step = niceStep(hi - lo, tickCount);
  const niceMin = Math.floor(lo / step) * step;
  const niceMax = Math.ceil(hi / step) * step;
  const ticks: number[] = [];
  // Tiny epsilon so float error does not drop the last tick.
  const eps = step * 1e-9;
  for (let i = 0; niceMin + i * step <= niceMax + eps; i++) ticks.push(niceMin + i * step);
  if (ticks.length === 1) ticks.push(niceMin + step);
  return { min: niceMin, max: niceMax, step, ticks };
}

/**
 * Bar-chart value domain: always includes 0, then adds 6% headroom on the side(s) the
 * bars grow toward before snapping to nice ticks.
 */
export function barDomain(values: readonly number[]): AxisTicks {
  let ymin = 0;
  let ymax = 0;
  for (const v of values) {
    ymin = Math.min(ymin, v);
    ymax = Math.max(ymax, v);
  }
  if (ymax === ymin) ymax = ymin + 1;

  const allNonNegative = ymin >= 0;
  const allNonPositive = ymax <= 0;
  const pad = (ymax - ymin) * 0.06;
  if (Number.isFinite(pad) && pad > 0) {
    if (allNonNegative) {
      ymax += pad;
    } else if (allNonPositive) {
      ymin -= pad;
    } else {
      ymin -= pad;
      ymax += pad;
    }
  }
  return niceTicks(ymin, ymax, 5);
}
