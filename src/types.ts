/**
 * Purpose: Declare shared barboard data, configuration, and diagnostic types.
 * Intent: Keep cross-module contracts explicit and stable.
 */

export type Cell = number | string | boolean | null;

export type DashboardSeverity = "error" | "warning";

export interface DashboardMessage {
  severity: DashboardSeverity;
  code: string;
  message: string;
  groupIndex?: number;
  column?: string;
  key?: string;
}

export interface DataColumn {
  readonly name: string;
  readonly cells: readonly Cell[];
}

export interface DataTable {
  readonly name?: string;
  readonly indexName: string;
  readonly index: readonly string[];
  readonly columns: readonly DataColumn[];
}

export type ColumnGroup = readonly string[];

export interface ValueFormatSpec {
  isPercentage?: boolean;
  precision?: number;
}

export type FormatClass = "percentage" | "count";

export interface ResolvedValueFormat {
  formatClass: FormatClass;
  isPercentage: boolean;
  scale: 1 | 100;
  precision: number;
  inferred: { isPercentage: boolean; precision: boolean };
}

export type YLabelSpec =
  | { kind: "global"; label: string }
  | { kind: "per_column"; labels: Readonly<Record<string, string>> };

export interface ColumnStyleOverride {
  barFill?: string;
  barEdgeColor?: string;
  barEdgeWidth?: number;
  barAlpha?: number;
}

export interface ColumnStyle {
  column: string;
  barFill: string;
  barEdgeColor: string;
  barEdgeWidth: number;
  barAlpha: number;
}

export interface StyleSpec {
  scheme: string;
  background: string;
  palette: readonly string[];
  gridVisible: boolean;
  gridAlpha: number;
  fontWeightTitle: string;
  plotBackground: string;
  columns: readonly ColumnStyle[];
}

export interface LayoutPlan {
  rows: number;
  cols: number;
  slotCount: number;
  figureWidth: number;
  figureHeight: number;
  shareY: boolean;
}

export interface LayoutHints {
  rows?: number;
  cols?: number;
  shareY?: boolean;
}

export type LabelPlacement = "above" | "inside" | "below";

export interface BarSummary {
  category: string;
  value: number | null;
  label: string;
  fill: string;
  placement: LabelPlacement | null;
}

export interface SubplotSummary {
  column: string;
  titleLines: string[];
  row: number;
  col: number;
  yLabel: string;
  formatClass: FormatClass | null;
  degraded: boolean;
  bars: BarSummary[];
}

export interface ChartUnit {
  groupIndex: number;
  title: string;
  titleLines: string[];
  subtitle?: string;
  layout: LayoutPlan;
  widthPx: number;
  heightPx: number;
  subplots: SubplotSummary[];
  blankCells: number;
  svg: string;
}

export interface ChartProvenance {
  sheetName: string;
  groupIndex: number;
  title: string;
  subtitle?: string;
}

export interface DashboardUnit {
  provenance: ChartProvenance;
  chart: ChartUnit;
}

export interface DashboardArtifact {
  sheetName: string;
  units: DashboardUnit[];
  warnings: DashboardMessage[];
}
