import { createDashboardComposer, type ComposeOptions } from "./dashboard.js";
import { loadStyleTables, type StyleTables } from "./style_tables.js";
import type { ColumnGroup, DashboardArtifact, DataTable } from "./types.js";

export * from "./types.js";
export * from "./errors.js";
export { formatMessage } from "./diagnostics.js";
export { createDataTable, columnNames, groupColumns, withoutRows, type DataTableInit } from "./data_table.js";
export {
  formatColumn,
  formatValue,
  inferPercentage,
  inferPrecision,
  resolveColumnFormat,
  PERCENT_MARKERS,
  type ColumnFormatResult,
} from "./value_format.js";
export { planLayout, planGrid, figureSize, resolveShareY, type LayoutRequest } from "./layout_plan.js";
export {
  DEFAULT_STYLE_TABLES_PATH,
  loadStyleTables,
  parseStyleTables,
  validateStyleTables,
  type StyleTables,
} from "./style_tables.js";
export { resolveStyle, availableSchemes, availableBackgrounds } from "./style_resolve.js";
export { renderChartGroup, type ChartGroupInput } from "./chart_group.js";
export {
  createDashboardComposer,
  defaultTitle,
  DEFAULT_BG_STYLE,
  DEFAULT_COLOR_SCHEME,
  type ComposeOptions,
  type DashboardComposer,
  type ValueFormatOverrides,
} from "./dashboard.js";
export { parseDashboardConfig, loadDashboardConfig, type DashboardConfig, type ExportSettings } from "./config.js";
export { parseWorkbook, readWorkbook, sheetNames, sheetToTable, type SheetReadOptions } from "./sheet_reader.js";
export { exportDashboard, exportPath, rasterizeSvg, type ExportFormat, type ExportOptions, type ExportResult } from "./export.js";
export { runCli, type CliIo } from "./cli.js";

let builtinTables: StyleTables | null = null;

/** One-shot compose against the bundled style tables, or the ones given. */
export function composeDashboard(
  table: DataTable,
  sheetName: string,
  columnGroups?: readonly ColumnGroup[],
  options?: ComposeOptions,
  styleTables?: StyleTables
): DashboardArtifact {
  const tables = styleTables ?? (builtinTables ??= loadStyleTables());
  return createDashboardComposer(tables).compose(table, sheetName, columnGroups, options);
}
