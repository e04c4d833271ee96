/**
 * Purpose: Command-line entry that turns a workbook into exported dashboard images.
 * Intent: Keep process concerns (argv, exit codes, output lines) out of the engine.
 */

import { join } from "node:path";
import { parseArgs } from "node:util";
import { loadDashboardConfig, type DashboardConfig } from "./config.js";
import { createDashboardComposer, type ComposeOptions } from "./dashboard.js";
import { formatMessage } from "./diagnostics.js";
import { isDashboardError } from "./errors.js";
import { DEFAULT_DPI, exportDashboard, type ExportDeps, type ExportFormat } from "./export.js";
import { DEFAULT_DROP_ROWS, readWorkbook, sheetNames, sheetToTable } from "./sheet_reader.js";
import { loadStyleTables } from "./style_tables.js";
import type { DashboardMessage } from "./types.js";

export const EXIT_OK = 0;
export const EXIT_FATAL = 1;
export const EXIT_WARNINGS = 2;

export const DEFAULT_OUTPUT_DIR = "./exports";

export interface CliIo {
  out(line: string): void;
  err(line: string): void;
}

const consoleIo: CliIo = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

export const USAGE = `Usage: barboard --file <workbook.xlsx> [options]

Input:
  --file <path>           workbook to read (required)
  --sheet <name>          sheet to chart (default: every sheet)
  --index-column <name>   column holding category labels (default: Category)
  --drop-row <label>      row label to drop; repeatable (default: "Sub total")

Output:
  --output <dir>          output directory (default: ${DEFAULT_OUTPUT_DIR})
  --dpi <n>               PNG resolution (default: ${DEFAULT_DPI})
  --format <png|svg>      image format (default: png)

Styling:
  --title <prefix>        prefix for generated chart titles
  --style <variant>       background variant (default: presentation)
  --colors <scheme>       color scheme (default: corporate)
  --styles <path>         alternative style tables JSON

  --config <path>         dashboard configuration JSON
  --help                  show this message`;

const cliOptions = {
  file: { type: "string" },
  sheet: { type: "string" },
  "index-column": { type: "string" },
  "drop-row": { type: "string", multiple: true },
  output: { type: "string" },
  dpi: { type: "string" },
  format: { type: "string" },
  title: { type: "string" },
  style: { type: "string" },
  colors: { type: "string" },
  styles: { type: "string" },
  config: { type: "string" },
  help: { type: "boolean", short: "h" },
} as const;

class UsageError extends Error {}

interface CliSettings {
  file: string;
  sheet?: string;
  indexColumn?: string;
  dropRows?: string[];
  output?: string;
  dpi?: number;
  format?: ExportFormat;
  titlePrefix?: string;
  bgStyle?: string;
  colorScheme?: string;
  stylesPath?: string;
  configPath?: string;
}

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: cliOptions, strict: true, allowPositionals: false });
  } catch (e) {
    throw new UsageError(e instanceof Error ? e.message : String(e));
  }
}

function parseCliArgs(argv: readonly string[]): CliSettings | "help" {
  const v = readArgs(argv).values;
  if (v.help) return "help";
  if (!v.file) throw new UsageError("--file is required");

  const settings: CliSettings = { file: v.file };
  if (v.dpi !== undefined) {
    const dpi = Number(v.dpi);
    if (!Number.isInteger(dpi) || dpi < 1) throw new UsageError(`--dpi must be a positive integer, got ${v.dpi}`);
    settings.dpi = dpi;
  }
  if (v.format !== undefined) {
    if (v.format !== "png" && v.format !== "svg") throw new UsageError(`--format must be png or svg, got ${v.format}`);
    settings.format = v.format;
  }
  if (v.sheet !== undefined) settings.sheet = v.sheet;
  if (v["index-column"] !== undefined) settings.indexColumn = v["index-column"];
  if (v["drop-row"] !== undefined) settings.dropRows = v["drop-row"];
  if (v.output !== undefined) settings.output = v.output;
  if (v.title !== undefined) settings.titlePrefix = v.title;
  if (v.style !== undefined) settings.bgStyle = v.style;
  if (v.colors !== undefined) settings.colorScheme = v.colors;
  if (v.styles !== undefined) settings.stylesPath = v.styles;
  if (v.config !== undefined) settings.configPath = v.config;
  return settings;
}

/** Flags win over the configuration file. */
function composeOptionsFor(settings: CliSettings, config: DashboardConfig | null): ComposeOptions {
  const options: ComposeOptions = { ...(config?.compose ?? {}) };
  if (settings.titlePrefix !== undefined) options.titlePrefix = settings.titlePrefix;
  if (settings.bgStyle !== undefined) options.bgStyle = settings.bgStyle;
  if (settings.colorScheme !== undefined) options.colorScheme = settings.colorScheme;
  return options;
}

function report(io: CliIo, messages: readonly DashboardMessage[]): void {
  for (const m of messages) io.err(formatMessage(m));
}

export async function runCli(argv: readonly string[], io: CliIo = consoleIo, deps?: ExportDeps): Promise<number> {
  let settings: CliSettings | "help";
  try {
    settings = parseCliArgs(argv);
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    io.err(`error: ${e.message}`);
    io.err(USAGE);
    return EXIT_FATAL;
  }
  if (settings === "help") {
    io.out(USAGE);
    return EXIT_OK;
  }

  let warned = false;
  try {
    const tables = loadStyleTables(settings.stylesPath);
    let config: DashboardConfig | null = null;
    if (settings.configPath !== undefined) {
      const loaded = loadDashboardConfig(settings.configPath);
      config = loaded.config;
      report(io, loaded.messages);
      warned ||= loaded.messages.length > 0;
    }

    const composer = createDashboardComposer(tables);
    const workbook = readWorkbook(settings.file);
    const sheet = settings.sheet ?? config?.sheetName;
    const sheets = sheet !== undefined ? [sheet] : sheetNames(workbook);
    const outputDir = settings.output ?? config?.export.outputPath ?? DEFAULT_OUTPUT_DIR;
    const format = settings.format ?? config?.export.format ?? "png";
    const dpi = settings.dpi ?? config?.export.dpi ?? DEFAULT_DPI;
    const options = composeOptionsFor(settings, config);

    for (const name of sheets) {
      const table = sheetToTable(workbook, name, {
        indexColumn: settings.indexColumn ?? config?.indexColumn,
        dropRows: settings.dropRows ?? config?.dropRows ?? DEFAULT_DROP_ROWS,
      });
      const artifact = composer.compose(table, name, config?.columnGroups, options);
      report(io, artifact.warnings);
      warned ||= artifact.warnings.length > 0;

      const results = await exportDashboard(artifact, { outputPath: join(outputDir, `${name}_group`), format, dpi }, deps);
      const failed = results.filter((r) => !r.ok);
      for (const r of failed) io.err(`error BD_EXPORT (group ${r.groupIndex}, ${r.path}): ${r.error ?? "write failed"}`);
      warned ||= failed.length > 0;
      io.out(`${name}: exported ${results.length - failed.length} of ${results.length} chart(s) to ${outputDir}`);
    }
  } catch (e) {
    if (isDashboardError(e)) {
      io.err(`error ${e.code}: ${e.message}`);
      return EXIT_FATAL;
    }
    io.err(`error: ${e instanceof Error ? e.message : String(e)}`);
    return EXIT_FATAL;
  }
  return warned ? EXIT_WARNINGS : EXIT_OK;
}
