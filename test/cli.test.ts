import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import * as XLSX from "xlsx";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EXIT_FATAL, EXIT_OK, EXIT_WARNINGS, USAGE, runCli, type CliIo } from "../src/cli.js";

function captureIo(): CliIo & { outLines: string[]; errLines: string[] } {
  const outLines: string[] = [];
  const errLines: string[] = [];
  return { outLines, errLines, out: (line) => outLines.push(line), err: (line) => errLines.push(line) };
}

function writeWorkbook(path: string, rows: unknown[][]): void {
  const wb = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(wb, XLSX.utils.aoa_to_sheet(rows), "Q1");
  const bytes: Uint8Array = XLSX.write(wb, { type: "buffer", bookType: "xlsx" });
  writeFileSync(path, bytes);
}

describe("runCli", () => {
  let dir: string;
  let workbook: string;
  let output: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "barboard-cli-"));
    workbook = join(dir, "pipeline.xlsx");
    output = join(dir, "exports");
    writeWorkbook(workbook, [
      ["Category", "Win rate", "Deals"],
      ["North", 0.25, 12],
      ["South", 0.5, 30],
      ["Sub total", 0.75, 42],
    ]);
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("exports every group of every sheet", async () => {
    const io = captureIo();
    const code = await runCli(["--file", workbook, "--output", output, "--format", "svg"], io);
    expect(code).toBe(EXIT_OK);
    expect(io.outLines).toEqual([`Q1: exported 1 of 1 chart(s) to ${output}`]);
    expect(io.errLines).toEqual([]);

    const svg = readFileSync(join(output, "Q1_group0.svg"), "utf8");
    expect(svg).toContain(">Q1 Analysis - Group 1</text>");
    expect(svg).not.toContain(">Sub total</text>");
  });

  it("applies flags over defaults", async () => {
    const io = captureIo();
    await runCli(["--file", workbook, "--output", output, "--format", "svg", "--title", "FY24", "--drop-row", "North"], io);
    const svg = readFileSync(join(output, "Q1_group0.svg"), "utf8");
    expect(svg).toContain(">FY24 Q1 Analysis - Group 1</text>");
    expect(svg).toContain(">Sub total</text>");
    expect(svg).not.toContain(">North</text>");
  });

  it("reads a configuration file", async () => {
    const config = join(dir, "dashboard.json");
    writeFileSync(config, JSON.stringify({ custom_titles: { "0": "Pipeline" }, export: { format: "svg" } }));
    const io = captureIo();
    const code = await runCli(["--file", workbook, "--output", output, "--config", config], io);
    expect(code).toBe(EXIT_OK);
    expect(readFileSync(join(output, "Q1_group0.svg"), "utf8")).toContain(">Pipeline</text>");
  });

  it("exits 2 and reports warnings for non-numeric data", async () => {
    writeWorkbook(workbook, [
      ["Category", "Deals", "Notes"],
      ["North", 12, "10"],
      ["South", 30, "n/a"],
    ]);
    const io = captureIo();
    const code = await runCli(["--file", workbook, "--output", output, "--format", "svg"], io);
    expect(code).toBe(EXIT_WARNINGS);
    expect(io.errLines).toEqual([
      'warning BD_DATA_NON_NUMERIC (group 0, column "Notes"): Column "Notes" has non-numeric values: "n/a"',
    ]);
    expect(existsSync(join(output, "Q1_group0.svg"))).toBe(true);
  });

  it("exits 2 when a file fails to export", async () => {
    const io = captureIo();
    const code = await runCli(["--file", workbook, "--output", output], io, {
      writeFile: async () => {
        throw new Error("disk full");
      },
      rasterize: () => new Uint8Array([0]),
    });
    expect(code).toBe(EXIT_WARNINGS);
    expect(io.errLines).toEqual([`error BD_EXPORT (group 0, ${join(output, "Q1_group0.png")}): disk full`]);
    expect(io.outLines).toEqual([`Q1: exported 0 of 1 chart(s) to ${output}`]);
  });

  it("exits 1 on an unknown color scheme", async () => {
    const io = captureIo();
    const code = await runCli(["--file", workbook, "--output", output, "--colors", "neon"], io);
    expect(code).toBe(EXIT_FATAL);
    expect(io.errLines[0]?.startsWith("error BD_CONFIG: Unknown color scheme: neon")).toBe(true);
    expect(existsSync(output)).toBe(false);
  });

  it("exits 1 on bad flags", async () => {
    const io = captureIo();
    expect(await runCli([], io)).toBe(EXIT_FATAL);
    expect(io.errLines[0]).toBe("error: --file is required");
    expect(await runCli(["--file", workbook, "--dpi", "abc"], captureIo())).toBe(EXIT_FATAL);
    expect(await runCli(["--file", workbook, "--bogus"], captureIo())).toBe(EXIT_FATAL);
  });

  it("exits 1 on a missing workbook", async () => {
    const io = captureIo();
    expect(await runCli(["--file", join(dir, "nope.xlsx")], io)).toBe(EXIT_FATAL);
    expect(io.errLines[0]?.startsWith("error BD_CONFIG: Cannot read workbook")).toBe(true);
  });

  it("prints usage", async () => {
    const io = captureIo();
    expect(await runCli(["--help"], io)).toBe(EXIT_OK);
    expect(io.outLines).toEqual([USAGE]);
  });
});
