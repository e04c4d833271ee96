/**
 * Purpose: Define the typed failures raised by the composition engine.
 * Intent: Let callers branch on failure kind and key without parsing messages.
 */

import type { DashboardMessage } from "./types.js";

export abstract class DashboardError extends Error {
  abstract readonly code: string;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid or missing group index, unknown scheme/variant, malformed override shape. */
export class ConfigurationError extends DashboardError {
  readonly code = "BD_CONFIG";
  readonly key: string | undefined;
  readonly messages: readonly DashboardMessage[];

  constructor(message: string, key?: string, messages: readonly DashboardMessage[] = []) {
    super(message);
    this.key = key;
    this.messages = messages;
  }

  static fromMessages(summary: string, messages: readonly DashboardMessage[]): ConfigurationError {
    const errors = messages.filter((m) => m.severity === "error");
    const first = errors[0];
    const detail = errors.map((m) => (m.key ? `${m.key}: ${m.message}` : m.message)).join("; ");
    return new ConfigurationError(detail ? `${summary}: ${detail}` : summary, first?.key, errors);
  }
}

export class DataTypeError extends DashboardError {
  readonly code = "BD_DATA_NON_NUMERIC";
  readonly column: string;
  readonly offending: readonly { row: number; text: string }[];

  constructor(column: string, offending: readonly { row: number; text: string }[]) {
    const sample = offending
      .slice(0, 3)
      .map((o) => JSON.stringify(o.text))
      .join(", ");
    const more = offending.length > 3 ? `, … (${offending.length} total)` : "";
    super(`Column ${JSON.stringify(column)} has non-numeric values: ${sample}${more}`);
    this.column = column;
    this.offending = offending;
  }
}

export class LayoutError extends DashboardError {
  readonly code = "BD_LAYOUT";
}

export function isDashboardError(err: unknown): err is DashboardError {
  return err instanceof DashboardError;
}
