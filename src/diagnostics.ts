/**
 * Purpose: Provide shared helpers for validation diagnostics and untrusted-object checks.
 * Intent: Centralize key safety checks and normalized message construction.
 */

import type { DashboardMessage } from "./types.js";

export const bannedKeys = new Set(["__proto__", "prototype", "constructor"]);

type MessageExtra = Omit<DashboardMessage, "severity" | "code" | "message">;

export function err(messages: DashboardMessage[], code: string, message: string, extra?: MessageExtra): void {
  messages.push({ severity: "error", code, message, ...(extra ?? {}) });
}

export function warn(messages: DashboardMessage[], code: string, message: string, extra?: MessageExtra): void {
  messages.push({ severity: "warning", code, message, ...(extra ?? {}) });
}

export function hasErrors(messages: readonly DashboardMessage[]): boolean {
  return messages.some((m) => m.severity === "error");
}

export function isPlainObject(v: unknown): v is Record<string, unknown> {
  return Boolean(v) && typeof v === "object" && !Array.isArray(v);
}

export function asString(v: unknown): string | null {
  return typeof v === "string" && v.trim() ? v : null;
}

export function safeEntries<T>(obj: Readonly<Record<string, T>>): [string, T][] {
  return Object.entries(obj).filter(([k]) => !bannedKeys.has(k));
}

/** Parses a group-index map key ("0", "12"); anything else yields null. */
export function parseIndexKey(key: string): number | null {
  if (!/^(0|[1-9]\d*)$/.test(key)) return null;
  const n = Number(key);
  return Number.isSafeInteger(n) ? n : null;
}

export function formatMessage(m: DashboardMessage): string {
  const where = [
    m.groupIndex !== undefined ? `group ${m.groupIndex}` : null,
    m.column !== undefined ? `column ${JSON.stringify(m.column)}` : null,
    m.key !== undefined ? m.key : null,
  ].filter((part): part is string => part !== null);
  const prefix = where.length ? ` (${where.join(", ")})` : "";
  return `${m.severity} ${m.code}${prefix}: ${m.message}`;
}
