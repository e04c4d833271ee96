/**
 * Purpose: Build SVG markup as strings for server-side chart output.
 * Intent: Same element/attribute shape as DOM-built charts, without a DOM.
 */

export const SVG_NS = "http://www.w3.org/2000/svg";

export type SvgAttrs = Record<string, string | number | undefined>;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&apos;");
}

function attrText(attrs: SvgAttrs): string {
  const parts: string[] = [];
  for (const [name, value] of Object.entries(attrs)) {
    if (value === undefined) continue;
    parts.push(`${name}="${escapeXml(String(value))}"`);
  }
  return parts.length ? ` ${parts.join(" ")}` : "";
}

export function el(tag: string, attrs: SvgAttrs = {}, children: readonly string[] = []): string {
  if (children.length === 0) return `<${tag}${attrText(attrs)}/>`;
  return `<${tag}${attrText(attrs)}>${children.join("")}</${tag}>`;
}

export function text(content: string, attrs: SvgAttrs): string {
  return `<text${attrText(attrs)}>${escapeXml(content)}</text>`;
}

export function svgDocument(width: number, height: number, children: readonly string[]): string {
  return el(
    "svg",
    { xmlns: SVG_NS, width, height, viewBox: `0 0 ${width} ${height}` },
    children
  );
}
