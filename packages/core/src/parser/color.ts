import { readFileSync } from "node:fs";

export interface RgbColor {
  /** Upper-case `RRGGBB` without a leading `#`. */
  hex: string;
  /** Alpha carried by the color itself (0-1), e.g. from `rgba()`. */
  alpha: number;
}

let namedColors: Record<string, string> | undefined;

function loadNamedColors(): Record<string, string> {
  if (!namedColors) {
    const url = new URL("../data/named-colors.json", import.meta.url);
    const parsed: unknown = JSON.parse(readFileSync(url, "utf-8"));
    const table: Record<string, string> = {};
    if (parsed && typeof parsed === "object") {
      for (const [name, hex] of Object.entries(parsed)) {
        if (typeof hex === "string") table[name] = hex;
      }
    }
    namedColors = table;
  }
  return namedColors;
}

const HEX = /^#([0-9a-f]{3,4}|[0-9a-f]{6}|[0-9a-f]{8})$/i;
const RGB_FN = /^rgba?\(\s*([^)]*)\)$/i;

/**
 * Parse a CSS color: `#rgb`, `#rgba`, `#rrggbb`, `#rrggbbaa`, `rgb()`,
 * `rgba()` (numbers or percentages) and the CSS named colors.
 * Returns `undefined` for anything else, including `none` and `url(...)`.
 */
export function parseColor(value: string): RgbColor | undefined {
  const trimmed = value.trim().toLowerCase();

  const hexMatch = trimmed.match(HEX);
  if (hexMatch) return parseHex(hexMatch[1]);

  const fnMatch = trimmed.match(RGB_FN);
  if (fnMatch) return parseRgbFunction(fnMatch[1]);

  if (trimmed === "transparent") return { hex: "000000", alpha: 0 };

  const named = loadNamedColors()[trimmed];
  return named ? { hex: named, alpha: 1 } : undefined;
}

function parseHex(digits: string): RgbColor {
  const expanded =
    digits.length <= 4
      ? Array.from(digits, (ch) => ch + ch).join("")
      : digits;
  const alpha =
    expanded.length === 8 ? parseInt(expanded.slice(6, 8), 16) / 255 : 1;
  return { hex: expanded.slice(0, 6).toUpperCase(), alpha };
}

function parseRgbFunction(body: string): RgbColor | undefined {
  const parts = body.split(/[\s,/]+/).filter((p) => p !== "");
  if (parts.length < 3 || parts.length > 4) return undefined;

  const channels: number[] = [];
  for (const part of parts.slice(0, 3)) {
    const channel = part.endsWith("%")
      ? (parseFloat(part) / 100) * 255
      : parseFloat(part);
    if (Number.isNaN(channel)) return undefined;
    channels.push(Math.min(255, Math.max(0, Math.round(channel))));
  }

  let alpha = 1;
  if (parts.length === 4) {
    const raw = parts[3];
    alpha = raw.endsWith("%") ? parseFloat(raw) / 100 : parseFloat(raw);
    if (Number.isNaN(alpha)) return undefined;
    alpha = Math.min(1, Math.max(0, alpha));
  }

  return { hex: channels.map(toHexByte).join(""), alpha };
}

/** Two upper-case hex digits for a byte value. */
export function toHexByte(value: number): string {
  const clamped = Math.min(255, Math.max(0, Math.round(value)));
  return clamped.toString(16).toUpperCase().padStart(2, "0");
}
