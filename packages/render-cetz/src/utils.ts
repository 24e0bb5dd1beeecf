/** Characters with a meaning in Typst markup. */
const TYPST_SPECIAL = /[\\#[\]*_`$<@]/g;

/** Escape Typst markup characters in text content */
export function escapeTypst(text: string): string {
  return text.replace(TYPST_SPECIAL, (ch) => `\\${ch}`);
}

/** Prefix every line of a (possibly multi-line) entry. */
export function indent(entry: string, prefix: string): string {
  return entry
    .split("\n")
    .map((line) => prefix + line)
    .join("\n");
}

/** Quote a value as a Typst string literal. */
export function typstString(value: string): string {
  return `"${value.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}
