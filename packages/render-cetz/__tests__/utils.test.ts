import { describe, expect, it } from "vitest";
import { escapeTypst, indent, typstString } from "../src/utils.js";

describe("escapeTypst", () => {
  it("escapes markup characters", () => {
    expect(escapeTypst("a_b #c *d* $e$ @f <g>")).toBe("a\\_b \\#c \\*d\\* \\$e\\$ \\@f \\<g>");
  });

  it("leaves plain text alone", () => {
    expect(escapeTypst("Hello, world.")).toBe("Hello, world.");
  });
});

describe("typstString", () => {
  it("escapes quotes and backslashes", () => {
    expect(typstString('say "hi" \\ bye')).toBe('"say \\"hi\\" \\\\ bye"');
  });
});

describe("indent", () => {
  it("prefixes each line", () => {
    expect(indent("a\nb", "  ")).toBe("  a\n  b");
  });
});
