import { describe, expect, it } from "vitest";
import {
  parseConfig,
  resolveOptions,
  validateConfig,
} from "../src/parser/config-parser.js";
import { DEFAULT_OPTIONS } from "../src/types/config.js";

describe("parseConfig", () => {
  it("parses YAML options", () => {
    const options = parseConfig("precision: 3\nwrap: figure\n");
    expect(options).toEqual({ precision: 3, wrap: "figure" });
  });

  it("parses equivalent JSON with snake_case keys", () => {
    const json = JSON.stringify({ ignore_font: true, default_font: "Noto Serif" });
    expect(parseConfig(json)).toEqual({ ignoreFont: true, defaultFont: "Noto Serif" });
  });

  it("parses the marker policy", () => {
    expect(parseConfig("marker: no_unknown_marker")).toEqual({
      marker: "no_unknown_marker",
    });
  });

  it("treats an empty document as no options", () => {
    expect(parseConfig("")).toEqual({});
  });

  it("rejects an unknown wrap style", () => {
    expect(() => parseConfig("wrap: sideways")).toThrow(/Invalid svg2cetz config/);
    expect(() => parseConfig("wrap: sideways")).toThrow(/- wrap:/);
  });

  it("rejects unknown keys at the root", () => {
    expect(() => parseConfig("colour: red")).toThrow(/\(root\)/);
  });

  it("rejects a negative precision", () => {
    expect(() => parseConfig('{"precision": -1}')).toThrow(/- precision:/);
  });
});

describe("validateConfig", () => {
  it("names the source of invalid values", () => {
    expect(() => validateConfig({ precision: 1.5 }, "options")).toThrow(
      /Invalid svg2cetz options/,
    );
  });
});

describe("resolveOptions", () => {
  it("returns the defaults without layers", () => {
    expect(resolveOptions()).toEqual(DEFAULT_OPTIONS);
  });

  it("lets later layers win", () => {
    const options = resolveOptions({ precision: 4, wrap: "figure" }, { wrap: "align" });
    expect(options).toEqual({ ...DEFAULT_OPTIONS, precision: 4, wrap: "align" });
  });

  it("ignores undefined values", () => {
    const options = resolveOptions({ precision: 4 }, { precision: undefined });
    expect(options.precision).toBe(4);
  });
});
