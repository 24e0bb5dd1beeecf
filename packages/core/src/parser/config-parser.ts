import yaml from "js-yaml";
import type { ConversionOptions } from "../types/config.js";
import { ConversionConfigSchema, DEFAULT_OPTIONS } from "../types/config.js";

/**
 * Parse a JSON or YAML string into conversion options.
 * Detects format automatically (tries JSON first, then YAML).
 * Only the keys present in the input are returned; an empty document
 * yields `{}`.
 */
export function parseConfig(input: string): Partial<ConversionOptions> {
  let raw: unknown;

  try {
    raw = JSON.parse(input);
  } catch {
    try {
      raw = yaml.load(input);
    } catch (yamlErr) {
      throw new Error(
        `Failed to parse input as JSON or YAML: ${yamlErr instanceof Error ? yamlErr.message : String(yamlErr)}`,
      );
    }
  }

  // An empty YAML document loads as undefined
  return validateConfig(raw ?? {});
}

/**
 * Check snake_case option values against the config schema and convert
 * them to conversion options.
 */
export function validateConfig(
  raw: unknown,
  source = "config",
): Partial<ConversionOptions> {
  const result = ConversionConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("\n");
    throw new Error(`Invalid svg2cetz ${source}:\n${issues}`);
  }

  const config = result.data;
  const options: Partial<ConversionOptions> = {};
  if (config.precision !== undefined) options.precision = config.precision;
  if (config.wrap !== undefined) options.wrap = config.wrap;
  if (config.ignore_font !== undefined) options.ignoreFont = config.ignore_font;
  if (config.default_font !== undefined) options.defaultFont = config.default_font;
  if (config.marker !== undefined) options.marker = config.marker;
  return options;
}

/**
 * Merge option layers over the defaults. Later layers win; `undefined`
 * values never override.
 */
export function resolveOptions(
  ...layers: Partial<ConversionOptions>[]
): ConversionOptions {
  const resolved: ConversionOptions = { ...DEFAULT_OPTIONS };
  for (const layer of layers) {
    if (layer.precision !== undefined) resolved.precision = layer.precision;
    if (layer.wrap !== undefined) resolved.wrap = layer.wrap;
    if (layer.ignoreFont !== undefined) resolved.ignoreFont = layer.ignoreFont;
    if (layer.defaultFont !== undefined) resolved.defaultFont = layer.defaultFont;
    if (layer.marker !== undefined) resolved.marker = layer.marker;
  }
  return resolved;
}
