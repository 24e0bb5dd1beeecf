import { readFileSync, writeFileSync } from "node:fs";
import {
  parseConfig,
  resolveOptions,
  validateConfig,
  type ConversionOptions,
} from "@svg2cetz/core";
import { convertSelection } from "@svg2cetz/render-cetz";
import {
  createQuery,
  loadDocument,
  reportError,
  selectElements,
  type SelectionOptions,
} from "./shared.js";

interface ConvertOptions extends SelectionOptions {
  output?: string;
  precision?: string;
  wrap?: string;
  ignoreFont?: boolean;
  defaultFont?: string;
  marker?: string;
  config?: string;
}

export function convertCommand(input: string, options: ConvertOptions): void {
  try {
    const fileOptions = options.config
      ? parseConfig(readFileSync(options.config, "utf-8"))
      : {};
    const conversion = resolveOptions(fileOptions, flagOptions(options));

    const document = loadDocument(input);
    const selection = selectElements(document, options.id);
    const result = convertSelection(
      document,
      selection,
      createQuery(document, options),
      conversion,
    );
    if (!result.ok) {
      reportError(result.error);
      return;
    }

    const block = result.value.join("\n");
    if (options.output) {
      writeFileSync(options.output, `${block}\n`, "utf-8");
      console.log(`Converted: ${options.output}`);
    } else {
      console.log(block);
    }
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

/**
 * Options given on the command line, checked with the same schema as a
 * config file.
 */
function flagOptions(options: ConvertOptions): Partial<ConversionOptions> {
  const flags: Record<string, unknown> = {};
  if (options.precision !== undefined) flags.precision = Number(options.precision);
  if (options.wrap !== undefined) flags.wrap = options.wrap;
  if (options.ignoreFont !== undefined) flags.ignore_font = options.ignoreFont;
  if (options.defaultFont !== undefined) flags.default_font = options.defaultFont;
  if (options.marker !== undefined) flags.marker = options.marker;
  return validateConfig(flags, "options");
}
