import { z } from "zod";

export type WrapStyle = "none" | "figure" | "align";
export type MarkerPolicy = "no_unknown_marker" | "default_marker";

// ---- Conversion options ----

export interface ConversionOptions {
  /** Decimal digits kept for coordinates and lengths. */
  precision: number;
  wrap: WrapStyle;
  ignoreFont: boolean;
  /** Font used in place of generic CSS families such as `serif`. */
  defaultFont: string;
  marker: MarkerPolicy;
}

export const DEFAULT_OPTIONS: Readonly<ConversionOptions> = {
  precision: 2,
  wrap: "none",
  ignoreFont: false,
  defaultFont: "Libertinus Serif",
  marker: "default_marker",
};

// ---- Config file schema (snake_case keys, all optional) ----

export const WrapStyleSchema = z.enum(["none", "figure", "align"]);
export const MarkerPolicySchema = z.enum(["no_unknown_marker", "default_marker"]);

export const ConversionConfigSchema = z
  .object({
    precision: z.number().int().min(0).max(15).optional(),
    wrap: WrapStyleSchema.optional(),
    ignore_font: z.boolean().optional(),
    default_font: z.string().min(1).optional(),
    marker: MarkerPolicySchema.optional(),
  })
  .strict();

export type ConversionConfig = z.infer<typeof ConversionConfigSchema>;
