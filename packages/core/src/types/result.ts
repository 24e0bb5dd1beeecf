export type ConversionErrorCode =
  | "empty-selection"
  | "unsupported-element"
  | "unsupported-paint"
  | "malformed-rectangle"
  | "malformed-path"
  | "degenerate-geometry"
  | "bounding-box-unavailable";

export interface ConversionError {
  code: ConversionErrorCode;
  /** `info` issues end the run normally; `error` issues abort it. */
  severity: "info" | "error";
  message: string;
  elementId: string | null;
  suggestion?: string;
}

export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: ConversionError };

export function ok<T>(value: T): Result<T> {
  return { ok: true, value };
}

export function fail<T = never>(
  code: ConversionErrorCode,
  message: string,
  elementId: string | null = null,
  suggestion?: string,
): Result<T> {
  const severity = code === "empty-selection" ? "info" : "error";
  const error: ConversionError = { code, severity, message, elementId };
  if (suggestion !== undefined) error.suggestion = suggestion;
  return { ok: false, error };
}
