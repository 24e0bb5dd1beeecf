import { execFileSync } from "node:child_process";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import os from "node:os";
import path from "node:path";
import {
  fail,
  ok,
  type BoundingBoxQuery,
  type BoxXYWH,
  type Result,
  type SceneDocument,
} from "@svg2cetz/core";

/**
 * Visual bounding boxes from Inkscape itself: the document is written to a
 * temporary file and queried for every id in one run.
 */
export class InkscapeBoundsQuery implements BoundingBoxQuery {
  constructor(
    private readonly document: SceneDocument,
    private readonly executable = "inkscape",
  ) {}

  queryBoundingBoxes(ids: readonly string[]): Result<Map<string, BoxXYWH>> {
    if (ids.length === 0) return ok(new Map());

    const tempDir = mkdtempSync(path.join(os.tmpdir(), "svg2cetz-"));
    const svgPath = path.join(tempDir, "selection.svg");
    try {
      writeFileSync(svgPath, this.document.toString(), "utf-8");
      const output = execFileSync(
        this.executable,
        [
          svgPath,
          `--query-id=${ids.join(",")}`,
          "--query-x",
          "--query-y",
          "--query-width",
          "--query-height",
        ],
        { encoding: "utf-8", stdio: ["ignore", "pipe", "pipe"] },
      );
      return parseQueryOutput(output, ids, this.document.viewBoxScale);
    } catch (err) {
      return fail(
        "bounding-box-unavailable",
        `Inkscape query failed: ${err instanceof Error ? err.message : String(err)}`,
        null,
        "Check that Inkscape is installed, or use --query geometry",
      );
    } finally {
      rmSync(tempDir, { recursive: true, force: true });
    }
  }
}

/**
 * Inkscape prints one line per queried property (x, y, width, height),
 * each holding a comma-separated value per id, in user units.
 *
 *   "0,10\n0,5\n20,20\n10,10" → a: {0, 0, 20, 10}, b: {10, 5, 20, 10}
 */
export function parseQueryOutput(
  output: string,
  ids: readonly string[],
  viewBoxScale: number,
): Result<Map<string, BoxXYWH>> {
  const rows = output
    .trim()
    .split(/\r?\n/)
    .map((line) => line.split(",").map((v) => Number(v.trim())));

  const boxes = new Map<string, BoxXYWH>();
  if (rows.length < 4) return ok(boxes);
  const [xs, ys, widths, heights] = rows;

  ids.forEach((id, i) => {
    const values = [xs[i], ys[i], widths[i], heights[i]];
    // No box for ids Inkscape could not measure
    if (!values.every(Number.isFinite)) return;
    const [x, y, width, height] = values.map((v) => v * viewBoxScale);
    boxes.set(id, { x, y, width, height });
  });
  return ok(boxes);
}
