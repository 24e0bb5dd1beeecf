import type { NormalizedPath, PathCommand } from "@svg2cetz/core";
import {
  formatPoint,
  mapPoint,
  type ConversionContext,
  type MappedPoint,
} from "./coordinate-transform.js";

/**
 * One CeTZ primitive of a path. Bezier points are in CeTZ argument order:
 * start, end, first control, second control.
 */
export interface ShapeSegmentGroup {
  readonly kind: "line" | "bezier";
  readonly points: readonly MappedPoint[];
}

interface DraftGroup {
  kind?: "line" | "bezier";
  points: MappedPoint[];
}

/**
 * Split a normalized path into line and bezier groups, with every point
 * already mapped into CeTZ space.
 *
 * - `move` opens an empty group;
 * - a `line` right after a `move` or another `line` extends the group,
 *   anywhere else it opens a new line group;
 * - a `cubic` right after a `move` fills the empty group, anywhere else
 *   it opens a new bezier group;
 * - `close` appends the subpath start to a line group, or adds a closing
 *   line, unless the current point is already there.
 *
 * Groups that stay empty are dropped.
 */
export function assemblePath(
  path: NormalizedPath,
  ctx: ConversionContext,
): ShapeSegmentGroup[] {
  const groups: DraftGroup[] = [];
  let current: MappedPoint = mapPoint(0, 0, ctx);
  let start = current;
  let previous: PathCommand["type"] | undefined;

  const last = (): DraftGroup | undefined => groups[groups.length - 1];

  for (const cmd of path) {
    switch (cmd.type) {
      case "move":
        current = mapPoint(cmd.x, cmd.y, ctx);
        start = current;
        groups.push({ points: [] });
        break;

      case "line": {
        const point = mapPoint(cmd.x, cmd.y, ctx);
        const group = last();
        if (previous === "move" && group) {
          group.kind = "line";
          group.points.push(current, point);
        } else if (previous === "line" && group) {
          group.points.push(point);
        } else {
          groups.push({ kind: "line", points: [current, point] });
        }
        current = point;
        break;
      }

      case "cubic": {
        const end = mapPoint(cmd.x, cmd.y, ctx);
        const points = [
          current,
          end,
          mapPoint(cmd.c1x, cmd.c1y, ctx),
          mapPoint(cmd.c2x, cmd.c2y, ctx),
        ];
        const group = last();
        if (previous === "move" && group) {
          group.kind = "bezier";
          group.points = points;
        } else {
          groups.push({ kind: "bezier", points });
        }
        current = end;
        break;
      }

      case "close": {
        const group = last();
        if (!samePoint(current, start)) {
          if (previous === "line" && group) {
            group.points.push(start);
          } else {
            groups.push({ kind: "line", points: [current, start] });
          }
        }
        current = start;
        break;
      }
    }
    previous = cmd.type;
  }

  const result: ShapeSegmentGroup[] = [];
  for (const group of groups) {
    if (group.kind === undefined || group.points.length === 0) continue;
    result.push(Object.freeze({ kind: group.kind, points: Object.freeze([...group.points]) }));
  }
  return result;
}

function samePoint(a: MappedPoint, b: MappedPoint): boolean {
  return a[0] === b[0] && a[1] === b[1];
}

/** `line((0, 0), (1, 0))` / `bezier(...)` */
export function formatGroup(group: ShapeSegmentGroup, style?: string): string {
  const args = group.points.map(formatPoint);
  if (style) args.push(style);
  return `${group.kind}(${args.join(", ")})`;
}
