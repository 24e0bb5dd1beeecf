import type { WrapStyle } from "@svg2cetz/core";
import { indent } from "./utils.js";

const IMPORT_LINE = "import cetz.draw: *";

/**
 * Lightweight CeTZ canvas builder. Entries may span several lines; every
 * line is indented to the canvas body.
 */
export class CetzCanvas {
  private entries: string[] = [];

  constructor(private wrap: WrapStyle = "none") {}

  add(entry: string): void {
    this.entries.push(entry);
  }

  toLines(): string[] {
    const wrapped = this.wrap !== "none";
    const bodyIndent = wrapped ? "        " : "    ";
    const body = [IMPORT_LINE, ...this.entries].flatMap((entry) =>
      indent(entry, bodyIndent).split("\n"),
    );

    switch (this.wrap) {
      case "none":
        return ["#cetz.canvas({", ...body, "})"];
      case "figure":
        return ["#figure(", "    cetz.canvas({", ...body, "    })", ")"];
      case "align":
        return ["#align(center,", "    cetz.canvas({", ...body, "    })", ")"];
    }
  }

  toString(): string {
    return this.toLines().join("\n");
  }
}
