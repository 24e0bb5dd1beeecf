import { querySelectionBoxes, type BoundingBox } from "@svg2cetz/core";
import {
  createQuery,
  loadDocument,
  reportError,
  selectElements,
  type SelectionOptions,
} from "./shared.js";

export function bboxCommand(input: string, options: SelectionOptions): void {
  try {
    const document = loadDocument(input);
    const elements = document.flatten(selectElements(document, options.id));
    if (elements.length === 0) {
      console.log("No object was selected!");
      return;
    }

    document.ensureIds(elements);
    const result = querySelectionBoxes(createQuery(document, options), elements);
    if (!result.ok) {
      reportError(result.error);
      return;
    }

    for (const [id, box] of result.value.perElement) {
      console.log(`${id}: ${formatBox(box)}`);
    }
    console.log(`\nSelection: ${formatBox(result.value.global)}`);
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }
}

function formatBox(box: BoundingBox): string {
  const n = (v: number) => Number(v.toFixed(2)).toString();
  return `x=${n(box.left)} y=${n(box.top)} width=${n(box.width)} height=${n(box.height)}`;
}
