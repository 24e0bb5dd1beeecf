import { Command } from "commander";
import { bboxCommand } from "./commands/bbox.js";
import { convertCommand } from "./commands/convert.js";

const program = new Command();

program
  .name("svg2cetz")
  .description("Convert SVG drawings into CeTZ code for Typst")
  .version("0.1.0");

program
  .command("convert <input>")
  .description("Convert the selected elements of an SVG file into a CeTZ canvas")
  .option("-o, --output <file>", "Output file path (default: stdout)")
  .option("--id <ids...>", "Ids of the elements to convert (default: all)")
  .option("--precision <n>", "Decimal digits of coordinates")
  .option("--wrap <style>", "Wrap the canvas (none, figure, align)")
  .option("--ignore-font", "Omit font families")
  .option("--default-font <name>", "Font used for generic families")
  .option("--marker <policy>", "Unknown markers (no_unknown_marker, default_marker)")
  .option("--config <file>", "YAML/JSON file with conversion options")
  .option("--query <kind>", "Bounding-box source (geometry, inkscape)", "geometry")
  .option("--inkscape <path>", "Inkscape executable", "inkscape")
  .action(convertCommand);

program
  .command("bbox <input>")
  .description("Print the bounding boxes of the selected elements")
  .option("--id <ids...>", "Ids of the elements to measure (default: all)")
  .option("--query <kind>", "Bounding-box source (geometry, inkscape)", "geometry")
  .option("--inkscape <path>", "Inkscape executable", "inkscape")
  .action(bboxCommand);

program.parse();
