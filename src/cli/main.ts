import { writeFileSync } from "node:fs";
import { parseArgs } from "node:util";
import { PNG } from "pngjs";

import { initialExplorerConfig } from "../config";
import type { ColoringStrategy } from "../fractals/algorithms/coloring";
import type { ExplorerOptions } from "../fractals/render/explorer";
import { FractalExplorer } from "../fractals/render/explorer";
import { InvalidArgumentError } from "../lib/errors";
import { applyCommand, parseCommand } from "./commands";

const USAGE = `Usage: mandelbrot-render [options] [command...]

Options:
  --width N            output width in pixels (default ${initialExplorerConfig.width})
  --height N           output height in pixels (default ${initialExplorerConfig.height})
  --max-iterations N   iteration cap (default ${initialExplorerConfig.maxIterations})
  --seed S             seed for random palettes
  --coloring MODE      smooth | histogram
  --out FILE           PNG file to write (default mandelbrot.png)
  --debug              log recompute timings

Commands (applied in order):
  zoom:X,Y,FACTOR  zoom-in:X,Y  zoom-out:X,Y  resize:WxH
  palette  reset  iterations:N  coloring:MODE`;

function parseInteger(value: string | undefined, name: string): number | undefined {
  if (value === undefined) return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError(`--${name} must be an integer, got "${value}"`, name);
  }
  return parsed;
}

function parseColoring(value: string | undefined): ColoringStrategy | undefined {
  if (value === undefined) return undefined;
  if (value === "smooth") return "smooth";
  if (value === "histogram") return "histogram";
  throw new InvalidArgumentError(`--coloring must be "smooth" or "histogram", got "${value}"`, "coloring");
}

/**
 * Runs one render: parses options and commands from `argv`, applies the commands in
 * order and writes the frame as PNG. Returns the process exit status.
 */
export function main(argv: string[]): number {
  try {
    const { values, positionals } = parseArgs({
      args: argv,
      allowPositionals: true,
      options: {
        width: { type: "string" },
        height: { type: "string" },
        "max-iterations": { type: "string" },
        seed: { type: "string" },
        coloring: { type: "string" },
        out: { type: "string", default: "mandelbrot.png" },
        debug: { type: "boolean", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });

    if (values.help) {
      console.log(USAGE);
      return 0;
    }

    const commands = positionals.map(parseCommand);

    const options: ExplorerOptions = { debug: values.debug };
    const width = parseInteger(values.width, "width");
    const height = parseInteger(values.height, "height");
    const maxIterations = parseInteger(values["max-iterations"], "max-iterations");
    const coloring = parseColoring(values.coloring);
    if (width !== undefined) options.width = width;
    if (height !== undefined) options.height = height;
    if (maxIterations !== undefined) options.maxIterations = maxIterations;
    if (coloring !== undefined) options.coloring = coloring;
    if (values.seed !== undefined) options.seed = values.seed;

    const explorer = new FractalExplorer(options);
    commands.forEach((command) => applyCommand(explorer, command));

    const { width: outWidth, height: outHeight, xMin, xMax, yMin, yMax } = explorer.getViewport();
    const png = new PNG({ width: outWidth, height: outHeight });
    explorer.draw(png.data);

    const out = values.out ?? "mandelbrot.png";
    writeFileSync(out, PNG.sync.write(png));

    const { lastRecompute } = explorer.getStats();
    console.log(
      `Wrote ${out} (${outWidth}x${outHeight}, x=[${xMin}, ${xMax}] y=[${yMin}, ${yMax}]` +
        (lastRecompute ? `, ${lastRecompute.duration.toFixed(0)}ms)` : ")")
    );
    return 0;
  } catch (error) {
    console.error(`mandelbrot-render: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}
