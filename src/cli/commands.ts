import type { ColoringStrategy } from "../fractals/algorithms/coloring";
import type { FractalExplorer } from "../fractals/render/explorer";
import { InvalidArgumentError } from "../lib/errors";
import type { Point } from "../lib/viewport";

/** Zoom factor of a single left click in the interactive host. */
export const ZOOM_IN_FACTOR = 0.5;
/** Zoom factor of a single right click in the interactive host. */
export const ZOOM_OUT_FACTOR = 2.0;

const COLORING_NAMES: readonly ColoringStrategy[] = ["smooth", "histogram"];

export type ExplorerCommand =
  | { kind: "zoom"; point: Point; factor: number }
  | { kind: "resize"; width: number; height: number }
  | { kind: "palette" }
  | { kind: "reset" }
  | { kind: "iterations"; maxIterations: number }
  | { kind: "coloring"; coloring: ColoringStrategy };

function parseNumbers(text: string, separator: string, count: number, command: string): number[] {
  const parts = text.split(separator);
  const numbers = parts.map((part) => (part.trim() === "" ? NaN : Number(part)));
  if (parts.length !== count || numbers.some((n) => !Number.isFinite(n))) {
    throw new InvalidArgumentError(`"${command}" expects ${count} numbers separated by "${separator}"`, "command");
  }
  return numbers;
}

/**
 * Parses one command of a render script:
 * `zoom:X,Y,FACTOR`, `zoom-in:X,Y`, `zoom-out:X,Y`, `resize:WxH`, `palette`, `reset`,
 * `iterations:N` or `coloring:smooth|histogram`.
 */
export function parseCommand(text: string): ExplorerCommand {
  const separatorIndex = text.indexOf(":");
  const name = separatorIndex === -1 ? text : text.slice(0, separatorIndex);
  const args = separatorIndex === -1 ? "" : text.slice(separatorIndex + 1);

  switch (name) {
    case "zoom": {
      const [x, y, factor] = parseNumbers(args, ",", 3, text);
      return { kind: "zoom", point: { x, y }, factor };
    }
    case "zoom-in":
    case "zoom-out": {
      const [x, y] = parseNumbers(args, ",", 2, text);
      return { kind: "zoom", point: { x, y }, factor: name === "zoom-in" ? ZOOM_IN_FACTOR : ZOOM_OUT_FACTOR };
    }
    case "resize": {
      const [width, height] = parseNumbers(args, "x", 2, text);
      return { kind: "resize", width, height };
    }
    case "iterations": {
      const [maxIterations] = parseNumbers(args, ",", 1, text);
      return { kind: "iterations", maxIterations };
    }
    case "coloring": {
      const coloring = COLORING_NAMES.find((candidate) => candidate === args);
      if (coloring === undefined) {
        throw new InvalidArgumentError(`Unknown coloring strategy "${args}"`, "command");
      }
      return { kind: "coloring", coloring };
    }
    case "palette":
    case "reset":
      if (args !== "") {
        throw new InvalidArgumentError(`"${name}" takes no arguments`, "command");
      }
      return name === "palette" ? { kind: "palette" } : { kind: "reset" };
    default:
      throw new InvalidArgumentError(`Unknown command "${text}"`, "command");
  }
}

export function applyCommand(explorer: FractalExplorer, command: ExplorerCommand): void {
  switch (command.kind) {
    case "zoom":
      explorer.zoom(command.point, command.factor);
      break;
    case "resize":
      explorer.resize(command.width, command.height);
      break;
    case "palette":
      explorer.randomizePalette();
      break;
    case "reset":
      explorer.reset();
      break;
    case "iterations":
      explorer.setMaxIterations(command.maxIterations);
      break;
    case "coloring":
      explorer.setColoring(command.coloring);
      break;
  }
}
