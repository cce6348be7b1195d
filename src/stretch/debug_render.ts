/**
 * Debug visualization of one layer: the original extrusion paths, the
 * stretched paths, and a tick from each original point to its stretched
 * position. Returns a PNG data URL and optionally writes the PNG to disk.
 */

import { PNG } from "pngjs";
import { Buffer } from "node:buffer";
import { writeFile } from "node:fs/promises";
import type { Program } from "../gcode/program.ts";
import { distance, lerp, perpendicular, type Point, scale, subtract } from "./geometry.ts";
import type { StretchedMove } from "./stretch_filter.ts";
import { pointOf } from "./stretch_vector.ts";

type RGBA = readonly [number, number, number, number];

const COLORS = {
  WHITE: [255, 255, 255, 255],
  BLACK: [0, 0, 0, 255],
  ORANGE: [255, 165, 0, 200],
  RED: [255, 0, 0, 255],
} as const satisfies Record<string, RGBA>;

/**
 * RGBA raster in pixel coordinates, y pointing down
 */
class Raster {
  readonly data: Uint8Array;

  constructor(readonly width: number, readonly height: number, background: RGBA) {
    this.data = new Uint8Array(width * height * 4);
    for (let offset = 0; offset < this.data.length; offset += 4) {
      this.data.set(background, offset);
    }
  }

  private contains(x: number, y: number): boolean {
    return x >= 0 && y >= 0 && x < this.width && y < this.height;
  }

  private plot(x: number, y: number, color: RGBA): void {
    const offset = (y * this.width + x) * 4;
    const alpha = color[3] / 255;
    for (let channel = 0; channel < 3; channel++) {
      this.data[offset + channel] = this.data[offset + channel] * (1 - alpha) +
        color[channel] * alpha;
    }
    this.data[offset + 3] = 255;
  }

  /**
   * Stroke a segment `width` pixels wide. Each pixel is blended once per
   * segment, so translucent colours do not build up.
   */
  segment(from: Point, to: Point, width: number, color: RGBA): void {
    const length = distance(from, to);
    const across = length > 0
      ? perpendicular(scale(subtract(to, from), 1 / length))
      : { x: 0, y: 0 };
    const samples = Math.max(2, Math.ceil(length));
    const painted = new Set<number>();
    for (let i = 0; i <= samples; i++) {
      const center = lerp(from, to, i / samples);
      for (let w = -width / 2; w <= width / 2; w += 0.5) {
        const x = Math.round(center.x + w * across.x);
        const y = Math.round(center.y + w * across.y);
        const key = y * this.width + x;
        if (!this.contains(x, y) || painted.has(key)) continue;
        painted.add(key);
        this.plot(x, y, color);
      }
    }
  }

  polyline(points: readonly Point[], width: number, color: RGBA): void {
    for (let i = 1; i < points.length; i++) {
      this.segment(points[i - 1], points[i], width, color);
    }
  }

  toPNG(): Buffer {
    const png = new PNG({ width: this.width, height: this.height });
    png.data = Buffer.from(this.data);
    return PNG.sync.write(png);
  }
}

// ============================================================================
// Layer extraction
// ============================================================================

export interface DebugLayers {
  /** Extruded threads as drawn by the original program (mm) */
  original: Point[][];
  /** The same threads after stretching (mm) */
  stretched: Point[][];
  /** Original -> stretched pairs for each rewritten move (mm) */
  displacements: Array<[Point, Point]>;
}

/**
 * Collect the extruded threads of one layer. A thread starts at the move
 * before its first extruding move, so approach moves that were stretched
 * show up as the thread start.
 */
export function collectLayerPaths(
  program: Program,
  layerIndex: number,
  moves: readonly StretchedMove[],
): DebugLayers {
  const layer = program.layers[layerIndex];
  if (!layer) {
    throw new RangeError(`layer ${layerIndex} does not exist (${program.layers.length} layers)`);
  }
  const stretchedAt = new Map<number, Point>();
  const displacements: Array<[Point, Point]> = [];
  for (const move of moves) {
    if (move.layerIndex !== layerIndex) continue;
    stretchedAt.set(move.lineIndex, move.stretched);
    displacements.push([move.original, move.stretched]);
  }

  const original: Point[][] = [];
  const stretched: Point[][] = [];
  let runOriginal: Point[] = [];
  let runStretched: Point[] = [];
  let previous: { original: Point; stretched: Point } | null = null;

  const closeRun = () => {
    if (runOriginal.length > 1) {
      original.push(runOriginal);
      stretched.push(runStretched);
    }
    runOriginal = [];
    runStretched = [];
  };

  layer.lines.forEach((line, index) => {
    if (line.kind !== "linear" && line.kind !== "motion") return;
    const point = pointOf(line);
    const current = { original: point, stretched: stretchedAt.get(index) ?? point };
    if (line.extruding) {
      if (runOriginal.length === 0 && previous !== null) {
        runOriginal.push(previous.original);
        runStretched.push(previous.stretched);
      }
      runOriginal.push(current.original);
      runStretched.push(current.stretched);
    } else {
      closeRun();
    }
    previous = current;
  });
  closeRun();

  return { original, stretched, displacements };
}

// ============================================================================
// Rendering
// ============================================================================

export interface DebugRenderOptions {
  /** Output filename (if provided, saves to disk) */
  filename?: string;
  /** Width of lines for visualization, in pixels */
  lineWidth?: number;
  /** Pixels per millimetre */
  scale?: number;
  /** Blank border around the drawing, in pixels */
  margin?: number;
}

/**
 * Render the original threads (black), the stretched threads (orange) and
 * the displacements (red). The Y axis points up as on the machine.
 * @throws RangeError when there are no threads to draw
 */
export async function renderStretchDebug(
  layers: DebugLayers,
  options: DebugRenderOptions = {},
): Promise<string> {
  const lineWidth = options.lineWidth ?? 1;
  const scale = options.scale ?? 20;
  const margin = options.margin ?? 10;

  const all = [...layers.original.flat(), ...layers.stretched.flat()];
  if (all.length === 0) {
    throw new RangeError("Nothing to render: the layer has no extruded threads");
  }
  const minX = Math.min(...all.map((p) => p.x));
  const maxX = Math.max(...all.map((p) => p.x));
  const minY = Math.min(...all.map((p) => p.y));
  const maxY = Math.max(...all.map((p) => p.y));

  const width = Math.ceil((maxX - minX) * scale) + 2 * margin;
  const height = Math.ceil((maxY - minY) * scale) + 2 * margin;
  const raster = new Raster(width, height, COLORS.WHITE);

  const toPixel = (p: Point): Point => ({
    x: margin + (p.x - minX) * scale,
    y: margin + (maxY - p.y) * scale,
  });

  for (const path of layers.original) {
    raster.polyline(path.map(toPixel), lineWidth, COLORS.BLACK);
  }
  for (const path of layers.stretched) {
    raster.polyline(path.map(toPixel), lineWidth, COLORS.ORANGE);
  }
  for (const [from, to] of layers.displacements) {
    raster.segment(toPixel(from), toPixel(to), lineWidth, COLORS.RED);
  }

  const png = raster.toPNG();
  if (options.filename) {
    await writeFile(options.filename, png);
  }
  return `data:image/png;base64,${png.toString("base64")}`;
}
