/**
 * Marker comments written by the slicer around features and layers.
 * They are matched on the trimmed raw line.
 */

import type { GcodeLine } from "./line.ts";

const EDGE_WIDTH = /^\(<edgeWidth>\s+([-+]?[.\d]+)/;
const DECIMAL_PLACES = /^\(<decimalPlacesCarried>\s+(\d+)/;

function text(line: GcodeLine): string {
  return line.raw.trim();
}

export function isLayerStart(line: GcodeLine): boolean {
  const t = text(line);
  return t.startsWith("(<layer>") || t.startsWith(";LAYER:");
}

export function isInitializationEnd(line: GcodeLine): boolean {
  return text(line) === "(</extruderInitialization>)";
}

export function isLoopBegin(line: GcodeLine): boolean {
  return text(line).startsWith("(<loop>");
}

export function isLoopEnd(line: GcodeLine): boolean {
  return text(line).startsWith("(</loop>)");
}

export function isOuterEdgeBegin(line: GcodeLine): boolean {
  return text(line).startsWith("(<edge> outer");
}

/**
 * Any edge that is not tagged "outer" is an inner edge (a hole wall)
 */
export function isInnerEdgeBegin(line: GcodeLine): boolean {
  return text(line).startsWith("(<edge>") && !isOuterEdgeBegin(line);
}

export function isEdgeEnd(line: GcodeLine): boolean {
  return text(line).startsWith("(</edge>)");
}

/**
 * Edge width declared by a "(<edgeWidth> 0.4 )" line, undefined otherwise
 */
export function edgeWidthOf(line: GcodeLine): number | undefined {
  const match = EDGE_WIDTH.exec(text(line));
  if (!match) return undefined;
  const value = Number(match[1]);
  return Number.isFinite(value) && value > 0 ? value : undefined;
}

/**
 * Output precision declared by a "(<decimalPlacesCarried> 3 )" line
 */
export function decimalPlacesOf(line: GcodeLine): number | undefined {
  const match = DECIMAL_PLACES.exec(text(line));
  return match ? Number(match[1]) : undefined;
}
