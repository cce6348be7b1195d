/**
 * Output emission: collects output lines in document order and carries
 * the last known feed rate forward for the moves it rewrites.
 */

import type { GcodeLine } from "./line.ts";

/**
 * Round to `places` decimals and drop trailing zeros ("1.250" -> "1.25",
 * "2.000" -> "2"). Never uses exponent notation; negative zero prints as "0".
 */
export function formatNumber(value: number, places: number): string {
  const fixed = value.toFixed(places);
  const trimmed = fixed.includes(".") ? fixed.replace(/\.?0+$/, "") : fixed;
  return trimmed === "-0" ? "0" : trimmed;
}

/** Words replaced by the emitter when a move is rewritten */
const REWRITTEN_WORDS = new Set(["X", "Y", "Z", "F"]);

export class OutputEmitter {
  private readonly lines: string[] = [];
  private feedRate: number | undefined;

  constructor(private decimalPlaces = 3) {}

  get precision(): number {
    return this.decimalPlaces;
  }

  set precision(places: number) {
    this.decimalPlaces = places;
  }

  /** Most recent explicit F value seen, undefined before the first one */
  get lastFeedRate(): number | undefined {
    return this.feedRate;
  }

  private observe(line: GcodeLine): void {
    if (line.f !== undefined) {
      this.feedRate = line.f;
    }
  }

  /**
   * Copy a line unchanged
   */
  passthrough(line: GcodeLine): void {
    this.observe(line);
    this.lines.push(line.raw);
  }

  /**
   * Emit `line` as a linear move to (x, y) at its own Z. The line's Z word
   * and words other than X/Y/Z/F (E, S, ...) are kept verbatim; F is the
   * carried feed rate.
   */
  rewrittenMove(line: GcodeLine, x: number, y: number): string {
    this.observe(line);
    const places = this.decimalPlaces;
    const zWord = line.z === undefined
      ? undefined
      : line.words.find((w) =>
        w[0].toUpperCase() === "Z" && Number(w.slice(1)) === line.z
      );
    const parts = [
      "G1",
      `X${formatNumber(x, places)}`,
      `Y${formatNumber(y, places)}`,
      zWord ?? `Z${formatNumber(line.position.z, places)}`,
      ...line.words.filter((w) => !REWRITTEN_WORDS.has(w[0].toUpperCase())),
    ];
    if (this.feedRate !== undefined) {
      parts.push(`F${formatNumber(this.feedRate, places)}`);
    }
    const text = parts.join(" ");
    this.lines.push(text);
    return text;
  }

  get output(): readonly string[] {
    return this.lines;
  }

  toText(): string {
    return this.lines.join("\n");
  }
}
