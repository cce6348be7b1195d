/**
 * Temperature gradient along Z, for unattended temperature calibration
 * prints. An M104 command is injected at the start of each layer whose
 * rounded target temperature differs from the previous one.
 */

import { type Program, requireHeightSpan } from "../gcode/program.ts";
import { type Logger, silentLogger } from "../log.ts";

export const ABSOLUTE_MIN_TEMPERATURE = 150;
export const ABSOLUTE_MAX_TEMPERATURE = 250;

export type GradientMode = "continuous" | "step";

export interface TemperatureGradientOptions {
  startTemp: number;
  endTemp: number;
  /** Layers at or below this height keep the slicer's temperature */
  minZChange?: number;
  mode?: GradientMode;
  /** Number of temperature steps in "step" mode */
  steps?: number;
}

const DEFAULT_OPTIONS = {
  minZChange: 0.1,
  mode: "step",
  steps: 10,
} as const satisfies Partial<TemperatureGradientOptions>;

export interface TemperatureChange {
  layerIndex: number;
  z: number;
  temperature: number;
}

export interface TemperatureGradientResult {
  lines: string[];
  changes: TemperatureChange[];
}

export interface HeightSpan {
  zmin: number;
  zmax: number;
}

/**
 * Target temperature at height `z` (not rounded).
 *
 * Step mode splits the span into `steps + 1` plateaus going from
 * `startTemp` to `endTemp`; the last plateau sits exactly on `endTemp`.
 */
export function temperatureAt(
  z: number,
  span: HeightSpan,
  options: Pick<TemperatureGradientOptions, "startTemp" | "endTemp"> & {
    mode: GradientMode;
    steps: number;
  },
): number {
  const { startTemp, endTemp } = options;
  const progress = (z - span.zmin) / (span.zmax - span.zmin);
  if (options.mode === "continuous") {
    return startTemp + (endTemp - startTemp) * progress;
  }
  const plateaus = options.steps + 1;
  const stepEndTemp = endTemp + (endTemp - startTemp) / options.steps;
  const stepped = Math.floor(progress * plateaus) / plateaus;
  const temp = startTemp + stepped * (stepEndTemp - startTemp);
  return startTemp >= endTemp ? Math.max(endTemp, temp) : Math.min(endTemp, temp);
}

export function temperatureCommand(temperature: number): string {
  return `M104 S${temperature.toFixed(1)}`;
}

/**
 * Inject the gradient into `program`.
 * @throws InsufficientHeightError when the program has no usable height
 */
export function temperatureGradient(
  program: Program,
  options: TemperatureGradientOptions,
  logger: Logger = silentLogger,
): TemperatureGradientResult {
  const minZChange = options.minZChange ?? DEFAULT_OPTIONS.minZChange;
  const mode = options.mode ?? DEFAULT_OPTIONS.mode;
  const steps = options.steps ?? DEFAULT_OPTIONS.steps;
  if (!Number.isInteger(steps) || steps < 1) {
    throw new RangeError(`steps must be a positive integer (got ${steps})`);
  }

  const span = requireHeightSpan(program, minZChange);
  logger.info(
    `temperature gradient from ${options.startTemp.toFixed(1)}°C, altitude ${span.zmin.toFixed(2)}mm ` +
      `to ${options.endTemp.toFixed(1)}°C, altitude ${span.zmax.toFixed(2)}mm`,
  );

  const lines: string[] = [];
  const changes: TemperatureChange[] = [];
  let lastTemperature: number | undefined;

  for (const layer of program.layers) {
    const z = layer.z;
    if (z !== undefined && z >= span.zmin && z <= span.zmax) {
      const target = Math.round(
        temperatureAt(z, span, { ...options, mode, steps }) * 10,
      ) / 10;
      if (target !== lastTemperature) {
        lastTemperature = target;
        if (
          target >= ABSOLUTE_MIN_TEMPERATURE &&
          target <= ABSOLUTE_MAX_TEMPERATURE
        ) {
          logger.debug(
            `target temp for layer #${layer.index} (height ${z.toFixed(2)}mm) is ${target.toFixed(1)}°C`,
          );
          lines.push(temperatureCommand(target));
          changes.push({ layerIndex: layer.index, z, temperature: target });
        } else {
          logger.warn(
            `layer #${layer.index}: ${target.toFixed(1)}°C is outside ` +
              `${ABSOLUTE_MIN_TEMPERATURE}-${ABSOLUTE_MAX_TEMPERATURE}°C, not applied`,
          );
        }
      }
    }
    for (const line of layer.lines) {
      lines.push(line.raw);
    }
  }

  return { lines, changes };
}
