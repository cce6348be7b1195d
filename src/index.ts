export * from "./errors.ts";
export * from "./log.ts";
export * from "./gcode/line.ts";
export * from "./gcode/markers.ts";
export * from "./gcode/program.ts";
export * from "./gcode/emitter.ts";
export * from "./stretch/geometry.ts";
export * from "./stretch/options.ts";
export * from "./stretch/feature_state.ts";
export * from "./stretch/stretch_context.ts";
export * from "./stretch/traversal.ts";
export * from "./stretch/stretch_vector.ts";
export * from "./stretch/stretch_filter.ts";
export * from "./stretch/debug_render.ts";
export * from "./filters/temperature_gradient.ts";
export * from "./filters/relative_extrusion.ts";
