export * from "./scene.types.js";
export * from "./job.types.js";
export * from "./media.types.js";
export * from "./generation.types.js";
