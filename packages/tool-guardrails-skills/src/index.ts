export * from "./manifest.js";
export * from "./resolve.js";
export * from "./inject.js";
export * from "./program.js";
export * from "./validate.js";
export * from "./detect.js";
