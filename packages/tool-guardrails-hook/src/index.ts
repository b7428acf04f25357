export * from "./types.js";
export * from "./errors.js";
export * from "./policy.js";
export * from "./domains.js";
export * from "./normalize.js";
export * from "./classify.js";
export * from "./render.js";
export * from "./dispatch.js";
export * from "./hook.js";
export * from "./run-command.js";
export * from "./format.js";
