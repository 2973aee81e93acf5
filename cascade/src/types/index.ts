export * from "./style.js";
export * from "./document.js";
export * from "./errors.js";
export * from "./options.js";
export * from "./events.js";
export * from "./transform.js";
