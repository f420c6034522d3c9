export * from "./numbers.js";
export * from "./strings.js";
export * from "./pairs.js";
