export * from "./elements.js";
export * from "./document.js";
