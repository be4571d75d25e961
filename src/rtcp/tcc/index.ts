export * from "./builder.js";
export * from "./feedback.js";
export * from "./statusChunk.js";
