export * from "./nodes.js";
export * from "./builder.js";
