// src/core/generic/index.ts
// Generic functions: pattern-based multiple dispatch

export * from "./types";
export * from "./errors";
export * from "./registry";
export * from "./dispatch";
export * from "./combiners";
export * from "./generic";
