export { buildQueries, buildQuery } from "./builder.js";
export type { BuiltQuery } from "./builder.js";
export { loadQueryFile, parseQueryText } from "./loader.js";
