/**
 * genscan engine - type matching and generic constraint solving
 */

export * from "./graph/types.js";
export * from "./graph/type-ref.js";
export { createTypeGraph } from "./graph/graph.js";
export type { TypeGraphInput } from "./graph/graph.js";
export { buildNamespaceTree, createModuleNode } from "./graph/modules.js";

export { compileWildcard, matchesWildcard } from "./matching/patterns.js";
export { isAssignable } from "./matching/assignability.js";
export type { Assignability } from "./matching/assignability.js";
export { solve, bindingKey } from "./matching/constraints.js";
export type {
  Binding,
  BindingEntry,
  SolveOptions,
} from "./matching/constraints.js";

export { selectModules, typesOf } from "./scanning/scanner.js";

export { evaluate } from "./query/engine.js";
export type { HandlerSignature, MatchRecord, Query } from "./query/types.js";
