/**
 * genscan frontend - graph documents, query documents and TypeScript
 * source extraction
 */

export {
  type DiagnosticSeverity,
  type DiagnosticCode,
  type SourceLocation,
  type Diagnostic,
  createDiagnostic,
  formatDiagnostic,
  hasErrors,
  isError as isDiagnosticError,
} from "./types/diagnostic.js";

export * from "./types/result.js";

export { BUILTIN_MODULE, builtinAliases } from "./builtins/index.js";
export * from "./type-strings/index.js";
export * from "./graph-loader/index.js";
export * from "./query/index.js";
export * from "./source/index.js";
