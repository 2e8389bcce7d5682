export {
  defaultCompilerOptions,
  extractFromProgram,
  extractTypeGraph,
} from "./extractor.js";
export type { ExtractOptions, ExtractedGraph } from "./extractor.js";
