export {
  loadGraphFile,
  parseGraphDocument,
  parseGenericParameterList,
} from "./loader.js";
export type { LoadedGraph } from "./loader.js";
export { toGraphDocument } from "./writer.js";
export type { WriteOptions } from "./writer.js";
export { implicitBaseType, implicitConstructors } from "./document.js";
export type {
  ConstructorDocument,
  GenericParameterDocument,
  GraphDocument,
  MethodDocument,
  ModuleDocument,
  TypeDocument,
} from "./document.js";
