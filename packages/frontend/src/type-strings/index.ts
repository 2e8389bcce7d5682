export {
  formatTypeRef,
  parseTypeString,
  splitTypeArguments,
} from "./parser.js";
export { displayTypeRef } from "@genscan/engine";
