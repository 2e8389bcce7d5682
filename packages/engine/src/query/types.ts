/**
 * Query and match record types
 */

import type {
  GenericParameter,
  NamedTypeRef,
  TypeDeclaration,
  TypeRef,
  VisibilityPosition,
} from "../graph/types.js";
import type { Binding } from "../matching/constraints.js";

/**
 * Handler the matches are destined for.
 *
 * - `method`: a generic method on the declaring type; its type parameters
 *   drive constraint solving and the first one receives the matched type.
 * - `typeMethod`: a static method called on each matched type; static
 *   classes become eligible and no constraints are solved.
 */
export type HandlerSignature =
  | {
      readonly kind: "method";
      readonly name: string;
      readonly typeParameters: readonly GenericParameter[];
    }
  | {
      readonly kind: "typeMethod";
      readonly name: string;
    };

/**
 * Validated, immutable set of filters. Front ends are responsible
 * for resolving names; references here are taken as given.
 */
export type Query = {
  /** Where the query is declared; module and accessibility context */
  readonly position: VisibilityPosition;
  /** Scan only the module owning this type */
  readonly assemblyOfType?: NamedTypeRef;
  /** Scan modules of the reference closure whose name matches */
  readonly assemblyNameFilter?: string;
  readonly assignableTo?: NamedTypeRef;
  readonly excludeAssignableTo?: NamedTypeRef;
  /** Required marker attribute */
  readonly attributeFilter?: NamedTypeRef;
  /** Excluded marker attribute */
  readonly excludeByAttribute?: NamedTypeRef;
  readonly typeNameFilter?: string;
  readonly excludeByTypeName?: string;
  readonly handler?: HandlerSignature;
};

/**
 * One accepted (candidate, binding) pair.
 */
export type MatchRecord = {
  readonly declaration: TypeDeclaration;
  readonly type: TypeRef;
  /** Generalizations captured by the assignable-to filter */
  readonly generalizations: readonly TypeRef[];
  /** Null when the query has no generic handler */
  readonly binding: Binding | null;
};
