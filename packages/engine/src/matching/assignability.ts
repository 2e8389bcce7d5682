/**
 * Assignability Resolver
 *
 * Decides whether a candidate is assignable to a target and returns every
 * generalization (closed instantiation of the target found in the
 * candidate's ancestry) that justifies it.
 */

import type { NamedTypeRef, TypeGraph, TypeRef } from "../graph/types.js";
import {
  isOpenDefinition,
  sameDefinition,
  typeRefKey,
  typeRefsEqual,
} from "../graph/type-ref.js";

export type Assignability = {
  readonly matched: boolean;
  /** Witnesses, deduplicated by structural identity, in ancestry order */
  readonly generalizations: readonly TypeRef[];
};

const noMatch: Assignability = { matched: false, generalizations: [] };

const matchOf = (generalizations: readonly TypeRef[]): Assignability =>
  generalizations.length > 0 ? { matched: true, generalizations } : noMatch;

const dedupe = (refs: readonly NamedTypeRef[]): readonly NamedTypeRef[] => {
  const seen = new Set<string>();
  return refs.filter((ref) => {
    const key = typeRefKey(ref);
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
};

/**
 * Interface-ness comes from the target's declaration. A target the graph
 * does not know is neither an interface nor anyone's ancestor.
 */
const isInterfaceTarget = (graph: TypeGraph, target: NamedTypeRef): boolean =>
  graph.getDeclaration(target.name)?.kind === "interface";

export const isAssignable = (
  graph: TypeGraph,
  candidate: TypeRef,
  target: TypeRef
): Assignability => {
  // Identity
  if (typeRefsEqual(candidate, target)) {
    return { matched: true, generalizations: [candidate] };
  }

  if (target.kind !== "named") return noMatch;

  if (isOpenDefinition(target)) {
    if (isInterfaceTarget(graph, target)) {
      return matchOf(
        dedupe(
          graph
            .allInterfacesOf(candidate)
            .filter((iface) => sameDefinition(iface, target))
        )
      );
    }

    const base = graph
      .baseTypesOf(candidate)
      .find((ancestor) => sameDefinition(ancestor, target));
    return base ? matchOf([base]) : noMatch;
  }

  if (isInterfaceTarget(graph, target)) {
    return graph
      .allInterfacesOf(candidate)
      .some((iface) => typeRefsEqual(iface, target))
      ? matchOf([target])
      : noMatch;
  }

  const base = graph
    .baseTypesOf(candidate)
    .find((ancestor) => typeRefsEqual(ancestor, target));
  return base ? matchOf([base]) : noMatch;
};
