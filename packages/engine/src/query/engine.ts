/**
 * Query Engine
 *
 * Runs every scanned declaration through the filters in a fixed order and
 * yields one record per accepted binding. The sequence is lazy and
 * forward-only; a caller may stop pulling at any point.
 */

import type { TypeDeclaration, TypeGraph, TypeRef } from "../graph/types.js";
import {
  displayDeclaration,
  refOfDeclaration,
  typeRefsEqual,
} from "../graph/type-ref.js";
import { isAssignable } from "../matching/assignability.js";
import { bindingKey, solve } from "../matching/constraints.js";
import type { Binding } from "../matching/constraints.js";
import { compileWildcard, matchesWildcard } from "../matching/patterns.js";
import { selectModules, typesOf } from "../scanning/scanner.js";
import type { MatchRecord, Query } from "./types.js";

const hasAttribute = (declaration: TypeDeclaration, attribute: TypeRef): boolean =>
  declaration.attributes.some((applied) => typeRefsEqual(applied, attribute));

/**
 * Whether the declaration or any type containing it has type parameters.
 */
const isInGenericScope = (
  graph: TypeGraph,
  declaration: TypeDeclaration
): boolean => {
  let current: TypeDeclaration | undefined = declaration;
  while (current) {
    if (current.typeParameters.length > 0) return true;
    current = current.containingType
      ? graph.getDeclaration(current.containingType)
      : undefined;
  }
  return false;
};

/**
 * Kind, abstractness, nameability and staticness.
 */
const isEligible = (
  graph: TypeGraph,
  declaration: TypeDeclaration,
  query: Query
): boolean => {
  if (
    declaration.kind !== "class" ||
    declaration.isAbstract ||
    !declaration.canBeReferencedByName
  ) {
    return false;
  }

  // Static classes can only host a type-level static handler
  if (declaration.isStatic && query.handler?.kind !== "typeMethod") {
    return false;
  }

  // Open generics cannot be passed as a handler type argument
  if (query.handler && isInGenericScope(graph, declaration)) {
    return false;
  }

  return true;
};

const bindingsFor = (
  graph: TypeGraph,
  query: Query,
  type: TypeRef,
  generalizations: readonly TypeRef[] | undefined
): readonly (Binding | null)[] => {
  const handler = query.handler;
  if (handler?.kind !== "method") return [null];

  if (!generalizations) {
    return solve(graph, type, handler.typeParameters);
  }

  const seen = new Set<string>();
  return generalizations.flatMap((focus) =>
    solve(graph, type, handler.typeParameters, { focus }).filter((binding) => {
      const key = bindingKey(binding);
      if (seen.has(key)) return false;
      seen.add(key);
      return true;
    })
  );
};

export function* evaluate(
  query: Query,
  graph: TypeGraph
): Generator<MatchRecord> {
  const typeNameFilter = compileWildcard(query.typeNameFilter);
  const excludeByTypeName = compileWildcard(query.excludeByTypeName);

  for (const module of selectModules(graph, query)) {
    for (const declaration of typesOf(graph, module)) {
      if (!isEligible(graph, declaration, query)) continue;

      if (
        query.attributeFilter &&
        !hasAttribute(declaration, query.attributeFilter)
      ) {
        continue;
      }

      if (
        query.excludeByAttribute &&
        hasAttribute(declaration, query.excludeByAttribute)
      ) {
        continue;
      }

      const displayName = displayDeclaration(declaration);
      if (!matchesWildcard(typeNameFilter, displayName)) continue;
      if (excludeByTypeName && matchesWildcard(excludeByTypeName, displayName)) {
        continue;
      }

      const type = refOfDeclaration(declaration);

      if (
        query.excludeAssignableTo &&
        isAssignable(graph, type, query.excludeAssignableTo).matched
      ) {
        continue;
      }

      let generalizations: readonly TypeRef[] | undefined;
      if (query.assignableTo) {
        const assignability = isAssignable(graph, type, query.assignableTo);
        if (!assignability.matched) continue;
        generalizations = assignability.generalizations;
      }

      const bindings = bindingsFor(graph, query, type, generalizations);
      if (bindings.length === 0) continue;

      if (!graph.isVisibleFrom(query.position, declaration)) continue;

      for (const binding of bindings) {
        yield {
          declaration,
          type,
          generalizations: generalizations ?? [],
          binding,
        };
      }
    }
  }
}
