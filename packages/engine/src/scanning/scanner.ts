/**
 * Type Graph Scanner
 *
 * Chooses which modules a query scans and enumerates their declarations
 * depth-first in declaration order. The order is part of the output
 * contract: generators rely on it for reproducible artifacts.
 */

import type {
  ModuleNode,
  NamespaceNode,
  TypeDeclaration,
  TypeGraph,
} from "../graph/types.js";
import type { Query } from "../query/types.js";
import { compileWildcard, matchesWildcard } from "../matching/patterns.js";

/**
 * Module selection, first rule that applies wins:
 * 1. `assemblyOfType`: the module that owns that type
 * 2. `assemblyNameFilter`: matching modules of the declaring module's closure
 * 3. the declaring module itself
 */
export const selectModules = (
  graph: TypeGraph,
  query: Query
): readonly ModuleNode[] => {
  if (query.assemblyOfType) {
    const owner = graph.declarationOf(query.assemblyOfType);
    const module = owner ? graph.getModule(owner.module) : undefined;
    return module ? [module] : [];
  }

  if (query.assemblyNameFilter !== undefined) {
    const matcher = compileWildcard(query.assemblyNameFilter);
    return graph
      .referenceClosure(query.position.module)
      .filter((module) => matchesWildcard(matcher, module.name));
  }

  const declaring = graph.getModule(query.position.module);
  return declaring ? [declaring] : [];
};

function* typesOfDeclaration(
  graph: TypeGraph,
  declaration: TypeDeclaration
): Generator<TypeDeclaration> {
  yield declaration;
  for (const nestedName of declaration.nestedTypes) {
    const nested = graph.getDeclaration(nestedName);
    if (nested) yield* typesOfDeclaration(graph, nested);
  }
}

function* typesOfNamespace(
  graph: TypeGraph,
  namespace: NamespaceNode
): Generator<TypeDeclaration> {
  for (const member of namespace.members) {
    if (member.kind === "namespace") {
      yield* typesOfNamespace(graph, member.namespace);
      continue;
    }

    const declaration = graph.getDeclaration(member.name);
    if (declaration) yield* typesOfDeclaration(graph, declaration);
  }
}

/**
 * Every type declared in a module, nested namespaces and nested types
 * included, in declaration order.
 */
export const typesOf = (
  graph: TypeGraph,
  module: ModuleNode
): Generator<TypeDeclaration> => typesOfNamespace(graph, module.globalNamespace);
