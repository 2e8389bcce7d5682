/**
 * Module tree construction
 *
 * Front ends supply declarations in declaration order; the namespace tree
 * keeps that order (namespaces appear where their first type appears).
 */

import type {
  ModuleNode,
  NamespaceMember,
  NamespaceNode,
  TypeDeclaration,
} from "./types.js";

type NamespaceBuilder = {
  readonly name: string;
  readonly members: (
    | { readonly kind: "namespace"; readonly builder: NamespaceBuilder }
    | { readonly kind: "type"; readonly name: string }
  )[];
  readonly children: Map<string, NamespaceBuilder>;
};

const createBuilder = (name: string): NamespaceBuilder => ({
  name,
  members: [],
  children: new Map(),
});

const childOf = (parent: NamespaceBuilder, name: string): NamespaceBuilder => {
  const existing = parent.children.get(name);
  if (existing) return existing;

  const child = createBuilder(name);
  parent.children.set(name, child);
  parent.members.push({ kind: "namespace", builder: child });
  return child;
};

const freeze = (builder: NamespaceBuilder): NamespaceNode => ({
  name: builder.name,
  members: builder.members.map(
    (member): NamespaceMember =>
      member.kind === "namespace"
        ? { kind: "namespace", namespace: freeze(member.builder) }
        : member
  ),
});

/**
 * Build the namespace tree for top-level declarations. Nested types are
 * reached through their containing type and are skipped here.
 */
export const buildNamespaceTree = (
  declarations: readonly TypeDeclaration[]
): NamespaceNode => {
  const root = createBuilder("");

  for (const declaration of declarations) {
    if (declaration.containingType) continue;

    const segments = declaration.namespace
      ? declaration.namespace.split(".")
      : [];
    const target = segments.reduce(childOf, root);
    target.members.push({ kind: "type", name: declaration.name });
  }

  return freeze(root);
};

export const createModuleNode = (
  name: string,
  references: readonly string[],
  declarations: readonly TypeDeclaration[]
): ModuleNode => ({
  name,
  references,
  globalNamespace: buildNamespaceTree(
    declarations.filter((declaration) => declaration.module === name)
  ),
});
