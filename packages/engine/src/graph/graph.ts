/**
 * TypeGraph construction
 *
 * Indexes declarations and materializes, per reference, the substituted
 * base-type chain and the flattened interface set. Materialized sets are
 * memoized on the graph value; the graph itself is never mutated after
 * construction.
 */

import type {
  ConstructorDeclaration,
  ModuleNode,
  NamedTypeRef,
  TypeDeclaration,
  TypeGraph,
  TypeRef,
  VisibilityPosition,
} from "./types.js";
import {
  namedType,
  substituteNamed,
  substitutionFor,
  typeRefKey,
} from "./type-ref.js";

export type TypeGraphInput = {
  readonly modules: readonly ModuleNode[];
  readonly declarations: readonly TypeDeclaration[];
};

export const createTypeGraph = (input: TypeGraphInput): TypeGraph => {
  const modulesByName = new Map<string, ModuleNode>();
  for (const module of input.modules) {
    if (!modulesByName.has(module.name)) {
      modulesByName.set(module.name, module);
    }
  }

  const declarations = new Map<string, TypeDeclaration>();
  for (const declaration of input.declarations) {
    declarations.set(declaration.name, declaration);
  }

  const baseTypesCache = new Map<string, readonly NamedTypeRef[]>();
  const interfacesCache = new Map<string, readonly NamedTypeRef[]>();

  const getDeclaration = (name: string): TypeDeclaration | undefined =>
    declarations.get(name);

  const declarationOf = (ref: TypeRef): TypeDeclaration | undefined =>
    ref.kind === "named" ? declarations.get(ref.name) : undefined;

  const baseTypesOf = (ref: TypeRef): readonly NamedTypeRef[] => {
    if (ref.kind !== "named") return [];

    const key = typeRefKey(ref);
    const cached = baseTypesCache.get(key);
    if (cached) return cached;

    const chain: NamedTypeRef[] = [];
    const visited = new Set<string>([ref.name]);
    let current: NamedTypeRef | undefined = ref;

    while (current) {
      const declaration = declarations.get(current.name);
      if (!declaration?.baseType) break;

      const base = substituteNamed(
        declaration.baseType,
        substitutionFor(declaration, current)
      );
      // Cyclic or self-referential heritage is cut here
      if (visited.has(base.name)) break;
      visited.add(base.name);
      chain.push(base);
      current = base;
    }

    baseTypesCache.set(key, chain);
    return chain;
  };

  const allInterfacesOf = (ref: TypeRef): readonly NamedTypeRef[] => {
    if (ref.kind !== "named") return [];

    const key = typeRefKey(ref);
    const cached = interfacesCache.get(key);
    if (cached) return cached;

    const result: NamedTypeRef[] = [];
    const seen = new Set<string>();

    const collect = (
      current: NamedTypeRef,
      visiting: ReadonlySet<string>
    ): void => {
      const declaration = declarations.get(current.name);
      if (!declaration) return;

      const substitution = substitutionFor(declaration, current);
      const path = new Set(visiting).add(current.name);

      for (const declared of declaration.interfaces) {
        const iface = substituteNamed(declared, substitution);
        if (path.has(iface.name)) continue;

        const ifaceKey = typeRefKey(iface);
        if (seen.has(ifaceKey)) continue;
        seen.add(ifaceKey);
        result.push(iface);
        collect(iface, path);
      }

      if (declaration.baseType) {
        const base = substituteNamed(declaration.baseType, substitution);
        if (!path.has(base.name)) collect(base, path);
      }
    };

    collect(ref, new Set());
    interfacesCache.set(key, result);
    return result;
  };

  const isValueType = (ref: TypeRef): boolean => {
    const declaration = declarationOf(ref);
    return declaration?.kind === "struct" || declaration?.kind === "enum";
  };

  const isUnmanagedType = (ref: TypeRef): boolean =>
    isValueType(ref) && (declarationOf(ref)?.isUnmanaged ?? false);

  const constructorsOf = (ref: TypeRef): readonly ConstructorDeclaration[] =>
    declarationOf(ref)?.constructors ?? [];

  const referenceClosure = (moduleName: string): readonly ModuleNode[] => {
    const start = modulesByName.get(moduleName);
    if (!start) return [];

    const result: ModuleNode[] = [];
    const visited = new Set<string>([start.name]);
    const queue: ModuleNode[] = [start];

    while (queue.length > 0) {
      const module = queue.shift();
      if (!module) break;
      result.push(module);

      for (const reference of module.references) {
        if (visited.has(reference)) continue;
        visited.add(reference);
        const referenced = modulesByName.get(reference);
        if (referenced) queue.push(referenced);
      }
    }

    return result;
  };

  /**
   * True when `typeName` is `container` or is nested (at any depth) inside it.
   */
  const isWithin = (typeName: string | undefined, container: string): boolean => {
    let current = typeName;
    while (current) {
      if (current === container) return true;
      current = declarations.get(current)?.containingType;
    }
    return false;
  };

  const derivesFrom = (typeName: string | undefined, container: string): boolean => {
    if (!typeName) return false;
    return baseTypesOf(namedType(typeName)).some(
      (base) => base.name === container
    );
  };

  const isVisibleFrom = (
    position: VisibilityPosition,
    declaration: TypeDeclaration
  ): boolean => {
    if (declaration.containingType) {
      const outer = declarations.get(declaration.containingType);
      if (outer && !isVisibleFrom(position, outer)) return false;
    }

    const container = declaration.containingType;
    switch (declaration.accessibility) {
      case "public":
        return true;
      case "internal":
        return declaration.module === position.module;
      case "protected":
        return container
          ? isWithin(position.containingType, container) ||
              derivesFrom(position.containingType, container)
          : declaration.module === position.module;
      case "private":
        return container
          ? isWithin(position.containingType, container)
          : declaration.module === position.module;
    }
  };

  return {
    modules: [...modulesByName.values()],
    getModule: (name) => modulesByName.get(name),
    getDeclaration,
    declarationOf,
    referenceClosure,
    baseTypesOf,
    allInterfacesOf,
    isValueType,
    isUnmanagedType,
    constructorsOf,
    isVisibleFrom,
  };
};
