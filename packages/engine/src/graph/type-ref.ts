/**
 * TypeRef construction, identity and substitution.
 *
 * Type identity is a value: metadata name plus ordered type arguments.
 * Every comparison in the engine goes through typeRefKey/typeRefsEqual.
 */

import type {
  ArrayTypeRef,
  NamedTypeRef,
  TypeDeclaration,
  TypeParameterRef,
  TypeRef,
} from "./types.js";

export const namedType = (
  name: string,
  typeArguments: readonly TypeRef[] = []
): NamedTypeRef => ({ kind: "named", name, typeArguments });

export const typeParameter = (name: string): TypeParameterRef => ({
  kind: "typeParameter",
  name,
});

export const arrayOf = (elementType: TypeRef): ArrayTypeRef => ({
  kind: "array",
  elementType,
});

/**
 * Canonical key for structural identity.
 */
export const typeRefKey = (ref: TypeRef): string => {
  switch (ref.kind) {
    case "named":
      return ref.typeArguments.length === 0
        ? ref.name
        : `${ref.name}[${ref.typeArguments.map(typeRefKey).join(",")}]`;
    case "typeParameter":
      return `!${ref.name}`;
    case "array":
      return `${typeRefKey(ref.elementType)}[]`;
  }
};

export const typeRefsEqual = (a: TypeRef, b: TypeRef): boolean =>
  typeRefKey(a) === typeRefKey(b);

/**
 * Generic arity encoded in a metadata name ("IHandler`2" → 2).
 */
export const arityOf = (name: string): number => {
  const match = /`(\d+)$/.exec(name);
  return match && match[1] ? parseInt(match[1], 10) : 0;
};

/**
 * True for `IHandler<>`-style references: generic name, no arguments.
 */
export const isOpenDefinition = (ref: TypeRef): ref is NamedTypeRef =>
  ref.kind === "named" &&
  ref.typeArguments.length === 0 &&
  arityOf(ref.name) > 0;

/**
 * The open definition a reference instantiates.
 */
export const definitionOf = (ref: NamedTypeRef): NamedTypeRef =>
  ref.typeArguments.length === 0 ? ref : namedType(ref.name);

export const sameDefinition = (a: NamedTypeRef, b: NamedTypeRef): boolean =>
  a.name === b.name;

export const containsTypeParameter = (ref: TypeRef): boolean => {
  switch (ref.kind) {
    case "typeParameter":
      return true;
    case "array":
      return containsTypeParameter(ref.elementType);
    case "named":
      return ref.typeArguments.some(containsTypeParameter);
  }
};

/**
 * Map from type parameter name to its replacement.
 */
export type TypeSubstitution = ReadonlyMap<string, TypeRef>;

export const substituteTypeRef = (
  ref: TypeRef,
  substitution: TypeSubstitution
): TypeRef => {
  if (substitution.size === 0) return ref;
  switch (ref.kind) {
    case "typeParameter":
      return substitution.get(ref.name) ?? ref;
    case "array":
      return arrayOf(substituteTypeRef(ref.elementType, substitution));
    case "named":
      return ref.typeArguments.length === 0
        ? ref
        : namedType(
            ref.name,
            ref.typeArguments.map((arg) => substituteTypeRef(arg, substitution))
          );
  }
};

export const substituteNamed = (
  ref: NamedTypeRef,
  substitution: TypeSubstitution
): NamedTypeRef =>
  substitution.size === 0 || ref.typeArguments.length === 0
    ? ref
    : namedType(
        ref.name,
        ref.typeArguments.map((arg) => substituteTypeRef(arg, substitution))
      );

/**
 * Substitution that instantiates a declaration with a reference's arguments.
 * Open references leave the declaration's own parameters in place.
 */
export const substitutionFor = (
  declaration: TypeDeclaration,
  ref: NamedTypeRef
): TypeSubstitution => {
  const substitution = new Map<string, TypeRef>();
  declaration.typeParameters.forEach((param, index) => {
    const arg = ref.typeArguments[index];
    if (arg) substitution.set(param, arg);
  });
  return substitution;
};

/**
 * Reference to a declaration as a candidate: its open form.
 */
export const refOfDeclaration = (declaration: TypeDeclaration): NamedTypeRef =>
  namedType(declaration.name);

// ═══════════════════════════════════════════════════════════════════════════
// DISPLAY NAMES: what name filters are matched against
// ═══════════════════════════════════════════════════════════════════════════

const stripArity = (name: string): string =>
  name
    .split("+")
    .map((segment) => segment.replace(/`\d+$/, ""))
    .join(".");

/**
 * Display string with angle-bracket type arguments: `App.IHandler<System.String>`, `App.Outer.Inner`.
 */
export const displayTypeRef = (ref: TypeRef): string => {
  switch (ref.kind) {
    case "typeParameter":
      return ref.name;
    case "array":
      return `${displayTypeRef(ref.elementType)}[]`;
    case "named": {
      const base = stripArity(ref.name);
      if (ref.typeArguments.length > 0) {
        return `${base}<${ref.typeArguments.map(displayTypeRef).join(", ")}>`;
      }
      const arity = arityOf(ref.name);
      return arity > 0 ? `${base}<${",".repeat(arity - 1)}>` : base;
    }
  }
};

/**
 * Display string of a declaration, spelling out its own type parameters.
 */
export const displayDeclaration = (declaration: TypeDeclaration): string => {
  const base = stripArity(declaration.name);
  return declaration.typeParameters.length > 0
    ? `${base}<${declaration.typeParameters.join(", ")}>`
    : base;
};
