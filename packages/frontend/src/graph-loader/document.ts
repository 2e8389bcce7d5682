/**
 * Graph document format
 *
 * JSON shape read by the loader and written by `genscan extract`. Type
 * references are type strings (see type-strings/parser.ts). Nested types
 * are written inline under their container with their simple name.
 */

import type {
  Accessibility,
  ConstructorDeclaration,
  NamedTypeRef,
  TypeKind,
} from "@genscan/engine";
import { namedType } from "@genscan/engine";

export type GenericParameterDocument = {
  readonly name: string;
  readonly hasReferenceTypeConstraint?: boolean;
  readonly hasValueTypeConstraint?: boolean;
  readonly hasUnmanagedTypeConstraint?: boolean;
  readonly hasConstructorConstraint?: boolean;
  readonly constraintTypes?: readonly string[];
};

export type MethodDocument = {
  readonly name: string;
  readonly isStatic?: boolean;
  readonly accessibility?: Accessibility;
  readonly typeParameters: readonly GenericParameterDocument[];
};

export type ConstructorDocument = {
  readonly accessibility?: Accessibility;
  readonly parameterCount?: number;
  readonly isStatic?: boolean;
};

export type TypeDocument = {
  readonly name: string;
  readonly kind?: TypeKind;
  readonly accessibility?: Accessibility;
  readonly isAbstract?: boolean;
  readonly isStatic?: boolean;
  readonly isSealed?: boolean;
  readonly isUnmanaged?: boolean;
  readonly canBeReferencedByName?: boolean;
  readonly typeParameters?: readonly string[];
  readonly baseType?: string;
  readonly interfaces?: readonly string[];
  readonly attributes?: readonly string[];
  readonly constructors?: readonly ConstructorDocument[];
  readonly methods?: readonly MethodDocument[];
  readonly nestedTypes?: readonly TypeDocument[];
};

export type ModuleDocument = {
  readonly name: string;
  readonly references?: readonly string[];
  readonly types: readonly TypeDocument[];
};

export type GraphDocument = {
  readonly modules: readonly ModuleDocument[];
};

export const TYPE_KINDS: readonly TypeKind[] = [
  "class",
  "interface",
  "struct",
  "enum",
  "delegate",
];

export const ACCESSIBILITIES: readonly Accessibility[] = [
  "public",
  "internal",
  "protected",
  "private",
];

const OBJECT = "System.Object";

/**
 * Base type a declaration has when the document names none.
 */
export const implicitBaseType = (
  name: string,
  kind: TypeKind
): NamedTypeRef | undefined => {
  switch (kind) {
    case "class":
      return name === OBJECT ? undefined : namedType(OBJECT);
    case "struct":
      return namedType("System.ValueType");
    case "enum":
      return namedType("System.Enum");
    case "delegate":
      return namedType("System.Delegate");
    case "interface":
      return undefined;
  }
};

const publicParameterless: ConstructorDeclaration = {
  accessibility: "public",
  parameterCount: 0,
  isStatic: false,
};

/**
 * Constructors a declaration has when the document lists none.
 */
export const implicitConstructors = (
  kind: TypeKind,
  isStatic: boolean
): readonly ConstructorDeclaration[] =>
  (kind === "class" && !isStatic) || kind === "struct"
    ? [publicParameterless]
    : [];
