/**
 * Graph document writer
 *
 * Serializes a type graph back into the document format. Values equal to
 * the loader's defaults are left out.
 */

import type {
  ConstructorDeclaration,
  GenericParameter,
  MethodDeclaration,
  ModuleNode,
  NamespaceNode,
  TypeDeclaration,
  TypeGraph,
} from "@genscan/engine";
import { typeRefsEqual } from "@genscan/engine";
import { BUILTIN_MODULE } from "../builtins/index.js";
import { formatTypeRef } from "../type-strings/parser.js";
import type {
  ConstructorDocument,
  GenericParameterDocument,
  GraphDocument,
  MethodDocument,
  ModuleDocument,
  TypeDocument,
} from "./document.js";
import { implicitBaseType, implicitConstructors } from "./document.js";

export type WriteOptions = {
  /** Also write the builtin module (default: false) */
  readonly includeBuiltins?: boolean;
};

const sameConstructors = (
  a: readonly ConstructorDeclaration[],
  b: readonly ConstructorDeclaration[]
): boolean =>
  a.length === b.length &&
  a.every(
    (ctor, index) =>
      ctor.accessibility === b[index]?.accessibility &&
      ctor.parameterCount === b[index]?.parameterCount &&
      ctor.isStatic === b[index]?.isStatic
  );

const writeConstructor = (
  ctor: ConstructorDeclaration
): ConstructorDocument => ({
  ...(ctor.accessibility !== "public"
    ? { accessibility: ctor.accessibility }
    : {}),
  ...(ctor.parameterCount !== 0 ? { parameterCount: ctor.parameterCount } : {}),
  ...(ctor.isStatic ? { isStatic: true } : {}),
});

const writeParameter = (
  parameter: GenericParameter
): GenericParameterDocument => ({
  name: parameter.name,
  ...(parameter.hasReferenceTypeConstraint
    ? { hasReferenceTypeConstraint: true }
    : {}),
  ...(parameter.hasValueTypeConstraint ? { hasValueTypeConstraint: true } : {}),
  ...(parameter.hasUnmanagedTypeConstraint
    ? { hasUnmanagedTypeConstraint: true }
    : {}),
  ...(parameter.hasConstructorConstraint
    ? { hasConstructorConstraint: true }
    : {}),
  ...(parameter.constraintTypes.length > 0
    ? { constraintTypes: parameter.constraintTypes.map(formatTypeRef) }
    : {}),
});

const writeMethod = (method: MethodDeclaration): MethodDocument => ({
  name: method.name,
  ...(method.isStatic ? { isStatic: true } : {}),
  ...(method.accessibility !== "public"
    ? { accessibility: method.accessibility }
    : {}),
  typeParameters: method.typeParameters.map(writeParameter),
});

const simpleName = (declaration: TypeDeclaration): string =>
  declaration.containingType
    ? declaration.name.slice(declaration.containingType.length + 1)
    : declaration.name;

const writeType = (
  graph: TypeGraph,
  declaration: TypeDeclaration
): TypeDocument => {
  const implicitBase = implicitBaseType(declaration.name, declaration.kind);
  const explicitBase =
    declaration.baseType &&
    !(implicitBase && typeRefsEqual(declaration.baseType, implicitBase))
      ? declaration.baseType
      : undefined;

  const implicitCtors = implicitConstructors(
    declaration.kind,
    declaration.isStatic
  );

  const nested = declaration.nestedTypes.flatMap((name) => {
    const nestedDeclaration = graph.getDeclaration(name);
    return nestedDeclaration ? [writeType(graph, nestedDeclaration)] : [];
  });

  return {
    name: simpleName(declaration),
    ...(declaration.kind !== "class" ? { kind: declaration.kind } : {}),
    ...(declaration.accessibility !== "public"
      ? { accessibility: declaration.accessibility }
      : {}),
    ...(declaration.isAbstract ? { isAbstract: true } : {}),
    ...(declaration.isStatic ? { isStatic: true } : {}),
    ...(declaration.isSealed ? { isSealed: true } : {}),
    ...(declaration.isUnmanaged ? { isUnmanaged: true } : {}),
    ...(!declaration.canBeReferencedByName
      ? { canBeReferencedByName: false }
      : {}),
    ...(declaration.typeParameters.length > 0
      ? { typeParameters: declaration.typeParameters }
      : {}),
    ...(explicitBase ? { baseType: formatTypeRef(explicitBase) } : {}),
    ...(declaration.interfaces.length > 0
      ? { interfaces: declaration.interfaces.map(formatTypeRef) }
      : {}),
    ...(declaration.attributes.length > 0
      ? { attributes: declaration.attributes.map(formatTypeRef) }
      : {}),
    ...(!sameConstructors(declaration.constructors, implicitCtors)
      ? { constructors: declaration.constructors.map(writeConstructor) }
      : {}),
    ...(declaration.methods.length > 0
      ? { methods: declaration.methods.map(writeMethod) }
      : {}),
    ...(nested.length > 0 ? { nestedTypes: nested } : {}),
  };
};

function* topLevelTypes(
  graph: TypeGraph,
  namespace: NamespaceNode
): Generator<TypeDeclaration> {
  for (const member of namespace.members) {
    if (member.kind === "namespace") {
      yield* topLevelTypes(graph, member.namespace);
      continue;
    }
    const declaration = graph.getDeclaration(member.name);
    if (declaration) yield declaration;
  }
}

const writeModule = (graph: TypeGraph, module: ModuleNode): ModuleDocument => {
  const references = module.references.filter(
    (reference) => reference !== BUILTIN_MODULE
  );
  return {
    name: module.name,
    ...(references.length > 0 ? { references } : {}),
    types: [...topLevelTypes(graph, module.globalNamespace)].map(
      (declaration) => writeType(graph, declaration)
    ),
  };
};

export const toGraphDocument = (
  graph: TypeGraph,
  options: WriteOptions = {}
): GraphDocument => ({
  modules: graph.modules
    .filter(
      (module) => options.includeBuiltins || module.name !== BUILTIN_MODULE
    )
    .map((module) => writeModule(graph, module)),
});
