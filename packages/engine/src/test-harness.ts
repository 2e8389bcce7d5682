/**
 * Test harness for engine tests.
 * Builds in-memory type graphs from terse declarations.
 */

import type {
  ConstructorDeclaration,
  GenericParameter,
  TypeDeclaration,
  TypeGraph,
  TypeRef,
} from "./graph/types.js";
import { createTypeGraph } from "./graph/graph.js";
import { createModuleNode } from "./graph/modules.js";
import { namedType } from "./graph/type-ref.js";

export const publicParameterless: ConstructorDeclaration = {
  accessibility: "public",
  parameterCount: 0,
  isStatic: false,
};

const namespaceOf = (name: string): string => {
  const topLevel = name.split("+")[0] ?? name;
  const lastDot = topLevel.lastIndexOf(".");
  return lastDot === -1 ? "" : topLevel.slice(0, lastDot);
};

/**
 * Declare a type. Defaults: public non-abstract class in module "App" with
 * a public parameterless constructor.
 */
export const declare = (
  name: string,
  options: Partial<Omit<TypeDeclaration, "name">> = {}
): TypeDeclaration => ({
  name,
  kind: "class",
  module: "App",
  namespace: namespaceOf(name),
  accessibility: "public",
  isAbstract: false,
  isStatic: false,
  isSealed: false,
  isUnmanaged: false,
  canBeReferencedByName: true,
  typeParameters: [],
  interfaces: [],
  attributes: [],
  constructors: [publicParameterless],
  methods: [],
  nestedTypes: [],
  ...options,
});

export const declareInterface = (
  name: string,
  options: Partial<Omit<TypeDeclaration, "name">> = {}
): TypeDeclaration =>
  declare(name, { kind: "interface", constructors: [], ...options });

export const genericParameter = (
  name: string,
  ordinal: number,
  options: Partial<Omit<GenericParameter, "name" | "ordinal">> = {}
): GenericParameter => ({
  name,
  ordinal,
  hasReferenceTypeConstraint: false,
  hasValueTypeConstraint: false,
  hasUnmanagedTypeConstraint: false,
  hasConstructorConstraint: false,
  constraintTypes: [],
  ...options,
});

/**
 * Core library types every test graph can lean on.
 */
export const SYSTEM_MODULE = "System.Runtime";

export const systemTypes: readonly TypeDeclaration[] = [
  declare("System.Object", { module: SYSTEM_MODULE }),
  declare("System.String", {
    module: SYSTEM_MODULE,
    isSealed: true,
    constructors: [
      { accessibility: "public", parameterCount: 1, isStatic: false },
    ],
  }),
  declare("System.Int32", {
    module: SYSTEM_MODULE,
    kind: "struct",
    isUnmanaged: true,
  }),
  declare("System.Int64", {
    module: SYSTEM_MODULE,
    kind: "struct",
    isUnmanaged: true,
  }),
];

export const STRING: TypeRef = namedType("System.String");
export const OBJECT: TypeRef = namedType("System.Object");
export const INT32: TypeRef = namedType("System.Int32");
export const INT64: TypeRef = namedType("System.Int64");

export type TestModule = {
  readonly name: string;
  readonly references?: readonly string[];
};

/**
 * Build a graph. Declarations are assigned to modules by their `module`
 * field; the system module is always present and referenced by every
 * other module.
 */
export const graphOf = (
  declarations: readonly TypeDeclaration[],
  modules: readonly TestModule[] = [{ name: "App" }]
): TypeGraph => {
  const all = [...systemTypes, ...declarations];
  return createTypeGraph({
    modules: [
      ...modules.map((module) =>
        createModuleNode(
          module.name,
          [...(module.references ?? []), SYSTEM_MODULE],
          all
        )
      ),
      createModuleNode(SYSTEM_MODULE, [], all),
    ],
    declarations: all,
  });
};
