/**
 * Type Graph Definitions
 *
 * The type graph is an immutable, already-resolved universe of type
 * declarations. Front ends (graph JSON, TypeScript sources) build it once;
 * the engine only reads it.
 *
 * Key Types:
 * - TypeRef: Structural identity of a (possibly instantiated) type
 * - TypeDeclaration: Complete information about one declared type
 * - GenericParameter: A handler type parameter with its constraints
 * - ModuleNode / NamespaceNode: The order-stable declaration tree
 */

// ═══════════════════════════════════════════════════════════════════════════
// TYPE REFERENCES: Structural identity
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Reference to a named type, possibly instantiated.
 *
 * Generic names carry their arity in metadata form (`App.IHandler`1`).
 * A generic name with no type arguments is the open definition.
 */
export type NamedTypeRef = {
  readonly kind: "named";
  readonly name: string;
  readonly typeArguments: readonly TypeRef[];
};

/**
 * Reference to a type parameter, either a declaration's own parameter
 * (inside heritage edges) or a handler parameter (inside constraints).
 */
export type TypeParameterRef = {
  readonly kind: "typeParameter";
  readonly name: string;
};

/**
 * Single-dimensional array of an element type.
 */
export type ArrayTypeRef = {
  readonly kind: "array";
  readonly elementType: TypeRef;
};

export type TypeRef = NamedTypeRef | TypeParameterRef | ArrayTypeRef;

// ═══════════════════════════════════════════════════════════════════════════
// DECLARATIONS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Type kind classification. Only classes are matchable candidates;
 * structs and enums are value kinds.
 */
export type TypeKind = "class" | "interface" | "struct" | "enum" | "delegate";

export type Accessibility = "public" | "internal" | "protected" | "private";

export type ConstructorDeclaration = {
  readonly accessibility: Accessibility;
  readonly parameterCount: number;
  readonly isStatic: boolean;
};

/**
 * Type parameter of a handler signature.
 *
 * Constraint types may mention other parameters of the same signature
 * (`where THandler : ICommandHandler<TCommand>`), which is what makes
 * constraint solving recursive.
 */
export type GenericParameter = {
  readonly name: string;
  readonly ordinal: number;
  readonly hasReferenceTypeConstraint: boolean;
  readonly hasValueTypeConstraint: boolean;
  readonly hasUnmanagedTypeConstraint: boolean;
  readonly hasConstructorConstraint: boolean;
  readonly constraintTypes: readonly TypeRef[];
};

/**
 * Generic method declared on a type; handler signatures are looked up here.
 */
export type MethodDeclaration = {
  readonly name: string;
  readonly isStatic: boolean;
  readonly accessibility: Accessibility;
  readonly typeParameters: readonly GenericParameter[];
};

/**
 * Complete information for one declared type.
 */
export type TypeDeclaration = {
  /** Metadata name, e.g. "App.Handlers.Repository`1" or "App.Outer+Inner" */
  readonly name: string;
  readonly kind: TypeKind;
  /** Owning module */
  readonly module: string;
  /** Namespace, "" for the global namespace */
  readonly namespace: string;
  /** Metadata name of the containing type for nested types */
  readonly containingType?: string;
  readonly accessibility: Accessibility;
  readonly isAbstract: boolean;
  readonly isStatic: boolean;
  readonly isSealed: boolean;
  /** Value kinds only: usable under an unmanaged constraint */
  readonly isUnmanaged: boolean;
  /** False for compiler-generated names that source code cannot spell */
  readonly canBeReferencedByName: boolean;
  /** Own type parameter names; non-empty for generic definitions */
  readonly typeParameters: readonly string[];
  readonly baseType?: NamedTypeRef;
  /** Directly declared interfaces (inherited ones are materialized by the graph) */
  readonly interfaces: readonly NamedTypeRef[];
  /** Marker attributes applied to the declaration */
  readonly attributes: readonly NamedTypeRef[];
  readonly constructors: readonly ConstructorDeclaration[];
  readonly methods: readonly MethodDeclaration[];
  /** Nested type names in declaration order */
  readonly nestedTypes: readonly string[];
};

// ═══════════════════════════════════════════════════════════════════════════
// MODULES: Order-stable declaration tree
// ═══════════════════════════════════════════════════════════════════════════

export type NamespaceMember =
  | { readonly kind: "namespace"; readonly namespace: NamespaceNode }
  | { readonly kind: "type"; readonly name: string };

export type NamespaceNode = {
  /** Simple name, "" for the global namespace */
  readonly name: string;
  /** Members in declaration order */
  readonly members: readonly NamespaceMember[];
};

export type ModuleNode = {
  readonly name: string;
  /** Names of directly referenced modules, in declared order */
  readonly references: readonly string[];
  readonly globalNamespace: NamespaceNode;
};

/**
 * Point a query is declared at; visibility is judged from here.
 */
export type VisibilityPosition = {
  readonly module: string;
  readonly containingType?: string;
};

// ═══════════════════════════════════════════════════════════════════════════
// TYPE GRAPH
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Read-only view over the declarations. All reference-based queries apply
 * the reference's type arguments to the declaration's heritage.
 */
export type TypeGraph = {
  /** Modules in the order they were supplied */
  readonly modules: readonly ModuleNode[];
  readonly getModule: (name: string) => ModuleNode | undefined;
  readonly getDeclaration: (name: string) => TypeDeclaration | undefined;
  readonly declarationOf: (ref: TypeRef) => TypeDeclaration | undefined;
  /** Declaring module first, then referenced modules breadth-first */
  readonly referenceClosure: (moduleName: string) => readonly ModuleNode[];
  /** Base classes from the direct base upwards, substituted */
  readonly baseTypesOf: (ref: TypeRef) => readonly NamedTypeRef[];
  /** Flattened, substituted, deduplicated interface set */
  readonly allInterfacesOf: (ref: TypeRef) => readonly NamedTypeRef[];
  readonly isValueType: (ref: TypeRef) => boolean;
  readonly isUnmanagedType: (ref: TypeRef) => boolean;
  readonly constructorsOf: (ref: TypeRef) => readonly ConstructorDeclaration[];
  readonly isVisibleFrom: (
    position: VisibilityPosition,
    declaration: TypeDeclaration
  ) => boolean;
};
