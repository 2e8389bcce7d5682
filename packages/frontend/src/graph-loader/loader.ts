/**
 * Graph document loader - Reads and validates graph JSON documents.
 *
 * Pure validation turns an untyped document into declarations and module
 * nodes; every problem found is reported, not only the first one.
 */

import * as fs from "fs";
import * as path from "path";
import type {
  Accessibility,
  ConstructorDeclaration,
  GenericParameter,
  MethodDeclaration,
  ModuleNode,
  NamedTypeRef,
  TypeDeclaration,
  TypeGraph,
  TypeGraphInput,
  TypeKind,
  TypeRef,
} from "@genscan/engine";
import { createModuleNode, createTypeGraph } from "@genscan/engine";
import { BUILTIN_MODULE, builtinModuleDocument } from "../builtins/index.js";
import type { Diagnostic, DiagnosticCode } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { error, ok } from "../types/result.js";
import { parseTypeString } from "../type-strings/parser.js";
import {
  ACCESSIBILITIES,
  TYPE_KINDS,
  implicitBaseType,
  implicitConstructors,
} from "./document.js";

export type LoadedGraph = {
  readonly graph: TypeGraph;
  readonly input: TypeGraphInput;
  /** Non-fatal findings, e.g. references to modules the graph lacks */
  readonly warnings: readonly Diagnostic[];
};

type Context = {
  readonly source: string;
  readonly diagnostics: Diagnostic[];
};

type Container = {
  readonly name: string;
  readonly namespace: string;
  readonly typeParameters: readonly string[];
};

type RawObject = Readonly<Record<string, unknown>>;

const isRecord = (value: unknown): value is RawObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const isOneOf = <T extends string>(
  values: readonly T[],
  value: unknown
): value is T => values.some((candidate) => candidate === value);

const report = (
  context: Context,
  code: DiagnosticCode,
  message: string
): void => {
  context.diagnostics.push(
    createDiagnostic(code, "error", `${message} in ${context.source}`)
  );
};

const readBoolean = (
  context: Context,
  raw: RawObject,
  field: string,
  where: string,
  fallback = false
): boolean => {
  const value = raw[field];
  if (value === undefined) return fallback;
  if (typeof value === "boolean") return value;
  report(context, "GSN9014", `Invalid ${where}: '${field}' must be a boolean`);
  return fallback;
};

const readArray = (
  context: Context,
  raw: RawObject,
  field: string,
  where: string
): readonly unknown[] => {
  const value = raw[field];
  if (value === undefined) return [];
  if (Array.isArray(value)) return value;
  report(context, "GSN9015", `Invalid ${where}: '${field}' must be an array`);
  return [];
};

const readStrings = (
  context: Context,
  raw: RawObject,
  field: string,
  where: string
): readonly string[] => {
  const items = readArray(context, raw, field, where);
  const strings = items.filter(
    (item): item is string => typeof item === "string"
  );
  if (strings.length !== items.length) {
    report(
      context,
      "GSN9015",
      `Invalid ${where}: '${field}' must contain only strings`
    );
  }
  return strings;
};

const readTypeRef = (
  context: Context,
  text: string,
  scope: readonly string[],
  where: string
): TypeRef | undefined => {
  const parsed = parseTypeString(text, scope);
  if (!parsed.ok) {
    report(context, "GSN9016", `Invalid ${where}: ${parsed.error}`);
    return undefined;
  }
  return parsed.value;
};

const readNamedRef = (
  context: Context,
  text: string,
  scope: readonly string[],
  where: string
): NamedTypeRef | undefined => {
  const ref = readTypeRef(context, text, scope, where);
  if (!ref) return undefined;
  if (ref.kind !== "named") {
    report(context, "GSN9016", `Invalid ${where}: '${text}' must name a type`);
    return undefined;
  }
  return ref;
};

const readAccessibility = (
  context: Context,
  raw: RawObject,
  where: string
): Accessibility => {
  const value = raw.accessibility;
  if (value === undefined) return "public";
  if (isOneOf(ACCESSIBILITIES, value)) return value;
  report(
    context,
    "GSN9013",
    `Invalid ${where}: 'accessibility' must be one of ${ACCESSIBILITIES.join(", ")}`
  );
  return "public";
};

const readKind = (
  context: Context,
  raw: RawObject,
  where: string
): TypeKind => {
  const value = raw.kind;
  if (value === undefined) return "class";
  if (isOneOf(TYPE_KINDS, value)) return value;
  report(
    context,
    "GSN9012",
    `Invalid ${where}: 'kind' must be one of ${TYPE_KINDS.join(", ")}`
  );
  return "class";
};

const parseConstructor = (
  context: Context,
  raw: unknown,
  where: string
): ConstructorDeclaration | undefined => {
  if (!isRecord(raw)) {
    report(context, "GSN9020", `Invalid ${where}: must be an object`);
    return undefined;
  }

  const parameterCount = raw.parameterCount ?? 0;
  if (
    typeof parameterCount !== "number" ||
    !Number.isInteger(parameterCount) ||
    parameterCount < 0
  ) {
    report(
      context,
      "GSN9020",
      `Invalid ${where}: 'parameterCount' must be a non-negative integer`
    );
    return undefined;
  }

  return {
    accessibility: readAccessibility(context, raw, where),
    parameterCount,
    isStatic: readBoolean(context, raw, "isStatic", where),
  };
};

const parseGenericParameters = (
  context: Context,
  rawList: readonly unknown[],
  outerScope: readonly string[],
  where: string
): readonly GenericParameter[] => {
  const names = rawList.flatMap((raw) =>
    isRecord(raw) && typeof raw.name === "string" ? [raw.name] : []
  );
  const scope = [...outerScope, ...names];

  return rawList.flatMap((raw, ordinal): GenericParameter[] => {
    const paramWhere = `type parameter ${ordinal} of ${where}`;
    if (!isRecord(raw) || typeof raw.name !== "string") {
      report(
        context,
        "GSN9020",
        `Invalid ${paramWhere}: must be an object with a 'name'`
      );
      return [];
    }

    const constraintTypes = readStrings(
      context,
      raw,
      "constraintTypes",
      paramWhere
    ).flatMap((text) => {
      const ref = readTypeRef(context, text, scope, paramWhere);
      return ref ? [ref] : [];
    });

    return [
      {
        name: raw.name,
        ordinal,
        hasReferenceTypeConstraint: readBoolean(
          context,
          raw,
          "hasReferenceTypeConstraint",
          paramWhere
        ),
        hasValueTypeConstraint: readBoolean(
          context,
          raw,
          "hasValueTypeConstraint",
          paramWhere
        ),
        hasUnmanagedTypeConstraint: readBoolean(
          context,
          raw,
          "hasUnmanagedTypeConstraint",
          paramWhere
        ),
        hasConstructorConstraint: readBoolean(
          context,
          raw,
          "hasConstructorConstraint",
          paramWhere
        ),
        constraintTypes,
      },
    ];
  });
};

const parseMethod = (
  context: Context,
  raw: unknown,
  scope: readonly string[],
  where: string
): MethodDeclaration | undefined => {
  if (!isRecord(raw) || typeof raw.name !== "string") {
    report(
      context,
      "GSN9020",
      `Invalid ${where}: must be an object with a 'name'`
    );
    return undefined;
  }

  const methodWhere = `method '${raw.name}' of ${where}`;
  return {
    name: raw.name,
    isStatic: readBoolean(context, raw, "isStatic", methodWhere),
    accessibility: readAccessibility(context, raw, methodWhere),
    typeParameters: parseGenericParameters(
      context,
      readArray(context, raw, "typeParameters", methodWhere),
      scope,
      methodWhere
    ),
  };
};

const namespaceOf = (name: string): string => {
  const lastDot = name.lastIndexOf(".");
  return lastDot === -1 ? "" : name.slice(0, lastDot);
};

/**
 * Parse one type and its nested types; the type itself comes first.
 */
const parseType = (
  context: Context,
  raw: unknown,
  moduleName: string,
  container: Container | undefined,
  where: string
): readonly TypeDeclaration[] => {
  if (!isRecord(raw)) {
    report(context, "GSN9010", `Invalid ${where}: must be an object`);
    return [];
  }

  if (typeof raw.name !== "string" || raw.name === "") {
    report(context, "GSN9011", `Invalid ${where}: missing or invalid 'name'`);
    return [];
  }

  const name = container ? `${container.name}+${raw.name}` : raw.name;
  const typeWhere = `type '${name}'`;
  const kind = readKind(context, raw, typeWhere);
  const isStatic = readBoolean(context, raw, "isStatic", typeWhere);
  const ownParameters = readStrings(context, raw, "typeParameters", typeWhere);
  const scope = [...(container?.typeParameters ?? []), ...ownParameters];
  const namespace = container ? container.namespace : namespaceOf(name);

  const baseType =
    typeof raw.baseType === "string"
      ? readNamedRef(context, raw.baseType, scope, `base type of ${typeWhere}`)
      : implicitBaseType(name, kind);

  const namedRefs = (field: string): readonly NamedTypeRef[] =>
    readStrings(context, raw, field, typeWhere).flatMap((text) => {
      const ref = readNamedRef(context, text, scope, `${field} of ${typeWhere}`);
      return ref ? [ref] : [];
    });

  const constructors =
    raw.constructors === undefined
      ? implicitConstructors(kind, isStatic)
      : readArray(context, raw, "constructors", typeWhere).flatMap(
          (ctor, index) => {
            const parsed = parseConstructor(
              context,
              ctor,
              `constructor ${index} of ${typeWhere}`
            );
            return parsed ? [parsed] : [];
          }
        );

  const methods = readArray(context, raw, "methods", typeWhere).flatMap(
    (method, index) => {
      const parsed = parseMethod(
        context,
        method,
        scope,
        `method ${index} of ${typeWhere}`
      );
      return parsed ? [parsed] : [];
    }
  );

  const self: Container = { name, namespace, typeParameters: scope };
  const nestedGroups = readArray(context, raw, "nestedTypes", typeWhere).map(
    (nested, index) =>
      parseType(
        context,
        nested,
        moduleName,
        self,
        `nested type ${index} of ${typeWhere}`
      )
  );

  const declaration: TypeDeclaration = {
    name,
    kind,
    module: moduleName,
    namespace,
    containingType: container?.name,
    accessibility: readAccessibility(context, raw, typeWhere),
    isAbstract: readBoolean(context, raw, "isAbstract", typeWhere),
    isStatic,
    isSealed: readBoolean(context, raw, "isSealed", typeWhere),
    isUnmanaged: readBoolean(context, raw, "isUnmanaged", typeWhere),
    canBeReferencedByName: readBoolean(
      context,
      raw,
      "canBeReferencedByName",
      typeWhere,
      true
    ),
    typeParameters: ownParameters,
    baseType,
    interfaces: namedRefs("interfaces"),
    attributes: namedRefs("attributes"),
    constructors,
    methods,
    nestedTypes: nestedGroups.flatMap((group) =>
      group[0] ? [group[0].name] : []
    ),
  };

  return [declaration, ...nestedGroups.flat()];
};

type ParsedModule = {
  readonly name: string;
  readonly references: readonly string[];
  readonly declarations: readonly TypeDeclaration[];
};

const parseModule = (
  context: Context,
  raw: unknown,
  index: number
): ParsedModule | undefined => {
  const where = `module ${index}`;
  if (!isRecord(raw)) {
    report(context, "GSN9006", `Invalid ${where}: must be an object`);
    return undefined;
  }

  if (typeof raw.name !== "string" || raw.name === "") {
    report(context, "GSN9007", `Invalid ${where}: missing or invalid 'name'`);
    return undefined;
  }

  const moduleWhere = `module '${raw.name}'`;
  const references = raw.references ?? [];
  if (
    !Array.isArray(references) ||
    !references.every((item) => typeof item === "string")
  ) {
    report(
      context,
      "GSN9008",
      `Invalid ${moduleWhere}: 'references' must be an array of strings`
    );
    return undefined;
  }

  if (!Array.isArray(raw.types)) {
    report(
      context,
      "GSN9009",
      `Invalid ${moduleWhere}: missing or invalid 'types'`
    );
    return undefined;
  }

  const moduleName = raw.name;
  return {
    name: moduleName,
    references: references.filter(
      (item): item is string => typeof item === "string"
    ),
    declarations: raw.types.flatMap((type, typeIndex) =>
      parseType(
        context,
        type,
        moduleName,
        undefined,
        `type ${typeIndex} of ${moduleWhere}`
      )
    ),
  };
};

const builtinModule = (): ParsedModule => {
  const context: Context = { source: "builtins", diagnostics: [] };
  const parsed = parseModule(context, builtinModuleDocument, 0);
  if (!parsed || context.diagnostics.length > 0) {
    throw new Error("Builtin module document is invalid");
  }
  return parsed;
};

/**
 * Validate a parsed graph document and build the graph input. The builtin
 * module is added (unless the document defines it) and every other module
 * references it.
 */
export const parseGraphDocument = (
  data: unknown,
  source = "graph document"
): Result<LoadedGraph, Diagnostic[]> => {
  const context: Context = { source, diagnostics: [] };

  if (!isRecord(data)) {
    return error([
      createDiagnostic(
        "GSN9004",
        "error",
        `Graph document must be an object in ${source}`
      ),
    ]);
  }

  if (!Array.isArray(data.modules)) {
    return error([
      createDiagnostic(
        "GSN9005",
        "error",
        `Missing or invalid 'modules' field in ${source}`
      ),
    ]);
  }

  const parsed = data.modules.flatMap((raw, index) => {
    const module = parseModule(context, raw, index);
    return module ? [module] : [];
  });

  const modules = parsed.some((module) => module.name === BUILTIN_MODULE)
    ? parsed
    : [...parsed, builtinModule()];

  const moduleNames = new Set<string>();
  for (const module of modules) {
    if (moduleNames.has(module.name)) {
      report(context, "GSN9018", `Duplicate module '${module.name}'`);
    }
    moduleNames.add(module.name);
  }

  const typeNames = new Set<string>();
  const declarations = modules.flatMap((module) => module.declarations);
  for (const declaration of declarations) {
    if (typeNames.has(declaration.name)) {
      report(context, "GSN9017", `Duplicate type '${declaration.name}'`);
    }
    typeNames.add(declaration.name);
  }

  if (context.diagnostics.length > 0) {
    return error(context.diagnostics);
  }

  const warnings: Diagnostic[] = [];
  const nodes: ModuleNode[] = modules.map((module) => {
    for (const reference of module.references) {
      if (!moduleNames.has(reference)) {
        warnings.push(
          createDiagnostic(
            "GSN9019",
            "warning",
            `Module '${module.name}' references unknown module '${reference}' in ${source}`
          )
        );
      }
    }

    const references =
      module.name === BUILTIN_MODULE || module.references.includes(BUILTIN_MODULE)
        ? module.references
        : [...module.references, BUILTIN_MODULE];
    return createModuleNode(module.name, references, module.declarations);
  });

  const input: TypeGraphInput = { modules: nodes, declarations };
  return ok({ graph: createTypeGraph(input), input, warnings });
};

/**
 * Load and validate a graph JSON file.
 */
export const loadGraphFile = (
  filePath: string
): Result<LoadedGraph, Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return error([
      createDiagnostic("GSN9001", "error", `Graph file not found: ${filePath}`),
    ]);
  }

  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (readError) {
    return error([
      createDiagnostic(
        "GSN9002",
        "error",
        `Failed to read graph file: ${String(readError)}`
      ),
    ]);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (parseError) {
    return error([
      createDiagnostic(
        "GSN9003",
        "error",
        `Invalid JSON in graph file: ${String(parseError)}`
      ),
    ]);
  }

  return parseGraphDocument(parsed, path.basename(filePath));
};

/**
 * Validate a generic parameter list on its own, as query documents spell
 * inline handler signatures.
 */
export const parseGenericParameterList = (
  rawList: readonly unknown[],
  scope: readonly string[],
  where: string,
  source: string
): Result<readonly GenericParameter[], Diagnostic[]> => {
  const context: Context = { source, diagnostics: [] };
  const parameters = parseGenericParameters(context, rawList, scope, where);
  return context.diagnostics.length > 0
    ? error(context.diagnostics)
    : ok(parameters);
};
