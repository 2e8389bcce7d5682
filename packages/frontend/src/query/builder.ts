/**
 * Query builder
 *
 * Turns a raw query document into an engine Query. Every type name is
 * resolved against the graph here, so evaluation never meets a dangling
 * reference.
 *
 * Document fields:
 * - declaringType (required): type the query is declared on
 * - assemblyOfType / assemblyNameFilter: module selection
 * - assignableTo (+ assignableToGenericArguments)
 * - excludeAssignableTo (+ excludeAssignableToGenericArguments)
 * - attributeFilter / excludeByAttribute
 * - typeNameFilter / excludeByTypeName
 * - customHandler, customHandlerKind, typeParameters
 */

import type {
  GenericParameter,
  HandlerSignature,
  NamedTypeRef,
  Query,
  TypeDeclaration,
  TypeGraph,
  TypeRef,
} from "@genscan/engine";
import { arityOf, namedType, refOfDeclaration } from "@genscan/engine";
import { parseGenericParameterList } from "../graph-loader/loader.js";
import type { Diagnostic, DiagnosticCode } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { error, ok } from "../types/result.js";
import { parseTypeString } from "../type-strings/parser.js";

export type BuiltQuery = {
  readonly name: string;
  readonly query: Query;
  readonly warnings: readonly Diagnostic[];
};

type RawObject = Readonly<Record<string, unknown>>;

const isRecord = (value: unknown): value is RawObject =>
  typeof value === "object" && value !== null && !Array.isArray(value);

type Context = {
  readonly graph: TypeGraph;
  readonly label: string;
  readonly diagnostics: Diagnostic[];
};

const report = (
  context: Context,
  code: DiagnosticCode,
  message: string,
  hint?: string
): void => {
  context.diagnostics.push(
    createDiagnostic(
      code,
      "error",
      `${message} (query '${context.label}')`,
      undefined,
      hint
    )
  );
};

const readString = (
  context: Context,
  raw: RawObject,
  field: string
): string | undefined => {
  const value = raw[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return value;
  report(context, "GSN3008", `'${field}' must be a string`);
  return undefined;
};

const readStrings = (
  context: Context,
  raw: RawObject,
  field: string
): readonly string[] | undefined => {
  const value = raw[field];
  if (value === undefined || value === null) return undefined;
  if (
    Array.isArray(value) &&
    value.every((item): item is string => typeof item === "string")
  ) {
    return value;
  }
  report(context, "GSN3008", `'${field}' must be an array of strings`);
  return undefined;
};

/**
 * A type reference is resolved when every named type in it is declared.
 */
const missingName = (graph: TypeGraph, ref: TypeRef): string | undefined => {
  switch (ref.kind) {
    case "typeParameter":
      return ref.name;
    case "array":
      return missingName(graph, ref.elementType);
    case "named":
      if (!graph.getDeclaration(ref.name)) return ref.name;
      for (const arg of ref.typeArguments) {
        const missing = missingName(graph, arg);
        if (missing) return missing;
      }
      return undefined;
  }
};

/**
 * Suggest the arity-qualified name when only a generic definition exists.
 */
const arityHint = (graph: TypeGraph, name: string): string | undefined => {
  if (name.includes("`")) return undefined;
  for (let arity = 1; arity <= 8; arity++) {
    const candidate = `${name}\`${arity}`;
    if (graph.getDeclaration(candidate)) return `Did you mean '${candidate}'?`;
  }
  return undefined;
};

const resolveNamed = (
  context: Context,
  text: string,
  code: DiagnosticCode,
  field: string
): NamedTypeRef | undefined => {
  const parsed = parseTypeString(text);
  if (!parsed.ok) {
    report(context, code, `Invalid '${field}': ${parsed.error}`);
    return undefined;
  }

  const ref = parsed.value;
  if (ref.kind !== "named") {
    report(context, code, `'${field}' must name a type, got '${text}'`);
    return undefined;
  }

  const missing = missingName(context.graph, ref);
  if (missing) {
    report(
      context,
      code,
      `Type not found for '${field}': ${missing}`,
      arityHint(context.graph, missing)
    );
    return undefined;
  }

  return ref;
};

/**
 * Close an open target with explicit generic arguments.
 */
const resolveTarget = (
  context: Context,
  raw: RawObject,
  field: string
): NamedTypeRef | undefined => {
  const text = readString(context, raw, field);
  const argumentsField = `${field}GenericArguments`;
  const argTexts = readStrings(context, raw, argumentsField);
  if (text === undefined) {
    if (argTexts) {
      report(context, "GSN3006", `'${argumentsField}' given without '${field}'`);
    }
    return undefined;
  }

  const target = resolveNamed(context, text, "GSN3003", field);
  if (!target || !argTexts) return target;

  if (target.typeArguments.length > 0) {
    report(
      context,
      "GSN3006",
      `'${field}' is already instantiated; drop '${argumentsField}'`
    );
    return undefined;
  }

  const arity = arityOf(target.name);
  if (arity !== argTexts.length) {
    report(
      context,
      "GSN3006",
      `'${target.name}' takes ${arity} type argument(s), got ${argTexts.length}`
    );
    return undefined;
  }

  const args: TypeRef[] = [];
  for (const argText of argTexts) {
    const parsed = parseTypeString(argText);
    const missing = parsed.ok ? missingName(context.graph, parsed.value) : argText;
    if (!parsed.ok || missing) {
      report(
        context,
        "GSN3006",
        `Generic argument not found for '${field}': ${missing ?? argText}`
      );
      return undefined;
    }
    args.push(parsed.value);
  }

  return namedType(target.name, args);
};

/**
 * Generic method named `name` on the declaring type or its base classes.
 */
const findHandlerMethod = (
  graph: TypeGraph,
  declaring: TypeDeclaration,
  name: string
): readonly GenericParameter[] | undefined => {
  const chain = [
    declaring,
    ...graph
      .baseTypesOf(refOfDeclaration(declaring))
      .flatMap((base) => {
        const declaration = graph.declarationOf(base);
        return declaration ? [declaration] : [];
      }),
  ];

  for (const declaration of chain) {
    const method = declaration.methods.find((candidate) => candidate.name === name);
    if (method) return method.typeParameters;
  }
  return undefined;
};

const resolveHandler = (
  context: Context,
  raw: RawObject,
  declaring: TypeDeclaration
): HandlerSignature | undefined => {
  const name = readString(context, raw, "customHandler");
  const kind = readString(context, raw, "customHandlerKind");
  const inline = raw.typeParameters;

  if (name === undefined) {
    if (inline !== undefined || kind !== undefined) {
      report(
        context,
        "GSN3005",
        "'typeParameters' and 'customHandlerKind' need a 'customHandler'"
      );
    }
    return undefined;
  }

  if (name === "") {
    report(context, "GSN3005", "'customHandler' must not be empty");
    return undefined;
  }

  if (kind !== undefined && kind !== "method" && kind !== "typeMethod") {
    report(
      context,
      "GSN3008",
      `'customHandlerKind' must be "method" or "typeMethod", got '${kind}'`
    );
    return undefined;
  }

  if (inline !== undefined) {
    if (!Array.isArray(inline)) {
      report(context, "GSN3009", "'typeParameters' must be an array");
      return undefined;
    }
    const parameters = parseGenericParameterList(
      inline,
      [],
      `handler '${name}'`,
      `query '${context.label}'`
    );
    if (!parameters.ok) {
      context.diagnostics.push(
        ...parameters.error.map((diagnostic) =>
          createDiagnostic("GSN3009", "error", diagnostic.message)
        )
      );
      return undefined;
    }
    return { kind: "method", name, typeParameters: parameters.value };
  }

  if (kind === "typeMethod") return { kind: "typeMethod", name };

  const typeParameters = findHandlerMethod(context.graph, declaring, name);
  if (typeParameters) return { kind: "method", name, typeParameters };

  if (kind === "method") {
    report(
      context,
      "GSN3005",
      `Handler method '${name}' not found on ${declaring.name} or its base types`
    );
    return undefined;
  }

  return { kind: "typeMethod", name };
};

/**
 * Explicit name, else the declaring type and handler.
 */
const queryName = (raw: RawObject, fallbackName: string): string => {
  if (typeof raw.name === "string") return raw.name;
  if (typeof raw.declaringType !== "string") return fallbackName;
  return typeof raw.customHandler === "string"
    ? `${raw.declaringType}.${raw.customHandler}`
    : raw.declaringType;
};

/**
 * Build and validate one query.
 */
export const buildQuery = (
  graph: TypeGraph,
  raw: unknown,
  fallbackName = "query"
): Result<BuiltQuery, Diagnostic[]> => {
  if (!isRecord(raw)) {
    return error([
      createDiagnostic(
        "GSN3007",
        "error",
        `Query document must be an object (query '${fallbackName}')`
      ),
    ]);
  }

  const label = queryName(raw, fallbackName);
  const context: Context = { graph, label, diagnostics: [] };
  const warnings: Diagnostic[] = [];

  const declaringName = readString(context, raw, "declaringType");
  const declaringRef =
    declaringName === undefined
      ? undefined
      : resolveNamed(context, declaringName, "GSN3001", "declaringType");
  const declaring = declaringRef
    ? graph.declarationOf(declaringRef)
    : undefined;
  if (declaringName === undefined) {
    report(context, "GSN3001", "Missing 'declaringType'");
  }

  const assemblyOfTypeName = readString(context, raw, "assemblyOfType");
  const assemblyOfType =
    assemblyOfTypeName === undefined
      ? undefined
      : resolveNamed(context, assemblyOfTypeName, "GSN3002", "assemblyOfType");
  const assemblyNameFilter = readString(context, raw, "assemblyNameFilter");

  if (assemblyOfTypeName !== undefined && assemblyNameFilter !== undefined) {
    warnings.push(
      createDiagnostic(
        "GSN3010",
        "warning",
        `'assemblyOfType' takes precedence; 'assemblyNameFilter' is ignored (query '${label}')`
      )
    );
  }

  const assignableTo = resolveTarget(context, raw, "assignableTo");
  const excludeAssignableTo = resolveTarget(
    context,
    raw,
    "excludeAssignableTo"
  );

  const attribute = (field: string): NamedTypeRef | undefined => {
    const text = readString(context, raw, field);
    return text === undefined
      ? undefined
      : resolveNamed(context, text, "GSN3004", field);
  };
  const attributeFilter = attribute("attributeFilter");
  const excludeByAttribute = attribute("excludeByAttribute");

  const typeNameFilter = readString(context, raw, "typeNameFilter");
  const excludeByTypeName = readString(context, raw, "excludeByTypeName");

  const handler = declaring
    ? resolveHandler(context, raw, declaring)
    : undefined;

  if (context.diagnostics.length > 0 || !declaring) {
    return error(context.diagnostics);
  }

  const query: Query = {
    position: { module: declaring.module, containingType: declaring.name },
    assemblyOfType,
    assemblyNameFilter,
    assignableTo,
    excludeAssignableTo,
    attributeFilter,
    excludeByAttribute,
    typeNameFilter,
    excludeByTypeName,
    handler,
  };

  return ok({ name: label, query, warnings });
};

/**
 * Build every query of a file; names must be unique.
 */
export const buildQueries = (
  graph: TypeGraph,
  raws: readonly unknown[]
): Result<readonly BuiltQuery[], Diagnostic[]> => {
  const built: BuiltQuery[] = [];
  const diagnostics: Diagnostic[] = [];
  const names = new Set<string>();

  raws.forEach((raw, index) => {
    const result = buildQuery(graph, raw, `query-${index + 1}`);
    if (!result.ok) {
      diagnostics.push(...result.error);
      return;
    }

    if (names.has(result.value.name)) {
      diagnostics.push(
        createDiagnostic(
          "GSN3014",
          "error",
          `Duplicate query name '${result.value.name}'`
        )
      );
      return;
    }
    names.add(result.value.name);
    built.push(result.value);
  });

  return diagnostics.length > 0 ? error(diagnostics) : ok(built);
};
