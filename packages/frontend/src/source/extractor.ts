/**
 * TypeScript source extractor
 *
 * Builds a graph document from TypeScript sources and loads it like any
 * other graph file. Classes, interfaces and enums become declarations;
 * heritage and type arguments are resolved through the type checker.
 */

import * as ts from "typescript";
import * as fs from "fs";
import * as path from "path";
import type { Accessibility, TypeRef } from "@genscan/engine";
import { arityOf, arrayOf, namedType, typeParameter } from "@genscan/engine";
import type {
  ConstructorDocument,
  GenericParameterDocument,
  GraphDocument,
  MethodDocument,
  TypeDocument,
} from "../graph-loader/document.js";
import { parseGraphDocument } from "../graph-loader/loader.js";
import type { LoadedGraph } from "../graph-loader/loader.js";
import type { Diagnostic, DiagnosticCode } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { error, ok } from "../types/result.js";
import { formatTypeRef } from "../type-strings/parser.js";
import {
  getNodeLocation,
  hasModifier,
  memberAccessibility,
  namespaceOf,
  referencedName,
} from "./helpers.js";

export type ExtractOptions = {
  /** Module every extracted declaration belongs to */
  readonly moduleName: string;
  readonly references?: readonly string[];
  /** Prefixed to the namespace of every declaration */
  readonly rootNamespace?: string;
  readonly compilerOptions?: ts.CompilerOptions;
};

export type ExtractedGraph = LoadedGraph & {
  readonly document: GraphDocument;
};

export const defaultCompilerOptions: ts.CompilerOptions = {
  target: ts.ScriptTarget.ES2022,
  module: ts.ModuleKind.NodeNext,
  moduleResolution: ts.ModuleResolutionKind.NodeNext,
  noLib: true,
  types: [],
  noEmit: true,
  skipLibCheck: true,
  experimentalDecorators: true,
  allowImportingTsExtensions: true,
};

const KEYWORD_TYPES: ReadonlyMap<ts.SyntaxKind, string> = new Map([
  [ts.SyntaxKind.StringKeyword, "System.String"],
  [ts.SyntaxKind.NumberKeyword, "System.Double"],
  [ts.SyntaxKind.BooleanKeyword, "System.Boolean"],
  [ts.SyntaxKind.BigIntKeyword, "System.Int64"],
  [ts.SyntaxKind.ObjectKeyword, "System.Object"],
]);

type Extractable =
  | ts.ClassDeclaration
  | ts.InterfaceDeclaration
  | ts.EnumDeclaration;

type Declared = {
  readonly node: Extractable;
  readonly name: string;
};

type Context = {
  readonly checker: ts.TypeChecker;
  readonly options: ExtractOptions;
  /** Full names of the extracted declarations, by symbol */
  readonly names: Map<ts.Symbol, string>;
  readonly taken: Set<string>;
  /** Attribute classes made up for decorator functions */
  readonly attributes: Map<string, TypeDocument>;
  readonly diagnostics: Diagnostic[];
};

const warn = (
  context: Context,
  code: DiagnosticCode,
  message: string,
  node: ts.Node
): void => {
  context.diagnostics.push(
    createDiagnostic(code, "warning", message, getNodeLocation(node))
  );
};

const qualify = (context: Context, node: ts.Node, simpleName: string): string => {
  const namespace = [context.options.rootNamespace ?? "", namespaceOf(node)]
    .filter((part) => part !== "")
    .join(".");
  return namespace === "" ? simpleName : `${namespace}.${simpleName}`;
};

const symbolOf = (
  context: Context,
  identifier: ts.Identifier
): ts.Symbol | undefined => {
  const symbol = context.checker.getSymbolAtLocation(identifier);
  return symbol && symbol.flags & ts.SymbolFlags.Alias
    ? context.checker.getAliasedSymbol(symbol)
    : symbol;
};

const collectDeclarations = (sourceFile: ts.SourceFile): readonly Extractable[] => {
  const found: Extractable[] = [];
  const visit = (node: ts.Node): void => {
    if (
      (ts.isClassDeclaration(node) ||
        ts.isInterfaceDeclaration(node) ||
        ts.isEnumDeclaration(node)) &&
      node.name
    ) {
      found.push(node);
      return;
    }
    if (ts.isModuleDeclaration(node) || ts.isModuleBlock(node)) {
      ts.forEachChild(node, visit);
    }
  };
  ts.forEachChild(sourceFile, visit);
  return found;
};

const typeParameterCount = (node: Extractable): number =>
  ts.isEnumDeclaration(node) ? 0 : (node.typeParameters?.length ?? 0);

const unsupported = (context: Context, node: ts.TypeNode): TypeRef => {
  warn(
    context,
    "GSN2001",
    `Unsupported type '${node.getText()}', using System.Object`,
    node
  );
  return namedType("System.Object");
};

const typeNodeToRef = (context: Context, node: ts.TypeNode): TypeRef => {
  const keyword = KEYWORD_TYPES.get(node.kind);
  if (keyword) return namedType(keyword);

  if (ts.isParenthesizedTypeNode(node)) return typeNodeToRef(context, node.type);
  if (ts.isArrayTypeNode(node)) {
    return arrayOf(typeNodeToRef(context, node.elementType));
  }

  if (!ts.isTypeReferenceNode(node)) return unsupported(context, node);

  const identifier = ts.isIdentifier(node.typeName)
    ? node.typeName
    : node.typeName.right;
  const symbol = symbolOf(context, identifier);
  if (symbol && symbol.flags & ts.SymbolFlags.TypeParameter) {
    return typeParameter(identifier.text);
  }

  const name = symbol && context.names.get(symbol);
  const args = (node.typeArguments ?? []).map((arg) =>
    typeNodeToRef(context, arg)
  );
  if (!name || args.length !== arityOf(name)) return unsupported(context, node);
  return namedType(name, args);
};

const heritageRef = (
  context: Context,
  expression: ts.ExpressionWithTypeArguments
): string | undefined => {
  const identifier = referencedName(expression.expression);
  const symbol = identifier && symbolOf(context, identifier);
  const name = symbol && context.names.get(symbol);
  if (!name) {
    warn(
      context,
      "GSN2003",
      `'${expression.expression.getText()}' does not name an extracted class or interface`,
      expression
    );
    return undefined;
  }

  const args = (expression.typeArguments ?? []).map((arg) =>
    typeNodeToRef(context, arg)
  );
  if (args.length !== arityOf(name)) {
    warn(
      context,
      "GSN2003",
      `'${name}' takes ${arityOf(name)} type argument(s), got ${args.length}`,
      expression
    );
    return undefined;
  }
  return formatTypeRef(namedType(name, args));
};

const heritageOf = (
  context: Context,
  node: ts.ClassDeclaration | ts.InterfaceDeclaration,
  token: ts.SyntaxKind.ExtendsKeyword | ts.SyntaxKind.ImplementsKeyword
): readonly string[] =>
  (node.heritageClauses ?? [])
    .filter((clause) => clause.token === token)
    .flatMap((clause) => clause.types)
    .flatMap((expression) => {
      const ref = heritageRef(context, expression);
      return ref ? [ref] : [];
    });

/**
 * `T extends A & B & object`: A and B become constraint types, `object`
 * the reference-type flag.
 */
const genericParameter = (
  context: Context,
  parameter: ts.TypeParameterDeclaration
): GenericParameterDocument => {
  const constraint = parameter.constraint;
  const parts: readonly ts.TypeNode[] = !constraint
    ? []
    : ts.isIntersectionTypeNode(constraint)
      ? constraint.types
      : [constraint];

  const hasReferenceTypeConstraint = parts.some(
    (part) => part.kind === ts.SyntaxKind.ObjectKeyword
  );
  const constraintTypes = parts
    .filter((part) => part.kind !== ts.SyntaxKind.ObjectKeyword)
    .map((part) => formatTypeRef(typeNodeToRef(context, part)));

  return {
    name: parameter.name.text,
    ...(hasReferenceTypeConstraint ? { hasReferenceTypeConstraint: true } : {}),
    ...(constraintTypes.length > 0 ? { constraintTypes } : {}),
  };
};

const accessibilityField = (
  accessibility: Accessibility
): { readonly accessibility?: Accessibility } =>
  accessibility !== "public" ? { accessibility } : {};

const methodsOf = (
  context: Context,
  members: readonly (ts.ClassElement | ts.TypeElement)[]
): readonly MethodDocument[] => {
  const seen = new Set<string>();
  return members.flatMap((member): MethodDocument[] => {
    if (!ts.isMethodDeclaration(member) && !ts.isMethodSignature(member)) {
      return [];
    }
    const typeParameters = member.typeParameters ?? [];
    if (!ts.isIdentifier(member.name) || typeParameters.length === 0) {
      return [];
    }

    // Overloads share one entry
    const name = member.name.text;
    if (seen.has(name)) return [];
    seen.add(name);

    return [
      {
        name,
        ...(hasModifier(member, ts.SyntaxKind.StaticKeyword)
          ? { isStatic: true }
          : {}),
        ...accessibilityField(memberAccessibility(member)),
        typeParameters: typeParameters.map((param) =>
          genericParameter(context, param)
        ),
      },
    ];
  });
};

/**
 * Overload signatures when present, else the implementation.
 */
const declaredConstructors = (
  node: ts.ClassDeclaration
): readonly ConstructorDocument[] | undefined => {
  const constructors = node.members.filter(ts.isConstructorDeclaration);
  if (constructors.length === 0) return undefined;

  const signatures = constructors.filter((ctor) => !ctor.body);
  return (signatures.length > 0 ? signatures : constructors).map((ctor) => ({
    ...accessibilityField(memberAccessibility(ctor)),
    ...(ctor.parameters.length > 0
      ? { parameterCount: ctor.parameters.length }
      : {}),
  }));
};

const attributeName = (
  context: Context,
  declaration: ts.FunctionDeclaration,
  simpleName: string
): string => {
  const capitalized = `${simpleName.charAt(0).toUpperCase()}${simpleName.slice(1)}`;
  const name = qualify(
    context,
    declaration,
    capitalized.endsWith("Attribute") ? capitalized : `${capitalized}Attribute`
  );

  if (!context.taken.has(name)) {
    context.taken.add(name);
    context.attributes.set(name, {
      name,
      isSealed: true,
      baseType: "System.Attribute",
    });
  }
  return name;
};

/**
 * A decorator naming a class applies that class; one naming a function
 * applies the attribute class made up for it.
 */
const attributesOf = (
  context: Context,
  node: ts.ClassDeclaration
): readonly string[] =>
  (ts.getDecorators(node) ?? []).flatMap((decorator) => {
    const identifier = referencedName(decorator.expression);
    const symbol = identifier && symbolOf(context, identifier);
    const declared = symbol && context.names.get(symbol);
    if (declared) return [declared];

    const declaration = symbol?.declarations?.find(ts.isFunctionDeclaration);
    if (identifier && declaration) {
      return [attributeName(context, declaration, identifier.text)];
    }

    warn(
      context,
      "GSN2003",
      `Decorator '@${decorator.expression.getText()}' does not name a class or function`,
      decorator
    );
    return [];
  });

type ClassInfo = {
  readonly baseType?: string;
  readonly constructors?: readonly ConstructorDocument[];
};

/**
 * A class without constructors takes its base class's.
 */
const resolveConstructors = (
  classes: ReadonlyMap<string, ClassInfo>,
  name: string,
  seen: ReadonlySet<string> = new Set()
): readonly ConstructorDocument[] | undefined => {
  const info = classes.get(name);
  if (!info) return undefined;
  if (info.constructors) return info.constructors;
  if (!info.baseType || seen.has(name)) return undefined;

  const [baseName = info.baseType] = info.baseType.split("[[");
  return resolveConstructors(classes, baseName, new Set([...seen, name]));
};

const typeDocument = (
  context: Context,
  declared: Declared
): TypeDocument => {
  const { node, name } = declared;
  const common = {
    name,
    ...(hasModifier(node, ts.SyntaxKind.ExportKeyword)
      ? {}
      : { accessibility: "internal" as const }),
  };

  if (ts.isEnumDeclaration(node)) {
    return { ...common, kind: "enum" };
  }

  const typeParameters = (node.typeParameters ?? []).map(
    (param) => param.name.text
  );
  const generic = typeParameters.length > 0 ? { typeParameters } : {};

  if (ts.isInterfaceDeclaration(node)) {
    const interfaces = heritageOf(context, node, ts.SyntaxKind.ExtendsKeyword);
    const methods = methodsOf(context, node.members);
    return {
      ...common,
      kind: "interface",
      ...generic,
      ...(interfaces.length > 0 ? { interfaces } : {}),
      ...(methods.length > 0 ? { methods } : {}),
    };
  }

  const [baseType] = heritageOf(context, node, ts.SyntaxKind.ExtendsKeyword);
  const interfaces = heritageOf(context, node, ts.SyntaxKind.ImplementsKeyword);
  const attributes = attributesOf(context, node);
  const methods = methodsOf(context, node.members);
  const constructors = declaredConstructors(node);

  return {
    ...common,
    ...(hasModifier(node, ts.SyntaxKind.AbstractKeyword)
      ? { isAbstract: true }
      : {}),
    ...generic,
    ...(baseType ? { baseType } : {}),
    ...(interfaces.length > 0 ? { interfaces } : {}),
    ...(attributes.length > 0 ? { attributes } : {}),
    ...(constructors ? { constructors } : {}),
    ...(methods.length > 0 ? { methods } : {}),
  };
};

const withInheritedConstructors = (
  documents: readonly TypeDocument[]
): readonly TypeDocument[] => {
  const classes = new Map<string, ClassInfo>(
    documents
      .filter((document) => document.kind === undefined)
      .map((document) => [
        document.name,
        { baseType: document.baseType, constructors: document.constructors },
      ])
  );

  return documents.map((document) => {
    if (document.kind !== undefined || document.constructors) return document;
    const inherited = resolveConstructors(classes, document.name);
    return inherited ? { ...document, constructors: inherited } : document;
  });
};

/**
 * Extract every source file of a program that is not a declaration file
 * or an external library.
 */
export const extractFromProgram = (
  program: ts.Program,
  options: ExtractOptions
): Result<ExtractedGraph, Diagnostic[]> => {
  const context: Context = {
    checker: program.getTypeChecker(),
    options,
    names: new Map(),
    taken: new Set(),
    attributes: new Map(),
    diagnostics: [],
  };

  const sourceFiles = program
    .getSourceFiles()
    .filter(
      (sourceFile) =>
        !sourceFile.isDeclarationFile &&
        !program.isSourceFileFromExternalLibrary(sourceFile)
    );

  // Names first, so heritage may point forward
  const declared = sourceFiles
    .flatMap(collectDeclarations)
    .flatMap((node): Declared[] => {
      const identifier = node.name;
      if (!identifier) return [];

      const arity = typeParameterCount(node);
      const name = qualify(
        context,
        node,
        arity > 0 ? `${identifier.text}\`${arity}` : identifier.text
      );
      const symbol = context.checker.getSymbolAtLocation(identifier);

      if (!symbol || context.names.has(symbol) || context.taken.has(name)) {
        warn(
          context,
          "GSN2004",
          `Duplicate declaration of '${name}', keeping the first`,
          identifier
        );
        return [];
      }

      context.names.set(symbol, name);
      context.taken.add(name);
      return [{ node, name }];
    });

  const types = withInheritedConstructors(
    declared.map((entry) => typeDocument(context, entry))
  );

  const document: GraphDocument = {
    modules: [
      {
        name: options.moduleName,
        ...(options.references && options.references.length > 0
          ? { references: options.references }
          : {}),
        types: [...types, ...context.attributes.values()],
      },
    ],
  };

  const loaded = parseGraphDocument(document, "extracted sources");
  if (!loaded.ok) {
    return error([...context.diagnostics, ...loaded.error]);
  }

  return ok({
    ...loaded.value,
    document,
    warnings: [...context.diagnostics, ...loaded.value.warnings],
  });
};

export const extractTypeGraph = (
  fileNames: readonly string[],
  options: ExtractOptions
): Result<ExtractedGraph, Diagnostic[]> => {
  const absolutePaths = fileNames.map((fileName) => path.resolve(fileName));
  const missing = absolutePaths.filter((fileName) => !fs.existsSync(fileName));
  if (missing.length > 0) {
    return error(
      missing.map((fileName) =>
        createDiagnostic("GSN2002", "error", `Source file not found: ${fileName}`)
      )
    );
  }

  const program = ts.createProgram(absolutePaths, {
    ...defaultCompilerOptions,
    ...options.compilerOptions,
  });
  return extractFromProgram(program, options);
};
