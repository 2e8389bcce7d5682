/**
 * Syntax helpers for source extraction
 */

import * as ts from "typescript";
import type { Accessibility } from "@genscan/engine";
import type { SourceLocation } from "../types/diagnostic.js";

export const hasModifier = (node: ts.Node, kind: ts.SyntaxKind): boolean => {
  if (!ts.canHaveModifiers(node)) {
    return false;
  }
  const modifiers = ts.getModifiers(node);
  return modifiers?.some((m) => m.kind === kind) ?? false;
};

/**
 * Class members default to public
 */
export const memberAccessibility = (node: ts.Node): Accessibility => {
  if (hasModifier(node, ts.SyntaxKind.PrivateKeyword)) return "private";
  if (hasModifier(node, ts.SyntaxKind.ProtectedKeyword)) return "protected";
  return "public";
};

/**
 * Dotted name of the `namespace` blocks around a declaration
 */
export const namespaceOf = (node: ts.Node): string => {
  const names: string[] = [];
  for (let current = node.parent; current; current = current.parent) {
    if (ts.isModuleDeclaration(current) && ts.isIdentifier(current.name)) {
      names.unshift(current.name.text);
    }
  }
  return names.join(".");
};

export const getNodeLocation = (node: ts.Node): SourceLocation => {
  const sourceFile = node.getSourceFile();
  const { line, character } = sourceFile.getLineAndCharacterOfPosition(
    node.getStart(sourceFile)
  );
  return {
    file: sourceFile.fileName,
    line: line + 1,
    column: character + 1,
    length: node.getWidth(sourceFile),
  };
};

/**
 * Identifier a heritage or decorator expression ends in
 */
export const referencedName = (
  expression: ts.Expression
): ts.Identifier | undefined => {
  if (ts.isIdentifier(expression)) return expression;
  if (ts.isPropertyAccessExpression(expression) && ts.isIdentifier(expression.name)) {
    return expression.name;
  }
  if (ts.isCallExpression(expression)) return referencedName(expression.expression);
  return undefined;
};
