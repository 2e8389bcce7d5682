/**
 * Type string parsing
 *
 * Metadata type strings as used in graph documents and queries:
 * - "App.Service"                        → named
 * - "App.IHandler`1"                     → open generic definition
 * - "App.IHandler`1[[System.String]]"    → instantiation
 * - "App.Map`2[[TKey,App.Box`1[[int]]]]" → nested arguments
 * - "System.String[]"                    → array
 * - "TCommand"                           → type parameter, when in scope
 * - "string", "long", ...                → keyword aliases
 */

import type { TypeRef } from "@genscan/engine";
import {
  arityOf,
  arrayOf,
  namedType,
  typeParameter,
} from "@genscan/engine";
import { builtinAliases } from "../builtins/index.js";
import type { Result } from "../types/result.js";
import { error, ok } from "../types/result.js";

const NAME_PATTERN = /^[^\s,[\]]+$/;

/**
 * Split a `[[...]]` payload at top-level commas.
 */
export const splitTypeArguments = (
  payload: string
): Result<readonly string[], string> => {
  const parts: string[] = [];
  let depth = 0;
  let start = 0;

  for (let i = 0; i < payload.length; i++) {
    const char = payload[i];
    if (char === "[") {
      depth++;
    } else if (char === "]") {
      depth--;
      if (depth < 0) return error(`Unbalanced brackets in '${payload}'`);
    } else if (char === "," && depth === 0) {
      parts.push(payload.slice(start, i));
      start = i + 1;
    }
  }

  if (depth !== 0) return error(`Unbalanced brackets in '${payload}'`);
  parts.push(payload.slice(start));
  return ok(parts);
};

/**
 * Parse a type string. `scope` lists the type parameter names that may
 * appear (a declaration's own parameters, or a handler's).
 */
export const parseTypeString = (
  text: string,
  scope: readonly string[] = []
): Result<TypeRef, string> => {
  const trimmed = text.trim();
  if (trimmed === "") return error("Empty type string");

  if (trimmed.endsWith("[]")) {
    const element = parseTypeString(trimmed.slice(0, -2), scope);
    return element.ok ? ok(arrayOf(element.value)) : element;
  }

  const open = trimmed.indexOf("[[");
  if (open !== -1) {
    if (!trimmed.endsWith("]]")) {
      return error(`Unbalanced brackets in '${trimmed}'`);
    }

    const name = trimmed.slice(0, open);
    const split = splitTypeArguments(trimmed.slice(open + 2, -2));
    if (!split.ok) return split;

    const arity = arityOf(name);
    if (arity !== split.value.length) {
      return error(
        `'${name}' takes ${arity} type argument(s), got ${split.value.length}`
      );
    }

    const args: TypeRef[] = [];
    for (const part of split.value) {
      const arg = parseTypeString(part, scope);
      if (!arg.ok) return arg;
      args.push(arg.value);
    }
    return ok(namedType(name, args));
  }

  if (scope.includes(trimmed)) return ok(typeParameter(trimmed));

  const alias = builtinAliases.get(trimmed);
  if (alias) return ok(namedType(alias));

  if (!NAME_PATTERN.test(trimmed)) {
    return error(`Invalid type name '${trimmed}'`);
  }
  return ok(namedType(trimmed));
};

/**
 * Inverse of parseTypeString (aliases are written out in full).
 */
export const formatTypeRef = (ref: TypeRef): string => {
  switch (ref.kind) {
    case "typeParameter":
      return ref.name;
    case "array":
      return `${formatTypeRef(ref.elementType)}[]`;
    case "named":
      return ref.typeArguments.length === 0
        ? ref.name
        : `${ref.name}[[${ref.typeArguments.map(formatTypeRef).join(",")}]]`;
  }
};
