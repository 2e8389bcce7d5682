/**
 * Core library module shared by every graph.
 *
 * The module is described in the graph document format and goes through
 * the same loader as user graphs.
 */

import builtins from "./builtins.json" with { type: "json" };

export const BUILTIN_MODULE = "System.Runtime";

/**
 * Keyword aliases accepted wherever a type string is expected.
 */
export const builtinAliases: ReadonlyMap<string, string> = new Map(
  Object.entries(builtins.aliases)
);

/**
 * Raw module document; validated by the graph loader.
 */
export const builtinModuleDocument: unknown = builtins.module;
