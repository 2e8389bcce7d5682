/**
 * Graph and query loading shared by the commands
 */

import {
  buildQueries,
  createDiagnostic,
  error,
  extractTypeGraph,
  flatMap,
  loadGraphFile,
  loadQueryFile,
  mapError,
  ok,
} from "@genscan/frontend";
import type {
  BuiltQuery,
  Diagnostic,
  LoadedGraph,
  Result,
} from "@genscan/frontend";
import type { TypeGraph } from "@genscan/engine";
import { EXIT_LOAD_ERROR, EXIT_QUERY_ERROR } from "../cli/constants.js";
import type { CommandFailure, ResolvedConfig } from "../types.js";

/**
 * Attach an exit code to a diagnostic list
 */
export const failWith =
  (exitCode: number) =>
  (diagnostics: readonly Diagnostic[]): CommandFailure => ({
    exitCode,
    diagnostics,
  });

/**
 * Load the graph document, or extract it from TypeScript sources
 */
export const loadGraph = (
  config: ResolvedConfig
): Result<LoadedGraph, CommandFailure> => {
  const source = config.graphSource;

  if (config.verbose) {
    console.log(
      source.kind === "graph"
        ? `Loading graph: ${source.path}`
        : `Extracting graph from ${source.files.length} source file(s)`
    );
  }

  const result: Result<LoadedGraph, Diagnostic[]> =
    source.kind === "graph"
      ? loadGraphFile(source.path)
      : extractTypeGraph(source.files, {
          moduleName: source.moduleName,
          references: source.references,
          rootNamespace: source.rootNamespace,
        });

  return mapError(result, failWith(EXIT_LOAD_ERROR));
};

/**
 * Load every query file, build the queries against the graph, and keep
 * only the requested one when a name was given
 */
export const loadQueries = (
  config: ResolvedConfig,
  graph: TypeGraph
): Result<readonly BuiltQuery[], CommandFailure> => {
  const raws: unknown[] = [];
  for (const file of config.queryFiles) {
    if (config.verbose) {
      console.log(`Loading queries: ${file}`);
    }
    const loaded = loadQueryFile(file);
    if (!loaded.ok) return error(failWith(EXIT_LOAD_ERROR)(loaded.error));
    raws.push(...loaded.value);
  }

  const built = mapError(buildQueries(graph, raws), failWith(EXIT_QUERY_ERROR));

  return flatMap(
    built,
    (queries): Result<readonly BuiltQuery[], CommandFailure> => {
      const wanted = config.queryName;
      if (wanted === undefined) return ok(queries);

      const selected = queries.filter((query) => query.name === wanted);
      if (selected.length > 0) return ok(selected);

      const known = queries.map((query) => query.name).join(", ");
      return error(
        failWith(EXIT_QUERY_ERROR)([
          createDiagnostic(
            "GSN3015",
            "error",
            `No query named '${wanted}'`,
            undefined,
            known ? `Known queries: ${known}` : undefined
          ),
        ])
      );
    }
  );
};
