/**
 * Scan command - run every query and list the matches
 */

import { displayDeclaration, displayTypeRef, evaluate } from "@genscan/engine";
import type { TypeGraph } from "@genscan/engine";
import type { BuiltQuery, Diagnostic, Result } from "@genscan/frontend";
import type { CommandFailure, OutputFormat, ResolvedConfig } from "../types.js";
import { loadGraph, loadQueries } from "./load.js";

export type ScanMatch = {
  readonly query: string;
  readonly type: string;
  readonly module: string;
  readonly generalizations: readonly string[];
  /** Handler type arguments by parameter name; null without a handler */
  readonly binding: Readonly<Record<string, string>> | null;
};

export type ScanOutput = {
  readonly output: string;
  readonly matchCount: number;
  readonly warnings: readonly Diagnostic[];
};

export const collectMatches = (
  graph: TypeGraph,
  queries: readonly BuiltQuery[]
): readonly ScanMatch[] =>
  queries.flatMap(({ name, query }) =>
    [...evaluate(query, graph)].map((record) => ({
      query: name,
      type: displayDeclaration(record.declaration),
      module: record.declaration.module,
      generalizations: record.generalizations.map(displayTypeRef),
      binding: record.binding
        ? Object.fromEntries(
            record.binding.map((entry) => [
              entry.parameter.name,
              displayTypeRef(entry.type),
            ])
          )
        : null,
    }))
  );

const formatText = (match: ScanMatch): string => {
  const binding = match.binding
    ? ` <${Object.entries(match.binding)
        .map(([parameter, type]) => `${parameter}=${type}`)
        .join(", ")}>`
    : "";
  return `${match.query}: ${match.type}${binding}`;
};

export const formatMatches = (
  matches: readonly ScanMatch[],
  format: OutputFormat
): string =>
  format === "json"
    ? JSON.stringify(matches, null, 2)
    : matches.map(formatText).join("\n");

/**
 * Run the scan
 */
export const scanCommand = (
  config: ResolvedConfig
): Result<ScanOutput, CommandFailure> => {
  const loaded = loadGraph(config);
  if (!loaded.ok) return loaded;

  const queries = loadQueries(config, loaded.value.graph);
  if (!queries.ok) return queries;

  const matches = collectMatches(loaded.value.graph, queries.value);
  if (config.verbose) {
    console.log(
      `Ran ${queries.value.length} query(ies), ${matches.length} match(es)`
    );
  }

  return {
    ok: true,
    value: {
      output: formatMatches(matches, config.format),
      matchCount: matches.length,
      warnings: [
        ...loaded.value.warnings,
        ...queries.value.flatMap((query) => query.warnings),
      ],
    },
  };
};
