/**
 * Extract command - write the graph built from TypeScript sources
 */

import {
  createDiagnostic,
  error,
  extractTypeGraph,
  map,
  mapError,
} from "@genscan/frontend";
import type { Diagnostic, Result } from "@genscan/frontend";
import { EXIT_LOAD_ERROR } from "../cli/constants.js";
import type { CommandFailure, ResolvedConfig } from "../types.js";
import { failWith } from "./load.js";

export type ExtractOutput = {
  readonly output: string;
  readonly typeCount: number;
  readonly warnings: readonly Diagnostic[];
};

export const extractCommand = (
  config: ResolvedConfig
): Result<ExtractOutput, CommandFailure> => {
  const source = config.graphSource;
  if (source.kind !== "sources") {
    return error(
      failWith(EXIT_LOAD_ERROR)([
        createDiagnostic(
          "GSN2005",
          "error",
          "Nothing to extract: genscan.json names a graph, not 'sources'"
        ),
      ])
    );
  }

  if (config.verbose) {
    console.log(`Extracting graph from ${source.files.length} source file(s)`);
  }

  const result = extractTypeGraph(source.files, {
    moduleName: source.moduleName,
    references: source.references,
    rootNamespace: source.rootNamespace,
  });

  return map(
    mapError(result, failWith(EXIT_LOAD_ERROR)),
    (extracted): ExtractOutput => ({
      output: JSON.stringify(extracted.document, null, 2),
      typeCount: extracted.document.modules.reduce(
        (count, module) => count + module.types.length,
        0
      ),
      warnings: extracted.warnings,
    })
  );
};
