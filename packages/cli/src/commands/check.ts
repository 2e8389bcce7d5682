/**
 * Check command - validate config, graph and queries without scanning
 */

import { flatMap, map } from "@genscan/frontend";
import type { Diagnostic, Result } from "@genscan/frontend";
import type { CommandFailure, ResolvedConfig } from "../types.js";
import { loadGraph, loadQueries } from "./load.js";

export type CheckSummary = {
  readonly moduleCount: number;
  readonly typeCount: number;
  readonly queryNames: readonly string[];
  readonly warnings: readonly Diagnostic[];
};

export const checkCommand = (
  config: ResolvedConfig
): Result<CheckSummary, CommandFailure> =>
  flatMap(loadGraph(config), (loaded) =>
    map(
      loadQueries(config, loaded.graph),
      (queries): CheckSummary => ({
        moduleCount: loaded.input.modules.length,
        typeCount: loaded.input.declarations.length,
        queryNames: queries.map((query) => query.name),
        warnings: [
          ...loaded.warnings,
          ...queries.flatMap((query) => query.warnings),
        ],
      })
    )
  );
