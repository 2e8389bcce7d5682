/**
 * Type definitions for CLI
 */

import type { Diagnostic } from "@genscan/frontend";

export type OutputFormat = "text" | "json";

/**
 * genscan configuration file (genscan.json)
 *
 * A project names either a graph document or TypeScript sources to
 * extract one from.
 */
export type GenscanConfig = {
  readonly $schema?: string;
  /** Graph document path */
  readonly graph?: string;
  /** TypeScript sources to extract the graph from */
  readonly sources?: readonly string[];
  /** Module extracted declarations belong to (default: "App") */
  readonly moduleName?: string;
  readonly references?: readonly string[];
  readonly rootNamespace?: string;
  /** Query files (YAML) */
  readonly queries: readonly string[];
  readonly format?: OutputFormat;
};

/**
 * CLI command options (mutable for parsing)
 */
export type CliOptions = {
  verbose?: boolean;
  quiet?: boolean;
  config?: string;
  query?: string;
  format?: string;
  out?: string;
};

export type GraphSource =
  | { readonly kind: "graph"; readonly path: string }
  | {
      readonly kind: "sources";
      readonly files: readonly string[];
      readonly moduleName: string;
      readonly references: readonly string[];
      readonly rootNamespace: string | undefined;
    };

/**
 * Combined configuration (from file + CLI args)
 */
export type ResolvedConfig = {
  /** Directory containing genscan.json; relative paths start here */
  readonly projectRoot: string;
  readonly graphSource: GraphSource;
  readonly queryFiles: readonly string[];
  /** Run only the query with this name */
  readonly queryName: string | undefined;
  readonly format: OutputFormat;
  /** Output file; stdout when absent */
  readonly out: string | undefined;
  readonly verbose: boolean;
  readonly quiet: boolean;
};

/**
 * Why a command stopped, and the exit code it maps to
 */
export type CommandFailure = {
  readonly exitCode: number;
  readonly diagnostics: readonly Diagnostic[];
};
