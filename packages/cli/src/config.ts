/**
 * Configuration loading and validation
 */

import { readFileSync, existsSync } from "node:fs";
import { join, resolve, dirname } from "node:path";
import type { Result } from "@genscan/frontend";
import type {
  CliOptions,
  GenscanConfig,
  GraphSource,
  OutputFormat,
  ResolvedConfig,
} from "./types.js";

export const CONFIG_FILE = "genscan.json";

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

const isOutputFormat = (value: unknown): value is OutputFormat =>
  value === "text" || value === "json";

const optionalString = (
  raw: Readonly<Record<string, unknown>>,
  field: string
): Result<string | undefined, string> => {
  const value = raw[field];
  return value === undefined || typeof value === "string"
    ? { ok: true, value }
    : { ok: false, error: `${CONFIG_FILE}: '${field}' must be a string` };
};

/**
 * Validate the parsed contents of genscan.json
 */
export const validateConfig = (raw: unknown): Result<GenscanConfig, string> => {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return { ok: false, error: `${CONFIG_FILE}: must be an object` };
  }
  const record: Readonly<Record<string, unknown>> = { ...raw };

  const graph = optionalString(record, "graph");
  if (!graph.ok) return graph;
  const moduleName = optionalString(record, "moduleName");
  if (!moduleName.ok) return moduleName;
  const rootNamespace = optionalString(record, "rootNamespace");
  if (!rootNamespace.ok) return rootNamespace;

  const { sources, references, queries, format } = record;
  if (sources !== undefined && !isStringArray(sources)) {
    return {
      ok: false,
      error: `${CONFIG_FILE}: 'sources' must be an array of strings`,
    };
  }
  if (references !== undefined && !isStringArray(references)) {
    return {
      ok: false,
      error: `${CONFIG_FILE}: 'references' must be an array of strings`,
    };
  }

  if ((graph.value === undefined) === (sources === undefined)) {
    return {
      ok: false,
      error: `${CONFIG_FILE}: exactly one of 'graph' and 'sources' is required`,
    };
  }

  if (!isStringArray(queries)) {
    return {
      ok: false,
      error: `${CONFIG_FILE}: 'queries' must be an array of strings`,
    };
  }

  if (format !== undefined && !isOutputFormat(format)) {
    return {
      ok: false,
      error: `${CONFIG_FILE}: 'format' must be "text" or "json"`,
    };
  }

  return {
    ok: true,
    value: {
      graph: graph.value,
      sources,
      moduleName: moduleName.value,
      references,
      rootNamespace: rootNamespace.value,
      queries,
      format,
    },
  };
};

/**
 * Load genscan.json
 */
export const loadConfig = (
  configPath: string
): Result<GenscanConfig, string> => {
  if (!existsSync(configPath)) {
    return {
      ok: false,
      error: `Config file not found: ${configPath}`,
    };
  }

  try {
    const content = readFileSync(configPath, "utf-8");
    const parsed: unknown = JSON.parse(content);
    return validateConfig(parsed);
  } catch (error) {
    return {
      ok: false,
      error: `Failed to parse ${CONFIG_FILE}: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
};

/**
 * Find genscan.json by walking up the directory tree
 */
export const findConfig = (startDir: string): string | null => {
  let currentDir = resolve(startDir);

  // Walk up until we find genscan.json or hit root
  while (true) {
    const configPath = join(currentDir, CONFIG_FILE);
    if (existsSync(configPath)) {
      return configPath;
    }

    const parentDir = dirname(currentDir);
    if (parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
};

const resolveGraphSource = (
  config: GenscanConfig,
  projectRoot: string
): GraphSource =>
  config.graph !== undefined
    ? { kind: "graph", path: resolve(projectRoot, config.graph) }
    : {
        kind: "sources",
        files: (config.sources ?? []).map((file) => resolve(projectRoot, file)),
        moduleName: config.moduleName ?? "App",
        references: config.references ?? [],
        rootNamespace: config.rootNamespace,
      };

/**
 * Resolve final configuration from file + CLI args
 * @param queryFile - Positional query file; replaces the configured ones
 */
export const resolveConfig = (
  config: GenscanConfig,
  cliOptions: CliOptions,
  projectRoot: string,
  queryFile?: string
): Result<ResolvedConfig, string> => {
  const format = cliOptions.format ?? config.format ?? "text";
  if (!isOutputFormat(format)) {
    return {
      ok: false,
      error: `Unknown format '${format}' (expected "text" or "json")`,
    };
  }

  // Positional and -o paths are relative to the working directory
  const queryFiles =
    queryFile !== undefined
      ? [resolve(queryFile)]
      : config.queries.map((file) => resolve(projectRoot, file));

  return {
    ok: true,
    value: {
      projectRoot,
      graphSource: resolveGraphSource(config, projectRoot),
      queryFiles,
      queryName: cliOptions.query,
      format,
      out: cliOptions.out !== undefined ? resolve(cliOptions.out) : undefined,
      verbose: cliOptions.verbose ?? false,
      quiet: cliOptions.quiet ?? false,
    },
  };
};
