/**
 * CLI command dispatcher
 */

import { writeFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import { formatDiagnostic } from "@genscan/frontend";
import type { Diagnostic } from "@genscan/frontend";
import { loadConfig, findConfig, resolveConfig, CONFIG_FILE } from "../config.js";
import { scanCommand } from "../commands/scan.js";
import { checkCommand } from "../commands/check.js";
import { extractCommand } from "../commands/extract.js";
import type { CommandFailure, ResolvedConfig } from "../types.js";
import {
  EXIT_LOAD_ERROR,
  EXIT_NO_CONFIG,
  EXIT_OK,
  EXIT_UNKNOWN_COMMAND,
  VERSION,
  isCommand,
} from "./constants.js";
import { showHelp } from "./help.js";
import { parseArgs } from "./parser.js";

const reportWarnings = (
  config: ResolvedConfig,
  warnings: readonly Diagnostic[]
): void => {
  if (config.quiet) return;
  for (const warning of warnings) {
    console.error(formatDiagnostic(warning));
  }
};

const reportFailure = (failure: CommandFailure): number => {
  for (const diagnostic of failure.diagnostics) {
    console.error(formatDiagnostic(diagnostic));
  }
  return failure.exitCode;
};

/**
 * Write command output to the -o file, or stdout
 */
const emit = (config: ResolvedConfig, output: string): void => {
  if (config.out !== undefined) {
    writeFileSync(config.out, `${output}\n`);
    if (config.verbose) {
      console.log(`Wrote ${config.out}`);
    }
    return;
  }
  if (output !== "") {
    console.log(output);
  }
};

/**
 * Main CLI entry point
 */
export const runCli = async (
  args: readonly string[],
  cwd: string = process.cwd()
): Promise<number> => {
  const parsed = parseArgs(args);

  // Handle version and help
  if (parsed.command === "version") {
    console.log(`genscan v${VERSION}`);
    return EXIT_OK;
  }

  if (parsed.command === "help" || !parsed.command) {
    showHelp();
    return EXIT_OK;
  }

  if (!isCommand(parsed.command)) {
    console.error(`Error: Unknown command '${parsed.command}'`);
    console.error("Run 'genscan --help' for usage information");
    return EXIT_UNKNOWN_COMMAND;
  }

  // Load config
  const configPath = parsed.options.config
    ? resolve(cwd, parsed.options.config)
    : findConfig(cwd);

  if (!configPath) {
    console.error(`Error: No ${CONFIG_FILE} found`);
    console.error(`Create ${CONFIG_FILE} or pass --config <file>`);
    return EXIT_NO_CONFIG;
  }

  const configResult = loadConfig(configPath);
  if (!configResult.ok) {
    console.error(`Error: ${configResult.error}`);
    return EXIT_LOAD_ERROR;
  }

  // Project root is the directory containing genscan.json
  const resolved = resolveConfig(
    configResult.value,
    parsed.options,
    dirname(configPath),
    parsed.target
  );
  if (!resolved.ok) {
    console.error(`Error: ${resolved.error}`);
    return EXIT_LOAD_ERROR;
  }
  const config = resolved.value;

  // Dispatch to command handlers
  switch (parsed.command) {
    case "scan": {
      const result = scanCommand(config);
      if (!result.ok) return reportFailure(result.error);
      reportWarnings(config, result.value.warnings);
      emit(config, result.value.output);
      return EXIT_OK;
    }

    case "check": {
      const result = checkCommand(config);
      if (!result.ok) return reportFailure(result.error);
      reportWarnings(config, result.value.warnings);
      if (!config.quiet) {
        const { moduleCount, typeCount, queryNames } = result.value;
        console.log(
          `✓ ${moduleCount} module(s), ${typeCount} type(s), ${queryNames.length} query(ies)`
        );
        for (const name of queryNames) {
          console.log(`  ${name}`);
        }
      }
      return EXIT_OK;
    }

    case "extract": {
      const result = extractCommand(config);
      if (!result.ok) return reportFailure(result.error);
      reportWarnings(config, result.value.warnings);
      emit(config, result.value.output);
      return EXIT_OK;
    }
  }
};
