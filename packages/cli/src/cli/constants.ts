/**
 * CLI constants
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const packageJson: unknown = require("../../package.json");

export const VERSION =
  typeof packageJson === "object" &&
  packageJson !== null &&
  "version" in packageJson &&
  typeof packageJson.version === "string"
    ? packageJson.version
    : "0.0.0";

export const COMMANDS = ["scan", "check", "extract"] as const;

export type Command = (typeof COMMANDS)[number];

export const isCommand = (value: string): value is Command =>
  COMMANDS.some((command) => command === value);

/**
 * Process exit codes
 */
export const EXIT_OK = 0;
export const EXIT_LOAD_ERROR = 1;
export const EXIT_UNKNOWN_COMMAND = 2;
export const EXIT_NO_CONFIG = 3;
export const EXIT_QUERY_ERROR = 4;
