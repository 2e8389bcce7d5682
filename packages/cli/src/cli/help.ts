/**
 * CLI help message
 */

import { VERSION } from "./constants.js";

/**
 * Show help message
 */
export const showHelp = (): void => {
  console.log(`
genscan - generic handler registration scanner v${VERSION}

USAGE:
  genscan <command> [options]

COMMANDS:
  scan [query-file]         Run queries and list every match
  check                     Validate config, graph and queries
  extract                   Write the graph extracted from TypeScript sources

GLOBAL OPTIONS:
  -h, --help                Show help
  -v, --version             Show version
  -V, --verbose             Verbose output
  --quiet                   Suppress output
  -c, --config <file>       Config file path (default: genscan.json)

SCAN/EXTRACT OPTIONS:
  -q, --query <name>        Run only the named query
  -f, --format <format>     Output format: text or json
  -o, --out <file>          Write output to a file instead of stdout

EXIT CODES:
  0  Success
  1  Config or graph could not be loaded
  2  Unknown command
  3  No genscan.json found
  4  A query could not be built

EXAMPLES:
  genscan check
  genscan scan
  genscan scan queries/handlers.yaml --format json
  genscan extract -o app.graph.json
`);
};
