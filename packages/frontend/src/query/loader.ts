/**
 * Query file loader
 *
 * A query file is YAML. Each document holds one query, or a sequence of
 * queries; `---` separates documents.
 */

import * as fs from "fs";
import YAML from "yaml";
import type { Diagnostic } from "../types/diagnostic.js";
import { createDiagnostic } from "../types/diagnostic.js";
import type { Result } from "../types/result.js";
import { error, ok } from "../types/result.js";

/**
 * Raw query entries of a YAML text, in document order.
 */
export const parseQueryText = (
  content: string,
  source = "query file"
): Result<readonly unknown[], Diagnostic[]> => {
  const documents = YAML.parseAllDocuments(content);
  const diagnostics: Diagnostic[] = [];
  const entries: unknown[] = [];

  for (const document of documents) {
    if (document.errors.length > 0) {
      diagnostics.push(
        ...document.errors.map((yamlError) =>
          createDiagnostic(
            "GSN3013",
            "error",
            `Invalid YAML in ${source}: ${yamlError.message}`
          )
        )
      );
      continue;
    }

    const value: unknown = document.toJS();
    if (value === null || value === undefined) continue;
    if (Array.isArray(value)) {
      entries.push(...value);
    } else {
      entries.push(value);
    }
  }

  return diagnostics.length > 0 ? error(diagnostics) : ok(entries);
};

export const loadQueryFile = (
  filePath: string
): Result<readonly unknown[], Diagnostic[]> => {
  if (!fs.existsSync(filePath)) {
    return error([
      createDiagnostic("GSN3011", "error", `Query file not found: ${filePath}`),
    ]);
  }

  try {
    const content = fs.readFileSync(filePath, "utf-8");
    return parseQueryText(content, filePath);
  } catch (readError) {
    return error([
      createDiagnostic(
        "GSN3012",
        "error",
        `Failed to read query file: ${String(readError)}`
      ),
    ]);
  }
};
