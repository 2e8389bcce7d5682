/**
 * Diagnostic types for genscan front ends
 */

export type DiagnosticSeverity = "error" | "warning" | "info";

export type DiagnosticCode =
  // TypeScript source extraction (GSN2001-GSN2099)
  | "GSN2001" // Unsupported type syntax, falls back to System.Object
  | "GSN2002" // Source file not found
  | "GSN2003" // Heritage clause does not name a known type
  | "GSN2004" // Duplicate declaration
  | "GSN2005" // No sources configured for extraction
  // Query construction (GSN3001-GSN3099)
  | "GSN3001" // Declaring type not found
  | "GSN3002" // Marker type for assemblyOfType not found
  | "GSN3003" // Assignable-to target not found
  | "GSN3004" // Attribute type not found
  | "GSN3005" // Custom handler not found or not generic
  | "GSN3006" // Invalid generic arguments
  | "GSN3007" // Query document must be an object
  | "GSN3008" // Query field has the wrong type
  | "GSN3009" // Invalid inline type parameter
  | "GSN3010" // assemblyOfType overrides assemblyNameFilter
  | "GSN3011" // Query file not found
  | "GSN3012" // Failed to read query file
  | "GSN3013" // Invalid YAML in query file
  | "GSN3014" // Duplicate query name
  | "GSN3015" // No query with the requested name
  // Graph document loading (GSN9001-GSN9099)
  | "GSN9001" // Graph file not found
  | "GSN9002" // Failed to read graph file
  | "GSN9003" // Invalid JSON in graph file
  | "GSN9004" // Graph document must be an object
  | "GSN9005" // Missing or invalid 'modules' field
  | "GSN9006" // Invalid module: must be an object
  | "GSN9007" // Invalid module: missing or invalid 'name'
  | "GSN9008" // Invalid module: 'references' must be an array of strings
  | "GSN9009" // Invalid module: missing or invalid 'types'
  | "GSN9010" // Invalid type: must be an object
  | "GSN9011" // Invalid type: missing or invalid 'name'
  | "GSN9012" // Invalid type: 'kind' must be one of ...
  | "GSN9013" // Invalid type: 'accessibility' must be one of ...
  | "GSN9014" // Invalid type: field must be a boolean
  | "GSN9015" // Invalid type: field must be an array
  | "GSN9016" // Invalid type string
  | "GSN9017" // Duplicate type name
  | "GSN9018" // Duplicate module name
  | "GSN9019" // Reference to an unknown module
  | "GSN9020"; // Invalid constructor, method or type parameter entry

export type SourceLocation = {
  readonly file: string;
  readonly line: number;
  readonly column: number;
  readonly length: number;
};

export type Diagnostic = {
  readonly code: DiagnosticCode;
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  readonly hint?: string;
};

export const createDiagnostic = (
  code: DiagnosticCode,
  severity: DiagnosticSeverity,
  message: string,
  location?: SourceLocation,
  hint?: string
): Diagnostic => ({
  code,
  severity,
  message,
  location,
  hint,
});

export const isError = (diagnostic: Diagnostic): boolean =>
  diagnostic.severity === "error";

export const hasErrors = (diagnostics: readonly Diagnostic[]): boolean =>
  diagnostics.some(isError);

export const formatDiagnostic = (diagnostic: Diagnostic): string => {
  const parts: string[] = [];

  if (diagnostic.location) {
    parts.push(
      `${diagnostic.location.file}:${diagnostic.location.line}:${diagnostic.location.column}`
    );
  }

  parts.push(`${diagnostic.severity} ${diagnostic.code}:`);
  parts.push(diagnostic.message);

  if (diagnostic.hint) {
    parts.push(`Hint: ${diagnostic.hint}`);
  }

  return parts.join(" ");
};
