/**
 * Wildcard name filters
 *
 * "App.*Service,App.Legacy.*" → /^(App\..*Service|App\.Legacy\..*)$/
 */

const escapeRegex = (text: string): string =>
  text.replace(/[.*+?^${}()|[\]\\/-]/g, "\\$&");

/**
 * Compile a comma-separated wildcard pattern. Segments are alternatives,
 * `*` matches any run of characters, everything else is literal and the
 * match is anchored at both ends. No pattern means no filter.
 */
export const compileWildcard = (
  pattern: string | null | undefined
): RegExp | undefined => {
  if (pattern === null || pattern === undefined) return undefined;

  const alternatives = pattern
    .split(",")
    .map((segment) => escapeRegex(segment).replace(/\\\*/g, ".*"));

  return new RegExp(`^(?:${alternatives.join("|")})$`);
};

export const matchesWildcard = (
  matcher: RegExp | undefined,
  name: string
): boolean => (matcher ? matcher.test(name) : true);
