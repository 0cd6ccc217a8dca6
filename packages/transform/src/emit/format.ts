/**
 * Transform Package - Emit Formatting Utilities
 *
 * Escaping and key formatting for JavaScript source generation.
 */

/* =============================================================================
 * STRING ESCAPING
 * ============================================================================= */

/**
 * Escape a string for use in a JavaScript string literal.
 */
export function escapeString(str: string): string {
  return str
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\n/g, "\\n")
    .replace(/\r/g, "\\r")
    .replace(/\t/g, "\\t")
    .replace(/\0/g, "\\0");
}

/** Double-quoted string literal. */
export function quote(str: string): string {
  return `"${escapeString(str)}"`;
}

/* =============================================================================
 * IDENTIFIER FORMATTING
 * ============================================================================= */

/**
 * Check if a string is a valid JavaScript identifier.
 */
export function isValidIdentifier(str: string): boolean {
  return /^[a-zA-Z_$][a-zA-Z0-9_$]*$/.test(str);
}

/**
 * Property key as written in an object literal or class body.
 */
export function formatPropertyKey(name: string): string {
  return isValidIdentifier(name) ? name : quote(name);
}
