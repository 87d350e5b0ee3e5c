/**
 * Convert a string to PascalCase
 */
export function toPascalCase(str: string): string {
  return str
    .replace(/[-_\s]+(.)?/g, (_, c: string | undefined) =>
      c ? c.toUpperCase() : "",
    )
    .replace(/^(.)/, (c) => c.toUpperCase());
}

/**
 * Convert a string to camelCase
 */
export function toCamelCase(str: string): string {
  const pascal = toPascalCase(str);
  return pascal.charAt(0).toLowerCase() + pascal.slice(1);
}

/**
 * Upper-case the first character only, leaving the rest untouched
 * e.g., "petType" -> "PetType", "t" -> "T"
 */
export function capitalize(str: string): string {
  return str.charAt(0).toUpperCase() + str.slice(1);
}

// ============================================================================
// Schema Naming Utilities
// ============================================================================

/**
 * Convert a raw spec name into a PascalCase type name
 * e.g., "user_profile" -> "UserProfile", "Log.costs" -> "LogCosts",
 * "2fa-settings" -> "_2faSettings"
 */
export function sanitizeClassName(name: string): string {
  const className = name
    .split(/[\W_]+/)
    .filter(Boolean)
    .map(capitalize)
    .join("");

  return /^[0-9]/.test(className) ? `_${className}` : className;
}

/**
 * Convert a raw spec name into a kebab-case module stem, splitting on
 * camelCase and PascalCase boundaries
 * e.g., "UserProfile" -> "user-profile", "HTTPResponseCode" -> "http-response-code"
 */
export function sanitizeModuleName(name: string): string {
  const words = name.match(/[A-Z]+(?=[A-Z][a-z])|[A-Z]?[a-z]+|[A-Z]+|[0-9]+/g);
  const parts = words ?? name.split(/\W+/);
  const stem = parts
    .filter(Boolean)
    .map((word) => word.toLowerCase())
    .join("-");

  return /^[0-9]/.test(stem) ? `_${stem}` : stem;
}

/**
 * Naive singular form for property-derived names: drops one trailing "s"
 * e.g., "Items" -> "Item", "Status" -> "Status", "Bus" -> "Bus"
 */
export function singularize(name: string): string {
  if (/(ss|us|is)$/.test(name)) return name;
  if (name.endsWith("s") && name.length > 3) {
    return name.slice(0, -1);
  }
  return name;
}

/**
 * Generate an enum member name from a value
 * e.g., "in-progress" -> "IN_PROGRESS", 404 -> "VALUE_404"
 */
export function toEnumMemberName(value: unknown): string {
  const member = String(value)
    .toUpperCase()
    .replace(/[-\s.]+/g, "_")
    .replace(/[^A-Z0-9_]/g, "");

  if (member === "") return "EMPTY";
  return /^[0-9]/.test(member) ? `VALUE_${member}` : member;
}
