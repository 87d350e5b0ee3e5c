/**
 * `type` field normalization
 *
 * OpenAPI 3.0 declares a single type string; 3.1 allows a list that may
 * include "null". Both collapse to one primary type plus nullability.
 */

export type NormalizedType = [
  type: string | null,
  isNullable: boolean,
  warnings: string[],
];

function displayName(schemaName: string | undefined): string {
  return schemaName ? `'${schemaName}'` : "Schema";
}

/**
 * Normalize a raw `type` value.
 *
 * @example
 * normalizeType(["string", "null"]) // ["string", true, []]
 * normalizeType("null") // [null, true, []]
 */
export function normalizeType(
  value: unknown,
  schemaName?: string,
): NormalizedType {
  if (value === undefined || value === null) return [null, false, []];

  if (typeof value === "string") {
    return value === "null" ? [null, true, []] : [value, false, []];
  }

  if (Array.isArray(value) && value.every((t) => typeof t === "string")) {
    const isNullable = value.includes("null");
    const types = value.filter((t): t is string => t !== "null");
    const [primary] = types;

    if (primary === undefined) return [null, isNullable, []];
    if (types.length === 1) return [primary, isNullable, []];

    const listed = types.map((t) => `'${t}'`).join(", ");
    return [
      primary,
      isNullable,
      [
        `${displayName(schemaName)} has multiple types: ${listed}. Using '${primary}'.`,
      ],
    ];
  }

  return [
    null,
    false,
    [
      `${displayName(schemaName)} has unexpected 'type' field: ${JSON.stringify(value)}. Ignoring.`,
    ],
  ];
}
