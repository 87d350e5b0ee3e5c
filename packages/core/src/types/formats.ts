/**
 * String formats with a dedicated scalar type
 *
 * Each maps to a branded string type that emitters declare once in their
 * typing module. Formats not listed here resolve to plain `string`.
 */
export const STRING_FORMAT_TYPES = {
  date: "IsoDate",
  "date-time": "IsoDateTime",
  time: "IsoTime",
  uuid: "Uuid",
  email: "Email",
  uri: "Uri",
  hostname: "Hostname",
  ipv4: "Ipv4",
  ipv6: "Ipv6",
} as const satisfies Record<string, string>;

export type StringFormat = keyof typeof STRING_FORMAT_TYPES;

export type FormatTypeName = (typeof STRING_FORMAT_TYPES)[StringFormat];

export function isStringFormat(format: string): format is StringFormat {
  return Object.hasOwn(STRING_FORMAT_TYPES, format);
}

/**
 * Scalar type name for a string format, undefined for unknown formats
 */
export function formatTypeName(
  format: string | undefined,
): FormatTypeName | undefined {
  if (format === undefined || !isStringFormat(format)) return undefined;
  return STRING_FORMAT_TYPES[format];
}
