/**
 * Type guard for a TOML table parsed by smol-toml.
 *
 * @param value - Parsed TOML value.
 * @returns True if the value is a table (not an array or a date).
 */
export function isTomlTable(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    !(value instanceof Date)
  )
}
