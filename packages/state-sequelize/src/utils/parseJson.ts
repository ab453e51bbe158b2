/**
 * Read a JSON column that may come back as a string or as an already parsed value.
 *
 * SQLite, and MySQL/MariaDB with some driver versions, return JSON columns as text.
 */
export function parseJson(value: unknown): unknown {
  if (typeof value === 'string') {
    return JSON.parse(value) as unknown;
  }
  return value;
}
