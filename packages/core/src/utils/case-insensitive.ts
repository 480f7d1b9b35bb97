/**
 * Helpers for plain records whose keys compare case-insensitively.
 * The first spelling of a key is kept; later writes only replace the value.
 */

export function findKey(record: Readonly<Record<string, unknown>>, name: string): string | undefined {
  if (Object.prototype.hasOwnProperty.call(record, name)) return name;
  const lower = name.toLowerCase();
  return Object.keys(record).find((key) => key.toLowerCase() === lower);
}

export function getIgnoreCase<T>(record: Readonly<Record<string, T>>, name: string): T | undefined {
  const key = findKey(record, name);
  return key === undefined ? undefined : record[key];
}

/**
 * Set `name` in place, reusing the existing key when one matches ignoring case.
 */
export function setIgnoreCase<T>(record: Record<string, T>, name: string, value: T): void {
  record[findKey(record, name) ?? name] = value;
}
