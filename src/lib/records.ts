// src/lib/records.ts

// Keys here come from CSV headers, so "__proto__" or "constructor" are
// ordinary column names: records have no prototype and reads check own keys.

export function createRecord<T>(): Record<string, T> {
  return Object.create(null);
}

export function ownValue<T>(record: Readonly<Record<string, T>> | undefined, key: string): T | undefined {
  return record !== undefined && Object.hasOwn(record, key) ? record[key] : undefined;
}
