type AnyRecord = Record<string, unknown>;

export type FactoryOverrides<T extends AnyRecord> = {
  [K in keyof T]?: T[K] extends AnyRecord ? Partial<T[K]> : T[K];
};

function isPlainRecord(value: unknown): value is AnyRecord {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Builds objects from a base. Nested plain objects are merged one level deep, so
 * `{ retry: { maxAttempts: 3 } }` keeps the other retry settings.
 */
export function createFactory<T extends AnyRecord>(base: T) {
  return (overrides: FactoryOverrides<T> = {}): T => {
    const nested: AnyRecord = {};

    for (const [key, value] of Object.entries(overrides)) {
      const current = base[key];
      if (isPlainRecord(current) && isPlainRecord(value)) {
        nested[key] = { ...current, ...value };
      }
    }

    return {
      ...base,
      ...overrides,
      ...nested
    };
  };
}
