/**
 * Property lookup that stops before `Object.prototype` and
 * `Function.prototype`. Plain objects only expose their own fields;
 * class instances also expose their getters and inherited fields.
 */
function readProperty(record: object, name: string): unknown {
  let owner: object | null = record;
  while (owner !== null && owner !== Object.prototype && owner !== Function.prototype) {
    if (Object.hasOwn(owner, name)) {
      return Reflect.get(record, name);
    }
    owner = Reflect.getPrototypeOf(owner);
  }
  return undefined;
}

/**
 * Read a single named field from a record.
 *
 * Maps are read through `get`, any other non-null value through property
 * access, so class instances with getters work as records. Missing fields
 * and `undefined` both come back as `null`.
 */
export function readField(record: unknown, name: string): unknown {
  if (record === null || record === undefined) return null;

  if (record instanceof Map) {
    const value: unknown = record.get(name);
    return value === undefined ? null : value;
  }

  if (Array.isArray(record)) {
    if (!/^\d+$/.test(name)) return null;
    const value: unknown = record[Number(name)];
    return value === undefined ? null : value;
  }

  if (typeof record === 'object' || typeof record === 'function') {
    const value = readProperty(record, name);
    return value === undefined ? null : value;
  }

  return null;
}

/**
 * Resolve a dotted path (`address.city`, `tags.0`) against a record.
 * Resolution stops at the first missing or null hop and yields `null`.
 */
export function resolvePath(record: unknown, path: string): unknown {
  if (!path.includes('.')) return readField(record, path);

  let current: unknown = record;
  for (const segment of path.split('.')) {
    current = readField(current, segment);
    if (current === null) return null;
  }
  return current;
}

/**
 * Own enumerable fields of a record, in key order.
 * Used when a projection names no fields.
 */
export function ownFields(record: unknown): Array<[string, unknown]> {
  if (record instanceof Map) {
    const fields: Array<[string, unknown]> = [];
    for (const [key, value] of record) {
      fields.push([String(key), value]);
    }
    return fields;
  }

  if (record !== null && typeof record === 'object') {
    return Object.entries(record);
  }

  return [];
}
