/**
 * Deep copy of a state that defines no `clone` of its own.
 *
 * Every object reached through an own property is copied with its
 * prototype and property descriptors. Arrays, `Map`, `Set`, `Date` and
 * `RegExp` get fresh instances. Functions are shared. Cycles and shared
 * references inside one state are preserved.
 *
 * Passing the same `seen` map to several calls keeps objects the states
 * share shared between their copies.
 *
 * `#private` fields live outside the object's properties and cannot be
 * copied here; states that use them implement `clone`.
 */
export function copyState<T extends object>(state: T, seen: Map<object, unknown> = new Map()): T {
  return copyObject(state, seen);
}

function copyObject<T extends object>(source: T, seen: Map<object, unknown>): T {
  const target: T = Object.create(Object.getPrototypeOf(source));
  seen.set(source, target);

  for (const key of Reflect.ownKeys(source)) {
    const descriptor = Object.getOwnPropertyDescriptor(source, key);
    if (descriptor === undefined) continue;
    if ("value" in descriptor) descriptor.value = copyValue(descriptor.value, seen);
    Object.defineProperty(target, key, descriptor);
  }

  return target;
}

function copyValue(value: unknown, seen: Map<object, unknown>): unknown {
  if (typeof value !== "object" || value === null) return value;
  if (seen.has(value)) return seen.get(value);

  if (Array.isArray(value)) {
    const copy: unknown[] = [];
    seen.set(value, copy);
    for (const item of value) copy.push(copyValue(item, seen));
    return copy;
  }

  if (value instanceof Map) {
    const copy = new Map<unknown, unknown>();
    seen.set(value, copy);
    for (const [key, item] of value) copy.set(key, copyValue(item, seen));
    return copy;
  }

  if (value instanceof Set) {
    const copy = new Set<unknown>();
    seen.set(value, copy);
    for (const item of value) copy.add(copyValue(item, seen));
    return copy;
  }

  if (value instanceof Date) return new Date(value.getTime());
  if (value instanceof RegExp) return new RegExp(value.source, value.flags);

  return copyObject(value, seen);
}
