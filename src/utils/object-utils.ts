/**
 * Stores `value` under `key` as an own, enumerable data property.
 *
 * Plain assignment would run the inherited `__proto__` setter for that key;
 * this always creates a data property, as an object literal's
 * `["__proto__"]: value` entry does.
 */
export function setOwn(
  target: Record<string, unknown>,
  key: string,
  value: unknown
): void {
  Object.defineProperty(target, key, {
    value,
    writable: true,
    enumerable: true,
    configurable: true
  });
}
