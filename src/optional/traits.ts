import * as R from "ramda";

/**
 * Lifecycle policy an optional applies to the value it owns
 */
export interface ValueTraits<T> {
  /**
   * Creates an independent copy of the given value
   * @param value
   */
  copy(value: T): T;

  /**
   * Updates the live value with the contents of source
   * @param target value currently held
   * @param source
   * @returns the value that is live afterwards. Return target to keep its identity
   */
  assign(target: T, source: T): T;

  /**
   * Releases whatever the value holds on to. Called at most once per value
   * @param value
   */
  destroy(value: T): void;
}

interface Disposable {
  dispose: () => void;
}

function isDisposable(value: unknown): value is Disposable {
  return typeof value === "object" && value !== null && "dispose" in value && typeof value.dispose === "function";
}

function isUpdatable(value: unknown): value is object {
  return typeof value === "object" && value !== null && !Object.isFrozen(value);
}

function cloneValue<T>(value: T): T {
  return R.clone(value);
}

function assignValue<T>(target: T, source: T): T {
  if (target === source) return target;
  if (!isUpdatable(target) || !isUpdatable(source)) return R.clone(source);

  if (Array.isArray(target) && Array.isArray(source)) {
    target.splice(0, target.length, ...R.clone(source));
    return target;
  }
  if (target instanceof Map && source instanceof Map) {
    target.clear();
    for (const [key, value] of source) target.set(key, R.clone(value));
    return target;
  }
  if (target instanceof Set && source instanceof Set) {
    target.clear();
    for (const value of source) target.add(R.clone(value));
    return target;
  }
  if (target instanceof Date && source instanceof Date) {
    target.setTime(source.getTime());
    return target;
  }
  if (
    R.type(target) === "Object" &&
    R.type(source) === "Object" &&
    Object.getPrototypeOf(target) === Object.getPrototypeOf(source)
  ) {
    const copy = R.clone(source);
    for (const key of Object.keys(target)) {
      if (!Object.prototype.hasOwnProperty.call(copy, key)) Reflect.deleteProperty(target, key);
    }
    for (const key of Object.keys(copy)) {
      Reflect.set(target, key, Reflect.get(copy, key));
    }
    return target;
  }

  return R.clone(source);
}

function destroyValue<T>(value: T) {
  if (isDisposable(value)) value.dispose();
}

/**
 * Completes the given traits with the defaults:
 * - copy: deep clone, honouring a `clone()` method on the value
 * - assign: overwrites arrays, maps, sets, dates and plain or class objects in place, anything
 * else (primitives, frozen values, mismatched shapes) is replaced by a copy of the source
 * - destroy: calls `dispose()` when the value has one
 * @param traits
 */
export function defineTraits<T>(traits: Partial<ValueTraits<T>> = {}): ValueTraits<T> {
  return {
    copy: traits.copy?.bind(traits) ?? cloneValue,
    assign: traits.assign?.bind(traits) ?? assignValue,
    destroy: traits.destroy?.bind(traits) ?? destroyValue,
  };
}

/**
 * Traits for values that are shared by reference rather than copied, such as handles or
 * services. Assignment replaces the held reference. The caller keeps ownership of the values,
 * so the optional never destroys them
 */
export function referenceTraits<T>(): ValueTraits<T> {
  return {
    copy: (value) => value,
    assign: (_, source) => source,
    destroy: () => {},
  };
}
