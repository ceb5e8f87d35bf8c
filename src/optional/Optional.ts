import * as R from "ramda";
import { EmptyOptionalError } from "../errors";
import { empty, EmptyMarker, isEmptyMarker } from "./EmptyMarker";
import { defineTraits, ValueTraits } from "./traits";
import { track, untrack } from "./tracking";

export enum OptionalState {
  Empty,
  Present,
}

type Cell<T> = { readonly present: false } | { readonly present: true; readonly value: T };

/**
 * Storage owned by exactly one optional. Kept apart from the optional itself so that a finalizer
 * can release the value without holding on to its owner
 */
interface Slot<T> {
  cell: Cell<T>;
  readonly traits: ValueTraits<T>;
}

const EMPTY_CELL = Object.freeze({ present: false } as const);

function release<T>(slot: Slot<T>): boolean {
  const cell = slot.cell;
  if (!cell.present) return false;
  slot.cell = EMPTY_CELL;
  slot.traits.destroy(cell.value);
  return true;
}

function releaser<T>(slot: Slot<T>) {
  return () => release(slot);
}

/**
 * Container that either owns a single value or nothing.
 *
 * The held value is created through the container's traits (copy on construction, in place
 * assignment while present) and destroyed through them once the container is reset, overwritten
 * by an empty source, drained by a move or disposed. Reading the value of an empty container is a
 * programming error and throws {@link EmptyOptionalError}.
 *
 * @example
 * const port = new Optional<number>();
 * port.assign(8080);
 * port.getValue(); // 8080
 * port.assign(empty);
 * port.hasValue(); // false
 */
export class Optional<T> {
  private readonly slot: Slot<T>;

  /**
   * @param value copied into the container, or `empty` for an empty container
   * @param traits lifecycle policy, missing members fall back to {@link defineTraits}
   */
  constructor(value: T | EmptyMarker = empty, traits?: Partial<ValueTraits<T>>) {
    this.slot = { cell: EMPTY_CELL, traits: defineTraits(traits) };
    if (!isEmptyMarker(value)) this.construct(this.slot.traits.copy(value));
    track(this, releaser(this.slot));
  }

  static empty<T>(traits?: Partial<ValueTraits<T>>) {
    return new Optional<T>(empty, traits);
  }

  /**
   * Creates an optional holding a copy of the value
   * @param value
   * @param traits
   */
  static of<T>(value: T, traits?: Partial<ValueTraits<T>>) {
    return new Optional<T>(value, traits);
  }

  /**
   * Creates an optional that takes ownership of the value itself, without copying it. The caller
   * should not keep using the value afterwards
   * @param value
   * @param traits
   */
  static adopt<T>(value: T, traits?: Partial<ValueTraits<T>>) {
    const optional = new Optional<T>(empty, traits);
    optional.construct(value);
    return optional;
  }

  /**
   * Creates an optional holding a copy of other's value, if any. The new optional shares other's
   * traits
   * @param other
   */
  static copyOf<T>(other: Optional<T>) {
    const optional = new Optional<T>(empty, other.slot.traits);
    const cell = other.slot.cell;
    if (cell.present) optional.construct(optional.slot.traits.copy(cell.value));
    return optional;
  }

  /**
   * Creates an optional that takes over other's value, leaving other empty
   * @param other
   */
  static moveFrom<T>(other: Optional<T>) {
    const optional = new Optional<T>(empty, other.slot.traits);
    const cell = other.slot.cell;
    if (cell.present) {
      other.slot.cell = EMPTY_CELL;
      optional.construct(cell.value);
    }
    return optional;
  }

  get state() {
    return this.slot.cell.present ? OptionalState.Present : OptionalState.Empty;
  }

  hasValue() {
    return this.slot.cell.present;
  }

  isEmpty() {
    return !this.slot.cell.present;
  }

  /**
   * Retrieves the held value for reading or in place mutation
   * @throws EmptyOptionalError if the optional is empty
   */
  getValue(): T {
    return this.live("access");
  }

  /**
   * Retrieves the held value for reading only
   * @throws EmptyOptionalError if the optional is empty
   */
  peek(): Readonly<T> {
    return this.live("peek");
  }

  /**
   * Invokes the functor with the held value and returns its result
   * @param functor
   * @throws EmptyOptionalError if the optional is empty
   */
  with<K>(functor: (value: T) => K): K {
    return functor(this.live("use"));
  }

  /**
   * Removes the held value from the optional and hands it to the caller. The value is not
   * destroyed, the caller becomes its owner
   * @throws EmptyOptionalError if the optional is empty
   */
  take(): T {
    const value = this.live("take");
    this.slot.cell = EMPTY_CELL;
    return value;
  }

  getOrElse(fallback: T): T {
    const cell = this.slot.cell;
    return cell.present ? cell.value : fallback;
  }

  /**
   * Creates a new optional owning the result of the functor, or an empty one if this optional is
   * empty
   * @param functor
   * @param traits used by the new optional
   */
  map<K>(functor: (value: T) => K, traits?: Partial<ValueTraits<K>>): Optional<K> {
    const cell = this.slot.cell;
    return cell.present ? Optional.adopt(functor(cell.value), traits) : Optional.empty(traits);
  }

  equals(other: Optional<T>) {
    const cell = this.slot.cell;
    const otherCell = other.slot.cell;
    if (!cell.present || !otherCell.present) return cell.present === otherCell.present;
    return R.equals(cell.value, otherCell.value);
  }

  /**
   * Updates the held value in place if there is one, otherwise stores a copy of the value.
   * Assigning `empty` resets the optional
   * @param value
   */
  assign(value: T | EmptyMarker): this {
    if (isEmptyMarker(value)) return this.reset();

    const cell = this.slot.cell;
    if (cell.present) {
      this.update(cell.value, value);
    } else {
      this.construct(this.slot.traits.copy(value));
    }
    return this;
  }

  /**
   * Makes this optional hold a copy of other's value, or nothing if other is empty. Other is left
   * untouched
   * @param other
   */
  copyAssign(other: Optional<T>): this {
    if (other === this) return this;

    const source = other.slot.cell;
    if (!source.present) return this.reset();

    const cell = this.slot.cell;
    if (cell.present) {
      this.update(cell.value, source.value);
    } else {
      this.construct(this.slot.traits.copy(source.value));
    }
    return this;
  }

  /**
   * Moves other's value into this optional and leaves other empty. If other is empty, this
   * optional is reset and other is left untouched
   * @param other
   */
  moveAssign(other: Optional<T>): this {
    if (other === this) return this;

    const source = other.slot.cell;
    if (!source.present) return this.reset();

    const cell = this.slot.cell;
    if (cell.present) {
      const value = this.update(cell.value, source.value);
      if (value === source.value) {
        other.slot.cell = EMPTY_CELL;
      } else {
        release(other.slot);
      }
    } else {
      other.slot.cell = EMPTY_CELL;
      this.construct(source.value);
    }
    return this;
  }

  /**
   * Destroys the held value, if any
   */
  reset(): this {
    release(this.slot);
    return this;
  }

  clear(): this {
    return this.reset();
  }

  /**
   * Ends the lifetime of this optional, destroying the held value if there is one. Calling it again
   * has no effect
   */
  dispose() {
    untrack(this);
    release(this.slot);
  }

  toString() {
    const cell = this.slot.cell;
    return cell.present ? `Optional(${String(cell.value)})` : "Optional(empty)";
  }

  private construct(value: T) {
    this.slot.cell = { present: true, value };
  }

  /**
   * Assigns source into the live target. When the traits replace the value instead of updating
   * it, the replaced value is destroyed once the new one is stored
   * @returns the value now held
   */
  private update(target: T, source: T): T {
    const value = this.slot.traits.assign(target, source);
    this.slot.cell = { present: true, value };
    if (value !== target) this.slot.traits.destroy(target);
    return value;
  }

  private live(operation: string): T {
    const cell = this.slot.cell;
    if (!cell.present) throw new EmptyOptionalError(operation);
    return cell.value;
  }
}
