import { ScopeClosedError } from "../errors";
import { empty, EmptyMarker } from "./EmptyMarker";
import { Optional } from "./Optional";
import { ValueTraits } from "./traits";

/**
 * Anything with an end of lifetime hook, optionals included
 */
export interface Releasable {
  dispose(): void;
}

/**
 * Ties the lifetime of containers to a block of code. Every tracked container is disposed, last
 * tracked first, once the block completes, whether or not it fails
 *
 * @example
 * Scope.run((scope) => {
 *   const session = scope.optional(openSession());
 *   ...
 * }); // session disposed here
 */
export class Scope {
  private readonly resources: Releasable[];

  private closed: boolean;

  constructor() {
    this.resources = [];
    this.closed = false;
  }

  /**
   * Runs the functor with a new scope, closing the scope when the functor returns or throws.
   * The scope closes as soon as the functor returns, so use {@link Scope.runAsync} for functors
   * returning a promise
   * @param functor
   */
  static run<K>(functor: (scope: Scope) => K): K {
    const scope = new Scope();
    try {
      return functor(scope);
    } finally {
      scope.close();
    }
  }

  /**
   * Same as {@link Scope.run}, but the scope is closed once the returned promise settles
   * @param functor
   */
  static async runAsync<K>(functor: (scope: Scope) => Promise<K>): Promise<K> {
    const scope = new Scope();
    try {
      return await functor(scope);
    } finally {
      scope.close();
    }
  }

  get isClosed() {
    return this.closed;
  }

  get size() {
    return this.resources.length;
  }

  /**
   * Registers the resource to be disposed when this scope closes
   * @param resource
   * @returns the resource
   */
  track<R extends Releasable>(resource: R): R {
    if (this.closed) throw new ScopeClosedError();
    this.resources.push(resource);
    return resource;
  }

  /**
   * Creates an optional owned by this scope
   * @param value copied into the optional, or `empty`
   * @param traits
   */
  optional<T>(value: T | EmptyMarker = empty, traits?: Partial<ValueTraits<T>>): Optional<T> {
    return this.track(new Optional<T>(value, traits));
  }

  /**
   * Disposes every tracked resource in reverse order of registration. All resources are disposed
   * even if some fail, the first failure is then rethrown. Closing twice has no effect
   */
  close() {
    if (this.closed) return;
    this.closed = true;

    let failure: { error: unknown } | undefined;
    while (this.resources.length > 0) {
      const resource = this.resources.pop();
      try {
        resource?.dispose();
      } catch (error) {
        failure ??= { error };
      }
    }
    if (failure) throw failure.error;
  }
}
