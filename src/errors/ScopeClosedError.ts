/**
 * Thrown when a scope is used after it has released its containers
 */
export class ScopeClosedError extends Error {
  constructor() {
    super("Scope has already been closed");
  }
}
