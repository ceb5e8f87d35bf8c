/**
 * Thrown to indicate that the value of an empty optional was accessed
 */
export class EmptyOptionalError extends Error {
  readonly operation: string;

  constructor(operation: string) {
    super(`Cannot ${operation} the value of an empty optional`);
    this.operation = operation;
  }
}
