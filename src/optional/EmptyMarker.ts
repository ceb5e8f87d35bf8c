/**
 * Token used to construct or assign an empty optional. There is a single instance, exported as
 * `empty`
 */
export class EmptyMarker {
  static readonly instance = new EmptyMarker();

  private readonly marker = true;

  private constructor() {
    Object.freeze(this);
  }

  toString() {
    return "empty";
  }
}

export const empty = EmptyMarker.instance;

export function isEmptyMarker(value: unknown): value is EmptyMarker {
  return value === EmptyMarker.instance;
}
