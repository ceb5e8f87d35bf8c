import { ValueTraits } from "../../src/optional";

export class Resource {
  static nextId = 1;

  readonly id: number;

  label: string;

  disposed: boolean;

  constructor(label: string) {
    this.id = Resource.nextId++;
    this.label = label;
    this.disposed = false;
  }

  dispose() {
    if (this.disposed) throw new Error(`Resource ${this.id} disposed twice`);
    this.disposed = true;
  }
}

/**
 * Traits that record every lifecycle call made on resources
 */
export class RecordingTraits implements ValueTraits<Resource> {
  readonly copies: Resource[] = [];

  readonly assignments: Array<[Resource, Resource]> = [];

  readonly destroyed: Resource[] = [];

  failNextCopy = false;

  copy(value: Resource) {
    if (this.failNextCopy) {
      this.failNextCopy = false;
      throw new Error("copy failed");
    }
    const copy = new Resource(value.label);
    this.copies.push(copy);
    return copy;
  }

  assign(target: Resource, source: Resource) {
    this.assignments.push([target, source]);
    target.label = source.label;
    return target;
  }

  destroy(value: Resource) {
    this.destroyed.push(value);
    value.dispose();
  }
}
