export { Optional, OptionalState } from "./Optional";
export { EmptyMarker, empty, isEmptyMarker } from "./EmptyMarker";
export { ValueTraits, defineTraits, referenceTraits } from "./traits";
export { Scope, Releasable } from "./Scope";
