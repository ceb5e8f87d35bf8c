export { EmptyOptionalError } from "./EmptyOptionalError";
export { ScopeClosedError } from "./ScopeClosedError";
