export * from "./optional";
export * from "./errors";
export { configure, getConfiguration, resetConfiguration, Configuration } from "./config";
