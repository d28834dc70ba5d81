export * from "./binary-codec";
export * from "./events";
export * from "./loop";
export * from "./errors";
