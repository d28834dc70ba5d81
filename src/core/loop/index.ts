export { createDriver } from "./loop";
export type { DriverType, LoopDriver } from "./loop";
export { DEFAULT_TICK_RATE, ImmediateDriver, TimeoutDriver } from "./drivers";
export type { TimeoutDriverOptions } from "./drivers";
