export { ImmediateDriver } from "./immediate";
export { DEFAULT_TICK_RATE, TimeoutDriver } from "./timeout";
export type { TimeoutDriverOptions } from "./timeout";
