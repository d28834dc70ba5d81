export { EventSystem } from "./event-system";
export type { Unsubscribe } from "./event-system";
