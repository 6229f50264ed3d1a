export { generateId } from "./generate-id/generate-id";
export { EventSystem, type EventMapFromTuple } from "./events/event-system";
export type { LoopDriver } from "./loop/loop";
export { TimeoutDriver } from "./loop/drivers";
