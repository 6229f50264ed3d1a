export * from "./types";
export {
	assignHandler,
	cloneHandlers,
	createHandlers,
	resolveHandler,
	type FeedbackCallback,
	type FeedbackHandlers,
} from "./handlers";
export { PendingUpdates, type PendingKind, type PendingUpdate } from "./pending-updates";
export {
	InteractiveMarkerServer,
	type FeedbackInfo,
	type InteractiveMarkerServerConfig,
	type UpdateListener,
} from "./interactive-marker-server";
