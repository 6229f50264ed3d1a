import { DEFAULT_FEEDBACK_CB, type InteractiveMarkerFeedback } from "./types";

/**
 * Callback invoked with observer feedback for one marker
 */
export type FeedbackCallback = (feedback: InteractiveMarkerFeedback) => void;

/**
 * Feedback handlers registered for one marker.
 * A type-specific handler wins over the default handler.
 */
export interface FeedbackHandlers {
	defaultHandler?: FeedbackCallback;
	byEventType: Map<number, FeedbackCallback>;
}

export function createHandlers(): FeedbackHandlers {
	return { byEventType: new Map() };
}

/**
 * Copy a handler set. Callbacks are shared, the map is not.
 */
export function cloneHandlers(handlers: FeedbackHandlers): FeedbackHandlers {
	return {
		defaultHandler: handlers.defaultHandler,
		byEventType: new Map(handlers.byEventType),
	};
}

/**
 * Set or remove a handler in place.
 *
 * `DEFAULT_FEEDBACK_CB` addresses the default handler; any other code addresses
 * the handler for that event type. Passing no callback removes the entry.
 */
export function assignHandler(
	handlers: FeedbackHandlers,
	eventType: number,
	callback: FeedbackCallback | undefined
): void {
	if (eventType === DEFAULT_FEEDBACK_CB) {
		handlers.defaultHandler = callback;
		return;
	}

	if (callback) {
		handlers.byEventType.set(eventType, callback);
	} else {
		handlers.byEventType.delete(eventType);
	}
}

export function resolveHandler(handlers: FeedbackHandlers, eventType: number): FeedbackCallback | undefined {
	return handlers.byEventType.get(eventType) ?? handlers.defaultHandler;
}
