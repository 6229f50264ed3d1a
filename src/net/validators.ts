import type { InteractiveMarkerFeedback } from "../markers/types";

/**
 * Decides whether feedback from a peer reaches the marker server.
 * Returning false drops the feedback.
 */
export type FeedbackValidator = (peerId: string, feedback: InteractiveMarkerFeedback) => boolean;

/**
 * Accept only the listed event type codes
 */
export function validateEventTypes(...eventTypes: number[]): FeedbackValidator {
	const allowed = new Set(eventTypes);
	return (_peerId, feedback) => allowed.has(feedback.eventType);
}

/**
 * Accept only feedback whose header names one of the listed frames
 */
export function validateFrameId(...frameIds: string[]): FeedbackValidator {
	const allowed = new Set(frameIds);
	return (_peerId, feedback) => allowed.has(feedback.header.frameId);
}

/**
 * Reject poses and mouse points carrying NaN or infinite components
 */
export function validatePoseFinite(): FeedbackValidator {
	return (_peerId, feedback) => {
		const { position, orientation } = feedback.pose;
		const values = [position.x, position.y, position.z, orientation.x, orientation.y, orientation.z, orientation.w];
		if (feedback.mousePointValid) {
			values.push(feedback.mousePoint.x, feedback.mousePoint.y, feedback.mousePoint.z);
		}
		return values.every(Number.isFinite);
	};
}

/**
 * Accept only client ids matching `pattern`
 */
export function validateClientId(pattern: RegExp): FeedbackValidator {
	return (_peerId, feedback) => pattern.test(feedback.clientId);
}

/**
 * Combine multiple validators with AND logic
 */
export function combineValidators(...validators: FeedbackValidator[]): FeedbackValidator {
	return (peerId, feedback) => {
		for (const validator of validators) {
			if (!validator(peerId, feedback)) {
				return false;
			}
		}
		return true;
	};
}
