import { assignHandler, resolveHandler, type FeedbackCallback, type FeedbackHandlers } from "./handlers";
import { PendingUpdates } from "./pending-updates";
import {
	DEFAULT_FEEDBACK_CB,
	FeedbackType,
	UpdateType,
	type Header,
	type InteractiveMarker,
	type InteractiveMarkerFeedback,
	type InteractiveMarkerUpdate,
	type InteractiveMarkersSnapshot,
	type Pose,
} from "./types";

/**
 * Configuration for InteractiveMarkerServer
 */
export interface InteractiveMarkerServerConfig {
	/** Namespace of this server, sent as `serverId` in every update */
	topicNamespace: string;

	/** Enable debug logging */
	debug?: boolean;
}

/**
 * Published state of one marker
 */
interface MarkerContext {
	marker: InteractiveMarker;
	/** Epoch milliseconds of the last feedback, undefined until feedback arrives */
	lastFeedback: number | undefined;
	lastClientId: string;
	handlers: FeedbackHandlers;
}

export interface FeedbackInfo {
	lastFeedback: number | undefined;
	lastClientId: string;
}

export type UpdateListener = (update: InteractiveMarkerUpdate) => void;

/**
 * Registry of interactive markers shared with remote observers.
 *
 * Changes are staged with {@link insert}, {@link setPose}, {@link erase} and
 * {@link clear}, and only become visible to observers when {@link applyChanges}
 * commits them and publishes one ordered diff. Repeated writes to the same
 * marker between two flushes coalesce into a single record.
 *
 * Every method runs to completion synchronously, so no call observes another
 * call halfway through. Feedback handlers run after the router has finished
 * updating state and may call back into the server.
 *
 * @example
 * ```ts
 * const server = new InteractiveMarkerServer({ topicNamespace: "simple_marker" });
 * server.onUpdate((update) => publish(update));
 *
 * server.insertWithCallback(marker, (feedback) => {
 *   console.log(`${feedback.markerName} moved`);
 * });
 * server.applyChanges(); // seqNum 1, markers: [marker]
 *
 * server.setPose(marker.name, pose);
 * server.applyChanges(); // seqNum 2, poses: [{ name, header, pose }]
 * ```
 */
export class InteractiveMarkerServer {
	readonly topicNamespace: string;

	private debug: boolean;

	private markerContexts = new Map<string, MarkerContext>();

	private pendingUpdates = new PendingUpdates();

	private sequenceNumber = 0;

	private updateListeners: UpdateListener[] = [];

	/** True while listeners are receiving an update */
	private publishing = false;

	/** Set when applyChanges is called from inside a listener */
	private flushRequested = false;

	constructor(config: InteractiveMarkerServerConfig) {
		this.topicNamespace = config.topicNamespace;
		this.debug = config.debug ?? false;
	}

	/**
	 * Stage a full definition for `marker.name`, replacing anything staged for it.
	 * Handlers staged for the name are dropped; a committed marker keeps its
	 * handlers only until this definition is flushed.
	 */
	insert(marker: InteractiveMarker): void {
		this.pendingUpdates.stageFull(marker);
		this.log(`Marker inserted with name '${marker.name}'`);
	}

	/**
	 * Stage a full definition and register a handler on it
	 */
	insertWithCallback(
		marker: InteractiveMarker,
		callback?: FeedbackCallback,
		eventType: number = DEFAULT_FEEDBACK_CB
	): void {
		this.insert(marker);
		this.setCallback(marker.name, callback, eventType);
	}

	/**
	 * Set or remove a feedback handler.
	 * Applied to the committed marker and to its staged update, whichever exist.
	 *
	 * @param eventType A {@link FeedbackType} code, or `DEFAULT_FEEDBACK_CB` for the default handler
	 * @returns false if the marker is neither committed nor staged
	 */
	setCallback(name: string, callback: FeedbackCallback | undefined, eventType: number = DEFAULT_FEEDBACK_CB): boolean {
		const context = this.markerContexts.get(name);
		if (!context && !this.pendingUpdates.has(name)) {
			return false;
		}

		if (context) {
			assignHandler(context.handlers, eventType, callback);
		}
		this.pendingUpdates.setHandler(name, eventType, callback);

		return true;
	}

	/**
	 * Stage a pose change. It replaces whatever is staged for the marker, so a
	 * pose written after `insert` and before the flush only applies once the
	 * marker is committed.
	 *
	 * Without an explicit header the committed marker's header is used, or the
	 * staged update's header when the marker is not committed.
	 *
	 * @returns false if the marker is neither committed nor staged
	 */
	setPose(name: string, pose: Pose, header?: Header): boolean {
		const current = this.markerContexts.get(name) ?? this.pendingUpdates.get(name);
		if (!current) {
			return false;
		}

		this.pendingUpdates.stagePose(name, pose, header ?? current.marker.header);
		return true;
	}

	/**
	 * Stage removal of a marker
	 * @returns false if the marker is neither committed nor staged
	 */
	erase(name: string): boolean {
		if (!this.markerContexts.has(name) && !this.pendingUpdates.has(name)) {
			return false;
		}

		this.pendingUpdates.stageErase(name);
		return true;
	}

	/**
	 * Drop everything staged and stage removal of every committed marker
	 */
	clear(): void {
		this.pendingUpdates.clear();
		for (const name of this.markerContexts.keys()) {
			this.pendingUpdates.stageErase(name);
		}
	}

	/**
	 * Commit staged changes and publish them as one update.
	 *
	 * Records inside the update carry no ordering between different markers.
	 * Nothing is published, and the sequence number does not move, when nothing
	 * is staged.
	 *
	 * @returns The published update, or undefined if there was nothing to publish
	 */
	applyChanges(): InteractiveMarkerUpdate | undefined {
		if (this.publishing) {
			this.flushRequested = true;
			return undefined;
		}

		if (this.pendingUpdates.size === 0) {
			this.log("No changes to apply");
			return undefined;
		}

		const update: InteractiveMarkerUpdate = {
			serverId: this.topicNamespace,
			seqNum: 0,
			type: UpdateType.UPDATE,
			markers: [],
			poses: [],
			erases: [],
		};

		for (const [name, pending] of this.pendingUpdates.drain()) {
			switch (pending.kind) {
				case "full": {
					const context = this.markerContexts.get(name);
					if (context) {
						context.marker = pending.marker;
						context.handlers = pending.handlers;
					} else {
						this.markerContexts.set(name, {
							marker: pending.marker,
							lastFeedback: undefined,
							lastClientId: "",
							handlers: pending.handlers,
						});
					}
					update.markers.push(structuredClone(pending.marker));
					break;
				}
				case "pose": {
					const context = this.markerContexts.get(name);
					if (!context) {
						this.warn(`Pending pose update for non-existing marker '${name}', dropping it`);
						break;
					}
					context.marker.pose = pending.marker.pose;
					context.marker.header = pending.marker.header;
					update.poses.push({
						header: structuredClone(context.marker.header),
						pose: structuredClone(context.marker.pose),
						name,
					});
					break;
				}
				case "erase":
					this.markerContexts.delete(name);
					update.erases.push(name);
					break;
			}
		}

		if (update.markers.length === 0 && update.poses.length === 0 && update.erases.length === 0) {
			return undefined;
		}

		update.seqNum = ++this.sequenceNumber;
		this.publish(update);

		return update;
	}

	/**
	 * Route observer feedback to the marker it targets.
	 *
	 * Pose-update feedback stages a pose change. The matching handler (type
	 * specific, then default) runs after all state changes are done.
	 *
	 * @returns false if the marker is unknown and the feedback was dropped
	 */
	processFeedback(feedback: InteractiveMarkerFeedback): boolean {
		const context = this.markerContexts.get(feedback.markerName);
		if (!context) {
			this.warn(`Received feedback for unknown marker '${feedback.markerName}', ignoring`);
			return false;
		}

		context.lastFeedback = Date.now();
		context.lastClientId = feedback.clientId;

		if (feedback.eventType === FeedbackType.POSE_UPDATE) {
			this.pendingUpdates.stagePose(feedback.markerName, feedback.pose, feedback.header);
		}

		const handler = resolveHandler(context.handlers, feedback.eventType);
		if (handler) {
			try {
				handler(structuredClone(feedback));
			} catch (error) {
				this.warn(`Error in feedback handler for marker '${feedback.markerName}': ${error}`);
			}
		}

		return true;
	}

	/**
	 * Current definition of a marker including changes not yet applied
	 */
	get(name: string): InteractiveMarker | undefined {
		const context = this.markerContexts.get(name);
		const staged = this.pendingUpdates.get(name);

		if (!staged) {
			return context ? structuredClone(context.marker) : undefined;
		}

		switch (staged.kind) {
			case "erase":
				return undefined;
			case "full":
				return staged.marker;
			case "pose": {
				if (!context) {
					return undefined;
				}
				const marker = structuredClone(context.marker);
				marker.pose = staged.marker.pose;
				marker.header = staged.marker.header;
				return marker;
			}
		}
	}

	has(name: string): boolean {
		return this.get(name) !== undefined;
	}

	/**
	 * Number of committed markers
	 */
	size(): number {
		return this.markerContexts.size;
	}

	empty(): boolean {
		return this.markerContexts.size === 0;
	}

	/**
	 * Names of committed markers
	 */
	getNames(): string[] {
		return Array.from(this.markerContexts.keys());
	}

	getFeedbackInfo(name: string): FeedbackInfo | undefined {
		const context = this.markerContexts.get(name);
		if (!context) {
			return undefined;
		}
		return { lastFeedback: context.lastFeedback, lastClientId: context.lastClientId };
	}

	/**
	 * Committed markers and the sequence number they correspond to.
	 * Staged changes are not included.
	 */
	getInteractiveMarkers(): InteractiveMarkersSnapshot {
		return {
			sequenceNumber: this.sequenceNumber,
			markers: Array.from(this.markerContexts.values(), (context) => structuredClone(context.marker)),
		};
	}

	getSequenceNumber(): number {
		return this.sequenceNumber;
	}

	/**
	 * Register a listener for published updates
	 * @returns Unsubscribe function
	 */
	onUpdate(listener: UpdateListener): () => void {
		this.updateListeners.push(listener);

		return () => {
			const index = this.updateListeners.indexOf(listener);
			if (index > -1) {
				this.updateListeners.splice(index, 1);
			}
		};
	}

	/**
	 * Deliver an update to every listener, then run a flush requested meanwhile
	 */
	private publish(update: InteractiveMarkerUpdate): void {
		this.publishing = true;
		try {
			for (const listener of [...this.updateListeners]) {
				try {
					listener(update);
				} catch (error) {
					this.warn(`Failed to publish update ${update.seqNum}: ${error}`);
				}
			}
		} finally {
			this.publishing = false;
		}

		this.log(
			`Published update ${update.seqNum} (${update.markers.length} full, ${update.poses.length} pose, ${update.erases.length} erase)`
		);

		if (this.flushRequested) {
			this.flushRequested = false;
			this.applyChanges();
		}
	}

	/**
	 * Debug logging
	 */
	private log(message: string): void {
		if (this.debug) {
			console.log(`[InteractiveMarkerServer] ${message}`);
		}
	}

	private warn(message: string): void {
		console.warn(`[InteractiveMarkerServer] ${message}`);
	}
}
